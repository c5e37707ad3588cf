import { test, before } from 'node:test';
import assert from 'node:assert/strict';
import chalk from 'chalk';
import { formatTerminalReport } from '../src/reporters/terminal.js';
import { serializeReport } from '../src/reporters/json.js';
import { classify } from '../src/analyzers/correlation.js';
import type { AuditReport, DeletionEvent } from '../src/types.js';

before(() => { chalk.level = 0; });

const events: DeletionEvent[] = [
  { filePath: 'tests/crashes/100.rs', issueId: 100, commitHash: 'abcdef0123456789', commitDate: '2024-03-02', prId: 4242 },
  { filePath: 'tests/crashes/200-foo.rs', issueId: 200, commitHash: '0123456789abcdef', commitDate: '2024-03-01' },
];

function buildReport(open: number[], current: string[]): AuditReport {
  const result = classify(events, new Set(open), current);
  return {
    meta: {
      repository: '/repo',
      trackerRepo: 'rust-lang/rust',
      pathspec: 'tests/crashes/*.rs',
      from: '2024-01-01',
      to: null,
      commitsExamined: 12,
      openIssueCount: 1,
      snapshotSource: 'cache',
      snapshotAgeMs: 2 * 3_600_000 + 5_000,
      analyzedAt: '2024-06-01T00:00:00.000Z',
    },
    issues: [...result.issues.values()],
    stats: result.stats,
  };
}

test('terminal report lists open issues, partial cleanups and the summary', () => {
  const lines = formatTerminalReport(buildReport([100], ['tests/crashes/200-bar.rs']));

  assert.ok(lines.includes('🧪 crash-audit — /repo (tests/crashes/*.rs, 2024-01-01 → present)'));
  assert.ok(lines.includes('   12 commits examined, 2 deleted files across 2 issues'));
  assert.ok(lines.includes('⚠️  Out-of-sync issues (test deleted but issue still open):'));
  assert.ok(lines.some(l => l.includes('tests/crashes/100.rs') && l.includes('abcdef01') && l.includes('#4242')));
  assert.ok(lines.includes('    https://github.com/rust-lang/rust/issues/100'));
  assert.ok(lines.includes('  • Issue #200: 1 file deleted, 1 remaining'));
  assert.ok(lines.includes('      tests/crashes/200-foo.rs deleted in 01234567 (2024-03-01)'));
  assert.ok(lines.includes('  Total deleted tests: 2 (2 issues)'));
  assert.ok(lines.includes('  Total open issues in rust-lang/rust: 1 (cached 2 hours ago)'));
  assert.ok(lines.includes('  ⚠️  Issues still open: 1 issue (50.0%), 1 file'));
  assert.ok(lines.includes('  🧹 Partially deleted: 1 issue (50.0%), 1 file'));
  assert.ok(lines.includes('  ✅ Issues properly closed: 0 issues (0.0%), 0 files'));
  assert.ok(lines.includes('⚠️  Found 1 out-of-sync issue(s) that need attention.'));
  assert.ok(!lines.includes('✅ All deleted crash tests have properly closed issues!'));
});

test('terminal report confirms when everything is in sync', () => {
  const lines = formatTerminalReport(buildReport([], []));

  assert.ok(!lines.includes('⚠️  Out-of-sync issues (test deleted but issue still open):'));
  assert.ok(lines.includes('  ✅ Issues properly closed: 2 issues (100.0%), 2 files'));
  assert.ok(lines.includes('✅ All deleted crash tests have properly closed issues!'));
});

test('JSON report attaches URLs and is byte-identical across runs', () => {
  const first = serializeReport(buildReport([100], ['tests/crashes/200-bar.rs']));
  const second = serializeReport(buildReport([100], ['tests/crashes/200-bar.rs']));
  assert.equal(first, second);

  const parsed: unknown = JSON.parse(first);
  assert.ok(typeof parsed === 'object' && parsed !== null && 'issues' in parsed);
  assert.deepEqual(parsed.issues, [
    {
      issueId: 100,
      status: 'fully-deleted-open',
      remainingCount: 0,
      url: 'https://github.com/rust-lang/rust/issues/100',
      deletions: [{ filePath: 'tests/crashes/100.rs', commitHash: 'abcdef0123456789', commitDate: '2024-03-02', prId: 4242 }],
    },
    {
      issueId: 200,
      status: 'partially-deleted',
      remainingCount: 1,
      url: 'https://github.com/rust-lang/rust/issues/200',
      deletions: [{ filePath: 'tests/crashes/200-foo.rs', commitHash: '0123456789abcdef', commitDate: '2024-03-01', prId: null }],
    },
  ]);
});
