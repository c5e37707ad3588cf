import chalk from 'chalk';
import Table from 'cli-table3';
import type { AuditReport, IssueClassification, IssueStatus, ReportMeta } from '../types.js';
import { percentage } from '../analyzers/correlation.js';
import { formatDuration } from '../tracker/snapshot-cache.js';

const RULE = '─'.repeat(57);

export function reportTerminal(report: AuditReport): void {
  console.log(formatTerminalReport(report).join('\n'));
}

/** Renders the report as terminal lines; colour follows chalk's detected level. */
export function formatTerminalReport({ meta, issues, stats }: AuditReport): string[] {
  const lines: string[] = [''];
  const attention = issues.filter(i => i.status === 'fully-deleted-open');
  const partial = issues.filter(i => i.status === 'partially-deleted');

  lines.push(
    chalk.bold.red('🧪 crash-audit') +
    chalk.gray(` — ${meta.repository}`) +
    chalk.gray(` (${meta.pathspec}, ${describeRange(meta)})`)
  );
  lines.push(chalk.gray(
    `   ${meta.commitsExamined} commits examined, ` +
    `${plural(stats.totalDeletedFiles, 'deleted file')} across ${plural(stats.totalIssues, 'issue')}`
  ));
  lines.push('');

  // ── Needs attention ────────────────────────────────────────────────────────
  if (attention.length > 0) {
    lines.push(chalk.yellow.bold('⚠️  Out-of-sync issues (test deleted but issue still open):'));
    lines.push(deletionTable(attention));
    for (const issue of attention) {
      lines.push(`    ${chalk.cyan(issueUrl(meta, issue.issueId))}`);
    }
    lines.push('');
  }

  // ── Partial cleanup ────────────────────────────────────────────────────────
  if (partial.length > 0) {
    lines.push(chalk.blue.bold('🧹 Partially cleaned up (some crash tests for the issue remain):'));
    for (const issue of partial) {
      lines.push(
        `  • Issue #${issue.issueId}: ` +
        `${plural(issue.events.length, 'file')} deleted, ${issue.remainingCount} remaining`
      );
      for (const event of issue.events) {
        lines.push(chalk.gray(`      ${event.filePath} deleted in ${shortHash(event.commitHash)} (${event.commitDate})`));
      }
    }
    lines.push('');
  }

  // ── Summary ────────────────────────────────────────────────────────────────
  const freshness = meta.snapshotSource === 'cache'
    ? `cached ${formatDuration(meta.snapshotAgeMs)} ago`
    : 'fetched just now';

  lines.push(RULE);
  lines.push('Summary:');
  lines.push(`  Total deleted tests: ${stats.totalDeletedFiles} (${plural(stats.totalIssues, 'issue')})`);
  lines.push(`  Total open issues in ${meta.trackerRepo}: ${meta.openIssueCount} (${freshness})`);
  lines.push('');
  lines.push(summaryLine('⚠️  Issues still open:', 'fully-deleted-open', stats, chalk.yellow));
  lines.push(summaryLine('🧹 Partially deleted:', 'partially-deleted', stats, chalk.blue));
  lines.push(summaryLine('✅ Issues properly closed:', 'fully-deleted-closed', stats, chalk.green));
  lines.push(RULE);

  // ── Recommendation ─────────────────────────────────────────────────────────
  lines.push('');
  if (attention.length === 0) {
    lines.push(chalk.green('✅ All deleted crash tests have properly closed issues!'));
  } else {
    lines.push(chalk.yellow(`⚠️  Found ${attention.length} out-of-sync issue(s) that need attention.`));
    lines.push('');
    lines.push('These issues should either:');
    lines.push('  1. Get their crash test restored (if it was removed by mistake)');
    lines.push('  2. Be closed (if the issue is actually fixed)');
  }
  if (partial.length > 0) {
    lines.push('');
    lines.push(chalk.blue(
      `🧹 ${partial.length} partially cleaned issue(s) still have crash tests in the tree — ` +
      'finish the cleanup or restore the deleted files.'
    ));
  }
  lines.push('');

  return lines;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function deletionTable(issues: IssueClassification[]): string {
  const table = new Table({
    head: [
      chalk.bold.gray('ISSUE'),
      chalk.bold.gray('FILE'),
      chalk.bold.gray('COMMIT'),
      chalk.bold.gray('DATE'),
      chalk.bold.gray('PR'),
    ],
    style: { head: [], border: ['gray'] },
  });

  for (const issue of issues) {
    for (const event of issue.events) {
      table.push([
        `#${issue.issueId}`,
        event.filePath,
        shortHash(event.commitHash),
        event.commitDate,
        event.prId !== undefined ? `#${event.prId}` : chalk.gray('—'),
      ]);
    }
  }

  return table.toString();
}

function summaryLine(
  label: string,
  status: IssueStatus,
  { totalIssues, buckets }: AuditReport['stats'],
  color: (text: string) => string
): string {
  const bucket = buckets[status];
  const pct = percentage(bucket.issues, totalIssues).toFixed(1);
  return `  ${color(label)} ${plural(bucket.issues, 'issue')} (${pct}%), ${plural(bucket.deletedFiles, 'file')}`;
}

function describeRange({ from, to }: ReportMeta): string {
  if (!from && !to) return 'all history';
  return `${from ?? 'beginning'} → ${to ?? 'present'}`;
}

export function issueUrl({ trackerRepo }: ReportMeta, issueId: number): string {
  return `https://github.com/${trackerRepo}/issues/${issueId}`;
}

function shortHash(hash: string): string {
  return hash.slice(0, 8);
}

function plural(n: number, noun: string): string {
  return `${n} ${noun}${n === 1 ? '' : 's'}`;
}
