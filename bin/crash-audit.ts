#!/usr/bin/env node

import { Option, program } from 'commander';
import ora, { type Ora } from 'ora';
import { readFileSync, existsSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import type { AuditReport } from '../src/types.js';
import {
  buildRunConfig,
  DEFAULT_CACHE_DIR,
  DEFAULT_PATHSPEC,
  DEFAULT_TRACKER_REPO,
  type CliOptions,
  type RunConfig,
} from '../src/config.js';
import { AuditError, errorMessage } from '../src/errors.js';
import { scanRepository } from '../src/analyzers/deletion-scanner.js';
import { classify } from '../src/analyzers/correlation.js';
import { listCurrentFiles } from '../src/git/tree-lister.js';
import { fetchOpenIssues } from '../src/tracker/github-client.js';
import { SnapshotCache, formatDuration } from '../src/tracker/snapshot-cache.js';
import { SnapshotProvider } from '../src/tracker/snapshot-provider.js';
import { reportTerminal } from '../src/reporters/terminal.js';
import { reportJson } from '../src/reporters/json.js';
import { loadDotEnv } from '../src/util/env.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// dist/bin → ../../package.json; bin/ under tsx → ../package.json
function readVersion(): string {
  for (const candidate of ['../../package.json', '../package.json']) {
    const path = join(__dirname, candidate);
    if (existsSync(path)) {
      return (JSON.parse(readFileSync(path, 'utf8')) as { version: string }).version;
    }
  }
  return '0.0.0';
}

// GITHUB_TOKEN may live in ./.env
try {
  loadDotEnv();
} catch (err) {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
}

program
  .name('crash-audit')
  .description('Find deleted crash regression tests whose tracker issue is still open.')
  .version(readVersion())
  .argument('<repo-path>', 'Path to the git repository to audit')
  .option('--from <date>',              'Inclusive start date (YYYY-MM-DD)')
  .option('--to <date>',                'Inclusive end date (YYYY-MM-DD)')
  .addOption(
    new Option('--github-token <token>', 'GitHub access token for higher rate limits').env('GITHUB_TOKEN')
  )
  .option('--refresh-cache',            'Fetch open issues again, ignoring the cache', false)
  .option('--cache-dir <dir>',          'Directory holding the open-issue cache', DEFAULT_CACHE_DIR)
  .option('--tracker-repo <owner/name>','GitHub repository whose issues are checked', DEFAULT_TRACKER_REPO)
  .option('--pathspec <glob>',          'Git pathspec selecting crash test files', DEFAULT_PATHSPEC)
  .option('--format <format>',          'Output format: terminal, json', 'terminal')
  .option('--output <file>',            'Write the JSON report to a file instead of stdout')
  .option('-v, --verbose',              'Verbose output', false)
  .parse(process.argv);

// ── Audit pipeline ─────────────────────────────────────────────────────────────

const TOTAL_STEPS = 4;

async function runAudit(config: RunConfig, spinner: Ora): Promise<void> {
  const totalStart = Date.now();
  let stepStart = Date.now();
  let lastN = 0;
  let lastMsg = '';

  const fmtMs = (ms: number) => ms >= 1000 ? `${(ms / 1000).toFixed(1)}s` : `${ms}ms`;

  const completeStep = () => {
    if (lastN > 0) {
      const t = fmtMs(Date.now() - stepStart);
      spinner.succeed(`[${lastN}/${TOTAL_STEPS}] ${lastMsg.padEnd(40)} ${t}`);
      spinner.start();
    }
  };

  const step = (n: number, msg: string) => {
    completeStep();
    lastN = n;
    lastMsg = msg;
    stepStart = Date.now();
    spinner.text = `[${n}/${TOTAL_STEPS}] ${msg}`;
  };

  const note = (msg: string) => {
    if (!config.verbose) return;
    spinner.info(msg);
    spinner.start();
  };

  step(1, 'Scanning first-parent history...');
  const { events, commitsExamined } = scanRepository(config.repoPath, config.pathspec, {
    fromDate: config.from ?? undefined,
    toDate:   config.to ?? undefined,
    onProgress: n => { spinner.text = `[1/${TOTAL_STEPS}] Scanning first-parent history... ${n} commits`; },
  });
  completeStep();
  lastN = 0;

  if (events.length === 0) {
    spinner.info(`No deleted crash test files found in the specified range (${commitsExamined} commits examined)`);
    return;
  }
  spinner.info(`Found ${events.length} deleted crash test file(s) in ${commitsExamined} commits`);
  spinner.start();

  step(2, 'Loading open issues...');
  const trackerName = `${config.tracker.owner}/${config.tracker.repo}`;
  if (!config.token) {
    note('Using unauthenticated GitHub API (60 requests/hour); set GITHUB_TOKEN for 5,000/hour');
  }
  const provider = new SnapshotProvider({
    cache: new SnapshotCache(config.cacheDir),
    fetchOpenIssues: () => fetchOpenIssues({
      ...config.tracker,
      token: config.token ?? undefined,
      onPage: ({ page, pageItems, totalSoFar }) => {
        spinner.text = `[2/${TOTAL_STEPS}] Fetching open issues from ${trackerName}... page ${page}`;
        note(`Fetched page ${page} (${pageItems} items, ${totalSoFar} open issues so far)`);
      },
    }),
    onInvalidCache: err => {
      spinner.warn(`Ignoring unusable cache: ${err.message}`);
      spinner.start();
    },
  });
  const { snapshot, ageMs } = await provider.getSnapshot(config.refreshCache);
  lastMsg = snapshot.source === 'cache'
    ? `Using cached open issues (updated ${formatDuration(ageMs)} ago)`
    : `Cached ${snapshot.issues.size} open issues from ${trackerName}`;

  step(3, 'Listing remaining crash tests...');
  const currentFiles = listCurrentFiles(config.repoPath, config.pathspec);

  step(4, 'Correlating deletions with open issues...');
  const result = classify(events, snapshot.issues, currentFiles);
  completeStep();
  spinner.stop();

  if (config.verbose) {
    for (const issue of result.issues.values()) {
      const verdict = issue.status === 'partially-deleted'
        ? `🧹 Issue #${issue.issueId} still has ${issue.remainingCount} crash test(s)`
        : issue.status === 'fully-deleted-open'
          ? `⚠️  Issue #${issue.issueId} is still OPEN`
          : `✅ Issue #${issue.issueId} is closed`;
      console.error(`  ${verdict}`);
    }
  }

  console.error(`⏱  ${fmtMs(Date.now() - totalStart)}`);
  if (snapshot.source === 'cache') {
    console.error('Use --refresh-cache to update the open-issue cache');
  }

  const report: AuditReport = {
    meta: {
      repository:      config.repoPath,
      trackerRepo:     trackerName,
      pathspec:        config.pathspec,
      from:            config.from,
      to:              config.to,
      commitsExamined,
      openIssueCount:  snapshot.issues.size,
      snapshotSource:  snapshot.source,
      snapshotAgeMs:   ageMs,
      analyzedAt:      new Date().toISOString(),
    },
    issues: [...result.issues.values()],
    stats:  result.stats,
  };

  if (config.format === 'json') {
    reportJson(report, config.outputPath);
  } else {
    reportTerminal(report);
  }
}

// ── Main ───────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const spinner = ora({ text: '', stream: process.stderr });

  try {
    const config = buildRunConfig(program.args[0] ?? '', program.opts<CliOptions>());
    spinner.start();
    await runAudit(config, spinner);
  } catch (err) {
    spinner.fail(`Error: ${errorMessage(err)}`);
    if (process.env.DEBUG) {
      for (let cause: unknown = err; cause !== undefined; ) {
        console.error(cause);
        cause = cause instanceof Error ? cause.cause : undefined;
      }
    } else if (!(err instanceof AuditError)) {
      console.error('Set DEBUG=1 for the full stack trace');
    }
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
