import { writeFileSync } from 'fs';
import type { AuditReport } from '../types.js';
import { issueUrl } from './terminal.js';

/**
 * Serializes the report with each issue's tracker URL attached.
 * Field order is fixed, so identical reports give byte-identical output.
 */
export function serializeReport(report: AuditReport): string {
  const payload = {
    meta: report.meta,
    stats: report.stats,
    issues: report.issues.map(issue => ({
      issueId:        issue.issueId,
      status:         issue.status,
      remainingCount: issue.remainingCount,
      url:            issueUrl(report.meta, issue.issueId),
      deletions:      issue.events.map(e => ({
        filePath:   e.filePath,
        commitHash: e.commitHash,
        commitDate: e.commitDate,
        prId:       e.prId ?? null,
      })),
    })),
  };
  return JSON.stringify(payload, null, 2) + '\n';
}

/** Writes to outputFile when given, otherwise to stdout. */
export function reportJson(report: AuditReport, outputFile: string | null = null): void {
  const payload = serializeReport(report);

  if (outputFile) {
    writeFileSync(outputFile, payload, 'utf8');
    console.error(`✓ JSON report written to ${outputFile}`);
  } else {
    process.stdout.write(payload);
  }
}
