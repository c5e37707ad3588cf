import { posix } from 'path';

// Unsigned decimal, optional leading "+"
const DIGITS = /^\+?\d+$/;

// Merge-bot convention: "Auto merge of #147900 - user:branch, r=reviewer"
const PR_MARKER = 'Auto merge of #';

/**
 * Derives the tracker issue number from a crash-test file name.
 *
 *   tests/crashes/12345.rs         → 12345
 *   tests/crashes/12345-foo-bar.rs → 12345
 *   tests/crashes/foo-12345.rs     → undefined
 */
export function extractIssueId(path: string): number | undefined {
  const stem = posix.parse(path).name;

  const whole = parseUnsigned(stem);
  if (whole !== undefined) return whole;

  const dash = stem.indexOf('-');
  if (dash === -1) return undefined;
  return parseUnsigned(stem.slice(0, dash));
}

/**
 * Pulls the PR number out of a merge-bot commit message. Only the exact
 * "Auto merge of #" marker counts; a bare "#123" elsewhere does not.
 */
export function extractPrId(message: string): number | undefined {
  const start = message.indexOf(PR_MARKER);
  if (start === -1) return undefined;

  let end = start + PR_MARKER.length;
  while (end < message.length && isAsciiDigit(message.charCodeAt(end))) end++;

  return parseUnsigned(message.slice(start + PR_MARKER.length, end));
}

function parseUnsigned(raw: string): number | undefined {
  if (!DIGITS.test(raw)) return undefined;
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : undefined;
}

function isAsciiDigit(code: number): boolean {
  return code >= 48 && code <= 57;
}
