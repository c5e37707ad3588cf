import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseCalendarDate, toCalendarDate, validateDateRange } from '../src/util/dates.js';
import { buildRunConfig, type CliOptions } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

test('parseCalendarDate accepts ISO calendar days', () => {
  assert.equal(parseCalendarDate('2024-01-01', 'start'), '2024-01-01');
  assert.equal(parseCalendarDate(' 2024-02-29 ', 'start'), '2024-02-29');
});

test('parseCalendarDate rejects malformed and impossible days', () => {
  assert.throws(() => parseCalendarDate('2024-1-1', 'start'), ConfigurationError);
  assert.throws(() => parseCalendarDate('2024-02-30', 'end'), ConfigurationError);
  assert.throws(() => parseCalendarDate('2023-02-29', 'end'), ConfigurationError);
  assert.throws(() => parseCalendarDate('yesterday', 'end'), /Invalid end date "yesterday"/);
});

test('toCalendarDate uses the UTC day of the timestamp', () => {
  assert.equal(toCalendarDate(0), '1970-01-01');
  assert.equal(toCalendarDate(1704067199), '2023-12-31'); // 2023-12-31T23:59:59Z
  assert.equal(toCalendarDate(1704067200), '2024-01-01');
});

test('toCalendarDate returns null for unusable timestamps', () => {
  assert.equal(toCalendarDate(Number.NaN), null);
  assert.equal(toCalendarDate(1.5), null);
  assert.equal(toCalendarDate(Number.MAX_SAFE_INTEGER), null);
});

test('validateDateRange rejects an inverted range', () => {
  assert.doesNotThrow(() => validateDateRange('2024-01-01', '2024-01-01'));
  assert.doesNotThrow(() => validateDateRange(null, '2024-01-01'));
  assert.throws(
    () => validateDateRange('2024-06-02', '2024-06-01'),
    /Start date 2024-06-02 must not be after end date 2024-06-01/
  );
});

// ── buildRunConfig ─────────────────────────────────────────────────────────────

const baseOptions: CliOptions = {
  refreshCache: false,
  cacheDir: '.cache',
  trackerRepo: 'rust-lang/rust',
  pathspec: 'tests/crashes/*.rs',
  format: 'terminal',
  verbose: false,
};

test('buildRunConfig validates and normalizes options', () => {
  const dir = mkdtempSync(join(tmpdir(), 'crash-audit-config-'));
  try {
    const config = buildRunConfig(dir, {
      ...baseOptions,
      from: '2024-01-01',
      to: '2024-06-01',
      githubToken: '  test-token  ',
      format: 'json',
    });
    assert.equal(config.repoPath, dir);
    assert.equal(config.from, '2024-01-01');
    assert.equal(config.to, '2024-06-01');
    assert.equal(config.token, 'test-token');
    assert.deepEqual(config.tracker, { owner: 'rust-lang', repo: 'rust' });
    assert.equal(config.format, 'json');
    assert.equal(config.outputPath, null);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test('buildRunConfig rejects bad input before touching the repository', () => {
  const dir = mkdtempSync(join(tmpdir(), 'crash-audit-config-'));
  const file = join(dir, 'plain.txt');
  writeFileSync(file, 'x');
  try {
    assert.throws(() => buildRunConfig(dir, { ...baseOptions, from: '2024-07-01', to: '2024-06-01' }), ConfigurationError);
    assert.throws(() => buildRunConfig(dir, { ...baseOptions, format: 'html' }), /Unknown output format "html"/);
    assert.throws(() => buildRunConfig(dir, { ...baseOptions, trackerRepo: 'rust' }), /expected owner\/name/);
    assert.throws(() => buildRunConfig(file, baseOptions), /not a directory/);
    assert.throws(() => buildRunConfig(join(dir, 'missing'), baseOptions), /does not exist/);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});
