import { test } from 'node:test';
import assert from 'node:assert/strict';
import { extractIssueId, extractPrId } from '../src/extractors/metadata.js';

// ── extractIssueId ─────────────────────────────────────────────────────────────

test('extractIssueId reads a bare numeric file name', () => {
  assert.equal(extractIssueId('tests/crashes/12345.rs'), 12345);
  assert.equal(extractIssueId('0.rs'), 0);
});

test('extractIssueId reads the number before the first hyphen', () => {
  assert.equal(extractIssueId('tests/crashes/12345-foo.rs'), 12345);
  assert.equal(extractIssueId('tests/crashes/98765-bar-baz.rs'), 98765);
  assert.equal(extractIssueId('tests/crashes/200-bar.rs'), 200);
});

test('extractIssueId only strips the last extension', () => {
  assert.equal(extractIssueId('tests/crashes/777.stderr.rs'), undefined);
  assert.equal(extractIssueId('tests/crashes/777-x.stderr.rs'), 777);
});

test('extractIssueId rejects names outside the convention', () => {
  assert.equal(extractIssueId('tests/crashes/foo.rs'), undefined);
  assert.equal(extractIssueId('tests/crashes/foo-12345.rs'), undefined);
  assert.equal(extractIssueId('tests/crashes/12a45.rs'), undefined);
  assert.equal(extractIssueId('tests/crashes/-12345.rs'), undefined);
  assert.equal(extractIssueId('tests/crashes/README'), undefined);
});

test('extractIssueId accepts an explicit plus sign', () => {
  assert.equal(extractIssueId('tests/crashes/+12345.rs'), 12345);
  assert.equal(extractIssueId('tests/crashes/+678-foo.rs'), 678);
  assert.equal(extractIssueId('tests/crashes/++1.rs'), undefined);
});

test('extractIssueId rejects numbers beyond the safe integer range', () => {
  assert.equal(extractIssueId('tests/crashes/99999999999999999999.rs'), undefined);
});

test('extractIssueId works without a directory or extension', () => {
  assert.equal(extractIssueId('4242'), 4242);
  assert.equal(extractIssueId('4242-slug'), 4242);
});

// ── extractPrId ────────────────────────────────────────────────────────────────

test('extractPrId reads the merge-bot PR number', () => {
  assert.equal(extractPrId('Auto merge of #147900 - someone:rollup-abc, r=someone'), 147900);
  assert.equal(extractPrId('Auto merge of #12345 - username:branch, r=reviewer'), 12345);
});

test('extractPrId finds the marker after a multi-line prefix', () => {
  assert.equal(extractPrId('Rollup\n\nAuto merge of #55 - a:b'), 55);
});

test('extractPrId ignores bare issue references', () => {
  assert.equal(extractPrId('Regular commit message without PR'), undefined);
  assert.equal(extractPrId('Mention #12345 but not auto merge'), undefined);
  assert.equal(extractPrId('Merge pull request #12345 from a/b'), undefined);
});

test('extractPrId needs digits right after the marker', () => {
  assert.equal(extractPrId('Auto merge of # 123'), undefined);
  assert.equal(extractPrId('Auto merge of #'), undefined);
  assert.equal(extractPrId('Auto merge of #12x34'), 12);
});
