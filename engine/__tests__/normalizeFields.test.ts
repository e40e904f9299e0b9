import test from 'node:test';
import assert from 'node:assert/strict';

import { cellToText, isBlankCell, labelKey, parseMoney, roundTo } from '../normalizeFields';

test('parseMoney reads plain numbers and accounting text', () => {
  assert.deepEqual(parseMoney(1234), { kind: 'number', value: 1234 });
  assert.deepEqual(parseMoney('$1,234.56'), { kind: 'number', value: 1234.56 });
  assert.deepEqual(parseMoney('(1,234.56)'), { kind: 'number', value: -1234.56 });
  assert.deepEqual(parseMoney('($1,234.56)'), { kind: 'number', value: -1234.56 });
  assert.deepEqual(parseMoney('-$1,234.56'), { kind: 'number', value: -1234.56 });
  assert.deepEqual(parseMoney('12.5%'), { kind: 'number', value: 0.125 });
});

test('parseMoney treats the accounting dash as zero and blanks as blank', () => {
  assert.deepEqual(parseMoney('-'), { kind: 'number', value: 0 });
  assert.deepEqual(parseMoney('—'), { kind: 'number', value: 0 });
  assert.deepEqual(parseMoney(null), { kind: 'blank' });
  assert.deepEqual(parseMoney(undefined), { kind: 'blank' });
  assert.deepEqual(parseMoney('   '), { kind: 'blank' });
});

test('parseMoney never yields negative zero', () => {
  const result = parseMoney('(0)');
  assert.equal(result.kind, 'number');
  if (result.kind === 'number') assert.ok(Object.is(result.value, 0));
});

test('parseMoney reports non-numeric cells with their text', () => {
  assert.deepEqual(parseMoney('n/a'), { kind: 'invalid', raw: 'n/a' });
  assert.deepEqual(parseMoney(true), { kind: 'invalid', raw: 'true' });
  assert.deepEqual(parseMoney(Number.NaN), { kind: 'invalid', raw: 'NaN' });
});

test('label helpers normalise case and spacing', () => {
  assert.equal(labelKey('  Net   Eff. Gross\tIncome '), 'net eff. gross income');
  assert.equal(cellToText(new Date(Date.UTC(2024, 6, 31))), '2024-07-31');
  assert.equal(cellToText(12.5), '12.5');
  assert.equal(isBlankCell(' '), true);
  assert.equal(isBlankCell(0), false);
});

test('roundTo strips float noise and negative zero', () => {
  assert.equal(roundTo(196.57 - 200), -3.43);
  assert.equal(roundTo(0.0166666666, 4), 0.0167);
  assert.ok(Object.is(roundTo(-0.0000001), 0));
});
