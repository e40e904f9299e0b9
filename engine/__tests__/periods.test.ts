import test from 'node:test';
import assert from 'node:assert/strict';

import {
  classifyHeaderCell,
  comparePeriods,
  excelSerialToDate,
  formatPeriodLabel,
  parsePeriodText,
  previousPeriod,
  toPeriodKey
} from '../periods';

test('period keys order chronologically and step back across years', () => {
  assert.equal(toPeriodKey(2024, 7), '2024-07');
  assert.equal(previousPeriod('2024-07'), '2024-06');
  assert.equal(previousPeriod('2024-01'), '2023-12');
  assert.equal(comparePeriods('2023-12', '2024-01'), -1);
  assert.equal(formatPeriodLabel('2024-07'), 'Jul 2024');
});

test('parsePeriodText accepts text, ISO and US headers', () => {
  assert.equal(parsePeriodText('Jul 2024'), '2024-07');
  assert.equal(parsePeriodText('July-24'), '2024-07');
  assert.equal(parsePeriodText('Sept 2023'), '2023-09');
  assert.equal(parsePeriodText('2024-07-31'), '2024-07');
  assert.equal(parsePeriodText('07/31/2024'), '2024-07');
  assert.equal(parsePeriodText('Jul 2024 Actual'), '2024-07');
});

test('parsePeriodText separates impossible dates from non-periods', () => {
  assert.equal(parsePeriodText('2024-13'), null);
  assert.equal(parsePeriodText('13/01/2024'), null);
  assert.equal(parsePeriodText('Rent'), undefined);
});

test('classifyHeaderCell reads native dates and Excel serials', () => {
  assert.deepEqual(classifyHeaderCell(new Date(Date.UTC(2024, 5, 30))), {
    kind: 'month',
    period: '2024-06',
    label: '2024-06-30',
    native: true
  });
  assert.equal(excelSerialToDate(45473).toISOString().slice(0, 10), '2024-06-30');
  assert.deepEqual(classifyHeaderCell(45473), { kind: 'month', period: '2024-06', label: '45473', native: true });
  assert.equal(classifyHeaderCell(12), null);
  assert.equal(classifyHeaderCell(45473.5), null);
});

test('classifyHeaderCell recognises YTD columns with and without a period', () => {
  assert.deepEqual(classifyHeaderCell('YTD'), { kind: 'ytd', period: null, label: 'YTD' });
  assert.deepEqual(classifyHeaderCell('YTD Jun 2024'), { kind: 'ytd', period: '2024-06', label: 'YTD Jun 2024' });
  assert.deepEqual(classifyHeaderCell('2024-13'), { kind: 'unparseable', label: '2024-13' });
  assert.equal(classifyHeaderCell('Budget'), null);
  assert.equal(classifyHeaderCell(null), null);
});
