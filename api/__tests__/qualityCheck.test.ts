import test from 'node:test';
import assert from 'node:assert/strict';

import { handleQualityCheck } from '../qualityCheck';
import { buildEngineConfig } from '../../engine/engineConfig';
import { DEFAULT_ENGINE_SETTINGS } from '../../engine/config';
import { ErrorCodes } from '../../engine/errorCodes';
import { FakeResponse, bodyOf, post } from './fakeHttp';

const config = buildEngineConfig({ settings: DEFAULT_ENGINE_SETTINGS });

const NARRATIVE = [
  '## KEY PERFORMANCE INSIGHTS',
  '- Total Expense rose 33.84% month over month while occupancy held steady.',
  '- Net Eff. Gross Income dipped slightly as concessions grew.',
  '',
  '## CONCERNING TRENDS',
  '1. Expense growth outpaced revenue for the property.',
  '',
  '## RECOMMENDATIONS',
  '- Review vendor contracts to reduce operating costs.',
  '- Monitor delinquency weekly.'
].join('\n');

test('keywords from a summary: report plus extracted sections', () => {
  const res = new FakeResponse();
  handleQualityCheck(
    post({
      narrative: NARRATIVE,
      summary: { key_metrics: ['Total Expense'], current_period: { 'Total Expense': -110.15 } }
    }),
    res,
    config
  );

  assert.equal(res.statusCode, 200);
  const body = bodyOf(res);
  assert.equal(body.passed, true);
  assert.equal(body.score, 1);
  assert.equal(body.quality_level, 'Good');
  assert.deepEqual(body.sections, {
    questions: [],
    recommendations: ['Review vendor contracts to reduce operating costs.', 'Monitor delinquency weekly.'],
    concerns: ['Expense growth outpaced revenue for the property.'],
    insights: [
      'Total Expense rose 33.84% month over month while occupancy held steady.',
      'Net Eff. Gross Income dipped slightly as concessions grew.'
    ],
    risks: []
  });
});

test('explicit keywords win over the format key metrics', () => {
  const res = new FakeResponse();
  handleQualityCheck(
    post({ narrative: NARRATIVE, expected_keywords: ['Vacancy'], format_name: 'T12_Monthly_Financial' }),
    res,
    config
  );
  const body = bodyOf(res);
  assert.deepEqual(body.missing, ['Vacancy']);
  assert.deepEqual(body.codes, [ErrorCodes.QUALITY_MISSING_KEYWORD]);
  assert.equal(body.score, 0.8);
});

test('format key metrics supply keywords when nothing else does', () => {
  const res = new FakeResponse();
  handleQualityCheck(post({ narrative: NARRATIVE, format_name: 'Database_T12_Workbook' }), res, config);
  assert.deepEqual(bodyOf(res).missing, [
    'EBITDA (NOI)',
    'Physical Occupancy',
    'Debt Service',
    'Monthly Cash Flow'
  ]);
});

test('unknown format is a 400', () => {
  const res = new FakeResponse();
  handleQualityCheck(post({ narrative: NARRATIVE, format_name: 'Nope' }), res, config);
  assert.equal(res.statusCode, 400);
  assert.deepEqual(res.body, { error: 'Format "Nope" is not registered.', error_codes: [ErrorCodes.FORMAT_UNKNOWN] });
});

test('narrative is required', () => {
  const res = new FakeResponse();
  handleQualityCheck(post({ expected_keywords: [] }), res, config);
  assert.equal(res.statusCode, 400);
  assert.deepEqual(bodyOf(res).error_codes, [ErrorCodes.INVALID_REQUEST_STRUCTURE]);
});

test('only POST is accepted', () => {
  const res = new FakeResponse();
  handleQualityCheck({ method: 'PUT', body: undefined, query: {} }, res, config);
  assert.equal(res.statusCode, 405);
  assert.equal(res.headers.Allow, 'POST');
});
