import test from 'node:test';
import assert from 'node:assert/strict';

import {
  decodeBase64File,
  MAX_FILE_BASE64_CHARS,
  parseJsonBody,
  validateAnalyzeFileTransport,
  validateAnalyzeTransport,
  validateExportTransport,
  validateQualityCheckTransport
} from '../validateTransport';
import { ErrorCodes } from '../errorCodes';

test('parseJsonBody accepts objects and JSON object strings only', () => {
  assert.deepEqual(parseJsonBody('{"a":1}'), { ok: true, request: { a: 1 } });
  assert.deepEqual(parseJsonBody({ a: 1 }), { ok: true, request: { a: 1 } });
  assert.deepEqual(parseJsonBody('{'), {
    ok: false,
    errorStatus: 400,
    errorBody: { error: 'Invalid JSON body.', error_codes: [ErrorCodes.INVALID_JSON_BODY] }
  });
  assert.deepEqual(parseJsonBody('[1]'), {
    ok: false,
    errorStatus: 400,
    errorBody: { error: 'Invalid request structure.', error_codes: [ErrorCodes.INVALID_REQUEST_STRUCTURE] }
  });
  assert.equal(parseJsonBody(null).ok, false);
});

test('base64 decoding tolerates padding, url-safe text and data URLs', () => {
  assert.equal(decodeBase64File('Zm9v')?.toString('utf8'), 'foo');
  assert.equal(decodeBase64File('Zm9vYg')?.toString('utf8'), 'foob');
  assert.equal(decodeBase64File('Zm9v\nYmFy')?.toString('utf8'), 'foobar');
  assert.equal(decodeBase64File('data:text/csv;base64,Zm9v')?.toString('utf8'), 'foo');
  assert.deepEqual(decodeBase64File('-_8'), Buffer.from([0xfb, 0xff]));
  assert.equal(decodeBase64File('Zm9vY'), null);
  assert.equal(decodeBase64File('!!!!'), null);
  assert.equal(decodeBase64File(''), null);
});

test('analyze transport: file payload checks', () => {
  assert.deepEqual(validateAnalyzeTransport({}), {
    ok: false,
    errorStatus: 400,
    errorBody: { error: 'file_base64 is required and must be a string.', error_codes: [ErrorCodes.INVALID_FILE_PAYLOAD] }
  });

  const tooLarge = validateAnalyzeTransport({ file_base64: 'A'.repeat(MAX_FILE_BASE64_CHARS + 1) });
  assert.equal(tooLarge.ok, false);
  if (!tooLarge.ok) assert.equal(tooLarge.errorStatus, 413);

  const garbage = validateAnalyzeTransport({ file_base64: '%%%%' });
  assert.equal(garbage.ok, false);
  if (!garbage.ok) assert.equal(garbage.errorBody.error, 'file_base64 is not valid base64.');
});

test('analyze transport: names are trimmed strings', () => {
  assert.deepEqual(validateAnalyzeTransport({ file_base64: 'Zm9v', sheet_name: ' Maple Court ', format_name: '' }), {
    ok: true,
    request: { file: Buffer.from('foo'), file_name: 'upload.xlsx', sheet_name: 'Maple Court' }
  });

  const badName = validateAnalyzeTransport({ file_base64: 'Zm9v', file_name: 42 });
  assert.equal(badName.ok, false);
  if (!badName.ok) assert.deepEqual(badName.errorBody.error_codes, [ErrorCodes.INVALID_REQUEST_STRUCTURE]);
});

test('export transport: store flag', () => {
  const stored = validateExportTransport({ file_base64: 'Zm9v', file_name: 'T12.xlsx', store: true });
  assert.ok(stored.ok && stored.request.store === true && stored.request.file_name === 'T12.xlsx');

  const defaulted = validateExportTransport({ file_base64: 'Zm9v' });
  assert.ok(defaulted.ok && defaulted.request.store === false);

  const wrong = validateExportTransport({ file_base64: 'Zm9v', store: 'yes' });
  assert.equal(wrong.ok, false);
  if (!wrong.ok) assert.equal(wrong.errorBody.error, 'store must be a boolean.');
});

test('analyzeFile transport: file_id is required', () => {
  const missing = validateAnalyzeFileTransport({ file_name: 'T12.xlsx' });
  assert.equal(missing.ok, false);
  if (!missing.ok) assert.deepEqual(missing.errorBody.error_codes, [ErrorCodes.INVALID_FILE_PAYLOAD]);

  assert.deepEqual(validateAnalyzeFileTransport({ file_id: 'file-placeholder', file_name: 'T12.xlsx' }), {
    ok: true,
    request: { file_id: 'file-placeholder', file_name: 'T12.xlsx' }
  });
});

test('quality check transport', () => {
  const missing = validateQualityCheckTransport({});
  assert.equal(missing.ok, false);
  if (!missing.ok) assert.equal(missing.errorBody.error, 'narrative is required and must be a string.');

  assert.equal(validateQualityCheckTransport({ narrative: 'x', expected_keywords: [1] }).ok, false);
  assert.equal(validateQualityCheckTransport({ narrative: 'x', summary: { key_metrics: [] } }).ok, false);
  assert.equal(validateQualityCheckTransport({ narrative: 'x', format_name: 7 }).ok, false);

  assert.deepEqual(
    validateQualityCheckTransport({
      narrative: 'x',
      summary: { key_metrics: ['Vacancy', 3], current_period: { Vacancy: -12, Note: 'n/a' } },
      format_name: 'T12_Monthly_Financial'
    }),
    {
      ok: true,
      request: {
        narrative: 'x',
        summary: { key_metrics: ['Vacancy'], current_period: { Vacancy: -12 } },
        format_name: 'T12_Monthly_Financial'
      }
    }
  );
});
