/* test/api/diagnose.spec.ts */
import { describe, it, expect, vi, afterEach } from 'vitest';
import diagnose from '../../api/diagnose';
import inspect from '../../api/inspectTable';
import { ErrorCodes } from '../../engine/errorCodes';
import { PLANT_MAPPING, PLANT_ROWS } from '../fixtures/plant';
import { call } from '../helpers/vercel';

afterEach(() => {
  vi.restoreAllMocks();
});

function silenceLogs() {
  vi.spyOn(console, 'info').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
}

describe('POST /api/diagnose', () => {
  it('returns the diagnosis for JSON rows', async () => {
    silenceLogs();
    const { req, res, body } = call({ body: { rows: PLANT_ROWS, mapping: PLANT_MAPPING } });
    await diagnose(req, res);

    expect(res.statusCode).toBe(200);
    expect(body()).toMatchObject({
      row_count: 3,
      composite_light: 'caution',
      scores: { gross_margin: 100, defect_rate: 40 }
    });
  });

  it('accepts CSV text in a string body', async () => {
    silenceLogs();
    const csv = 'Sales,COGS\n1000,600\n1000,900\n';
    const { req, res, body } = call({
      body: JSON.stringify({ csv, mapping: { sales: 'Sales', cogs: 'COGS' } })
    });
    await diagnose(req, res);

    expect(res.statusCode).toBe(200);
    // (2000 − 1500) / 2000
    expect(body()).toMatchObject({
      kpis: { gross_margin: 0.25 },
      scores: { gross_margin: 100 },
      totals: { sales: 2000, cogs: 1500 }
    });
  });

  it('logs one structured event per completed request', async () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const { req, res } = call({ body: { rows: [{ Sales: 10 }], mapping: { sales: 'Sales' } } });
    await diagnose(req, res);

    expect(info).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(info.mock.calls[0][0]))).toMatchObject({
      level: 'info',
      service: 'mfg-diagnosis',
      event: 'diagnosis_completed_200',
      endpoint: 'diagnose',
      row_count: 1
    });
  });

  it('rejects other methods with 405 and an Allow header', async () => {
    silenceLogs();
    const { req, res, body } = call({ method: 'GET' });
    await diagnose(req, res);

    expect(res.statusCode).toBe(405);
    expect(res.getHeader('Allow')).toBe('POST');
    expect(body()).toEqual({ error: 'Method Not Allowed' });
  });

  it('rejects invalid JSON', async () => {
    silenceLogs();
    const { req, res, body } = call({ body: '{"rows": [' });
    await diagnose(req, res);

    expect(res.statusCode).toBe(400);
    expect(body()).toEqual({
      error: 'Request body is not valid JSON.',
      error_codes: [ErrorCodes.INVALID_JSON_BODY]
    });
  });

  it('rejects a missing mapping object', async () => {
    silenceLogs();
    const { req, res, body } = call({ body: { rows: [{ Sales: 10 }] } });
    await diagnose(req, res);

    expect(res.statusCode).toBe(400);
    expect(body()).toEqual({
      error: 'The "mapping" property is missing or is not an object.',
      error_codes: [ErrorCodes.INVALID_MAPPING_OBJECT]
    });
  });

  it('rejects mappings that name missing columns', async () => {
    silenceLogs();
    const { req, res, body } = call({ body: { rows: [{ Sales: 10 }], mapping: { sales: 'Revenue' } } });
    await diagnose(req, res);

    expect(res.statusCode).toBe(400);
    expect(body()).toEqual({
      error: 'The mapping names a column that is not in the table.',
      error_codes: [ErrorCodes.MAPPED_COLUMN_NOT_FOUND],
      details: ['Column "Revenue" mapped to "sales" is not in the table.']
    });
  });

  it('rejects unreadable CSV with the ingestion code', async () => {
    silenceLogs();
    const { req, res, body } = call({ body: { csv: 'a,b\n"open,1\n', mapping: {} } });
    await diagnose(req, res);

    expect(res.statusCode).toBe(400);
    expect(body()).toMatchObject({ error_codes: [ErrorCodes.UNREADABLE_CSV] });
  });
});

describe('POST /api/inspectTable', () => {
  it('suggests a mapping from the headers', async () => {
    silenceLogs();
    const { req, res, body } = call({ body: { rows: PLANT_ROWS } });
    await inspect(req, res);

    expect(res.statusCode).toBe(200);
    expect(body()).toMatchObject({
      row_count: 3,
      unset_value: '(none)',
      suggested_mapping: { defect_reason: 'Defect Reason', line: 'Line', date: '(none)' }
    });
  });

  it('requires a table source', async () => {
    silenceLogs();
    const { req, res, body } = call({ body: {} });
    await inspect(req, res);

    expect(res.statusCode).toBe(400);
    expect(body()).toMatchObject({ error_codes: [ErrorCodes.INVALID_TABLE_SOURCE] });
  });
});
