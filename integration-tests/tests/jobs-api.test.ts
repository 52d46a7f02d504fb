/**
 * Jobs API Tests
 *
 * The express app runs on an ephemeral port against the in-memory store; the
 * extraction queue is a mock and extraction is driven through the service.
 */

import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { ProcessingService, register, type PayrollTextSource } from '@tutorlog/shared';
import { createApp, type CapacityCheck } from '../../services/jobs-api/src/app';
import { MemoryRecordStore, PAYROLL_TEXT, buildWorkbook, textReport } from './helpers';

const JOB_BODY = {
  month: 'January',
  year: 2024,
  files: [
    {
      kind: 'payroll',
      path: '/uploads/payroll-jan.pdf',
      mime_type: 'application/pdf',
      original_filename: 'payroll-jan.pdf',
    },
    {
      kind: 'feedback',
      path: '/uploads/feedback-jan.xlsx',
      mime_type: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
      original_filename: 'feedback-jan.xlsx',
    },
  ],
};

const payrollSource: PayrollTextSource = {
  extractTextWithReport: async () => textReport(PAYROLL_TEXT),
};

const workbook = buildWorkbook([
  ['Students', [['Student Name', 'Tutor Assigned'], ['Alice Brown', 'Jane Smith']]],
  ['Alice Brown', [['Date', 'Time In', 'Time Out', 'Hours'], ['1/15/2024', '3:00 PM', '5:00 PM', 2]]],
]);

function idOf(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'id' in value && typeof value.id === 'string') {
    return value.id;
  }
  throw new Error('Response body has no id');
}

const OK_CAPACITY: CapacityCheck = { shouldWarn: false, shouldReject: false, depth: 0 };

describe('jobs-api', () => {
  const service = new ProcessingService({
    store: new MemoryRecordStore(),
    textSource: payrollSource,
    readWorkbook: () => workbook,
  });
  const enqueueExtraction = jest.fn(async () => undefined);
  const checkCapacity = jest.fn(async () => OK_CAPACITY);
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = createApp({ service, enqueueExtraction, checkCapacity });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  beforeEach(() => {
    enqueueExtraction.mockClear();
    checkCapacity.mockResolvedValue(OK_CAPACITY);
  });

  function post(path: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
    });
  }

  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toMatchObject({ status: 'healthy', service: 'jobs-api' });
  });

  it('serves prometheus metrics', async () => {
    const response = await fetch(`${baseUrl}/metrics`);

    expect(response.status).toBe(200);
    await expect(response.text()).resolves.toContain('# TYPE tutorlog_http_requests_total counter');
  });

  it('answers with an error envelope when metrics collection fails', async () => {
    const spy = jest.spyOn(register, 'metrics').mockRejectedValueOnce(new Error('collector failed'));

    const response = await fetch(`${baseUrl}/metrics`, { headers: { 'X-Correlation-Id': 'corr-metrics' } });

    expect(response.status).toBe(500);
    await expect(response.json()).resolves.toEqual({
      error: { code: 'internal_error', message: 'Failed to collect metrics', correlation_id: 'corr-metrics' },
    });
    spy.mockRestore();
  });

  it('creates a job and enqueues extraction under the request correlation id', async () => {
    const response = await post('/jobs', JOB_BODY, { 'X-Correlation-Id': 'corr-123' });

    expect(response.status).toBe(202);
    expect(response.headers.get('x-correlation-id')).toBe('corr-123');
    const job: unknown = await response.json();
    expect(job).toMatchObject({ status: 'uploaded', month: 'January', year: 2024 });
    expect(enqueueExtraction).toHaveBeenCalledWith({ correlation_id: 'corr-123', job_id: idOf(job) });
  });

  it('generates a correlation id when none is sent', async () => {
    const response = await post('/jobs', JOB_BODY);

    expect(response.status).toBe(202);
    expect(response.headers.get('x-correlation-id')).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
  });

  it('rejects an invalid job body', async () => {
    const response = await post('/jobs', { month: 'January', year: 2024 }, { 'X-Correlation-Id': 'corr-bad' });

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual({
      error: {
        code: 'invalid_request',
        message: "Invalid job request: /: must have required property 'files'",
        correlation_id: 'corr-bad',
      },
    });
    expect(enqueueExtraction).not.toHaveBeenCalled();
  });

  it('sheds load when the extraction queue is full', async () => {
    checkCapacity.mockResolvedValue({ shouldWarn: true, shouldReject: true, depth: 600 });

    const response = await post('/jobs', JOB_BODY);

    expect(response.status).toBe(503);
    expect(response.headers.get('retry-after')).toBe('30');
    await expect(response.json()).resolves.toMatchObject({ error: { code: 'backpressure' } });
    expect(enqueueExtraction).not.toHaveBeenCalled();
  });

  it('rejects malformed JSON', async () => {
    const response = await fetch(`${baseUrl}/jobs`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"month":',
    });

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toMatchObject({
      error: { code: 'invalid_request', message: 'Request body is not valid JSON' },
    });
  });

  it('returns 404 for an unknown job', async () => {
    const response = await fetch(`${baseUrl}/jobs/nope`);

    expect(response.status).toBe(404);
    await expect(response.json()).resolves.toMatchObject({
      error: { code: 'not_found', message: 'Processing job nope not found' },
    });
  });

  it('returns 422 when validating a job without extractions', async () => {
    const jobId = idOf(await (await post('/jobs', JOB_BODY)).json());

    const response = await post(`/jobs/${jobId}/validate`, {});

    expect(response.status).toBe(422);
    await expect(response.json()).resolves.toMatchObject({
      error: { code: 'missing_extraction', message: 'Missing or invalid payroll and feedback data' },
    });
  });

  it('validates, summarizes and resolves a job', async () => {
    const jobId = idOf(await (await post('/jobs', JOB_BODY)).json());
    await service.runExtraction(jobId);

    const validated = await post(`/jobs/${jobId}/validate`, {});
    expect(validated.status).toBe(200);
    const result: unknown = await validated.json();
    expect(result).toMatchObject({
      job_id: jobId,
      issues: [
        { issue_type: 'tutor_hours_mismatch', details: { difference: 8 } },
        { issue_type: 'tutor_not_found' },
      ],
    });

    const fetched = await fetch(`${baseUrl}/jobs/${jobId}/validation`);
    await expect(fetched.json()).resolves.toMatchObject({ id: idOf(result) });

    const summary = await fetch(`${baseUrl}/jobs/${jobId}/validation/summary`);
    await expect(summary.json()).resolves.toMatchObject({ total_issues: 2, resolved: 0, unresolved: 2 });

    const badResolve = await post(`/jobs/${jobId}/resolve`, { resolutions: [{ issue_id: 0 }] });
    expect(badResolve.status).toBe(400);

    const resolved = await post(`/jobs/${jobId}/resolve`, {
      resolutions: [
        { issue_id: 0, resolution: 'Timesheet adjusted' },
        { issue_id: 1, resolution: 'Tutor left mid-month' },
      ],
    });
    await expect(resolved.json()).resolves.toEqual({ message: 'All issues resolved', all_resolved: true });

    const job = await fetch(`${baseUrl}/jobs/${jobId}`);
    await expect(job.json()).resolves.toMatchObject({ status: 'completed' });
  });
});
