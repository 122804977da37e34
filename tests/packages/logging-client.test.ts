import { describe, expect, it, vi } from 'vitest';
import { BatchQueue, createTelemetryClient, getMetricDefinition, normalizeEndpoint, readEnvConfig } from '@ragstack/logging-client';

function stubFetch(status = 200, text = '') {
  const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => new Response(text, { status }));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function sentBody(init: RequestInit | undefined): unknown {
  return JSON.parse(String(init?.body));
}

const enabled = {
  serviceId: 'runtime',
  enabled: true,
  endpoint: 'http://telemetry.test/',
  env: 'test-env',
  authMode: 'apiKey' as const,
  apiKey: 'test-key',
  retry: 0,
};

describe('normalizeEndpoint', () => {
  it('appends /api once and strips trailing slashes', () => {
    expect(normalizeEndpoint('http://telemetry.test/')).toBe('http://telemetry.test/api');
    expect(normalizeEndpoint('http://telemetry.test/api//')).toBe('http://telemetry.test/api');
    expect(normalizeEndpoint('')).toBe('');
  });
});

describe('readEnvConfig', () => {
  it('enables telemetry when an endpoint is set and picks the auth mode from the credential', () => {
    const config = readEnvConfig({ TELEMETRY_ENDPOINT: 'http://telemetry.test', TELEMETRY_BEARER: 'test-token', TELEMETRY_RETRY: 'x' });
    expect(config.enabled).toBe(true);
    expect(config.authMode).toBe('bearer');
    expect(config.retry).toBe(3);
  });

  it('lets TELEMETRY_ENABLED switch it off', () => {
    expect(readEnvConfig({ TELEMETRY_ENDPOINT: 'http://telemetry.test', TELEMETRY_ENABLED: 'false' }).enabled).toBe(false);
    expect(readEnvConfig({}).enabled).toBe(false);
  });
});

describe('BatchQueue', () => {
  it('drops the oldest entries past its size and hands out batches in order', () => {
    const queue = new BatchQueue<number>(3);
    [1, 2, 3, 4, 5].forEach((n) => queue.push(n));

    expect(queue.size).toBe(3);
    expect(queue.take(2)).toEqual([3, 4]);
    expect(queue.take(2)).toEqual([5]);
    expect(queue.size).toBe(0);
  });
});

describe('getMetricDefinition', () => {
  it('falls back to a gauge for unknown metrics', () => {
    expect(getMetricDefinition('workflow.node.error.count').type).toBe('counter');
    expect(getMetricDefinition('custom.thing').type).toBe('gauge');
  });
});

describe('createTelemetryClient', () => {
  it('sends nothing when disabled', async () => {
    const fetchMock = stubFetch();
    const client = createTelemetryClient({ serviceId: 'runtime', enabled: false, endpoint: 'http://telemetry.test' });

    client.event('workflow.created', 'Workflow created');
    await client.shutdown();

    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('ships logs and metrics with base labels and auth headers', async () => {
    const fetchMock = stubFetch();
    const client = createTelemetryClient(enabled);

    client.event('workflow.created', 'Workflow created', { workflowId: 'wf-1' });
    client.metric('workflow.execution.count', 1, { workflowId: 'wf-1' });
    await client.shutdown();

    expect(fetchMock).toHaveBeenCalledTimes(2);
    const [logUrl, logInit] = fetchMock.mock.calls[0];
    expect(logUrl).toBe('http://telemetry.test/api/logs/ingest');
    expect(logInit?.headers).toEqual({
      'Content-Type': 'application/json',
      'X-Service-Id': 'runtime',
      'X-Env': 'test-env',
      'X-API-Key': 'test-key',
    });
    expect(sentBody(logInit)).toEqual({
      stream: 'service.runtime.logs',
      entries: [expect.objectContaining({
        level: 'info',
        message: 'Workflow created',
        metadata: { serviceId: 'runtime', env: 'test-env', eventType: 'workflow.created', workflowId: 'wf-1' },
      })],
    });

    const [metricUrl, metricInit] = fetchMock.mock.calls[1];
    expect(metricUrl).toBe('http://telemetry.test/api/metrics/ingest');
    expect(sentBody(metricInit)).toEqual({
      dataPoints: [expect.objectContaining({
        name: 'workflow.execution.count',
        type: 'counter',
        value: 1,
        labels: { serviceId: 'runtime', env: 'test-env', workflowId: 'wf-1' },
      })],
    });
  });

  it('keeps only the newest entries when the queue overflows', async () => {
    const fetchMock = stubFetch();
    const client = createTelemetryClient({ ...enabled, maxQueue: 2 });

    client.log('info', 'a');
    client.log('info', 'b');
    client.log('warn', 'c');
    await client.shutdown();

    const body = sentBody(fetchMock.mock.calls[0][1]);
    expect(body).toMatchObject({ entries: [{ message: 'b' }, { message: 'c', level: 'warn' }] });
  });

  it('ships every queued batch on shutdown', async () => {
    const fetchMock = stubFetch();
    const client = createTelemetryClient({ ...enabled, maxBatch: 2 });

    ['a', 'b', 'c'].forEach((message) => client.log('info', message));
    await client.shutdown();

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(sentBody(fetchMock.mock.calls[1][1])).toMatchObject({ entries: [{ message: 'c' }] });
  });

  it('drops a batch after the last failed attempt', async () => {
    stubFetch(503, 'down');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const client = createTelemetryClient(enabled);

    client.log('error', 'boom');
    await client.shutdown();

    expect(warn).toHaveBeenCalledWith('[telemetry] Dropped batch for /logs/ingest: Telemetry request failed: 503 down');
  });
});
