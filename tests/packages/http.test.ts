import type { AddressInfo } from 'node:net';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createOriginCheck, createServiceServer, summarizeBody, type HealthConfig, type ServerInstance } from '@ragstack/http';

describe('createOriginCheck', () => {
  it('matches exact origins and wildcard subdomains', () => {
    const isAllowed = createOriginCheck({ origins: ['https://app.example.com', '*.example.org'], allowLocalhost: false });

    expect(isAllowed('https://app.example.com/')).toBe(true);
    expect(isAllowed('https://docs.example.org')).toBe(true);
    expect(isAllowed('https://example.net')).toBe(false);
    expect(isAllowed('http://localhost:3000')).toBe(false);
  });

  it('allows localhost when enabled outside production', () => {
    const isAllowed = createOriginCheck({ origins: ['https://app.example.com'] });
    expect(isAllowed('http://localhost:5173')).toBe(true);
  });

  it('accepts every origin when none are configured outside production', () => {
    vi.stubEnv('NODE_ENV', 'test');
    vi.stubEnv('CORS_ALLOWED_ORIGINS', '');
    vi.stubEnv('CORS_ORIGINS', '');
    expect(createOriginCheck()('https://anything.test')).toBe(true);
  });
});

describe('summarizeBody', () => {
  it('redacts secrets and elides uploaded file content', () => {
    expect(summarizeBody({ question: 'What?', content: 'JVBERi0=', apiKey: 'test-key' }))
      .toEqual({ question: 'What?', content: '[ELIDED]', apiKey: '[REDACTED]' });
    expect(summarizeBody({})).toBeUndefined();
    expect(summarizeBody(['a'])).toBeUndefined();
  });
});

describe('createServiceServer', () => {
  let server: ServerInstance | undefined;

  afterEach(async () => {
    await server?.shutdown();
    server = undefined;
  });

  async function startServer(health?: HealthConfig, enableLogging = false): Promise<{ instance: ServerInstance; baseUrl: string }> {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const instance = createServiceServer({
      serviceId: 'runtime-test',
      port: 0,
      host: '127.0.0.1',
      enableLogging,
      health,
      cors: { origins: ['https://app.example.com'], allowLocalhost: false },
      shutdown: { preShutdownDelayMs: 0, gracePeriodMs: 1000, handleSignals: false },
      registerRoutes: (_httpServer, app) => {
        app.get('/api/teapot', () => {
          throw Object.assign(new Error('short and stout'), { statusCode: 418 });
        });
        app.get('/api/broken', () => {
          throw new Error('');
        });
      },
    });
    server = instance;
    await instance.start();
    const address: AddressInfo | string | null = instance.httpServer.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server did not bind a TCP port');
    }
    return { instance, baseUrl: `http://127.0.0.1:${address.port}` };
  }

  it('serves health while ready', async () => {
    const { instance, baseUrl } = await startServer();

    const ok = await fetch(`${baseUrl}/health`);
    expect(ok.status).toBe(200);
    expect(await ok.json()).toMatchObject({ status: 'ok' });

    instance.setReady(false);
    const degraded = await fetch(`${baseUrl}/health`);
    expect(degraded.status).toBe(503);
    expect(await degraded.json()).toMatchObject({ status: 'degraded' });
  });

  it('runs the readiness probe on /health/ready', async () => {
    let databaseUp = true;
    const { baseUrl } = await startServer({ readinessCheck: async () => databaseUp });

    expect((await fetch(`${baseUrl}/health/ready`)).status).toBe(200);

    databaseUp = false;
    const down = await fetch(`${baseUrl}/health/ready`);
    expect(down.status).toBe(503);
    expect(await down.json()).toMatchObject({ status: 'unhealthy' });

    const live = await fetch(`${baseUrl}/health/live`);
    expect(live.status).toBe(200);
  });

  it('maps thrown errors to JSON with their status', async () => {
    const { baseUrl } = await startServer();

    const teapot = await fetch(`${baseUrl}/api/teapot`);
    expect(teapot.status).toBe(418);
    expect(await teapot.json()).toEqual({ message: 'short and stout' });

    const broken = await fetch(`${baseUrl}/api/broken`);
    expect(broken.status).toBe(500);
    expect(await broken.json()).toEqual({ message: 'Internal Server Error' });
  });

  it('logs failed API responses with their body when logging is on', async () => {
    const { baseUrl } = await startServer(undefined, true);

    await (await fetch(`${baseUrl}/api/teapot`)).json();

    await vi.waitFor(() => expect(console.log).toHaveBeenCalledWith(
      expect.stringMatching(/\[express\] ← GET \/api\/teapot 418 in \d+ms :: \{"message":"short and stout"\}$/),
    ));
  });

  it('echoes allowed origins and refuses preflight from others', async () => {
    const { baseUrl } = await startServer();

    const allowed = await fetch(`${baseUrl}/health`, { headers: { Origin: 'https://app.example.com' } });
    expect(allowed.headers.get('access-control-allow-origin')).toBe('https://app.example.com');

    const preflight = await fetch(`${baseUrl}/api/teapot`, {
      method: 'OPTIONS',
      headers: { Origin: 'https://evil.test' },
    });
    expect(preflight.status).toBe(403);
  });

  it('reports not ready after shutdown', async () => {
    const { instance } = await startServer();
    expect(instance.isReady()).toBe(true);

    await instance.shutdown();
    server = undefined;

    expect(instance.isReady()).toBe(false);
    expect(instance.httpServer.listening).toBe(false);
  });
});
