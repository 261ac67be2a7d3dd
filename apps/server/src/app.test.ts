import type { Server } from 'node:http';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createApp, SERVICE_NAME, type AppDeps } from './app';

const status = { running: true, intervalSeconds: 60, maxRetryAttempts: 3 };

describe('createApp', () => {
  let server: Server | null = null;

  const start = async (overrides: Partial<AppDeps> = {}): Promise<string> => {
    const app = createApp({
      db: { healthCheck: vi.fn<() => Promise<boolean>>().mockResolvedValue(true) },
      scheduler: { getStatus: () => status },
      config: { apiAuthToken: 'test-secret', nodeEnv: 'test' },
      ...overrides,
    });
    const listening = app.listen(0, '127.0.0.1');
    server = listening;
    await new Promise<void>((resolve) => listening.once('listening', () => resolve()));
    const address = listening.address();
    if (!address || typeof address === 'string') {
      throw new Error('server has no port');
    }
    return `http://127.0.0.1:${address.port}`;
  };

  afterEach(async () => {
    const current = server;
    server = null;
    if (current) {
      await new Promise<void>((resolve, reject) => current.close((error) => (error ? reject(error) : resolve())));
    }
  });

  it('serves the service banner', async () => {
    const baseUrl = await start();

    const response = await fetch(`${baseUrl}/`);
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ service: SERVICE_NAME, status: 'ok' });
  });

  it('reports the database as down with a 503', async () => {
    const baseUrl = await start({ db: { healthCheck: vi.fn<() => Promise<boolean>>().mockResolvedValue(false) } });

    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({ status: 'error', db: 'down' });
  });

  it('guards the scheduler status with the API token', async () => {
    const baseUrl = await start();

    expect((await fetch(`${baseUrl}/api/scheduler/status`)).status).toBe(401);

    const bearer = await fetch(`${baseUrl}/api/scheduler/status`, {
      headers: { Authorization: 'Bearer test-secret' },
    });
    expect(bearer.status).toBe(200);
    expect(await bearer.json()).toEqual(status);

    const apiKey = await fetch(`${baseUrl}/api/scheduler/status`, { headers: { 'x-api-key': 'test-secret' } });
    expect(apiKey.status).toBe(200);
  });

  it('refuses protected routes in production when no token is configured', async () => {
    const baseUrl = await start({ config: { apiAuthToken: null, nodeEnv: 'production' } });

    const response = await fetch(`${baseUrl}/api/scheduler/status`);

    expect(response.status).toBe(500);
  });

  it('leaves protected routes open outside production when no token is configured', async () => {
    const baseUrl = await start({ config: { apiAuthToken: null, nodeEnv: 'development' } });

    expect((await fetch(`${baseUrl}/api/scheduler/status`)).status).toBe(200);
  });
});
