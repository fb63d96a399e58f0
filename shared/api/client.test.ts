import { describe, test, expect, vi } from 'vitest';
import { ApiError, createApiClient } from './index';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('createApiClient', () => {
  test('builds status queries from options', async () => {
    const fetchImpl = vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) =>
      jsonResponse({ service: 'web' })
    );
    const client = createApiClient({ baseUrl: 'http://status.test', fetchImpl });

    await client.instances.status('web', 'main', { instanceType: 'kubernetes', verbose: 2, useNew: true });

    expect(fetchImpl.mock.calls[0][0]).toBe(
      'http://status.test/api/services/web/instances/main/status?type=kubernetes&verbose=2&new=true'
    );
  });

  test('posts desired state as JSON', async () => {
    const fetchImpl = vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) =>
      jsonResponse({ message: 'ok', desiredState: 'stop' })
    );
    const client = createApiClient({ baseUrl: 'http://status.test', fetchImpl });

    const result = await client.instances.setState('web', 'stream', 'stop');

    expect(result.desiredState).toBe('stop');
    expect(fetchImpl.mock.calls[0][0]).toBe('http://status.test/api/services/web/instances/stream/state');
    expect(fetchImpl.mock.calls[0][1]).toMatchObject({ method: 'POST', body: '{"desiredState":"stop"}' });
  });

  test('raises the API error message with its status', async () => {
    const client = createApiClient({
      baseUrl: 'http://status.test',
      fetchImpl: async () =>
        jsonResponse({ error: { message: 'web.main is not configured for the service mesh', statusCode: 405 } }, 405),
    });

    const error = await client.instances.mesh('web', 'main').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ statusCode: 405, message: 'web.main is not configured for the service mesh' });
  });

  test('falls back to the status when the body is not JSON', async () => {
    const client = createApiClient({
      baseUrl: 'http://status.test',
      fetchImpl: async () => new Response('gateway down', { status: 502, statusText: 'Bad Gateway' }),
    });

    await expect(client.health.check()).rejects.toMatchObject({
      statusCode: 502,
      message: 'Request failed with status 502: Bad Gateway',
      reason: 'Bad Gateway',
    });
  });
});
