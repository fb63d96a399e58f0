import { describe, test, expect, vi } from 'vitest';
import { HttpMeshAdminClient, formatAdminUrl } from './meshAdmin';

describe('formatAdminUrl', () => {
  test('fills known placeholders and leaves the rest', () => {
    expect(formatAdminUrl('http://{host}:{port}/{endpoint}', { host: 'host-a', port: 9901 })).toBe(
      'http://host-a:9901/{endpoint}'
    );
  });
});

describe('HttpMeshAdminClient', () => {
  test('returns the response body', async () => {
    const fetchImpl = vi.fn(async () => new Response('payload', { status: 200 }));
    const client = new HttpMeshAdminClient(1000, fetchImpl);

    expect(await client.fetchText('http://host-a:9901/clusters')).toBe('payload');
    expect(fetchImpl).toHaveBeenCalledWith('http://host-a:9901/clusters', expect.objectContaining({ signal: expect.anything() }));
  });

  test('fails with 502 on an error status', async () => {
    const client = new HttpMeshAdminClient(1000, async () => new Response('nope', { status: 503 }));
    await expect(client.fetchText('http://host-a:3212/')).rejects.toMatchObject({
      statusCode: 502,
      message: 'Mesh admin endpoint http://host-a:3212/ answered 503',
    });
  });
});
