import { describe, test, expect, beforeEach } from 'vitest';
import { createApp } from './hono-app';
import {
  envoyPayload,
  envoyUrl,
  haproxyPayload,
  haproxyUrl,
  makeJob,
  makePod,
  makeSettings,
  type FakeSettings,
} from './testing/fakes';

describe('Hono Routes', () => {
  let settings: FakeSettings;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    settings = makeSettings();
    settings.configLoader.addJob('kubernetes', makeJob());
    settings.configLoader.addJob('flink', makeJob({ instance: 'stream', registrations: ['web.stream'] }));
    settings.configLoader.namespaces.set('web.main', { proxyPort: 20000, discover: 'region' });
    settings.kube.pods = [makePod({ ip: '10.0.0.1' })];
    app = createApp(settings);
  });

  describe('Health Routes', () => {
    test('GET /api/health returns healthy status', async () => {
      const res = await app.request('/api/health');
      expect(res.status).toBe(200);
      const data = await res.json();
      expect(data.status).toBe('healthy');
      expect(data.cluster).toBe('test-cluster');
      expect(data.timestamp).toBeDefined();
    });
  });

  describe('Instance Status Routes', () => {
    test('resolves the instance type from config when not given', async () => {
      const res = await app.request('/api/services/web/instances/main/status');
      expect(res.status).toBe(200);
      const data = await res.json();
      expect(data.instanceType).toBe('kubernetes');
      expect(data.kubernetes.appId).toBe('web-main');
    });

    test('returns the per-version shape with new=true', async () => {
      const res = await app.request('/api/services/web/instances/main/status?new=true&type=kubernetes');
      expect(res.status).toBe(200);
      const data = await res.json();
      expect(data.kubernetesV2.appName).toBe('web-main');
      expect(data.kubernetes).toBeUndefined();
    });

    test('rejects unknown instance types', async () => {
      const res = await app.request('/api/services/web/instances/main/status?type=marathon');
      expect(res.status).toBe(400);
      const data = await res.json();
      expect(data.error.statusCode).toBe(400);
      expect(data.error.message).toMatch(/^Invalid request: type: /);
    });

    test('rejects invalid service names', async () => {
      const res = await app.request('/api/services/Web/instances/main/status');
      expect(res.status).toBe(400);
    });

    test('answers 404 for instances missing from config', async () => {
      const res = await app.request('/api/services/web/instances/nope/status');
      expect(res.status).toBe(404);
      const data = await res.json();
      expect(data.error.message).toBe('web.nope not found in any instance type config');
    });
  });

  describe('Mesh Status Routes', () => {
    test('returns both flavors by default', async () => {
      settings.meshAdmin.payloads.set(envoyUrl('host-a'), envoyPayload('web.main', [{ address: '10.0.0.1', health: 'HEALTHY' }]));
      settings.meshAdmin.payloads.set(
        haproxyUrl('host-a'),
        haproxyPayload([{ pxname: 'web.main', svname: '10.0.0.1:8888_host-a', status: 'UP' }])
      );

      const res = await app.request('/api/services/web/instances/main/mesh');
      expect(res.status).toBe(200);
      const data = await res.json();
      expect(data.envoy.locations).toEqual([{ name: 'uswest1', expectedBackendsCount: 2, runningBackendsCount: 1 }]);
      expect(data.smartstack.registration).toBe('web.main');
    });

    test('answers 405 for instance types without mesh status', async () => {
      const res = await app.request('/api/services/web/instances/stream/mesh');
      expect(res.status).toBe(405);
      const data = await res.json();
      expect(data.error.message).toBe("Mesh status not supported for instance type 'flink'");
    });

    test('answers an empty status when no mesh type is requested', async () => {
      const res = await app.request('/api/services/web/instances/main/mesh?includeSmartstack=false&includeEnvoy=false');
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({});
    });

    test('answers 500 when the mesh cannot be reached', async () => {
      const res = await app.request('/api/services/web/instances/main/mesh?includeSmartstack=false');
      expect(res.status).toBe(500);
      const data = await res.json();
      expect(data.error.message).toBe(`connect ECONNREFUSED ${envoyUrl('host-a')}`);
    });
  });

  describe('Desired State Routes', () => {
    function postState(instance: string, body: unknown) {
      return app.request(`/api/services/web/instances/${instance}/state`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      });
    }

    test('sets the desired state of a custom-resource instance', async () => {
      const res = await postState('stream', { desiredState: 'stop' });
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ message: 'Desired state of web.stream set to stop', desiredState: 'stop' });
      expect(settings.kube.desiredStates.map((entry) => entry.id.name)).toEqual(['web-stream']);
    });

    test('rejects invalid states', async () => {
      const res = await postState('stream', { desiredState: 'restart' });
      expect(res.status).toBe(400);
    });

    test('answers 405 for instance types whose state cannot be set', async () => {
      const res = await postState('main', { desiredState: 'stop' });
      expect(res.status).toBe(405);
    });
  });

  test('unknown routes return a JSON 404', async () => {
    const res = await app.request('/api/nothing');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { message: 'Route not found: GET /api/nothing', statusCode: 404 } });
  });
});
