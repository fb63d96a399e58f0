import { describe, test, expect, beforeEach } from 'vitest';
import { buildLocation, buildMeshStatus, matchBackendsAndPods, meshAddresses } from './meshStatus';
import {
  envoyPayload,
  envoyUrl,
  haproxyPayload,
  haproxyUrl,
  makeJob,
  makePod,
  makeSettings,
  type FakeSettings,
} from '../testing/fakes';
import { smartstackProvider } from '../providers/smartstack';
import type { MeshBackendRecord } from './types';

function backend(address: string, health: MeshBackendRecord['health']): MeshBackendRecord {
  return { hostname: `host-${address}`, address, port: 8888, health, status: health };
}

describe('matchBackendsAndPods', () => {
  test('flags backends whose address belongs to a pod', () => {
    const matched = matchBackendsAndPods(
      [backend('10.0.0.1', 'UP'), backend('10.0.0.2', 'UP')],
      [makePod({ ip: '10.0.0.1' }), makePod({ ip: undefined })]
    );
    expect(matched.map((entry) => entry.hasAssociatedTask)).toEqual([true, false]);
  });
});

describe('buildLocation', () => {
  const backends = matchBackendsAndPods([backend('10.0.0.1', 'UP'), backend('10.0.0.2', 'DOWN')], []);

  test('counts UP backends as running', () => {
    expect(buildLocation('uswest1', backends, 3, false)).toEqual({
      name: 'uswest1',
      expectedBackendsCount: 3,
      runningBackendsCount: 1,
    });
  });

  test('includes backends only when asked', () => {
    expect(buildLocation('uswest1', backends, 3, true).backends).toHaveLength(2);
  });

  test('counts the same running backends whatever their order', () => {
    const statuses = ['UP', 'MAINT', 'UP 1/2', 'DOWN', 'UP', 'DOWN 1/2', 'MAINT'];
    const rows = statuses.map((status, index) => ({
      pxname: 'web.main',
      svname: `10.0.0.${index + 1}:8888_host-${index}`,
      status,
    }));
    const parsed = smartstackProvider.parseBackends(haproxyPayload(rows), 'web.main');
    const orders = [parsed, [...parsed].reverse(), [...parsed].sort((a, b) => smartstackProvider.compareBackends(a, b))];

    for (const order of orders) {
      expect(buildLocation('uswest1', matchBackendsAndPods(order, []), 7, false).runningBackendsCount).toBe(3);
    }
  });
});

describe('buildMeshStatus', () => {
  let settings: FakeSettings;
  const job = makeJob({ instances: 4 });
  const namespaceConfig = { proxyPort: 20000, discover: 'region' };

  beforeEach(() => {
    settings = makeSettings();
    settings.configLoader.addJob('kubernetes', job);
    settings.topology.locations = new Map([
      ['uswest1', ['host-a', 'host-c']],
      ['uswest2', ['host-b']],
    ]);
  });

  test('reports every location from its first host, split evenly', async () => {
    settings.meshAdmin.payloads.set(
      envoyUrl('host-a'),
      envoyPayload('web.main', [
        { address: '10.0.0.1', health: 'HEALTHY' },
        { address: '10.0.0.9', health: 'UNHEALTHY' },
      ])
    );
    settings.meshAdmin.payloads.set(envoyUrl('host-b'), envoyPayload('web.main', [{ address: '10.0.0.2', health: 'HEALTHY' }]));

    const status = await buildMeshStatus(
      {
        service: 'web',
        flavor: 'envoy',
        job,
        namespaceConfig,
        pods: [makePod({ ip: '10.0.0.1' })],
        includeBackends: true,
      },
      settings
    );

    expect(settings.meshAdmin.requested).toEqual([envoyUrl('host-a'), envoyUrl('host-b')]);
    expect(status.registration).toBe('web.main');
    expect(status.expectedBackendsPerLocation).toBe(2);
    expect(status.locations.map((location) => [location.name, location.runningBackendsCount])).toEqual([
      ['uswest1', 1],
      ['uswest2', 1],
    ]);
    expect(status.locations[0].backends?.map((entry) => [entry.address, entry.hasAssociatedTask])).toEqual([
      ['10.0.0.1', true],
      ['10.0.0.9', false],
    ]);
  });

  test('reads smartstack backends from the haproxy stats page', async () => {
    settings.topology.locations = new Map([['uswest1', ['host-a']]]);
    settings.meshAdmin.payloads.set(
      haproxyUrl('host-a'),
      haproxyPayload([
        { pxname: 'web.main', svname: '10.0.0.1:8888_host-a', status: 'UP' },
        { pxname: 'web.main', svname: '10.0.0.2:8888_host-b', status: 'DOWN' },
      ])
    );

    const status = await buildMeshStatus(
      { service: 'web', flavor: 'smartstack', job, namespaceConfig, pods: [], includeBackends: false },
      settings
    );

    expect(status.expectedBackendsPerLocation).toBe(4);
    expect(status.locations).toEqual([{ name: 'uswest1', expectedBackendsCount: 4, runningBackendsCount: 1 }]);
  });

  test('fails when the pool has no locations', async () => {
    settings.topology.locations = new Map();
    await expect(
      buildMeshStatus({ service: 'web', flavor: 'envoy', job, namespaceConfig, pods: [], includeBackends: false }, settings)
    ).rejects.toThrow("No locations found for pool 'default' at discover level 'region'");
  });

  test('fails the flavor when any location is unreachable', async () => {
    settings.meshAdmin.payloads.set(envoyUrl('host-a'), envoyPayload('web.main', []));
    await expect(
      buildMeshStatus({ service: 'web', flavor: 'envoy', job, namespaceConfig, pods: [], includeBackends: false }, settings)
    ).rejects.toThrow('ECONNREFUSED');
  });
});

describe('meshAddresses', () => {
  test('collects backend addresses across locations', () => {
    const addresses = meshAddresses({
      registration: 'web.main',
      expectedBackendsPerLocation: 1,
      locations: [
        buildLocation('a', matchBackendsAndPods([backend('10.0.0.1', 'UP')], []), 1, true),
        buildLocation('b', matchBackendsAndPods([backend('10.0.0.2', 'DOWN')], []), 1, true),
        buildLocation('c', [], 1, false),
      ],
    });
    expect([...addresses].sort()).toEqual(['10.0.0.1', '10.0.0.2']);
  });
});
