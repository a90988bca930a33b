import { ClientId } from '../../src/services/clients/client-id.js';
import { ClientRegistrar } from '../../src/services/clients/client-registrar.js';
import { ClientRecordReader } from '../../src/services/clients/record-reader.js';
import { MemoryStore } from '../../src/services/memory-store.js';
import { createLegacyBackend } from '../../src/services/storage/legacy/index.js';
import type { StorageBackend } from '../../src/services/storage/types.js';
import { ClientNotFoundError, ValidationError } from '../../src/types/errors.js';
import { CLIENT_1, CLIENT_2, UNKNOWN_CLIENT, makeSnapshot } from '../utils/fixtures.js';

const MINUTE = 60 * 1000;
const NOW = 100 * MINUTE;
const id1 = ClientId.parse(CLIENT_1);
const unknown = ClientId.parse(UNKNOWN_CLIENT);

describe('ClientRecordReader', () => {
  let backend: StorageBackend;
  let registrar: ClientRegistrar;
  let reader: ClientRecordReader;

  beforeEach(async () => {
    backend = createLegacyBackend(new MemoryStore('reader-test:'));
    registrar = new ClientRegistrar([backend]);
    reader = new ClientRecordReader(backend, () => NOW);

    await registrar.writeSnapshot(makeSnapshot(CLIENT_1, NOW - 10 * MINUTE, { hostname: 'old-name', fqdn: undefined }));
    await registrar.writeSnapshot(makeSnapshot(CLIENT_1, NOW - 2 * MINUTE, {
      users: [
        { username: 'zed' },
        { username: 'alice', fullName: 'Alice Smith', homedir: '/home/alice' }
      ],
      bootTime: NOW - 60 * MINUTE
    }), { firstSeen: 1000, lastPing: NOW - MINUTE, lastClock: NOW - MINUTE });
    await backend.labels.addClientLabels(id1, 'alice', ['prod']);
  });

  describe('readClient', () => {
    test('builds the current record from snapshot, metadata and labels', async () => {
      const record = await reader.readClient(id1);

      expect(record).toEqual({
        clientId: CLIENT_1,
        age: NOW - 2 * MINUTE,
        agentInfo: { name: 'fleet-agent', version: '3.2.0' },
        osInfo: {
          system: 'Linux',
          release: 'Ubuntu',
          version: '22.04',
          kernel: '5.15.0',
          machine: 'x86_64',
          fqdn: 'web-01.example.com'
        },
        users: [
          { username: 'alice', fullName: 'Alice Smith', homedir: '/home/alice' },
          { username: 'zed' }
        ],
        interfaces: [{ name: 'eth0', macAddress: '00:11:22:33:44:55', addresses: ['10.0.0.5'] }],
        volumes: [{ name: '/', totalBytes: 1000, freeBytes: 250 }],
        lastBootedAt: NOW - 60 * MINUTE,
        firstSeenAt: 1000,
        lastSeenAt: NOW - MINUTE,
        lastClock: NOW - MINUTE,
        labels: [{ name: 'prod', owner: 'alice' }]
      });
    });

    test('reads the snapshot in effect at a timestamp', async () => {
      const record = await reader.readClient(id1, NOW - 5 * MINUTE);
      expect(record.age).toBe(NOW - 10 * MINUTE);
      expect(record.osInfo.fqdn).toBe('old-name');
      expect(record.labels).toEqual([{ name: 'prod', owner: 'alice' }]);
    });

    test('a timestamp before the first snapshot is not found', async () => {
      await expect(reader.readClient(id1, NOW - 20 * MINUTE)).rejects.toThrow(ClientNotFoundError);
    });

    test('unknown clients are not found', async () => {
      await expect(reader.readClient(unknown)).rejects.toThrow(`Client ${UNKNOWN_CLIENT} not found`);
    });

    test('metadata-only clients have empty snapshot fields', async () => {
      const id2 = ClientId.parse(CLIENT_2);
      await registrar.writeMetadata(id2, { firstSeen: 5 });
      expect(await reader.readClient(id2)).toEqual({
        clientId: CLIENT_2,
        osInfo: {},
        users: [],
        interfaces: [],
        volumes: [],
        firstSeenAt: 5,
        labels: []
      });
    });
  });

  test('readClients keeps the requested order and skips unknown ids', async () => {
    await registrar.writeSnapshot(makeSnapshot(CLIENT_2, NOW));
    const records = await reader.readClients([ClientId.parse(CLIENT_2), unknown, id1]);
    expect(records.map(record => record.clientId)).toEqual([CLIENT_2, CLIENT_1]);
  });

  describe('readClientVersions', () => {
    test('defaults to the last three minutes, most recent first', async () => {
      const versions = await reader.readClientVersions(id1);
      expect(versions.map(version => version.age)).toEqual([NOW - 2 * MINUTE]);
      expect(versions[0]?.labels).toEqual([]);
      expect(versions[0]?.firstSeenAt).toBeUndefined();
    });

    test('returns every snapshot in an explicit range', async () => {
      const versions = await reader.readClientVersions(id1, { start: 0, end: NOW });
      expect(versions.map(version => version.age)).toEqual([NOW - 2 * MINUTE, NOW - 10 * MINUTE]);
    });

    test('diff mode drops snapshots identical to their predecessor', async () => {
      await registrar.writeSnapshot(makeSnapshot(CLIENT_2, 100));
      await registrar.writeSnapshot(makeSnapshot(CLIENT_2, 200));
      await registrar.writeSnapshot(makeSnapshot(CLIENT_2, 300, { hostname: 'renamed' }));
      const id2 = ClientId.parse(CLIENT_2);

      const full = await reader.readClientVersions(id2, { start: 0, end: NOW });
      const diff = await reader.readClientVersions(id2, { start: 0, end: NOW, mode: 'diff' });
      expect(full.map(version => version.age)).toEqual([300, 200, 100]);
      expect(diff.map(version => version.age)).toEqual([300, 100]);
    });

    test('rejects a start after the end', async () => {
      await expect(reader.readClientVersions(id1, { start: 10, end: 5 })).rejects.toThrow(ValidationError);
    });

    test('unknown clients are not found', async () => {
      await expect(reader.readClientVersions(unknown)).rejects.toThrow(ClientNotFoundError);
    });
  });

  test('readClientVersionTimes lists every snapshot time, most recent first', async () => {
    expect(await reader.readClientVersionTimes(id1)).toEqual([NOW - 2 * MINUTE, NOW - 10 * MINUTE]);
    await expect(reader.readClientVersionTimes(unknown)).rejects.toThrow(ClientNotFoundError);
  });

  describe('listClientCrashes', () => {
    beforeEach(async () => {
      await registrar.writeCrash(id1, { timestamp: 10, crashType: 'CLIENT_CRASH', crashMessage: 'segfault in worker' });
      await registrar.writeCrash(id1, { timestamp: 20, crashType: 'NANNY_KILL', crashMessage: 'memory limit exceeded' });
      await registrar.writeCrash(id1, { timestamp: 30, crashType: 'CLIENT_CRASH', crashMessage: 'segfault in parser' });
    });

    test('lists crashes most recent first with the unfiltered total', async () => {
      const list = await reader.listClientCrashes(id1);
      expect(list.items.map(crash => crash.timestamp)).toEqual([30, 20, 10]);
      expect(list.totalCount).toBe(3);
    });

    test('filters on a case-sensitive substring and paginates after filtering', async () => {
      const list = await reader.listClientCrashes(id1, { filter: 'segfault', offset: 1, count: 1 });
      expect(list.items.map(crash => crash.timestamp)).toEqual([10]);
      expect(list.totalCount).toBe(3);
      expect((await reader.listClientCrashes(id1, { filter: 'SEGFAULT' })).items).toEqual([]);
    });

    test('records the last crash time on the client', async () => {
      expect((await reader.readClient(id1)).lastCrashAt).toBe(30);
    });
  });
});
