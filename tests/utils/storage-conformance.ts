/**
 * One behavioural suite for the StorageBackend contract, run against every backend.
 */

import { ClientId } from '../../src/services/clients/client-id.js';
import type { StorageBackend } from '../../src/services/storage/types.js';
import { ClientNotFoundError } from '../../src/types/errors.js';
import {
  type BackendFixture,
  CLIENT_1,
  CLIENT_2,
  CLIENT_3,
  UNKNOWN_CLIENT,
  makeSnapshot,
  makeStats
} from './fixtures.js';

const id = (raw: string) => ClientId.parse(raw);
const ids = (list: ClientId[]) => list.map(clientId => clientId.toString());

export function describeStorageConformance(fixture: BackendFixture): void {
  describe(`${fixture.name} storage backend`, () => {
    let backend: StorageBackend;

    beforeEach(() => {
      backend = fixture.create();
    });

    afterEach(async () => {
      await backend.close();
    });

    describe('client store', () => {
      test('writing a snapshot registers the client', async () => {
        expect(await backend.clients.hasClient(id(CLIENT_1))).toBe(false);
        await backend.clients.writeClientSnapshot(makeSnapshot(CLIENT_1, 1000));
        expect(await backend.clients.hasClient(id(CLIENT_1))).toBe(true);
      });

      test('full info of an unknown client is null', async () => {
        expect(await backend.clients.readClientFullInfo(id(UNKNOWN_CLIENT))).toBeNull();
      });

      test('full info carries the latest snapshot, metadata and sorted labels', async () => {
        await backend.clients.writeClientSnapshot(makeSnapshot(CLIENT_1, 2000, { hostname: 'newer' }));
        await backend.clients.writeClientSnapshot(makeSnapshot(CLIENT_1, 1000, { hostname: 'older' }));
        await backend.clients.writeClientMetadata(id(CLIENT_1), { firstSeen: 500, lastPing: 2500 });
        await backend.labels.addClientLabels(id(CLIENT_1), 'bob', ['prod']);
        await backend.labels.addClientLabels(id(CLIENT_1), 'alice', ['prod', 'db']);

        const info = await backend.clients.readClientFullInfo(id(CLIENT_1));

        expect(info).toEqual({
          clientId: CLIENT_1,
          lastSnapshot: makeSnapshot(CLIENT_1, 2000, { hostname: 'newer' }),
          metadata: { firstSeen: 500, lastPing: 2500 },
          labels: [
            { name: 'db', owner: 'alice' },
            { name: 'prod', owner: 'alice' },
            { name: 'prod', owner: 'bob' }
          ]
        });
      });

      test('metadata-only clients exist without a snapshot', async () => {
        await backend.clients.writeClientMetadata(id(CLIENT_2), { lastIp: '10.1.1.1' });
        expect(await backend.clients.readClientFullInfo(id(CLIENT_2))).toEqual({
          clientId: CLIENT_2,
          lastSnapshot: null,
          metadata: { lastIp: '10.1.1.1' },
          labels: []
        });
      });

      test('metadata writes merge field by field', async () => {
        await backend.clients.writeClientMetadata(id(CLIENT_1), { firstSeen: 1, lastPing: 2 });
        await backend.clients.writeClientMetadata(id(CLIENT_1), { lastPing: 5, lastIp: '10.0.0.5' });
        const info = await backend.clients.readClientFullInfo(id(CLIENT_1));
        expect(info?.metadata).toEqual({ firstSeen: 1, lastPing: 5, lastIp: '10.0.0.5' });
      });

      test('snapshot history is ascending and the range is inclusive', async () => {
        for (const ts of [3000, 1000, 2000]) {
          await backend.clients.writeClientSnapshot(makeSnapshot(CLIENT_1, ts));
        }
        const all = await backend.clients.readClientSnapshotHistory(id(CLIENT_1));
        expect(all.map(s => s.timestamp)).toEqual([1000, 2000, 3000]);

        const ranged = await backend.clients.readClientSnapshotHistory(id(CLIENT_1), { start: 1000, end: 2000 });
        expect(ranged.map(s => s.timestamp)).toEqual([1000, 2000]);
      });

      test('a snapshot written twice at one timestamp keeps the second', async () => {
        await backend.clients.writeClientSnapshot(makeSnapshot(CLIENT_1, 1000, { hostname: 'first' }));
        await backend.clients.writeClientSnapshot(makeSnapshot(CLIENT_1, 1000, { hostname: 'second' }));
        const history = await backend.clients.readClientSnapshotHistory(id(CLIENT_1));
        expect(history.map(s => s.hostname)).toEqual(['second']);
      });

      test('stats are returned ascending within an inclusive range', async () => {
        for (const ts of [300, 100, 200, 400]) {
          await backend.clients.writeClientStats(id(CLIENT_1), makeStats(ts, { memoryPercent: ts / 10 }));
        }
        const stats = await backend.clients.readClientStats(id(CLIENT_1), { start: 100, end: 300 });
        expect(stats.map(s => s.timestamp)).toEqual([100, 200, 300]);
        expect(stats[1]).toEqual(makeStats(200, { memoryPercent: 20 }));
      });

      test('crashes come back most recent first', async () => {
        await backend.clients.writeClientCrash(id(CLIENT_1), { timestamp: 10, crashType: 'OOM', crashMessage: 'killed' });
        await backend.clients.writeClientCrash(id(CLIENT_1), { timestamp: 30, crashType: 'SEGV', crashMessage: 'segfault' });
        await backend.clients.writeClientCrash(id(CLIENT_1), { timestamp: 20, crashType: 'OOM', crashMessage: 'again' });
        const crashes = await backend.clients.readClientCrashes(id(CLIENT_1));
        expect(crashes.map(c => c.timestamp)).toEqual([30, 20, 10]);
      });

      test('bulk full info skips unknown clients', async () => {
        await backend.clients.writeClientSnapshot(makeSnapshot(CLIENT_1, 1));
        await backend.clients.writeClientSnapshot(makeSnapshot(CLIENT_3, 1));
        const infos = await backend.clients.readClientFullInfos([id(CLIENT_1), id(UNKNOWN_CLIENT), id(CLIENT_3)]);
        expect([...infos.keys()].sort()).toEqual([CLIENT_1, CLIENT_3]);
      });
    });

    describe('label store', () => {
      beforeEach(async () => {
        await backend.clients.writeClientSnapshot(makeSnapshot(CLIENT_1, 1));
        await backend.clients.writeClientSnapshot(makeSnapshot(CLIENT_2, 1));
      });

      test('adding the same (name, owner) twice stores it once', async () => {
        await backend.labels.addClientLabels(id(CLIENT_1), 'alice', ['prod', 'prod']);
        await backend.labels.addClientLabels(id(CLIENT_1), 'alice', ['prod']);
        expect(await backend.labels.readClientLabels(id(CLIENT_1))).toEqual([{ name: 'prod', owner: 'alice' }]);
      });

      test('unknown clients are rejected on add and remove', async () => {
        await expect(backend.labels.addClientLabels(id(UNKNOWN_CLIENT), 'alice', ['prod']))
          .rejects.toBeInstanceOf(ClientNotFoundError);
        await expect(backend.labels.removeClientLabels(id(UNKNOWN_CLIENT), 'alice', ['prod']))
          .rejects.toBeInstanceOf(ClientNotFoundError);
      });

      test('remove drops only the given owner\'s pairs', async () => {
        await backend.labels.addClientLabels(id(CLIENT_1), 'alice', ['prod', 'db']);
        await backend.labels.addClientLabels(id(CLIENT_1), 'bob', ['prod']);
        await backend.labels.removeClientLabels(id(CLIENT_1), 'alice', ['prod', 'missing']);
        expect(await backend.labels.readClientLabels(id(CLIENT_1))).toEqual([
          { name: 'db', owner: 'alice' },
          { name: 'prod', owner: 'bob' }
        ]);
      });

      test('label names are distinct, sorted and vanish with their last use', async () => {
        await backend.labels.addClientLabels(id(CLIENT_1), 'alice', ['web', 'db']);
        await backend.labels.addClientLabels(id(CLIENT_2), 'bob', ['web']);
        expect(await backend.labels.listLabelNames()).toEqual(['db', 'web']);

        await backend.labels.removeClientLabels(id(CLIENT_1), 'alice', ['web', 'db']);
        expect(await backend.labels.listLabelNames()).toEqual(['web']);
      });
    });

    describe('client index', () => {
      beforeEach(async () => {
        await backend.index.addClient(id(CLIENT_2), ['host:web-02', 'linux']);
        await backend.index.addClient(id(CLIENT_1), ['host:web-01', 'linux']);
        await backend.index.addClient(id(CLIENT_3), ['host:db-01', 'windows']);
      });

      test('lookup intersects keywords and sorts by id', async () => {
        expect(ids(await backend.index.lookupClients(['linux']))).toEqual([CLIENT_1, CLIENT_2]);
        expect(ids(await backend.index.lookupClients(['linux', 'host:web-02']))).toEqual([CLIENT_2]);
        expect(ids(await backend.index.lookupClients(['linux', 'windows']))).toEqual([]);
      });

      test('lookup narrows across several keywords and stops at an unknown one', async () => {
        expect(ids(await backend.index.lookupClients(['.', 'linux', 'host:web-02']))).toEqual([CLIENT_2]);
        expect(ids(await backend.index.lookupClients(['linux', 'linux']))).toEqual([CLIENT_1, CLIENT_2]);
        expect(ids(await backend.index.lookupClients(['unknown', 'linux']))).toEqual([]);
      });

      test('an empty keyword list returns every indexed client', async () => {
        const everyone = ids(await backend.index.lookupClients([]));
        expect(everyone).toEqual([CLIENT_1, CLIENT_2, CLIENT_3]);
        expect(ids(await backend.index.lookupClients(['.']))).toEqual(everyone);
      });

      test('keywords are matched case-insensitively', async () => {
        expect(ids(await backend.index.lookupClients(['  LINUX ', 'Host:Web-01']))).toEqual([CLIENT_1]);
      });

      test('addClient replaces the previous keyword set', async () => {
        await backend.index.addClient(id(CLIENT_1), ['windows']);
        expect(await backend.index.readClientKeywords(id(CLIENT_1))).toEqual(['.', 'windows']);
        expect(ids(await backend.index.lookupClients(['linux']))).toEqual([CLIENT_2]);
      });

      test('removeClient drops every posting', async () => {
        await backend.index.removeClient(id(CLIENT_2));
        expect(ids(await backend.index.lookupClients([]))).toEqual([CLIENT_1, CLIENT_3]);
        expect(await backend.index.readClientKeywords(id(CLIENT_2))).toEqual([]);
      });

      test('label keywords are added and removed by name', async () => {
        await backend.index.addClientLabels(id(CLIENT_1), ['Prod', 'db']);
        expect(ids(await backend.index.lookupClients(['label:prod']))).toEqual([CLIENT_1]);

        await backend.index.removeClientLabels(id(CLIENT_1), ['prod']);
        expect(await backend.index.readClientKeywords(id(CLIENT_1))).toEqual(['.', 'host:web-01', 'label:db', 'linux']);
      });
    });
  });
}
