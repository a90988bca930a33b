import type { AuditEvent, AuditSink } from '../../src/services/audit/audit-sink.js';
import { ClientId } from '../../src/services/clients/client-id.js';
import { ClientRegistrar } from '../../src/services/clients/client-registrar.js';
import { ClientLabelService } from '../../src/services/clients/label-service.js';
import { MemoryStore } from '../../src/services/memory-store.js';
import { createLegacyBackend } from '../../src/services/storage/legacy/index.js';
import { createRelationalBackend, createSqliteDatabase } from '../../src/services/storage/relational/index.js';
import type { StorageBackend } from '../../src/services/storage/types.js';
import {
  ClientNotFoundError,
  ForbiddenError,
  InvalidIdentifierError,
  LabelMutationError,
  LegacyRecordMismatchError,
  ValidationError
} from '../../src/types/errors.js';
import type { Caller } from '../../src/utils/caller-context.js';
import { CLIENT_1, CLIENT_2, UNKNOWN_CLIENT, makeSnapshot } from '../utils/fixtures.js';

class RecordingAuditSink implements AuditSink {
  readonly batches: AuditEvent[][] = [];
  failWith: Error | null = null;

  async publish(events: readonly AuditEvent[]): Promise<void> {
    this.batches.push([...events]);
    if (this.failWith) throw this.failWith;
  }
}

const alice: Caller = { username: 'alice', isAdmin: false };
const bob: Caller = { username: 'bob', isAdmin: false };
const admin: Caller = { username: 'root', isAdmin: true };
const id1 = ClientId.parse(CLIENT_1);
const id2 = ClientId.parse(CLIENT_2);

describe('ClientLabelService', () => {
  let primary: StorageBackend;
  let audit: RecordingAuditSink;
  let service: ClientLabelService;

  beforeEach(async () => {
    primary = createLegacyBackend(new MemoryStore('labels-test:'));
    audit = new RecordingAuditSink();
    service = new ClientLabelService(primary, null, audit, 'GRR', () => 5000);
    const registrar = new ClientRegistrar([primary]);
    await registrar.writeSnapshot(makeSnapshot(CLIENT_1, 1000));
    await registrar.writeSnapshot(makeSnapshot(CLIENT_2, 1000));
  });

  describe('addClientsLabels', () => {
    test('labels every client under the caller and indexes the names', async () => {
      const result = await service.addClientsLabels(alice, [CLIENT_1, CLIENT_2], ['prod', 'db']);

      expect(result).toEqual({ clientIds: [CLIENT_1, CLIENT_2], labels: ['prod', 'db'], mirror: [] });
      expect(await primary.labels.readClientLabels(id1)).toEqual([
        { name: 'db', owner: 'alice' },
        { name: 'prod', owner: 'alice' }
      ]);
      expect((await primary.index.lookupClients(['label:prod'])).map(String)).toEqual([CLIENT_1, CLIENT_2]);
    });

    test('trims and de-duplicates label names', async () => {
      const result = await service.addClientsLabels(alice, [CLIENT_1], [' prod ', 'prod']);
      expect(result.labels).toEqual(['prod']);
    });

    test('publishes one audit batch with an event per client', async () => {
      await service.addClientsLabels(alice, [CLIENT_1, CLIENT_2], ['prod', 'db']);

      expect(audit.batches).toHaveLength(1);
      expect(audit.batches[0]).toEqual([
        {
          user: 'alice',
          action: 'CLIENT_ADD_LABEL',
          flowName: 'handler.AddClientsLabels',
          client: CLIENT_1,
          description: 'alice.prod,alice.db',
          timestamp: 5000
        },
        {
          user: 'alice',
          action: 'CLIENT_ADD_LABEL',
          flowName: 'handler.AddClientsLabels',
          client: CLIENT_2,
          description: 'alice.prod,alice.db',
          timestamp: 5000
        }
      ]);
    });

    test('rejects invalid input before writing anything', async () => {
      await expect(service.addClientsLabels(alice, [], ['prod'])).rejects.toThrow(ValidationError);
      await expect(service.addClientsLabels(alice, [CLIENT_1], [])).rejects.toThrow(ValidationError);
      await expect(service.addClientsLabels(alice, [CLIENT_1], ['prod', ' '])).rejects.toThrow(ValidationError);
      await expect(service.addClientsLabels(alice, [CLIENT_1, 'bogus'], ['prod'])).rejects.toThrow(InvalidIdentifierError);
      await expect(service.addClientsLabels(alice, [CLIENT_1, UNKNOWN_CLIENT], ['prod'])).rejects.toThrow(ClientNotFoundError);

      expect(await primary.labels.readClientLabels(id1)).toEqual([]);
      expect(audit.batches).toEqual([]);
    });

    test('the system owner cannot change labels', async () => {
      const system: Caller = { username: 'GRR', isAdmin: true };
      await expect(service.addClientsLabels(system, [CLIENT_1], ['prod'])).rejects.toThrow(ForbiddenError);
    });

    test('publishes events for the clients written before a failure', async () => {
      jest.spyOn(primary.labels, 'addClientLabels')
        .mockResolvedValueOnce(undefined)
        .mockRejectedValueOnce(new Error('write failed'));

      await expect(service.addClientsLabels(alice, [CLIENT_1, CLIENT_2], ['prod']))
        .rejects.toThrow(`Label mutation failed for client ${CLIENT_2}: write failed`);
      expect(audit.batches).toHaveLength(1);
      expect(audit.batches[0]?.map(event => event.client)).toEqual([CLIENT_1]);
    });

    test('an audit failure fails an otherwise successful batch', async () => {
      audit.failWith = new Error('audit down');
      await expect(service.addClientsLabels(alice, [CLIENT_1], ['prod'])).rejects.toThrow('audit down');
    });

    test('the batch error wins over an audit failure', async () => {
      audit.failWith = new Error('audit down');
      jest.spyOn(primary.labels, 'addClientLabels').mockRejectedValueOnce(new Error('write failed'));

      await expect(service.addClientsLabels(alice, [CLIENT_1], ['prod'])).rejects.toThrow(LabelMutationError);
      expect(audit.batches).toEqual([[]]);
    });
  });

  describe('removeClientsLabels', () => {
    test('add then remove restores the labels and index', async () => {
      const before = await primary.index.readClientKeywords(id1);
      await service.addClientsLabels(alice, [CLIENT_1], ['prod']);
      await service.removeClientsLabels(alice, [CLIENT_1], ['prod']);

      expect(await primary.labels.readClientLabels(id1)).toEqual([]);
      expect(await primary.index.readClientKeywords(id1)).toEqual(before);
      expect(audit.batches.map(batch => batch[0]?.action)).toEqual(['CLIENT_ADD_LABEL', 'CLIENT_REMOVE_LABEL']);
      expect(audit.batches[1]?.[0]?.flowName).toBe('handler.RemoveClientsLabels');
    });

    test('keeps system labels and their index entry', async () => {
      await primary.labels.addClientLabels(id1, 'GRR', ['prod']);
      await service.addClientsLabels(alice, [CLIENT_1], ['prod']);
      await service.removeClientsLabels(admin, [CLIENT_1], ['prod']);

      expect(await primary.labels.readClientLabels(id1)).toEqual([{ name: 'prod', owner: 'GRR' }]);
      expect(await primary.index.readClientKeywords(id1)).toContain('label:prod');
    });

    test('a regular user removes only their own labels', async () => {
      await service.addClientsLabels(alice, [CLIENT_1], ['prod']);
      await service.addClientsLabels(bob, [CLIENT_1], ['prod']);
      await service.removeClientsLabels(alice, [CLIENT_1], ['prod']);

      expect(await primary.labels.readClientLabels(id1)).toEqual([{ name: 'prod', owner: 'bob' }]);
      expect(await primary.index.readClientKeywords(id1)).toContain('label:prod');
    });

    test('keeps the index entry while a label differing only in case remains', async () => {
      await service.addClientsLabels(alice, [CLIENT_1], ['Prod']);
      await service.addClientsLabels(bob, [CLIENT_1], ['prod']);
      await service.removeClientsLabels(alice, [CLIENT_1], ['Prod']);

      expect(await primary.labels.readClientLabels(id1)).toEqual([{ name: 'prod', owner: 'bob' }]);
      expect((await primary.index.lookupClients(['label:prod'])).map(String)).toEqual([CLIENT_1]);
    });

    test('an admin removes labels of every non-system owner', async () => {
      await service.addClientsLabels(alice, [CLIENT_1], ['prod']);
      await service.addClientsLabels(bob, [CLIENT_1], ['prod']);
      await service.removeClientsLabels(admin, [CLIENT_1], ['prod']);

      expect(await primary.labels.readClientLabels(id1)).toEqual([]);
      expect(await primary.index.readClientKeywords(id1)).not.toContain('label:prod');
    });

    test('removing a label the client does not carry is a no-op', async () => {
      const result = await service.removeClientsLabels(alice, [CLIENT_2], ['missing']);
      expect(result.clientIds).toEqual([CLIENT_2]);
      expect(await primary.labels.readClientLabels(id2)).toEqual([]);
    });
  });

  test('listLabelNames reads the primary backend', async () => {
    await service.addClientsLabels(alice, [CLIENT_1], ['web']);
    await service.addClientsLabels(bob, [CLIENT_2], ['db']);
    expect(await service.listLabelNames()).toEqual(['db', 'web']);
  });

  describe('with a mirror backend', () => {
    let mirror: StorageBackend;

    beforeEach(() => {
      mirror = createRelationalBackend(createSqliteDatabase(':memory:'));
      service = new ClientLabelService(primary, mirror, audit, 'GRR', () => 5000);
    });

    afterEach(async () => {
      await mirror.close();
    });

    test('replays the write when the mirror has the client', async () => {
      await new ClientRegistrar([mirror]).writeSnapshot(makeSnapshot(CLIENT_1, 1000));

      const result = await service.addClientsLabels(alice, [CLIENT_1], ['prod']);

      expect(result.mirror).toEqual([{ status: 'migrated', clientId: CLIENT_1 }]);
      expect(await mirror.labels.readClientLabels(id1)).toEqual([{ name: 'prod', owner: 'alice' }]);
      expect(await mirror.index.readClientKeywords(id1)).toContain('label:prod');
    });

    test('reports clients the mirror does not know yet without failing', async () => {
      const result = await service.addClientsLabels(alice, [CLIENT_1], ['prod']);

      expect(result.mirror).toHaveLength(1);
      const [entry] = result.mirror;
      expect(entry?.status).toBe('not_yet_migrated');
      expect(entry?.status === 'not_yet_migrated' && entry.error).toBeInstanceOf(LegacyRecordMismatchError);
      expect(await primary.labels.readClientLabels(id1)).toEqual([{ name: 'prod', owner: 'alice' }]);
    });

    test('other mirror errors fail the batch after the primary write', async () => {
      await new ClientRegistrar([mirror]).writeSnapshot(makeSnapshot(CLIENT_1, 1000));
      jest.spyOn(mirror.labels, 'addClientLabels').mockRejectedValueOnce(new Error('disk full'));

      await expect(service.addClientsLabels(alice, [CLIENT_1], ['prod']))
        .rejects.toThrow(`Label mutation failed for client ${CLIENT_1}: disk full`);
      expect(await primary.labels.readClientLabels(id1)).toEqual([{ name: 'prod', owner: 'alice' }]);
      expect(audit.batches[0]?.map(event => event.client)).toEqual([CLIENT_1]);
    });
  });
});
