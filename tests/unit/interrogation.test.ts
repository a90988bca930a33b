import { ClientId } from '../../src/services/clients/client-id.js';
import { InterrogationService, KeyValueFlowRunner } from '../../src/services/clients/interrogation.js';
import { IDGenerator } from '../../src/services/id-generator.js';
import { MemoryStore } from '../../src/services/memory-store.js';
import { LegacyClientStore } from '../../src/services/storage/legacy/legacy-client-store.js';
import { ClientNotFoundError, OperationNotFoundError } from '../../src/types/errors.js';
import { CLIENT_1, UNKNOWN_CLIENT, makeSnapshot } from '../utils/fixtures.js';

const caller = { username: 'alice', isAdmin: false };
const id1 = ClientId.parse(CLIENT_1);

describe('IDGenerator', () => {
  test('operation ids are F: followed by 8 upper-case hex digits', () => {
    const id = IDGenerator.generateOperationId();
    expect(id).toMatch(/^F:[0-9A-F]{8}$/);
    expect(IDGenerator.isOperationId(id)).toBe(true);
  });

  test('rejects other shapes', () => {
    expect(IDGenerator.isOperationId('F:abcdef01')).toBe(false);
    expect(IDGenerator.isOperationId('F:1234567')).toBe(false);
    expect(IDGenerator.isOperationId('1234ABCD')).toBe(false);
  });
});

describe('InterrogationService', () => {
  let kv: MemoryStore;
  let runner: KeyValueFlowRunner;
  let service: InterrogationService;

  beforeEach(async () => {
    kv = new MemoryStore('flows-test:');
    const clients = new LegacyClientStore(kv);
    await clients.writeClientSnapshot(makeSnapshot(CLIENT_1, 1000));
    runner = new KeyValueFlowRunner(kv, () => 42);
    service = new InterrogationService(runner, clients);
  });

  test('starts a running interrogation flow', async () => {
    const operationId = await service.interrogate(caller, id1);

    expect(IDGenerator.isOperationId(operationId)).toBe(true);
    expect(await service.getInterrogationState(id1, operationId)).toBe('RUNNING');
    const stored = await kv.hget(`client:${CLIENT_1}:flows`, operationId);
    expect(stored === null ? null : JSON.parse(stored)).toEqual({
      flowName: 'Interrogate',
      creator: 'alice',
      state: 'RUNNING',
      startedAt: 42
    });
  });

  test('reports finished flows', async () => {
    const operationId = await service.interrogate(caller, id1);
    await runner.markFinished(id1, operationId);
    expect(await service.getInterrogationState(id1, operationId)).toBe('FINISHED');
  });

  test('unknown clients cannot be interrogated', async () => {
    await expect(service.interrogate(caller, ClientId.parse(UNKNOWN_CLIENT))).rejects.toThrow(ClientNotFoundError);
  });

  test('malformed and unknown operation ids are not found', async () => {
    await expect(service.getInterrogationState(id1, 'not-an-id')).rejects.toThrow(OperationNotFoundError);
    await expect(service.getInterrogationState(id1, 'F:00000000')).rejects.toThrow('Operation with id F:00000000 not found');
  });

  test('operations are scoped to their client', async () => {
    const operationId = await service.interrogate(caller, id1);
    await expect(service.getInterrogationState(ClientId.parse(UNKNOWN_CLIENT), operationId))
      .rejects.toThrow(OperationNotFoundError);
  });

  test('finishing an unknown operation fails', async () => {
    await expect(runner.markFinished(id1, 'F:00000000')).rejects.toThrow(OperationNotFoundError);
  });
});
