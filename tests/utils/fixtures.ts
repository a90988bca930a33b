/**
 * Client, stats and backend fixtures shared by unit and integration tests.
 */

import { MemoryStore } from '../../src/services/memory-store.js';
import { createLegacyBackend } from '../../src/services/storage/legacy/index.js';
import { createRelationalBackend, createSqliteDatabase } from '../../src/services/storage/relational/index.js';
import type { StorageBackend } from '../../src/services/storage/types.js';
import type { ClientSnapshot } from '../../src/types/client.js';
import type { StatSnapshot } from '../../src/types/stats.js';

export const CLIENT_1 = 'C.1000000000000001';
export const CLIENT_2 = 'C.1000000000000002';
export const CLIENT_3 = 'C.1000000000000003';
export const CLIENT_4 = 'C.1000000000000004';
export const CLIENT_5 = 'C.1000000000000005';
export const UNKNOWN_CLIENT = 'C.ffffffffffffffff';

export function makeSnapshot(clientId: string, timestamp: number, overrides: Partial<ClientSnapshot> = {}): ClientSnapshot {
  return {
    clientId,
    timestamp,
    hostname: 'web-01',
    fqdn: 'web-01.example.com',
    os: { system: 'Linux', release: 'Ubuntu', version: '22.04', kernel: '5.15.0', machine: 'x86_64' },
    users: [{ username: 'alice', fullName: 'Alice Smith', homedir: '/home/alice' }],
    interfaces: [{ name: 'eth0', macAddress: '00:11:22:33:44:55', addresses: ['10.0.0.5'] }],
    volumes: [{ name: '/', totalBytes: 1000, freeBytes: 250 }],
    agentInfo: { name: 'fleet-agent', version: '3.2.0' },
    ...overrides
  };
}

export function makeStats(timestamp: number, overrides: Partial<StatSnapshot> = {}): StatSnapshot {
  return {
    timestamp,
    cpuSamples: [],
    ioSamples: [],
    bytesReceived: 0,
    bytesSent: 0,
    memoryPercent: 0,
    rssSize: 0,
    vmsSize: 0,
    ...overrides
  };
}

export interface BackendFixture {
  name: 'legacy' | 'relational';
  create: () => StorageBackend;
}

export const BACKEND_FIXTURES: BackendFixture[] = [
  { name: 'legacy', create: () => createLegacyBackend(new MemoryStore('test:')) },
  { name: 'relational', create: () => createRelationalBackend(createSqliteDatabase(':memory:')) }
];
