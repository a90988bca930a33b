#!/usr/bin/env node
/**
 * Seeds the configured storage backends with client snapshots, stats and
 * crashes read from a JSON file.
 *
 * Usage:
 *   npm run seed -- [path/to/clients.json] [--dry-run]
 *
 * Defaults to scripts/fixtures/sample-clients.json. Writes go to
 * STORAGE_BACKEND and, when set, MIRROR_STORAGE_BACKEND.
 */

import 'dotenv/config';

import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { ClientId } from '../src/services/clients/client-id.js';
import { ClientRegistrar } from '../src/services/clients/client-registrar.js';
import { createKeyValueStore } from '../src/services/key-value-store-factory.js';
import { createStorageBackends } from '../src/services/storage/backend-factory.js';
import { structuredLogger as logger } from '../src/utils/structured-logger.js';

const DRY_RUN = process.argv.includes('--dry-run');
const FILE = process.argv.slice(2).find(arg => !arg.startsWith('--'))
    ?? path.resolve(process.cwd(), 'scripts/fixtures/sample-clients.json');

const cpuSampleSchema = z.object({
    timestamp: z.number().int(),
    cpuPercent: z.number(),
    userCpuTime: z.number(),
    systemCpuTime: z.number()
});

const ioSampleSchema = z.object({
    timestamp: z.number().int(),
    readBytes: z.number(),
    writeBytes: z.number(),
    readCount: z.number(),
    writeCount: z.number()
});

const statsSchema = z.object({
    timestamp: z.number().int(),
    cpuSamples: z.array(cpuSampleSchema).default([]),
    ioSamples: z.array(ioSampleSchema).default([]),
    bytesReceived: z.number().default(0),
    bytesSent: z.number().default(0),
    memoryPercent: z.number().default(0),
    rssSize: z.number().default(0),
    vmsSize: z.number().default(0)
});

const snapshotSchema = z.object({
    timestamp: z.number().int(),
    hostname: z.string().optional(),
    fqdn: z.string().optional(),
    os: z.object({
        system: z.string().optional(),
        release: z.string().optional(),
        version: z.string().optional(),
        kernel: z.string().optional(),
        machine: z.string().optional(),
        installDate: z.number().int().optional()
    }).optional(),
    users: z.array(z.object({
        username: z.string(),
        fullName: z.string().optional(),
        homedir: z.string().optional()
    })).default([]),
    interfaces: z.array(z.object({
        name: z.string(),
        macAddress: z.string().optional(),
        addresses: z.array(z.string()).default([])
    })).default([]),
    volumes: z.array(z.object({
        name: z.string(),
        totalBytes: z.number().optional(),
        freeBytes: z.number().optional()
    })).default([]),
    memorySize: z.number().optional(),
    agentInfo: z.object({
        name: z.string(),
        version: z.string(),
        buildTime: z.number().int().optional()
    }).optional(),
    bootTime: z.number().int().optional()
});

const seedFileSchema = z.array(z.object({
    clientId: z.string(),
    firstSeen: z.number().int().optional(),
    lastPing: z.number().int().optional(),
    lastIp: z.string().optional(),
    snapshots: z.array(snapshotSchema).min(1),
    stats: z.array(statsSchema).default([]),
    crashes: z.array(z.object({
        timestamp: z.number().int(),
        crashType: z.string(),
        crashMessage: z.string(),
        backtrace: z.string().optional()
    })).default([])
}));

async function seedClients(): Promise<void> {
    logger.info(`Seeding clients from ${FILE}`);
    logger.info(`Dry run: ${DRY_RUN}`);

    const clients = seedFileSchema.parse(JSON.parse(readFileSync(FILE, 'utf-8')));
    // fail on a bad id before anything is written
    clients.forEach(client => ClientId.parse(client.clientId));

    if (DRY_RUN) {
        logger.success('Seed file is valid', `${clients.length} client(s)`);
        return;
    }

    const kv = createKeyValueStore();
    await kv.connect();
    const storage = createStorageBackends(kv);
    const registrar = new ClientRegistrar(storage.mirror ? [storage.primary, storage.mirror] : [storage.primary]);

    try {
        for (const client of clients) {
            const clientId = ClientId.parse(client.clientId);
            for (const snapshot of client.snapshots) {
                await registrar.writeSnapshot({ ...snapshot, clientId: client.clientId });
            }
            await registrar.writeMetadata(clientId, {
                firstSeen: client.firstSeen,
                lastPing: client.lastPing,
                lastIp: client.lastIp
            });
            for (const stats of client.stats) {
                await registrar.writeStats(clientId, stats);
            }
            for (const crash of client.crashes) {
                await registrar.writeCrash(clientId, crash);
            }
            logger.info(`Seeded ${clientId.toString()} (${client.snapshots.length} snapshot(s), ${client.stats.length} stats, ${client.crashes.length} crash(es))`);
        }
        logger.success('Seeding complete', `${clients.length} client(s) into ${storage.primary.kind}${storage.mirror ? ` and ${storage.mirror.kind}` : ''}`);
    } finally {
        await storage.primary.close();
        await storage.mirror?.close();
        await kv.disconnect();
    }
}

seedClients().catch((error: unknown) => {
    logger.error('Seeding failed', error);
    process.exit(1);
});
