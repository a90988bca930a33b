import type { ClientCrash, ClientMetadata, ClientSnapshot } from '../../types/client.js';
import type { StatSnapshot } from '../../types/stats.js';
import { logger } from '../../utils/logger.js';
import type { StorageBackend } from '../storage/types.js';
import { ClientId } from './client-id.js';
import { extractClientKeywords } from './keywords.js';

/**
 * Write side of client records: stores what agents report in every given
 * backend and keeps each backend's keyword index in step with the snapshot.
 */
export class ClientRegistrar {
    constructor(private readonly backends: readonly StorageBackend[]) { }

    async writeSnapshot(snapshot: ClientSnapshot, metadata?: ClientMetadata): Promise<ClientId> {
        const clientId = ClientId.parse(snapshot.clientId);
        const normalized: ClientSnapshot = { ...snapshot, clientId: clientId.toString() };
        for (const backend of this.backends) {
            await backend.clients.writeClientSnapshot(normalized);
            if (metadata) {
                await backend.clients.writeClientMetadata(clientId, metadata);
            }
            const labels = await backend.labels.readClientLabels(clientId);
            await backend.index.addClient(clientId, extractClientKeywords(normalized, labels));
        }
        logger.debug(`[registrar] snapshot ${normalized.timestamp} written for ${clientId.toString()}`);
        return clientId;
    }

    async writeMetadata(clientId: ClientId, metadata: ClientMetadata): Promise<void> {
        for (const backend of this.backends) {
            await backend.clients.writeClientMetadata(clientId, metadata);
        }
    }

    async writeStats(clientId: ClientId, stats: StatSnapshot): Promise<void> {
        for (const backend of this.backends) {
            await backend.clients.writeClientStats(clientId, stats);
        }
    }

    async writeCrash(clientId: ClientId, crash: ClientCrash): Promise<void> {
        for (const backend of this.backends) {
            await backend.clients.writeClientCrash(clientId, crash);
            await backend.clients.writeClientMetadata(clientId, { lastCrashTimestamp: crash.timestamp });
        }
    }
}
