import { CLIENT_VERSIONS_LOOKBACK_MS } from '../../config.js';
import type { ClientCrash, ClientRecord, ClientSnapshot } from '../../types/client.js';
import { ClientNotFoundError, ValidationError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import type { StorageBackend } from '../storage/types.js';
import type { ClientId } from './client-id.js';
import { toClientRecord } from './record-mapper.js';

export type VersionMode = 'full' | 'diff';

export interface ClientVersionsOptions {
    start?: number;
    end?: number;
    /** `diff` keeps only snapshots that changed since the previous one. */
    mode?: VersionMode;
}

export interface CrashListOptions {
    offset?: number;
    count?: number;
    filter?: string;
}

export interface CrashList {
    items: ClientCrash[];
    /** Crashes on record before filtering. */
    totalCount: number;
}

function sameContent(a: ClientSnapshot, b: ClientSnapshot): boolean {
    return JSON.stringify({ ...a, timestamp: 0 }) === JSON.stringify({ ...b, timestamp: 0 });
}

/**
 * Builds canonical client records from the configured primary backend.
 */
export class ClientRecordReader {
    constructor(
        private readonly backend: StorageBackend,
        private readonly now: () => number = Date.now
    ) { }

    private async requireClient(clientId: ClientId): Promise<void> {
        if (!(await this.backend.clients.hasClient(clientId))) {
            throw new ClientNotFoundError(clientId.toString());
        }
    }

    /** Record as of `timestamp` (latest snapshot at or before it), or the current one. */
    async readClient(clientId: ClientId, timestamp?: number): Promise<ClientRecord> {
        const info = await this.backend.clients.readClientFullInfo(clientId);
        if (!info) {
            throw new ClientNotFoundError(clientId.toString());
        }
        logger.op('reader', 'read', `client=${info.clientId} timestamp=${timestamp ?? 'latest'}`);

        if (timestamp === undefined) {
            return toClientRecord(info.clientId, info.lastSnapshot, info.metadata, info.labels);
        }

        const history = await this.backend.clients.readClientSnapshotHistory(clientId, {
            start: Number.MIN_SAFE_INTEGER,
            end: timestamp
        });
        const snapshot = history[history.length - 1];
        if (!snapshot) {
            throw new ClientNotFoundError(clientId.toString());
        }
        return toClientRecord(info.clientId, snapshot, info.metadata, info.labels);
    }

    /** Records for the ids that exist, in the order given. */
    async readClients(clientIds: readonly ClientId[]): Promise<ClientRecord[]> {
        const infos = await this.backend.clients.readClientFullInfos(clientIds);
        const records: ClientRecord[] = [];
        for (const clientId of clientIds) {
            const info = infos.get(clientId.toString());
            if (!info) continue;
            records.push(toClientRecord(info.clientId, info.lastSnapshot, info.metadata, info.labels));
        }
        return records;
    }

    /** Snapshots within the range, most recent first, without metadata or labels. */
    async readClientVersions(clientId: ClientId, options: ClientVersionsOptions = {}): Promise<ClientRecord[]> {
        const end = options.end ?? this.now();
        const start = options.start ?? end - CLIENT_VERSIONS_LOOKBACK_MS;
        if (start > end) {
            throw new ValidationError('start must not be after end', { start, end });
        }
        await this.requireClient(clientId);

        let history = await this.backend.clients.readClientSnapshotHistory(clientId, { start, end });
        if (options.mode === 'diff') {
            history = history.filter((snapshot, i) => {
                const previous = history[i - 1];
                return previous === undefined || !sameContent(previous, snapshot);
            });
        }
        return history
            .reverse()
            .map(snapshot => toClientRecord(clientId.toString(), snapshot, null, []));
    }

    /** Every snapshot timestamp, most recent first. */
    async readClientVersionTimes(clientId: ClientId): Promise<number[]> {
        await this.requireClient(clientId);
        const history = await this.backend.clients.readClientSnapshotHistory(clientId);
        return history.map(snapshot => snapshot.timestamp).reverse();
    }

    async listClientCrashes(clientId: ClientId, options: CrashListOptions = {}): Promise<CrashList> {
        await this.requireClient(clientId);
        const crashes = await this.backend.clients.readClientCrashes(clientId);
        const { filter } = options;
        const matching = filter ? crashes.filter(crash => JSON.stringify(crash).includes(filter)) : crashes;
        const offset = options.offset ?? 0;
        const end = options.count ? offset + options.count : undefined;
        return { items: matching.slice(offset, end), totalCount: crashes.length };
    }
}
