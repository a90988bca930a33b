import type { IKeyValueStore } from '../../key-value-store.js';
import type { ClientStore, TimeRange } from '../types.js';
import type {
    ClientCrash,
    ClientFullInfo,
    ClientMetadata,
    ClientSnapshot,
    StoredLabel
} from '../../../types/client.js';
import type { StatSnapshot } from '../../../types/stats.js';
import { ClientId } from '../../clients/client-id.js';
import { compareLabels } from '../../clients/client-label.js';
import { mergeClientMetadata } from '../metadata.js';
import { legacyKeys, sortedByTimestamp } from './keys.js';

function inRange(timestamp: number, range?: TimeRange): boolean {
    return !range || (timestamp >= range.start && timestamp <= range.end);
}

/**
 * Client snapshots, metadata, stats and crashes kept as hashes in the
 * key-value store, one hash per client and record kind.
 */
export class LegacyClientStore implements ClientStore {
    constructor(private readonly kv: IKeyValueStore) { }

    private async register(clientId: string): Promise<void> {
        await this.kv.hset(legacyKeys.clients, clientId, '1');
    }

    async writeClientSnapshot(snapshot: ClientSnapshot): Promise<void> {
        const clientId = ClientId.parse(snapshot.clientId).toString();
        await this.register(clientId);
        await this.kv.hset(legacyKeys.snapshots(clientId), String(snapshot.timestamp), JSON.stringify(snapshot));
    }

    async writeClientMetadata(clientId: ClientId, metadata: ClientMetadata): Promise<void> {
        const id = clientId.toString();
        await this.register(id);
        const existing = await this.kv.getJson<ClientMetadata>(legacyKeys.metadata(id)) ?? {};
        const merged = mergeClientMetadata(existing, metadata);
        await this.kv.setJson(legacyKeys.metadata(id), merged);
    }

    async hasClient(clientId: ClientId): Promise<boolean> {
        return (await this.kv.hget(legacyKeys.clients, clientId.toString())) !== null;
    }

    async readClientFullInfo(clientId: ClientId): Promise<ClientFullInfo | null> {
        const id = clientId.toString();
        if (!(await this.hasClient(clientId))) return null;

        const snapshots = sortedByTimestamp<ClientSnapshot>(await this.kv.hgetall(legacyKeys.snapshots(id)));
        const metadata = await this.kv.getJson<ClientMetadata>(legacyKeys.metadata(id)) ?? {};
        const labels = Object.values(await this.kv.hgetall(legacyKeys.labels(id)))
            .map(value => JSON.parse(value) as StoredLabel)
            .sort(compareLabels);

        return {
            clientId: id,
            lastSnapshot: snapshots[snapshots.length - 1] ?? null,
            metadata,
            labels
        };
    }

    async readClientFullInfos(clientIds: readonly ClientId[]): Promise<Map<string, ClientFullInfo>> {
        const result = new Map<string, ClientFullInfo>();
        for (const clientId of clientIds) {
            const info = await this.readClientFullInfo(clientId);
            if (info) result.set(info.clientId, info);
        }
        return result;
    }

    async readClientSnapshotHistory(clientId: ClientId, range?: TimeRange): Promise<ClientSnapshot[]> {
        const snapshots = sortedByTimestamp<ClientSnapshot>(await this.kv.hgetall(legacyKeys.snapshots(clientId.toString())));
        return snapshots.filter(snapshot => inRange(snapshot.timestamp, range));
    }

    async writeClientStats(clientId: ClientId, stats: StatSnapshot): Promise<void> {
        await this.kv.hset(legacyKeys.stats(clientId.toString()), String(stats.timestamp), JSON.stringify(stats));
    }

    async readClientStats(clientId: ClientId, range: TimeRange): Promise<StatSnapshot[]> {
        const stats = sortedByTimestamp<StatSnapshot>(await this.kv.hgetall(legacyKeys.stats(clientId.toString())));
        return stats.filter(stat => inRange(stat.timestamp, range));
    }

    async writeClientCrash(clientId: ClientId, crash: ClientCrash): Promise<void> {
        await this.kv.hset(legacyKeys.crashes(clientId.toString()), String(crash.timestamp), JSON.stringify(crash));
    }

    async readClientCrashes(clientId: ClientId): Promise<ClientCrash[]> {
        return sortedByTimestamp<ClientCrash>(await this.kv.hgetall(legacyKeys.crashes(clientId.toString()))).reverse();
    }
}
