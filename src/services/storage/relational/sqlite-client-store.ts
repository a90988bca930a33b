import type BetterSqlite3 from 'better-sqlite3';

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
import { compactMetadata, mergeClientMetadata } from '../metadata.js';

interface ClientRow {
    client_id: string;
    first_seen: number | null;
    last_ping: number | null;
    last_clock: number | null;
    last_crash_timestamp: number | null;
    last_ip: string | null;
}

interface PayloadRow {
    payload: string;
}

type MetadataParams = [number | null, number | null, number | null, number | null, string | null, string];

const ALL_TIME: TimeRange = { start: Number.MIN_SAFE_INTEGER, end: Number.MAX_SAFE_INTEGER };

function rowToMetadata(row: ClientRow): ClientMetadata {
    return compactMetadata({
        firstSeen: row.first_seen,
        lastPing: row.last_ping,
        lastClock: row.last_clock,
        lastCrashTimestamp: row.last_crash_timestamp,
        lastIp: row.last_ip
    });
}

function parsePayload<T>(row: PayloadRow): T {
    return JSON.parse(row.payload) as T;
}

/**
 * Client records in SQLite: one row per client for metadata, JSON columns
 * for snapshots, stats and crashes keyed by (client_id, timestamp).
 */
export class SqliteClientStore implements ClientStore {
    private readonly registerStatement: BetterSqlite3.Statement<[string]>;
    private readonly findClientStatement: BetterSqlite3.Statement<[string], ClientRow>;
    private readonly updateMetadataStatement: BetterSqlite3.Statement<MetadataParams>;
    private readonly upsertSnapshotStatement: BetterSqlite3.Statement<[string, number, string]>;
    private readonly lastSnapshotStatement: BetterSqlite3.Statement<[string], PayloadRow>;
    private readonly snapshotHistoryStatement: BetterSqlite3.Statement<[string, number, number], PayloadRow>;
    private readonly labelsStatement: BetterSqlite3.Statement<[string], StoredLabel>;
    private readonly upsertStatsStatement: BetterSqlite3.Statement<[string, number, string]>;
    private readonly statsStatement: BetterSqlite3.Statement<[string, number, number], PayloadRow>;
    private readonly upsertCrashStatement: BetterSqlite3.Statement<[string, number, string]>;
    private readonly crashesStatement: BetterSqlite3.Statement<[string], PayloadRow>;

    constructor(private readonly db: BetterSqlite3.Database) {
        this.registerStatement = db.prepare<[string]>(
            'INSERT INTO clients (client_id) VALUES (?) ON CONFLICT(client_id) DO NOTHING'
        );

        this.findClientStatement = db.prepare<[string], ClientRow>(`
            SELECT client_id, first_seen, last_ping, last_clock, last_crash_timestamp, last_ip
            FROM clients
            WHERE client_id = ?
            LIMIT 1
        `);

        this.updateMetadataStatement = db.prepare<MetadataParams>(`
            UPDATE clients SET
                first_seen = ?,
                last_ping = ?,
                last_clock = ?,
                last_crash_timestamp = ?,
                last_ip = ?
            WHERE client_id = ?
        `);

        this.upsertSnapshotStatement = db.prepare<[string, number, string]>(`
            INSERT INTO client_snapshots (client_id, timestamp, snapshot_json)
            VALUES (?, ?, ?)
            ON CONFLICT(client_id, timestamp) DO UPDATE SET snapshot_json = excluded.snapshot_json
        `);

        this.lastSnapshotStatement = db.prepare<[string], PayloadRow>(`
            SELECT snapshot_json AS payload
            FROM client_snapshots
            WHERE client_id = ?
            ORDER BY timestamp DESC
            LIMIT 1
        `);

        this.snapshotHistoryStatement = db.prepare<[string, number, number], PayloadRow>(`
            SELECT snapshot_json AS payload
            FROM client_snapshots
            WHERE client_id = ? AND timestamp >= ? AND timestamp <= ?
            ORDER BY timestamp ASC
        `);

        this.labelsStatement = db.prepare<[string], StoredLabel>(`
            SELECT name, owner
            FROM client_labels
            WHERE client_id = ?
            ORDER BY name ASC, owner ASC
        `);

        this.upsertStatsStatement = db.prepare<[string, number, string]>(`
            INSERT INTO client_stats (client_id, timestamp, stats_json)
            VALUES (?, ?, ?)
            ON CONFLICT(client_id, timestamp) DO UPDATE SET stats_json = excluded.stats_json
        `);

        this.statsStatement = db.prepare<[string, number, number], PayloadRow>(`
            SELECT stats_json AS payload
            FROM client_stats
            WHERE client_id = ? AND timestamp >= ? AND timestamp <= ?
            ORDER BY timestamp ASC
        `);

        this.upsertCrashStatement = db.prepare<[string, number, string]>(`
            INSERT INTO client_crashes (client_id, timestamp, crash_json)
            VALUES (?, ?, ?)
            ON CONFLICT(client_id, timestamp) DO UPDATE SET crash_json = excluded.crash_json
        `);

        this.crashesStatement = db.prepare<[string], PayloadRow>(`
            SELECT crash_json AS payload
            FROM client_crashes
            WHERE client_id = ?
            ORDER BY timestamp DESC
        `);
    }

    async writeClientSnapshot(snapshot: ClientSnapshot): Promise<void> {
        const clientId = ClientId.parse(snapshot.clientId).toString();
        this.db.transaction(() => {
            this.registerStatement.run(clientId);
            this.upsertSnapshotStatement.run(clientId, snapshot.timestamp, JSON.stringify(snapshot));
        })();
    }

    async writeClientMetadata(clientId: ClientId, metadata: ClientMetadata): Promise<void> {
        const id = clientId.toString();
        this.db.transaction(() => {
            this.registerStatement.run(id);
            const row = this.findClientStatement.get(id);
            const merged = mergeClientMetadata(row ? rowToMetadata(row) : {}, metadata);
            this.updateMetadataStatement.run(
                merged.firstSeen ?? null,
                merged.lastPing ?? null,
                merged.lastClock ?? null,
                merged.lastCrashTimestamp ?? null,
                merged.lastIp ?? null,
                id
            );
        })();
    }

    async hasClient(clientId: ClientId): Promise<boolean> {
        return this.findClientStatement.get(clientId.toString()) !== undefined;
    }

    async readClientFullInfo(clientId: ClientId): Promise<ClientFullInfo | null> {
        const id = clientId.toString();
        const row = this.findClientStatement.get(id);
        if (!row) return null;

        const snapshotRow = this.lastSnapshotStatement.get(id);
        return {
            clientId: id,
            lastSnapshot: snapshotRow ? parsePayload<ClientSnapshot>(snapshotRow) : null,
            metadata: rowToMetadata(row),
            labels: this.labelsStatement.all(id).map(label => ({ name: label.name, owner: label.owner }))
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

    async readClientSnapshotHistory(clientId: ClientId, range: TimeRange = ALL_TIME): Promise<ClientSnapshot[]> {
        return this.snapshotHistoryStatement
            .all(clientId.toString(), range.start, range.end)
            .map(row => parsePayload<ClientSnapshot>(row));
    }

    async writeClientStats(clientId: ClientId, stats: StatSnapshot): Promise<void> {
        this.upsertStatsStatement.run(clientId.toString(), stats.timestamp, JSON.stringify(stats));
    }

    async readClientStats(clientId: ClientId, range: TimeRange): Promise<StatSnapshot[]> {
        return this.statsStatement
            .all(clientId.toString(), range.start, range.end)
            .map(row => parsePayload<StatSnapshot>(row));
    }

    async writeClientCrash(clientId: ClientId, crash: ClientCrash): Promise<void> {
        this.upsertCrashStatement.run(clientId.toString(), crash.timestamp, JSON.stringify(crash));
    }

    async readClientCrashes(clientId: ClientId): Promise<ClientCrash[]> {
        return this.crashesStatement.all(clientId.toString()).map(row => parsePayload<ClientCrash>(row));
    }
}
