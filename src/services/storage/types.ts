/**
 * Storage contract shared by the legacy (key-value) and relational (SQLite)
 * backends. Both implementations must return identical data for identical
 * writes; tests/utils/storage-conformance.ts runs the same suite against each.
 */

import type { StorageBackendKind } from '../../config.js';
import type {
    ClientCrash,
    ClientFullInfo,
    ClientMetadata,
    ClientSnapshot,
    StoredLabel
} from '../../types/client.js';
import type { StatSnapshot } from '../../types/stats.js';
import type { ClientId } from '../clients/client-id.js';

export interface TimeRange {
    start: number;
    end: number;
}

export interface ClientStore {
    /** Stores a snapshot and registers the client if it is new. */
    writeClientSnapshot(snapshot: ClientSnapshot): Promise<void>;
    /** Merges the given fields into the client's metadata, registering the client if needed. */
    writeClientMetadata(clientId: ClientId, metadata: ClientMetadata): Promise<void>;
    hasClient(clientId: ClientId): Promise<boolean>;
    readClientFullInfo(clientId: ClientId): Promise<ClientFullInfo | null>;
    /** Entries only for clients that exist. */
    readClientFullInfos(clientIds: readonly ClientId[]): Promise<Map<string, ClientFullInfo>>;
    /** Ascending by timestamp; the range is inclusive on both ends. */
    readClientSnapshotHistory(clientId: ClientId, range?: TimeRange): Promise<ClientSnapshot[]>;
    writeClientStats(clientId: ClientId, stats: StatSnapshot): Promise<void>;
    /** Ascending by snapshot timestamp, inclusive range. */
    readClientStats(clientId: ClientId, range: TimeRange): Promise<StatSnapshot[]>;
    writeClientCrash(clientId: ClientId, crash: ClientCrash): Promise<void>;
    /** Most recent first. */
    readClientCrashes(clientId: ClientId): Promise<ClientCrash[]>;
}

export interface LabelStore {
    /** Sorted by name, then owner. */
    readClientLabels(clientId: ClientId): Promise<StoredLabel[]>;
    /** Throws ClientNotFoundError when the backend has no record of the client. */
    addClientLabels(clientId: ClientId, owner: string, names: readonly string[]): Promise<void>;
    /** Removes exactly the (owner, name) pairs given. Throws ClientNotFoundError for unknown clients. */
    removeClientLabels(clientId: ClientId, owner: string, names: readonly string[]): Promise<void>;
    /** Distinct label names across every client, sorted. */
    listLabelNames(): Promise<string[]>;
}

export interface ClientIndex {
    /**
     * Clients carrying every keyword (intersection), sorted by id.
     * An empty list resolves to the universal keyword, i.e. every indexed client.
     */
    lookupClients(keywords: readonly string[]): Promise<ClientId[]>;
    /** Replaces the client's keyword set. */
    addClient(clientId: ClientId, keywords: Iterable<string>): Promise<void>;
    removeClient(clientId: ClientId): Promise<void>;
    addClientLabels(clientId: ClientId, names: readonly string[]): Promise<void>;
    /** Drops `label:<name>` keywords; callers decide which names no longer apply. */
    removeClientLabels(clientId: ClientId, names: readonly string[]): Promise<void>;
    /** Sorted keyword set of one client. */
    readClientKeywords(clientId: ClientId): Promise<string[]>;
}

export interface StorageBackend {
    readonly kind: StorageBackendKind;
    readonly clients: ClientStore;
    readonly labels: LabelStore;
    readonly index: ClientIndex;
    close(): Promise<void>;
}
