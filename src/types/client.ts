/**
 * Domain types for managed clients.
 * All timestamps are milliseconds since the Unix epoch.
 */

export interface OsInfo {
    system?: string;
    release?: string;
    version?: string;
    kernel?: string;
    machine?: string;
    installDate?: number;
}

export interface ClientUser {
    username: string;
    fullName?: string;
    homedir?: string;
}

export interface NetworkInterface {
    name: string;
    macAddress?: string;
    addresses: string[];
}

export interface Volume {
    name: string;
    totalBytes?: number;
    freeBytes?: number;
}

export interface AgentInfo {
    name: string;
    version: string;
    buildTime?: number;
}

export interface CloudInstance {
    type: 'GOOGLE' | 'AMAZON';
    instanceId: string;
}

/** One interrogation result as stored by a backend. */
export interface ClientSnapshot {
    clientId: string;
    timestamp: number;
    hostname?: string;
    fqdn?: string;
    os?: OsInfo;
    users: ClientUser[];
    interfaces: NetworkInterface[];
    volumes: Volume[];
    memorySize?: number;
    agentInfo?: AgentInfo;
    bootTime?: number;
    cloudInstance?: CloudInstance;
}

/** Bookkeeping the server maintains outside of snapshots. */
export interface ClientMetadata {
    firstSeen?: number;
    lastPing?: number;
    lastClock?: number;
    lastCrashTimestamp?: number;
    lastIp?: string;
}

export interface StoredLabel {
    name: string;
    owner: string;
}

export interface ClientFullInfo {
    clientId: string;
    lastSnapshot: ClientSnapshot | null;
    metadata: ClientMetadata;
    labels: StoredLabel[];
}

export interface ClientCrash {
    timestamp: number;
    crashType: string;
    crashMessage: string;
    backtrace?: string;
}

/**
 * Canonical client record returned to callers.
 * Optional fields are left undefined when the source does not carry them.
 */
export interface ClientRecord {
    clientId: string;
    /** Timestamp of the snapshot the record was built from. */
    age?: number;
    agentInfo?: AgentInfo;
    osInfo: OsInfo & { fqdn?: string };
    users: ClientUser[];
    interfaces: NetworkInterface[];
    volumes: Volume[];
    memorySize?: number;
    cloudInstance?: CloudInstance;
    firstSeenAt?: number;
    lastSeenAt?: number;
    lastBootedAt?: number;
    lastClock?: number;
    lastCrashAt?: number;
    labels: StoredLabel[];
}
