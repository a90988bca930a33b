import type {
    ClientMetadata,
    ClientRecord,
    ClientSnapshot,
    ClientUser,
    StoredLabel
} from '../../types/client.js';

function byUsername(a: ClientUser, b: ClientUser): number {
    if (a.username === b.username) return 0;
    return a.username < b.username ? -1 : 1;
}

/**
 * The one place a stored snapshot turns into a ClientRecord, whichever
 * backend it came from. Fields the inputs do not carry stay undefined.
 */
export function toClientRecord(
    clientId: string,
    snapshot: ClientSnapshot | null,
    metadata: ClientMetadata | null,
    labels: readonly StoredLabel[]
): ClientRecord {
    const record: ClientRecord = {
        clientId,
        osInfo: {},
        users: [],
        interfaces: [],
        volumes: [],
        labels: labels.map(label => ({ name: label.name, owner: label.owner }))
    };

    if (snapshot) {
        record.age = snapshot.timestamp;
        record.osInfo = { ...snapshot.os };
        const fqdn = snapshot.fqdn ?? snapshot.hostname;
        if (fqdn !== undefined) record.osInfo.fqdn = fqdn;
        record.users = [...snapshot.users].sort(byUsername);
        record.interfaces = snapshot.interfaces;
        record.volumes = snapshot.volumes;
        if (snapshot.agentInfo !== undefined) record.agentInfo = snapshot.agentInfo;
        if (snapshot.memorySize !== undefined) record.memorySize = snapshot.memorySize;
        if (snapshot.cloudInstance !== undefined) record.cloudInstance = snapshot.cloudInstance;
        if (snapshot.bootTime !== undefined) record.lastBootedAt = snapshot.bootTime;
    }

    if (metadata) {
        if (metadata.firstSeen !== undefined) record.firstSeenAt = metadata.firstSeen;
        if (metadata.lastPing !== undefined) record.lastSeenAt = metadata.lastPing;
        if (metadata.lastClock !== undefined) record.lastClock = metadata.lastClock;
        if (metadata.lastCrashTimestamp !== undefined) record.lastCrashAt = metadata.lastCrashTimestamp;
    }

    return record;
}
