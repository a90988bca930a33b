import type { ClientMetadata } from '../../types/client.js';

/** Drops unset fields so that "absent" never turns into null or 0 downstream. */
export function compactMetadata(metadata: {
    firstSeen?: number | null;
    lastPing?: number | null;
    lastClock?: number | null;
    lastCrashTimestamp?: number | null;
    lastIp?: string | null;
}): ClientMetadata {
    const out: ClientMetadata = {};
    if (metadata.firstSeen != null) out.firstSeen = metadata.firstSeen;
    if (metadata.lastPing != null) out.lastPing = metadata.lastPing;
    if (metadata.lastClock != null) out.lastClock = metadata.lastClock;
    if (metadata.lastCrashTimestamp != null) out.lastCrashTimestamp = metadata.lastCrashTimestamp;
    if (metadata.lastIp != null) out.lastIp = metadata.lastIp;
    return out;
}

/** Fields set in `update` win; unset ones keep their stored value. */
export function mergeClientMetadata(existing: ClientMetadata, update: ClientMetadata): ClientMetadata {
    return compactMetadata({
        firstSeen: update.firstSeen ?? existing.firstSeen,
        lastPing: update.lastPing ?? existing.lastPing,
        lastClock: update.lastClock ?? existing.lastClock,
        lastCrashTimestamp: update.lastCrashTimestamp ?? existing.lastCrashTimestamp,
        lastIp: update.lastIp ?? existing.lastIp
    });
}
