import type { ClientCrash, ClientRecord } from '../types/client.js';
import type { MirrorWriteResult, LabelMutationResult } from '../services/clients/label-service.js';
import { FleetError } from '../types/errors.js';

/** snake_case wire form of a client record; unset fields are left out. */
export function serializeClientRecord(record: ClientRecord) {
    return {
        client_id: record.clientId,
        age: record.age,
        agent_info: record.agentInfo && {
            name: record.agentInfo.name,
            version: record.agentInfo.version,
            build_time: record.agentInfo.buildTime
        },
        os_info: {
            system: record.osInfo.system,
            release: record.osInfo.release,
            version: record.osInfo.version,
            kernel: record.osInfo.kernel,
            machine: record.osInfo.machine,
            install_date: record.osInfo.installDate,
            fqdn: record.osInfo.fqdn
        },
        users: record.users.map(user => ({
            username: user.username,
            full_name: user.fullName,
            homedir: user.homedir
        })),
        interfaces: record.interfaces.map(iface => ({
            name: iface.name,
            mac_address: iface.macAddress,
            addresses: iface.addresses
        })),
        volumes: record.volumes.map(volume => ({
            name: volume.name,
            total_bytes: volume.totalBytes,
            free_bytes: volume.freeBytes
        })),
        memory_size: record.memorySize,
        cloud_instance: record.cloudInstance && {
            type: record.cloudInstance.type,
            instance_id: record.cloudInstance.instanceId
        },
        first_seen_at: record.firstSeenAt,
        last_seen_at: record.lastSeenAt,
        last_booted_at: record.lastBootedAt,
        last_clock: record.lastClock,
        last_crash_at: record.lastCrashAt,
        labels: record.labels.map(label => ({ name: label.name, owner: label.owner }))
    };
}

export function serializeCrash(crash: ClientCrash) {
    return {
        timestamp: crash.timestamp,
        crash_type: crash.crashType,
        crash_message: crash.crashMessage,
        backtrace: crash.backtrace
    };
}

function serializeMirrorResult(result: MirrorWriteResult) {
    if (result.status === 'migrated') {
        return { client_id: result.clientId, status: result.status };
    }
    const error = result.error;
    return {
        client_id: result.clientId,
        status: result.status,
        error: error instanceof FleetError
            ? { code: error.code, message: error.message }
            : { code: 'INTERNAL_ERROR', message: error instanceof Error ? error.message : String(error) }
    };
}

export function serializeLabelMutation(result: LabelMutationResult) {
    return {
        client_ids: result.clientIds,
        labels: result.labels,
        mirror: result.mirror.map(serializeMirrorResult)
    };
}
