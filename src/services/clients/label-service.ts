import { SYSTEM_LABEL_OWNER } from '../../config.js';
import {
    ClientNotFoundError,
    FleetError,
    ForbiddenError,
    LabelMutationError,
    LegacyRecordMismatchError,
    ValidationError
} from '../../types/errors.js';
import type { Caller } from '../../utils/caller-context.js';
import { logger } from '../../utils/logger.js';
import type { AuditAction, AuditEvent, AuditSink } from '../audit/audit-sink.js';
import { labelMutations, mirrorWrites } from '../metrics/fleet-metrics.js';
import type { StorageBackend } from '../storage/types.js';
import type { ClientId } from './client-id.js';
import { parseClientIds } from './client-id.js';
import { ClientLabel, labelKeyword } from './client-label.js';

/** Outcome of replaying a label write on the mirror backend. */
export type MirrorWriteResult =
    | { status: 'migrated'; clientId: string }
    | { status: 'not_yet_migrated'; clientId: string; error: LegacyRecordMismatchError }
    | { status: 'failed'; clientId: string; error: unknown };

export interface LabelMutationResult {
    clientIds: string[];
    labels: string[];
    /** One entry per client when a mirror backend is configured. */
    mirror: MirrorWriteResult[];
}

type ApplyFn = (backend: StorageBackend, clientId: ClientId) => Promise<void>;

const FLOW_NAMES: Record<AuditAction, string> = {
    CLIENT_ADD_LABEL: 'handler.AddClientsLabels',
    CLIENT_REMOVE_LABEL: 'handler.RemoveClientsLabels'
};

/**
 * Batch label add/remove across the primary and the optional mirror backend.
 * The batch's audit events are published exactly once, also when it fails.
 */
export class ClientLabelService {
    constructor(
        private readonly primary: StorageBackend,
        private readonly mirror: StorageBackend | null,
        private readonly audit: AuditSink,
        private readonly systemOwner: string = SYSTEM_LABEL_OWNER,
        private readonly now: () => number = Date.now
    ) { }

    async listLabelNames(): Promise<string[]> {
        return this.primary.labels.listLabelNames();
    }

    async addClientsLabels(caller: Caller, clientIds: readonly string[], labels: readonly string[]): Promise<LabelMutationResult> {
        const batch = await this.validate(caller, clientIds, labels);
        return this.mutate('CLIENT_ADD_LABEL', caller, batch.ids, batch.names, async (backend, clientId) => {
            await backend.labels.addClientLabels(clientId, caller.username, batch.names);
            await backend.index.addClientLabels(clientId, batch.names);
        });
    }

    async removeClientsLabels(caller: Caller, clientIds: readonly string[], labels: readonly string[]): Promise<LabelMutationResult> {
        const batch = await this.validate(caller, clientIds, labels);
        return this.mutate('CLIENT_REMOVE_LABEL', caller, batch.ids, batch.names, (backend, clientId) =>
            this.removeControlledLabels(backend, clientId, caller, batch.names)
        );
    }

    private controls(caller: Caller, owner: string): boolean {
        return caller.isAdmin || owner === caller.username;
    }

    /**
     * Removes the named labels of every owner the caller controls, then drops
     * `label:<name>` index entries only for names no label on the client still uses.
     */
    private async removeControlledLabels(
        backend: StorageBackend,
        clientId: ClientId,
        caller: Caller,
        names: readonly string[]
    ): Promise<void> {
        const wanted = new Set(names);
        const owners = new Set<string>();
        for (const stored of await backend.labels.readClientLabels(clientId)) {
            const label = new ClientLabel(stored.name, stored.owner, this.systemOwner);
            if (wanted.has(label.name) && !label.isSystem && this.controls(caller, label.owner)) {
                owners.add(label.owner);
            }
        }
        for (const owner of owners) {
            await backend.labels.removeClientLabels(clientId, owner, names);
        }

        const remaining = new Set((await backend.labels.readClientLabels(clientId)).map(label => labelKeyword(label.name)));
        const orphaned = names.filter(name => !remaining.has(labelKeyword(name)));
        if (orphaned.length > 0) {
            await backend.index.removeClientLabels(clientId, orphaned);
        }
    }

    private async validate(
        caller: Caller,
        rawIds: readonly string[],
        rawLabels: readonly string[]
    ): Promise<{ ids: ClientId[]; names: string[] }> {
        if (rawIds.length === 0) {
            throw new ValidationError('client_ids must not be empty');
        }
        const ids = parseClientIds(rawIds);

        const names = [...new Set(rawLabels.map(name => name.trim()))];
        if (names.length === 0 || names.some(name => name === '')) {
            throw new ValidationError('labels must be a non-empty list of non-empty names', { labels: rawLabels });
        }
        if (new ClientLabel('', caller.username, this.systemOwner).isSystem) {
            throw new ForbiddenError(`Labels owned by ${this.systemOwner} cannot be changed through this API`);
        }

        for (const id of ids) {
            if (!(await this.primary.clients.hasClient(id))) {
                throw new ClientNotFoundError(id.toString());
            }
        }
        return { ids, names };
    }

    private async mutate(
        action: AuditAction,
        caller: Caller,
        clientIds: readonly ClientId[],
        names: readonly string[],
        apply: ApplyFn
    ): Promise<LabelMutationResult> {
        const description = names.map(name => `${caller.username}.${name}`).join(',');
        const events: AuditEvent[] = [];
        const mirrorResults: MirrorWriteResult[] = [];
        let failure: unknown;

        try {
            for (const clientId of clientIds) {
                const id = clientId.toString();
                try {
                    await apply(this.primary, clientId);
                } catch (error) {
                    labelMutations.inc({ action, status: 'error' });
                    throw error instanceof FleetError ? error : new LabelMutationError(id, error);
                }
                events.push({
                    user: caller.username,
                    action,
                    flowName: FLOW_NAMES[action],
                    client: id,
                    description,
                    timestamp: this.now()
                });
                labelMutations.inc({ action, status: 'success' });

                if (this.mirror) {
                    const result = await this.writeMirror(this.mirror, clientId, apply);
                    mirrorResults.push(result);
                    if (result.status === 'failed') {
                        throw new LabelMutationError(id, result.error);
                    }
                }
            }
            logger.op('labels', action === 'CLIENT_ADD_LABEL' ? 'label' : 'unlabel',
                `user=${caller.username} clients=${clientIds.length} labels=${names.join(',')}`);
        } catch (error) {
            failure = error;
            throw error;
        } finally {
            try {
                await this.audit.publish(events);
            } catch (auditError) {
                if (failure === undefined) throw auditError;
                // the batch error is the one the caller sees
                logger.error('Audit publish failed after a failed label mutation', auditError);
            }
        }

        return {
            clientIds: clientIds.map(id => id.toString()),
            labels: [...names],
            mirror: mirrorResults
        };
    }

    private async writeMirror(mirror: StorageBackend, clientId: ClientId, apply: ApplyFn): Promise<MirrorWriteResult> {
        const id = clientId.toString();
        let result: MirrorWriteResult;
        try {
            if (await mirror.clients.hasClient(clientId)) {
                await apply(mirror, clientId);
                result = { status: 'migrated', clientId: id };
            } else {
                result = { status: 'not_yet_migrated', clientId: id, error: new LegacyRecordMismatchError(id, mirror.kind) };
            }
        } catch (error) {
            result = error instanceof ClientNotFoundError
                ? { status: 'not_yet_migrated', clientId: id, error: new LegacyRecordMismatchError(id, mirror.kind) }
                : { status: 'failed', clientId: id, error };
        }

        mirrorWrites.inc({ backend: mirror.kind, outcome: result.status });
        if (result.status !== 'migrated') {
            logger.warn(`[labels] mirror ${mirror.kind} ${result.status} for client ${id}`);
        }
        return result;
    }
}
