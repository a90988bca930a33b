import type { IKeyValueStore } from '../../key-value-store.js';
import type { LabelStore } from '../types.js';
import type { StoredLabel } from '../../../types/client.js';
import type { ClientId } from '../../clients/client-id.js';
import { compareLabels, labelKey } from '../../clients/client-label.js';
import { ClientNotFoundError } from '../../../types/errors.js';
import { legacyKeys } from './keys.js';

/**
 * Labels live in one hash per client keyed by (owner, name). A reference
 * count per name backs the label listing.
 */
export class LegacyLabelStore implements LabelStore {
    constructor(private readonly kv: IKeyValueStore) { }

    private async requireClient(clientId: ClientId): Promise<string> {
        const id = clientId.toString();
        if ((await this.kv.hget(legacyKeys.clients, id)) === null) {
            throw new ClientNotFoundError(id);
        }
        return id;
    }

    private async adjustNameCount(name: string, delta: number): Promise<void> {
        const current = Number(await this.kv.hget(legacyKeys.labelNames, name) ?? '0');
        const next = current + delta;
        if (next <= 0) {
            await this.kv.hdel(legacyKeys.labelNames, [name]);
        } else {
            await this.kv.hset(legacyKeys.labelNames, name, String(next));
        }
    }

    async readClientLabels(clientId: ClientId): Promise<StoredLabel[]> {
        const hash = await this.kv.hgetall(legacyKeys.labels(clientId.toString()));
        return Object.values(hash)
            .map(value => JSON.parse(value) as StoredLabel)
            .sort(compareLabels);
    }

    async addClientLabels(clientId: ClientId, owner: string, names: readonly string[]): Promise<void> {
        const id = await this.requireClient(clientId);
        const existing = await this.kv.hgetall(legacyKeys.labels(id));
        for (const name of new Set(names)) {
            const key = labelKey(owner, name);
            if (existing[key] !== undefined) continue;
            const label: StoredLabel = { name, owner };
            await this.kv.hset(legacyKeys.labels(id), key, JSON.stringify(label));
            await this.adjustNameCount(name, 1);
        }
    }

    async removeClientLabels(clientId: ClientId, owner: string, names: readonly string[]): Promise<void> {
        const id = await this.requireClient(clientId);
        const existing = await this.kv.hgetall(legacyKeys.labels(id));
        for (const name of new Set(names)) {
            const key = labelKey(owner, name);
            if (existing[key] === undefined) continue;
            await this.kv.hdel(legacyKeys.labels(id), [key]);
            await this.adjustNameCount(name, -1);
        }
    }

    async listLabelNames(): Promise<string[]> {
        return Object.keys(await this.kv.hgetall(legacyKeys.labelNames)).sort();
    }
}
