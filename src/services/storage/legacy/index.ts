import type { IKeyValueStore } from '../../key-value-store.js';
import type { StorageBackend } from '../types.js';
import { LegacyClientIndex } from './legacy-client-index.js';
import { LegacyClientStore } from './legacy-client-store.js';
import { LegacyLabelStore } from './legacy-label-store.js';

/** The key-value store stays owned by the caller; closing the backend leaves it connected. */
export function createLegacyBackend(kv: IKeyValueStore): StorageBackend {
    return {
        kind: 'legacy',
        clients: new LegacyClientStore(kv),
        labels: new LegacyLabelStore(kv),
        index: new LegacyClientIndex(kv),
        close: async () => undefined
    };
}
