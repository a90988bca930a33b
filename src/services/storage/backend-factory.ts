/**
 * Storage backend selection.
 * STORAGE_BACKEND picks the primary; MIRROR_STORAGE_BACKEND, when set,
 * receives a copy of every label write.
 */

import { MIRROR_STORAGE_BACKEND, SQLITE_PATH, STORAGE_BACKEND } from '../../config.js';
import type { StorageBackendKind } from '../../config.js';
import { logger } from '../../utils/logger.js';
import type { IKeyValueStore } from '../key-value-store.js';
import { createLegacyBackend } from './legacy/index.js';
import { createRelationalBackend, createSqliteDatabase } from './relational/index.js';
import type { StorageBackend } from './types.js';

export interface StorageBackends {
    primary: StorageBackend;
    mirror: StorageBackend | null;
}

export interface StorageOptions {
    primary?: StorageBackendKind;
    mirror?: StorageBackendKind | null;
    sqlitePath?: string;
}

function createBackend(kind: StorageBackendKind, kv: IKeyValueStore, sqlitePath: string): StorageBackend {
    if (kind === 'legacy') {
        return createLegacyBackend(kv);
    }
    return createRelationalBackend(createSqliteDatabase(sqlitePath));
}

export function createStorageBackends(kv: IKeyValueStore, options: StorageOptions = {}): StorageBackends {
    const primaryKind = options.primary ?? STORAGE_BACKEND;
    const mirrorKind = options.mirror === undefined ? MIRROR_STORAGE_BACKEND : options.mirror;
    const sqlitePath = options.sqlitePath ?? SQLITE_PATH;

    const primary = createBackend(primaryKind, kv, sqlitePath);
    if (mirrorKind === null) {
        return { primary, mirror: null };
    }
    if (mirrorKind === primaryKind) {
        logger.warn(`[storage] MIRROR_STORAGE_BACKEND equals STORAGE_BACKEND (${primaryKind}); mirroring disabled`);
        return { primary, mirror: null };
    }
    return { primary, mirror: createBackend(mirrorKind, kv, sqlitePath) };
}
