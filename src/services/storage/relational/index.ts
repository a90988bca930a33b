import type BetterSqlite3 from 'better-sqlite3';

import type { StorageBackend } from '../types.js';
import { SqliteClientIndex } from './sqlite-client-index.js';
import { SqliteClientStore } from './sqlite-client-store.js';
import { SqliteLabelStore } from './sqlite-label-store.js';

export { createSqliteDatabase } from './sqlite.js';

export function createRelationalBackend(db: BetterSqlite3.Database): StorageBackend {
    return {
        kind: 'relational',
        clients: new SqliteClientStore(db),
        labels: new SqliteLabelStore(db),
        index: new SqliteClientIndex(db),
        close: async () => {
            db.close();
        }
    };
}
