import fs from 'node:fs';
import path from 'node:path';

import BetterSqlite3 from 'better-sqlite3';

const IN_MEMORY = ':memory:';

function ensureDirectory(dbPath: string): void {
    if (dbPath === IN_MEMORY) return;
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
}

export function createSqliteDatabase(dbPath: string): BetterSqlite3.Database {
    ensureDirectory(dbPath);

    const db = new BetterSqlite3(dbPath);
    if (dbPath !== IN_MEMORY) {
        db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');

    runMigrations(db);

    return db;
}

function runMigrations(db: BetterSqlite3.Database): void {
    db.exec(`
        CREATE TABLE IF NOT EXISTS clients (
            client_id TEXT PRIMARY KEY,
            first_seen INTEGER,
            last_ping INTEGER,
            last_clock INTEGER,
            last_crash_timestamp INTEGER,
            last_ip TEXT
        );

        CREATE TABLE IF NOT EXISTS client_snapshots (
            client_id TEXT NOT NULL,
            timestamp INTEGER NOT NULL,
            snapshot_json TEXT NOT NULL,
            PRIMARY KEY (client_id, timestamp),
            FOREIGN KEY (client_id) REFERENCES clients(client_id) ON DELETE CASCADE
        );

        CREATE TABLE IF NOT EXISTS client_labels (
            client_id TEXT NOT NULL,
            owner TEXT NOT NULL,
            name TEXT NOT NULL,
            PRIMARY KEY (client_id, owner, name),
            FOREIGN KEY (client_id) REFERENCES clients(client_id) ON DELETE CASCADE
        );

        CREATE TABLE IF NOT EXISTS client_keywords (
            keyword TEXT NOT NULL,
            client_id TEXT NOT NULL,
            PRIMARY KEY (keyword, client_id)
        );

        CREATE TABLE IF NOT EXISTS client_stats (
            client_id TEXT NOT NULL,
            timestamp INTEGER NOT NULL,
            stats_json TEXT NOT NULL,
            PRIMARY KEY (client_id, timestamp)
        );

        CREATE TABLE IF NOT EXISTS client_crashes (
            client_id TEXT NOT NULL,
            timestamp INTEGER NOT NULL,
            crash_json TEXT NOT NULL,
            PRIMARY KEY (client_id, timestamp)
        );

        CREATE INDEX IF NOT EXISTS idx_client_keywords_client_id ON client_keywords(client_id);
        CREATE INDEX IF NOT EXISTS idx_client_labels_name ON client_labels(name);
    `);
}
