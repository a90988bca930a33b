import type BetterSqlite3 from 'better-sqlite3';

import type { LabelStore } from '../types.js';
import type { StoredLabel } from '../../../types/client.js';
import type { ClientId } from '../../clients/client-id.js';
import { ClientNotFoundError } from '../../../types/errors.js';

interface NameRow {
    name: string;
}

export class SqliteLabelStore implements LabelStore {
    private readonly clientExistsStatement: BetterSqlite3.Statement<[string], { client_id: string }>;
    private readonly labelsStatement: BetterSqlite3.Statement<[string], StoredLabel>;
    private readonly insertLabelStatement: BetterSqlite3.Statement<[string, string, string]>;
    private readonly deleteLabelStatement: BetterSqlite3.Statement<[string, string, string]>;
    private readonly labelNamesStatement: BetterSqlite3.Statement<[], NameRow>;

    constructor(private readonly db: BetterSqlite3.Database) {
        this.clientExistsStatement = db.prepare<[string], { client_id: string }>(
            'SELECT client_id FROM clients WHERE client_id = ? LIMIT 1'
        );

        this.labelsStatement = db.prepare<[string], StoredLabel>(`
            SELECT name, owner
            FROM client_labels
            WHERE client_id = ?
            ORDER BY name ASC, owner ASC
        `);

        this.insertLabelStatement = db.prepare<[string, string, string]>(`
            INSERT INTO client_labels (client_id, owner, name)
            VALUES (?, ?, ?)
            ON CONFLICT(client_id, owner, name) DO NOTHING
        `);

        this.deleteLabelStatement = db.prepare<[string, string, string]>(
            'DELETE FROM client_labels WHERE client_id = ? AND owner = ? AND name = ?'
        );

        this.labelNamesStatement = db.prepare<[], NameRow>(
            'SELECT DISTINCT name FROM client_labels ORDER BY name ASC'
        );
    }

    private requireClient(clientId: ClientId): string {
        const id = clientId.toString();
        if (this.clientExistsStatement.get(id) === undefined) {
            throw new ClientNotFoundError(id);
        }
        return id;
    }

    async readClientLabels(clientId: ClientId): Promise<StoredLabel[]> {
        return this.labelsStatement.all(clientId.toString()).map(row => ({ name: row.name, owner: row.owner }));
    }

    async addClientLabels(clientId: ClientId, owner: string, names: readonly string[]): Promise<void> {
        const id = this.requireClient(clientId);
        this.db.transaction(() => {
            for (const name of new Set(names)) {
                this.insertLabelStatement.run(id, owner, name);
            }
        })();
    }

    async removeClientLabels(clientId: ClientId, owner: string, names: readonly string[]): Promise<void> {
        const id = this.requireClient(clientId);
        this.db.transaction(() => {
            for (const name of new Set(names)) {
                this.deleteLabelStatement.run(id, owner, name);
            }
        })();
    }

    async listLabelNames(): Promise<string[]> {
        return this.labelNamesStatement.all().map(row => row.name);
    }
}
