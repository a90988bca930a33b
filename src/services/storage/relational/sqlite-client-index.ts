import type BetterSqlite3 from 'better-sqlite3';

import type { ClientIndex } from '../types.js';
import { ClientId, sortClientIds } from '../../clients/client-id.js';
import { labelKeyword } from '../../clients/client-label.js';
import { normalizeKeyword, UNIVERSAL_KEYWORD } from '../../clients/keywords.js';

interface ClientIdRow {
    client_id: string;
}

interface KeywordRow {
    keyword: string;
}

/** Inverted index as a (keyword, client_id) table; lookups intersect with GROUP BY. */
export class SqliteClientIndex implements ClientIndex {
    private readonly insertKeywordStatement: BetterSqlite3.Statement<[string, string]>;
    private readonly deleteKeywordStatement: BetterSqlite3.Statement<[string, string]>;
    private readonly deleteClientStatement: BetterSqlite3.Statement<[string]>;
    private readonly clientKeywordsStatement: BetterSqlite3.Statement<[string], KeywordRow>;

    constructor(private readonly db: BetterSqlite3.Database) {
        this.insertKeywordStatement = db.prepare<[string, string]>(`
            INSERT INTO client_keywords (keyword, client_id)
            VALUES (?, ?)
            ON CONFLICT(keyword, client_id) DO NOTHING
        `);

        this.deleteKeywordStatement = db.prepare<[string, string]>(
            'DELETE FROM client_keywords WHERE keyword = ? AND client_id = ?'
        );

        this.deleteClientStatement = db.prepare<[string]>(
            'DELETE FROM client_keywords WHERE client_id = ?'
        );

        this.clientKeywordsStatement = db.prepare<[string], KeywordRow>(
            'SELECT keyword FROM client_keywords WHERE client_id = ? ORDER BY keyword ASC'
        );
    }

    async lookupClients(keywords: readonly string[]): Promise<ClientId[]> {
        const normalized = keywords.map(normalizeKeyword).filter(Boolean);
        const effective = normalized.length > 0 ? [...new Set(normalized)] : [UNIVERSAL_KEYWORD];

        const placeholders = effective.map(() => '?').join(', ');
        const statement = this.db.prepare<unknown[], ClientIdRow>(`
            SELECT client_id
            FROM client_keywords
            WHERE keyword IN (${placeholders})
            GROUP BY client_id
            HAVING COUNT(DISTINCT keyword) = ?
        `);
        const rows = statement.all(...effective, effective.length);
        return sortClientIds(rows.map(row => ClientId.parse(row.client_id)));
    }

    async addClient(clientId: ClientId, keywords: Iterable<string>): Promise<void> {
        const id = clientId.toString();
        const next = new Set([...keywords].map(normalizeKeyword).filter(Boolean));
        next.add(UNIVERSAL_KEYWORD);
        this.db.transaction(() => {
            this.deleteClientStatement.run(id);
            for (const keyword of next) {
                this.insertKeywordStatement.run(keyword, id);
            }
        })();
    }

    async removeClient(clientId: ClientId): Promise<void> {
        this.deleteClientStatement.run(clientId.toString());
    }

    async addClientLabels(clientId: ClientId, names: readonly string[]): Promise<void> {
        const id = clientId.toString();
        this.db.transaction(() => {
            for (const keyword of new Set(names.map(labelKeyword))) {
                this.insertKeywordStatement.run(keyword, id);
            }
        })();
    }

    async removeClientLabels(clientId: ClientId, names: readonly string[]): Promise<void> {
        const id = clientId.toString();
        this.db.transaction(() => {
            for (const keyword of new Set(names.map(labelKeyword))) {
                this.deleteKeywordStatement.run(keyword, id);
            }
        })();
    }

    async readClientKeywords(clientId: ClientId): Promise<string[]> {
        return this.clientKeywordsStatement.all(clientId.toString()).map(row => row.keyword);
    }
}
