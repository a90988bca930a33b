import type { IKeyValueStore } from '../../key-value-store.js';
import type { ClientIndex } from '../types.js';
import { ClientId, sortClientIds } from '../../clients/client-id.js';
import { labelKeyword } from '../../clients/client-label.js';
import { normalizeKeyword, UNIVERSAL_KEYWORD } from '../../clients/keywords.js';
import { legacyKeys } from './keys.js';

/**
 * Inverted index as two families of hashes: keyword -> client ids (postings)
 * and client id -> keywords (used to retract a client's postings).
 */
export class LegacyClientIndex implements ClientIndex {
    constructor(private readonly kv: IKeyValueStore) { }

    async lookupClients(keywords: readonly string[]): Promise<ClientId[]> {
        const normalized = keywords.map(normalizeKeyword).filter(Boolean);
        const effective = normalized.length > 0 ? [...new Set(normalized)] : [UNIVERSAL_KEYWORD];

        const postings: Set<string>[] = [];
        for (const keyword of effective) {
            const hits = new Set(Object.keys(await this.kv.hgetall(legacyKeys.keywordPostings(keyword))));
            postings.push(hits);
            if (hits.size === 0) break;
        }
        const [first = new Set<string>(), ...rest] = postings;
        const relevant = rest.reduce(
            (acc, hits) => new Set([...acc].filter(id => hits.has(id))),
            first
        );
        return sortClientIds([...relevant].map(id => ClientId.parse(id)));
    }

    private async addPostings(clientId: string, keywords: Iterable<string>): Promise<void> {
        for (const keyword of keywords) {
            await this.kv.hset(legacyKeys.keywordPostings(keyword), clientId, '1');
            await this.kv.hset(legacyKeys.clientKeywords(clientId), keyword, '1');
        }
    }

    private async removePostings(clientId: string, keywords: Iterable<string>): Promise<void> {
        const list = [...keywords];
        for (const keyword of list) {
            await this.kv.hdel(legacyKeys.keywordPostings(keyword), [clientId]);
        }
        await this.kv.hdel(legacyKeys.clientKeywords(clientId), list);
    }

    async addClient(clientId: ClientId, keywords: Iterable<string>): Promise<void> {
        const id = clientId.toString();
        const next = new Set([...keywords].map(normalizeKeyword).filter(Boolean));
        next.add(UNIVERSAL_KEYWORD);
        const current = Object.keys(await this.kv.hgetall(legacyKeys.clientKeywords(id)));
        await this.removePostings(id, current.filter(keyword => !next.has(keyword)));
        await this.addPostings(id, next);
    }

    async removeClient(clientId: ClientId): Promise<void> {
        const id = clientId.toString();
        const current = Object.keys(await this.kv.hgetall(legacyKeys.clientKeywords(id)));
        await this.removePostings(id, current);
    }

    async addClientLabels(clientId: ClientId, names: readonly string[]): Promise<void> {
        await this.addPostings(clientId.toString(), new Set(names.map(labelKeyword)));
    }

    async removeClientLabels(clientId: ClientId, names: readonly string[]): Promise<void> {
        await this.removePostings(clientId.toString(), new Set(names.map(labelKeyword)));
    }

    async readClientKeywords(clientId: ClientId): Promise<string[]> {
        return Object.keys(await this.kv.hgetall(legacyKeys.clientKeywords(clientId.toString()))).sort();
    }
}
