import type { ClientRecord } from '../../types/client.js';
import { logger } from '../../utils/logger.js';
import type { ClientId } from '../clients/client-id.js';
import { sortClientIds } from '../clients/client-id.js';
import { labelKeyword } from '../clients/client-label.js';
import type { ClientRecordReader } from '../clients/record-reader.js';
import { searchCandidatesRejected, searchQueries, searchResults } from '../metrics/fleet-metrics.js';
import type { StorageBackend } from '../storage/types.js';
import { parseSearchQuery } from './query-parser.js';

export interface SearchPage {
    offset?: number;
    /** 0 or absent means no upper bound. */
    count?: number;
}

/** Exact (name, owner) pairs a restricted caller may see. */
export interface LabelRestriction {
    labels: readonly string[];
    owners: readonly string[];
}

type SearchMode = 'unrestricted' | 'restricted';

function paginate<T>(items: readonly T[], page: SearchPage): T[] {
    const offset = page.offset ?? 0;
    const end = page.count ? offset + page.count : undefined;
    return items.slice(offset, end);
}

export class SearchQueryEngine {
    constructor(
        private readonly backend: StorageBackend,
        private readonly reader: ClientRecordReader
    ) { }

    async search(query: string, page: SearchPage = {}, restriction?: LabelRestriction): Promise<ClientRecord[]> {
        const mode: SearchMode = restriction ? 'restricted' : 'unrestricted';
        try {
            const keywords = parseSearchQuery(query);
            const ids = restriction
                ? await this.restrictedMatches(keywords, restriction)
                : await this.backend.index.lookupClients(keywords);

            const records = await this.reader.readClients(paginate(ids, page));
            logger.op('search', 'search', `mode=${mode} query="${query}" matched=${ids.length} returned=${records.length}`);
            searchQueries.inc({ mode, status: 'success' });
            searchResults.observe({ mode }, records.length);
            return records;
        } catch (error) {
            searchQueries.inc({ mode, status: 'error' });
            throw error;
        }
    }

    /**
     * Index candidates for any whitelisted label, then kept only when one
     * single label on the client has a permitted name AND a permitted owner.
     * The index files labels by name alone, so a candidate may match through
     * a label owned by someone outside the owner whitelist.
     */
    private async restrictedMatches(keywords: readonly string[], restriction: LabelRestriction): Promise<ClientId[]> {
        const candidates = new Map<string, ClientId>();
        for (const name of restriction.labels) {
            const ids = await this.backend.index.lookupClients([labelKeyword(name), ...keywords]);
            for (const id of ids) candidates.set(id.toString(), id);
        }

        const names = new Set(restriction.labels);
        const owners = new Set(restriction.owners);
        const verified: ClientId[] = [];
        for (const clientId of sortClientIds(candidates.values())) {
            const labels = await this.backend.labels.readClientLabels(clientId);
            if (labels.some(label => names.has(label.name) && owners.has(label.owner))) {
                verified.push(clientId);
            } else {
                searchCandidatesRejected.inc();
            }
        }
        return verified;
    }
}
