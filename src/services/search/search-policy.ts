import { SEARCH_LABEL_OWNERS_WHITELIST, SEARCH_LABELS_WHITELIST } from '../../config.js';
import type { Caller } from '../../utils/caller-context.js';
import type { LabelRestriction } from './search-engine.js';

export interface SearchPolicy {
    /** Empty means searches are never label-restricted. */
    labels: readonly string[];
    owners: readonly string[];
}

export const DEFAULT_SEARCH_POLICY: SearchPolicy = {
    labels: SEARCH_LABELS_WHITELIST,
    owners: SEARCH_LABEL_OWNERS_WHITELIST
};

/** Non-admin callers are restricted once a label whitelist is configured. */
export function restrictionFor(caller: Caller, policy: SearchPolicy = DEFAULT_SEARCH_POLICY): LabelRestriction | undefined {
    if (policy.labels.length === 0 || caller.isAdmin) {
        return undefined;
    }
    return { labels: policy.labels, owners: policy.owners };
}
