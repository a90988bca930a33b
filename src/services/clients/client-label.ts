import { SYSTEM_LABEL_OWNER } from '../../config.js';
import type { StoredLabel } from '../../types/client.js';

/**
 * A (name, owner) tag on a client. System ownership is decided once here,
 * callers read `isSystem` instead of comparing owner strings.
 */
export class ClientLabel {
    readonly isSystem: boolean;

    constructor(readonly name: string, readonly owner: string, systemOwner: string = SYSTEM_LABEL_OWNER) {
        this.isSystem = owner === systemOwner;
    }

    static fromStored(stored: StoredLabel): ClientLabel {
        return new ClientLabel(stored.name, stored.owner);
    }

    /** Key used for (name, owner) uniqueness. */
    get key(): string {
        return labelKey(this.owner, this.name);
    }

    toStored(): StoredLabel {
        return { name: this.name, owner: this.owner };
    }
}

export function labelKey(owner: string, name: string): string {
    return JSON.stringify([owner, name]);
}

/** Keyword under which the client index files a label. */
export const LABEL_KEYWORD_PREFIX = 'label:';

export function labelKeyword(name: string): string {
    return `${LABEL_KEYWORD_PREFIX}${name.trim().toLowerCase()}`;
}

export function isSystemOwner(owner: string): boolean {
    return new ClientLabel('', owner).isSystem;
}

/** Stable ordering used when labels are returned: by name, then owner. */
export function compareLabels(a: StoredLabel, b: StoredLabel): number {
    if (a.name !== b.name) return a.name < b.name ? -1 : 1;
    if (a.owner !== b.owner) return a.owner < b.owner ? -1 : 1;
    return 0;
}
