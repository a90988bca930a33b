import type { ClientSnapshot, StoredLabel } from '../../types/client.js';
import { LABEL_KEYWORD_PREFIX, labelKeyword } from './client-label.js';

/** Indexed for every client; an empty keyword query resolves to it. */
export const UNIVERSAL_KEYWORD = '.';

export function normalizeKeyword(keyword: string): string {
    return keyword.trim().toLowerCase();
}

/**
 * Keywords a client is findable by: id, host name fragments, OS strings,
 * users, addresses, agent info and `label:<name>` for each label.
 */
export function extractClientKeywords(snapshot: ClientSnapshot, labels: readonly StoredLabel[] = []): Set<string> {
    const keywords = new Set<string>([UNIVERSAL_KEYWORD]);

    const tryAppend = (prefix: string, keyword: string | number | undefined): void => {
        if (keyword === undefined || keyword === '') return;
        const normalized = normalizeKeyword(String(keyword));
        // label keywords come only from labels
        if (!normalized || normalized.startsWith(LABEL_KEYWORD_PREFIX)) return;
        keywords.add(normalized);
        if (prefix) {
            keywords.add(`${prefix}:${normalized}`);
        }
    };

    const tryAppendPrefixes = (prefix: string, keyword: string | undefined, delimiter: string): number => {
        if (keyword === undefined) return 0;
        tryAppend(prefix, keyword);
        const segments = keyword.split(delimiter);
        for (let i = 1; i < segments.length; i++) {
            tryAppend(prefix, segments.slice(0, i).join(delimiter));
        }
        return segments.length;
    };

    const tryAppendIp = (ip: string): void => {
        if (tryAppendPrefixes('ip', ip, '.') === 4) return;
        tryAppendPrefixes('ip', ip, ':');
    };

    const tryAppendMac = (mac: string): void => {
        const compact = mac.replace(/[:-]/g, '');
        tryAppend('mac', compact);
        if (compact.length === 12) {
            tryAppend('mac', compact.match(/.{2}/g)?.join(':'));
        }
    };

    tryAppend('', snapshot.clientId);
    tryAppend('', snapshot.clientId.slice(2));

    const fqdn = snapshot.fqdn ?? snapshot.hostname;
    if (fqdn) {
        tryAppend('host', fqdn);
        tryAppendPrefixes('host', fqdn.split('.', 1)[0], '-');
        tryAppendPrefixes('host', fqdn, '.');
    }
    if (snapshot.hostname && snapshot.hostname !== fqdn) {
        tryAppend('host', snapshot.hostname);
    }

    tryAppend('', snapshot.os?.system);
    tryAppend('', snapshot.os?.release);
    tryAppend('', snapshot.os?.version);
    tryAppend('', snapshot.os?.kernel);
    tryAppend('', snapshot.os?.machine);

    for (const user of snapshot.users) {
        tryAppend('user', user.username);
        tryAppend('', user.fullName);
        if (user.fullName) {
            for (const name of user.fullName.split(/\s+/)) {
                // nicknames come wrapped, e.g. "Thomas 'TJ' Jones"
                tryAppend('', name.replace(/^["'()]+|["'()]+$/g, ''));
            }
        }
    }

    for (const iface of snapshot.interfaces) {
        for (const address of iface.addresses) {
            tryAppendIp(address);
        }
        if (iface.macAddress) {
            tryAppendMac(iface.macAddress);
        }
    }

    if (snapshot.agentInfo) {
        tryAppend('client', snapshot.agentInfo.name);
        tryAppend('client', snapshot.agentInfo.version);
    }

    for (const label of labels) {
        keywords.add(labelKeyword(label.name));
    }

    return keywords;
}
