/** Key layout of the legacy hierarchical store. */
export const legacyKeys = {
    clients: 'clients',
    snapshots: (clientId: string) => `client:${clientId}:snapshots`,
    metadata: (clientId: string) => `client:${clientId}:metadata`,
    labels: (clientId: string) => `client:${clientId}:labels`,
    stats: (clientId: string) => `client:${clientId}:stats`,
    crashes: (clientId: string) => `client:${clientId}:crashes`,
    labelNames: 'labels:names',
    keywordPostings: (keyword: string) => `index:keyword:${keyword}`,
    clientKeywords: (clientId: string) => `index:client:${clientId}`
} as const;

/** Values of a timestamp-keyed hash, ascending by timestamp. */
export function sortedByTimestamp<T>(hash: Record<string, string>): T[] {
    return Object.entries(hash)
        .map(([field, value]) => ({ timestamp: Number(field), value }))
        .sort((a, b) => a.timestamp - b.timestamp)
        .map(entry => JSON.parse(entry.value) as T);
}
