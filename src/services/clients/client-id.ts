import { InvalidIdentifierError } from '../../types/errors.js';

const CLIENT_ID_RE = /^(?:aff4:\/)?(C\.[0-9a-fA-F]{16})$/;

/**
 * Validated handle for a managed endpoint: "C." followed by 16 hex digits.
 * A legacy "aff4:/" URN prefix is accepted and dropped.
 */
export class ClientId {
    private constructor(private readonly value: string) { }

    static parse(raw: string): ClientId {
        const match = CLIENT_ID_RE.exec(raw.trim());
        if (!match || !match[1]) {
            throw new InvalidIdentifierError(raw);
        }
        return new ClientId(match[1]);
    }

    static isValid(raw: string): boolean {
        return CLIENT_ID_RE.test(raw.trim());
    }

    static compare(a: ClientId, b: ClientId): number {
        if (a.value < b.value) return -1;
        if (a.value > b.value) return 1;
        return 0;
    }

    equals(other: ClientId): boolean {
        return this.value === other.value;
    }

    toString(): string {
        return this.value;
    }

    toJSON(): string {
        return this.value;
    }
}

/** Parses every id up front so that a bad one fails before any work starts. */
export function parseClientIds(raw: readonly string[]): ClientId[] {
    return raw.map(id => ClientId.parse(id));
}

export function sortClientIds(ids: Iterable<ClientId>): ClientId[] {
    return [...ids].sort(ClientId.compare);
}
