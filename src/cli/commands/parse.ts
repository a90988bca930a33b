import { InvalidArgumentError } from 'commander';

export function parseNonNegativeInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

/** Milliseconds since the epoch, or an ISO-8601 date. */
export function parseTimestamp(value: string): number {
    const numeric = Number(value);
    if (Number.isInteger(numeric) && numeric >= 0) return numeric;
    const parsed = Date.parse(value);
    if (Number.isNaN(parsed)) {
        throw new InvalidArgumentError('Expected epoch milliseconds or an ISO-8601 date.');
    }
    return parsed;
}
