import { z } from 'zod';
import { ValidationError } from '../types/errors.js';

const nonNegativeInt = z.coerce.number().int().min(0);
const timestamp = z.coerce.number().int().min(0);

export const searchQuerySchema = z.object({
    query: z.string().default(''),
    offset: nonNegativeInt.default(0),
    count: nonNegativeInt.default(0)
});

export const labelsBodySchema = z.object({
    client_ids: z.array(z.string()).min(1, 'client_ids must not be empty'),
    labels: z.array(z.string()).min(1, 'labels must not be empty')
});

export const clientQuerySchema = z.object({
    timestamp: timestamp.optional()
});

export const versionsQuerySchema = z.object({
    start: timestamp.optional(),
    end: timestamp.optional(),
    mode: z.enum(['full', 'diff']).default('full')
});

export const crashesQuerySchema = z.object({
    offset: nonNegativeInt.default(0),
    count: nonNegativeInt.default(0),
    filter: z.string().optional()
});

export const loadStatsQuerySchema = z.object({
    metric: z.string().min(1, 'metric is required'),
    start: timestamp.optional(),
    end: timestamp.optional()
});

/** Parses request input, turning zod issues into a 400 INVALID_INPUT. */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
    const result = schema.safeParse(input);
    if (!result.success) {
        const message = result.error.issues
            .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
            .join('; ');
        throw new ValidationError(message, { issues: result.error.issues.map(issue => issue.message) });
    }
    return result.data;
}
