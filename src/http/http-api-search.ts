import express from 'express';
import type { FleetServices } from '../services/fleet-services.js';
import { listKbFields } from '../services/clients/kb-fields.js';
import { restrictionFor } from '../services/search/search-policy.js';
import { getCaller } from '../utils/caller-context.js';
import { structuredLogger } from '../utils/structured-logger.js';
import { sendError } from './http-error-handlers.js';
import { parseInput, searchQuerySchema } from './http-schemas.js';
import { serializeClientRecord } from './http-serializers.js';

/**
 * Set up client search, label listing and KB field routes
 * @param app Express application instance
 * @param services Fleet services
 */
export function setupSearchRoutes(app: express.Express, services: FleetServices): void {
    app.get('/api/clients', async (req, res) => {
        const startTime = Date.now();
        try {
            const { query, offset, count } = parseInput(searchQuerySchema, req.query);
            const caller = getCaller(req);
            const restriction = restrictionFor(caller, services.searchPolicy);

            structuredLogger.info(`→ GET /api/clients (query: ${query}, offset: ${offset}, count: ${count}, restricted: ${restriction !== undefined})`);

            const records = await services.search.search(query, { offset, count }, restriction);
            const duration = Date.now() - startTime;
            structuredLogger.info(`✓ client search completed in ${duration}ms (${records.length} result(s))`);

            res.status(200).json({
                items: records.map(serializeClientRecord),
                offset,
                count,
                metadata: { duration_ms: duration }
            });
        } catch (error) {
            sendError(res, error, 'client search', startTime);
        }
    });

    app.get('/api/clients/labels', async (req, res) => {
        const startTime = Date.now();
        try {
            const names = await services.labels.listLabelNames();
            res.status(200).json({ items: names });
        } catch (error) {
            sendError(res, error, 'list client labels', startTime);
        }
    });

    app.get('/api/clients/kb-fields', (req, res) => {
        res.status(200).json({ items: listKbFields() });
    });
}
