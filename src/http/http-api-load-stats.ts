import express from 'express';
import type { FleetServices } from '../services/fleet-services.js';
import { ClientId } from '../services/clients/client-id.js';
import { parseLoadMetric } from '../services/stats/load-metrics.js';
import { structuredLogger } from '../utils/structured-logger.js';
import { sendError } from './http-error-handlers.js';
import { loadStatsQuerySchema, parseInput } from './http-schemas.js';

/**
 * Set up API route for client load stats
 * @param app Express application instance
 * @param services Fleet services
 */
export function setupLoadStatsRoute(app: express.Express, services: FleetServices): void {
    app.get('/api/clients/:clientId/load-stats', async (req, res) => {
        const startTime = Date.now();
        try {
            const clientId = ClientId.parse(req.params.clientId);
            const query = parseInput(loadStatsQuerySchema, req.query);
            const metric = parseLoadMetric(query.metric);

            structuredLogger.info(`→ GET /api/clients/${clientId.toString()}/load-stats (metric: ${metric})`);

            const points = await services.loadStats.getClientLoadStats(clientId, metric, {
                start: query.start,
                end: query.end
            });
            res.status(200).json({ metric, data_points: points });
        } catch (error) {
            sendError(res, error, 'load stats', startTime);
        }
    });
}
