import express from 'express';
import type { FleetServices } from '../services/fleet-services.js';
import { getCaller } from '../utils/caller-context.js';
import { structuredLogger } from '../utils/structured-logger.js';
import { sendError } from './http-error-handlers.js';
import { labelsBodySchema, parseInput } from './http-schemas.js';
import { serializeLabelMutation } from './http-serializers.js';

type Action = 'add' | 'remove';

/**
 * Set up label add/remove routes
 * @param app Express application instance
 * @param services Fleet services
 */
export function setupLabelRoutes(app: express.Express, services: FleetServices): void {
    const handle = (action: Action) => async (req: express.Request, res: express.Response) => {
        const startTime = Date.now();
        const operation = `${action} client labels`;
        try {
            const body = parseInput(labelsBodySchema, req.body);
            const caller = getCaller(req);

            structuredLogger.info(`→ POST /api/clients/labels/${action} (user: ${caller.username}, ${body.client_ids.length} client(s), labels: ${body.labels.join(',')})`);

            const result = action === 'add'
                ? await services.labels.addClientsLabels(caller, body.client_ids, body.labels)
                : await services.labels.removeClientsLabels(caller, body.client_ids, body.labels);

            const duration = Date.now() - startTime;
            structuredLogger.info(`✓ ${operation} completed in ${duration}ms`);
            res.status(200).json(serializeLabelMutation(result));
        } catch (error) {
            sendError(res, error, operation, startTime);
        }
    };

    app.post('/api/clients/labels/add', handle('add'));
    app.post('/api/clients/labels/remove', handle('remove'));
}
