import express from 'express';
import type { FleetServices } from '../services/fleet-services.js';
import { ClientId } from '../services/clients/client-id.js';
import { getCaller } from '../utils/caller-context.js';
import { structuredLogger } from '../utils/structured-logger.js';
import { sendError } from './http-error-handlers.js';

/**
 * Set up routes starting an interrogation and reading its state
 * @param app Express application instance
 * @param services Fleet services
 */
export function setupInterrogateRoutes(app: express.Express, services: FleetServices): void {
    app.post('/api/clients/:clientId/actions/interrogate', async (req, res) => {
        const startTime = Date.now();
        try {
            const clientId = ClientId.parse(req.params.clientId);
            const caller = getCaller(req);
            structuredLogger.info(`→ POST /api/clients/${clientId.toString()}/actions/interrogate (user: ${caller.username})`);

            const operationId = await services.interrogation.interrogate(caller, clientId);
            res.status(200).json({ operation_id: operationId });
        } catch (error) {
            sendError(res, error, 'interrogate client', startTime);
        }
    });

    app.get('/api/clients/:clientId/actions/interrogate/:operationId', async (req, res) => {
        const startTime = Date.now();
        try {
            const clientId = ClientId.parse(req.params.clientId);
            const state = await services.interrogation.getInterrogationState(clientId, req.params.operationId);
            res.status(200).json({ state });
        } catch (error) {
            sendError(res, error, 'read interrogation state', startTime);
        }
    });
}
