import express from 'express';
import type { FleetServices } from '../services/fleet-services.js';
import { ClientId } from '../services/clients/client-id.js';
import { structuredLogger } from '../utils/structured-logger.js';
import { sendError } from './http-error-handlers.js';
import { clientQuerySchema, crashesQuerySchema, parseInput, versionsQuerySchema } from './http-schemas.js';
import { serializeClientRecord, serializeCrash } from './http-serializers.js';

/**
 * Set up routes reading one client: record, history, last IP and crashes
 * @param app Express application instance
 * @param services Fleet services
 */
export function setupClientRoutes(app: express.Express, services: FleetServices): void {
    app.get('/api/clients/:clientId', async (req, res) => {
        const startTime = Date.now();
        try {
            const clientId = ClientId.parse(req.params.clientId);
            const { timestamp } = parseInput(clientQuerySchema, req.query);
            structuredLogger.info(`→ GET /api/clients/${clientId.toString()}`);

            const record = await services.reader.readClient(clientId, timestamp);
            res.status(200).json(serializeClientRecord(record));
        } catch (error) {
            sendError(res, error, 'read client', startTime);
        }
    });

    app.get('/api/clients/:clientId/versions', async (req, res) => {
        const startTime = Date.now();
        try {
            const clientId = ClientId.parse(req.params.clientId);
            const options = parseInput(versionsQuerySchema, req.query);
            const records = await services.reader.readClientVersions(clientId, options);
            res.status(200).json({ items: records.map(serializeClientRecord) });
        } catch (error) {
            sendError(res, error, 'read client versions', startTime);
        }
    });

    app.get('/api/clients/:clientId/version-times', async (req, res) => {
        const startTime = Date.now();
        try {
            const clientId = ClientId.parse(req.params.clientId);
            const times = await services.reader.readClientVersionTimes(clientId);
            res.status(200).json({ times });
        } catch (error) {
            sendError(res, error, 'read client version times', startTime);
        }
    });

    app.get('/api/clients/:clientId/last-ip', async (req, res) => {
        const startTime = Date.now();
        try {
            const clientId = ClientId.parse(req.params.clientId);
            const result = await services.addresses.getLastClientIp(clientId);
            res.status(200).json(result);
        } catch (error) {
            sendError(res, error, 'read last client ip', startTime);
        }
    });

    app.get('/api/clients/:clientId/crashes', async (req, res) => {
        const startTime = Date.now();
        try {
            const clientId = ClientId.parse(req.params.clientId);
            const options = parseInput(crashesQuerySchema, req.query);
            const { items, totalCount } = await services.reader.listClientCrashes(clientId, options);
            res.status(200).json({ items: items.map(serializeCrash), total_count: totalCount });
        } catch (error) {
            sendError(res, error, 'list client crashes', startTime);
        }
    });
}
