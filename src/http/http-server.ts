import express from 'express';
import type { FleetServices } from '../services/fleet-services.js';
import { structuredLogger } from '../utils/structured-logger.js';
import { PORT } from '../config.js';

import { configureMiddleware } from './http-server-config.js';
import { setupHealthRoutes } from './http-health-routes.js';
import { setupApiRoutes } from './http-api-routes.js';
import { setupErrorHandlers } from './http-error-handlers.js';
import { startHttpServerWithErrorHandling } from './http-server-startup.js';

/** Express app with every route; does not listen. */
export function createHttpApp(services: FleetServices): express.Express {
    const app = express();

    configureMiddleware(app);
    setupHealthRoutes(app, services);
    setupApiRoutes(app, services);
    setupErrorHandlers(app);

    return app;
}

export function startHttpServer(services: FleetServices, port: number = PORT) {
    structuredLogger.success('🚀 Fleetscope starting', `primary=${services.storage.primary.kind} mirror=${services.storage.mirror?.kind ?? 'none'}`);
    structuredLogger.info('Port: ' + port);

    return startHttpServerWithErrorHandling(createHttpApp(services), port);
}
