import express from 'express';
import type { FleetServices } from '../services/fleet-services.js';
import { setupClientRoutes } from './http-api-clients.js';
import { setupInterrogateRoutes } from './http-api-interrogate.js';
import { setupLabelRoutes } from './http-api-labels.js';
import { setupLoadStatsRoute } from './http-api-load-stats.js';
import { setupSearchRoutes } from './http-api-search.js';

/**
 * Set up all API routes
 * @param app Express application instance
 * @param services Fleet services
 */
export function setupApiRoutes(app: express.Express, services: FleetServices) {
    // fixed paths first so "labels" and "kb-fields" never reach the :clientId routes
    setupSearchRoutes(app, services);
    setupLabelRoutes(app, services);
    setupClientRoutes(app, services);
    setupLoadStatsRoute(app, services);
    setupInterrogateRoutes(app, services);
}
