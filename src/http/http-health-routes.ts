import express from 'express';
import type { FleetServices } from '../services/fleet-services.js';
import { register } from '../services/metrics/registry.js';
import { getBuildVersion } from '../utils/build-version.js';
import { structuredLogger } from '../utils/structured-logger.js';

/**
 * Set up health check, service info and Prometheus routes
 * @param app Express application instance
 * @param services Fleet services, for dependency checks
 */
export function setupHealthRoutes(app: express.Express, services: FleetServices) {
    app.get('/health', async (req, res) => {
        const kvHealthy = services.kv.isConnected();
        let primaryHealthy = true;
        try {
            await services.storage.primary.labels.listLabelNames();
        } catch (error) {
            structuredLogger.warn(`Health check: primary ${services.storage.primary.kind} backend unavailable: ${error instanceof Error ? error.message : String(error)}`);
            primaryHealthy = false;
        }

        // the primary backend is the critical dependency
        const healthStatus = primaryHealthy ? (kvHealthy ? 'healthy' : 'degraded') : 'unhealthy';

        res.status(primaryHealthy ? 200 : 503).json({
            status: healthStatus,
            service: 'fleetscope',
            version: getBuildVersion(),
            uptime: Math.floor(process.uptime()),
            dependencies: {
                primary: { backend: services.storage.primary.kind, status: primaryHealthy ? 'healthy' : 'unhealthy' },
                mirror: services.storage.mirror ? { backend: services.storage.mirror.kind } : null,
                key_value_store: kvHealthy ? 'healthy' : 'unhealthy'
            }
        });
    });

    app.get('/metrics', async (req, res) => {
        try {
            res.set('Content-Type', register.contentType);
            res.end(await register.metrics());
        } catch (error) {
            structuredLogger.error('Error generating metrics', error);
            res.status(500).end('Error generating metrics');
        }
    });

    app.get('/api', (req, res) => {
        res.json({
            service: 'Fleetscope API',
            version: getBuildVersion(),
            endpoints: {
                search: 'GET /api/clients?query=&offset=&count=',
                labels: 'GET /api/clients/labels',
                add_labels: 'POST /api/clients/labels/add',
                remove_labels: 'POST /api/clients/labels/remove',
                kb_fields: 'GET /api/clients/kb-fields',
                client: 'GET /api/clients/:clientId?timestamp=',
                versions: 'GET /api/clients/:clientId/versions?start=&end=&mode=',
                version_times: 'GET /api/clients/:clientId/version-times',
                last_ip: 'GET /api/clients/:clientId/last-ip',
                crashes: 'GET /api/clients/:clientId/crashes?offset=&count=&filter=',
                load_stats: 'GET /api/clients/:clientId/load-stats?metric=&start=&end=',
                interrogate: 'POST /api/clients/:clientId/actions/interrogate',
                interrogation_state: 'GET /api/clients/:clientId/actions/interrogate/:operationId'
            }
        });
    });
}
