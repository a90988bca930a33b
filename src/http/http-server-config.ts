import express from 'express';
import { HTTP_JSON_LIMIT, HTTP_TRUST_PROXY } from '../config.js';
import { httpLogger } from '../utils/structured-logger.js';
import { httpMetricsMiddleware } from './http-metrics-middleware.js';

/**
 * Configure Express application with middleware
 * @param app Express application instance
 */
export function configureMiddleware(app: express.Express) {
    app.disable('x-powered-by');
    // req.ip follows X-Forwarded-For only behind a known proxy
    app.set('trust proxy', HTTP_TRUST_PROXY);

    // Structured HTTP access logging middleware
    app.use(httpLogger);
    // HTTP metrics middleware for Prometheus
    app.use(httpMetricsMiddleware);
    app.use(express.json({ limit: HTTP_JSON_LIMIT }));
}
