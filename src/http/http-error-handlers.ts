import express from 'express';
import { FleetError } from '../types/errors.js';
import { structuredLogger } from '../utils/structured-logger.js';

/**
 * Answers a failed API call: FleetErrors keep their code and status,
 * anything else becomes 500 INTERNAL_ERROR.
 */
export function sendError(res: express.Response, error: unknown, operation: string, startTime: number): void {
    const duration = Date.now() - startTime;

    if (error instanceof FleetError) {
        if (error.statusCode >= 500) {
            structuredLogger.error(`✗ ${operation} failed in ${duration}ms`, error);
        } else {
            structuredLogger.warn(`✗ ${operation} rejected in ${duration}ms: ${error.code} ${error.message}`);
        }
        res.status(error.statusCode).json({ error: error.code, message: error.message });
        return;
    }

    structuredLogger.error(`✗ ${operation} failed in ${duration}ms`, error);
    res.status(500).json({
        error: 'INTERNAL_ERROR',
        message: error instanceof Error ? error.message : String(error)
    });
}

/**
 * Set up the error handler and the catch-all 404
 * @param app Express application instance
 */
export function setupErrorHandlers(app: express.Express) {
    // Express recognizes error middleware by its four parameters
    app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
        const rid = req.headers['x-request-id'] ?? 'unknown';
        structuredLogger.error(`HTTP error on ${req.method} ${req.url} [id: ${String(rid)}]`, err);

        if (res.headersSent) {
            res.end();
            return;
        }
        // body-parser failures carry their own 4xx status
        if (err instanceof SyntaxError) {
            res.status(400).json({ error: 'INVALID_INPUT', message: 'Request body is not valid JSON' });
            return;
        }
        res.status(500).json({ error: 'INTERNAL_ERROR', message: 'Internal server error' });
    });

    // Catch-all 404 handler (must be last)
    app.use((req, res) => {
        res.status(404).json({ error: 'NOT_FOUND', message: `No route for ${req.method} ${req.path}` });
    });
}
