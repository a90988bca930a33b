import type { Server } from 'node:http';
import express from 'express';
import { structuredLogger } from '../utils/structured-logger.js';

/**
 * Start HTTP server with error handling
 * @param app Express application instance
 * @param port Port to listen on
 * @returns HTTP server instance
 */
export function startHttpServerWithErrorHandling(app: express.Express, port: number): Server {
    const httpServer = app.listen(port, '0.0.0.0', () => {
        structuredLogger.success('HTTP server', 'listening on port ' + port);
        structuredLogger.info('Health check: http://localhost:' + port + '/health');
        structuredLogger.info('API: http://localhost:' + port + '/api');
    });

    httpServer.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
            structuredLogger.error(`Port ${port} is already in use. Please choose a different port.`);
        } else {
            structuredLogger.error('HTTP server error:', error);
        }
        process.exit(1);
    });

    return httpServer;
}
