/**
 * Fleetscope client-management service
 *
 * HTTP API over the configured storage backends.
 */

import 'dotenv/config';

import { structuredLogger } from './utils/structured-logger.js';
import { installGlobalErrorHandlers } from './utils/global-error-handlers.js';
import { createKeyValueStore } from './services/key-value-store-factory.js';
import { createStorageBackends } from './services/storage/backend-factory.js';
import { createFleetServices } from './services/fleet-services.js';
import { startHttpServer } from './http/http-server.js';

async function main(): Promise<void> {
    try {
        // Install once at startup to capture any background errors/warnings
        installGlobalErrorHandlers();

        const kv = createKeyValueStore();
        await kv.connect();

        const storage = createStorageBackends(kv);
        structuredLogger.info(`Storage ready (primary: ${storage.primary.kind}, mirror: ${storage.mirror?.kind ?? 'none'})`);

        const services = createFleetServices(kv, storage);
        const server = startHttpServer(services);

        const shutdown = (signal: string) => {
            structuredLogger.info(`${signal} received, shutting down`);
            server.close(() => {
                Promise.all([storage.primary.close(), storage.mirror?.close(), kv.disconnect()])
                    .then(() => process.exit(0))
                    .catch((error: unknown) => {
                        structuredLogger.error('Error during shutdown', error);
                        process.exit(1);
                    });
            });
        };
        process.on('SIGTERM', shutdown);
        process.on('SIGINT', shutdown);
    } catch (err) {
        structuredLogger.error('Fatal error during Fleetscope startup', err);
        // Ensure non-zero exit so supervisors can detect failure
        process.exitCode = 1;
    }
}

void main();
