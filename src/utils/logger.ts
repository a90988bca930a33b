/**
 * Logging utility for Fleetscope services.
 *
 * Format control:
 * - LOG_FORMAT=text (default): Human-readable text format
 * - LOG_FORMAT=json: Structured JSON format for log aggregation
 */

import { getBaseLogger, serializeError } from './log-core.js';
import { NODE_ENV } from '../config.js';

type Operation = 'search' | 'read' | 'label' | 'unlabel' | 'stats' | 'interrogate' | 'audit';

class Logger {
    /**
     * Log debug messages (emits only when LOG_LEVEL=debug)
     */
    debug(message: string): void {
        getBaseLogger().debug(message);
    }

    /**
     * Format service operations with concise, clean output
     */
    op(component: string, operation: Operation, details: string): void {
        getBaseLogger().info(
            { component, operation: operation.toUpperCase(), details },
            `[${component}] ${operation.toUpperCase()} ${details}`
        );
    }

    /**
     * Log error messages with full context
     */
    error(message: string, error?: unknown): void {
        if (error === undefined) {
            getBaseLogger().error(message);
            return;
        }
        getBaseLogger().error(
            { error: serializeError(error, NODE_ENV === 'development') },
            `${message} | ${error instanceof Error ? error.message : String(error)}`
        );
    }

    warn(message: string): void {
        getBaseLogger().warn(message);
    }

    info(message: string): void {
        getBaseLogger().info(message);
    }
}

// Export singleton instance
export const logger = new Logger();
