/**
 * Structured HTTP access logging for Fleetscope
 *
 * - Structured JSON logging (source of truth)
 * - Request correlation and timing
 * - Caller identity from the x-fleet-user header
 */

import type { Request, Response, NextFunction } from 'express';
import { getBaseLogger, serializeError } from './log-core.js';
import { HTTP_ACCESS_LOG, NODE_ENV } from '../config.js';

function getClientIp(req: Request): string {
  return req.socket?.remoteAddress || req.ip || 'unknown';
}

function getRequestId(req: Request): string {
  const header = req.headers['x-request-id'];
  if (typeof header === 'string' && header) return header;
  return `req-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}

// Simple HTTP logging middleware
const httpLogger = (req: Request, res: Response, next: NextFunction): void => {
  if (!HTTP_ACCESS_LOG) {
    next();
    return;
  }
  const start = Date.now();
  const requestId = getRequestId(req);

  res.on('finish', () => {
    const duration = Date.now() - start;
    const logData = {
      http: {
        method: req.method,
        path: req.originalUrl,
        protocol: `HTTP/${req.httpVersion}`
      },
      status: res.statusCode,
      response_time_ms: duration,
      client: { ip: getClientIp(req) },
      user: req.headers['x-fleet-user'] ?? null,
      request_id: requestId
    };
    const message = `${req.method} ${req.originalUrl} -> ${res.statusCode}`;
    if (res.statusCode >= 500) {
      getBaseLogger().error(logData, message);
    } else if (res.statusCode >= 400) {
      getBaseLogger().warn(logData, message);
    } else {
      getBaseLogger().info(logData, message);
    }
  });

  next();
};

class StructuredLogger {
  debug(message: string): void {
    getBaseLogger().debug(message);
  }

  /**
   * Log success status
   */
  success(operation: string, details: string): void {
    getBaseLogger().info({ operation, details, category: 'success' }, `[${operation}] ${details}`);
  }

  /**
   * Log error messages with full context
   */
  error(message: string, error?: unknown): void {
    const errorData: Record<string, unknown> = { category: 'error' };
    if (error !== undefined) {
      errorData['error'] = serializeError(error, NODE_ENV === 'development');
    }
    getBaseLogger().error(errorData, message);
  }

  warn(message: string): void {
    getBaseLogger().warn({ category: 'warning' }, message);
  }

  info(message: string): void {
    getBaseLogger().info({ category: 'info' }, message);
  }
}

// Export singleton instance
export const structuredLogger = new StructuredLogger();

// Export HTTP logger middleware for Express
export { httpLogger };
