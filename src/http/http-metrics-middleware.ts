import express from 'express';
import {
  httpRequests,
  httpRequestDuration,
  httpRequestSize,
  httpResponseSize,
  httpActiveConnections
} from '../services/metrics/http-metrics.js';

function routeLabel(req: express.Request): string {
  // matched route pattern keeps client ids out of label values
  const route: unknown = req.route;
  if (route && typeof route === 'object' && 'path' in route && typeof route.path === 'string') {
    return route.path;
  }
  return 'unmatched';
}

/**
 * HTTP metrics middleware for Prometheus
 * Tracks requests, response times, payload sizes, and active connections
 */
export function httpMetricsMiddleware(req: express.Request, res: express.Response, next: express.NextFunction) {
  const method = req.method;

  const requestSize = req.headers['content-length'] ? parseInt(req.headers['content-length'], 10) : 0;

  httpActiveConnections.inc();
  const timer = httpRequestDuration.startTimer({ method });

  res.on('finish', () => {
    const route = routeLabel(req);
    const status = res.statusCode.toString();
    if (requestSize > 0) {
      httpRequestSize.observe({ method, route }, requestSize);
    }
    const contentLength = Number(res.getHeader('content-length') ?? 0);
    if (contentLength > 0) {
      httpResponseSize.observe({ method, route, status }, contentLength);
    }
    httpRequests.inc({ method, route, status });
    timer({ route, status });
    httpActiveConnections.dec();
  });

  next();
}
