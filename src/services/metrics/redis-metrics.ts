import { Counter, Histogram } from 'prom-client';
import { register } from './registry.js';

/**
 * Redis Metrics
 *
 * Tracks Redis operations of the legacy backend.
 */

export const redisOperations = new Counter({
  name: 'fleetscope_redis_operations_total',
  help: 'Total number of Redis operations',
  labelNames: ['operation', 'status'],
  registers: [register]
});

export const redisOperationDuration = new Histogram({
  name: 'fleetscope_redis_operation_duration_seconds',
  help: 'Redis operation duration in seconds',
  labelNames: ['operation'],
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1],
  registers: [register]
});
