import { collectDefaultMetrics, Registry } from 'prom-client';
import { getBuildVersion } from '../../utils/build-version.js';
import { INSTANCE_ID } from '../../config.js';

/**
 * Prometheus metrics registry for Fleetscope.
 *
 * All metrics are registered here and exposed via /metrics endpoint.
 * Default labels are automatically applied to all metrics.
 */
export const register = new Registry();

register.setDefaultLabels({
  service: 'fleetscope',
  fleetscope_version: getBuildVersion(),
  instance: INSTANCE_ID
});

// process/heap metrics are sampled at scrape time
collectDefaultMetrics({ register, prefix: 'fleetscope_' });
