import { UnknownMetricError } from '../../types/errors.js';

export const LOAD_METRICS = [
    'CPU_PERCENT',
    'CPU_SYSTEM',
    'CPU_USER',
    'IO_READ_BYTES',
    'IO_WRITE_BYTES',
    'IO_READ_OPS',
    'IO_WRITE_OPS',
    'NETWORK_BYTES_RECEIVED',
    'NETWORK_BYTES_SENT',
    'MEMORY_PERCENT',
    'MEMORY_RSS_SIZE',
    'MEMORY_VMS_SIZE'
] as const;

export type LoadMetric = typeof LOAD_METRICS[number];

/** Gauges are point-in-time readings, counters are cumulative totals. */
export type MetricClass = 'gauge' | 'counter';

const GAUGE_METRICS: ReadonlySet<LoadMetric> = new Set<LoadMetric>([
    'CPU_PERCENT',
    'MEMORY_PERCENT',
    'MEMORY_RSS_SIZE',
    'MEMORY_VMS_SIZE'
]);

export function metricClass(metric: LoadMetric): MetricClass {
    return GAUGE_METRICS.has(metric) ? 'gauge' : 'counter';
}

function isLoadMetric(value: string): value is LoadMetric {
    return LOAD_METRICS.some(metric => metric === value);
}

export function parseLoadMetric(value: string): LoadMetric {
    const normalized = value.trim().toUpperCase();
    if (!isLoadMetric(normalized)) {
        throw new UnknownMetricError(value);
    }
    return normalized;
}
