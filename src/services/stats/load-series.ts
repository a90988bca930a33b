import { LOAD_STATS_LOOKBACK_MS, LOAD_STATS_MAX_SAMPLES } from '../../config.js';
import type { StatSnapshot, TimeseriesPoint } from '../../types/stats.js';
import { ValidationError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import type { ClientId } from '../clients/client-id.js';
import { loadStatsPoints } from '../metrics/fleet-metrics.js';
import type { ClientStore } from '../storage/types.js';
import type { LoadMetric } from './load-metrics.js';
import { metricClass } from './load-metrics.js';
import { Timeseries } from './timeseries.js';

export interface LoadStatsRange {
    start?: number;
    end?: number;
}

export interface LoadSeriesOptions {
    start: number;
    end: number;
    maxSamples?: number;
}

/** Raw points of one metric, in the order the snapshots were given. */
export function extractMetricPoints(snapshots: readonly StatSnapshot[], metric: LoadMetric): TimeseriesPoint[] {
    const points: TimeseriesPoint[] = [];
    for (const snapshot of snapshots) {
        switch (metric) {
            case 'CPU_PERCENT':
            case 'CPU_SYSTEM':
            case 'CPU_USER':
                for (const sample of snapshot.cpuSamples) {
                    const value = metric === 'CPU_PERCENT'
                        ? sample.cpuPercent
                        : metric === 'CPU_SYSTEM' ? sample.systemCpuTime : sample.userCpuTime;
                    points.push({ timestamp: sample.timestamp, value });
                }
                break;
            case 'IO_READ_BYTES':
                snapshot.ioSamples.forEach(s => points.push({ timestamp: s.timestamp, value: s.readBytes }));
                break;
            case 'IO_WRITE_BYTES':
                snapshot.ioSamples.forEach(s => points.push({ timestamp: s.timestamp, value: s.writeBytes }));
                break;
            case 'IO_READ_OPS':
                snapshot.ioSamples.forEach(s => points.push({ timestamp: s.timestamp, value: s.readCount }));
                break;
            case 'IO_WRITE_OPS':
                snapshot.ioSamples.forEach(s => points.push({ timestamp: s.timestamp, value: s.writeCount }));
                break;
            case 'NETWORK_BYTES_RECEIVED':
                points.push({ timestamp: snapshot.timestamp, value: snapshot.bytesReceived });
                break;
            case 'NETWORK_BYTES_SENT':
                points.push({ timestamp: snapshot.timestamp, value: snapshot.bytesSent });
                break;
            case 'MEMORY_PERCENT':
                points.push({ timestamp: snapshot.timestamp, value: snapshot.memoryPercent });
                break;
            case 'MEMORY_RSS_SIZE':
                points.push({ timestamp: snapshot.timestamp, value: snapshot.rssSize });
                break;
            case 'MEMORY_VMS_SIZE':
                points.push({ timestamp: snapshot.timestamp, value: snapshot.vmsSize });
                break;
        }
    }
    return points;
}

/**
 * Sorted, counter-repaired series of one metric, downsampled to at most
 * `maxSamples` points when there are more.
 */
export function buildLoadSeries(
    snapshots: readonly StatSnapshot[],
    metric: LoadMetric,
    options: LoadSeriesOptions
): TimeseriesPoint[] {
    const cap = options.maxSamples ?? LOAD_STATS_MAX_SAMPLES;
    const mode = metricClass(metric);
    const series = new Timeseries(extractMetricPoints(snapshots, metric));

    if (mode === 'counter') {
        series.makeIncreasing();
    }

    if (series.length > cap) {
        const width = Math.max(1, Math.floor((options.end - options.start) / cap));
        series.normalize(width, options.start, options.end, mode, cap);
    }

    return series.toArray();
}

export class MetricSeriesBuilder {
    constructor(
        private readonly clients: ClientStore,
        private readonly now: () => number = Date.now,
        private readonly maxSamples: number = LOAD_STATS_MAX_SAMPLES
    ) { }

    async getClientLoadStats(clientId: ClientId, metric: LoadMetric, range: LoadStatsRange = {}): Promise<TimeseriesPoint[]> {
        const end = range.end ?? this.now();
        const start = range.start ?? end - LOAD_STATS_LOOKBACK_MS;
        if (start > end) {
            throw new ValidationError('start must not be after end', { start, end });
        }

        const snapshots = await this.clients.readClientStats(clientId, { start, end });
        const points = buildLoadSeries(snapshots, metric, { start, end, maxSamples: this.maxSamples });
        logger.op('load-stats', 'stats', `client=${clientId.toString()} metric=${metric} snapshots=${snapshots.length} points=${points.length}`);
        loadStatsPoints.observe({ metric }, points.length);
        return points;
    }
}
