import type { TimeseriesPoint } from '../../types/stats.js';
import type { MetricClass } from './load-metrics.js';

/**
 * Ascending sequence of (timestamp, value) points. Construction sorts stably,
 * so points sharing a timestamp keep the order they were given in.
 */
export class Timeseries {
    private points: TimeseriesPoint[];

    constructor(points: Iterable<TimeseriesPoint> = []) {
        // Array.prototype.sort is stable
        this.points = [...points]
            .map(point => ({ timestamp: point.timestamp, value: point.value }))
            .sort((a, b) => a.timestamp - b.timestamp);
    }

    get length(): number {
        return this.points.length;
    }

    /** Running maximum; repairs counters that went backwards after a restart. */
    makeIncreasing(): this {
        let max = Number.NEGATIVE_INFINITY;
        for (const point of this.points) {
            max = Math.max(max, point.value);
            point.value = max;
        }
        return this;
    }

    /**
     * Resamples into buckets of `width` ms starting at `start`, keeping only
     * points inside [start, end]. Never more than `maxBuckets` buckets: the
     * last one absorbs any remainder of the range. Each non-empty bucket
     * yields one point stamped with the bucket start; gauges average, counters
     * keep the last value.
     */
    normalize(width: number, start: number, end: number, mode: MetricClass, maxBuckets: number): this {
        const buckets = new Map<number, number[]>();
        for (const point of this.points) {
            if (point.timestamp < start || point.timestamp > end) continue;
            const index = Math.min(maxBuckets - 1, Math.floor((point.timestamp - start) / width));
            const bucket = buckets.get(index);
            if (bucket) {
                bucket.push(point.value);
            } else {
                buckets.set(index, [point.value]);
            }
        }

        const next: TimeseriesPoint[] = [];
        for (const [index, values] of [...buckets.entries()].sort((a, b) => a[0] - b[0])) {
            next.push({ timestamp: start + index * width, value: aggregate(values, mode) });
        }
        this.points = next;
        return this;
    }

    toArray(): TimeseriesPoint[] {
        return this.points.map(point => ({ ...point }));
    }
}

function aggregate(values: readonly number[], mode: MetricClass): number {
    if (mode === 'counter') {
        return values[values.length - 1] ?? 0;
    }
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}
