import { Counter, Histogram } from 'prom-client';
import { register } from './registry.js';

/**
 * Client search, label mutation and load-stats metrics.
 */

export const searchQueries = new Counter({
  name: 'fleetscope_search_queries_total',
  help: 'Total number of client searches',
  labelNames: ['mode', 'status'],
  registers: [register]
});

export const searchResults = new Histogram({
  name: 'fleetscope_search_results',
  help: 'Number of clients returned per search page',
  labelNames: ['mode'],
  buckets: [0, 1, 5, 10, 25, 50, 100, 250, 500, 1000],
  registers: [register]
});

export const searchCandidatesRejected = new Counter({
  name: 'fleetscope_search_candidates_rejected_total',
  help: 'Index candidates dropped by the exact label/owner check',
  registers: [register]
});

export const labelMutations = new Counter({
  name: 'fleetscope_label_mutations_total',
  help: 'Label mutations per client',
  labelNames: ['action', 'status'],
  registers: [register]
});

export const mirrorWrites = new Counter({
  name: 'fleetscope_mirror_writes_total',
  help: 'Label writes to the mirror backend by outcome',
  labelNames: ['backend', 'outcome'],
  registers: [register]
});

export const loadStatsPoints = new Histogram({
  name: 'fleetscope_load_stats_points',
  help: 'Points returned per load-stats series',
  labelNames: ['metric'],
  buckets: [0, 10, 25, 50, 75, 100, 250, 500, 1000],
  registers: [register]
});
