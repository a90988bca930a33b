/**
 * Key-value store selection.
 * Uses Redis when REDIS_URL is set (non-empty), in-memory when REDIS_URL is unset or empty.
 * The legacy storage backend, flow records and audit pub/sub all share this store.
 */

import { FLEETSCOPE_REDIS_PREFIX, USE_REDIS } from '../config.js';
import { logger } from '../utils/logger.js';
import type { IKeyValueStore } from './key-value-store.js';
import { MemoryStore } from './memory-store.js';
import { RedisService } from './redis.js';

export function createKeyValueStore(prefix: string = FLEETSCOPE_REDIS_PREFIX): IKeyValueStore {
  if (!USE_REDIS) {
    logger.warn('[kv] REDIS_URL is not set; using the in-memory store, data is lost on restart');
    return new MemoryStore(prefix);
  }
  return new RedisService(undefined, prefix);
}
