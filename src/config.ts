/**
 * Centralized configuration for environment variables.
 * This file contains all environment variable parsing logic.
 */

import os from 'os';
import path from 'path';

function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function getEnvInt(key: string, defaultValue: number): number {
  const val = process.env[key];
  if (val === undefined) return defaultValue;
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const val = process.env[key];
  if (val === undefined) return defaultValue;
  return val !== 'false' && val !== '0';
}

function getEnvList(key: string): string[] {
  return (process.env[key] || '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

export type StorageBackendKind = 'legacy' | 'relational';

function parseBackendKind(value: string, key: string): StorageBackendKind {
  if (value === 'legacy' || value === 'relational') return value;
  throw new Error(`${key} must be "legacy" or "relational", got "${value}"`);
}

// String configurations
export const REDIS_URL = process.env['REDIS_URL'] ?? '';
export const FLEETSCOPE_REDIS_PREFIX = getEnvString('FLEETSCOPE_REDIS_PREFIX', 'fleetscope:');
export const LOG_LEVEL = getEnvString('LOG_LEVEL', 'info');
export const LOG_FORMAT: 'text' | 'json' = getEnvString('LOG_FORMAT', 'text') === 'json' ? 'json' : 'text';
export const NODE_ENV = getEnvString('NODE_ENV', '');
export const HTTP_JSON_LIMIT = getEnvString('HTTP_JSON_LIMIT', '1mb');
export const SYSTEM_LABEL_OWNER = getEnvString('SYSTEM_LABEL_OWNER', 'GRR');
export const AUDIT_CHANNEL = getEnvString('AUDIT_CHANNEL', 'audit');
const SQLITE_PATH_RAW = getEnvString('SQLITE_PATH', path.resolve(process.cwd(), 'data/fleetscope.db'));
export const SQLITE_PATH = SQLITE_PATH_RAW === ':memory:' || path.isAbsolute(SQLITE_PATH_RAW)
  ? SQLITE_PATH_RAW
  : path.resolve(SQLITE_PATH_RAW);

// Storage selection
export const STORAGE_BACKEND = parseBackendKind(getEnvString('STORAGE_BACKEND', 'legacy'), 'STORAGE_BACKEND');
const MIRROR_STORAGE_BACKEND_RAW = getEnvString('MIRROR_STORAGE_BACKEND', '');
export const MIRROR_STORAGE_BACKEND: StorageBackendKind | null = MIRROR_STORAGE_BACKEND_RAW
  ? parseBackendKind(MIRROR_STORAGE_BACKEND_RAW, 'MIRROR_STORAGE_BACKEND')
  : null;

// Int configurations
export const PORT = getEnvInt('PORT', 3000);
export const LOAD_STATS_MAX_SAMPLES = getEnvInt('LOAD_STATS_MAX_SAMPLES', 100);

// Boolean configurations
export const USE_REDIS = REDIS_URL.trim().length > 0;
export const HTTP_ACCESS_LOG = getEnvBoolean('HTTP_ACCESS_LOG', true);
export const HTTP_TRUST_PROXY = getEnvBoolean('HTTP_TRUST_PROXY', false);

// Access policy
export const ADMIN_USERS = getEnvList('ADMIN_USERS');
export const SEARCH_LABELS_WHITELIST = getEnvList('SEARCH_LABELS_WHITELIST');
export const SEARCH_LABEL_OWNERS_WHITELIST = getEnvList('SEARCH_LABEL_OWNERS_WHITELIST');

// Time windows (milliseconds)
export const CLIENT_VERSIONS_LOOKBACK_MS = 3 * 60 * 1000;
export const LOAD_STATS_LOOKBACK_MS = 30 * 60 * 1000;

// Derived configurations
export const INSTANCE_ID = getEnvString('INSTANCE_ID', os.hostname() || 'unknown');
