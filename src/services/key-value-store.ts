/**
 * Key-value store abstraction behind the legacy hierarchical backend,
 * flow bookkeeping and audit pub/sub.
 * Implementations: Redis (production) or in-memory (dev/tests without Redis).
 *
 * Failures are raised as StorageError; nothing is swallowed.
 */
export interface IKeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  del(key: string): Promise<void>;
  getJson<T>(key: string): Promise<T | null>;
  setJson<T>(key: string, value: T): Promise<void>;
  hget(hash: string, field: string): Promise<string | null>;
  hset(hash: string, field: string, value: string): Promise<void>;
  hdel(hash: string, fields: string[]): Promise<void>;
  /** Empty object when the hash does not exist. */
  hgetall(hash: string): Promise<Record<string, string>>;
  exists(key: string): Promise<boolean>;
  publish(channel: string, message: string): Promise<number>;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
}
