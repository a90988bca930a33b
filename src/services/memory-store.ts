/**
 * In-memory key-value store for dev/simple setups without Redis.
 * Same key prefix as RedisService.
 * publish() delivers to in-process subscribers only; no cross-process fan-out.
 */

import { logger } from '../utils/logger.js';
import { FLEETSCOPE_REDIS_PREFIX } from '../config.js';
import type { IKeyValueStore } from './key-value-store.js';

type Subscriber = (message: string) => void;

export class MemoryStore implements IKeyValueStore {
  private readonly strings = new Map<string, string>();
  private readonly hashes = new Map<string, Map<string, string>>();
  private readonly subscribers = new Map<string, Subscriber[]>();
  private connected = true;

  constructor(private readonly prefix: string = FLEETSCOPE_REDIS_PREFIX) {
    logger.debug(`[MemoryStore] Initializing with prefix="${this.prefix}" (no Redis)`);
  }

  private getKey(key: string): string {
    return `${this.prefix}${key}`;
  }

  async get(key: string): Promise<string | null> {
    return this.strings.get(this.getKey(key)) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.strings.set(this.getKey(key), value);
  }

  async del(key: string): Promise<void> {
    const k = this.getKey(key);
    this.strings.delete(k);
    this.hashes.delete(k);
  }

  async getJson<T>(key: string): Promise<T | null> {
    const value = await this.get(key);
    if (value === null) return null;
    return JSON.parse(value) as T;
  }

  async setJson<T>(key: string, value: T): Promise<void> {
    await this.set(key, JSON.stringify(value));
  }

  async hget(hash: string, field: string): Promise<string | null> {
    return this.hashes.get(this.getKey(hash))?.get(field) ?? null;
  }

  async hset(hash: string, field: string, value: string): Promise<void> {
    const k = this.getKey(hash);
    let h = this.hashes.get(k);
    if (!h) {
      h = new Map();
      this.hashes.set(k, h);
    }
    h.set(field, value);
  }

  async hdel(hash: string, fields: string[]): Promise<void> {
    const k = this.getKey(hash);
    const h = this.hashes.get(k);
    if (!h) return;
    for (const field of fields) h.delete(field);
    // Redis drops a hash once its last field is gone
    if (h.size === 0) this.hashes.delete(k);
  }

  async hgetall(hash: string): Promise<Record<string, string>> {
    const out: Record<string, string> = {};
    this.hashes.get(this.getKey(hash))?.forEach((v, f) => {
      out[f] = v;
    });
    return out;
  }

  async exists(key: string): Promise<boolean> {
    const k = this.getKey(key);
    return this.strings.has(k) || this.hashes.has(k);
  }

  async publish(channel: string, message: string): Promise<number> {
    const handlers = this.subscribers.get(channel) ?? [];
    handlers.forEach(handler => handler(message));
    return handlers.length;
  }

  /** In-process counterpart of a Redis SUBSCRIBE. */
  subscribe(channel: string, handler: Subscriber): void {
    const handlers = this.subscribers.get(channel) ?? [];
    handlers.push(handler);
    this.subscribers.set(channel, handlers);
  }

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }
}
