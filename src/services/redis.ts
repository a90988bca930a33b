/**
 * Redis Service for the legacy hierarchical backend
 *
 * Uses configurable key prefix (default: 'fleetscope:') via FLEETSCOPE_REDIS_PREFIX env var for isolation.
 */

import { createClient } from 'redis';
import { logger } from '../utils/logger.js';
import { REDIS_URL, FLEETSCOPE_REDIS_PREFIX } from '../config.js';
import { StorageError } from '../types/errors.js';
import type { IKeyValueStore } from './key-value-store.js';
import { redisOperationDuration, redisOperations } from './metrics/redis-metrics.js';

type RedisClient = ReturnType<typeof createClient>;

export class RedisService implements IKeyValueStore {
    private client: RedisClient;
    private readonly prefix: string;
    private connected = false;
    private readonly redisUrl: string;

    constructor(redisUrl: string = REDIS_URL, prefix: string = FLEETSCOPE_REDIS_PREFIX) {
        this.redisUrl = redisUrl;
        this.prefix = prefix;

        logger.debug(`[RedisService] Initializing with REDIS_URL="${redisUrl}" and prefix="${this.prefix}"`);

        this.client = createClient({ url: redisUrl });

        this.client.on('error', (err: unknown) => {
            logger.error('Redis Client Error', err);
        });

        this.client.on('ready', () => {
            logger.info('Redis client ready');
            this.connected = true;
        });

        this.client.on('end', () => {
            logger.info('Redis connection closed');
            this.connected = false;
        });
    }

    async connect(): Promise<void> {
        if (this.connected) return;
        logger.info(`[RedisService] connecting to "${this.redisUrl}"`);
        try {
            await this.client.connect();
        } catch (error) {
            logger.error(`[RedisService] connect() failed for "${this.redisUrl}"`, error);
            throw error;
        }
    }

    async disconnect(): Promise<void> {
        if (this.connected) {
            await this.client.quit();
        }
    }

    private getKey(key: string): string {
        return `${this.prefix}${key}`;
    }

    private async run<T>(command: string, key: string, fn: () => Promise<T>): Promise<T> {
        const timer = redisOperationDuration.startTimer({ operation: command });
        try {
            const result = await fn();
            redisOperations.inc({ operation: command, status: 'success' });
            return result;
        } catch (error) {
            redisOperations.inc({ operation: command, status: 'error' });
            logger.error(`Redis ${command} error for key ${key}:`, error);
            throw new StorageError(`Redis ${command} failed for key ${key}`, { key }, { cause: error });
        } finally {
            timer();
        }
    }

    async get(key: string): Promise<string | null> {
        return this.run('GET', key, () => this.client.get(this.getKey(key)));
    }

    async set(key: string, value: string): Promise<void> {
        await this.run('SET', key, () => this.client.set(this.getKey(key), value));
    }

    async del(key: string): Promise<void> {
        await this.run('DEL', key, () => this.client.del(this.getKey(key)));
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
        const value = await this.run('HGET', hash, () => this.client.hGet(this.getKey(hash), field));
        return value ?? null;
    }

    async hset(hash: string, field: string, value: string): Promise<void> {
        await this.run('HSET', hash, () => this.client.hSet(this.getKey(hash), field, value));
    }

    async hdel(hash: string, fields: string[]): Promise<void> {
        if (fields.length === 0) return;
        await this.run('HDEL', hash, () => this.client.hDel(this.getKey(hash), fields));
    }

    async hgetall(hash: string): Promise<Record<string, string>> {
        return this.run('HGETALL', hash, () => this.client.hGetAll(this.getKey(hash)));
    }

    async exists(key: string): Promise<boolean> {
        const result = await this.run('EXISTS', key, () => this.client.exists(this.getKey(key)));
        return result === 1;
    }

    /**
     * Publish a message to a Redis channel (pub/sub)
     * Note: Channel names are NOT prefixed to allow cross-instance communication
     */
    async publish(channel: string, message: string): Promise<number> {
        const result = await this.run('PUBLISH', channel, () => this.client.publish(channel, message));
        logger.debug(`[RedisService] Published message to channel "${channel}", ${result} subscribers notified`);
        return result;
    }

    isConnected(): boolean {
        return this.connected;
    }
}
