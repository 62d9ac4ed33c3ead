import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { Redis } from 'ioredis';
import { z } from 'zod';
import type { CacheBackend } from '../config.js';
import { ScrapeResultSchema, type ScrapeResult } from '../types/index.js';
import { CacheError, errorMessage } from './errors.js';
import { logger } from './logger.js';

/**
 * Scrape result cache. Keys are folded to lowercase; a hit comes back
 * marked `cached: true` with its age in seconds.
 */
export interface CacheStore {
    get(key: string): Promise<ScrapeResult | null>;
    set(key: string, result: ScrapeResult, ttlSeconds?: number): Promise<void>;
    invalidate(key: string): Promise<void>;
    clear(): Promise<void>;
    close(): Promise<void>;
}

const envelopeSchema = z.object({
    result: ScrapeResultSchema,
    createdAt: z.number(),
    expiresAt: z.number(),
});

function normalizeKey(key: string): string {
    return key.trim().toLowerCase();
}

function asCacheHit(result: ScrapeResult, createdAt: number, now: number): ScrapeResult {
    return {
        ...result,
        cached: true,
        cacheAgeSeconds: Math.max(0, (now - createdAt) / 1000),
    };
}

function encodeEntry(result: ScrapeResult, createdAt: number, ttlSeconds: number): string {
    return JSON.stringify({ result, createdAt, expiresAt: createdAt + ttlSeconds * 1000 });
}

/**
 * Decoded entry, or null when the payload is not a valid envelope.
 */
function decodeEntry(payload: string): z.infer<typeof envelopeSchema> | null {
    try {
        const parsed = envelopeSchema.safeParse(JSON.parse(payload));
        return parsed.success ? parsed.data : null;
    } catch {
        return null;
    }
}

/**
 * In-process store. Entries are kept serialized so every hit is an independent copy.
 * Every write also drops the entries that have expired since the last one.
 */
export class MemoryCacheStore implements CacheStore {
    private entries = new Map<string, string>();
    private readonly defaultTtlSeconds: number;
    private readonly now: () => number;

    constructor(defaultTtlSeconds = 300, now: () => number = Date.now) {
        this.defaultTtlSeconds = defaultTtlSeconds;
        this.now = now;
    }

    async get(key: string): Promise<ScrapeResult | null> {
        const payload = this.entries.get(normalizeKey(key));
        if (payload === undefined) return null;

        const entry = decodeEntry(payload);
        const now = this.now();
        if (!entry || entry.expiresAt <= now) {
            this.entries.delete(normalizeKey(key));
            return null;
        }
        return asCacheHit(entry.result, entry.createdAt, now);
    }

    async set(key: string, result: ScrapeResult, ttlSeconds?: number): Promise<void> {
        const ttl = ttlSeconds ?? this.defaultTtlSeconds;
        // Encode before touching the map so a failed encode leaves the old entry intact
        const now = this.now();
        const payload = encodeEntry(result, now, ttl);
        this.sweep(now);
        this.entries.set(normalizeKey(key), payload);
    }

    async invalidate(key: string): Promise<void> {
        this.entries.delete(normalizeKey(key));
    }

    async clear(): Promise<void> {
        this.entries.clear();
    }

    /**
     * Drop expired entries. Returns how many were removed.
     */
    async cleanupExpired(): Promise<number> {
        return this.sweep(this.now());
    }

    private sweep(now: number): number {
        let removed = 0;
        for (const [key, payload] of this.entries) {
            const entry = decodeEntry(payload);
            if (!entry || entry.expiresAt <= now) {
                this.entries.delete(key);
                removed++;
            }
        }
        return removed;
    }

    get size(): number {
        return this.entries.size;
    }

    async close(): Promise<void> {
        this.entries.clear();
    }
}

/**
 * The ioredis commands the redis store relies on.
 */
export interface RedisCommands {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, millisecondsToken: 'PX', milliseconds: number): Promise<unknown>;
    del(...keys: string[]): Promise<number>;
    scan(cursor: string, patternToken: 'MATCH', pattern: string, countToken: 'COUNT', count: number): Promise<[string, string[]]>;
    quit(): Promise<unknown>;
}

export interface RedisCacheOptions {
    url: string;
    defaultTtlSeconds?: number;
    keyPrefix?: string;
    clientFactory?: (url: string) => RedisCommands;
    now?: () => number;
}

export function createRedisClient(url: string): RedisCommands {
    const redis = new Redis(url, {
        lazyConnect: true,
        retryStrategy: (times: number) => {
            if (times > 3) {
                logger.warn('Redis connection failed, giving up');
                return null;
            }
            return Math.min(times * 200, 2000);
        },
        maxRetriesPerRequest: 3,
    });

    redis.on('connect', () => {
        logger.info('✅ Connected to Redis');
    });

    redis.on('error', (err: Error) => {
        logger.error('Redis error:', err);
    });

    return redis;
}

/**
 * Redis store. Each entry is one JSON value written by a single `SET ... PX`,
 * so readers see either the old entry or the new one. The connection opens on first use.
 */
export class RedisCacheStore implements CacheStore {
    private client: RedisCommands | null = null;
    private readonly url: string;
    private readonly defaultTtlSeconds: number;
    private readonly keyPrefix: string;
    private readonly clientFactory: (url: string) => RedisCommands;
    private readonly now: () => number;

    constructor(options: RedisCacheOptions) {
        this.url = options.url;
        this.defaultTtlSeconds = options.defaultTtlSeconds ?? 300;
        this.keyPrefix = options.keyPrefix ?? 'xscrape:';
        this.clientFactory = options.clientFactory ?? createRedisClient;
        this.now = options.now ?? Date.now;
    }

    private redis(): RedisCommands {
        if (!this.client) {
            this.client = this.clientFactory(this.url);
        }
        return this.client;
    }

    private generateKey(key: string): string {
        return `${this.keyPrefix}${normalizeKey(key)}`;
    }

    private async run<T>(operation: string, fn: (redis: RedisCommands) => Promise<T>): Promise<T> {
        try {
            return await fn(this.redis());
        } catch (error) {
            throw new CacheError(`Cache ${operation} failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    async get(key: string): Promise<ScrapeResult | null> {
        const redisKey = this.generateKey(key);
        const payload = await this.run('get', (redis) => redis.get(redisKey));
        if (payload === null) return null;

        const entry = decodeEntry(payload);
        if (!entry) {
            logger.warn(`Discarding unreadable cache entry: ${redisKey}`);
            await this.run('invalidate', (redis) => redis.del(redisKey));
            return null;
        }

        const now = this.now();
        if (entry.expiresAt <= now) return null;

        logger.debug(`Cache hit: ${redisKey}`);
        return asCacheHit(entry.result, entry.createdAt, now);
    }

    async set(key: string, result: ScrapeResult, ttlSeconds?: number): Promise<void> {
        const redisKey = this.generateKey(key);
        const ttl = ttlSeconds ?? this.defaultTtlSeconds;

        // Redis rejects a zero expiry; an entry that expires immediately is simply absent
        if (ttl <= 0) {
            await this.run('set', (redis) => redis.del(redisKey));
            return;
        }

        const payload = encodeEntry(result, this.now(), ttl);
        await this.run('set', (redis) => redis.set(redisKey, payload, 'PX', Math.ceil(ttl * 1000)));
        logger.debug(`Cache set: ${redisKey} (TTL: ${ttl}s)`);
    }

    async invalidate(key: string): Promise<void> {
        const redisKey = this.generateKey(key);
        await this.run('invalidate', (redis) => redis.del(redisKey));
        logger.debug(`Cache delete: ${redisKey}`);
    }

    async clear(): Promise<void> {
        await this.run('clear', async (redis) => {
            let cursor = '0';
            do {
                const [next, keys] = await redis.scan(cursor, 'MATCH', `${this.keyPrefix}*`, 'COUNT', 100);
                if (keys.length > 0) await redis.del(...keys);
                cursor = next;
            } while (cursor !== '0');
        });
    }

    async close(): Promise<void> {
        const client = this.client;
        this.client = null;
        if (client) {
            await client.quit();
        }
    }
}

export interface SqliteCacheOptions {
    path: string;
    defaultTtlSeconds?: number;
    now?: () => number;
}

const SQLITE_SCHEMA = `
    CREATE TABLE IF NOT EXISTS cache_entries (
        key TEXT PRIMARY KEY,
        payload TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        expires_at INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_cache_entries_expires ON cache_entries(expires_at);
`;

const SQLITE_UPSERT = `
    INSERT INTO cache_entries (key, payload, created_at, expires_at) VALUES (?, ?, ?, ?)
    ON CONFLICT(key) DO UPDATE SET
        payload = excluded.payload,
        created_at = excluded.created_at,
        expires_at = excluded.expires_at
`;

/**
 * File-backed store, one row per key; entries outlive the process.
 * The database opens on first use and its parent directory is created if missing.
 */
export class SqliteCacheStore implements CacheStore {
    private db: Database.Database | null = null;
    private readonly path: string;
    private readonly defaultTtlSeconds: number;
    private readonly now: () => number;

    constructor(options: SqliteCacheOptions) {
        this.path = options.path;
        this.defaultTtlSeconds = options.defaultTtlSeconds ?? 300;
        this.now = options.now ?? Date.now;
    }

    private database(): Database.Database {
        if (!this.db) {
            if (this.path !== ':memory:') {
                mkdirSync(dirname(this.path), { recursive: true });
            }
            const db = new Database(this.path);
            db.exec(SQLITE_SCHEMA);
            this.db = db;
            logger.debug(`Opened cache database: ${this.path}`);
        }
        return this.db;
    }

    private async run<T>(operation: string, fn: (db: Database.Database) => T): Promise<T> {
        try {
            return fn(this.database());
        } catch (error) {
            throw new CacheError(`Cache ${operation} failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    async get(key: string): Promise<ScrapeResult | null> {
        const cacheKey = normalizeKey(key);
        const payload = await this.run('get', (db) =>
            db.prepare('SELECT payload FROM cache_entries WHERE key = ?').pluck().get(cacheKey)
        );
        if (typeof payload !== 'string') return null;

        const entry = decodeEntry(payload);
        const now = this.now();
        if (!entry || entry.expiresAt <= now) {
            if (!entry) logger.warn(`Discarding unreadable cache entry: ${cacheKey}`);
            await this.invalidate(cacheKey);
            return null;
        }

        logger.debug(`Cache hit: ${cacheKey}`);
        return asCacheHit(entry.result, entry.createdAt, now);
    }

    async set(key: string, result: ScrapeResult, ttlSeconds?: number): Promise<void> {
        const cacheKey = normalizeKey(key);
        const ttl = ttlSeconds ?? this.defaultTtlSeconds;
        const createdAt = this.now();
        const payload = encodeEntry(result, createdAt, ttl);
        const expiresAt = createdAt + ttl * 1000;

        await this.run('set', (db) => {
            db.prepare('DELETE FROM cache_entries WHERE expires_at <= ?').run(createdAt);
            db.prepare(SQLITE_UPSERT).run(cacheKey, payload, createdAt, expiresAt);
        });
        logger.debug(`Cache set: ${cacheKey} (TTL: ${ttl}s)`);
    }

    async invalidate(key: string): Promise<void> {
        const cacheKey = normalizeKey(key);
        await this.run('invalidate', (db) => db.prepare('DELETE FROM cache_entries WHERE key = ?').run(cacheKey));
    }

    async clear(): Promise<void> {
        await this.run('clear', (db) => db.prepare('DELETE FROM cache_entries').run());
    }

    /**
     * Drop expired rows. Returns how many were removed.
     */
    async cleanupExpired(): Promise<number> {
        const now = this.now();
        const outcome = await this.run('cleanup', (db) =>
            db.prepare('DELETE FROM cache_entries WHERE expires_at <= ?').run(now)
        );
        return outcome.changes;
    }

    async close(): Promise<void> {
        const db = this.db;
        this.db = null;
        db?.close();
    }
}

export interface CacheStoreOptions {
    backend: CacheBackend;
    ttlSeconds: number;
    redisUrl: string;
    sqlitePath: string;
}

/**
 * Store for the configured backend, or null when caching is off.
 */
export function createCacheStore(options: CacheStoreOptions): CacheStore | null {
    switch (options.backend) {
        case 'sqlite':
            return new SqliteCacheStore({ path: options.sqlitePath, defaultTtlSeconds: options.ttlSeconds });
        case 'redis':
            return new RedisCacheStore({ url: options.redisUrl, defaultTtlSeconds: options.ttlSeconds });
        case 'memory':
            return new MemoryCacheStore(options.ttlSeconds);
        case 'none':
            return null;
    }
}
