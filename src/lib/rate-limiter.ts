import rateLimit from 'express-rate-limit';
import RedisStore, { type RedisReply } from 'rate-limit-redis';
import { Redis } from 'ioredis';
import type { Request, RequestHandler, Response } from 'express';
import { logger } from './logger.js';

export interface ApiRateLimiterOptions {
    windowMs: number;
    max: number;
    /** Shares counters through redis when set; otherwise each process counts in memory. */
    redisUrl?: string;
}

type ReplyData = boolean | number | string;

function isReplyData(value: unknown): value is ReplyData {
    return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function toRedisReply(value: unknown): RedisReply {
    if (isReplyData(value)) return value;
    if (Array.isArray(value) && value.every(isReplyData)) return value;
    throw new Error(`Unexpected redis reply of type ${typeof value}`);
}

function createRedisStore(url: string): RedisStore {
    const client = new Redis(url, {
        maxRetriesPerRequest: 1,
        // Retry strategy: stop retrying after a few attempts if it fails
        retryStrategy: (times) => {
            if (times > 3) {
                logger.warn('Redis connection failed too many times, disabling Redis rate limiting');
                return null;
            }
            return Math.min(times * 50, 2000);
        },
    });

    client.on('error', (err: Error) => {
        logger.debug('Rate limiter Redis error:', err.message);
    });

    return new RedisStore({
        sendCommand: async (command: string, ...args: string[]) => toRedisReply(await client.call(command, ...args)),
        prefix: 'rl:api:',
    });
}

/**
 * Rate limiter for the scrape API. Health checks are never limited.
 */
export function createApiRateLimiter(options: ApiRateLimiterOptions): RequestHandler {
    if (!options.redisUrl) {
        logger.info('No REDIS_URL found, using memory store for rate limiting');
    }

    return rateLimit({
        windowMs: options.windowMs,
        limit: options.max,
        standardHeaders: true,
        legacyHeaders: false,
        store: options.redisUrl ? createRedisStore(options.redisUrl) : undefined,
        handler: (_req: Request, res: Response) => {
            res.status(429).json({
                success: false,
                error: 'Too many requests. Please wait before scraping more profiles.',
                retryAfter: Math.ceil(options.windowMs / 1000),
            });
        },
        skip: (req: Request) => req.path === '/health',
    });
}
