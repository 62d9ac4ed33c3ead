import express, { type Express, type Request, type Response, type NextFunction, type RequestHandler } from 'express';
import { config } from '../config.js';
import { errorMessage } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { createApiRateLimiter } from '../lib/rate-limiter.js';
import type { ProfileScraper } from '../modules/scraper.js';
import { createScrapeRouter } from './routes/scrape.js';

export interface ServerOptions {
    scraper: ProfileScraper;
    /** Defaults to a limiter built from config. */
    rateLimiter?: RequestHandler;
    /** Hide error messages from 500 responses. */
    hideErrors?: boolean;
}

export function createServer(options: ServerOptions): Express {
    const app = express();
    const hideErrors = options.hideErrors ?? config.NODE_ENV === 'production';
    const rateLimiter =
        options.rateLimiter ??
        createApiRateLimiter({
            windowMs: config.RATE_LIMIT_WINDOW_MS,
            max: config.RATE_LIMIT_MAX_REQUESTS,
            redisUrl: process.env.REDIS_URL ? config.REDIS_URL : undefined,
        });

    // Middleware
    app.use(express.json());

    // Request logging
    app.use((req: Request, _res: Response, next: NextFunction) => {
        logger.debug(`${req.method} ${req.path}`, {
            query: req.query,
            ip: req.ip,
        });
        next();
    });

    // Health check (no rate limit)
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'healthy',
            timestamp: new Date().toISOString(),
            version: '1.0.0',
        });
    });

    // API routes with rate limiting
    app.use('/api', rateLimiter, createScrapeRouter(options.scraper));

    // 404 handler
    app.use((_req: Request, res: Response) => {
        res.status(404).json({
            success: false,
            error: 'Endpoint not found',
        });
    });

    // Error handler
    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        // Malformed JSON body
        if (err instanceof SyntaxError) {
            res.status(400).json({ success: false, error: 'Invalid JSON body' });
            return;
        }

        logger.error('Unhandled error:', err);
        res.status(500).json({
            success: false,
            error: hideErrors ? 'Internal server error' : errorMessage(err),
        });
    });

    return app;
}
