import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { scopedLogger } from '../../lib/logger.js';
import type { ProfileScraper } from '../../modules/scraper.js';
import type { ScrapeResult } from '../../types/index.js';

const log = scopedLogger('api');

// Input validation schemas
const usernameSchema = z.string().trim().min(1).max(50).regex(/^@?[a-zA-Z0-9_]+$/);

const scrapeOptionsSchema = z
    .object({
        forceRefresh: z.boolean().optional(),
        headless: z.boolean().optional(),
        timeoutMs: z.number().int().min(1000).max(120000).optional(),
    })
    .strict();

const scrapeBodySchema = z.object({
    username: usernameSchema,
    options: scrapeOptionsSchema.optional(),
});

const batchBodySchema = z.object({
    usernames: z.array(usernameSchema).min(1).max(10),
    options: z.object({ forceRefresh: z.boolean().optional() }).strict().optional(),
    delayMs: z.number().int().min(0).max(10000).optional(),
});

const forceQuerySchema = z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => value === 'true' || value === '1');

function sendValidationError(res: Response, error: z.ZodError): void {
    res.status(400).json({
        success: false,
        error: 'Invalid request',
        details: error.issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`),
    });
}

/**
 * HTTP status for a single scrape. Failures without a fetch reason came from
 * extraction and are still reported with 200.
 */
export function statusForResult(result: ScrapeResult): number {
    if (result.success) return 200;
    switch (result.failureReason) {
        case 'not_found':
            return 404;
        case 'blocked':
            return 429;
        case 'http':
        case 'transport':
        case 'unknown':
            return 502;
        case null:
            return 200;
    }
}

export function createScrapeRouter(scraper: ProfileScraper): Router {
    const router = Router();

    /**
     * GET /api/config
     * Effective scraper settings
     */
    router.get('/config', (_req: Request, res: Response) => {
        res.json({
            headless: scraper.options.headless,
            timeoutMs: scraper.options.timeoutMs,
            requestDelayMs: scraper.options.requestDelayMs,
            cacheEnabled: scraper.cacheEnabled,
            proxyCount: scraper.proxyCount,
        });
    });

    /**
     * GET /api/scrape/:username?force=true
     */
    router.get('/scrape/:username', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const username = usernameSchema.safeParse(req.params.username);
            if (!username.success) {
                sendValidationError(res, username.error);
                return;
            }
            const force = forceQuerySchema.safeParse(req.query.force);
            if (!force.success) {
                sendValidationError(res, force.error);
                return;
            }

            const result = await scraper.scrape(username.data, { forceRefresh: force.data });
            res.status(statusForResult(result)).json(result);
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /api/scrape
     * Body: { username, options?: { forceRefresh, headless, timeoutMs } }
     */
    router.post('/scrape', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const body = scrapeBodySchema.safeParse(req.body);
            if (!body.success) {
                sendValidationError(res, body.error);
                return;
            }

            const result = await scraper.scrape(body.data.username, body.data.options);
            res.status(statusForResult(result)).json(result);
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /api/scrape/batch
     * Body: { usernames: string[1..10], options?: { forceRefresh }, delayMs? }
     */
    router.post('/scrape/batch', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const body = batchBodySchema.safeParse(req.body);
            if (!body.success) {
                sendValidationError(res, body.error);
                return;
            }

            log.info(`Batch scrape of ${body.data.usernames.length} profiles`);
            const results = await scraper.scrapeMany(body.data.usernames, {
                forceRefresh: body.data.options?.forceRefresh,
                pacingMs: body.data.delayMs,
            });
            const successful = results.filter((result) => result.success).length;

            res.json({
                total: results.length,
                successful,
                failed: results.length - successful,
                results,
            });
        } catch (error) {
            next(error);
        }
    });

    /**
     * DELETE /api/cache/:username
     */
    router.delete('/cache/:username', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const username = usernameSchema.safeParse(req.params.username);
            if (!username.success) {
                sendValidationError(res, username.error);
                return;
            }

            await scraper.invalidateCache(username.data);
            res.json({ success: true, message: `Cache invalidated for ${username.data}` });
        } catch (error) {
            next(error);
        }
    });

    /**
     * DELETE /api/cache
     */
    router.delete('/cache', async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            await scraper.clearCache();
            res.json({ success: true, message: 'Cache cleared' });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
