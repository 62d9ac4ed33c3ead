/**
 * Scraper
 * Drives one scrape through cache lookup, page fetch, extraction, record building
 * and cache write, and runs batches sequentially with pacing between items.
 */

import { config, type Config } from '../config.js';
import { sleep } from '../lib/async.js';
import { createCacheStore, type CacheStore } from '../lib/cache.js';
import { errorMessage } from '../lib/errors.js';
import { scopedLogger } from '../lib/logger.js';
import { ProxyRotator } from '../lib/proxy-rotator.js';
import type { FetchResult, PageFetcher, ScrapeResult } from '../types/index.js';
import { ProfilePageExtractor } from './extractor.js';
import { fetchFailureFromError, PlaywrightPageFetcher } from './fetcher.js';
import { buildRecords } from './record-builder.js';

const log = scopedLogger('scraper');

export interface ScraperOptions {
    headless: boolean;
    timeoutMs: number;
    userAgent?: string;
    /** Default pause between batch items. */
    requestDelayMs: number;
}

export interface ScraperDependencies {
    fetcher?: PageFetcher;
    /** `null` disables caching; omitted means the configured backend. */
    cache?: CacheStore | null;
    proxies?: ProxyRotator | null;
    extractor?: ProfilePageExtractor;
}

export interface ScrapeOptions {
    forceRefresh?: boolean;
    headless?: boolean;
    timeoutMs?: number;
}

export interface BatchScrapeOptions {
    forceRefresh?: boolean;
    /** Pause between items; the scraper's requestDelayMs when omitted. */
    pacingMs?: number;
}

export function scraperOptionsFromConfig(source: Config = config): ScraperOptions {
    return {
        headless: source.XSCRAPE_HEADLESS,
        timeoutMs: source.XSCRAPE_BROWSER_TIMEOUT_MS,
        userAgent: source.XSCRAPE_USER_AGENT,
        requestDelayMs: source.XSCRAPE_REQUEST_DELAY_MS,
    };
}

/**
 * Reduce "@Name", "x.com/Name" or "https://twitter.com/Name" to "name".
 */
export function normalizeIdentity(input: string): string {
    let username = input.trim();

    if (username.includes('x.com/') || username.includes('twitter.com/')) {
        const match = username.match(/(?:x\.com|twitter\.com)\/@?([a-zA-Z0-9_]+)/);
        if (match) {
            username = match[1];
        }
    }

    return username.replace(/^@/, '').toLowerCase();
}

export class ProfileScraper {
    readonly options: ScraperOptions;
    private readonly fetcher: PageFetcher;
    private readonly cache: CacheStore | null;
    private readonly proxies: ProxyRotator | null;
    private readonly extractor: ProfilePageExtractor;
    private closed = false;

    constructor(options: ScraperOptions = scraperOptionsFromConfig(), deps: ScraperDependencies = {}) {
        this.options = options;
        this.fetcher = deps.fetcher ?? new PlaywrightPageFetcher();
        this.cache =
            deps.cache !== undefined
                ? deps.cache
                : createCacheStore({
                      backend: config.XSCRAPE_CACHE_BACKEND,
                      ttlSeconds: config.XSCRAPE_CACHE_TTL_SECONDS,
                      redisUrl: config.REDIS_URL,
                      sqlitePath: config.XSCRAPE_CACHE_PATH,
                  });
        this.proxies =
            deps.proxies !== undefined
                ? deps.proxies
                : new ProxyRotator(config.XSCRAPE_PROXY_URLS, config.XSCRAPE_PROXY_MODE);
        this.extractor = deps.extractor ?? new ProfilePageExtractor();
    }

    get cacheEnabled(): boolean {
        return this.cache !== null;
    }

    get proxyCount(): number {
        return this.proxies?.size ?? 0;
    }

    /**
     * Scrape one profile. Fetch and extraction problems come back as an unsuccessful
     * result; only cache storage errors are thrown.
     */
    async scrape(identity: string, options: ScrapeOptions = {}): Promise<ScrapeResult> {
        const username = normalizeIdentity(identity);
        const forceRefresh = options.forceRefresh ?? false;
        const started = Date.now();

        if (!username) {
            return this.failedResult(username, started, { html: '', success: false, error: 'Identity must not be empty', reason: 'unknown' });
        }

        log.info('scrape_start', { username, forceRefresh });

        if (this.cache && !forceRefresh) {
            const cached = await this.cache.get(username);
            if (cached) {
                log.info('cache_hit', { username, ageSeconds: cached.cacheAgeSeconds });
                return cached;
            }
        }

        const fetched = await this.fetchPage(username, options);
        if (!fetched.success) {
            log.error('fetch_failed', { username, error: fetched.error, reason: fetched.reason });
            return this.failedResult(username, started, fetched);
        }

        const result = this.buildResult(username, fetched.html, started);

        log.info('scrape_complete', {
            username,
            success: result.success,
            posts: result.posts.length,
            durationMs: result.durationMs,
        });

        if (this.cache && result.success) {
            await this.cache.set(username, result);
            log.debug('cache_write', { username });
        }

        return result;
    }

    /**
     * Scrape identities one after another, in input order. The result list always has
     * one entry per input, failures included.
     */
    async scrapeMany(identities: readonly string[], options: BatchScrapeOptions = {}): Promise<ScrapeResult[]> {
        const pacingMs = options.pacingMs ?? this.options.requestDelayMs;
        const results: ScrapeResult[] = [];

        for (const [index, identity] of identities.entries()) {
            results.push(await this.scrape(identity, { forceRefresh: options.forceRefresh }));

            if (pacingMs > 0 && index < identities.length - 1) {
                await sleep(pacingMs);
            }
        }

        return results;
    }

    async invalidateCache(identity: string): Promise<void> {
        if (this.cache) {
            await this.cache.invalidate(normalizeIdentity(identity));
        }
    }

    async clearCache(): Promise<void> {
        if (this.cache) {
            await this.cache.clear();
        }
    }

    /**
     * Release the cache connection and the browser. Safe to call more than once.
     */
    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;

        try {
            await this.cache?.close();
        } finally {
            await this.fetcher.close?.();
        }
    }

    private async fetchPage(username: string, options: ScrapeOptions): Promise<FetchResult> {
        try {
            return await this.fetcher.fetch(username, {
                headless: options.headless ?? this.options.headless,
                timeoutMs: options.timeoutMs ?? this.options.timeoutMs,
                userAgent: this.options.userAgent,
                proxy: this.proxies?.next(),
            });
        } catch (error) {
            return fetchFailureFromError(error);
        }
    }

    private buildResult(username: string, html: string, started: number): ScrapeResult {
        const fetchedAt = new Date();
        try {
            const outcome = this.extractor.extract(html, username);
            const built = buildRecords(outcome, username, fetchedAt);
            const completed = new Date();

            return {
                success: built.success,
                username,
                profile: built.profile,
                posts: built.posts,
                cached: false,
                cacheAgeSeconds: null,
                errorMessage: built.errors.length > 0 ? built.errors.join('; ') : null,
                failureReason: null,
                scrapedAt: completed,
                durationMs: completed.getTime() - started,
            };
        } catch (error) {
            log.error(`Extraction crashed for @${username}:`, error);
            const completed = new Date();
            return {
                success: false,
                username,
                profile: null,
                posts: [],
                cached: false,
                cacheAgeSeconds: null,
                errorMessage: `Extraction error: ${errorMessage(error)}`,
                failureReason: null,
                scrapedAt: completed,
                durationMs: completed.getTime() - started,
            };
        }
    }

    private failedResult(username: string, started: number, fetched: FetchResult): ScrapeResult {
        const completed = new Date();
        return {
            success: false,
            username,
            profile: null,
            posts: [],
            cached: false,
            cacheAgeSeconds: null,
            errorMessage: fetched.error ?? 'Fetch failed',
            failureReason: fetched.reason ?? 'unknown',
            scrapedAt: completed,
            durationMs: completed.getTime() - started,
        };
    }
}

/**
 * Run `fn` with a scraper that is closed on every exit path.
 */
export async function withScraper<T>(
    fn: (scraper: ProfileScraper) => Promise<T>,
    options?: ScraperOptions,
    deps?: ScraperDependencies
): Promise<T> {
    const scraper = new ProfileScraper(options, deps);
    try {
        return await fn(scraper);
    } finally {
        await scraper.close();
    }
}
