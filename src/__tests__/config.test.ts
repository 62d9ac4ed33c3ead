import { describe, expect, it } from 'vitest';
import { loadConfig } from '../config.js';
import { ConfigError } from '../lib/errors.js';
import { scraperOptionsFromConfig } from '../modules/scraper.js';

describe('loadConfig', () => {
    it('applies defaults', () => {
        const config = loadConfig({});

        expect(config).toMatchObject({
            XSCRAPE_HEADLESS: true,
            XSCRAPE_BROWSER_TIMEOUT_MS: 30000,
            XSCRAPE_PROXY_MODE: 'none',
            XSCRAPE_PROXY_URLS: [],
            XSCRAPE_REQUEST_DELAY_MS: 1000,
            XSCRAPE_CACHE_BACKEND: 'sqlite',
            XSCRAPE_CACHE_TTL_SECONDS: 300,
            XSCRAPE_CACHE_PATH: '.xscrape_cache.db',
            REDIS_URL: 'redis://localhost:6379',
            NODE_ENV: 'development',
        });
        expect(config.XSCRAPE_USER_AGENT).toBeUndefined();
    });

    it('parses booleans, lists and numbers', () => {
        const config = loadConfig({
            XSCRAPE_HEADLESS: 'false',
            XSCRAPE_PROXY_MODE: 'round_robin',
            XSCRAPE_PROXY_URLS: 'http://proxy-a:8080, http://proxy-b:8080,,',
            XSCRAPE_REQUEST_DELAY_MS: '2500',
            XSCRAPE_CACHE_BACKEND: 'redis',
        });

        expect(config.XSCRAPE_HEADLESS).toBe(false);
        expect(config.XSCRAPE_PROXY_URLS).toEqual(['http://proxy-a:8080', 'http://proxy-b:8080']);
        expect(config.XSCRAPE_REQUEST_DELAY_MS).toBe(2500);
        expect(config.XSCRAPE_CACHE_BACKEND).toBe('redis');
    });

    it('rejects invalid values with a ConfigError', () => {
        expect(() => loadConfig({ XSCRAPE_CACHE_BACKEND: 'disk' })).toThrow(ConfigError);
        expect(() => loadConfig({ XSCRAPE_BROWSER_TIMEOUT_MS: '-5' })).toThrow(/XSCRAPE_BROWSER_TIMEOUT_MS/);
    });

    it('maps onto scraper options', () => {
        const options = scraperOptionsFromConfig(
            loadConfig({ XSCRAPE_HEADLESS: 'no', XSCRAPE_BROWSER_TIMEOUT_MS: '15000', XSCRAPE_USER_AGENT: 'test-agent' })
        );

        expect(options).toEqual({
            headless: false,
            timeoutMs: 15000,
            userAgent: 'test-agent',
            requestDelayMs: 1000,
        });
    });
});
