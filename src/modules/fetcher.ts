/**
 * Page Fetcher
 * Renders an X profile with Playwright and returns the page HTML (no API key needed)
 */

import { errors as playwrightErrors, type BrowserContext } from 'playwright';
import { closeBrowser, getBrowser } from '../lib/browser.js';
import { errorMessage, FetchError, PageBlockedError, ProfileNotFoundError } from '../lib/errors.js';
import { scopedLogger } from '../lib/logger.js';
import type { FetchOptions, FetchResult, PageFetcher } from '../types/index.js';
import { SELECTORS, SITE_ORIGIN } from './selectors.js';

const log = scopedLogger('fetcher');

export const USER_AGENTS = [
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Safari/605.1.15',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0',
];

function pickUserAgent(): string {
    return USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
}

const NOT_FOUND_MARKERS = ["This account doesn't exist", "Hmm...this page doesn't exist"];
const SUSPENDED_MARKER = 'Account suspended';
const POST_WAIT_MS = 5000;

/**
 * Convert anything a fetch threw into a failed FetchResult, keeping not-found and
 * blocked distinguishable.
 */
export function fetchFailureFromError(error: unknown): FetchResult {
    if (error instanceof ProfileNotFoundError) {
        return { html: '', success: false, error: error.message, status: error.status, reason: 'not_found' };
    }
    if (error instanceof PageBlockedError) {
        return { html: '', success: false, error: error.message, status: error.status, reason: 'blocked' };
    }
    if (error instanceof FetchError) {
        return { html: '', success: false, error: error.message, status: error.status, reason: 'http' };
    }
    if (error instanceof playwrightErrors.TimeoutError) {
        return { html: '', success: false, error: `Timeout: ${error.message}`, reason: 'transport' };
    }
    if (error instanceof Error) {
        return { html: '', success: false, error: `Browser error: ${error.message}`, reason: 'transport' };
    }
    return { html: '', success: false, error: `Unexpected error: ${String(error)}`, reason: 'unknown' };
}

export class PlaywrightPageFetcher implements PageFetcher {
    async fetch(identity: string, options: FetchOptions): Promise<FetchResult> {
        const url = `${SITE_ORIGIN}/${identity}`;
        let context: BrowserContext | null = null;

        try {
            const browser = await getBrowser(options.headless);
            context = await browser.newContext({
                viewport: { width: 1920, height: 1080 },
                userAgent: options.userAgent ?? pickUserAgent(),
                ...(options.proxy ? { proxy: { server: options.proxy } } : {}),
            });
            const page = await context.newPage();

            log.debug(`Navigating to ${url}`, { proxy: options.proxy ?? null });
            const response = await page.goto(url, {
                waitUntil: 'domcontentloaded',
                timeout: options.timeoutMs,
            });

            if (!response) {
                return { html: '', success: false, error: 'No response received', reason: 'unknown' };
            }

            const status = response.status();
            if (status === 404) {
                return fetchFailureFromError(new ProfileNotFoundError(`Profile @${identity} not found`));
            }
            if (status === 403 || status === 429) {
                return fetchFailureFromError(new PageBlockedError(`Blocked or rate limited (HTTP ${status})`, status));
            }
            if (status >= 400) {
                return fetchFailureFromError(new FetchError(`HTTP ${status}`, status));
            }

            // Missing selectors are tolerated: the HTML may still be usable
            try {
                await page.waitForSelector(SELECTORS.primaryColumn, { timeout: options.timeoutMs });
            } catch (error) {
                log.debug(`Primary column did not render for @${identity}`, { error: errorMessage(error) });
            }
            try {
                await page.waitForSelector(SELECTORS.post, { timeout: POST_WAIT_MS });
            } catch (error) {
                log.debug(`No posts rendered for @${identity}`, { error: errorMessage(error) });
            }

            const html = await page.content();

            if (NOT_FOUND_MARKERS.some((marker) => html.includes(marker))) {
                return fetchFailureFromError(new ProfileNotFoundError(`Profile @${identity} not found`, status));
            }
            if (html.includes(SUSPENDED_MARKER)) {
                return fetchFailureFromError(new ProfileNotFoundError(`Profile @${identity} is suspended`, status));
            }

            return { html, success: true, status };
        } catch (error) {
            log.error(`Fetch failed for @${identity}:`, error);
            return fetchFailureFromError(error);
        } finally {
            if (context) {
                await context.close().catch((error: unknown) => {
                    log.warn('Failed to close browser context', { error: errorMessage(error) });
                });
            }
        }
    }

    async close(): Promise<void> {
        await closeBrowser();
    }
}
