/**
 * Error hierarchy shared by the scraper pipeline
 */

export type ScraperErrorCode =
    | 'FETCH_FAILED'
    | 'PROFILE_NOT_FOUND'
    | 'PAGE_BLOCKED'
    | 'EXTRACTION_FAILED'
    | 'CACHE_FAILED'
    | 'INVALID_CONFIG';

export class ScraperError extends Error {
    readonly code: ScraperErrorCode;

    constructor(message: string, code: ScraperErrorCode, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export class FetchError extends ScraperError {
    readonly status: number | undefined;

    constructor(message: string, status?: number, options?: { cause?: unknown }, code: ScraperErrorCode = 'FETCH_FAILED') {
        super(message, code, options);
        this.status = status;
    }
}

/** Profile does not exist or is suspended (maps to HTTP 404). */
export class ProfileNotFoundError extends FetchError {
    constructor(message: string, status = 404) {
        super(message, status, undefined, 'PROFILE_NOT_FOUND');
    }
}

/** Bot wall or rate limit (HTTP 403 / 429). */
export class PageBlockedError extends FetchError {
    constructor(message: string, status?: number) {
        super(message, status, undefined, 'PAGE_BLOCKED');
    }
}

export class ExtractionError extends ScraperError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'EXTRACTION_FAILED', options);
    }
}

export class CacheError extends ScraperError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'CACHE_FAILED', options);
    }
}

export class ConfigError extends ScraperError {
    constructor(message: string) {
        super(message, 'INVALID_CONFIG');
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
