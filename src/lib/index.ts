export { logger, scopedLogger } from './logger.js';
export * from './errors.js';
export * from './cache.js';
export { ProxyRotator } from './proxy-rotator.js';
export { getBrowser, closeBrowser } from './browser.js';
export { createApiRateLimiter, type ApiRateLimiterOptions } from './rate-limiter.js';
export { sleep } from './async.js';
