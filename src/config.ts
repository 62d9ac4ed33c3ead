import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigError } from './lib/errors.js';

dotenv.config();

const FALSY_VALUES = new Set(['false', '0', 'no', 'off']);

function envBoolean(defaultValue: boolean) {
    return z
        .string()
        .optional()
        .transform((value) => (value === undefined || value.trim() === '' ? defaultValue : !FALSY_VALUES.has(value.trim().toLowerCase())));
}

const envList = z
    .string()
    .optional()
    .transform((value) =>
        (value ?? '')
            .split(',')
            .map((item) => item.trim())
            .filter((item) => item.length > 0)
    );

const envSchema = z.object({
    // Browser
    XSCRAPE_HEADLESS: envBoolean(true),
    XSCRAPE_BROWSER_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    XSCRAPE_USER_AGENT: z.string().min(1).optional(),

    // Proxies
    XSCRAPE_PROXY_MODE: z.enum(['round_robin', 'random', 'none']).default('none'),
    XSCRAPE_PROXY_URLS: envList,

    // Batch pacing
    XSCRAPE_REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),

    // Cache
    XSCRAPE_CACHE_BACKEND: z.enum(['sqlite', 'redis', 'memory', 'none']).default('sqlite'),
    XSCRAPE_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(300),
    XSCRAPE_CACHE_PATH: z.string().min(1).default('.xscrape_cache.db'),
    REDIS_URL: z.string().default('redis://localhost:6379'),

    // Rate Limiting
    RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60000),
    RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(10),

    // Server
    API_PORT: z.coerce.number().default(Number(process.env.PORT) || 3000),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).optional(),
});

export type Config = z.infer<typeof envSchema>;
export type ProxyMode = Config['XSCRAPE_PROXY_MODE'];
export type CacheBackend = Config['XSCRAPE_CACHE_BACKEND'];

/**
 * Parse an environment map into a validated config.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv): Config {
    const parseResult = envSchema.safeParse(env);
    if (!parseResult.success) {
        const issues = parseResult.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(`Invalid environment variables: ${issues.join('; ')}`);
    }
    return parseResult.data;
}

function loadProcessConfig(): Config {
    try {
        return loadConfig(process.env);
    } catch (error) {
        console.error('❌ Invalid environment variables:');
        console.error(error instanceof Error ? error.message : error);
        process.exit(1);
    }
}

export const config = loadProcessConfig();
