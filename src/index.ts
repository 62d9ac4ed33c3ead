/**
 * xscrape HTTP server - Main Entry Point
 */

import { createServer } from './api/server.js';
import { config } from './config.js';
import { logger } from './lib/index.js';
import { ProfileScraper, scraperOptionsFromConfig } from './modules/index.js';

async function main(): Promise<void> {
    logger.info('🚀 Starting xscrape API server...');

    const scraper = new ProfileScraper(scraperOptionsFromConfig(config));
    const app = createServer({ scraper });

    const server = app.listen(config.API_PORT, () => {
        logger.info(`🚀 xscrape API server running on http://localhost:${config.API_PORT}`);
    });

    const shutdown = (signal: string): void => {
        logger.info(`Received ${signal}, shutting down gracefully...`);
        server.close();
        scraper
            .close()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error('Failed to release scraper resources:', error);
                process.exit(1);
            });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection:', reason);
});

main().catch((error: unknown) => {
    logger.error('Failed to start:', error);
    process.exit(1);
});
