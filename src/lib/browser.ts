import { chromium, type Browser } from 'playwright';
import { logger } from './logger.js';

// One shared chromium per headless mode; proxies and user agents are set per context
const browserInstances = new Map<boolean, Promise<Browser>>();

async function launchBrowser(headless: boolean): Promise<Browser> {
    logger.info(`Launching shared browser instance (headless: ${headless})...`);
    const browser = await chromium.launch({
        headless,
        args: [
            '--no-sandbox',
            '--disable-setuid-sandbox',
            '--disable-dev-shm-usage',
            '--disable-accelerated-2d-canvas',
            '--no-first-run',
            '--no-zygote',
            '--disable-gpu',
        ],
    });

    // Handle disconnect
    browser.on('disconnected', () => {
        logger.warn('Shared browser disconnected. Clearing instance.');
        browserInstances.delete(headless);
    });

    return browser;
}

export async function getBrowser(headless = true): Promise<Browser> {
    let instance = browserInstances.get(headless);
    if (!instance) {
        instance = launchBrowser(headless);
        browserInstances.set(headless, instance);
        // A failed launch must not poison later calls
        void instance.catch(() => browserInstances.delete(headless));
    }
    return instance;
}

export async function closeBrowser(): Promise<void> {
    const instances = [...browserInstances.values()];
    browserInstances.clear();
    for (const instance of instances) {
        const browser = await instance.catch(() => null);
        if (browser) {
            await browser.close();
        }
    }
    if (instances.length > 0) {
        logger.info('Shared browser closed.');
    }
}
