import { chromium, Browser, BrowserContext, Page } from 'playwright';
import { logger } from '../utils/logger.js';

export interface BrowserOptions {
  headless: boolean;
  slowMo: number;
}

let browser: Browser | null = null;
let context: BrowserContext | null = null;
let page: Page | null = null;

export async function launchBrowser(options: BrowserOptions): Promise<Page> {
  logger.action('Launching browser...');

  browser = await chromium.launch({
    headless: options.headless,
    slowMo: options.slowMo,
    args: ['--disable-blink-features=AutomationControlled', '--no-sandbox', '--disable-dev-shm-usage'],
  });

  context = await browser.newContext({
    viewport: { width: 1366, height: 860 },
    locale: 'en-US',
  });

  page = await context.newPage();

  logger.success('Browser launched');

  return page;
}

export async function navigateTo(url: string, retries = 2): Promise<void> {
  if (!page) {
    throw new Error('Browser not initialized');
  }

  logger.action(`Navigating to ${url}`);

  for (let attempt = 1; attempt <= retries + 1; attempt++) {
    try {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: 60000 });
      await page.waitForLoadState('networkidle', { timeout: 15000 }).catch(() => undefined);
      logger.success('Page loaded');
      return;
    } catch (error) {
      if (attempt <= retries) {
        logger.warn(`Navigation attempt ${attempt} failed, retrying...`);
        await new Promise((resolve) => setTimeout(resolve, 2000));
      } else {
        throw error;
      }
    }
  }
}

export async function closeBrowser(): Promise<void> {
  logger.action('Closing browser...');

  if (page) {
    await page.close();
    page = null;
  }

  if (context) {
    await context.close();
    context = null;
  }

  if (browser) {
    await browser.close();
    browser = null;
  }

  logger.success('Browser closed');
}
