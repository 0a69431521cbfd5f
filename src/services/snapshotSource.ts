import { chromium, Browser, BrowserContext, Page } from 'playwright';
import { CONFIG } from '../config';

/**
 * Turns a URL into rendered page markup
 */
export interface SnapshotSource {
  initialize(): Promise<void>;
  fetchPage(url: string, settleMs?: number): Promise<string>;
  cleanup(): Promise<void>;
}

export interface BrowserSnapshotOptions {
  headless: boolean;
  navigationTimeoutMs: number;
  settleMs: number;
  userAgent: string;
  viewport: { width: number; height: number };
}

const DEFAULT_OPTIONS: BrowserSnapshotOptions = {
  headless: CONFIG.browser.headless,
  navigationTimeoutMs: CONFIG.browser.navigationTimeoutMs,
  settleMs: CONFIG.timing.pageSettleMs,
  userAgent: CONFIG.browser.userAgent,
  viewport: { ...CONFIG.browser.viewport },
};

/**
 * Playwright-backed snapshot source holding one browser session
 */
export class BrowserSnapshotSource implements SnapshotSource {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  private readonly options: BrowserSnapshotOptions;

  constructor(options: Partial<BrowserSnapshotOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Launch the browser session
   */
  async initialize(): Promise<void> {
    console.log('Initializing browser session...');

    await this.cleanup();

    try {
      this.browser = await chromium.launch({
        headless: this.options.headless,
        timeout: this.options.navigationTimeoutMs,
        args: [
          '--no-sandbox',
          '--disable-dev-shm-usage',
          '--disable-gpu',
        ],
      });

      this.context = await this.browser.newContext({
        userAgent: this.options.userAgent,
        viewport: this.options.viewport,
        locale: 'en-US',
      });
      this.page = await this.context.newPage();
    } catch (error) {
      // Close whatever part of the session did start
      await this.cleanup();
      throw error;
    }

    console.log('Browser session ready');
  }

  /**
   * Navigate to a URL, wait for the DOM and a fixed settle period, and return the page markup
   */
  async fetchPage(url: string, settleMs: number = this.options.settleMs): Promise<string> {
    if (!this.page) {
      throw new Error('Browser not initialized. Call initialize() first.');
    }

    console.log(`Fetching ${url}`);
    const response = await this.page.goto(url, {
      waitUntil: 'domcontentloaded',
      timeout: this.options.navigationTimeoutMs,
    });

    if (response && response.status() >= 400) {
      throw new Error(`Navigation to ${url} failed with status ${response.status()}`);
    }

    await this.page.waitForTimeout(settleMs);
    return this.page.content();
  }

  /**
   * Release the browser session; failures are reported but never thrown
   */
  async cleanup(): Promise<void> {
    const { context, browser } = this;
    this.page = null;
    this.context = null;
    this.browser = null;

    if (context) {
      try {
        await context.close();
      } catch (error) {
        console.warn('Browser context cleanup warning (non-fatal):', error instanceof Error ? error.message : error);
      }
    }

    if (browser) {
      try {
        await browser.close();
        console.log('Browser cleanup completed');
      } catch (error) {
        console.warn('Browser cleanup warning (non-fatal):', error instanceof Error ? error.message : error);
      }
    }
  }
}

/**
 * Run `work` inside an initialized session and always release it afterwards,
 * including when initialization itself fails part-way
 */
export async function withSession<T>(source: SnapshotSource, work: (source: SnapshotSource) => Promise<T>): Promise<T> {
  try {
    await source.initialize();
    return await work(source);
  } finally {
    await source.cleanup();
  }
}
