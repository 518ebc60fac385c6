/**
 * Playwright session driver
 *
 * Owns one browser, one context and one page for the length of a run.
 * Attaches to a remote Chromium over CDP when an endpoint is configured,
 * otherwise launches a local one. Every Playwright failure is rethrown as
 * a DriverError naming the operation.
 */

import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import {
  DriverError,
  errorMessage,
  logger as rootLogger,
  type Logger,
  type SessionDriver,
} from '@shiftclock/core';
import { chromium, type Browser, type BrowserContext, type Page } from 'playwright-core';

import type { BrowserConfig } from '../shared/types.js';

/** Default wait for any single Playwright operation */
const DEFAULT_TIMEOUT_MS = 15_000;

export interface PlaywrightDriverOptions extends BrowserConfig {
  defaultTimeoutMs?: number;
  logger?: Logger;
  now?: () => Date;
}

interface Session {
  browser: Browser;
  context: BrowserContext;
  page: Page;
}

export class PlaywrightDriver implements SessionDriver {
  private session: Session | null = null;

  private readonly options: PlaywrightDriverOptions;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: PlaywrightDriverOptions) {
    this.options = options;
    this.logger = (options.logger ?? rootLogger).child('playwright');
    this.now = options.now ?? (() => new Date());
  }

  async open(): Promise<void> {
    if (this.session) {
      return;
    }

    await this.call('open', async () => {
      const { cdpEndpoint, executablePath, headless, geolocation } = this.options;
      const browser = cdpEndpoint
        ? await chromium.connectOverCDP(cdpEndpoint)
        : await chromium.launch({ headless, executablePath });

      try {
        const context = await browser.newContext({
          ...(geolocation ? { geolocation, permissions: ['geolocation'] } : {}),
        });
        const page = await context.newPage();
        page.setDefaultTimeout(this.options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS);
        this.session = { browser, context, page };
      } catch (error) {
        await browser.close();
        throw error;
      }

      this.logger.info('Browser session opened', {
        mode: cdpEndpoint ? 'cdp' : 'launch',
        geolocation: geolocation !== undefined,
      });
    });
  }

  async close(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }
    this.session = null;

    try {
      await session.context.close();
    } catch (error) {
      this.logger.warn('Closing browser context failed', { error: errorMessage(error) });
    }
    await this.call('close', () => session.browser.close());
    this.logger.info('Browser session closed');
  }

  navigateTo(url: string): Promise<void> {
    return this.withPage('navigateTo', async (page) => {
      await page.goto(url, { waitUntil: 'domcontentloaded' });
    });
  }

  waitForElement(selector: string, timeoutMs: number): Promise<void> {
    return this.withPage('waitForElement', async (page) => {
      await page.locator(selector).first().waitFor({ state: 'visible', timeout: timeoutMs });
    });
  }

  readText(selector: string): Promise<string | null> {
    return this.withPage('readText', async (page) => {
      const locator = page.locator(selector);
      if ((await locator.count()) === 0) {
        return null;
      }
      return locator.first().textContent();
    });
  }

  readAllText(selector: string): Promise<string[]> {
    return this.withPage('readAllText', async (page) => {
      const texts: string[] = [];
      for (const element of await page.locator(selector).all()) {
        if (await element.isVisible()) {
          texts.push(await element.innerText());
        }
      }
      return texts;
    });
  }

  isVisible(selector: string): Promise<boolean> {
    return this.withPage('isVisible', (page) => page.locator(selector).first().isVisible());
  }

  isEnabled(selector: string): Promise<boolean> {
    return this.withPage('isEnabled', async (page) => {
      const locator = page.locator(selector);
      if ((await locator.count()) === 0) {
        return false;
      }
      return locator.first().isEnabled();
    });
  }

  click(selector: string): Promise<void> {
    return this.withPage('click', (page) => page.locator(selector).first().click());
  }

  fill(selector: string, value: string): Promise<void> {
    return this.withPage('fill', (page) => page.locator(selector).first().fill(value));
  }

  captureScreenshot(label: string): Promise<string> {
    return this.withPage('captureScreenshot', async (page) => {
      const timestamp = this.now().toISOString().replace(/[:.]/g, '-');
      const file = path.join(this.options.screenshotDir, `${timestamp}-${label}.png`);
      await mkdir(this.options.screenshotDir, { recursive: true });
      await page.screenshot({ path: file, fullPage: true });
      return file;
    });
  }

  /** Run against the open page */
  private withPage<T>(operation: string, fn: (page: Page) => Promise<T>): Promise<T> {
    const page = this.session?.page;
    if (!page) {
      return Promise.reject(new DriverError(operation, 'session is not open'));
    }
    return this.call(operation, () => fn(page));
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof DriverError) {
        throw error;
      }
      throw new DriverError(operation, errorMessage(error), { cause: error });
    }
  }
}
