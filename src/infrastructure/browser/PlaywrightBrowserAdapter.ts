import { chromium, Browser, Locator, Page, Request } from 'playwright';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  BrowserLaunchOptions,
  BrowserPort,
  TrackedRequest,
  TriggerActivation,
} from '../../application/ports/BrowserPort';
import { BrowserError, errorMessage } from '../../domain/errors/AppErrors';
import { OverlayTrigger } from '../../domain/probes/ProbeSpec';
import { getLogger } from '../logging';

const logger = getLogger('Browser');

const LAUNCH_ARGS = ['--no-sandbox', '--disable-dev-shm-usage'];

function isTimeout(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

/**
 * Playwright implementation of the BrowserPort interface.
 * Records every request the page issues, and its script errors, from the
 * moment the page opens until the browser closes.
 */
export class PlaywrightBrowserAdapter implements BrowserPort {
  private browser: Browser | null = null;
  private page: Page | null = null;
  private requests = new Map<Request, TrackedRequest>();
  private pageErrors: string[] = [];

  /**
   * Launches Chromium and opens a page with traffic and error listeners attached.
   */
  async launch(options: BrowserLaunchOptions): Promise<void> {
    this.requests = new Map();
    this.pageErrors = [];

    try {
      this.browser = await chromium.launch({
        headless: options.headless,
        args: LAUNCH_ARGS,
      });
      const context = await this.browser.newContext({
        viewport: { width: options.viewportWidth, height: options.viewportHeight },
      });
      this.page = await context.newPage();
    } catch (error) {
      throw new BrowserError('LAUNCH_FAILURE', `Browser launch failed: ${errorMessage(error)}`, error);
    }

    this.attachListeners(this.page, options.captureConsoleErrors);
  }

  private attachListeners(page: Page, captureConsoleErrors: boolean): void {
    page.on('request', request => {
      this.requests.set(request, {
        url: request.url(),
        method: request.method(),
        startedAt: Date.now(),
      });
    });

    page.on('response', response => {
      const tracked = this.requests.get(response.request());
      if (tracked) {
        tracked.status = response.status();
        tracked.endedAt = Date.now();
      }
    });

    page.on('requestfailed', request => {
      const tracked = this.requests.get(request);
      if (tracked) {
        tracked.errorText = request.failure()?.errorText ?? 'Request failed';
        tracked.endedAt = Date.now();
      }
    });

    page.on('pageerror', error => {
      this.pageErrors.push(error.message);
    });

    if (captureConsoleErrors) {
      page.on('console', msg => {
        if (msg.type() === 'error') {
          this.pageErrors.push(msg.text());
        }
      });
    }
  }

  private ensurePage(): Page {
    if (!this.page) {
      throw new BrowserError('NAVIGATION_FAILURE', 'Browser not launched. Call launch() first.');
    }
    return this.page;
  }

  async navigate(url: string, timeoutMs: number): Promise<void> {
    const page = this.ensurePage();
    try {
      const response = await page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' });
      if (response && response.status() >= 400) {
        throw new BrowserError('NAVIGATION_FAILURE', `Page answered HTTP ${response.status()}`);
      }
    } catch (error) {
      if (error instanceof BrowserError) throw error;
      if (isTimeout(error)) {
        throw new BrowserError('NAVIGATION_TIMEOUT', `Navigation to ${url} exceeded ${timeoutMs}ms`, error);
      }
      throw new BrowserError('NAVIGATION_FAILURE', `Navigation to ${url} failed: ${errorMessage(error)}`, error);
    }
  }

  async waitForReady(timeoutMs: number, readySelector?: string): Promise<void> {
    const page = this.ensurePage();
    try {
      await page.waitForLoadState('load', { timeout: timeoutMs });
      if (readySelector) {
        await page.waitForSelector(readySelector, { state: 'attached', timeout: timeoutMs });
      }
    } catch (error) {
      const what = readySelector ? `'${readySelector}'` : 'page load';
      if (isTimeout(error)) {
        throw new BrowserError('NAVIGATION_TIMEOUT', `Timed out after ${timeoutMs}ms waiting for ${what}`, error);
      }
      throw new BrowserError('NAVIGATION_FAILURE', `Waiting for ${what} failed: ${errorMessage(error)}`, error);
    }
  }

  /**
   * Opens the reveal control, then checks (checkbox) or clicks the first
   * overlay control that exists on the page.
   */
  async activateOverlay(trigger: OverlayTrigger, timeoutMs: number): Promise<TriggerActivation> {
    const page = this.ensurePage();

    if (trigger.revealSelector) {
      try {
        await page.locator(trigger.revealSelector).first().click({ timeout: timeoutMs });
      } catch (error) {
        // The control may already be visible without the menu.
        logger.debug('Reveal control not usable', { selector: trigger.revealSelector, error: errorMessage(error) });
      }
    }

    for (const selector of trigger.selectors) {
      const candidates = page.locator(selector);
      try {
        if ((await candidates.count()) === 0) {
          continue;
        }
        return await this.activate(candidates.first(), selector, timeoutMs);
      } catch (error) {
        logger.debug('Overlay candidate failed', { selector, error: errorMessage(error) });
      }
    }

    throw new BrowserError(
      'TRIGGER_NOT_FOUND',
      `No overlay control matched any of: ${trigger.selectors.join(', ')}`
    );
  }

  private async activate(control: Locator, selector: string, timeoutMs: number): Promise<TriggerActivation> {
    const type = await control.getAttribute('type', { timeout: timeoutMs });
    if (type === 'checkbox' || type === 'radio') {
      if (await control.isChecked({ timeout: timeoutMs })) {
        return { activated: true, selector, alreadyActive: true };
      }
      await control.check({ timeout: timeoutMs, force: true });
    } else {
      await control.click({ timeout: timeoutMs });
    }
    return { activated: true, selector };
  }

  /**
   * Recorded requests, oldest first. Redirect hops are left out; the
   * request they were redirected to is recorded on its own.
   */
  getRequests(): TrackedRequest[] {
    return Array.from(this.requests.entries())
      .filter(([request]) => request.redirectedTo() === null)
      .map(([, tracked]) => ({ ...tracked }))
      .sort((a, b) => a.startedAt - b.startedAt);
  }

  getPageErrors(): string[] {
    return [...this.pageErrors];
  }

  async screenshot(filePath: string): Promise<string> {
    const page = this.ensurePage();
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await page.screenshot({ path: filePath });
    return filePath;
  }

  /**
   * Closes the browser instance.
   */
  async close(): Promise<void> {
    const browser = this.browser;
    this.page = null;
    this.browser = null;
    if (browser) {
      try {
        await browser.close();
      } catch (error) {
        throw new BrowserError('SESSION_TEARDOWN_FAILURE', `Browser close failed: ${errorMessage(error)}`, error);
      }
    }
  }
}
