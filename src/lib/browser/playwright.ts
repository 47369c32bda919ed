/**
 * Playwright Launcher
 *
 * BrowserLauncher backed by Playwright's headless Chromium. The browser
 * binary comes from the one-time `npx playwright install chromium` step,
 * or from an explicit executable path.
 */

import { chromium, type Browser, type BrowserContext, type Page } from 'playwright';
import { EngineError, describeError } from '../errors/index.js';
import type {
  BrowserLauncher,
  BrowserSession,
  NavigationOptions,
  NavigationResult,
  SessionPage,
  ViewportSize,
} from './session.js';

export interface PlaywrightLauncherOptions {
  /** Chromium binary to use instead of Playwright's managed one */
  executablePath?: string;
}

// ============================================================================
// Launcher
// ============================================================================

export class PlaywrightLauncher implements BrowserLauncher {
  private options: PlaywrightLauncherOptions;

  constructor(options: PlaywrightLauncherOptions = {}) {
    this.options = options;
  }

  async launch(): Promise<BrowserSession> {
    console.log('[Browser] Launching headless Chromium...');

    try {
      const browser = await chromium.launch({
        headless: true,
        executablePath: this.options.executablePath,
      });
      return new PlaywrightSession(browser);
    } catch (error) {
      throw new EngineError(
        `Failed to launch Chromium: ${describeError(error)}. ` +
          'Run "npx playwright install chromium" or set BROWSER_EXECUTABLE_PATH.',
        { cause: error }
      );
    }
  }
}

// ============================================================================
// Session / Page
// ============================================================================

class PlaywrightSession implements BrowserSession {
  constructor(private browser: Browser) {}

  async newPage(options: { viewport: ViewportSize }): Promise<SessionPage> {
    const context = await this.browser.newContext({
      viewport: { width: options.viewport.width, height: options.viewport.height },
    });

    try {
      const page = await context.newPage();
      return new PlaywrightPage(context, page);
    } catch (error) {
      try {
        await context.close();
      } catch (closeError) {
        console.error('[Browser] Failed to close context after error:', describeError(closeError));
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

class PlaywrightPage implements SessionPage {
  constructor(
    private context: BrowserContext,
    private page: Page
  ) {}

  async goto(url: string, options: NavigationOptions): Promise<NavigationResult> {
    const response = await this.page.goto(url, {
      timeout: options.timeoutMs,
      waitUntil: options.waitUntil,
    });
    return { status: response ? response.status() : null };
  }

  async settle(ms: number): Promise<void> {
    if (ms > 0) {
      await this.page.waitForTimeout(ms);
    }
  }

  async title(): Promise<string> {
    return this.page.title();
  }

  async screenshot(options: { fullPage: boolean }): Promise<Buffer> {
    return this.page.screenshot({ fullPage: options.fullPage, type: 'png' });
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}
