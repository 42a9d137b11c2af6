/**
 * Playwright Browser Session
 *
 * Launches a browser per capture run and adapts its page to
 * RenderedPageHandle.
 */

import { chromium, firefox, webkit, errors } from 'playwright';
import type { BrowserType, Page } from 'playwright';
import type { Viewport } from '../snapshot/index.js';
import { NavigationTimeoutError } from './errors.js';
import type {
  BrowserLauncher,
  BrowserSession,
  NavigationOptions,
  PageElement,
  RenderedPageHandle,
  ScreenshotOptions,
  SessionOptions,
} from './page.js';

// ============================================================================
// Types
// ============================================================================

export const BROWSER_NAMES = ['chromium', 'firefox', 'webkit'] as const;
export type BrowserName = (typeof BROWSER_NAMES)[number];

const BROWSER_TYPES: Record<BrowserName, BrowserType> = {
  chromium,
  firefox,
  webkit,
};

// ============================================================================
// Page Adapter
// ============================================================================

export class PlaywrightPageHandle implements RenderedPageHandle {
  constructor(private readonly page: Page) {}

  url(): string {
    return this.page.url();
  }

  title(): Promise<string> {
    return this.page.title();
  }

  async goto(url: string, options: NavigationOptions): Promise<void> {
    try {
      await this.page.goto(url, {
        waitUntil: options.waitUntil,
        timeout: options.timeoutMs,
      });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new NavigationTimeoutError(url, options.timeoutMs, error);
      }
      throw error;
    }
  }

  evaluate(expression: string): Promise<unknown> {
    return this.page.evaluate(expression);
  }

  querySelector(selector: string): Promise<PageElement | null> {
    return this.page.$(selector);
  }

  querySelectorAll(selector: string): Promise<PageElement[]> {
    return this.page.$$(selector);
  }

  innerText(selector: string): Promise<string> {
    return this.page.innerText(selector);
  }

  content(): Promise<string> {
    return this.page.content();
  }

  async screenshot(options: ScreenshotOptions): Promise<void> {
    await this.page.screenshot({
      path: options.path,
      fullPage: options.fullPage,
      animations: options.animations,
      scale: options.scale,
      type: options.type,
    });
  }

  async waitForNetworkIdle(timeoutMs: number): Promise<void> {
    await this.page.waitForLoadState('networkidle', { timeout: timeoutMs });
  }

  wait(ms: number): Promise<void> {
    return this.page.waitForTimeout(ms);
  }

  viewportSize(): Viewport | null {
    return this.page.viewportSize();
  }
}

// ============================================================================
// Launcher
// ============================================================================

export interface LauncherOptions {
  browser?: BrowserName;
  headless?: boolean;
}

export class PlaywrightLauncher implements BrowserLauncher {
  private options: Required<LauncherOptions>;

  constructor(options: LauncherOptions = {}) {
    this.options = {
      browser: options.browser || 'chromium',
      headless: options.headless ?? true,
    };
  }

  async open(options: SessionOptions): Promise<BrowserSession> {
    console.log(`[Capture] Launching ${this.options.browser}...`);
    const browser = await BROWSER_TYPES[this.options.browser].launch({
      headless: this.options.headless,
    });

    try {
      const context = await browser.newContext({
        viewport: { width: options.viewport.width, height: options.viewport.height },
      });
      const page = await context.newPage();
      // Only navigation is bounded by the caller's timeout
      page.setDefaultNavigationTimeout(options.timeoutMs);

      return {
        page: new PlaywrightPageHandle(page),
        close: () => browser.close(),
      };
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  getOptions(): Required<LauncherOptions> {
    return { ...this.options };
  }
}

export function createPlaywrightLauncher(options?: LauncherOptions): PlaywrightLauncher {
  return new PlaywrightLauncher(options);
}
