/**
 * Page Capturer
 *
 * Loads one page, lets lazy content render, writes a full-page PNG and,
 * for a full capture, extracts the page content from the same rendered
 * DOM before the browser is closed. One navigation per run.
 */

import { createPlaywrightLauncher } from '../browser/index.js';
import type {
  BrowserLauncher,
  BrowserName,
  BrowserSession,
  RenderedPageHandle,
} from '../browser/index.js';
import { ContentExtractor } from '../extract/index.js';
import { DEFAULT_MAX_SCROLLS, LazyLoadTrigger, shouldTriggerLazyLoad } from '../lazyload/index.js';
import { CaptureRequestSchema, freezeSnapshot } from '../snapshot/index.js';
import type {
  CaptureRequest,
  CaptureRequestInput,
  PageContentSnapshot,
} from '../snapshot/index.js';
import { classifyFailure } from './errors.js';
import type { CaptureFailure, CaptureOutcome } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export interface CapturerOptions {
  /** Browser engine to launch */
  browser?: BrowserName;
  /** Run without a visible window */
  headless?: boolean;
  /** Scroll step cap for lazy loading */
  maxScrolls?: number;
  /** Session factory; defaults to Playwright */
  launcher?: BrowserLauncher;
}

type AfterScreenshot<T> = (page: RenderedPageHandle, request: CaptureRequest) => Promise<T>;

// ============================================================================
// Page Capturer
// ============================================================================

export class PageCapturer {
  private options: Required<Omit<CapturerOptions, 'launcher'>>;
  private launcher: BrowserLauncher;
  private extractor = new ContentExtractor();

  constructor(options: CapturerOptions = {}) {
    this.options = {
      browser: options.browser || 'chromium',
      headless: options.headless ?? true,
      maxScrolls: options.maxScrolls ?? DEFAULT_MAX_SCROLLS,
    };
    this.launcher =
      options.launcher ||
      createPlaywrightLauncher({
        browser: this.options.browser,
        headless: this.options.headless,
      });
  }

  /**
   * Capture only the screenshot. Resolves false on any failure.
   */
  async captureImage(request: CaptureRequestInput): Promise<boolean> {
    const outcome = await this.captureImageResult(request);
    return outcome.ok;
  }

  /**
   * Capture only the screenshot, reporting why a run failed.
   */
  captureImageResult(request: CaptureRequestInput): Promise<CaptureOutcome<string>> {
    return this.run(request, async (_page, resolved) => resolved.outputPath);
  }

  /**
   * Capture the screenshot and extract the page content in one visit.
   */
  captureFull(
    request: CaptureRequestInput
  ): Promise<CaptureOutcome<Readonly<PageContentSnapshot>>> {
    return this.run(request, async (page, resolved) => {
      console.log('[Capture] Extracting page content...');
      const url = page.url();
      const title = await page.title();
      const content = await this.extractor.extract(page);

      return freezeSnapshot({
        screenshotPath: resolved.outputPath,
        url,
        title,
        ...content,
      });
    });
  }

  getOptions(): Required<Omit<CapturerOptions, 'launcher'>> {
    return { ...this.options };
  }

  // --------------------------------------------------------------------------
  // Pipeline
  // --------------------------------------------------------------------------

  private async run<T>(
    input: CaptureRequestInput,
    afterScreenshot: AfterScreenshot<T>
  ): Promise<CaptureOutcome<T>> {
    const parsed = CaptureRequestSchema.safeParse(input);
    if (!parsed.success) {
      return this.fail(classifyFailure(parsed.error));
    }
    const request = parsed.data;

    let session: BrowserSession | null = null;
    try {
      session = await this.launcher.open({
        viewport: request.viewport,
        timeoutMs: request.timeoutMs,
      });
      const { page } = session;

      await this.loadPage(page, request);

      console.log(`[Capture] Taking screenshot: ${request.outputPath}`);
      await page.screenshot({
        path: request.outputPath,
        fullPage: request.fullPage,
        animations: 'disabled',
        scale: 'device',
        type: 'png',
      });

      const value = await afterScreenshot(page, request);
      console.log(`[Capture] ✓ ${request.url} captured`);
      return { ok: true, value };
    } catch (error) {
      const failure = classifyFailure(error);
      if (failure.kind === 'navigation-timeout') {
        console.error(`[Capture] Page load timed out (${request.timeoutMs}ms)`);
        return { ok: false, failure };
      }
      return this.fail(failure);
    } finally {
      if (session) {
        await this.release(session);
      }
    }
  }

  private async loadPage(page: RenderedPageHandle, request: CaptureRequest): Promise<void> {
    console.log(`[Capture] Navigating to ${request.url}`);
    await page.goto(request.url, { waitUntil: 'load', timeoutMs: request.timeoutMs });

    if (request.waitMs > 0) {
      console.log(`[Capture] Waiting ${request.waitMs}ms...`);
      await page.wait(request.waitMs);
    }

    if (shouldTriggerLazyLoad(request.fullPage, request.scrollDelayMs)) {
      console.log('[Capture] Triggering lazy-loaded content...');
      const trigger = new LazyLoadTrigger({
        stepDelayMs: request.scrollDelayMs,
        maxSteps: this.options.maxScrolls,
      });
      await trigger.run(page);
    }
  }

  private async release(session: BrowserSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Capture] Failed to close browser: ${message}`);
    }
  }

  private fail(failure: CaptureFailure): { ok: false; failure: CaptureFailure } {
    console.error(`[Capture] Error: ${failure.message}`);
    return { ok: false, failure };
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createPageCapturer(options?: CapturerOptions): PageCapturer {
  return new PageCapturer(options);
}

/**
 * One-shot full capture with a fresh capturer.
 */
export function capturePage(
  request: CaptureRequestInput,
  options?: CapturerOptions
): Promise<CaptureOutcome<Readonly<PageContentSnapshot>>> {
  return new PageCapturer(options).captureFull(request);
}
