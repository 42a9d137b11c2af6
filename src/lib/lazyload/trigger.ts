/**
 * Lazy-Load Trigger
 *
 * Scrolls a page one viewport at a time so intersection- and timer-driven
 * lazy content renders before the full-page screenshot. The page may grow
 * while we scroll, so the bound is re-measured after every step.
 */

import type { RenderedPageHandle } from '../browser/index.js';

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_MAX_SCROLLS = 50;
/** Advisory network-idle wait; deliberately not tied to the navigation timeout */
export const NETWORK_IDLE_TIMEOUT_MS = 10000;

export interface LazyLoadOptions {
  /** Delay after each scroll step, in ms */
  stepDelayMs: number;
  /** Hard cap on scroll steps for pages that never stop growing */
  maxSteps?: number;
}

export interface ScrollState {
  position: number;
  maxHeight: number;
  steps: number;
}

export interface LazyLoadReport {
  steps: number;
  finalHeight: number;
  reachedCap: boolean;
  networkIdle: boolean;
}

const SCROLL_HEIGHT_SCRIPT = 'document.body.scrollHeight';
const INNER_HEIGHT_SCRIPT = 'window.innerHeight';

// ============================================================================
// State Machine
// ============================================================================

export function initialScrollState(height: number): ScrollState {
  return { position: 0, maxHeight: height, steps: 0 };
}

export function isScrollComplete(state: ScrollState, maxSteps: number): boolean {
  return state.position >= state.maxHeight || state.steps >= maxSteps;
}

/**
 * Transition after one scroll step: advance by a viewport and raise the
 * bound if the page grew. The bound never shrinks.
 */
export function advanceScroll(
  state: ScrollState,
  viewportHeight: number,
  measuredHeight: number
): ScrollState {
  return {
    position: state.position + viewportHeight,
    maxHeight: Math.max(state.maxHeight, measuredHeight),
    steps: state.steps + 1,
  };
}

// ============================================================================
// Trigger
// ============================================================================

export class LazyLoadTrigger {
  private options: Required<LazyLoadOptions>;

  constructor(options: LazyLoadOptions) {
    this.options = {
      stepDelayMs: options.stepDelayMs,
      maxSteps: options.maxSteps ?? DEFAULT_MAX_SCROLLS,
    };
  }

  /**
   * Scroll through the page, return to the top and wait (best effort) for
   * the network to settle.
   */
  async run(page: RenderedPageHandle): Promise<LazyLoadReport> {
    const { stepDelayMs, maxSteps } = this.options;
    const viewportHeight = await this.readViewportHeight(page);
    let state = initialScrollState(await readScrollHeight(page));

    // A zero-height viewport would never advance the cursor
    const canScroll = viewportHeight > 0;
    if (!canScroll) {
      console.warn('[LazyLoad] Viewport height unknown; skipping scroll steps');
    }

    while (canScroll && !isScrollComplete(state, maxSteps)) {
      await page.evaluate(`window.scrollTo(0, ${state.position})`);
      await page.wait(stepDelayMs);
      state = advanceScroll(state, viewportHeight, await readScrollHeight(page));
    }

    const reachedCap = state.steps >= maxSteps && state.position < state.maxHeight;
    if (reachedCap) {
      console.warn(`[LazyLoad] Stopped after ${maxSteps} scrolls; page still growing`);
    }

    await page.evaluate('window.scrollTo(0, 0)');
    await page.wait(stepDelayMs);

    const networkIdle = await this.waitForNetworkIdle(page);

    console.log(`[LazyLoad] ${state.steps} scrolls over ${state.maxHeight}px`);

    return {
      steps: state.steps,
      finalHeight: state.maxHeight,
      reachedCap,
      networkIdle,
    };
  }

  getOptions(): Required<LazyLoadOptions> {
    return { ...this.options };
  }

  private async readViewportHeight(page: RenderedPageHandle): Promise<number> {
    const viewport = page.viewportSize();
    if (viewport) return viewport.height;
    return toNumber(await page.evaluate(INNER_HEIGHT_SCRIPT));
  }

  private async waitForNetworkIdle(page: RenderedPageHandle): Promise<boolean> {
    try {
      await page.waitForNetworkIdle(NETWORK_IDLE_TIMEOUT_MS);
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[LazyLoad] Network not idle, continuing: ${message}`);
      return false;
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function toNumber(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

async function readScrollHeight(page: RenderedPageHandle): Promise<number> {
  return toNumber(await page.evaluate(SCROLL_HEIGHT_SCRIPT));
}

/**
 * Lazy loading only matters for full-page output with a positive step delay.
 */
export function shouldTriggerLazyLoad(fullPage: boolean, stepDelayMs: number): boolean {
  return fullPage && stepDelayMs > 0;
}

export function createLazyLoadTrigger(options: LazyLoadOptions): LazyLoadTrigger {
  return new LazyLoadTrigger(options);
}
