/**
 * Rendered Page Contract
 *
 * The slice of a live browser page the capture pipeline talks to. The
 * Playwright adapter in session.ts implements it; tests supply an
 * in-process fake.
 */

import type { Viewport } from '../snapshot/index.js';

// ============================================================================
// Types
// ============================================================================

export type LoadMilestone = 'load' | 'domcontentloaded' | 'networkidle';

export interface NavigationOptions {
  waitUntil: LoadMilestone;
  /** 0 disables the timeout */
  timeoutMs: number;
}

export interface ScreenshotOptions {
  path: string;
  fullPage: boolean;
  animations: 'disabled' | 'allow';
  scale: 'device' | 'css';
  type: 'png' | 'jpeg';
}

/** A DOM node with attribute and rendered-text access. */
export interface PageElement {
  getAttribute(name: string): Promise<string | null>;
  innerText(): Promise<string>;
}

export interface RenderedPageHandle {
  /** Current URL, after any redirects */
  url(): string;
  title(): Promise<string>;
  /**
   * Navigate and wait for the milestone.
   * Rejects with NavigationTimeoutError when the timeout elapses.
   */
  goto(url: string, options: NavigationOptions): Promise<void>;
  /** Evaluate a script expression in the page and return its scalar result */
  evaluate(expression: string): Promise<unknown>;
  querySelector(selector: string): Promise<PageElement | null>;
  querySelectorAll(selector: string): Promise<PageElement[]>;
  innerText(selector: string): Promise<string>;
  /** Full serialized document markup */
  content(): Promise<string>;
  screenshot(options: ScreenshotOptions): Promise<void>;
  /** Rejects when the network does not go idle within the timeout */
  waitForNetworkIdle(timeoutMs: number): Promise<void>;
  wait(ms: number): Promise<void>;
  viewportSize(): Viewport | null;
}

export interface SessionOptions {
  viewport: Viewport;
  /** Navigation timeout in ms */
  timeoutMs: number;
}

/** One browser instance and its single page, owned by one capture run. */
export interface BrowserSession {
  page: RenderedPageHandle;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  open(options: SessionOptions): Promise<BrowserSession>;
}
