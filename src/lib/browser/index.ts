/**
 * Browser Module
 *
 * Provides:
 * - Engine-neutral rendered page contract
 * - Playwright launcher and page adapter (chromium, firefox, webkit)
 * - Navigation timeout error
 */

export {
  PlaywrightLauncher,
  PlaywrightPageHandle,
  createPlaywrightLauncher,
  BROWSER_NAMES,
  type BrowserName,
  type LauncherOptions,
} from './session.js';
export { NavigationTimeoutError, isNavigationTimeout } from './errors.js';
export type {
  RenderedPageHandle,
  PageElement,
  BrowserLauncher,
  BrowserSession,
  SessionOptions,
  NavigationOptions,
  ScreenshotOptions,
  LoadMilestone,
} from './page.js';
