/**
 * Capture Module
 *
 * Provides:
 * - Image-only and full (image + content) page capture
 * - Lazy-load scrolling before full-page screenshots
 * - Navigation timeout reported as its own failure kind
 */

export {
  PageCapturer,
  createPageCapturer,
  capturePage,
  type CapturerOptions,
} from './capturer.js';
export {
  classifyFailure,
  type CaptureFailure,
  type CaptureFailureKind,
  type CaptureOutcome,
} from './errors.js';
