/**
 * Lazy-Load Module
 *
 * Provides:
 * - Progressive scroll with re-measured page height
 * - Scroll state machine helpers
 * - Advisory network-idle wait
 */

export {
  LazyLoadTrigger,
  createLazyLoadTrigger,
  shouldTriggerLazyLoad,
  initialScrollState,
  advanceScroll,
  isScrollComplete,
  DEFAULT_MAX_SCROLLS,
  NETWORK_IDLE_TIMEOUT_MS,
  type LazyLoadOptions,
  type LazyLoadReport,
  type ScrollState,
} from './trigger.js';
