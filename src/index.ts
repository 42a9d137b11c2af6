/**
 * pagesnap - Page Screenshot and Content Capture
 *
 * One visit to a rendered page yields a full-page PNG and a structured
 * content snapshot taken from the same DOM state.
 */

// Snapshot data model
export * from './lib/snapshot/index.js';

// Browser session and rendered page contract
export * from './lib/browser/index.js';

// Lazy-load scrolling
export * from './lib/lazyload/index.js';

// Content extraction
export * from './lib/extract/index.js';

// Capture pipeline
export * from './lib/capture/index.js';

// Configuration
export * from './lib/config/index.js';

// Console summary and JSON output
export * from './lib/report/index.js';

// Version
export const VERSION = '0.1.0';
