/**
 * Extract Module
 *
 * Provides:
 * - Meta tag and Open Graph extraction
 * - Image descriptors with raw width/height attributes
 * - Heading hierarchy (h1-h6)
 * - Visible text and serialized markup
 */

export {
  ContentExtractor,
  createContentExtractor,
  attemptRead,
  META_NAMES,
  type ReadResult,
  type ReadTally,
} from './extractor.js';
