/**
 * Snapshot Module
 *
 * Provides:
 * - Capture request schema with defaults
 * - Page content snapshot value types
 * - Snapshot freezing and re-parsing
 */

export {
  CaptureRequestSchema,
  PageContentSnapshotSchema,
  ImageDescriptorSchema,
  HeadingIndexSchema,
  MetaIndexSchema,
  HEADING_LEVELS,
  DEFAULT_VIEWPORT,
  DEFAULT_WAIT_MS,
  DEFAULT_SCROLL_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
  resolveCaptureRequest,
  freezeSnapshot,
  parseSnapshot,
  type Viewport,
  type CaptureRequestInput,
  type CaptureRequest,
  type HeadingLevel,
  type ImageDescriptor,
  type HeadingIndex,
  type MetaIndex,
  type PageContentSnapshot,
  type ExtractedContent,
} from './model.js';
