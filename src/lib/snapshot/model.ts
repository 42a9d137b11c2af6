/**
 * Snapshot Data Model
 *
 * Shared value types for a capture run: the request that drives it and the
 * content snapshot it produces. Schemas are zod so the CLI and callers can
 * validate requests and re-read saved snapshots.
 */

import { z } from 'zod';

// ============================================================================
// Request
// ============================================================================

export const DEFAULT_VIEWPORT = { width: 1920, height: 1080 } as const;
export const DEFAULT_WAIT_MS = 3000;
export const DEFAULT_SCROLL_DELAY_MS = 500;
export const DEFAULT_TIMEOUT_MS = 30000;

const ViewportSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

const HttpUrlSchema = z
  .string()
  .url()
  .refine(value => /^https?:\/\//i.test(value), {
    message: 'URL must start with http:// or https://',
  });

export const CaptureRequestSchema = z.object({
  url: HttpUrlSchema,
  outputPath: z.string().min(1),
  fullPage: z.boolean().default(true),
  viewport: ViewportSchema.default({ ...DEFAULT_VIEWPORT }),
  /** Fixed wait after the load event, in ms */
  waitMs: z.number().nonnegative().default(DEFAULT_WAIT_MS),
  /** Delay after each lazy-load scroll step, in ms */
  scrollDelayMs: z.number().nonnegative().default(DEFAULT_SCROLL_DELAY_MS),
  /** Navigation timeout in ms; 0 disables it */
  timeoutMs: z.number().nonnegative().default(DEFAULT_TIMEOUT_MS),
});

export type Viewport = z.infer<typeof ViewportSchema>;
export type CaptureRequestInput = z.input<typeof CaptureRequestSchema>;
export type CaptureRequest = z.output<typeof CaptureRequestSchema>;

// ============================================================================
// Snapshot
// ============================================================================

export const HEADING_LEVELS = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'] as const;
export type HeadingLevel = (typeof HEADING_LEVELS)[number];

export const ImageDescriptorSchema = z.object({
  src: z.string().min(1),
  alt: z.string().default(''),
  // Kept as the literal attribute value ("100", "50%", "")
  width: z.string().default(''),
  height: z.string().default(''),
});

export const HeadingIndexSchema = z.object({
  h1: z.array(z.string().min(1)).min(1).optional(),
  h2: z.array(z.string().min(1)).min(1).optional(),
  h3: z.array(z.string().min(1)).min(1).optional(),
  h4: z.array(z.string().min(1)).min(1).optional(),
  h5: z.array(z.string().min(1)).min(1).optional(),
  h6: z.array(z.string().min(1)).min(1).optional(),
});

export const MetaIndexSchema = z.record(z.string(), z.string());

export const PageContentSnapshotSchema = z.object({
  screenshotPath: z.string(),
  /** Final URL after redirects */
  url: z.string(),
  title: z.string(),
  /** Rendered visible text of <body> */
  textContent: z.string(),
  html: z.string(),
  meta: MetaIndexSchema.default({}),
  images: z.array(ImageDescriptorSchema).default([]),
  headings: HeadingIndexSchema.default({}),
});

export type ImageDescriptor = z.infer<typeof ImageDescriptorSchema>;
export type HeadingIndex = z.infer<typeof HeadingIndexSchema>;
export type MetaIndex = z.infer<typeof MetaIndexSchema>;
export type PageContentSnapshot = z.infer<typeof PageContentSnapshotSchema>;

/** Content fields the extractor fills; the screenshot path comes from the request. */
export type ExtractedContent = Omit<PageContentSnapshot, 'screenshotPath' | 'url' | 'title'>;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Apply defaults and validate a request.
 * Throws a ZodError when a constraint does not hold.
 */
export function resolveCaptureRequest(input: CaptureRequestInput): CaptureRequest {
  return CaptureRequestSchema.parse(input);
}

/**
 * Build the immutable snapshot value returned to callers.
 */
export function freezeSnapshot(snapshot: PageContentSnapshot): Readonly<PageContentSnapshot> {
  for (const image of snapshot.images) {
    Object.freeze(image);
  }
  Object.freeze(snapshot.images);
  for (const level of HEADING_LEVELS) {
    const texts = snapshot.headings[level];
    if (texts) Object.freeze(texts);
  }
  Object.freeze(snapshot.headings);
  Object.freeze(snapshot.meta);
  return Object.freeze(snapshot);
}

/**
 * Re-read a snapshot previously written as JSON.
 */
export function parseSnapshot(data: unknown): PageContentSnapshot {
  return PageContentSnapshotSchema.parse(data);
}
