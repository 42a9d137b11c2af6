/**
 * Snapshot Summary
 *
 * Console summary and JSON dump of a captured page.
 */

import { writeFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { HEADING_LEVELS } from '../snapshot/index.js';
import type { PageContentSnapshot } from '../snapshot/index.js';

// ============================================================================
// Types
// ============================================================================

export interface SummaryOptions {
  /** Max characters shown per meta value */
  metaValueLength?: number;
  /** Images listed by source */
  imageCount?: number;
  /** Max characters shown per image source */
  imageSrcLength?: number;
  /** Texts listed per heading level */
  headingCount?: number;
  /** Characters of body text previewed */
  textPreviewLength?: number;
}

const DEFAULT_SUMMARY_OPTIONS: Required<SummaryOptions> = {
  metaValueLength: 100,
  imageCount: 3,
  imageSrcLength: 80,
  headingCount: 3,
  textPreviewLength: 300,
};

const RULE = '='.repeat(60);

// ============================================================================
// Formatting
// ============================================================================

export function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max)}...` : value;
}

/**
 * Lines describing a snapshot, ready for console output
 */
export function formatSnapshotSummary(
  snapshot: PageContentSnapshot,
  options: SummaryOptions = {}
): string[] {
  const opts = { ...DEFAULT_SUMMARY_OPTIONS, ...options };
  const lines: string[] = [];

  lines.push(RULE);
  lines.push('Page summary');
  lines.push(RULE);
  lines.push(`URL: ${snapshot.url}`);
  lines.push(`Title: ${snapshot.title}`);
  lines.push(`Screenshot: ${snapshot.screenshotPath}`);

  const metaEntries = Object.entries(snapshot.meta);
  lines.push('');
  lines.push(`Meta tags: ${metaEntries.length}`);
  for (const [key, value] of metaEntries) {
    lines.push(`  - ${key}: ${truncate(value, opts.metaValueLength)}`);
  }

  lines.push('');
  lines.push(`Images: ${snapshot.images.length}`);
  if (snapshot.images.length > 0) {
    lines.push(`  First ${opts.imageCount} images:`);
    for (const image of snapshot.images.slice(0, opts.imageCount)) {
      lines.push(`    - ${truncate(image.src, opts.imageSrcLength)}`);
    }
  }

  lines.push('');
  lines.push('Headings:');
  for (const level of HEADING_LEVELS) {
    const texts = snapshot.headings[level];
    if (!texts) continue;
    lines.push(`  ${level.toUpperCase()}: ${texts.length}`);
    for (const text of texts.slice(0, opts.headingCount)) {
      lines.push(`    - ${text}`);
    }
  }

  lines.push('');
  lines.push(`Text length: ${snapshot.textContent.length} characters`);
  lines.push('Text preview:');
  lines.push(truncate(snapshot.textContent, opts.textPreviewLength));
  lines.push(RULE);

  return lines;
}

// ============================================================================
// JSON
// ============================================================================

export async function writeSnapshotJson(
  snapshot: PageContentSnapshot,
  path: string
): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(snapshot, null, 2));
  return path;
}
