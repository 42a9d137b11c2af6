/**
 * Content Extractor
 *
 * Reads the settled DOM of a rendered page into the structured parts of a
 * snapshot: meta tags, images, headings, visible text and markup.
 *
 * Every DOM read goes through a result-or-skip boundary. A read that fails
 * drops that one item and extraction carries on with its siblings.
 */

import type { PageElement, RenderedPageHandle } from '../browser/index.js';
import { HEADING_LEVELS } from '../snapshot/index.js';
import type {
  ExtractedContent,
  HeadingIndex,
  ImageDescriptor,
  MetaIndex,
} from '../snapshot/index.js';

// ============================================================================
// Types
// ============================================================================

/** `name` meta tags recorded alongside every og:* property */
export const META_NAMES = ['description', 'keywords', 'author', 'viewport'] as const;

export type ReadResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

export interface ReadTally {
  skipped: number;
}

// ============================================================================
// Read Boundary
// ============================================================================

export async function attemptRead<T>(read: () => Promise<T>): Promise<ReadResult<T>> {
  try {
    return { ok: true, value: await read() };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Fold a sequence through a reader, keeping non-null results in order.
 * Failed reads are counted and skipped.
 */
async function collect<E, T>(
  items: readonly E[],
  read: (item: E) => Promise<T | null>,
  tally: ReadTally
): Promise<T[]> {
  const values: T[] = [];
  for (const item of items) {
    const result = await attemptRead(() => read(item));
    if (!result.ok) {
      tally.skipped++;
    } else if (result.value !== null) {
      values.push(result.value);
    }
  }
  return values;
}

async function queryAll(
  page: RenderedPageHandle,
  selector: string,
  tally: ReadTally
): Promise<PageElement[]> {
  const result = await attemptRead(() => page.querySelectorAll(selector));
  if (result.ok) return result.value;
  tally.skipped++;
  return [];
}

async function readString(read: () => Promise<string>, tally: ReadTally): Promise<string> {
  const result = await attemptRead(read);
  if (result.ok) return result.value;
  tally.skipped++;
  return '';
}

// ============================================================================
// Element Readers
// ============================================================================

async function readImage(element: PageElement): Promise<ImageDescriptor | null> {
  const src = (await element.getAttribute('src')) || '';
  if (!src) return null;

  return {
    src,
    alt: (await element.getAttribute('alt')) || '',
    width: (await element.getAttribute('width')) || '',
    height: (await element.getAttribute('height')) || '',
  };
}

async function readHeadingText(element: PageElement): Promise<string | null> {
  const text = (await element.innerText()).trim();
  return text || null;
}

async function readOpenGraphTag(element: PageElement): Promise<[string, string] | null> {
  const property = await element.getAttribute('property');
  const content = await element.getAttribute('content');
  return property && content ? [property, content] : null;
}

// ============================================================================
// Content Extractor
// ============================================================================

export class ContentExtractor {
  /**
   * Extract all content fields from the page, in order: meta, images,
   * headings, then text and markup.
   */
  async extract(page: RenderedPageHandle): Promise<ExtractedContent> {
    const tally: ReadTally = { skipped: 0 };

    const meta = await this.extractMeta(page, tally);
    const images = await this.extractImages(page, tally);
    const headings = await this.extractHeadings(page, tally);
    const textContent = await readString(() => page.innerText('body'), tally);
    const html = await readString(() => page.content(), tally);

    if (tally.skipped > 0) {
      console.warn(`[Extract] Skipped ${tally.skipped} unreadable element(s)`);
    }

    return { textContent, html, meta, images, headings };
  }

  async extractMeta(page: RenderedPageHandle, tally: ReadTally = { skipped: 0 }): Promise<MetaIndex> {
    const meta: MetaIndex = {};

    const named = await collect(
      META_NAMES,
      async (name): Promise<[string, string] | null> => {
        const element = await page.querySelector(`meta[name="${name}"]`);
        const content = element ? await element.getAttribute('content') : null;
        return content ? [name, content] : null;
      },
      tally
    );

    const ogTags = await queryAll(page, 'meta[property^="og:"]', tally);
    const openGraph = await collect(ogTags, readOpenGraphTag, tally);

    for (const [key, value] of [...named, ...openGraph]) {
      meta[key] = value;
    }
    return meta;
  }

  async extractImages(
    page: RenderedPageHandle,
    tally: ReadTally = { skipped: 0 }
  ): Promise<ImageDescriptor[]> {
    const elements = await queryAll(page, 'img', tally);
    return collect(elements, readImage, tally);
  }

  async extractHeadings(
    page: RenderedPageHandle,
    tally: ReadTally = { skipped: 0 }
  ): Promise<HeadingIndex> {
    const headings: HeadingIndex = {};

    for (const level of HEADING_LEVELS) {
      const elements = await queryAll(page, level, tally);
      const texts = await collect(elements, readHeadingText, tally);
      if (texts.length > 0) {
        headings[level] = texts;
      }
    }

    return headings;
  }
}

export function createContentExtractor(): ContentExtractor {
  return new ContentExtractor();
}
