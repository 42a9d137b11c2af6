/**
 * Configuration Parser
 *
 * Parse .pagesnap.yml (or JSON) files holding the browser choice and the
 * default capture settings.
 */

import { readFile, access } from 'fs/promises';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { BROWSER_NAMES } from '../browser/index.js';
import type { CapturerOptions } from '../capture/index.js';
import {
  DEFAULT_SCROLL_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_VIEWPORT,
  DEFAULT_WAIT_MS,
} from '../snapshot/index.js';
import type { CaptureRequestInput } from '../snapshot/index.js';
import { DEFAULT_MAX_SCROLLS } from '../lazyload/index.js';

// ============================================================================
// Schemas
// ============================================================================

const ViewportSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export const PagesnapConfigSchema = z.object({
  browser: z.enum(BROWSER_NAMES).optional(),
  headless: z.boolean().optional(),
  full_page: z.boolean().optional(),
  viewport: ViewportSchema.optional(),
  wait_ms: z.number().nonnegative().optional(),
  scroll_delay_ms: z.number().nonnegative().optional(),
  timeout_ms: z.number().nonnegative().optional(),
  max_scrolls: z.number().int().positive().optional(),
  output_dir: z.string().min(1).optional(),
});

// ============================================================================
// Types
// ============================================================================

export type PagesnapConfig = z.infer<typeof PagesnapConfigSchema>;
export type ResolvedConfig = Required<PagesnapConfig>;
export type RequestDefaults = Omit<CaptureRequestInput, 'url' | 'outputPath'>;

export const CONFIG_FILENAMES = ['.pagesnap.yml', '.pagesnap.yaml', '.pagesnap.json'];

// ============================================================================
// Default Config
// ============================================================================

export const DEFAULT_CONFIG: ResolvedConfig = {
  browser: 'chromium',
  headless: true,
  full_page: true,
  viewport: { ...DEFAULT_VIEWPORT },
  wait_ms: DEFAULT_WAIT_MS,
  scroll_delay_ms: DEFAULT_SCROLL_DELAY_MS,
  timeout_ms: DEFAULT_TIMEOUT_MS,
  max_scrolls: DEFAULT_MAX_SCROLLS,
  output_dir: './screenshots',
};

// ============================================================================
// Config Parser
// ============================================================================

export class ConfigParser {
  /**
   * Load and parse config from file
   */
  async loadFile(path: string): Promise<ResolvedConfig> {
    const content = await readFile(path, 'utf-8');
    return this.parse(content, path);
  }

  /**
   * Parse config from string content
   */
  parse(content: string, filename: string = 'config'): ResolvedConfig {
    let parsed: unknown;

    if (filename.endsWith('.json')) {
      parsed = JSON.parse(content);
    } else {
      parsed = parseYaml(content);
    }

    // An empty YAML document parses to null
    const validated = PagesnapConfigSchema.parse(parsed ?? {});

    return this.mergeWithDefaults(validated);
  }

  mergeWithDefaults(config: PagesnapConfig): ResolvedConfig {
    return {
      browser: config.browser ?? DEFAULT_CONFIG.browser,
      headless: config.headless ?? DEFAULT_CONFIG.headless,
      full_page: config.full_page ?? DEFAULT_CONFIG.full_page,
      viewport: config.viewport ?? { ...DEFAULT_CONFIG.viewport },
      wait_ms: config.wait_ms ?? DEFAULT_CONFIG.wait_ms,
      scroll_delay_ms: config.scroll_delay_ms ?? DEFAULT_CONFIG.scroll_delay_ms,
      timeout_ms: config.timeout_ms ?? DEFAULT_CONFIG.timeout_ms,
      max_scrolls: config.max_scrolls ?? DEFAULT_CONFIG.max_scrolls,
      output_dir: config.output_dir ?? DEFAULT_CONFIG.output_dir,
    };
  }

  /**
   * Validate config object
   */
  validate(config: unknown): PagesnapConfig {
    return PagesnapConfigSchema.parse(config);
  }

  /**
   * Find the first config file present in a directory
   */
  async find(dir: string = process.cwd()): Promise<string | null> {
    for (const name of CONFIG_FILENAMES) {
      const candidate = join(dir, name);
      try {
        await access(candidate);
        return candidate;
      } catch {
        continue;
      }
    }
    return null;
  }

  toCapturerOptions(config: ResolvedConfig): Omit<CapturerOptions, 'launcher'> {
    return {
      browser: config.browser,
      headless: config.headless,
      maxScrolls: config.max_scrolls,
    };
  }

  toRequestDefaults(config: ResolvedConfig): RequestDefaults {
    return {
      fullPage: config.full_page,
      viewport: { ...config.viewport },
      waitMs: config.wait_ms,
      scrollDelayMs: config.scroll_delay_ms,
      timeoutMs: config.timeout_ms,
    };
  }

  /**
   * Generate example config
   */
  static generateExample(): string {
    return `# pagesnap configuration

browser: chromium      # chromium | firefox | webkit
headless: true
full_page: true

viewport:
  width: 1920
  height: 1080

wait_ms: 3000          # extra wait after the load event
scroll_delay_ms: 500   # delay per lazy-load scroll step (0 disables scrolling)
timeout_ms: 30000      # navigation timeout
max_scrolls: 50

output_dir: ./screenshots
`;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createConfigParser(): ConfigParser {
  return new ConfigParser();
}

/**
 * Load a config file, or the defaults when no path is given and none is found
 */
export async function loadConfig(path?: string): Promise<ResolvedConfig> {
  const parser = new ConfigParser();
  const resolved = path ?? (await parser.find());
  if (!resolved) {
    return { ...DEFAULT_CONFIG, viewport: { ...DEFAULT_CONFIG.viewport } };
  }
  console.log(`[Config] Loading ${resolved}`);
  return parser.loadFile(resolved);
}
