/**
 * Config Module
 *
 * Provides:
 * - YAML and JSON config parsing
 * - Zod-validated schema
 * - Default configuration merging
 * - Mapping onto capturer options and request defaults
 */

export {
  ConfigParser,
  createConfigParser,
  loadConfig,
  DEFAULT_CONFIG,
  CONFIG_FILENAMES,
  PagesnapConfigSchema,
  type PagesnapConfig,
  type ResolvedConfig,
  type RequestDefaults,
} from './parser.js';
