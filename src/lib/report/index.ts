/**
 * Report Module
 *
 * Provides:
 * - Console summary of a page snapshot
 * - JSON dump of a snapshot
 */

export {
  formatSnapshotSummary,
  writeSnapshotJson,
  truncate,
  type SummaryOptions,
} from './summary.js';
