/**
 * Coverage Merger Module
 *
 * Merges coverage shards into one report keyed by normalized path
 */

export {
  CoverageMerger,
  createMerger,
  mergeReports,
  resolveReportPaths,
  type MergerConfig,
  type MergeResult,
  type MergeStats,
} from './core.js'
