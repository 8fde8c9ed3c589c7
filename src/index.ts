/**
 * unicov - Coverage aggregation and reporting
 *
 * Public API. Most users run the CLI instead:
 *   unicov report --lcov coverage/lcov.info --lines 80
 *
 * For programmatic use, either run the whole pipeline:
 *   const result = await runCoveragePipeline(resolveUnicovConfig({ thresholds: { lines: 80 } }))
 *
 * or compose the stages: parse → mergeReports → filterReport → renderCoverageReport / checkThresholds.
 */

// ============================================================================
// Configuration
// ============================================================================
export {
  type UnicovConfig,
  type ResolvedUnicovConfig,
  resolveUnicovConfig,
  parseUnicovConfig,
  parseCoverageDetail,
  DEFAULT_INCLUDE_PATTERNS,
  DEFAULT_EXCLUDE_PATTERNS,
  DEFAULT_LCOV_FILE,
  DEFAULT_ISTANBUL_DIR,
  DEFAULT_COVERAGEPY_FILE,
  DEFAULT_PRINT_OPTS,
} from './config.js'

// ============================================================================
// Pipeline
// ============================================================================
export {
  runCoveragePipeline,
  combineReports,
  REPORT_FORMATS,
  type ReportFormat,
  type PipelineOptions,
  type PipelineResult,
} from './pipeline.js'

// ============================================================================
// Parsers
// ============================================================================
export * from './parsers/index.js'

// ============================================================================
// Merging, filtering, paths
// ============================================================================
export * from './merger/index.js'
export { compilePatterns, createPathFilter, filterReport } from './filter.js'
export { normalizePath, normalizeRoot, relativePath, displayPath, toSlash, isAbsolutePath } from './paths.js'
export { encodeStatementId, statementIdLine } from './statement-id.js'
export { displayFunctionName, normalizeFunctionName, normalizeFunctionId } from './function-names.js'
export { buildFileCoverage, createReport, type FileCoverageParts } from './report.js'

// ============================================================================
// Analysis and thresholds
// ============================================================================
export {
  pct,
  fileSummary,
  hotspotBlocks,
  uncoveredLinesFor,
  rankHotspots,
  computeHotspots,
  missedFunctions,
  missedBranches,
  compositeBarPct,
  type FileSummary,
  type HotspotRange,
  type MissedFunction,
  type MissedBranch,
} from './analysis.js'
export {
  computeTotals,
  evaluateThresholds,
  formatThresholdFailure,
  formatThresholdFailures,
  checkThresholds,
  THRESHOLD_FAILURE_HEADING,
  type ThresholdFailure,
} from './thresholds.js'

// ============================================================================
// Rendering
// ============================================================================
export * from './printer/index.js'

// ============================================================================
// Logging
// ============================================================================
export { setLogging, setTiming } from './logger.js'

// ============================================================================
// Common Types
// ============================================================================
export type {
  CoverageReport,
  FileCoverage,
  NamedFileCoverage,
  StatementId,
  StatementSpan,
  FunctionMeta,
  CoverageMetricName,
  CoverageThresholds,
  CoverageDetail,
  CoverageTotals,
  MetricCounts,
  PrintOpts,
  ParseResult,
  ArtifactFormat,
} from './types.js'
