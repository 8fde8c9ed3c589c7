/**
 * Shared types for unicov
 *
 * The common coverage model every artifact format is parsed into.
 */

/**
 * Engine-internal key derived from a (line, column) source position.
 * See statement-id.ts for the layout.
 */
export type StatementId = number

/**
 * Source lines a statement spans (inclusive)
 */
export interface StatementSpan {
  startLine: number
  endLine: number
}

/**
 * Display metadata for one function
 */
export interface FunctionMeta {
  name: string
  /** Start line, 0 when the format did not report one */
  line: number
}

/**
 * Coverage for one source file
 */
export interface FileCoverage {
  /** Canonical key: normalized absolute path once resolved against the repo root */
  path: string
  linesTotal: number
  linesCovered: number
  statementsTotal?: number
  statementsCovered?: number
  statementHits?: Map<StatementId, number>
  statementMap?: Map<StatementId, StatementSpan>
  /** Lines with zero hits, ascending */
  uncoveredLines: number[]
  lineHits: Map<number, number>
  functionHits: Map<string, number>
  functionMap: Map<string, FunctionMeta>
  /** One count per branch arm, in arm order */
  branchHits: Map<string, number[]>
  branchMap: Map<string, number>
}

/**
 * A file coverage paired with its root-relative display path
 */
export interface NamedFileCoverage {
  name: string
  file: FileCoverage
}

/**
 * A set of file coverages, sorted by path, without duplicate paths after a merge
 */
export interface CoverageReport {
  files: FileCoverage[]
}

export type CoverageMetricName = 'statements' | 'branches' | 'functions' | 'lines'

/**
 * Minimum acceptable percentage per metric. An absent floor is unconstrained.
 */
export type CoverageThresholds = Partial<Record<CoverageMetricName, number>>

/**
 * Per-file detail listing mode
 * - 'auto': no detail blocks
 * - 'all': every hotspot of every file
 * - { lines: n }: the first n hotspots of every file
 */
export type CoverageDetail = 'auto' | 'all' | { lines: number }

export interface PrintOpts {
  tty: boolean
  pageFit: boolean
  maxFiles?: number
  maxHotspots?: number
  detail?: CoverageDetail
  /** Editor URL template, `{file}`/`{path}` and `{line}` are substituted */
  editorCmd?: string
}

/**
 * Covered/total pair for one metric
 */
export interface MetricCounts {
  covered: number
  total: number
}

export type CoverageTotals = Record<CoverageMetricName, MetricCounts>

/**
 * Outcome of parsing a structured document
 */
export type ParseResult<T> =
  | { success: true; value: T }
  | { success: false; error: string }

export type ArtifactFormat = 'lcov' | 'istanbul' | 'llvm-cov' | 'coveragepy'
