/**
 * Coverage pipeline
 *
 * Reads the configured artifacts, merges them per path, overlays llvm-cov
 * statement data, filters the file set, renders the report and checks the
 * thresholds.
 */

import { filterReport } from './filter.js'
import { createTimer, isLoggingEnabled, log, warn } from './logger.js'
import { createMerger } from './merger/index.js'
import type { MergeStats } from './merger/index.js'
import { readCoveragePyJsonFile } from './parsers/coveragepy.js'
import { readIstanbulCoverageTree } from './parsers/istanbul.js'
import { readLcovFile } from './parsers/lcov.js'
import { applyStatementHits, readLlvmCovJsonFile } from './parsers/llvm-cov.js'
import { formatCompact, formatHotspots, formatSummary, renderCoverageReport } from './printer/index.js'
import { displayPath } from './paths.js'
import { checkThresholds } from './thresholds.js'
import type { ResolvedUnicovConfig } from './config.js'
import type { CoverageReport } from './types.js'

export type ReportFormat = 'pretty' | 'compact' | 'hotspots' | 'summary'

export const REPORT_FORMATS: readonly ReportFormat[] = ['pretty', 'compact', 'hotspots', 'summary']

export interface PipelineOptions {
  format?: ReportFormat
  columns?: number
  rows?: number
  env?: NodeJS.ProcessEnv
}

export interface PipelineResult {
  /** Merged and filtered report */
  report: CoverageReport
  stats: MergeStats
  /** Rendered report, empty when no artifact had data */
  text: string
  /** Threshold failure block, empty when every metric passed */
  thresholdLines: string[]
  thresholdsFailed: boolean
}

/**
 * Every line-based report the config points at, in a fixed order:
 * LCOV files, Istanbul shards, coverage.py reports
 */
function readLineReports(config: ResolvedUnicovConfig): CoverageReport[] {
  const reports: CoverageReport[] = []

  for (const file of config.lcov) {
    const report = readLcovFile(file, { onMalformed: config.onMalformedLcov })
    if (report) {
      log(`   LCOV: ${report.files.length} file(s) from ${file}`)
      reports.push(report)
    }
  }

  for (const dir of config.istanbul) {
    for (const shard of readIstanbulCoverageTree(dir)) {
      reports.push(shard.report)
    }
  }

  for (const file of config.coveragePy) {
    const report = readCoveragePyJsonFile(file, config.root)
    if (report) {
      log(`   coverage.py: ${report.files.length} file(s) from ${file}`)
      reports.push(report)
    }
  }

  return reports
}

function readStatementReports(config: ResolvedUnicovConfig): CoverageReport[] {
  const reports: CoverageReport[] = []
  for (const file of config.llvmCov) {
    const result = readLlvmCovJsonFile(file, config.root)
    if (result === null) {
      continue
    }
    if (!result.success) {
      warn(`  ⚠️ llvm-cov JSON ignored: ${file} (${result.error})`)
      continue
    }
    reports.push(result.value)
  }
  return reports
}

/**
 * Merge line-based reports, then overlay statement data. Files only the
 * statement reports know about are added as they are.
 */
export function combineReports(
  lineReports: readonly CoverageReport[],
  statementReports: readonly CoverageReport[],
  root: string
): { report: CoverageReport; stats: MergeStats } {
  const merger = createMerger(root)
  const lines = merger.mergeWithStats(lineReports)
  if (statementReports.length === 0) {
    return lines
  }

  const statements = merger.merge(...statementReports)
  const known = new Set(lines.report.files.map((file) => file.path))
  const overlaid = applyStatementHits(lines.report, statements)
  const added = statements.files.filter((file) => !known.has(file.path))
  const report = added.length > 0 ? merger.merge(overlaid, { files: added }) : overlaid

  return {
    report,
    stats: { ...lines.stats, shards: lines.stats.shards + statementReports.length, mergedFiles: report.files.length },
  }
}

function renderText(report: CoverageReport, config: ResolvedUnicovConfig, options: PipelineOptions): string {
  const named = report.files.map((file) => ({ name: displayPath(file.path, config.root), file }))
  switch (options.format ?? 'pretty') {
    case 'compact':
      return formatCompact(named, config.print)
    case 'hotspots':
      return formatHotspots(named, config.print)
    case 'summary':
      return formatSummary(report.files)
    case 'pretty':
      return renderCoverageReport(report, {
        root: config.root,
        printOpts: config.print,
        columns: options.columns,
        rows: options.rows,
        env: options.env,
      })
  }
}

/**
 * Run the whole pipeline for a resolved config
 *
 * @example
 * ```typescript
 * const result = await runCoveragePipeline(resolveUnicovConfig({ thresholds: { lines: 80 } }))
 * console.log(result.text)
 * process.exitCode = result.thresholdsFailed ? 1 : 0
 * ```
 */
export async function runCoveragePipeline(
  config: ResolvedUnicovConfig,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const endTimer = createTimer('coverage pipeline')
  log(`📊 Reading coverage artifacts under ${config.root}`)

  const lineReports = readLineReports(config)
  const statementReports = readStatementReports(config)
  const combined = combineReports(lineReports, statementReports, config.root)
  const report = filterReport(combined.report, config.root, config.include, config.exclude)
  log(`   Filter: ${combined.report.files.length} → ${report.files.length} file(s)`)
  if (isLoggingEnabled()) {
    const kept = new Set(report.files.map((file) => file.path))
    for (const file of combined.report.files) {
      if (!kept.has(file.path)) {
        log(`   Filtered out: ${displayPath(file.path, config.root)}`)
      }
    }
  }

  const text =
    lineReports.length + statementReports.length === 0 ? '' : renderText(report, config, options)

  const thresholdLines: string[] = []
  const thresholdsFailed = checkThresholds(config.thresholds, report, (line) => thresholdLines.push(line))

  endTimer()
  return { report, stats: combined.stats, text, thresholdLines, thresholdsFailed }
}
