/**
 * Report Merger
 *
 * Combines per-shard coverage reports into one, keyed by normalized path.
 * Shards are independent executions, so every counter sums across them:
 * line hits, function hits, branch arm counts and statement hits.
 * Metadata (function name/line, branch line, statement span) is taken from
 * the first shard that defines it.
 */

import { normalizeFunctionId, normalizeFunctionName } from '../function-names.js'
import { log, createTimer } from '../logger.js'
import { normalizePath } from '../paths.js'
import { buildFileCoverage, createReport } from '../report.js'
import type {
  CoverageReport,
  FileCoverage,
  FunctionMeta,
  StatementId,
  StatementSpan,
} from '../types.js'
import { addCountVectors, addToCount } from '../utils/counts.js'

export interface MergerConfig {
  /** Repository root every file path is resolved against */
  root: string
}

export interface MergeStats {
  shards: number
  inputFiles: number
  mergedFiles: number
}

export interface MergeResult {
  report: CoverageReport
  stats: MergeStats
}

const ANONYMOUS_FUNCTION: FunctionMeta = { name: '(anonymous)', line: 0 }

interface FileAccumulator {
  path: string
  lineHits: Map<number, number>
  statementHits: Map<StatementId, number> | null
  statementMap: Map<StatementId, StatementSpan>
  functionHits: Map<string, number>
  functionMap: Map<string, FunctionMeta>
  branchHits: Map<string, number[]>
  branchMap: Map<string, number>
}

function createAccumulator(path: string): FileAccumulator {
  return {
    path,
    lineHits: new Map(),
    statementHits: null,
    statementMap: new Map(),
    functionHits: new Map(),
    functionMap: new Map(),
    branchHits: new Map(),
    branchMap: new Map(),
  }
}

function addFile(acc: FileAccumulator, file: FileCoverage): void {
  for (const [line, hits] of file.lineHits) {
    addToCount(acc.lineHits, line, hits)
  }

  if (file.statementHits) {
    const statementHits = acc.statementHits ?? new Map<StatementId, number>()
    acc.statementHits = statementHits
    for (const [id, hits] of file.statementHits) {
      addToCount(statementHits, id, hits)
      const span = file.statementMap?.get(id)
      if (span && !acc.statementMap.has(id)) {
        acc.statementMap.set(id, span)
      }
    }
  }

  const functionIds = new Set([...file.functionHits.keys(), ...file.functionMap.keys()])
  for (const id of functionIds) {
    const normalizedId = normalizeFunctionId(id)
    addToCount(acc.functionHits, normalizedId, file.functionHits.get(id) ?? 0)
    if (!acc.functionMap.has(normalizedId)) {
      const meta = file.functionMap.get(id)
      acc.functionMap.set(
        normalizedId,
        meta ? { name: normalizeFunctionName(meta.name), line: meta.line } : ANONYMOUS_FUNCTION
      )
    }
  }

  for (const [id, arms] of file.branchHits) {
    const previous = acc.branchHits.get(id)
    acc.branchHits.set(id, previous ? addCountVectors(previous, arms) : [...arms])
    const line = file.branchMap.get(id)
    if (line !== undefined && !acc.branchMap.has(id)) {
      acc.branchMap.set(id, line)
    }
  }
}

function toFileCoverage(acc: FileAccumulator): FileCoverage {
  return buildFileCoverage({
    path: acc.path,
    lineHits: acc.lineHits,
    statementHits: acc.statementHits ?? undefined,
    statementMap: acc.statementHits ? acc.statementMap : undefined,
    functionHits: acc.functionHits,
    functionMap: acc.functionMap,
    branchHits: acc.branchHits,
    branchMap: acc.branchMap,
  })
}

/**
 * Coverage Merger Class
 */
export class CoverageMerger {
  private readonly config: MergerConfig

  constructor(config: MergerConfig) {
    this.config = { ...config }
  }

  /**
   * Merge reports into one, with counts of what went in and came out
   */
  mergeWithStats(reports: readonly CoverageReport[]): MergeResult {
    const endTimer = createTimer('merge')
    const byPath = new Map<string, FileAccumulator>()
    let inputFiles = 0

    reports.forEach((report, index) => {
      for (const file of report.files) {
        const path = normalizePath(file.path, this.config.root)
        let acc = byPath.get(path)
        if (!acc) {
          acc = createAccumulator(path)
          byPath.set(path, acc)
        }
        addFile(acc, file)
      }
      inputFiles += report.files.length
      log(`   Shard ${index + 1}: ${report.files.length} file(s)`)
    })

    const report = createReport([...byPath.values()].map(toFileCoverage))
    endTimer()

    const stats: MergeStats = {
      shards: reports.length,
      inputFiles,
      mergedFiles: report.files.length,
    }
    log(`   Merged ${stats.shards} shard(s): ${stats.inputFiles} → ${stats.mergedFiles} file(s)`)
    return { report, stats }
  }

  /**
   * Merge reports into one
   */
  merge(...reports: CoverageReport[]): CoverageReport {
    return this.mergeWithStats(reports).report
  }
}

/**
 * Create a coverage merger
 */
export function createMerger(root: string): CoverageMerger {
  return new CoverageMerger({ root })
}

/**
 * Merge shard reports, summing every counter per normalized path
 */
export function mergeReports(reports: readonly CoverageReport[], root: string): CoverageReport {
  return createMerger(root).mergeWithStats(reports).report
}

/**
 * Normalize every file path of one report against the root, folding files
 * whose paths now coincide
 */
export function resolveReportPaths(report: CoverageReport, root: string): CoverageReport {
  return mergeReports([report], root)
}
