/**
 * Per-file coverage analysis
 *
 * Percent summaries, uncovered "hotspot" ranges and the lists of functions
 * and branch paths that never ran. Everything here is derived from the hit
 * maps of one FileCoverage.
 */

import { displayFunctionName } from './function-names.js'
import { countCovered } from './report.js'
import { statementIdLine } from './statement-id.js'
import type { FileCoverage, MetricCounts } from './types.js'

export interface FileSummary {
  statements: MetricCounts
  branches: MetricCounts
  functions: MetricCounts
  lines: MetricCounts
}

/**
 * Inclusive range of uncovered lines
 */
export interface HotspotRange {
  start: number
  end: number
}

export interface MissedFunction {
  name: string
  line: number
}

export interface MissedBranch {
  id: string
  line: number
  /** Indexes of the arms that were never taken */
  zeroPaths: number[]
}

/**
 * Percentage of a metric; a metric with nothing to cover counts as 100
 */
export function pct(counts: MetricCounts): number {
  return counts.total === 0 ? 100 : (counts.covered / counts.total) * 100
}

function countMap(values: Iterable<number>, size: number): MetricCounts {
  return { covered: countCovered(values), total: size }
}

function hasStatements(file: FileCoverage): boolean {
  return file.statementHits !== undefined && file.statementHits.size > 0
}

/**
 * Statement counts of a file. A file without statements, or with an empty
 * statement map, counts its lines instead.
 */
export function statementCounts(file: FileCoverage): MetricCounts {
  if (hasStatements(file) && file.statementsTotal !== undefined && file.statementsCovered !== undefined) {
    return { covered: file.statementsCovered, total: file.statementsTotal }
  }
  return { covered: file.linesCovered, total: file.linesTotal }
}

export function fileSummary(file: FileCoverage): FileSummary {
  const lines = countMap(file.lineHits.values(), file.lineHits.size)

  let branchTotal = 0
  let branchCovered = 0
  for (const arms of file.branchHits.values()) {
    branchTotal += arms.length
    branchCovered += countCovered(arms)
  }

  return {
    statements: statementCounts(file),
    branches: { covered: branchCovered, total: branchTotal },
    functions: countMap(file.functionHits.values(), file.functionHits.size),
    lines,
  }
}

export function rangeLength(range: HotspotRange): number {
  return range.end - range.start + 1
}

/**
 * Coalesce uncovered lines into maximal contiguous ranges, ascending.
 * Input order and duplicates do not matter.
 */
export function hotspotBlocks(lines: readonly number[]): HotspotRange[] {
  const sorted = [...new Set(lines)].sort((a, b) => a - b)
  const ranges: HotspotRange[] = []

  for (const line of sorted) {
    const last = ranges[ranges.length - 1]
    if (last && line === last.end + 1) {
      last.end = line
    } else {
      ranges.push({ start: line, end: line })
    }
  }
  return ranges
}

/**
 * Uncovered lines of a file. With statement data, every line spanned by a
 * zero-hit statement; otherwise the zero-hit lines.
 */
export function uncoveredLinesFor(file: FileCoverage): number[] {
  if (!file.statementHits || !hasStatements(file)) {
    return [...file.uncoveredLines]
  }

  const lines = new Set<number>()
  for (const [id, hits] of file.statementHits) {
    if (hits !== 0) continue
    const span = file.statementMap?.get(id)
    if (span) {
      const from = Math.max(span.startLine, 1)
      const to = Math.max(span.endLine, from)
      for (let line = from; line <= to; line++) {
        lines.add(line)
      }
      continue
    }
    const line = statementIdLine(id)
    if (line > 0) {
      lines.add(line)
    }
  }
  return [...lines].sort((a, b) => a - b)
}

/**
 * Render order: largest range first, then by start line
 */
export function rankHotspots(blocks: readonly HotspotRange[]): HotspotRange[] {
  return [...blocks].sort((a, b) => rangeLength(b) - rangeLength(a) || a.start - b.start)
}

/**
 * Ranked hotspot ranges of a file
 */
export function computeHotspots(file: FileCoverage): HotspotRange[] {
  return rankHotspots(hotspotBlocks(uncoveredLinesFor(file)))
}

export function missedFunctions(file: FileCoverage): MissedFunction[] {
  const out: MissedFunction[] = []
  for (const [id, hits] of file.functionHits) {
    if (hits !== 0) continue
    const meta = file.functionMap.get(id)
    out.push(
      meta ? { name: displayFunctionName(meta.name), line: meta.line } : { name: '(anonymous)', line: 0 }
    )
  }
  return out.sort((a, b) => a.line - b.line)
}

/**
 * Branch groups with at least one arm that was never taken
 */
export function missedBranches(file: FileCoverage): MissedBranch[] {
  const out: MissedBranch[] = []
  for (const [id, arms] of file.branchHits) {
    const zeroPaths: number[] = []
    arms.forEach((hits, index) => {
      if (hits === 0) zeroPaths.push(index)
    })
    if (zeroPaths.length > 0) {
      out.push({ id, line: file.branchMap.get(id) ?? 0, zeroPaths })
    }
  }
  return out.sort((a, b) => a.line - b.line)
}

/**
 * Bar percentage for a file: its weakest metric, lowered by up to 15 points
 * when much of the file is one uncovered range
 */
export function compositeBarPct(summary: FileSummary, hotspots: readonly HotspotRange[]): number {
  const base = Math.min(pct(summary.lines), pct(summary.functions), pct(summary.branches))
  const totalLines = summary.lines.total

  let penalty = 0
  if (totalLines > 0 && hotspots.length > 0) {
    const largest = hotspots.reduce((max, range) => Math.max(max, rangeLength(range)), 0)
    penalty = Math.min(Math.round((largest / totalLines) * 100 * 0.5), 15)
  }
  return Math.min(Math.max(base - penalty, 0), 100)
}
