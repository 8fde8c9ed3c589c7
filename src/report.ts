/**
 * Coverage model helpers
 *
 * Builds FileCoverage values from their hit maps. Totals and the uncovered
 * line list are always derived here, never carried over from an input.
 */

import type {
  CoverageReport,
  FileCoverage,
  FunctionMeta,
  StatementId,
  StatementSpan,
} from './types.js'

export interface FileCoverageParts {
  path: string
  lineHits: Map<number, number>
  statementHits?: Map<StatementId, number>
  statementMap?: Map<StatementId, StatementSpan>
  functionHits?: Map<string, number>
  functionMap?: Map<string, FunctionMeta>
  branchHits?: Map<string, number[]>
  branchMap?: Map<string, number>
}

/**
 * Sort a map by numeric key
 */
export function sortNumericMap<V>(map: Map<number, V>): Map<number, V> {
  return new Map([...map.entries()].sort((a, b) => a[0] - b[0]))
}

/**
 * Build a FileCoverage, computing line and statement totals from the maps
 */
export function buildFileCoverage(parts: FileCoverageParts): FileCoverage {
  const lineHits = sortNumericMap(parts.lineHits)
  const uncoveredLines: number[] = []
  let linesCovered = 0
  for (const [line, hits] of lineHits) {
    if (hits > 0) {
      linesCovered++
    } else {
      uncoveredLines.push(line)
    }
  }

  const file: FileCoverage = {
    path: parts.path,
    linesTotal: lineHits.size,
    linesCovered,
    uncoveredLines,
    lineHits,
    functionHits: parts.functionHits ?? new Map(),
    functionMap: parts.functionMap ?? new Map(),
    branchHits: parts.branchHits ?? new Map(),
    branchMap: parts.branchMap ?? new Map(),
  }

  if (parts.statementHits) {
    const statementHits = sortNumericMap(parts.statementHits)
    file.statementHits = statementHits
    file.statementMap = parts.statementMap ?? new Map()
    file.statementsTotal = statementHits.size
    file.statementsCovered = countCovered(statementHits.values())
  }

  return file
}

/**
 * Number of entries with a positive count
 */
export function countCovered(counts: Iterable<number>): number {
  let covered = 0
  for (const count of counts) {
    if (count > 0) covered++
  }
  return covered
}

/**
 * Report with files sorted by path
 */
export function createReport(files: FileCoverage[]): CoverageReport {
  return { files: [...files].sort((a, b) => compareStrings(a.path, b.path)) }
}

/**
 * Code-unit string comparison, independent of locale
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Function id: `"{line}:{name}"` when the start line is known, else the name
 */
export function functionId(name: string, line: number): string {
  return line > 0 ? `${line}:${name}` : name
}
