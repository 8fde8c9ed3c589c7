/**
 * Coverage threshold evaluation
 *
 * Compares the aggregate percentage of each configured metric against its
 * floor. A metric with nothing to cover counts as 100% and always passes.
 */

import { pct, statementCounts } from './analysis.js'
import { countCovered } from './report.js'
import type {
  CoverageMetricName,
  CoverageReport,
  CoverageThresholds,
  CoverageTotals,
  MetricCounts,
} from './types.js'
import { saturatingAdd } from './utils/counts.js'

export interface ThresholdFailure {
  metric: CoverageMetricName
  label: string
  actual: number
  floor: number
  shortfall: number
}

export const THRESHOLD_FAILURE_HEADING = 'Coverage thresholds not met'

/**
 * Metrics in the order failures are reported
 */
export const THRESHOLD_METRICS: ReadonlyArray<{ metric: CoverageMetricName; label: string }> = [
  { metric: 'statements', label: 'Statements' },
  { metric: 'branches', label: 'Branches' },
  { metric: 'functions', label: 'Functions' },
  { metric: 'lines', label: 'Lines' },
]

function addCounts(target: MetricCounts, covered: number, total: number): void {
  target.covered = saturatingAdd(target.covered, covered)
  target.total = saturatingAdd(target.total, total)
}

/**
 * Aggregate counts over every file of a report.
 * Files without statements contribute their line counts to statements.
 */
export function computeTotals(report: CoverageReport): CoverageTotals {
  const totals: CoverageTotals = {
    statements: { covered: 0, total: 0 },
    branches: { covered: 0, total: 0 },
    functions: { covered: 0, total: 0 },
    lines: { covered: 0, total: 0 },
  }

  for (const file of report.files) {
    addCounts(totals.lines, file.linesCovered, file.linesTotal)
    addCounts(totals.functions, countCovered(file.functionHits.values()), file.functionHits.size)
    for (const arms of file.branchHits.values()) {
      addCounts(totals.branches, countCovered(arms), arms.length)
    }
    const statements = statementCounts(file)
    addCounts(totals.statements, statements.covered, statements.total)
  }

  return totals
}

/**
 * Failing metrics, in reporting order. `actual < floor` fails, with no tolerance.
 */
export function evaluateThresholds(
  thresholds: CoverageThresholds,
  totals: CoverageTotals
): ThresholdFailure[] {
  const failures: ThresholdFailure[] = []
  for (const { metric, label } of THRESHOLD_METRICS) {
    const floor = thresholds[metric]
    if (floor === undefined) continue
    const actual = pct(totals[metric])
    if (actual < floor) {
      failures.push({ metric, label, actual, floor, shortfall: Math.max(floor - actual, 0) })
    }
  }
  return failures
}

/**
 * Floor as configured, without trailing zeros (80, 82.5)
 */
function formatFloor(floor: number): string {
  return String(Number(floor.toFixed(2)))
}

/**
 * @example
 * ```typescript
 * formatThresholdFailure({ label: 'Lines', actual: 75, floor: 80, shortfall: 5, metric: 'lines' })
 * // 'Lines: 75.00% < 80% (short 5.00%)'
 * ```
 */
export function formatThresholdFailure(failure: ThresholdFailure): string {
  return `${failure.label}: ${failure.actual.toFixed(2)}% < ${formatFloor(failure.floor)}% (short ${failure.shortfall.toFixed(2)}%)`
}

/**
 * Output block for failed thresholds: a blank line, the heading, one indented line per failure
 */
export function formatThresholdFailures(failures: readonly ThresholdFailure[]): string[] {
  if (failures.length === 0) {
    return []
  }
  return ['', THRESHOLD_FAILURE_HEADING, ...failures.map((f) => ` ${formatThresholdFailure(f)}`)]
}

/**
 * Evaluate thresholds and write the failures. Returns true when any metric failed.
 * Without thresholds or a report there is nothing to check.
 */
export function checkThresholds(
  thresholds: CoverageThresholds | undefined,
  report: CoverageReport | undefined,
  write: (line: string) => void = (line) => console.log(line)
): boolean {
  if (!thresholds || !report) {
    return false
  }
  const failures = evaluateThresholds(thresholds, computeTotals(report))
  for (const line of formatThresholdFailures(failures)) {
    write(line)
  }
  return failures.length > 0
}
