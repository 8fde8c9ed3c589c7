import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { MockInstance } from 'vitest'
import {
  checkThresholds,
  computeTotals,
  evaluateThresholds,
  formatThresholdFailure,
  formatThresholdFailures,
} from '../thresholds.js'
import { fileSummary, pct } from '../analysis.js'
import { buildFileCoverage } from '../report.js'
import { encodeStatementId } from '../statement-id.js'
import type { CoverageReport } from '../types.js'

/** 4 lines, 3 covered: 75% line coverage */
function threeQuarters(): CoverageReport {
  return {
    files: [
      buildFileCoverage({
        path: '/repo/a.ts',
        lineHits: new Map([
          [1, 1],
          [2, 1],
          [3, 1],
          [4, 0],
        ]),
        functionHits: new Map([
          ['1:a', 1],
          ['3:b', 1],
        ]),
        branchHits: new Map([['2:0', [1, 0]]]),
      }),
    ],
  }
}

describe('computeTotals', () => {
  it('should add counts over every file', () => {
    const report: CoverageReport = {
      files: [
        ...threeQuarters().files,
        buildFileCoverage({
          path: '/repo/b.ts',
          lineHits: new Map([[1, 0]]),
          statementHits: new Map([
            [encodeStatementId(1, 0), 0],
            [encodeStatementId(1, 8), 2],
          ]),
        }),
      ],
    }
    expect(computeTotals(report)).toEqual({
      statements: { covered: 4, total: 6 },
      branches: { covered: 1, total: 2 },
      functions: { covered: 2, total: 2 },
      lines: { covered: 3, total: 5 },
    })
  })

  it('should count lines for a file with an empty statement map, like fileSummary', () => {
    const file = buildFileCoverage({ path: '/repo/c.ts', lineHits: new Map([[1, 0]]), statementHits: new Map() })
    const totals = computeTotals({ files: [file] })

    expect(totals.statements).toEqual({ covered: 0, total: 1 })
    expect(fileSummary(file).statements).toEqual(totals.statements)
    expect(pct(totals.statements)).toBe(0)
  })

  it('should be all zeros for an empty report', () => {
    expect(computeTotals({ files: [] }).lines).toEqual({ covered: 0, total: 0 })
  })
})

describe('evaluateThresholds', () => {
  it('should fail a metric below its floor with the shortfall', () => {
    const failures = evaluateThresholds({ lines: 80 }, computeTotals(threeQuarters()))
    expect(failures).toEqual([{ metric: 'lines', label: 'Lines', actual: 75, floor: 80, shortfall: 5 }])
    expect(failures[0].shortfall.toFixed(2)).toBe('5.00')
  })

  it('should pass a metric exactly at its floor', () => {
    expect(evaluateThresholds({ lines: 75 }, computeTotals(threeQuarters()))).toEqual([])
  })

  it('should ignore metrics without a floor', () => {
    expect(evaluateThresholds({}, computeTotals(threeQuarters()))).toEqual([])
  })

  it('should pass metrics with nothing to cover', () => {
    expect(evaluateThresholds({ lines: 100, branches: 100 }, computeTotals({ files: [] }))).toEqual([])
  })

  it('should report failures in a fixed metric order', () => {
    const failures = evaluateThresholds(
      { lines: 90, branches: 60, statements: 80, functions: 50 },
      computeTotals(threeQuarters())
    )
    expect(failures.map((f) => f.metric)).toEqual(['statements', 'branches', 'lines'])
  })
})

describe('formatThresholdFailure', () => {
  it('should print actual, floor and shortfall', () => {
    expect(formatThresholdFailure({ metric: 'lines', label: 'Lines', actual: 75, floor: 80, shortfall: 5 })).toBe(
      'Lines: 75.00% < 80% (short 5.00%)'
    )
  })

  it('should keep fractional floors', () => {
    expect(
      formatThresholdFailure({ metric: 'branches', label: 'Branches', actual: 50, floor: 82.5, shortfall: 32.5 })
    ).toBe('Branches: 50.00% < 82.5% (short 32.50%)')
  })

  it('should round the actual percentage to two decimals', () => {
    expect(
      formatThresholdFailure({ metric: 'functions', label: 'Functions', actual: 200 / 3, floor: 70, shortfall: 70 - 200 / 3 })
    ).toBe('Functions: 66.67% < 70% (short 3.33%)')
  })
})

describe('formatThresholdFailures', () => {
  it('should be empty when nothing failed', () => {
    expect(formatThresholdFailures([])).toEqual([])
  })
})

describe('checkThresholds', () => {
  let consoleLogSpy: MockInstance

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    consoleLogSpy.mockRestore()
  })

  it('should write the failure block and return true', () => {
    const lines: string[] = []
    const failed = checkThresholds({ lines: 80 }, threeQuarters(), (line) => lines.push(line))
    expect(failed).toBe(true)
    expect(lines).toEqual(['', 'Coverage thresholds not met', ' Lines: 75.00% < 80% (short 5.00%)'])
  })

  it('should print to the console by default', () => {
    checkThresholds({ branches: 60 }, threeQuarters())
    expect(consoleLogSpy).toHaveBeenCalledWith(' Branches: 50.00% < 60% (short 10.00%)')
  })

  it('should write nothing when every metric passes', () => {
    expect(checkThresholds({ functions: 100 }, threeQuarters())).toBe(false)
    expect(consoleLogSpy).not.toHaveBeenCalled()
  })

  it('should have nothing to check without thresholds or a report', () => {
    expect(checkThresholds(undefined, threeQuarters())).toBe(false)
    expect(checkThresholds({ lines: 80 }, undefined)).toBe(false)
  })
})
