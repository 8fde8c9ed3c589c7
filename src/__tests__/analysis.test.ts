import { describe, it, expect } from 'vitest'
import {
  compositeBarPct,
  computeHotspots,
  fileSummary,
  hotspotBlocks,
  missedBranches,
  missedFunctions,
  pct,
  rankHotspots,
  uncoveredLinesFor,
} from '../analysis.js'
import { buildFileCoverage } from '../report.js'
import { encodeStatementId } from '../statement-id.js'
import type { FileCoverage } from '../types.js'

function linesFile(hits: Array<[number, number]>): FileCoverage {
  return buildFileCoverage({ path: '/repo/a.ts', lineHits: new Map(hits) })
}

describe('pct', () => {
  it('should count an empty metric as fully covered', () => {
    expect(pct({ covered: 0, total: 0 })).toBe(100)
  })

  it('should divide covered by total', () => {
    expect(pct({ covered: 3, total: 4 })).toBe(75)
  })
})

describe('hotspotBlocks', () => {
  it('should coalesce contiguous lines', () => {
    expect(hotspotBlocks([3, 4, 5, 9])).toEqual([
      { start: 3, end: 5 },
      { start: 9, end: 9 },
    ])
  })

  it('should ignore order and duplicates', () => {
    expect(hotspotBlocks([9, 4, 3, 4, 5])).toEqual([
      { start: 3, end: 5 },
      { start: 9, end: 9 },
    ])
  })

  it('should return nothing for no lines', () => {
    expect(hotspotBlocks([])).toEqual([])
  })
})

describe('rankHotspots', () => {
  it('should order by length, then by start line', () => {
    expect(
      rankHotspots([
        { start: 1, end: 1 },
        { start: 10, end: 13 },
        { start: 3, end: 6 },
      ])
    ).toEqual([
      { start: 3, end: 6 },
      { start: 10, end: 13 },
      { start: 1, end: 1 },
    ])
  })
})

describe('fileSummary', () => {
  it('should report every metric as 100% for an empty file', () => {
    const summary = fileSummary(linesFile([]))
    expect(pct(summary.lines)).toBe(100)
    expect(pct(summary.functions)).toBe(100)
    expect(pct(summary.branches)).toBe(100)
    expect(pct(summary.statements)).toBe(100)
  })

  it('should fall back to lines for statements', () => {
    const summary = fileSummary(linesFile([[1, 1], [2, 0]]))
    expect(summary.statements).toEqual({ covered: 1, total: 2 })
  })

  it('should count branch arms', () => {
    const file = buildFileCoverage({
      path: 'a.ts',
      lineHits: new Map(),
      branchHits: new Map([
        ['1:0', [1, 0]],
        ['5:2', [0, 0, 4]],
      ]),
    })
    expect(fileSummary(file).branches).toEqual({ covered: 2, total: 5 })
  })
})

describe('uncoveredLinesFor', () => {
  it('should use zero-hit lines without statement data', () => {
    expect(uncoveredLinesFor(linesFile([[1, 0], [2, 1], [3, 0]]))).toEqual([1, 3])
  })

  it('should expand zero-hit statements over their spans', () => {
    const file = buildFileCoverage({
      path: 'a.ts',
      lineHits: new Map([[1, 0]]),
      statementHits: new Map([
        [encodeStatementId(2, 0), 0],
        [encodeStatementId(8, 4), 0],
        [encodeStatementId(9, 0), 1],
      ]),
      statementMap: new Map([[encodeStatementId(2, 0), { startLine: 2, endLine: 4 }]]),
    })
    expect(uncoveredLinesFor(file)).toEqual([2, 3, 4, 8])
  })
})

describe('computeHotspots', () => {
  it('should rank the ranges of uncovered lines', () => {
    const file = linesFile([
      [1, 0],
      [2, 1],
      [3, 0],
      [4, 0],
      [5, 0],
      [6, 1],
      [7, 0],
    ])
    expect(computeHotspots(file)).toEqual([
      { start: 3, end: 5 },
      { start: 1, end: 1 },
      { start: 7, end: 7 },
    ])
  })
})

describe('missedFunctions', () => {
  it('should list functions with zero hits by line', () => {
    const file = buildFileCoverage({
      path: 'a.ts',
      lineHits: new Map(),
      functionHits: new Map([
        ['20:late', 0],
        ['2:early', 0],
        ['5:used', 3],
        ['lost', 0],
      ]),
      functionMap: new Map([
        ['20:late', { name: 'late', line: 20 }],
        ['2:early', { name: 'early', line: 2 }],
        ['5:used', { name: 'used', line: 5 }],
      ]),
    })
    expect(missedFunctions(file)).toEqual([
      { name: '(anonymous)', line: 0 },
      { name: 'early', line: 2 },
      { name: 'late', line: 20 },
    ])
  })

  it('should show Rust symbols as paths', () => {
    const file = buildFileCoverage({
      path: 'src/lib.rs',
      lineHits: new Map(),
      functionHits: new Map([['4:11parity_real1a1a', 0]]),
      functionMap: new Map([['4:11parity_real1a1a', { name: '11parity_real1a1a', line: 4 }]]),
    })
    expect(missedFunctions(file)).toEqual([{ name: 'parity_real::a::a', line: 4 }])
  })
})

describe('missedBranches', () => {
  it('should list groups with an untaken arm', () => {
    const file = buildFileCoverage({
      path: 'a.ts',
      lineHits: new Map(),
      branchHits: new Map([
        ['9:0', [0, 2, 0]],
        ['3:0', [1, 1]],
        ['4:1', [0, 5]],
      ]),
      branchMap: new Map([
        ['9:0', 9],
        ['3:0', 3],
        ['4:1', 4],
      ]),
    })
    expect(missedBranches(file)).toEqual([
      { id: '4:1', line: 4, zeroPaths: [0] },
      { id: '9:0', line: 9, zeroPaths: [0, 2] },
    ])
  })
})

describe('compositeBarPct', () => {
  it('should take the weakest metric and subtract a capped hotspot penalty', () => {
    const summary = {
      statements: { covered: 5, total: 10 },
      lines: { covered: 5, total: 10 },
      functions: { covered: 1, total: 2 },
      branches: { covered: 3, total: 4 },
    }
    expect(compositeBarPct(summary, [{ start: 2, end: 5 }])).toBe(35)
  })

  it('should scale the penalty with the largest range', () => {
    const summary = {
      statements: { covered: 90, total: 100 },
      lines: { covered: 90, total: 100 },
      functions: { covered: 4, total: 4 },
      branches: { covered: 0, total: 0 },
    }
    expect(compositeBarPct(summary, [{ start: 1, end: 6 }, { start: 50, end: 53 }])).toBe(87)
  })

  it('should not go below zero', () => {
    const summary = {
      statements: { covered: 0, total: 4 },
      lines: { covered: 0, total: 4 },
      functions: { covered: 0, total: 0 },
      branches: { covered: 0, total: 0 },
    }
    expect(compositeBarPct(summary, [{ start: 1, end: 4 }])).toBe(0)
  })

  it('should leave a fully covered file at 100', () => {
    expect(compositeBarPct(fileSummary(linesFile([[1, 1]])), [])).toBe(100)
  })
})
