import { describe, it, expect } from 'vitest'
import { CoverageMerger, createMerger, mergeReports, resolveReportPaths } from '../merger/index.js'
import { buildFileCoverage } from '../report.js'
import { encodeStatementId } from '../statement-id.js'
import type { CoverageReport, FileCoverage } from '../types.js'

const ROOT = '/repo'

function sampleFile(path: string): FileCoverage {
  return buildFileCoverage({
    path,
    lineHits: new Map([
      [1, 2],
      [2, 0],
      [3, 1],
    ]),
    statementHits: new Map([
      [encodeStatementId(1, 0), 2],
      [encodeStatementId(2, 4), 0],
    ]),
    statementMap: new Map([
      [encodeStatementId(1, 0), { startLine: 1, endLine: 1 }],
      [encodeStatementId(2, 4), { startLine: 2, endLine: 3 }],
    ]),
    functionHits: new Map([
      ['1:main', 1],
      ['7:helper', 0],
    ]),
    functionMap: new Map([
      ['1:main', { name: 'main', line: 1 }],
      ['7:helper', { name: 'helper', line: 7 }],
    ]),
    branchHits: new Map([['2:0', [1, 0]]]),
    branchMap: new Map([['2:0', 2]]),
  })
}

function report(...files: FileCoverage[]): CoverageReport {
  return { files }
}

describe('CoverageMerger', () => {
  it('should double every counter when a report is merged with itself', () => {
    const shard = report(sampleFile('src/a.ts'))
    const merged = createMerger(ROOT).merge(shard, shard)

    expect(merged.files).toHaveLength(1)
    const [file] = merged.files
    expect(file.path).toBe('/repo/src/a.ts')
    expect(Object.fromEntries(file.lineHits)).toEqual({ 1: 4, 2: 0, 3: 2 })
    expect([...(file.statementHits ?? new Map())]).toEqual([
      [encodeStatementId(1, 0), 4],
      [encodeStatementId(2, 4), 0],
    ])
    expect(Object.fromEntries(file.functionHits)).toEqual({ '1:main': 2, '7:helper': 0 })
    expect(Object.fromEntries(file.branchHits)).toEqual({ '2:0': [2, 0] })
    expect(file.linesTotal).toBe(3)
    expect(file.linesCovered).toBe(2)
    expect(file.statementsTotal).toBe(2)
    expect(file.statementsCovered).toBe(1)
    expect(file.statementMap?.get(encodeStatementId(2, 4))).toEqual({ startLine: 2, endLine: 3 })
  })

  it('should fold paths that normalize to the same file', () => {
    const merged = mergeReports(
      [report(sampleFile('src/a.ts')), report(sampleFile('/repo/src/a.ts')), report(sampleFile('src\\a.ts'))],
      ROOT
    )
    expect(merged.files.map((f) => f.path)).toEqual(['/repo/src/a.ts'])
    expect(merged.files[0].lineHits.get(1)).toBe(6)
  })

  it('should sort merged files by path', () => {
    const merged = mergeReports([report(sampleFile('z.ts'), sampleFile('b.ts')), report(sampleFile('a/c.ts'))], ROOT)
    expect(merged.files.map((f) => f.path)).toEqual(['/repo/a/c.ts', '/repo/b.ts', '/repo/z.ts'])
  })

  it('should keep the first metadata seen for a key', () => {
    const first = buildFileCoverage({
      path: 'a.ts',
      lineHits: new Map(),
      branchHits: new Map([['4:0', [1]]]),
      branchMap: new Map([['4:0', 4]]),
      functionHits: new Map([['f', 0]]),
      functionMap: new Map([['f', { name: 'f', line: 0 }]]),
    })
    const second = buildFileCoverage({
      path: 'a.ts',
      lineHits: new Map(),
      branchHits: new Map([['4:0', [0, 3]]]),
      branchMap: new Map([['4:0', 5]]),
      functionHits: new Map([['f', 2]]),
      functionMap: new Map([['f', { name: 'renamed', line: 9 }]]),
    })
    const [file] = mergeReports([report(first), report(second)], ROOT).files
    expect(file.branchMap.get('4:0')).toBe(4)
    expect(file.branchHits.get('4:0')).toEqual([1, 3])
    expect(file.functionMap.get('f')).toEqual({ name: 'f', line: 0 })
    expect(file.functionHits.get('f')).toBe(2)
  })

  it('should describe functions without metadata as anonymous', () => {
    const file = buildFileCoverage({ path: 'a.ts', lineHits: new Map(), functionHits: new Map([['12:x', 1]]) })
    const [merged] = mergeReports([report(file)], ROOT).files
    expect(merged.functionMap.get('12:x')).toEqual({ name: '(anonymous)', line: 0 })
  })

  it('should normalize Rust function ids while merging', () => {
    const lhs = buildFileCoverage({
      path: 'src/lib.rs',
      lineHits: new Map(),
      functionHits: new Map([['3:_RNvNtCs2PylkhAFI23_11parity_real1a1a', 1]]),
      functionMap: new Map([['3:_RNvNtCs2PylkhAFI23_11parity_real1a1a', { name: '_RNvNtCs2PylkhAFI23_11parity_real1a1a', line: 3 }]]),
    })
    const rhs = buildFileCoverage({
      path: 'src/lib.rs',
      lineHits: new Map(),
      functionHits: new Map([['3:_RNvNtCsiNoeFlk8yU1_11parity_real1a1a', 4]]),
    })
    const [file] = mergeReports([report(lhs), report(rhs)], ROOT).files
    expect(Object.fromEntries(file.functionHits)).toEqual({ '3:11parity_real1a1a': 5 })
    expect(file.functionMap.get('3:11parity_real1a1a')).toEqual({ name: '11parity_real1a1a', line: 3 })
  })

  it('should keep statement data when only some shards carry it', () => {
    const lineOnly = buildFileCoverage({ path: 'a.ts', lineHits: new Map([[1, 1]]) })
    const [file] = mergeReports([report(lineOnly), report(sampleFile('a.ts'))], ROOT).files
    expect(file.statementsTotal).toBe(2)
    expect(file.lineHits.get(1)).toBe(3)

    const [plain] = mergeReports([report(lineOnly)], ROOT).files
    expect(plain.statementHits).toBeUndefined()
    expect(plain.statementsTotal).toBeUndefined()
  })

  it('should saturate summed counts', () => {
    const big = buildFileCoverage({ path: 'a.ts', lineHits: new Map([[1, 4_000_000_000]]) })
    const [file] = mergeReports([report(big), report(big)], ROOT).files
    expect(file.lineHits.get(1)).toBe(4_294_967_295)
  })

  it('should report merge statistics', () => {
    const merger = new CoverageMerger({ root: ROOT })
    const { report: merged, stats } = merger.mergeWithStats([
      report(sampleFile('a.ts'), sampleFile('b.ts')),
      report(sampleFile('a.ts')),
    ])
    expect(merged.files).toHaveLength(2)
    expect(stats).toEqual({ shards: 2, inputFiles: 3, mergedFiles: 2 })
  })

  it('should return an empty report for no input', () => {
    expect(mergeReports([], ROOT)).toEqual({ files: [] })
  })

  it('should resolve the paths of a single report', () => {
    const resolved = resolveReportPaths(report(sampleFile('./x/../a.ts')), ROOT)
    expect(resolved.files.map((f) => f.path)).toEqual(['/repo/a.ts'])
    expect(resolved.files[0].lineHits.get(1)).toBe(2)
  })
})
