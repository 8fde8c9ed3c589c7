import { describe, it, expect } from 'vitest'
import { renderCoverageReport, selectWeakestFiles } from '../index.js'
import { renderDetailBlocks } from '../detail.js'
import { createColors } from '../colors.js'
import { COVERAGE_SUMMARY_BOTTOM, COVERAGE_SUMMARY_TOP } from '../istanbul-text.js'
import { buildFileCoverage, createReport } from '../../report.js'
import type { FileSummary } from '../../analysis.js'
import type { FileCoverage, PrintOpts } from '../../types.js'

const IDEA = 'idea://open?file={file}&line={line}'
const SEPARATOR = '─'.repeat(100)
const DASH = `${'-'.repeat(10)}|---------|----------|---------|---------|${'-'.repeat(19)}`

function weakFile(): FileCoverage {
  return buildFileCoverage({
    path: '/repo/src/a.ts',
    lineHits: new Map([
      [1, 1],
      [2, 1],
      [3, 1],
      [4, 0],
    ]),
    functionHits: new Map([
      ['1:main', 1],
      ['7:helper', 0],
    ]),
    functionMap: new Map([
      ['1:main', { name: 'main', line: 1 }],
      ['7:helper', { name: 'helper', line: 7 }],
    ]),
  })
}

function coveredFile(): FileCoverage {
  return buildFileCoverage({ path: '/repo/src/b.ts', lineHits: new Map([[1, 1]]) })
}

function render(printOpts: Partial<PrintOpts> = {}): string[] {
  const report = createReport([coveredFile(), weakFile()])
  return renderCoverageReport(report, {
    root: '/repo',
    printOpts: { tty: false, pageFit: false, ...printOpts },
    columns: 100,
    rows: 40,
    env: {},
  }).split('\n')
}

describe('renderCoverageReport', () => {
  it('should print a table per file, then the text table and summary', () => {
    const lines = render({ detail: 'all' })

    expect(lines[0].startsWith('┌')).toBe(true)
    expect(lines[3].startsWith('│src/a.ts ')).toBe(true)
    expect(lines[46]).toBe(SEPARATOR)
    expect(lines[50].startsWith('│src/b.ts ')).toBe(true)
    expect(lines[53]).toBe(SEPARATOR)
    expect(lines.slice(54)).toEqual([
      DASH,
      'File      | % Stmts | % Branch | % Funcs | % Lines | Uncovered Line #s ',
      DASH,
      `All files |      80 |      N/A |      50 |      80 |${' '.repeat(19)}`,
      ` src/a.ts |      75 |      N/A |      50 |      75 | 4${' '.repeat(17)}`,
      ` src/b.ts |     100 |      N/A |     100 |     100 |${' '.repeat(19)}`,
      DASH,
      '',
      COVERAGE_SUMMARY_TOP,
      'Statements   : 80% ( 4/5 )',
      'Branches     : N/A ( 0/0 )',
      'Functions    : 50% ( 1/2 )',
      'Lines        : 80% ( 4/5 )',
      COVERAGE_SUMMARY_BOTTOM,
      '',
      'src/a.ts  lines 75.0% #######-------  funcs 50.0%  branches 100.0%',
      '  Hotspots:',
      '    - L4–L4 (1 lines)  a.ts:4',
      '  Uncovered functions:',
      '    - helper @ a.ts:7',
    ])
  })

  it('should end with the summary block when detail is auto', () => {
    const lines = render()
    expect(lines[lines.length - 1]).toBe(COVERAGE_SUMMARY_BOTTOM)
  })

  it('should shrink the tables to the page when pageFit is set', () => {
    const lines = render({ pageFit: true })
    expect(lines[36]).toBe(SEPARATOR)
  })

  it('should keep only the weakest files with maxFiles', () => {
    const lines = render({ maxFiles: 1 })
    expect(lines.filter((line) => line === SEPARATOR)).toHaveLength(1)
    expect(lines).toContain(` src/a.ts |      75 |      N/A |      50 |      75 | 4${' '.repeat(17)}`)
    expect(lines.some((line) => line.startsWith(' src/b.ts'))).toBe(false)
  })

  it('should total every file when maxFiles hides some of them', () => {
    const weak = buildFileCoverage({
      path: '/repo/src/w.ts',
      lineHits: new Map([
        [1, 1],
        [2, 0],
      ]),
    })
    const strong = buildFileCoverage({
      path: '/repo/src/s.ts',
      lineHits: new Map([
        [1, 1],
        [2, 1],
        [3, 1],
        [4, 1],
        [5, 1],
        [6, 1],
      ]),
    })
    const lines = renderCoverageReport(createReport([weak, strong]), {
      root: '/repo',
      printOpts: { tty: false, pageFit: false, maxFiles: 1 },
      columns: 100,
      rows: 40,
      env: {},
    }).split('\n')

    expect(lines).toContain(`All files |    87.5 |      N/A |     100 |    87.5 |${' '.repeat(19)}`)
    expect(lines).toContain('Lines        : 87.5% ( 7/8 )')
    expect(lines).toContain(` src/w.ts |      50 |      N/A |     100 |      50 | 2${' '.repeat(17)}`)
    expect(lines.some((line) => line.startsWith(' src/s.ts'))).toBe(false)
  })

  it('should print no escape sequences without a TTY', () => {
    expect(render({ detail: 'all', editorCmd: IDEA }).join('\n').includes('\u001b')).toBe(false)
  })
})

describe('renderDetailBlocks', () => {
  const style = { colors: createColors(false), unicode: false }

  it('should be empty in auto mode', () => {
    expect(renderDetailBlocks([{ name: 'src/a.ts', file: weakFile() }], { tty: false, pageFit: false }, style)).toBe('')
  })

  it('should link hotspots and functions through the editor template', () => {
    const text = renderDetailBlocks(
      [{ name: 'src/a.ts', file: weakFile() }],
      { tty: false, pageFit: false, detail: { lines: 1 }, editorCmd: IDEA },
      style
    )
    expect(text.split('\n').slice(1)).toEqual([
      '  Hotspots:',
      '    - L4–L4 (1 lines)  a.ts:4<idea://open?file=/repo/src/a.ts&line=4>',
      '  Uncovered functions:',
      '    - helper @ a.ts:7<idea://open?file=/repo/src/a.ts&line=7>',
    ])
  })

  it('should order files weakest first and skip fully covered ones', () => {
    const other = buildFileCoverage({
      path: '/repo/src/c.ts',
      lineHits: new Map([
        [1, 0],
        [2, 0],
      ]),
    })
    const text = renderDetailBlocks(
      [
        { name: 'src/a.ts', file: weakFile() },
        { name: 'src/b.ts', file: coveredFile() },
        { name: 'src/c.ts', file: other },
      ],
      { tty: false, pageFit: false, detail: 'all' },
      style
    )
    const headers = text.split('\n').filter((line) => line.startsWith('src/'))
    expect(headers).toEqual([
      'src/c.ts  lines 0.0% --------------  funcs 100.0%  branches 100.0%',
      'src/a.ts  lines 75.0% #######-------  funcs 50.0%  branches 100.0%',
    ])
  })
})

describe('selectWeakestFiles', () => {
  function entry(name: string, covered: number): { name: string; summary: FileSummary } {
    const counts = { covered, total: 4 }
    return { name, summary: { statements: counts, branches: counts, functions: counts, lines: counts } }
  }

  it('should keep the lowest coverage in original order', () => {
    const files = [entry('a', 4), entry('b', 1), entry('c', 3), entry('d', 1)]
    expect(selectWeakestFiles(files, 2).map((f) => f.name)).toEqual(['b', 'd'])
    expect(selectWeakestFiles(files, 3).map((f) => f.name)).toEqual(['b', 'c', 'd'])
  })

  it('should return every file without a limit', () => {
    const files = [entry('a', 4), entry('b', 1)]
    expect(selectWeakestFiles(files, undefined)).toEqual(files)
  })
})
