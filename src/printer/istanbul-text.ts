/**
 * Istanbul-style text table
 *
 * Same layout as Istanbul's `text` reporter, so the output can be compared
 * line by line with it:
 *
 * --------------|---------|----------|---------|---------|-------------------
 * File          | % Stmts | % Branch | % Funcs | % Lines | Uncovered Line #s
 * --------------|---------|----------|---------|---------|-------------------
 * All files     |      75 |       50 |     100 |      75 |
 *  src/a.ts     |      75 |       50 |     100 |      75 | 3
 * --------------|---------|----------|---------|---------|-------------------
 */

import type { FileSummary } from '../analysis.js'
import { pct } from '../analysis.js'
import type { MetricCounts } from '../types.js'
import { saturatingAdd } from '../utils/counts.js'
import { tintPct } from './colors.js'
import type { Colors } from './colors.js'
import { shortenPathPreservingFilename } from './path-shorten.js'
import { visibleWidth } from './table.js'

export interface IstanbulTextRow {
  /** Root-relative path */
  name: string
  summary: FileSummary
  lineHits: Map<number, number>
}

/** Width of the four percentage columns and their separators */
const FIXED_COLUMNS_WIDTH = 9 + 10 + 9 + 9 + 5
const MIN_MISSING_WIDTH = 19
const MIN_FILE_WIDTH = 10
/** Longer names are shortened to fit, keeping the file name */
const MAX_FILE_WIDTH = 40

export const COVERAGE_SUMMARY_TOP =
  '=============================== Coverage summary ==============================='
export const COVERAGE_SUMMARY_BOTTOM = '='.repeat(80)

/**
 * Percentage floored to two decimals, without trailing zeros (87.5, 100, 33.33)
 */
export function formatIstanbulPct(value: number): string {
  const finite = Number.isFinite(value) ? value : 0
  const floored = Math.floor(finite * 100) / 100
  return floored.toFixed(2).replace(/\.?0+$/, '')
}

/**
 * Pad to `width` after `leadingSpaces` spaces. Text that does not fit keeps
 * its tail behind a `...` prefix.
 */
export function istanbulFill(
  text: string,
  width: number,
  alignRight: boolean,
  leadingSpaces: number
): string {
  const leader = ' '.repeat(Math.min(leadingSpaces, width))
  const remaining = width - leader.length
  if (remaining <= 0) {
    return leader
  }

  const textWidth = visibleWidth(text)
  if (textWidth <= remaining) {
    const pad = ' '.repeat(remaining - textWidth)
    return alignRight ? leader + pad + text : leader + text + pad
  }

  const ellipsis = '...'
  const tailLength = Math.max(remaining - ellipsis.length, 0)
  const tail = tailLength > 0 ? Array.from(text).slice(-tailLength).join('') : ''
  return leader + ellipsis + tail
}

/**
 * Uncovered line list: ranges joined by commas, or one range when nothing ran
 */
export function formatUncoveredLines(lineHits: Map<number, number>): string {
  const uncovered = [...lineHits]
    .filter(([, hits]) => hits === 0)
    .map(([line]) => line)
    .sort((a, b) => a - b)
  if (uncovered.length === 0) {
    return ''
  }

  if (uncovered.length === lineHits.size) {
    const start = uncovered[0]
    const end = uncovered[uncovered.length - 1]
    return start === end ? `${start}` : `${start}-${end}`
  }

  const parts: string[] = []
  let i = 0
  while (i < uncovered.length) {
    const start = uncovered[i]
    let end = start
    while (i + 1 < uncovered.length && uncovered[i + 1] === end + 1) {
      i++
      end = uncovered[i]
    }
    parts.push(start === end ? `${start}` : `${start}-${end}`)
    i++
  }
  return parts.join(',')
}

function tableWidths(maxNameLength: number, maxColumns: number): { file: number; missing: number } {
  const file = Math.min(Math.max(maxNameLength + 1, MIN_FILE_WIDTH), MAX_FILE_WIDTH)
  if (maxColumns > FIXED_COLUMNS_WIDTH + MIN_MISSING_WIDTH) {
    return { file, missing: Math.max(maxColumns - (FIXED_COLUMNS_WIDTH + file), MIN_MISSING_WIDTH) }
  }
  return { file, missing: MIN_MISSING_WIDTH }
}

function emptyCounts(): MetricCounts {
  return { covered: 0, total: 0 }
}

function addInto(target: MetricCounts, counts: MetricCounts): void {
  target.covered = saturatingAdd(target.covered, counts.covered)
  target.total = saturatingAdd(target.total, counts.total)
}

/**
 * Sum of file summaries
 */
export function sumSummaries(summaries: readonly FileSummary[]): FileSummary {
  const totals: FileSummary = {
    statements: emptyCounts(),
    branches: emptyCounts(),
    functions: emptyCounts(),
    lines: emptyCounts(),
  }
  for (const summary of summaries) {
    addInto(totals.statements, summary.statements)
    addInto(totals.branches, summary.branches)
    addInto(totals.functions, summary.functions)
    addInto(totals.lines, summary.lines)
  }
  return totals
}

interface RowLayout {
  indent: boolean
  fileWidth: number
  missingWidth: number
}

function renderRow(
  label: string,
  summary: FileSummary,
  uncovered: string,
  layout: RowLayout,
  colors: Colors
): string {
  const leader = layout.indent ? 1 : 0
  const shortened = shortenPathPreservingFilename(label, Math.max(layout.fileWidth - leader, 1))
  const fileCell = istanbulFill(shortened, layout.fileWidth, false, leader)

  const stmts = pct(summary.statements)
  const branches = pct(summary.branches)
  const funcs = pct(summary.functions)
  const lines = pct(summary.lines)
  const branchText = summary.branches.total === 0 ? 'N/A' : formatIstanbulPct(branches)
  const rowMin = Math.min(stmts, branches, funcs, lines)

  return [
    tintPct(colors, rowMin, fileCell),
    tintPct(colors, stmts, ` ${formatIstanbulPct(stmts).padStart(7)} `),
    tintPct(colors, branches, ` ${branchText.padStart(8)} `),
    tintPct(colors, funcs, ` ${formatIstanbulPct(funcs).padStart(7)} `),
    tintPct(colors, lines, ` ${formatIstanbulPct(lines).padStart(7)} `),
    tintPct(colors, rowMin, istanbulFill(uncovered, layout.missingWidth, false, 1)),
  ].join('|')
}

/**
 * Render the table for the given rows (sorted by name here) and return it with the totals.
 * `totals` fills the `All files` row when the rows are a subset of the report;
 * by default it is the sum of the rows.
 */
export function renderIstanbulTextReport(
  rows: readonly IstanbulTextRow[],
  maxColumns: number,
  colors: Colors,
  totals: FileSummary = sumSummaries(rows.map((row) => row.summary))
): { text: string; totals: FileSummary } {
  const sorted = [...rows].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  const maxNameLength = sorted.reduce((max, row) => Math.max(max, visibleWidth(row.name) + 1), 0)
  const widths = tableWidths(maxNameLength, maxColumns)

  const dash = `${'-'.repeat(widths.file)}|---------|----------|---------|---------|${'-'.repeat(widths.missing)}`
  const header = `${'File'.padEnd(widths.file - 1)} | % Stmts | % Branch | % Funcs | % Lines |${istanbulFill('Uncovered Line #s', widths.missing, false, 1)}`

  const lines = [
    dash,
    header,
    dash,
    renderRow('All files', totals, '', { indent: false, fileWidth: widths.file, missingWidth: widths.missing }, colors),
  ]
  for (const row of sorted) {
    lines.push(
      renderRow(
        row.name,
        row.summary,
        formatUncoveredLines(row.lineHits),
        { indent: true, fileWidth: widths.file, missingWidth: widths.missing },
        colors
      )
    )
  }
  lines.push(dash)

  return { text: lines.join('\n'), totals }
}

function formatSummaryLine(label: string, counts: MetricCounts, colors: Colors): string {
  const empty = counts.total === 0
  const labelPct = empty ? 100 : pct(counts)
  const countsPct = empty ? 0 : pct(counts)
  const pctText = empty ? 'N/A' : `${formatIstanbulPct(pct(counts))}%`
  const pad = ' '.repeat(Math.max(13 - visibleWidth(label), 0))

  return `${tintPct(colors, labelPct, label)}${pad}: ${tintPct(colors, labelPct, pctText)} ${tintPct(colors, countsPct, `( ${counts.covered}/${counts.total} )`)}`
}

/**
 * The `Coverage summary` block printed under the table
 */
export function renderCoverageSummary(totals: FileSummary, colors: Colors): string {
  return [
    COVERAGE_SUMMARY_TOP,
    formatSummaryLine('Statements', totals.statements, colors),
    formatSummaryLine('Branches', totals.branches, colors),
    formatSummaryLine('Functions', totals.functions, colors),
    formatSummaryLine('Lines', totals.lines, colors),
    COVERAGE_SUMMARY_BOTTOM,
  ].join('\n')
}
