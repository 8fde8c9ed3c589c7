/**
 * Coverage report renderer
 *
 * Turns a merged, filtered report into terminal text: one composite table
 * per file, the Istanbul-style text table with its summary block and,
 * when asked for, detail blocks with editor links.
 */

import {
  computeHotspots,
  fileSummary,
  missedBranches,
  missedFunctions,
  pct,
} from '../analysis.js'
import type { FileSummary } from '../analysis.js'
import { ISTANBUL_TEXT_MAX_COLUMNS, PAGE_FIT_MAX_ROWS } from '../constants.js'
import { displayPath } from '../paths.js'
import { compareStrings } from '../report.js'
import type { CoverageReport, NamedFileCoverage, PrintOpts } from '../types.js'
import type { BarStyle } from './bars.js'
import { colorsEnabled, createColors } from './colors.js'
import { renderDetailBlocks } from './detail.js'
import { renderCoverageSummary, renderIstanbulTextReport, sumSummaries } from './istanbul-text.js'
import { buildPerFileTableLayout, renderPerFileTable } from './per-file-table.js'
import { detectColumns, detectRows, separatorWidth } from './terminal.js'

export interface RenderOptions {
  /** Repository root; file names are shown relative to it */
  root: string
  printOpts: PrintOpts
  columns?: number
  rows?: number
  /** Environment consulted for COLUMNS, LINES, NO_COLOR and FORCE_COLOR */
  env?: NodeJS.ProcessEnv
}

/**
 * Keep the `maxFiles` files with the lowest line coverage, in their original order
 */
export function selectWeakestFiles<T extends { summary: FileSummary }>(
  files: readonly T[],
  maxFiles: number | undefined
): T[] {
  if (maxFiles === undefined || files.length <= maxFiles) {
    return [...files]
  }
  const keep = new Set(
    files
      .map((entry, index) => ({ index, linesPct: pct(entry.summary.lines) }))
      .sort((a, b) => a.linesPct - b.linesPct || a.index - b.index)
      .slice(0, Math.max(maxFiles, 1))
      .map((entry) => entry.index)
  )
  return files.filter((_entry, index) => keep.has(index))
}

function perFileRows(rows: number, pageFit: boolean): number {
  if (pageFit) {
    return Math.max(Math.min(rows, PAGE_FIT_MAX_ROWS) - 1, 14)
  }
  return rows + 8
}

/**
 * Render a report for the terminal
 *
 * @example
 * ```typescript
 * const text = renderCoverageReport(report, {
 *   root: process.cwd(),
 *   printOpts: { tty: false, pageFit: false },
 * })
 * console.log(text)
 * ```
 */
export function renderCoverageReport(report: CoverageReport, options: RenderOptions): string {
  const { printOpts } = options
  const env = options.env ?? process.env
  const size = { columns: options.columns, rows: options.rows, env }
  const totalWidth = detectColumns(size)
  const maxRows = perFileRows(detectRows(size), printOpts.pageFit)

  const colors = createColors(colorsEnabled(printOpts.tty, env))
  const style: BarStyle = { colors, unicode: printOpts.tty }

  const named: NamedFileCoverage[] = report.files
    .map((file) => ({ name: displayPath(file.path, options.root), file }))
    .sort((a, b) => compareStrings(a.name, b.name))
  const summarized = named.map((entry) => ({ ...entry, summary: fileSummary(entry.file) }))
  const analyzed = selectWeakestFiles(summarized, printOpts.maxFiles)

  const separator = colors.gray('─'.repeat(separatorWidth(size)))
  const layout = buildPerFileTableLayout(totalWidth, style)

  let out = ''
  for (const entry of analyzed) {
    const table = renderPerFileTable(
      {
        name: entry.name,
        summary: entry.summary,
        blocks: computeHotspots(entry.file),
        missedFunctions: missedFunctions(entry.file),
        missedBranches: missedBranches(entry.file),
        maxRows,
        maxHotspots: printOpts.maxHotspots,
        tty: printOpts.tty,
      },
      layout,
      style
    )
    out += `${table}\n${separator}\n`
  }

  const { text, totals } = renderIstanbulTextReport(
    analyzed.map((entry) => ({
      name: entry.name,
      summary: entry.summary,
      lineHits: entry.file.lineHits,
    })),
    Math.min(totalWidth, ISTANBUL_TEXT_MAX_COLUMNS),
    colors,
    sumSummaries(summarized.map((entry) => entry.summary))
  )
  out += `${text}\n\n${renderCoverageSummary(totals, colors)}`

  const details = renderDetailBlocks(analyzed, printOpts, style)
  if (details) {
    out += `\n\n${details}`
  }

  return out.trimEnd()
}

export { colorsEnabled, createColors, osc8, tintPct } from './colors.js'
export type { Colors } from './colors.js'
export { bar, detailBar } from './bars.js'
export type { BarStyle } from './bars.js'
export { computeColumnWidths } from './table.js'
export type { ColumnSpec } from './table.js'
export { shortenPathPreservingFilename } from './path-shorten.js'
export {
  formatIstanbulPct,
  formatUncoveredLines,
  istanbulFill,
  renderCoverageSummary,
  renderIstanbulTextReport,
} from './istanbul-text.js'
export { buildPerFileTableLayout, pctText, renderPerFileTable } from './per-file-table.js'
export { renderDetailBlocks } from './detail.js'
export { expandEditorCmd, formatEditorLink, lineLinkFormatter, resolveEditorCmd } from './links.js'
export { formatCompact, formatHotspots, formatSummary } from './compact.js'
export { detectColumns, detectRawColumns, detectRows } from './terminal.js'
