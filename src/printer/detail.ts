/**
 * Detail blocks listing hotspots and uncovered functions, with editor links
 */

import { computeHotspots, fileSummary, missedFunctions, pct } from '../analysis.js'
import type { CoverageDetail, NamedFileCoverage, PrintOpts } from '../types.js'
import { detailBar } from './bars.js'
import type { BarStyle } from './bars.js'
import { tintPct } from './colors.js'
import { formatEditorLink } from './links.js'

function hotspotLimit(detail: CoverageDetail): number {
  if (detail === 'all') return Number.POSITIVE_INFINITY
  if (detail === 'auto') return 0
  return Math.max(detail.lines, 1)
}

function renderDetailBlock(
  entry: NamedFileCoverage,
  limit: number,
  printOpts: PrintOpts,
  style: BarStyle
): string | null {
  const { file, name } = entry
  const hotspots = computeHotspots(file)
  const missed = missedFunctions(file)
  if (hotspots.length === 0 && missed.length === 0) {
    return null
  }

  const summary = fileSummary(file)
  const colors = style.colors
  const l = pct(summary.lines)
  const f = pct(summary.functions)
  const b = pct(summary.branches)
  const header = [
    `${colors.bold(name)}  lines ${tintPct(colors, l, `${l.toFixed(1)}%`)} ${detailBar(l, style)}`,
    `funcs ${tintPct(colors, f, `${f.toFixed(1)}%`)}`,
    `branches ${tintPct(colors, b, `${b.toFixed(1)}%`)}`,
  ].join('  ')

  const lines = [header, colors.bold('  Hotspots:')]
  for (const range of hotspots.slice(0, limit)) {
    const link = formatEditorLink(file.path, name, range.start, printOpts)
    lines.push(`    - L${range.start}–L${range.end} (${range.end - range.start + 1} lines)  ${link}`)
  }
  lines.push(colors.bold('  Uncovered functions:'))
  for (const fn of missed) {
    lines.push(`    - ${fn.name} @ ${formatEditorLink(file.path, name, fn.line, printOpts)}`)
  }
  return lines.join('\n')
}

/**
 * Detail blocks for every file with something uncovered, weakest files
 * first. Empty when the detail mode is 'auto'.
 */
export function renderDetailBlocks(
  files: readonly NamedFileCoverage[],
  printOpts: PrintOpts,
  style: BarStyle
): string {
  const limit = hotspotLimit(printOpts.detail ?? 'auto')
  if (limit === 0) {
    return ''
  }

  const ordered = files
    .map((entry) => ({ entry, linesPct: pct(fileSummary(entry.file).lines) }))
    .sort(
      (a, b) =>
        a.linesPct - b.linesPct ||
        (a.entry.name < b.entry.name ? -1 : a.entry.name > b.entry.name ? 1 : 0)
    )

  return ordered
    .map(({ entry }) => renderDetailBlock(entry, limit, printOpts, style))
    .filter((block): block is string => block !== null)
    .join('\n\n')
}
