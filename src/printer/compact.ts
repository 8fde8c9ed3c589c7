/**
 * One-line-per-file formats for logs and CI annotations
 */

import { computeHotspots, fileSummary, pct } from '../analysis.js'
import { DEFAULT_DETAIL_HOTSPOTS } from '../constants.js'
import type { FileCoverage, NamedFileCoverage, PrintOpts } from '../types.js'
import { computeTotals } from '../thresholds.js'
import { lineLinkFormatter } from './links.js'

interface RankedFile extends NamedFileCoverage {
  linesPct: number
}

function rankByLinePct(files: readonly NamedFileCoverage[], maxFiles: number | undefined): RankedFile[] {
  const ranked = files
    .map((entry) => ({ ...entry, linesPct: pct(fileSummary(entry.file).lines) }))
    .sort((a, b) => a.linesPct - b.linesPct || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  return maxFiles === undefined ? ranked : ranked.slice(0, Math.max(maxFiles, 1))
}

/**
 * `%Lines  Uncov  File` listing, weakest files first
 */
export function formatCompact(files: readonly NamedFileCoverage[], printOpts: PrintOpts): string {
  const lines = [`${'%Lines'.padEnd(6)}  ${'Uncov'.padEnd(8)}  File`]
  for (const entry of rankByLinePct(files, printOpts.maxFiles)) {
    const uncovered = entry.file.linesTotal - entry.file.linesCovered
    lines.push(`${entry.linesPct.toFixed(1).padStart(5)}%  ${String(uncovered).padStart(8)}  ${entry.name}`)
  }
  return lines.join('\n')
}

/**
 * `path: 3-5, 9` listing of the top hotspots per file, largest first like the detail blocks
 */
export function formatHotspots(files: readonly NamedFileCoverage[], printOpts: PrintOpts): string {
  const limit = Math.max(printOpts.maxHotspots ?? DEFAULT_DETAIL_HOTSPOTS, 1)
  const link = lineLinkFormatter(printOpts)
  const lines: string[] = []
  for (const entry of rankByLinePct(files, printOpts.maxFiles)) {
    const hotspots = computeHotspots(entry.file).slice(0, limit)
    if (hotspots.length === 0) continue
    const labels = hotspots.map(({ start, end }) =>
      link(entry.file.path, start, start === end ? String(start) : `${start}-${end}`)
    )
    lines.push(`${entry.name}: ${labels.join(', ')}`)
  }
  return lines.join('\n')
}

/**
 * `Lines: 87.5% (7/8)` over the whole report
 */
export function formatSummary(files: readonly FileCoverage[]): string {
  const { lines } = computeTotals({ files: [...files] })
  return `Lines: ${pct(lines).toFixed(1)}% (${lines.covered}/${lines.total})`
}
