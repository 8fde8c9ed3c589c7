/**
 * Per-file composite table
 *
 * One box-drawn table per file: a summary row, a totals row, then the
 * largest uncovered ranges, functions that never ran and branch arms
 * with zero hits, padded with individual uncovered lines up to the row
 * budget so consecutive tables line up.
 */

import { compositeBarPct, pct } from '../analysis.js'
import type { FileSummary, HotspotRange, MissedBranch, MissedFunction } from '../analysis.js'
import { MAX_FILLER_LINES } from '../constants.js'
import type { BarStyle } from './bars.js'
import { shortenPathPreservingFilename } from './path-shorten.js'
import { buildTableFrame, cell, computeColumnWidths, renderTable } from './table.js'
import type { Cell, ColumnSpec, Decor, TableFrame } from './table.js'

export interface PerFileTableLayout {
  columns: ColumnSpec[]
  widths: number[]
  frame: TableFrame
}

export interface PerFileTableInput {
  /** Root-relative path */
  name: string
  summary: FileSummary
  /** Ranked hotspot ranges */
  blocks: readonly HotspotRange[]
  missedFunctions: readonly MissedFunction[]
  missedBranches: readonly MissedBranch[]
  maxRows: number
  maxHotspots?: number
  tty: boolean
}

const DASH = '—'
const DIM: Decor = { kind: 'dim' }
const BOLD: Decor = { kind: 'bold' }

export function buildPerFileTableLayout(totalWidth: number, style: BarStyle): PerFileTableLayout {
  const total = totalWidth > 20 ? totalWidth : 100
  const columns: ColumnSpec[] = [
    { label: 'File', min: 28, max: Math.max(32, Math.floor(total * 0.42)), alignRight: false },
    { label: 'Section', min: 8, max: 10, alignRight: false },
    { label: 'Where', min: 10, max: 14, alignRight: false },
    { label: 'Lines%', min: 6, max: 7, alignRight: true },
    { label: 'Bar', min: 6, max: Math.max(6, Math.floor(total * 0.06)), alignRight: false },
    { label: 'Funcs%', min: 6, max: 7, alignRight: true },
    { label: 'Branch%', min: 7, max: 8, alignRight: true },
    { label: 'Detail', min: 18, max: Math.max(20, Math.floor(total * 0.22)), alignRight: false },
  ]
  const widths = computeColumnWidths(totalWidth, columns)
  return { columns, widths, frame: buildTableFrame(columns, widths, style) }
}

/**
 * Percentage rounded to tenths: 87.5%, 0.0%, 100.0%
 */
export function pctText(value: number): string {
  const tenths = Math.round(value * 10)
  return `${(tenths / 10).toFixed(1)}%`
}

function blankRow(): Cell[] {
  return Array.from({ length: 8 }, () => cell(''))
}

function sectionHeader(file: string, label: string, note: string): Cell[] {
  return [
    cell(file, DIM),
    cell(label, DIM),
    cell('', DIM),
    cell('', DIM),
    cell('', DIM),
    cell('', DIM),
    cell('', DIM),
    cell(note, DIM),
  ]
}

function entryRow(file: string, section: string, where: string, detail: string): Cell[] {
  return [cell(file), cell(section), cell(where), cell(''), cell(''), cell(''), cell(''), cell(detail)]
}

function* uncoveredLines(blocks: readonly HotspotRange[]): Generator<number> {
  for (const block of blocks) {
    for (let line = block.start; line <= block.end; line++) {
      yield line
    }
  }
}

export function renderPerFileTable(
  input: PerFileTableInput,
  layout: PerFileTableLayout,
  style: BarStyle
): string {
  const { summary, blocks, missedFunctions, missedBranches } = input
  const tableBudget = Math.max(14, Math.min(input.maxRows, 48))
  const rowBudget = Math.max(6, tableBudget - 6)
  const file = shortenPathPreservingFilename(input.name, layout.widths[0] ?? 28)

  const l = pct(summary.lines)
  const f = pct(summary.functions)
  const b = pct(summary.branches)
  const linesPct = pctText(l)
  const funcsPct = pctText(f)
  const branchPct = summary.branches.total === 0 ? 'N/A' : pctText(b)

  const rows: Cell[][] = [
    [
      cell(file),
      cell('Summary', BOLD),
      cell(DASH),
      cell(linesPct, { kind: 'tint', pct: l }),
      cell('', { kind: 'bar', pct: compositeBarPct(summary, blocks) }),
      cell(funcsPct, { kind: 'tint', pct: f }),
      cell(branchPct, { kind: 'tint', pct: b }),
      cell(''),
    ],
    [
      cell(file, DIM),
      cell('Totals', DIM),
      cell(DASH, DIM),
      cell(linesPct, DIM),
      cell('', DIM),
      cell(funcsPct, DIM),
      cell(branchPct, DIM),
      cell(''),
    ],
  ]

  if (blocks.length > 0 || missedFunctions.length > 0 || missedBranches.length > 0) {
    const wantHotspots = Math.min(
      input.maxHotspots !== undefined
        ? Math.max(input.maxHotspots, 1)
        : Math.ceil(rowBudget * 0.45),
      blocks.length
    )
    if (wantHotspots > 0) {
      rows.push(sectionHeader(file, 'Hotspots', '(largest uncovered ranges)'))
      for (const hotspot of blocks.slice(0, wantHotspots)) {
        rows.push(
          entryRow(
            file,
            'Hotspot',
            `L${hotspot.start}–L${hotspot.end}`,
            `${hotspot.end - hotspot.start + 1} lines`
          )
        )
      }
    }

    const wantFunctions = Math.min(Math.ceil(rowBudget * 0.25), missedFunctions.length)
    if (wantFunctions > 0) {
      rows.push(sectionHeader(file, 'Functions', '(never executed)'))
      for (const missed of missedFunctions.slice(0, wantFunctions)) {
        rows.push(entryRow(file, 'Func', `L${missed.line}`, missed.name))
      }
    }

    const wantBranches = Math.min(Math.ceil(rowBudget * 0.2), missedBranches.length)
    if (wantBranches > 0) {
      rows.push(sectionHeader(file, 'Branches', '(paths with 0 hits)'))
      for (const missed of missedBranches.slice(0, wantBranches)) {
        rows.push(
          entryRow(file, 'Branch', `L${missed.line}`, `#${missed.id} missed [${missed.zeroPaths.join(', ')}]`)
        )
      }
    }

    const target = input.tty ? rowBudget + 1 : rowBudget
    let fillers = 0
    const lines = uncoveredLines(blocks)
    while (rows.length < target) {
      const next = fillers < MAX_FILLER_LINES ? lines.next() : undefined
      if (next && !next.done) {
        fillers++
        rows.push(entryRow(file, 'Line', `L${next.value}`, 'uncovered'))
      } else {
        rows.push(blankRow())
      }
    }
  }

  return renderTable(layout.frame, layout.columns, layout.widths, rows, style)
}
