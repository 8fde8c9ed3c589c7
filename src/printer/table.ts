/**
 * Box-drawn tables
 *
 * Widths are measured in code points. Cells longer than their column are
 * cut; shorter ones are padded on the side their column aligns away from.
 */

import { bar } from './bars.js'
import type { BarStyle } from './bars.js'
import { tintPct } from './colors.js'

export interface ColumnSpec {
  label: string
  min: number
  max: number
  alignRight: boolean
}

export type Decor =
  | { kind: 'none' }
  | { kind: 'bold' }
  | { kind: 'dim' }
  | { kind: 'tint'; pct: number }
  /** Draws a bar across the cell, ignoring its text */
  | { kind: 'bar'; pct: number }

export interface Cell {
  text: string
  decor: Decor
}

export interface TableFrame {
  top: string
  separator: string
  bottom: string
  header: string
  blankRow: string
}

const NO_DECOR: Decor = { kind: 'none' }

export function cell(text: string, decor: Decor = NO_DECOR): Cell {
  return { text, decor }
}

export function visibleWidth(text: string): number {
  return Array.from(text).length
}

export function padVisible(text: string, width: number, alignRight: boolean): string {
  const chars = Array.from(text)
  if (chars.length >= width) {
    return chars.slice(0, width).join('')
  }
  const pad = ' '.repeat(width - chars.length)
  return alignRight ? pad + text : text + pad
}

/**
 * Fit column widths into the total width, borders included.
 * Minimums shrink proportionally when they do not fit; otherwise columns grow
 * towards their maximum, leftmost first.
 */
export function computeColumnWidths(totalWidth: number, columns: readonly ColumnSpec[]): number[] {
  const budget = Math.max(totalWidth - (columns.length + 1), 1)
  const mins = columns.map((c) => c.min)
  const minSum = mins.reduce((sum, w) => sum + w, 0)
  const maxSum = columns.reduce((sum, c) => sum + c.max, 0)

  if (minSum > budget) {
    const factor = budget / minSum
    const widths = mins.map((m) => Math.max(Math.floor(m * factor), 1))
    let leftover = Math.max(budget - widths.reduce((sum, w) => sum + w, 0), 0)
    for (let i = 0; i < widths.length && leftover > 0; i++) {
      widths[i]++
      leftover--
    }
    return widths
  }

  const widths = [...mins]
  let remaining = Math.max(Math.min(budget, maxSum) - minSum, 0)
  for (let i = 0; i < widths.length && remaining > 0; i++) {
    const grow = Math.min(remaining, Math.max(columns[i].max - widths[i], 0))
    widths[i] += grow
    remaining -= grow
  }
  return widths
}

function horizontalRule(left: string, mid: string, right: string, widths: readonly number[]): string {
  return left + widths.map((w) => '─'.repeat(w)).join(mid) + right
}

export function buildTableFrame(
  columns: readonly ColumnSpec[],
  widths: readonly number[],
  style: BarStyle
): TableFrame {
  const header = columns.map((column, i) =>
    style.colors.bold(padVisible(column.label, widths[i], column.alignRight))
  )
  return {
    top: horizontalRule('┌', '┬', '┐', widths),
    separator: horizontalRule('├', '┼', '┤', widths),
    bottom: horizontalRule('└', '┴', '┘', widths),
    header: `│${header.join('│')}│`,
    blankRow: `│${widths.map((w) => ' '.repeat(w)).join('│')}│`,
  }
}

function renderCell(value: Cell, width: number, alignRight: boolean, style: BarStyle): string {
  const padded = padVisible(value.text, width, alignRight)
  switch (value.decor.kind) {
    case 'none':
      return padded
    case 'bold':
      return style.colors.bold(padded)
    case 'dim':
      return style.colors.dim(padded)
    case 'tint':
      return tintPct(style.colors, value.decor.pct, padded)
    case 'bar':
      return bar(value.decor.pct, width, style)
  }
}

function isBlankRow(row: readonly Cell[]): boolean {
  return row.every((c) => c.decor.kind === 'none' && c.text === '')
}

export function renderTable(
  frame: TableFrame,
  columns: readonly ColumnSpec[],
  widths: readonly number[],
  rows: readonly (readonly Cell[])[],
  style: BarStyle
): string {
  const lines = [frame.top, frame.header, frame.separator]
  for (const row of rows) {
    if (isBlankRow(row)) {
      lines.push(frame.blankRow)
      continue
    }
    const cells = row.map((value, i) =>
      renderCell(value, widths[i] ?? 1, columns[i]?.alignRight ?? false, style)
    )
    lines.push(`│${cells.join('│')}│`)
  }
  lines.push(frame.bottom)
  return lines.join('\n')
}
