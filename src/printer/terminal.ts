/**
 * Terminal size detection
 *
 * Explicit options win, then COLUMNS/LINES, then the stdout TTY size.
 */

import { DEFAULT_TERMINAL_COLUMNS, DEFAULT_TERMINAL_ROWS } from '../constants.js'

export interface TerminalSizeSource {
  columns?: number
  rows?: number
  env?: NodeJS.ProcessEnv
  stdout?: { isTTY?: boolean; columns?: number; rows?: number }
}

const MIN_USABLE_COLUMNS = 20
const MIN_WIDE_COLUMNS = 60

function positiveInt(value: string | number | undefined): number | undefined {
  if (value === undefined) return undefined
  const n = typeof value === 'number' ? value : Number.parseInt(value.trim(), 10)
  return Number.isInteger(n) && n > 0 ? n : undefined
}

/**
 * Width as reported, without defaults
 */
export function detectRawColumns(source: TerminalSizeSource = {}): number | undefined {
  const env = source.env ?? process.env
  const stdout = source.stdout ?? process.stdout
  return (
    positiveInt(source.columns) ??
    positiveInt(env.COLUMNS) ??
    (stdout.isTTY ? positiveInt(stdout.columns) : undefined)
  )
}

/**
 * Usable width: at least 60 when a real width is known, 100 otherwise
 */
export function detectColumns(source: TerminalSizeSource = {}): number {
  const raw = detectRawColumns(source)
  if (raw !== undefined && raw > MIN_USABLE_COLUMNS) {
    return Math.max(raw, MIN_WIDE_COLUMNS)
  }
  return DEFAULT_TERMINAL_COLUMNS
}

export function detectRows(source: TerminalSizeSource = {}): number {
  const env = source.env ?? process.env
  const stdout = source.stdout ?? process.stdout
  return (
    positiveInt(source.rows) ??
    positiveInt(env.LINES) ??
    (stdout.isTTY ? positiveInt(stdout.rows) : undefined) ??
    DEFAULT_TERMINAL_ROWS
  )
}

/**
 * Width of the rule printed between per-file tables
 */
export function separatorWidth(source: TerminalSizeSource = {}): number {
  return Math.max(MIN_USABLE_COLUMNS, detectRawColumns(source) ?? DEFAULT_TERMINAL_COLUMNS)
}
