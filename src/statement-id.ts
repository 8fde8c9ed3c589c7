/**
 * Statement-position codec
 *
 * Maps a (line, column) source position to one integer key, for formats
 * without native statement identity. The key is `line * 2^32 + column`:
 * equal positions give equal keys, and keys sort by line then column.
 * Lines are clamped to 2^21 - 1 so the key stays a safe integer.
 */

import { MAX_STATEMENT_LINE, STATEMENT_LINE_FACTOR } from './constants.js'
import type { StatementId } from './types.js'
import { clampCount } from './utils/counts.js'

export function encodeStatementId(line: number, column: number): StatementId {
  const safeLine = Math.min(clampCount(line), MAX_STATEMENT_LINE)
  return safeLine * STATEMENT_LINE_FACTOR + clampCount(column)
}

/**
 * Line part of a statement id
 */
export function statementIdLine(id: StatementId): number {
  return Math.floor(id / STATEMENT_LINE_FACTOR)
}
