/**
 * Percentage bars
 */

import { tintPct } from './colors.js'
import type { Colors } from './colors.js'

export interface BarStyle {
  colors: Colors
  /** Block characters when true, `#` and `-` otherwise */
  unicode: boolean
}

const DETAIL_BAR_WIDTH = 14

function drawBar(pct: number, width: number, filled: number, style: BarStyle): string {
  const solid = (style.unicode ? '█' : '#').repeat(filled)
  const empty = (style.unicode ? '░' : '-').repeat(Math.max(width - filled, 0))
  return tintPct(style.colors, pct, solid) + style.colors.gray(empty)
}

/**
 * Bar filled in proportion to the percentage, `width` characters wide
 */
export function bar(pct: number, width: number, style: BarStyle): string {
  const w = Math.max(width, 0)
  const filled = Math.min(Math.max(Math.round((pct / 100) * w), 0), w)
  return drawBar(pct, w, filled, style)
}

/**
 * Fixed-width bar of detail headers: one cell per ten percent
 */
export function detailBar(pct: number, style: BarStyle): string {
  const filled = Math.min(Math.max(Math.floor(pct / 10), 0), DETAIL_BAR_WIDTH)
  return drawBar(pct, DETAIL_BAR_WIDTH, filled, style)
}
