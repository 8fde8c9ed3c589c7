/**
 * Terminal styling
 *
 * All styling goes through a chalk instance whose level is decided once per
 * render: colors are on for TTY output (or when FORCE_COLOR asks for them)
 * and always off when NO_COLOR is set.
 */

import { Chalk } from 'chalk'
import type { ChalkInstance } from 'chalk'
import {
  COLOR_FAILURE,
  COLOR_SUCCESS,
  COLOR_WARNING,
  SUCCESS_THRESHOLD,
  WARNING_THRESHOLD,
} from '../constants.js'

export type Colors = ChalkInstance

function isSet(value: string | undefined): boolean {
  const trimmed = (value ?? '').trim()
  return trimmed !== '' && trimmed !== '0' && trimmed !== 'false'
}

export function colorsEnabled(tty: boolean, env: NodeJS.ProcessEnv = process.env): boolean {
  if ((env.NO_COLOR ?? '').trim() !== '') {
    return false
  }
  return tty || isSet(env.FORCE_COLOR)
}

export function createColors(enabled: boolean): Colors {
  return new Chalk({ level: enabled ? 3 : 0 })
}

/**
 * Color a text by the band its percentage falls in
 */
export function tintPct(colors: Colors, pct: number, text: string): string {
  if (pct >= SUCCESS_THRESHOLD) return colors.hex(COLOR_SUCCESS)(text)
  if (pct >= WARNING_THRESHOLD) return colors.hex(COLOR_WARNING)(text)
  return colors.hex(COLOR_FAILURE)(text)
}

/**
 * OSC-8 terminal hyperlink
 */
export function osc8(label: string, url: string): string {
  return `\u001b]8;;${url}\u0007${label}\u001b]8;;\u0007`
}
