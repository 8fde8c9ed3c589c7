/**
 * Editor links
 *
 * Templates substitute `{file}` (alias `{path}`) with the absolute path and
 * `{line}` with the line number. TTY output gets OSC-8 hyperlinks, anything
 * else gets the URL in angle brackets after the label.
 */

import path from 'node:path'
import { DEFAULT_EDITOR_CMD } from '../constants.js'
import type { PrintOpts } from '../types.js'
import { osc8 } from './colors.js'

type LinkOpts = Pick<PrintOpts, 'tty' | 'editorCmd'>

function configuredCmd(printOpts: LinkOpts): string | undefined {
  const trimmed = printOpts.editorCmd?.trim()
  return trimmed ? trimmed : undefined
}

/**
 * Template in effect: the configured one, else the VS Code scheme for TTY output
 */
export function resolveEditorCmd(printOpts: LinkOpts): string | undefined {
  return configuredCmd(printOpts) ?? (printOpts.tty ? DEFAULT_EDITOR_CMD : undefined)
}

export function expandEditorCmd(cmd: string, absPath: string, line: number): string {
  return cmd
    .replaceAll('{file}', absPath)
    .replaceAll('{path}', absPath)
    .replaceAll('{line}', String(line))
}

function linkLabel(label: string, url: string, tty: boolean): string {
  return tty ? osc8(label, url) : `${label}<${url}>`
}

/**
 * `file.ts:42`, linked to the editor when a template is in effect
 *
 * @example
 * ```typescript
 * formatEditorLink('/repo/src/a.ts', 'src/a.ts', 3, { tty: false, editorCmd: 'idea://open?file={file}&line={line}' })
 * // 'a.ts:3<idea://open?file=/repo/src/a.ts&line=3>'
 * ```
 */
export function formatEditorLink(
  absPath: string,
  relPath: string,
  line: number,
  printOpts: LinkOpts
): string {
  const label = `${path.posix.basename(relPath) || relPath}:${line}`
  const cmd = resolveEditorCmd(printOpts)
  return cmd ? linkLabel(label, expandEditorCmd(cmd, absPath, line), printOpts.tty) : label
}

/**
 * Formatter for bare line numbers, or another label opening at `line`;
 * only links when a template is configured
 */
export function lineLinkFormatter(
  printOpts: LinkOpts
): (absPath: string, line: number, label?: string) => string {
  const cmd = configuredCmd(printOpts)
  if (!cmd) {
    return (_absPath, line, label = String(line)) => label
  }
  return (absPath, line, label = String(line)) =>
    linkLabel(label, expandEditorCmd(cmd, absPath, line), printOpts.tty)
}
