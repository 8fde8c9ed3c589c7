/**
 * Path shortening for narrow columns
 *
 * Keeps the file name readable: directories collapse into `…` first (keeping
 * the outermost and innermost ones), then the file stem is cut at `.`, `_`
 * or `-` boundaries, and only then is the name sliced in the middle.
 */

import { visibleWidth } from './table.js'

const ELLIPSIS = '…'

/** Directories kept before and after the ellipsis, most context first */
const DIRECTORY_KEEPS: ReadonlyArray<[number, number]> = [
  [1, 1],
  [1, 0],
  [0, 0],
]

const MULTI_EXTENSIONS = [
  '.test.ts',
  '.spec.ts',
  '.d.ts',
  '.schema.ts',
  '.schema.js',
  '.config.ts',
  '.config.js',
]

function takeChars(text: string, count: number): string {
  return Array.from(text).slice(0, count).join('')
}

function takeLastChars(text: string, count: number): string {
  if (count <= 0) return ''
  return Array.from(text).slice(-count).join('')
}

function sliceBalanced(input: string, width: number): string {
  if (visibleWidth(input) <= width) {
    return input
  }
  if (width <= visibleWidth(ELLIPSIS)) {
    return takeChars(ELLIPSIS, width)
  }
  const keep = width - visibleWidth(ELLIPSIS)
  const head = Math.ceil(keep / 2)
  const tail = Math.floor(keep / 2)
  return takeChars(input, head) + ELLIPSIS + takeLastChars(input, tail)
}

function splitExtension(base: string): [string, string] {
  for (const ending of MULTI_EXTENSIONS) {
    if (base.endsWith(ending)) {
      return [base.slice(0, -ending.length), ending]
    }
  }
  const dot = base.lastIndexOf('.')
  if (dot <= 0) {
    return [base, '']
  }
  return [base.slice(0, dot), base.slice(dot)]
}

/**
 * Split after every `.`, `_` and `-`, keeping the separator on the left part
 */
function splitTokens(stem: string): string[] {
  const tokens: string[] = []
  let current = ''
  for (const char of stem) {
    current += char
    if (char === '.' || char === '_' || char === '-') {
      tokens.push(current)
      current = ''
    }
  }
  if (current) tokens.push(current)
  return tokens
}

function tokenAwareMiddle(stem: string, budget: number): string {
  if (budget <= 0) return ''
  if (visibleWidth(stem) <= budget) return stem
  if (budget <= visibleWidth(ELLIPSIS)) return takeChars(ELLIPSIS, budget)

  const tokens = splitTokens(stem)
  let leftIndex = 0
  let rightIndex = tokens.length - 1
  let left = ''
  let right = ''

  while (leftIndex <= rightIndex) {
    const tryLeft = left + tokens[leftIndex]
    const tryRight = tokens[rightIndex] + right
    const leftWidth = visibleWidth(tryLeft + ELLIPSIS + right)
    const rightWidth = visibleWidth(left + ELLIPSIS + tryRight)
    const canLeft = leftWidth <= budget
    const canRight = rightWidth <= budget

    if (canLeft && (!canRight || leftWidth >= rightWidth)) {
      left = tryLeft
      leftIndex++
    } else if (canRight) {
      right = tryRight
      rightIndex--
    } else {
      break
    }
  }

  const glued = left + ELLIPSIS + right
  return visibleWidth(glued) <= budget ? glued : sliceBalanced(stem, budget)
}

function joinParts(dirs: readonly string[], headKeep: number, tailKeep: number, base: string): string {
  const head = dirs.slice(0, headKeep)
  const tail = dirs.slice(Math.max(dirs.length - tailKeep, headKeep))
  const segments: string[] = []
  if (head.length > 0) segments.push(head.join('/'))
  if (dirs.length > 0 && headKeep + tailKeep < dirs.length) segments.push(ELLIPSIS)
  if (tail.length > 0) segments.push(tail.join('/'))
  segments.push(base)
  return segments.join('/')
}

/**
 * Shorten a relative path to `maxWidth` characters, preserving the file name where possible
 *
 * @example
 * ```typescript
 * shortenPathPreservingFilename('packages/core/src/deep/nested/file.ts', 30)
 * // 'packages/…/nested/file.ts'
 * ```
 */
export function shortenPathPreservingFilename(relPath: string, maxWidth: number): string {
  if (maxWidth <= 0) {
    return ''
  }
  const normalized = relPath.replace(/\\/g, '/')
  if (visibleWidth(normalized) <= maxWidth) {
    return normalized
  }

  const parts = normalized.split('/')
  const base = parts[parts.length - 1] ?? ''
  const dirs = parts.slice(0, -1)

  const [stem, ext] = splitExtension(base)
  const baseLabel = tokenAwareMiddle(stem, Math.max(maxWidth - visibleWidth(ext), 0)) + ext
  if (visibleWidth(baseLabel) >= maxWidth) {
    return sliceBalanced(base, maxWidth)
  }

  if (dirs.length === 0) {
    return baseLabel
  }
  for (const [headKeep, tailKeep] of DIRECTORY_KEEPS) {
    const label = joinParts(dirs, headKeep, tailKeep, baseLabel)
    if (visibleWidth(label) <= maxWidth) {
      return label
    }
  }
  return baseLabel
}
