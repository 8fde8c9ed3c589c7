/**
 * Path normalization
 *
 * Coverage tools report paths relative or absolute, with either separator.
 * Everything is keyed by an absolute, forward-slash path rooted at the
 * repository root so entries from different tools line up.
 */

import { posix, resolve } from 'node:path'

const WINDOWS_DRIVE_PATH = /^[A-Za-z]:\//
const WINDOWS_DRIVE_ROOT = /^[A-Za-z]:\/$/

/**
 * Normalize path separators for cross-platform compatibility
 */
export function toSlash(filepath: string): string {
  return filepath.replace(/\\/g, '/')
}

/**
 * True for `/...` and `C:/...` paths (after separator normalization)
 */
export function isAbsolutePath(filepath: string): boolean {
  return filepath.startsWith('/') || WINDOWS_DRIVE_PATH.test(filepath)
}

function trimTrailingSlash(filepath: string): string {
  if (filepath === '/' || WINDOWS_DRIVE_ROOT.test(filepath)) {
    return filepath
  }
  return filepath.endsWith('/') ? filepath.slice(0, -1) : filepath
}

/**
 * Normalize the repository root itself. A relative root resolves against the cwd.
 */
export function normalizeRoot(root: string): string {
  const slashed = toSlash(root)
  const absolute = isAbsolutePath(slashed) ? slashed : toSlash(resolve(root))
  return trimTrailingSlash(posix.normalize(absolute))
}

/**
 * Canonicalize an artifact path against the repository root.
 * Idempotent: normalizing an already-normalized path returns it unchanged.
 *
 * @example
 * ```typescript
 * normalizePath('src\\a.ts', '/repo') // '/repo/src/a.ts'
 * normalizePath('./src/../lib/b.ts', '/repo/') // '/repo/lib/b.ts'
 * normalizePath('/other/c.ts', '/repo') // '/other/c.ts'
 * ```
 */
export function normalizePath(filepath: string, root: string): string {
  const slashed = toSlash(filepath)
  const joined = isAbsolutePath(slashed) ? slashed : `${normalizeRoot(root)}/${slashed}`
  return trimTrailingSlash(posix.normalize(joined))
}

/**
 * Root-relative POSIX path of a normalized path, or null when it lies outside the root
 */
export function relativePath(filepath: string, root: string): string | null {
  const base = normalizeRoot(root)
  const target = normalizePath(filepath, base)
  if (target === base) {
    return ''
  }
  const prefix = base.endsWith('/') ? base : `${base}/`
  return target.startsWith(prefix) ? target.slice(prefix.length) : null
}

/**
 * Root-relative path for display, falling back to the full path outside the root
 */
export function displayPath(filepath: string, root: string): string {
  return relativePath(filepath, root) ?? toSlash(filepath)
}
