/**
 * Include/exclude filtering of report files
 *
 * Patterns are minimatch globs tested against the root-relative POSIX path.
 * A file is kept when it matches an include pattern (or there are none) and
 * matches no exclude pattern. Files outside the root are dropped.
 */

import { Minimatch } from 'minimatch'
import { warn, formatError } from './logger.js'
import { relativePath } from './paths.js'
import type { CoverageReport } from './types.js'

const MATCH_OPTIONS = { dot: true } as const

/**
 * Compile glob patterns, skipping (with a warning) any that minimatch rejects
 */
export function compilePatterns(patterns: readonly string[]): Minimatch[] {
  const compiled: Minimatch[] = []
  for (const pattern of patterns) {
    if (!pattern.trim()) continue
    try {
      compiled.push(new Minimatch(pattern, MATCH_OPTIONS))
    } catch (err) {
      warn(`⚠️  Ignoring invalid glob pattern '${pattern}': ${formatError(err)}`)
    }
  }
  return compiled
}

/**
 * Build the keep/drop predicate over root-relative paths
 */
export function createPathFilter(
  include: readonly string[],
  exclude: readonly string[]
): (relPath: string) => boolean {
  const includes = compilePatterns(include)
  const excludes = compilePatterns(exclude)

  return (relPath) => {
    const included = includes.length === 0 || includes.some((m) => m.match(relPath))
    return included && !excludes.some((m) => m.match(relPath))
  }
}

/**
 * Restrict a report to the files selected by the include/exclude globs
 */
export function filterReport(
  report: CoverageReport,
  root: string,
  include: readonly string[],
  exclude: readonly string[]
): CoverageReport {
  const keep = createPathFilter(include, exclude)
  return {
    files: report.files.filter((file) => {
      const rel = relativePath(file.path, root)
      return rel !== null && rel !== '' && keep(rel)
    }),
  }
}
