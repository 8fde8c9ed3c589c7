/**
 * unicov configuration
 *
 * User-facing options are all optional; resolveUnicovConfig fills in the
 * defaults. Loading a config file is left to the caller: pass whatever it
 * parsed through parseUnicovConfig first.
 */

import { resolve } from 'node:path'
import type { MalformedLinePolicy } from './parsers/lcov.js'
import type { CoverageDetail, CoverageMetricName, CoverageThresholds, PrintOpts } from './types.js'
import { isFiniteNumber, isRecord } from './utils/json.js'
import type { JsonRecord } from './utils/json.js'

/**
 * Default include patterns, matched against root-relative paths
 */
export const DEFAULT_INCLUDE_PATTERNS = ['**/*.{ts,tsx,js,jsx,rs,py}']

/**
 * Default exclude patterns, matched against root-relative paths
 */
export const DEFAULT_EXCLUDE_PATTERNS = [
  '**/node_modules/**',
  '**/coverage/**',
  '**/dist/**',
  '**/build/**',
  '**/migrations/**',
  '**/__mocks__/**',
  '**/tests/**',
]

/**
 * Default artifact locations, relative to the root
 */
export const DEFAULT_LCOV_FILE = 'coverage/lcov.info'
export const DEFAULT_ISTANBUL_DIR = 'coverage'
export const DEFAULT_COVERAGEPY_FILE = 'coverage/coverage.json'

export const DEFAULT_PRINT_OPTS: PrintOpts = {
  tty: false,
  pageFit: false,
  detail: 'auto',
}

/**
 * unicov configuration options
 */
export interface UnicovConfig {
  /** Repository root that artifact paths resolve against (default: cwd) */
  root?: string

  /** LCOV files (default: ['coverage/lcov.info']) */
  lcov?: string[]

  /**
   * Directories searched for coverage-final.json shards (default: ['coverage']).
   * Every shard found below a directory is merged.
   */
  istanbul?: string[]

  /**
   * llvm-cov JSON exports. Their statement data is overlaid on files the
   * other artifacts already cover; files only they cover are added.
   */
  llvmCov?: string[]

  /** coverage.py JSON reports (default: ['coverage/coverage.json']) */
  coveragePy?: string[]

  /** Glob patterns for files to include in the report */
  include?: string[]

  /** Glob patterns for files to exclude from the report */
  exclude?: string[]

  /** Minimum percentages per metric */
  thresholds?: CoverageThresholds

  /** What to do with a malformed LCOV line (default: 'skip') */
  onMalformedLcov?: MalformedLinePolicy

  /** Rendering options */
  print?: Partial<PrintOpts>

  /** Enable logging (default: false) */
  log?: boolean

  /** Enable timing logs (default: false) */
  timing?: boolean
}

/**
 * Resolved configuration with all defaults applied. Artifact paths are absolute.
 */
export interface ResolvedUnicovConfig {
  root: string
  lcov: string[]
  istanbul: string[]
  llvmCov: string[]
  coveragePy: string[]
  include: string[]
  exclude: string[]
  thresholds: CoverageThresholds
  onMalformedLcov: MalformedLinePolicy
  print: PrintOpts
  log: boolean
  timing: boolean
}

/**
 * Resolve unicov config with defaults
 * @param config - unicov config options
 * @param cwd - Directory a relative root resolves against
 */
export function resolveUnicovConfig(config?: UnicovConfig, cwd: string = process.cwd()): ResolvedUnicovConfig {
  const root = resolve(cwd, config?.root ?? '.')
  const inRoot = (paths: readonly string[]) => paths.map((p) => resolve(root, p))

  return {
    root,
    lcov: inRoot(config?.lcov ?? [DEFAULT_LCOV_FILE]),
    istanbul: inRoot(config?.istanbul ?? [DEFAULT_ISTANBUL_DIR]),
    llvmCov: inRoot(config?.llvmCov ?? []),
    coveragePy: inRoot(config?.coveragePy ?? [DEFAULT_COVERAGEPY_FILE]),
    include: config?.include ?? DEFAULT_INCLUDE_PATTERNS,
    exclude: config?.exclude ?? DEFAULT_EXCLUDE_PATTERNS,
    thresholds: config?.thresholds ?? {},
    onMalformedLcov: config?.onMalformedLcov ?? 'skip',
    print: { ...DEFAULT_PRINT_OPTS, ...config?.print },
    log: config?.log ?? false,
    timing: config?.timing ?? false,
  }
}

function stringList(value: unknown, key: string, problems: string[]): string[] | undefined {
  if (value === undefined) return undefined
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value
  }
  if (typeof value === 'string') {
    return [value]
  }
  problems.push(`${key}: expected a string or an array of strings`)
  return undefined
}

function optionalBoolean(value: unknown, key: string, problems: string[]): boolean | undefined {
  if (value === undefined || typeof value === 'boolean') return value
  problems.push(`${key}: expected a boolean`)
  return undefined
}

function optionalNumber(value: unknown, key: string, problems: string[]): number | undefined {
  if (value === undefined) return undefined
  if (isFiniteNumber(value)) return value
  problems.push(`${key}: expected a number`)
  return undefined
}

const THRESHOLD_KEYS: readonly CoverageMetricName[] = ['statements', 'branches', 'functions', 'lines']

function parseThresholds(value: unknown, problems: string[]): CoverageThresholds | undefined {
  if (value === undefined) return undefined
  if (!isRecord(value)) {
    problems.push('thresholds: expected an object')
    return undefined
  }
  const thresholds: CoverageThresholds = {}
  for (const key of THRESHOLD_KEYS) {
    const floor = optionalNumber(value[key], `thresholds.${key}`, problems)
    if (floor !== undefined) {
      thresholds[key] = floor
    }
  }
  return thresholds
}

/**
 * Parse `auto`, `all` or a positive line count
 */
export function parseCoverageDetail(value: unknown): CoverageDetail | undefined {
  if (value === 'auto' || value === 'all') return value
  if (isRecord(value) && isFiniteNumber(value.lines) && value.lines > 0) {
    return { lines: Math.floor(value.lines) }
  }
  if (isFiniteNumber(value) && value > 0) {
    return { lines: Math.floor(value) }
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim()) && Number(value) > 0) {
    return { lines: Number(value) }
  }
  return undefined
}

function parsePrintOpts(value: unknown, problems: string[]): Partial<PrintOpts> | undefined {
  if (value === undefined) return undefined
  if (!isRecord(value)) {
    problems.push('print: expected an object')
    return undefined
  }
  const print: Partial<PrintOpts> = {}
  const tty = optionalBoolean(value.tty, 'print.tty', problems)
  if (tty !== undefined) print.tty = tty
  const pageFit = optionalBoolean(value.pageFit, 'print.pageFit', problems)
  if (pageFit !== undefined) print.pageFit = pageFit
  const maxFiles = optionalNumber(value.maxFiles, 'print.maxFiles', problems)
  if (maxFiles !== undefined) print.maxFiles = maxFiles
  const maxHotspots = optionalNumber(value.maxHotspots, 'print.maxHotspots', problems)
  if (maxHotspots !== undefined) print.maxHotspots = maxHotspots
  if (value.detail !== undefined) {
    const detail = parseCoverageDetail(value.detail)
    if (detail === undefined) {
      problems.push("print.detail: expected 'auto', 'all' or a positive number")
    } else {
      print.detail = detail
    }
  }
  if (value.editorCmd !== undefined) {
    if (typeof value.editorCmd === 'string') {
      print.editorCmd = value.editorCmd
    } else {
      problems.push('print.editorCmd: expected a string')
    }
  }
  return print
}

function parseMalformedPolicy(value: unknown, problems: string[]): MalformedLinePolicy | undefined {
  if (value === undefined) return undefined
  if (value === 'skip' || value === 'stop') return value
  problems.push("onMalformedLcov: expected 'skip' or 'stop'")
  return undefined
}

/**
 * Validate a config object loaded from JSON or a config module.
 * Unknown keys are ignored; each invalid value is reported and dropped.
 */
export function parseUnicovConfig(value: unknown): { config: UnicovConfig; problems: string[] } {
  const problems: string[] = []
  if (!isRecord(value)) {
    return { config: {}, problems: ['expected a config object'] }
  }
  const raw: JsonRecord = value
  const config: UnicovConfig = {}

  if (raw.root !== undefined) {
    if (typeof raw.root === 'string') config.root = raw.root
    else problems.push('root: expected a string')
  }
  const lcov = stringList(raw.lcov, 'lcov', problems)
  if (lcov) config.lcov = lcov
  const istanbul = stringList(raw.istanbul, 'istanbul', problems)
  if (istanbul) config.istanbul = istanbul
  const llvmCov = stringList(raw.llvmCov, 'llvmCov', problems)
  if (llvmCov) config.llvmCov = llvmCov
  const coveragePy = stringList(raw.coveragePy, 'coveragePy', problems)
  if (coveragePy) config.coveragePy = coveragePy
  const include = stringList(raw.include, 'include', problems)
  if (include) config.include = include
  const exclude = stringList(raw.exclude, 'exclude', problems)
  if (exclude) config.exclude = exclude

  const thresholds = parseThresholds(raw.thresholds, problems)
  if (thresholds) config.thresholds = thresholds
  const onMalformedLcov = parseMalformedPolicy(raw.onMalformedLcov, problems)
  if (onMalformedLcov) config.onMalformedLcov = onMalformedLcov
  const print = parsePrintOpts(raw.print, problems)
  if (print) config.print = print

  const log = optionalBoolean(raw.log, 'log', problems)
  if (log !== undefined) config.log = log
  const timing = optionalBoolean(raw.timing, 'timing', problems)
  if (timing !== undefined) config.timing = timing

  return { config, problems }
}
