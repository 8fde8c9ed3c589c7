/**
 * unicov report command
 *
 * Reads coverage artifacts, prints the merged report and checks thresholds.
 */

import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { parseCoverageDetail, parseUnicovConfig, resolveUnicovConfig } from '../../config.js'
import type { UnicovConfig } from '../../config.js'
import { error, formatError, safeJsonParse, setLogging, setTiming, warn } from '../../logger.js'
import { REPORT_FORMATS, runCoveragePipeline } from '../../pipeline.js'
import type { ReportFormat } from '../../pipeline.js'
import type { MalformedLinePolicy } from '../../parsers/lcov.js'
import type { CoverageMetricName, PrintOpts } from '../../types.js'

export const REPORT_HELP = `
Usage: unicov report [options]

Merge coverage artifacts, print a report and check thresholds.
Without artifact options, coverage/lcov.info, coverage/**/coverage-final.json
and coverage/coverage.json are read when present.

Options:
  --root <dir>                 Repository root (default: current directory)
  --config <file>              JSON config file; command-line options override it
  --lcov <file>                LCOV file (repeatable)
  --istanbul <dir>             Directory searched for coverage-final.json (repeatable)
  --llvm-cov <file>            llvm-cov JSON export (repeatable)
  --coveragepy <file>          coverage.py JSON report (repeatable)
  --include <glob>             Only report matching files (repeatable, comma-separated)
  --exclude <glob>             Skip matching files (repeatable, comma-separated)
  --lines <pct>                Minimum line coverage
  --functions <pct>            Minimum function coverage
  --branches <pct>             Minimum branch coverage
  --statements <pct>           Minimum statement coverage
  --format <name>              pretty, compact, hotspots or summary (default: pretty)
  --detail <mode>              auto, all or a number of hotspots per file
  --max-files <n>              Only show the n files with the lowest line coverage
  --max-hotspots <n>           Hotspots per file
  --editor <template>          Editor link template, e.g. vscode://file/{file}:{line}
  --page-fit                   Fit each per-file table on one screen
  --malformed-lcov <policy>    skip or stop at malformed LCOV lines (default: skip)
  --log                        Show which artifacts were read and merged
  --timing                     Show timing information
  --help                       Show this help message

Examples:
  unicov report
  unicov report --lcov coverage/lcov.info --llvm-cov target/llvm-cov.json --lines 80
  unicov report --istanbul coverage/unit --istanbul coverage/e2e --format compact
`

export interface ReportOptions {
  configPath?: string
  /** Values given on the command line */
  overrides: UnicovConfig
  format: ReportFormat
}

export interface ParseResult {
  options?: ReportOptions
  error?: string
  showHelp?: boolean
}

const THRESHOLD_FLAGS: Record<string, CoverageMetricName> = {
  '--lines': 'lines',
  '--functions': 'functions',
  '--branches': 'branches',
  '--statements': 'statements',
}

const KNOWN_VALUE_FLAGS = new Set([
  '--root',
  '--config',
  '--lcov',
  '--istanbul',
  '--llvm-cov',
  '--coveragepy',
  '--include',
  '--exclude',
  '--format',
  '--detail',
  '--max-files',
  '--max-hotspots',
  '--editor',
  '--malformed-lcov',
])

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean)
}

function parseNumber(value: string): number | undefined {
  const n = Number(value)
  return value.trim() !== '' && Number.isFinite(n) && n >= 0 ? n : undefined
}

function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value)
}

function isMalformedPolicy(value: string): value is MalformedLinePolicy {
  return value === 'skip' || value === 'stop'
}

export function parseReportArgs(args: string[]): ParseResult {
  if (args.includes('--help') || args.includes('-h')) {
    return { showHelp: true }
  }

  const overrides: UnicovConfig = {}
  const print: Partial<PrintOpts> = {}
  let configPath: string | undefined
  let format: ReportFormat = 'pretty'

  const append = (key: 'lcov' | 'istanbul' | 'llvmCov' | 'coveragePy' | 'include' | 'exclude', values: string[]) => {
    overrides[key] = [...(overrides[key] ?? []), ...values]
  }

  let i = 0
  while (i < args.length) {
    const arg = args[i]

    if (arg === '--log') {
      overrides.log = true
      i++
      continue
    }
    if (arg === '--timing') {
      overrides.timing = true
      i++
      continue
    }
    if (arg === '--page-fit') {
      print.pageFit = true
      i++
      continue
    }
    if (!arg.startsWith('-')) {
      return { error: `Unexpected argument: ${arg}`, showHelp: true }
    }

    const value = args[i + 1]
    if (value === undefined || value.startsWith('--')) {
      if (arg in THRESHOLD_FLAGS || KNOWN_VALUE_FLAGS.has(arg)) {
        return { error: `Missing value for ${arg}` }
      }
      return { error: `Unknown option: ${arg}`, showHelp: true }
    }

    const metric = THRESHOLD_FLAGS[arg]
    if (metric) {
      const floor = parseNumber(value)
      if (floor === undefined) {
        return { error: `Invalid value for ${arg}: ${value}` }
      }
      const thresholds = { ...overrides.thresholds }
      thresholds[metric] = floor
      overrides.thresholds = thresholds
      i += 2
      continue
    }

    switch (arg) {
      case '--root':
        overrides.root = value
        break
      case '--config':
        configPath = value
        break
      case '--lcov':
        append('lcov', [value])
        break
      case '--istanbul':
        append('istanbul', [value])
        break
      case '--llvm-cov':
        append('llvmCov', [value])
        break
      case '--coveragepy':
        append('coveragePy', [value])
        break
      case '--include':
        append('include', splitList(value))
        break
      case '--exclude':
        append('exclude', splitList(value))
        break
      case '--format':
        if (!isReportFormat(value)) {
          return { error: `Invalid value for --format: ${value} (expected ${REPORT_FORMATS.join(', ')})` }
        }
        format = value
        break
      case '--detail': {
        const detail = parseCoverageDetail(value)
        if (detail === undefined) {
          return { error: `Invalid value for --detail: ${value}` }
        }
        print.detail = detail
        break
      }
      case '--max-files':
      case '--max-hotspots': {
        const n = parseNumber(value)
        if (n === undefined || !Number.isInteger(n) || n < 1) {
          return { error: `Invalid value for ${arg}: ${value}` }
        }
        if (arg === '--max-files') print.maxFiles = n
        else print.maxHotspots = n
        break
      }
      case '--editor':
        print.editorCmd = value
        break
      case '--malformed-lcov':
        if (!isMalformedPolicy(value)) {
          return { error: `Invalid value for --malformed-lcov: ${value} (expected skip or stop)` }
        }
        overrides.onMalformedLcov = value
        break
      default:
        return { error: `Unknown option: ${arg}`, showHelp: true }
    }
    i += 2
  }

  if (Object.keys(print).length > 0) {
    overrides.print = print
  }
  return { options: { configPath, overrides, format } }
}

/**
 * Command-line values win over the config file; thresholds and print
 * options combine per key.
 */
export function mergeConfigs(base: UnicovConfig, overrides: UnicovConfig): UnicovConfig {
  return {
    ...base,
    ...overrides,
    thresholds: { ...base.thresholds, ...overrides.thresholds },
    print: { ...base.print, ...overrides.print },
  }
}

/**
 * Load a JSON config file
 */
export function loadConfigFile(configPath: string): { config?: UnicovConfig; error?: string } {
  let raw: string
  try {
    raw = readFileSync(configPath, 'utf-8')
  } catch (err) {
    return { error: `Cannot read config file ${configPath}: ${formatError(err)}` }
  }

  const parsed = safeJsonParse(raw, configPath)
  if (!parsed.success) {
    return { error: `Invalid config file: ${parsed.error}` }
  }

  const { config, problems } = parseUnicovConfig(parsed.value)
  for (const problem of problems) {
    warn(`⚠️  ${configPath}: ${problem}`)
  }
  return { config }
}

/**
 * Execute the report command - exported for testing
 * @returns exit code: 1 when a threshold failed or the config was unusable
 */
export async function executeReport(
  options: ReportOptions,
  stdout: { isTTY?: boolean } = process.stdout
): Promise<number> {
  const cwd = process.cwd()
  let base: UnicovConfig = {}
  if (options.configPath) {
    const loaded = loadConfigFile(resolve(cwd, options.configPath))
    if (!loaded.config) {
      error(loaded.error)
      return 1
    }
    base = loaded.config
  }

  const merged = mergeConfigs(base, options.overrides)
  const config = resolveUnicovConfig(
    { ...merged, print: { tty: stdout.isTTY === true, ...merged.print } },
    cwd
  )
  setLogging(config.log)
  setTiming(config.timing)

  const result = await runCoveragePipeline(config, { format: options.format })
  if (result.text) {
    console.log(result.text)
  } else {
    warn('⚠️  No coverage data found')
  }
  for (const line of result.thresholdLines) {
    console.log(line)
  }
  return result.thresholdsFailed ? 1 : 0
}
