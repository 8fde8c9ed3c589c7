/**
 * Istanbul JSON Reader
 *
 * Used by: Jest (--coverage), NYC, Vitest (istanbul provider), c8 --reporter=json
 *
 * Reads coverage-final.json documents: an object keyed by file path whose
 * values hold statementMap/s, fnMap/f, branchMap/b and an optional `l` map.
 * Each record is checked field by field and rebuilt as FileCoverageData so
 * istanbul-lib-coverage can load it; malformed entries inside a record are
 * dropped instead of failing the whole document.
 */

import { readFileSync } from 'node:fs'
import { globSync } from 'glob'
import libCoverage from 'istanbul-lib-coverage'
import type {
  BranchMapping,
  FileCoverageData,
  FunctionMapping,
  Location,
  Range,
} from 'istanbul-lib-coverage'
import { normalizeFunctionName } from '../function-names.js'
import { log, warn, formatError, safeJsonParse } from '../logger.js'
import { buildFileCoverage, compareStrings, createReport, functionId } from '../report.js'
import { encodeStatementId } from '../statement-id.js'
import type {
  CoverageReport,
  FileCoverage,
  FunctionMeta,
  ParseResult,
  StatementId,
  StatementSpan,
} from '../types.js'
import { addCountVectors, addToCount, clampCount, maxIntoCount } from '../utils/counts.js'
import { isFiniteNumber, isRecord, numberArray, numberEntries } from '../utils/json.js'
import type { JsonRecord } from '../utils/json.js'

export const ISTANBUL_COVERAGE_FILE = 'coverage-final.json'

export interface IstanbulShard {
  /** Absolute path of the coverage-final.json file */
  file: string
  report: CoverageReport
}

// =============================================================================
// Record validation
// =============================================================================

function toLocation(value: unknown): Location | null {
  if (!isRecord(value) || !isFiniteNumber(value.line)) {
    return null
  }
  return {
    line: clampCount(value.line),
    column: isFiniteNumber(value.column) ? clampCount(value.column) : 0,
  }
}

function toRange(value: unknown): Range | null {
  if (!isRecord(value)) {
    return null
  }
  const start = toLocation(value.start)
  if (!start) {
    return null
  }
  return { start, end: toLocation(value.end) ?? start }
}

function pointRange(line: number): Range {
  const point = { line, column: 0 }
  return { start: point, end: point }
}

function countMap(value: unknown): Map<string, number> {
  return new Map(numberEntries(value).map(([key, count]) => [key, clampCount(count)]))
}

function readStatements(raw: JsonRecord): Pick<FileCoverageData, 'statementMap' | 's'> {
  const counts = countMap(raw.s)
  const statementMap: FileCoverageData['statementMap'] = {}
  const s: FileCoverageData['s'] = {}

  if (isRecord(raw.statementMap)) {
    for (const [key, loc] of Object.entries(raw.statementMap)) {
      const range = toRange(loc)
      if (!range || range.start.line === 0) continue
      statementMap[key] = range
      s[key] = counts.get(key) ?? 0
    }
  }

  return { statementMap, s }
}

function readFunctions(raw: JsonRecord): Pick<FileCoverageData, 'fnMap' | 'f'> {
  const counts = countMap(raw.f)
  const fnMap: FileCoverageData['fnMap'] = {}
  const f: FileCoverageData['f'] = {}

  if (isRecord(raw.fnMap)) {
    for (const [key, entry] of Object.entries(raw.fnMap)) {
      if (!isRecord(entry)) continue
      const declared = isFiniteNumber(entry.line) ? clampCount(entry.line) : 0
      const decl = toRange(entry.decl) ?? toRange(entry.loc) ?? pointRange(declared)
      const mapping: FunctionMapping = {
        name: typeof entry.name === 'string' && entry.name ? entry.name : `(anonymous_${key})`,
        decl,
        loc: toRange(entry.loc) ?? decl,
        line: declared || decl.start.line,
      }
      fnMap[key] = mapping
      f[key] = counts.get(key) ?? 0
    }
  }

  return { fnMap, f }
}

function readBranches(raw: JsonRecord): Pick<FileCoverageData, 'branchMap' | 'b'> {
  const rawCounts = isRecord(raw.b) ? raw.b : {}
  const branchMap: FileCoverageData['branchMap'] = {}
  const b: FileCoverageData['b'] = {}

  if (isRecord(raw.branchMap)) {
    for (const [key, entry] of Object.entries(raw.branchMap)) {
      if (!isRecord(entry)) continue
      const locations = Array.isArray(entry.locations)
        ? entry.locations.map(toRange).filter((range): range is Range => range !== null)
        : []
      const loc = toRange(entry.loc) ?? locations[0]
      if (!loc) continue
      const mapping: BranchMapping = {
        loc,
        type: typeof entry.type === 'string' ? entry.type : 'branch',
        locations,
        line: isFiniteNumber(entry.line) ? clampCount(entry.line) : loc.start.line,
      }
      branchMap[key] = mapping
      b[key] = numberArray(rawCounts[key]).map(clampCount)
    }
  }

  return { branchMap, b }
}

/**
 * Rebuild one record as FileCoverageData; the path falls back to the object key
 */
export function toFileCoverageData(key: string, raw: JsonRecord): FileCoverageData {
  return {
    path: typeof raw.path === 'string' && raw.path ? raw.path : key,
    ...readStatements(raw),
    ...readFunctions(raw),
    ...readBranches(raw),
  }
}

// =============================================================================
// Conversion to the coverage model
// =============================================================================

function explicitLineHits(raw: JsonRecord): Map<number, number> | null {
  if (!isRecord(raw.l)) {
    return null
  }
  const hits = new Map<number, number>()
  for (const [key, count] of numberEntries(raw.l)) {
    const line = Number(key)
    if (Number.isInteger(line) && line > 0) {
      hits.set(line, clampCount(count))
    }
  }
  return hits
}

function compareRanges(a: Range, b: Range): number {
  return (
    a.start.line - b.start.line ||
    a.start.column - b.start.column ||
    a.end.line - b.end.line ||
    a.end.column - b.end.column
  )
}

function rangeKey(range: Range): string {
  return `${range.start.line}:${range.start.column}-${range.end.line}:${range.end.column}`
}

/**
 * Statement id per statementMap key. Equal ranges share an id. Of the ranges
 * that share a start, the shortest takes the start position and the others
 * take the next columns on that line not used by any other start.
 */
export function assignStatementIds(statementMap: Record<string, Range>): Map<string, StatementId> {
  const ordered = Object.entries(statementMap).sort(
    ([keyA, a], [keyB, b]) => compareRanges(a, b) || compareStrings(keyA, keyB)
  )
  const ids = new Map<string, StatementId>()
  const idsByRange = new Map<string, StatementId>()
  const taken = new Set<StatementId>()
  const sharedStarts: Array<{ key: string; range: Range; start: StatementId }> = []

  for (const [key, range] of ordered) {
    const known = idsByRange.get(rangeKey(range))
    if (known !== undefined) {
      ids.set(key, known)
      continue
    }
    const start = encodeStatementId(range.start.line, range.start.column)
    if (taken.has(start)) {
      sharedStarts.push({ key, range, start })
      continue
    }
    taken.add(start)
    idsByRange.set(rangeKey(range), start)
    ids.set(key, start)
  }

  for (const { key, range, start } of sharedStarts) {
    const known = idsByRange.get(rangeKey(range))
    if (known !== undefined) {
      ids.set(key, known)
      continue
    }
    let id = start + 1
    while (taken.has(id)) {
      id++
    }
    taken.add(id)
    idsByRange.set(rangeKey(range), id)
    ids.set(key, id)
  }
  return ids
}

function toFileCoverage(key: string, raw: JsonRecord): FileCoverage {
  const fileCoverage = libCoverage.createFileCoverage(toFileCoverageData(key, raw))
  const data = fileCoverage.data

  let lineHits = explicitLineHits(raw)
  if (!lineHits) {
    lineHits = new Map()
    for (const [line, count] of Object.entries(fileCoverage.getLineCoverage())) {
      lineHits.set(Number(line), count)
    }
  }

  const statementHits = new Map<StatementId, number>()
  const statementMap = new Map<StatementId, StatementSpan>()
  const statementIds = assignStatementIds(data.statementMap)
  for (const [key, range] of Object.entries(data.statementMap)) {
    const id = statementIds.get(key) ?? encodeStatementId(range.start.line, range.start.column)
    maxIntoCount(statementHits, id, data.s[key] ?? 0)
    if (!statementMap.has(id)) {
      statementMap.set(id, {
        startLine: range.start.line,
        endLine: Math.max(range.start.line, range.end.line),
      })
    }
  }

  const functionHits = new Map<string, number>()
  const functionMap = new Map<string, FunctionMeta>()
  for (const [key, fn] of Object.entries(data.fnMap)) {
    const name = normalizeFunctionName(fn.name)
    const line = fn.decl.start.line || fn.line
    const id = functionId(name, line)
    addToCount(functionHits, id, data.f[key] ?? 0)
    if (!functionMap.has(id)) {
      functionMap.set(id, { name, line })
    }
  }

  const branchHits = new Map<string, number[]>()
  const branchMap = new Map<string, number>()
  for (const [key, branch] of Object.entries(data.branchMap)) {
    const id = `${branch.loc.start.line}:${branch.loc.start.column}`
    const arms = data.b[key] ?? []
    const previous = branchHits.get(id)
    branchHits.set(id, previous ? addCountVectors(previous, arms) : arms)
    if (!branchMap.has(id)) {
      branchMap.set(id, branch.line || branch.loc.start.line)
    }
  }

  return buildFileCoverage({
    path: data.path,
    lineHits,
    statementHits,
    statementMap,
    functionHits,
    functionMap,
    branchHits,
    branchMap,
  })
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Parse a coverage-final.json document. Entries that are not objects are skipped.
 */
export function parseIstanbulCoverage(text: string): ParseResult<CoverageReport> {
  const parsed = safeJsonParse(text, ISTANBUL_COVERAGE_FILE)
  if (!parsed.success) {
    return parsed
  }
  if (!isRecord(parsed.value)) {
    return { success: false, error: `${ISTANBUL_COVERAGE_FILE}: expected a JSON object` }
  }

  const files: FileCoverage[] = []
  for (const [key, raw] of Object.entries(parsed.value)) {
    if (isRecord(raw)) {
      files.push(toFileCoverage(key, raw))
    }
  }
  return { success: true, value: createReport(files) }
}

/**
 * Read one coverage-final.json. Returns null when it is missing or invalid.
 */
export function readIstanbulCoverageFile(filePath: string): CoverageReport | null {
  let raw: string
  try {
    raw = readFileSync(filePath, 'utf-8')
  } catch (err) {
    log(`   Istanbul coverage not readable: ${filePath} (${formatError(err)})`)
    return null
  }

  const result = parseIstanbulCoverage(raw)
  if (!result.success) {
    warn(`  ⚠️ Istanbul coverage rejected: ${filePath} (${result.error})`)
    return null
  }
  return result.value
}

/**
 * Read every coverage-final.json below a directory, one shard per file, sorted by path
 */
export function readIstanbulCoverageTree(root: string): IstanbulShard[] {
  const files = globSync(`**/${ISTANBUL_COVERAGE_FILE}`, {
    cwd: root,
    absolute: true,
    nodir: true,
    dot: true,
    ignore: ['**/node_modules/**'],
  }).sort(compareStrings)

  const shards: IstanbulShard[] = []
  for (const file of files) {
    const report = readIstanbulCoverageFile(file)
    if (report) {
      shards.push({ file, report })
    }
  }
  log(`   Istanbul: ${shards.length} of ${files.length} shard(s) read under ${root}`)
  return shards
}
