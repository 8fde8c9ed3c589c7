/**
 * LCOV Parser
 *
 * Used by: lcov (C/C++), Istanbul/NYC (JS/TS), c8, cargo llvm-cov --lcov (Rust), grcov
 *
 * Format structure (line-based):
 * TN:<test name>
 * SF:<source file path>
 * FN:<line>,<function name>
 * FNDA:<hit count>,<function name>
 * FNF:<functions found>
 * FNH:<functions hit>
 * DA:<line>,<hit count>
 * LF:<lines found>
 * LH:<lines hit>
 * BRDA:<line>,<block>,<branch>,<taken>
 * BRF:<branches found>
 * BRH:<branches hit>
 * end_of_record
 *
 * Summary records (LF, LH, FNF, ...) are ignored: totals are recomputed from
 * the DA/FN/FNDA/BRDA data.
 */

import { readFileSync } from 'node:fs'
import { normalizeFunctionName } from '../function-names.js'
import { log, formatError } from '../logger.js'
import { buildFileCoverage, createReport, functionId } from '../report.js'
import type { CoverageReport, FileCoverage, FunctionMeta } from '../types.js'
import { addToCount, clampCount } from '../utils/counts.js'

/**
 * What to do with a line that is not a valid record
 * - 'skip': drop the line and keep reading
 * - 'stop': stop reading at the first bad line (the open file is still kept)
 */
export type MalformedLinePolicy = 'skip' | 'stop'

export interface LcovParseOptions {
  onMalformed?: MalformedLinePolicy
}

export type LcovRecord =
  | { kind: 'source-file'; path: string }
  | { kind: 'line-data'; line: number; count: number }
  | { kind: 'function-name'; startLine: number; name: string }
  | { kind: 'function-data'; count: number; name: string }
  | { kind: 'branch-data'; line: number; block: number; branch: number; taken: number }
  | { kind: 'end-of-record' }
  | { kind: 'ignored'; tag: string }

interface LcovFileBuffer {
  path: string
  hits: Map<number, number>
  functionStartLineByName: Map<string, number>
  functionCountByName: Map<string, number>
  /** `${line}:${block}` -> branch index -> taken */
  branchCounts: Map<string, { line: number; byBranch: Map<number, number> }>
}

interface LcovParseState {
  current: LcovFileBuffer | null
  files: FileCoverage[]
  malformed: number
}

const UNSIGNED = /^\d+$/
const RECORD_LINE = /^([A-Za-z_]+):(.*)$/

function parseUnsigned(text: string): number | null {
  const trimmed = text.trim()
  return UNSIGNED.test(trimmed) ? clampCount(Number(trimmed)) : null
}

/**
 * Split on the first comma; the rest may contain commas (C++ names)
 */
function splitFirst(text: string): [string, string] | null {
  const index = text.indexOf(',')
  return index === -1 ? null : [text.slice(0, index), text.slice(index + 1)]
}

function parseFunctionName(body: string): LcovRecord | null {
  const first = splitFirst(body)
  if (!first) return null
  const startLine = parseUnsigned(first[0])
  if (startLine === null) return null

  // LCOV 2 writes FN:<start>,<end>,<name>
  const second = splitFirst(first[1])
  if (second && parseUnsigned(second[0]) !== null && second[1].length > 0) {
    return { kind: 'function-name', startLine, name: second[1] }
  }
  return first[1].length > 0 ? { kind: 'function-name', startLine, name: first[1] } : null
}

/**
 * Parse one line of LCOV text. Returns null for a line that is not a valid record.
 * Blank lines come back as ignored records.
 */
export function parseLcovRecord(rawLine: string): LcovRecord | null {
  const line = rawLine.trim()
  if (!line) {
    return { kind: 'ignored', tag: '' }
  }
  if (line === 'end_of_record') {
    return { kind: 'end-of-record' }
  }

  const match = RECORD_LINE.exec(line)
  if (!match) {
    return null
  }
  const [, tag, body] = match

  switch (tag) {
    case 'SF':
      return body.length > 0 ? { kind: 'source-file', path: body } : null

    case 'DA': {
      const parts = body.split(',')
      if (parts.length < 2) return null
      const lineNumber = parseUnsigned(parts[0])
      const count = parseUnsigned(parts[1])
      if (lineNumber === null || count === null) return null
      return { kind: 'line-data', line: lineNumber, count }
    }

    case 'FN':
      return parseFunctionName(body)

    case 'FNDA': {
      const parts = splitFirst(body)
      if (!parts) return null
      const count = parseUnsigned(parts[0])
      if (count === null || parts[1].length === 0) return null
      return { kind: 'function-data', count, name: parts[1] }
    }

    case 'BRDA': {
      const parts = body.split(',')
      if (parts.length < 4) return null
      const lineNumber = parseUnsigned(parts[0])
      const block = parseUnsigned(parts[1])
      const branch = parseUnsigned(parts[2])
      const taken = parts[3].trim() === '-' ? 0 : parseUnsigned(parts[3])
      if (lineNumber === null || block === null || branch === null || taken === null) {
        return null
      }
      return { kind: 'branch-data', line: lineNumber, block, branch, taken }
    }

    default:
      return { kind: 'ignored', tag }
  }
}

function computeFunctionMaps(buf: LcovFileBuffer): {
  functionHits: Map<string, number>
  functionMap: Map<string, FunctionMeta>
} {
  const functionHits = new Map<string, number>()
  const functionMap = new Map<string, FunctionMeta>()
  const names = new Set([...buf.functionStartLineByName.keys(), ...buf.functionCountByName.keys()])

  for (const name of names) {
    const line = buf.functionStartLineByName.get(name) ?? 0
    const id = functionId(name, line)
    addToCount(functionHits, id, buf.functionCountByName.get(name) ?? 0)
    if (!functionMap.has(id)) {
      functionMap.set(id, { name, line })
    }
  }

  return { functionHits, functionMap }
}

function computeBranchMaps(buf: LcovFileBuffer): {
  branchHits: Map<string, number[]>
  branchMap: Map<string, number>
} {
  const branchHits = new Map<string, number[]>()
  const branchMap = new Map<string, number>()

  for (const [id, group] of buf.branchCounts) {
    const arms = [...group.byBranch.entries()].sort((a, b) => a[0] - b[0]).map(([, taken]) => taken)
    branchHits.set(id, arms)
    branchMap.set(id, group.line)
  }

  return { branchHits, branchMap }
}

function flushCurrent(state: LcovParseState): void {
  const buf = state.current
  if (!buf) {
    return
  }
  state.current = null
  state.files.push(
    buildFileCoverage({
      path: buf.path,
      lineHits: buf.hits,
      ...computeFunctionMaps(buf),
      ...computeBranchMaps(buf),
    })
  )
}

function applyRecord(state: LcovParseState, record: LcovRecord): void {
  if (record.kind === 'source-file') {
    flushCurrent(state)
    state.current = {
      path: record.path,
      hits: new Map(),
      functionStartLineByName: new Map(),
      functionCountByName: new Map(),
      branchCounts: new Map(),
    }
    return
  }

  if (record.kind === 'end-of-record') {
    flushCurrent(state)
    return
  }

  const buf = state.current
  if (!buf) {
    return
  }

  switch (record.kind) {
    case 'line-data':
      addToCount(buf.hits, record.line, record.count)
      break

    case 'function-name': {
      const name = normalizeFunctionName(record.name)
      if (!buf.functionStartLineByName.has(name)) {
        buf.functionStartLineByName.set(name, record.startLine)
      }
      break
    }

    case 'function-data':
      addToCount(buf.functionCountByName, normalizeFunctionName(record.name), record.count)
      break

    case 'branch-data': {
      const id = `${record.line}:${record.block}`
      let group = buf.branchCounts.get(id)
      if (!group) {
        group = { line: record.line, byBranch: new Map() }
        buf.branchCounts.set(id, group)
      }
      addToCount(group.byBranch, record.branch, record.taken)
      break
    }

    case 'ignored':
      break
  }
}

/**
 * Parse LCOV text into a coverage report (files sorted by path)
 */
export function parseLcov(text: string, options: LcovParseOptions = {}): CoverageReport {
  const policy = options.onMalformed ?? 'skip'
  const state: LcovParseState = { current: null, files: [], malformed: 0 }

  for (const line of text.split(/\r?\n/)) {
    const record = parseLcovRecord(line)
    if (record === null) {
      state.malformed++
      if (policy === 'stop') {
        break
      }
      continue
    }
    applyRecord(state, record)
  }

  flushCurrent(state)

  if (state.malformed > 0) {
    const action = policy === 'stop' ? 'stopped at first' : 'skipped'
    log(`   LCOV: ${action} malformed line${policy === 'stop' ? '' : ` (${state.malformed})`}`)
  }

  return createReport(state.files)
}

/**
 * Read and parse an lcov.info file. Returns null when the file cannot be read.
 */
export function readLcovFile(filePath: string, options?: LcovParseOptions): CoverageReport | null {
  let raw: string
  try {
    raw = readFileSync(filePath, 'utf-8')
  } catch (err) {
    log(`   LCOV not readable: ${filePath} (${formatError(err)})`)
    return null
  }
  return parseLcov(raw, options)
}
