/**
 * coverage.py JSON Reader
 *
 * Used by: coverage json, pytest --cov-report=json
 *
 * Format structure:
 * {
 *   "meta": { ... },
 *   "files": {
 *     "src/app.py": {
 *       "executed_lines": [1, 2, 4],
 *       "missing_lines": [3],
 *       "summary": { "num_statements": 4, "covered_lines": 3, ... }
 *     }
 *   },
 *   "totals": { ... }
 * }
 *
 * coverage.py measures statements by line, so every executed or missing line
 * is one statement at column 0. The summary block is not read: totals are
 * recomputed from the line lists.
 */

import { readFileSync } from 'node:fs'
import { log, warn, formatError, safeJsonParse } from '../logger.js'
import { normalizePath } from '../paths.js'
import { buildFileCoverage, createReport } from '../report.js'
import { encodeStatementId } from '../statement-id.js'
import type { CoverageReport, FileCoverage, ParseResult, StatementId, StatementSpan } from '../types.js'
import { clampCount } from '../utils/counts.js'
import { isRecord, numberArray } from '../utils/json.js'
import type { JsonRecord } from '../utils/json.js'

function lineList(value: unknown): number[] {
  return numberArray(value)
    .map(clampCount)
    .filter((line) => line > 0)
}

function toFileCoverage(path: string, record: JsonRecord): FileCoverage | null {
  if (!Array.isArray(record.executed_lines) && !Array.isArray(record.missing_lines)) {
    return null
  }

  const lineHits = new Map<number, number>()
  for (const line of lineList(record.missing_lines)) {
    lineHits.set(line, 0)
  }
  // executed wins if a line is listed in both
  for (const line of lineList(record.executed_lines)) {
    lineHits.set(line, 1)
  }

  const statementHits = new Map<StatementId, number>()
  const statementMap = new Map<StatementId, StatementSpan>()
  for (const [line, hits] of lineHits) {
    const id = encodeStatementId(line, 0)
    statementHits.set(id, hits)
    statementMap.set(id, { startLine: line, endLine: line })
  }

  return buildFileCoverage({ path, lineHits, statementHits, statementMap })
}

/**
 * Parse a coverage.py JSON report, normalizing file paths against the root
 */
export function parseCoveragePyJson(text: string, root: string): ParseResult<CoverageReport> {
  const parsed = safeJsonParse(text, 'coverage.py JSON')
  if (!parsed.success) {
    return parsed
  }
  if (!isRecord(parsed.value) || !isRecord(parsed.value.files)) {
    return { success: false, error: 'coverage.py JSON: missing files object' }
  }

  const files: FileCoverage[] = []
  for (const [path, record] of Object.entries(parsed.value.files)) {
    if (!isRecord(record)) continue
    const file = toFileCoverage(normalizePath(path, root), record)
    if (file) {
      files.push(file)
    } else {
      log(`   coverage.py: no line data for ${path}`)
    }
  }
  return { success: true, value: createReport(files) }
}

/**
 * Read a coverage.py JSON report. Returns null when it is missing or invalid.
 */
export function readCoveragePyJsonFile(filePath: string, root: string): CoverageReport | null {
  let raw: string
  try {
    raw = readFileSync(filePath, 'utf-8')
  } catch (err) {
    log(`   coverage.py JSON not readable: ${filePath} (${formatError(err)})`)
    return null
  }

  const result = parseCoveragePyJson(raw, root)
  if (!result.success) {
    warn(`  ⚠️ coverage.py JSON rejected: ${filePath} (${result.error})`)
    return null
  }
  return result.value
}
