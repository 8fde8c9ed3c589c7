/**
 * llvm-cov JSON Export Reader
 *
 * Used by: cargo llvm-cov --json, llvm-cov export -format=text
 *
 * Exports can be very large, so the document is walked with the pull reader
 * instead of being materialized. Any `"files"` array is recognized, at any
 * depth; inside each file record only `"filename"` and `"segments"` are read.
 *
 * Segment layout:
 * [line, column, count, has_count, is_region_entry, is_gap_region, ...]
 *
 * A segment counts as a statement when it has a count, starts a region, is
 * not a gap region and has a positive line. Region counters nest, so several
 * segments at one position restate the same execution count: within one
 * document they combine by max, never by sum.
 */

import { buildFileCoverage, createReport } from '../report.js'
import { normalizePath } from '../paths.js'
import { log, formatError, createTimer } from '../logger.js'
import { encodeStatementId, statementIdLine } from '../statement-id.js'
import type {
  CoverageReport,
  FileCoverage,
  ParseResult,
  StatementId,
  StatementSpan,
} from '../types.js'
import { clampCount, maxIntoCount } from '../utils/counts.js'
import { JsonReader, JsonSyntaxError, withFileJsonReader } from './json-reader.js'

/** normalized path -> statement id -> count */
type StatementHitsByPath = Map<string, Map<StatementId, number>>

interface RegionEntry {
  id: StatementId
  count: number
}

function readSegment(reader: JsonReader): RegionEntry | null {
  reader.beginArray()
  const line = reader.nextNumber()
  const column = reader.nextNumber()
  const count = reader.nextNumber()
  const hasCount = reader.nextBoolean()
  const isRegionEntry = reader.nextBoolean()
  const isGapRegion = reader.hasNext() ? reader.nextBoolean() : false
  while (reader.hasNext()) {
    reader.skipValue()
  }
  reader.endArray()

  const safeLine = clampCount(line)
  if (!hasCount || !isRegionEntry || isGapRegion || safeLine === 0) {
    return null
  }
  return { id: encodeStatementId(safeLine, clampCount(column)), count: clampCount(count) }
}

function readSegments(reader: JsonReader, into: RegionEntry[]): void {
  reader.beginArray()
  while (reader.hasNext()) {
    const entry = readSegment(reader)
    if (entry) {
      into.push(entry)
    }
  }
  reader.endArray()
}

function readFileRecord(reader: JsonReader, hitsByPath: StatementHitsByPath, root: string): void {
  const start = reader.offset()
  let filename: string | null = null
  // segments may precede the filename
  const entries: RegionEntry[] = []

  reader.beginObject()
  while (reader.hasNext()) {
    const name = reader.nextName()
    if (name === 'filename') {
      filename = reader.nextString()
    } else if (name === 'segments') {
      readSegments(reader, entries)
    } else {
      reader.skipValue()
    }
  }
  reader.endObject()

  if (filename === null) {
    throw new JsonSyntaxError("File record without 'filename'", start)
  }

  const path = normalizePath(filename, root)
  let hits = hitsByPath.get(path)
  if (!hits) {
    hits = new Map()
    hitsByPath.set(path, hits)
  }
  for (const entry of entries) {
    maxIntoCount(hits, entry.id, entry.count)
  }
}

function readFiles(reader: JsonReader, hitsByPath: StatementHitsByPath, root: string): void {
  reader.beginArray()
  while (reader.hasNext()) {
    readFileRecord(reader, hitsByPath, root)
  }
  reader.endArray()
}

/**
 * Walk any JSON value, collecting every "files" array found inside it
 */
function visitValue(reader: JsonReader, hitsByPath: StatementHitsByPath, root: string): void {
  switch (reader.peek()) {
    case 'BEGIN_OBJECT':
      reader.beginObject()
      while (reader.hasNext()) {
        if (reader.nextName() === 'files') {
          readFiles(reader, hitsByPath, root)
        } else {
          visitValue(reader, hitsByPath, root)
        }
      }
      reader.endObject()
      return

    case 'BEGIN_ARRAY':
      reader.beginArray()
      while (reader.hasNext()) {
        visitValue(reader, hitsByPath, root)
      }
      reader.endArray()
      return

    default:
      reader.skipValue()
  }
}

function toFileCoverage(path: string, hits: Map<StatementId, number>): FileCoverage {
  const statementMap = new Map<StatementId, StatementSpan>()
  const lineHits = new Map<number, number>()

  for (const [id, count] of hits) {
    const line = statementIdLine(id)
    statementMap.set(id, { startLine: line, endLine: line })
    maxIntoCount(lineHits, line, count)
  }

  return buildFileCoverage({ path, lineHits, statementHits: hits, statementMap })
}

function decodeLlvmCov(reader: JsonReader, root: string): ParseResult<CoverageReport> {
  const hitsByPath: StatementHitsByPath = new Map()
  try {
    visitValue(reader, hitsByPath, root)
    // rejects trailing content
    reader.peek()
  } catch (err) {
    if (err instanceof JsonSyntaxError) {
      log(`   llvm-cov JSON rejected: ${err.message}`)
      return { success: false, error: err.message }
    }
    throw err
  }

  const files = [...hitsByPath].map(([path, hits]) => toFileCoverage(path, hits))
  return { success: true, value: createReport(files) }
}

/**
 * Decode an llvm-cov JSON export held in memory
 */
export function parseLlvmCovJson(text: string, root: string): ParseResult<CoverageReport> {
  return decodeLlvmCov(new JsonReader(text), root)
}

/**
 * Stream an llvm-cov JSON export from disk.
 * Returns null when the file cannot be opened or read.
 */
export function readLlvmCovJsonFile(
  filePath: string,
  root: string
): ParseResult<CoverageReport> | null {
  const endTimer = createTimer(`llvm-cov read ${filePath}`)
  try {
    return withFileJsonReader(filePath, (reader) => decodeLlvmCov(reader, root))
  } catch (err) {
    log(`   llvm-cov JSON not readable: ${filePath} (${formatError(err)})`)
    return null
  } finally {
    endTimer()
  }
}

/**
 * Overlay statement data onto the files of another report with the same path.
 * Files without a counterpart keep their line-based data.
 */
export function applyStatementHits(
  report: CoverageReport,
  statementsReport: CoverageReport
): CoverageReport {
  const byPath = new Map(statementsReport.files.map((file) => [file.path, file]))

  return {
    files: report.files.map((file) => {
      const statements = byPath.get(file.path)
      if (!statements?.statementHits) {
        return file
      }
      return buildFileCoverage({
        ...file,
        statementHits: statements.statementHits,
        statementMap: statements.statementMap,
      })
    }),
  }
}
