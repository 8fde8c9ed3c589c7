/**
 * Format Parsers
 *
 * One reader per coverage artifact format. Each produces the common
 * CoverageReport model with files sorted by path:
 *
 * - LCOV text (lcov.info)
 * - Istanbul JSON (coverage-final.json, one per shard)
 * - llvm-cov JSON exports, read as a stream
 * - coverage.py JSON reports
 */

// LCOV
export {
  parseLcov,
  parseLcovRecord,
  readLcovFile,
  type LcovParseOptions,
  type LcovRecord,
  type MalformedLinePolicy,
} from './lcov.js'

// Istanbul
export {
  ISTANBUL_COVERAGE_FILE,
  parseIstanbulCoverage,
  readIstanbulCoverageFile,
  readIstanbulCoverageTree,
  toFileCoverageData,
  type IstanbulShard,
} from './istanbul.js'

// llvm-cov
export { parseLlvmCovJson, readLlvmCovJsonFile, applyStatementHits } from './llvm-cov.js'

// coverage.py
export { parseCoveragePyJson, readCoveragePyJsonFile } from './coveragepy.js'

// Pull reader
export {
  JsonReader,
  JsonSyntaxError,
  fileChunkSource,
  stringChunkSource,
  withFileJsonReader,
  type JsonChunkSource,
  type JsonToken,
} from './json-reader.js'
