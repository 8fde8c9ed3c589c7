/**
 * Internal constants for unicov.
 *
 * This module contains numeric limits, layout budgets and color bands.
 * For user-configurable options, see config.ts.
 */

// =============================================================================
// Counters
// =============================================================================

/**
 * Largest hit count stored in the model (u32 max).
 * Counts from artifacts clamp to this value instead of wrapping.
 */
export const MAX_HIT_COUNT = 4_294_967_295

/**
 * Multiplier separating the line from the column in a statement id (2^32).
 */
export const STATEMENT_LINE_FACTOR = 4_294_967_296

/**
 * Largest line a statement id can carry while staying a safe integer (2^21 - 1).
 */
export const MAX_STATEMENT_LINE = 2_097_151

// =============================================================================
// Streaming
// =============================================================================

/**
 * Bytes read per chunk when streaming llvm-cov JSON exports from disk.
 */
export const JSON_READ_CHUNK_SIZE = 64 * 1024

// =============================================================================
// Terminal Layout
// =============================================================================

/**
 * Column count assumed when the terminal width is unknown.
 */
export const DEFAULT_TERMINAL_COLUMNS = 100

/**
 * Row count assumed when the terminal height is unknown.
 */
export const DEFAULT_TERMINAL_ROWS = 40

/**
 * Row cap used by page-fit mode so a report fits one screen.
 */
export const PAGE_FIT_MAX_ROWS = 39

/**
 * Width cap of the Istanbul-style text table, independent of terminal width,
 * so the output lines up with Istanbul's own text reporter.
 */
export const ISTANBUL_TEXT_MAX_COLUMNS = 60

/**
 * Hotspots listed per file in detail blocks when nothing else is configured.
 */
export const DEFAULT_DETAIL_HOTSPOTS = 5

/**
 * Upper bound on filler "uncovered line" rows per per-file table.
 */
export const MAX_FILLER_LINES = 5000

// =============================================================================
// Color Bands
// =============================================================================

/**
 * Percentages at or above this render green.
 */
export const SUCCESS_THRESHOLD = 85

/**
 * Percentages at or above this (and below SUCCESS_THRESHOLD) render yellow.
 */
export const WARNING_THRESHOLD = 60

export const COLOR_SUCCESS = '#22c55e'
export const COLOR_WARNING = '#eab308'
export const COLOR_FAILURE = '#ff2323'

/**
 * Default editor link template, only used for TTY output.
 */
export const DEFAULT_EDITOR_CMD = 'vscode://file/{file}:{line}'
