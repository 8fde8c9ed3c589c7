/**
 * Simple logger for unicov
 *
 * Logs are disabled by default (log: false in config).
 * Set log: true (or pass --log) to see which artifacts were read and merged.
 * Set timing: true to show only performance timing information.
 */

import type { ParseResult } from './types.js'

let loggingEnabled = false
let timingEnabled = false

/**
 * Set whether logging is enabled
 */
export function setLogging(enabled: boolean): void {
  loggingEnabled = enabled
}

/**
 * Set whether timing logs are enabled
 */
export function setTiming(enabled: boolean): void {
  timingEnabled = enabled
}

/**
 * Whether `log` prints; lets callers skip building messages nobody sees
 */
export function isLoggingEnabled(): boolean {
  return loggingEnabled
}

/**
 * Log a message (only if logging is enabled)
 */
export function log(...args: unknown[]): void {
  if (loggingEnabled) {
    console.log(...args)
  }
}

/**
 * Log a warning (always shown)
 */
export function warn(...args: unknown[]): void {
  console.log(...args)
}

/**
 * Log an error (always shown)
 */
export function error(...args: unknown[]): void {
  console.error(...args)
}

/**
 * Simple timer utility for performance measurement.
 * Outputs when either logging or timing is enabled.
 */
export function createTimer(label: string): () => void {
  if (!loggingEnabled && !timingEnabled) {
    return () => {}
  }
  const start = performance.now()
  return () => {
    const duration = performance.now() - start
    console.log(`  ⏱ ${label}: ${duration.toFixed(0)}ms`)
  }
}

/**
 * Format an error for logging.
 * Extracts message from Error objects, converts other types to string.
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

/**
 * Parse JSON without throwing.
 * The failure carries the parser message, prefixed with the context when given.
 */
export function safeJsonParse(json: string, context?: string): ParseResult<unknown> {
  try {
    const value: unknown = JSON.parse(json)
    return { success: true, value }
  } catch (err) {
    const ctx = context ? ` (${context})` : ''
    log(`JSON parse failed${ctx}: ${formatError(err)}`)
    return { success: false, error: `${context ? `${context}: ` : ''}${formatError(err)}` }
  }
}
