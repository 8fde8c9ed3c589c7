/**
 * Narrowing helpers for parsed JSON values
 */

export type JsonRecord = Record<string, unknown>

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

/**
 * Entries of an object whose values are finite numbers; other entries are dropped
 */
export function numberEntries(value: unknown): [string, number][] {
  if (!isRecord(value)) {
    return []
  }
  const out: [string, number][] = []
  for (const [key, entry] of Object.entries(value)) {
    if (isFiniteNumber(entry)) {
      out.push([key, entry])
    }
  }
  return out
}

/**
 * Finite numbers of an array; a non-array gives an empty list
 */
export function numberArray(value: unknown): number[] {
  return Array.isArray(value) ? value.filter(isFiniteNumber) : []
}
