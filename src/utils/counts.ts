/**
 * Saturating counter helpers
 *
 * Every hit count in the model is an integer in [0, MAX_HIT_COUNT].
 * Values from artifacts clamp into that range; additions stop at the maximum.
 */

import { MAX_HIT_COUNT } from '../constants.js'

/**
 * Clamp an externally sourced count into the stored range.
 * Negative, fractional and non-finite inputs are handled: NaN becomes 0,
 * fractions truncate, and anything above the range becomes MAX_HIT_COUNT.
 */
export function clampCount(value: number): number {
  if (Number.isNaN(value) || value <= 0) return 0
  if (value >= MAX_HIT_COUNT) return MAX_HIT_COUNT
  return Math.trunc(value)
}

/**
 * Add two stored counts, stopping at MAX_HIT_COUNT
 */
export function saturatingAdd(a: number, b: number): number {
  return Math.min(a + b, MAX_HIT_COUNT)
}

/**
 * Add `amount` to the count stored under `key`, creating it at zero
 */
export function addToCount<K>(target: Map<K, number>, key: K, amount: number): void {
  target.set(key, saturatingAdd(target.get(key) ?? 0, amount))
}

/**
 * Keep the larger of the stored count and `value`
 */
export function maxIntoCount<K>(target: Map<K, number>, key: K, value: number): void {
  const previous = target.get(key)
  if (previous === undefined || value > previous) {
    target.set(key, value)
  }
}

/**
 * Element-wise saturating sum, resized to the longer vector
 */
export function addCountVectors(left: readonly number[], right: readonly number[]): number[] {
  const length = Math.max(left.length, right.length)
  const out: number[] = []
  for (let index = 0; index < length; index++) {
    out.push(saturatingAdd(left[index] ?? 0, right[index] ?? 0))
  }
  return out
}
