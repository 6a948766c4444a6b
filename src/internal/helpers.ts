/**
 * Internal Helpers
 *
 * Pure utility functions shared across internal modules.
 */

import type { ZoneOffset } from '../zone-offset'

// ============================================================================
// Binary Search
// ============================================================================

/** Number of entries in an ascending array that are <= value. */
export function upperBound(sorted: readonly number[], value: number): number {
  let lo = 0
  let hi = sorted.length
  while (lo < hi) {
    const mid = (lo + hi) >>> 1
    if ((sorted[mid] ?? Infinity) <= value) lo = mid + 1
    else hi = mid
  }
  return lo
}

/** Number of entries in an ascending array that are < value. */
export function lowerBound(sorted: readonly number[], value: number): number {
  let lo = 0
  let hi = sorted.length
  while (lo < hi) {
    const mid = (lo + hi) >>> 1
    if ((sorted[mid] ?? Infinity) < value) lo = mid + 1
    else hi = mid
  }
  return lo
}

// ============================================================================
// Offsets
// ============================================================================

/** Offsets in first-seen order without repeats. */
export function distinctOffsets(offsets: readonly ZoneOffset[]): ZoneOffset[] {
  const result: ZoneOffset[] = []
  for (const o of offsets) {
    if (!result.includes(o)) result.push(o)
  }
  return result
}
