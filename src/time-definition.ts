/**
 * Time Definitions
 *
 * How the local time stated in a rule or a window boundary is to be read.
 */

import type { ZoneOffset } from './zone-offset'

export const TimeDefinition = {
  /** The stated time is already UTC. */
  UTC: 'UTC',
  /** The stated time uses the standard offset, ignoring savings. */
  STANDARD: 'STANDARD',
  /** The stated time is wall-clock time: standard offset plus the savings in effect. */
  WALL: 'WALL',
} as const

export type TimeDefinition = (typeof TimeDefinition)[keyof typeof TimeDefinition]

export function isTimeDefinition(value: unknown): value is TimeDefinition {
  return value === TimeDefinition.UTC || value === TimeDefinition.STANDARD || value === TimeDefinition.WALL
}

/**
 * Instant of a nominal local time (local epoch seconds).
 *
 * `wallOffset` is the offset in effect just before the instant, i.e. the
 * standard offset plus the savings being replaced.
 */
export function definitionToEpochSecond(
  definition: TimeDefinition,
  localEpochSecond: number,
  standardOffset: ZoneOffset,
  wallOffset: ZoneOffset
): number {
  switch (definition) {
    case 'UTC':
      return localEpochSecond
    case 'STANDARD':
      return localEpochSecond - standardOffset
    case 'WALL':
      return localEpochSecond - wallOffset
  }
}
