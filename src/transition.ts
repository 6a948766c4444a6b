/**
 * Zone Offset Transitions
 *
 * Accessors over the immutable transition record. Every transition is either
 * a gap (offset increases, local times skipped) or an overlap (offset
 * decreases, local times repeated).
 */

import {
  type LocalDateTime,
  fromEpochSecond,
  toEpochSecond,
} from './time-date'
import { type ZoneOffset, formatOffset, UTC_OFFSET } from './zone-offset'
import { type TimeAmount, amountOfSeconds } from './time-amount'
import type { ZoneOffsetTransition } from './domain-types'
import { ValidationError } from './errors'

export type { ZoneOffsetTransition } from './domain-types'

// ============================================================================
// Construction
// ============================================================================

export function createTransition(
  epochSecond: number,
  offsetBefore: ZoneOffset,
  offsetAfter: ZoneOffset
): ZoneOffsetTransition {
  if (!Number.isSafeInteger(epochSecond)) {
    throw new ValidationError(`Transition instant must be whole seconds, got ${epochSecond}`)
  }
  if (offsetBefore === offsetAfter) {
    throw new ValidationError(`Offsets must not be equal: ${formatOffset(offsetBefore)}`)
  }
  return Object.freeze({ epochSecond, offsetBefore, offsetAfter })
}

/** Transition at a local date-time expressed in the offset before it. */
export function transitionAt(
  dateTimeBefore: LocalDateTime,
  offsetBefore: ZoneOffset,
  offsetAfter: ZoneOffset
): ZoneOffsetTransition {
  return createTransition(toEpochSecond(dateTimeBefore, offsetBefore), offsetBefore, offsetAfter)
}

// ============================================================================
// Accessors
// ============================================================================

/** The transition instant as a UTC date-time. */
export function transitionInstant(t: ZoneOffsetTransition): LocalDateTime {
  return fromEpochSecond(t.epochSecond, UTC_OFFSET)
}

/** Local date-time of the instant in the offset before; the first skipped or repeated value. */
export function transitionDateTimeBefore(t: ZoneOffsetTransition): LocalDateTime {
  return fromEpochSecond(t.epochSecond, t.offsetBefore)
}

/** Local date-time of the instant in the offset after. */
export function transitionDateTimeAfter(t: ZoneOffsetTransition): LocalDateTime {
  return fromEpochSecond(t.epochSecond, t.offsetAfter)
}

export function transitionSize(t: ZoneOffsetTransition): TimeAmount {
  return amountOfSeconds(t.offsetAfter - t.offsetBefore)
}

export function isGap(t: ZoneOffsetTransition): boolean {
  return t.offsetAfter > t.offsetBefore
}

export function isOverlap(t: ZoneOffsetTransition): boolean {
  return t.offsetAfter < t.offsetBefore
}

/** Whether `offset` is valid for local times inside this transition's discontinuity. */
export function isValidOffsetForTransition(t: ZoneOffsetTransition, offset: ZoneOffset): boolean {
  if (isGap(t)) return false
  return t.offsetBefore === offset || t.offsetAfter === offset
}

/** Offsets valid inside the discontinuity: none for a gap, both for an overlap. */
export function validOffsetsForTransition(t: ZoneOffsetTransition): ZoneOffset[] {
  return isGap(t) ? [] : [t.offsetBefore, t.offsetAfter]
}

// ============================================================================
// Comparison & Text
// ============================================================================

export function compareTransitions(a: ZoneOffsetTransition, b: ZoneOffsetTransition): number {
  return Math.sign(a.epochSecond - b.epochSecond)
}

export function transitionEquals(a: ZoneOffsetTransition, b: ZoneOffsetTransition): boolean {
  return (
    a.epochSecond === b.epochSecond &&
    a.offsetBefore === b.offsetBefore &&
    a.offsetAfter === b.offsetAfter
  )
}

/** e.g. `Transition[Gap at 2000-03-26T01:00:00+01:00 to +02:00]` */
export function formatTransition(t: ZoneOffsetTransition): string {
  const kind = isGap(t) ? 'Gap' : 'Overlap'
  const at = `${transitionDateTimeBefore(t)}${formatOffset(t.offsetBefore)}`
  return `Transition[${kind} at ${at} to ${formatOffset(t.offsetAfter)}]`
}
