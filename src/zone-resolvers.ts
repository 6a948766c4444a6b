/**
 * Zone Resolvers
 *
 * Strategies that pick one offset date-time for a local date-time that falls
 * in a gap or an overlap. Local date-times with a single valid offset never
 * reach a resolver.
 */

import {
  type LocalDateTime,
  addSeconds,
  toEpochSecond,
} from './time-date'
import { formatOffset } from './zone-offset'
import { transitionDateTimeBefore, transitionDateTimeAfter, transitionSize, formatTransition } from './transition'
import type { OffsetDateTime } from './domain-types'
import type { OffsetDiscontinuity } from './offset-query'
import type { ZoneRules } from './zone-rules'
import { LocalTimeGapError, LocalTimeOverlapError, ValidationError } from './errors'

export type { OffsetDateTime } from './domain-types'
export { LocalTimeGapError, LocalTimeOverlapError } from './errors'

export type ZoneResolver = (
  dateTime: LocalDateTime,
  rules: ZoneRules,
  info: OffsetDiscontinuity,
  previous?: OffsetDateTime
) => OffsetDateTime

// ============================================================================
// Building Blocks
// ============================================================================

function preGap(info: OffsetDiscontinuity): OffsetDateTime {
  return { dateTime: addSeconds(transitionDateTimeBefore(info.transition), -1), offset: info.offsetBefore }
}

function postGap(info: OffsetDiscontinuity): OffsetDateTime {
  return { dateTime: transitionDateTimeAfter(info.transition), offset: info.offsetAfter }
}

function pushGap(dateTime: LocalDateTime, info: OffsetDiscontinuity): OffsetDateTime {
  return { dateTime: addSeconds(dateTime, transitionSize(info.transition)), offset: info.offsetAfter }
}

function combine(
  gap: (dateTime: LocalDateTime, info: OffsetDiscontinuity) => OffsetDateTime,
  overlap: ZoneResolver
): ZoneResolver {
  return (dateTime, rules, info, previous) =>
    info.kind === 'gap' ? gap(dateTime, info) : overlap(dateTime, rules, info, previous)
}

const earlierOffset: ZoneResolver = (dateTime, _rules, info) => ({ dateTime, offset: info.offsetBefore })
const laterOffset: ZoneResolver = (dateTime, _rules, info) => ({ dateTime, offset: info.offsetAfter })

// ============================================================================
// Resolvers
// ============================================================================

/** Rejects both gaps and overlaps. */
export const strict: ZoneResolver = (dateTime, rules, info) => {
  if (info.kind === 'gap') {
    throw new LocalTimeGapError(
      `Local date-time ${dateTime} does not exist in time zone '${rules.id}' due to ${formatTransition(info.transition)}`
    )
  }
  throw new LocalTimeOverlapError(
    `Local date-time ${dateTime} is ambiguous in time zone '${rules.id}' due to ${formatTransition(info.transition)}`
  )
}

/** Gap: the last second before the transition. Overlap: the earlier offset. */
export const preTransition: ZoneResolver = combine((_dateTime, info) => preGap(info), earlierOffset)

/** Gap: the first local time after the transition. Overlap: the later offset. */
export const postTransition: ZoneResolver = combine((_dateTime, info) => postGap(info), laterOffset)

/** Gap as postTransition, overlap as preTransition. */
export const postGapPreOverlap: ZoneResolver = combine((_dateTime, info) => postGap(info), earlierOffset)

/** Gap as postTransition. Overlap keeps the previous offset when it is one of the two valid ones. */
export const retainOffset: ZoneResolver = combine(
  (_dateTime, info) => postGap(info),
  (dateTime, _rules, info, previous) => {
    const offset =
      previous !== undefined && (previous.offset === info.offsetBefore || previous.offset === info.offsetAfter)
        ? previous.offset
        : info.offsetBefore
    return { dateTime, offset }
  }
)

/** Gap: moves the local time forward by the length of the gap. Overlap: the later offset. */
export const pushForward: ZoneResolver = combine(pushGap, laterOffset)

/** Uses one resolver for gaps and another for overlaps. */
export function combination(gapResolver: ZoneResolver, overlapResolver: ZoneResolver): ZoneResolver {
  return (dateTime, rules, info, previous) =>
    info.kind === 'gap'
      ? gapResolver(dateTime, rules, info, previous)
      : overlapResolver(dateTime, rules, info, previous)
}

// ============================================================================
// Application
// ============================================================================

/**
 * Fixes a local date-time to an offset in the given rules, delegating gaps
 * and overlaps to `resolver` (strict by default). The resolver's answer must
 * itself be valid in the rules.
 */
export function resolveLocalDateTime(
  rules: ZoneRules,
  dateTime: LocalDateTime,
  resolver: ZoneResolver = strict,
  previous?: OffsetDateTime
): OffsetDateTime {
  const info = rules.resolve(dateTime)
  if (info.type === 'single') return { dateTime, offset: info.offset }

  const result = resolver(dateTime, rules, info, previous)
  if (!rules.isValidOffset(result.dateTime, result.offset)) {
    throw new ValidationError(
      `Resolver returned ${result.dateTime}${formatOffset(result.offset)}, which is not valid in '${rules.id}'`
    )
  }
  return result
}

export function offsetDateTimeToEpochSecond(value: OffsetDateTime): number {
  return toEpochSecond(value.dateTime, value.offset)
}

export function formatOffsetDateTime(value: OffsetDateTime): string {
  return `${value.dateTime}${formatOffset(value.offset)}`
}
