/**
 * Canonical Domain Types
 *
 * Single source of truth for the entities passed between the builder, the
 * resolver and the rule set. Modules import from here rather than defining
 * their own copies.
 */

import type { LocalDateTime, LocalTime } from './time-date'
import type { ZoneOffset } from './zone-offset'
import type { TimeAmount } from './time-amount'
import type { TimeDefinition } from './time-definition'
import type { DaySpec } from './day-rules'

// ============================================================================
// Rule Inputs
// ============================================================================

type RuleFields = {
  /** 1..12 */
  month: number
  day: DaySpec
  time: LocalTime
  /** Fire at 24:00, the midnight ending the resolved day. Requires time 00:00:00. */
  timeEndOfDay?: boolean
  timeDefinition: TimeDefinition
  /** Savings in effect from the transition on. */
  savings: TimeAmount
}

/** Applies every year in [startYear, endYear]; endYear MAX_YEAR means forever. */
export type RecurringRuleInput = RuleFields & {
  startYear: number
  endYear: number
}

export type SingleYearRuleInput = RuleFields & {
  year: number
}

export type RuleInput = RecurringRuleInput | SingleYearRuleInput

// ============================================================================
// Transitions
// ============================================================================

/**
 * A discontinuity in the local time-line: at `epochSecond` (seconds since
 * 1970-01-01T00:00:00Z) the offset changes from `offsetBefore` to `offsetAfter`.
 */
export type ZoneOffsetTransition = {
  readonly epochSecond: number
  readonly offsetBefore: ZoneOffset
  readonly offsetAfter: ZoneOffset
}

/** A forever rule of the last window, kept open-ended. */
export type ZoneOffsetTransitionRule = {
  readonly month: number
  readonly day: DaySpec
  readonly time: LocalTime
  readonly timeEndOfDay: boolean
  readonly timeDefinition: TimeDefinition
  readonly standardOffset: ZoneOffset
  readonly offsetBefore: ZoneOffset
  readonly offsetAfter: ZoneOffset
}

/** Change of the standard offset, recorded at window starts. */
export type StandardOffsetChange = {
  readonly epochSecond: number
  readonly offset: ZoneOffset
}

// ============================================================================
// Query Results
// ============================================================================

export type OffsetQueryResult =
  | { readonly type: 'single'; readonly offset: ZoneOffset }
  | {
      readonly type: 'discontinuity'
      readonly kind: 'gap' | 'overlap'
      readonly offsetBefore: ZoneOffset
      readonly offsetAfter: ZoneOffset
      readonly transition: ZoneOffsetTransition
    }

/** A local date-time fixed to one offset. */
export type OffsetDateTime = {
  readonly dateTime: LocalDateTime
  readonly offset: ZoneOffset
}
