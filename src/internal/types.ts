/**
 * Internal Types
 *
 * Shared type definitions between the builder and the resolver.
 */

import type { LocalDateTime, LocalTime } from '../time-date'
import type { ZoneOffset } from '../zone-offset'
import type { TimeAmount } from '../time-amount'
import type { TimeDefinition } from '../time-definition'
import type { DaySpec } from '../day-rules'
import type {
  StandardOffsetChange, ZoneOffsetTransition, ZoneOffsetTransitionRule,
} from '../domain-types'

// ============================================================================
// Builder State
// ============================================================================

type InternalRuleFields = {
  month: number
  day: DaySpec
  time: LocalTime
  timeEndOfDay: boolean
  timeDefinition: TimeDefinition
  savings: TimeAmount
  /** Declaration order within the window; breaks ties between equal times. */
  order: number
}

/** One concrete yearly occurrence of a rule. */
export type InternalRule = InternalRuleFields & {
  year: number
}

/** A rule whose end year is MAX_YEAR. */
export type InternalForeverRule = InternalRuleFields & {
  startYear: number
}

export type InternalWindow = {
  standardOffset: ZoneOffset
  until: LocalDateTime
  untilDefinition: TimeDefinition
  forever: boolean
  fixedSavings: TimeAmount | null
  rules: InternalRule[]
  foreverRules: InternalForeverRule[]
  nextOrder: number
}

// ============================================================================
// Resolver Output
// ============================================================================

export type ResolvedTimeline = {
  initialStandardOffset: ZoneOffset
  initialWallOffset: ZoneOffset
  standardOffsetChanges: StandardOffsetChange[]
  transitions: ZoneOffsetTransition[]
  transitionRules: ZoneOffsetTransitionRule[]
}
