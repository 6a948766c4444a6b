/**
 * zone-rules-kit
 *
 * Public API exports
 */

// Error system (canonical source: base class, codes, all error classes)
export {
  ZoneRulesError, ZoneRulesErrorCode,
  BuilderStateError, ValidationError,
  DateTimeRangeError, ParseError, ArithmeticOverflowError,
  LocalTimeGapError, LocalTimeOverlapError,
} from './errors'
export type { ZoneRulesErrorCode as ZoneRulesErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Branded primitives
export type { LocalDate, LocalTime, LocalDateTime, Weekday, ZoneOffset, TimeAmount } from './core'

// Time & Date
export {
  MIN_YEAR, MAX_YEAR, MIN_DATE_TIME, MAX_DATE_TIME, MIDNIGHT,
  isLeapYear, daysInMonth, daysInYear,
  parseDate, parseTime, parseDateTime,
  makeDate, makeTime, makeDateTime, localDateTime,
  yearOf, monthOf, dayOf, hourOf, minuteOf, secondOf, dateOf, timeOf,
  toEpochDay, fromEpochDay, toLocalEpochSecond, fromLocalEpochSecond,
  toEpochSecond, fromEpochSecond,
  addDays, daysBetween, addSeconds, secondsBetween,
  dayOfWeek, weekdayToIndex, indexToWeekday, nextOrSame, previousOrSame,
  compareDates, compareTimes, compareDateTimes, dateTimeBefore, dateTimeAfter,
} from './time-date'

// Checked arithmetic
export { addExact, subtractExact, multiplyExact, floorDiv, floorMod } from './checked-math'

// Offsets & amounts
export {
  MAX_OFFSET_SECONDS, UTC_OFFSET,
  offsetOfTotalSeconds, offsetOfHours, offsetOfHoursMinutes, offsetOfHoursMinutesSeconds,
  offsetPlus, compareOffsets, formatOffset, parseOffset,
} from './zone-offset'
export {
  ZERO_AMOUNT,
  amountOfSeconds, amountOfMinutes, amountOfHours, amountOf,
  plusAmounts, negateAmount, formatAmount,
} from './time-amount'
export { TimeDefinition, isTimeDefinition } from './time-definition'

// Day rules
export type { DaySpec } from './day-rules'
export {
  dayOfMonth, nthWeekdayOfMonth, lastWeekdayOfMonth, lastDayOfMonth, weekdayOnOrAfter,
  daySpecEquals, resolveDay, formatDaySpec,
} from './day-rules'

// Domain types
export type {
  RuleInput, RecurringRuleInput, SingleYearRuleInput,
  ZoneOffsetTransition, ZoneOffsetTransitionRule, StandardOffsetChange,
  OffsetQueryResult, OffsetDateTime,
} from './domain-types'

// Transitions
export {
  createTransition, transitionAt,
  transitionInstant, transitionDateTimeBefore, transitionDateTimeAfter, transitionSize,
  isGap, isOverlap, isValidOffsetForTransition, validOffsetsForTransition,
  compareTransitions, transitionEquals, formatTransition,
} from './transition'
export {
  createTransitionRule, createTransitionForYear, transitionRuleEquals, formatTransitionRule,
} from './transition-rule'

// Query results
export type { SingleOffset, OffsetDiscontinuity } from './offset-query'
export {
  isSingle, isDiscontinuity, isGapResult, isOverlapResult, validOffsetsOf, formatOffsetQueryResult,
} from './offset-query'

// Rules & builder
export type { ZoneRules, ZoneRulesConfig } from './zone-rules'
export { createZoneRules, fixedZoneRules, DEFAULT_CACHE_UNTIL_YEAR } from './zone-rules'
export type { ZoneRulesBuilder, ZoneRulesBuilderConfig, BuilderState } from './zone-rules-builder'
export { createZoneRulesBuilder, DEFAULT_MAX_RULES_PER_WINDOW } from './zone-rules-builder'

// Zone resolvers
export type { ZoneResolver } from './zone-resolvers'
export {
  strict, preTransition, postTransition, postGapPreOverlap, retainOffset, pushForward, combination,
  resolveLocalDateTime, offsetDateTimeToEpochSecond, formatOffsetDateTime,
} from './zone-resolvers'
