/**
 * Transition Rules
 *
 * Open-ended yearly transitions that take over after the last explicit
 * transition of a rule set. Each rule materializes one transition per year.
 */

import {
  type LocalTime,
  MIDNIGHT,
  SECONDS_PER_DAY,
  secondOfDay,
} from './time-date'
import { type ZoneOffset, formatOffset } from './zone-offset'
import { type TimeDefinition, definitionToEpochSecond, isTimeDefinition } from './time-definition'
import { type DaySpec, assertDaySpec, resolveDayEpoch, daySpecEquals, formatDaySpec } from './day-rules'
import type { ZoneOffsetTransition, ZoneOffsetTransitionRule } from './domain-types'
import { createTransition } from './transition'
import { ValidationError } from './errors'

export type { ZoneOffsetTransitionRule } from './domain-types'

const MONTH_NAMES = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec']

export function createTransitionRule(fields: {
  month: number
  day: DaySpec
  time: LocalTime
  timeEndOfDay?: boolean
  timeDefinition: TimeDefinition
  standardOffset: ZoneOffset
  offsetBefore: ZoneOffset
  offsetAfter: ZoneOffset
}): ZoneOffsetTransitionRule {
  if (!Number.isInteger(fields.month) || fields.month < 1 || fields.month > 12) {
    throw new ValidationError(`Month must be 1-12, got ${fields.month}`)
  }
  assertDaySpec(fields.day)
  if (!isTimeDefinition(fields.timeDefinition)) {
    throw new ValidationError(`Unknown time definition: ${String(fields.timeDefinition)}`)
  }
  const timeEndOfDay = fields.timeEndOfDay ?? false
  if (timeEndOfDay && fields.time !== MIDNIGHT) {
    throw new ValidationError('Time must be midnight when the end-of-day flag is set')
  }
  return Object.freeze({ ...fields, timeEndOfDay })
}

/** Local epoch second at which the rule fires in `year`, or null if its day does not exist. */
export function ruleLocalEpochSecond(
  rule: Pick<ZoneOffsetTransitionRule, 'month' | 'day' | 'time' | 'timeEndOfDay'>,
  year: number
): number | null {
  const epochDay = resolveDayEpoch(rule.day, year, rule.month)
  if (epochDay === null) return null
  const endOfDay = rule.timeEndOfDay ? SECONDS_PER_DAY : 0
  return epochDay * SECONDS_PER_DAY + secondOfDay(rule.time) + endOfDay
}

/** The rule's transition in `year`; null when it changes nothing or its day does not exist. */
export function createTransitionForYear(rule: ZoneOffsetTransitionRule, year: number): ZoneOffsetTransition | null {
  if (rule.offsetBefore === rule.offsetAfter) return null
  const local = ruleLocalEpochSecond(rule, year)
  if (local === null) return null
  const epochSecond = definitionToEpochSecond(rule.timeDefinition, local, rule.standardOffset, rule.offsetBefore)
  return createTransition(epochSecond, rule.offsetBefore, rule.offsetAfter)
}

export function transitionRuleEquals(a: ZoneOffsetTransitionRule, b: ZoneOffsetTransitionRule): boolean {
  return (
    a.month === b.month &&
    daySpecEquals(a.day, b.day) &&
    a.time === b.time &&
    a.timeEndOfDay === b.timeEndOfDay &&
    a.timeDefinition === b.timeDefinition &&
    a.standardOffset === b.standardOffset &&
    a.offsetBefore === b.offsetBefore &&
    a.offsetAfter === b.offsetAfter
  )
}

/** e.g. `TransitionRule[Gap +01:00 to +02:00, Mar lastSun at 01:00:00 UTC, standard offset +01:00]` */
export function formatTransitionRule(rule: ZoneOffsetTransitionRule): string {
  const kind = rule.offsetAfter > rule.offsetBefore ? 'Gap' : 'Overlap'
  const time = rule.timeEndOfDay ? '24:00:00' : rule.time
  return (
    `TransitionRule[${kind} ${formatOffset(rule.offsetBefore)} to ${formatOffset(rule.offsetAfter)}, ` +
    `${MONTH_NAMES[rule.month - 1] ?? rule.month} ${formatDaySpec(rule.day)} at ${time} ${rule.timeDefinition}, ` +
    `standard offset ${formatOffset(rule.standardOffset)}]`
  )
}
