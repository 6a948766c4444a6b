/**
 * Day Rules
 *
 * Calendar-relative day specifications ("last Sunday", "2nd Friday",
 * "Sunday on or after the 8th") and their resolution to a concrete day in a
 * given year and month.
 */

import {
  type LocalDate,
  type Weekday,
  MIN_YEAR,
  MAX_YEAR,
  daysInMonth,
  makeDate,
  toEpochDay,
  fromEpochDay,
  weekdayIndexOfEpochDay,
  weekdayToIndex,
  isWeekday,
} from './time-date'

export type { Weekday } from './time-date'

// ============================================================================
// Types
// ============================================================================

export type DaySpec =
  | { readonly type: 'dayOfMonth'; readonly day: number }
  | { readonly type: 'nthWeekdayOfMonth'; readonly n: number; readonly weekday: Weekday }
  | { readonly type: 'lastWeekdayOfMonth'; readonly weekday: Weekday }
  | { readonly type: 'lastDayOfMonth'; readonly daysBefore: number; readonly weekday: Weekday | null }
  | { readonly type: 'weekdayOnOrAfter'; readonly day: number; readonly weekday: Weekday }

// ============================================================================
// Errors
// ============================================================================

export { ValidationError } from './errors'
import { ValidationError } from './errors'

// ============================================================================
// Validation
// ============================================================================

function isIntIn(n: number, min: number, max: number): boolean {
  return Number.isInteger(n) && n >= min && n <= max
}

function requireWeekday(weekday: unknown, kind: string): void {
  if (!isWeekday(weekday)) {
    throw new ValidationError(`${kind} requires a weekday (mon..sun), got ${String(weekday)}`)
  }
}

/** Checks the field ranges of a day spec, however it was built. */
export function assertDaySpec(spec: DaySpec): void {
  switch (spec.type) {
    case 'dayOfMonth':
      if (!isIntIn(spec.day, 1, 31)) throw new ValidationError(`dayOfMonth requires day 1-31, got ${spec.day}`)
      return
    case 'nthWeekdayOfMonth':
      if (!isIntIn(spec.n, 1, 5)) throw new ValidationError(`nthWeekdayOfMonth requires n 1-5, got ${spec.n}`)
      requireWeekday(spec.weekday, 'nthWeekdayOfMonth')
      return
    case 'lastWeekdayOfMonth':
      requireWeekday(spec.weekday, 'lastWeekdayOfMonth')
      return
    case 'lastDayOfMonth':
      if (!isIntIn(spec.daysBefore, 0, 27)) {
        throw new ValidationError(`lastDayOfMonth requires daysBefore 0-27, got ${spec.daysBefore}`)
      }
      if (spec.weekday !== null) requireWeekday(spec.weekday, 'lastDayOfMonth')
      return
    case 'weekdayOnOrAfter':
      if (!isIntIn(spec.day, 1, 31)) throw new ValidationError(`weekdayOnOrAfter requires day 1-31, got ${spec.day}`)
      requireWeekday(spec.weekday, 'weekdayOnOrAfter')
      return
    default:
      throw new ValidationError(`Unknown day spec: ${JSON.stringify(spec)}`)
  }
}

// ============================================================================
// Constructors
// ============================================================================

function frozen(spec: DaySpec): DaySpec {
  assertDaySpec(spec)
  return Object.freeze(spec)
}

export function dayOfMonth(day: number): DaySpec {
  return frozen({ type: 'dayOfMonth', day })
}

export function nthWeekdayOfMonth(n: number, weekday: Weekday): DaySpec {
  return frozen({ type: 'nthWeekdayOfMonth', n, weekday })
}

export function lastWeekdayOfMonth(weekday: Weekday): DaySpec {
  return frozen({ type: 'lastWeekdayOfMonth', weekday })
}

let canonicalLastDay: DaySpec | null = null

/**
 * Last day of the month, moved back `daysBefore` days and then back to the
 * previous-or-same `weekday` when one is given.
 */
export function lastDayOfMonth(options?: { daysBefore?: number; weekday?: Weekday }): DaySpec {
  const daysBefore = options?.daysBefore ?? 0
  const weekday = options?.weekday ?? null
  if (daysBefore === 0 && weekday === null) {
    canonicalLastDay ??= frozen({ type: 'lastDayOfMonth', daysBefore: 0, weekday: null })
    return canonicalLastDay
  }
  return frozen({ type: 'lastDayOfMonth', daysBefore, weekday })
}

/** First `weekday` on or after `day`; may fall in the following month. */
export function weekdayOnOrAfter(day: number, weekday: Weekday): DaySpec {
  return frozen({ type: 'weekdayOnOrAfter', day, weekday })
}

export function daySpecEquals(a: DaySpec, b: DaySpec): boolean {
  switch (a.type) {
    case 'dayOfMonth':
      return b.type === 'dayOfMonth' && a.day === b.day
    case 'nthWeekdayOfMonth':
      return b.type === 'nthWeekdayOfMonth' && a.n === b.n && a.weekday === b.weekday
    case 'lastWeekdayOfMonth':
      return b.type === 'lastWeekdayOfMonth' && a.weekday === b.weekday
    case 'lastDayOfMonth':
      return b.type === 'lastDayOfMonth' && a.daysBefore === b.daysBefore && a.weekday === b.weekday
    case 'weekdayOnOrAfter':
      return b.type === 'weekdayOnOrAfter' && a.day === b.day && a.weekday === b.weekday
  }
}

// ============================================================================
// Resolution
// ============================================================================

const MIN_EPOCH_DAY = toEpochDay(makeDate(MIN_YEAR, 1, 1))
const MAX_EPOCH_DAY = toEpochDay(makeDate(MAX_YEAR, 12, 31))

/** Days forward from weekday index `from` to weekday `to` (0..6). */
function daysUntil(from: number, to: Weekday): number {
  return (weekdayToIndex(to) - from + 7) % 7
}

/** Days back from weekday index `from` to weekday `to` (0..6). */
function daysSince(from: number, to: Weekday): number {
  return (from - weekdayToIndex(to) + 7) % 7
}

function resolveInMonth(spec: DaySpec, year: number, month: number): number | null {
  const first = toEpochDay(makeDate(year, month, 1))
  const dim = daysInMonth(year, month)
  const last = first + dim - 1

  switch (spec.type) {
    case 'dayOfMonth':
      return spec.day <= dim ? first + spec.day - 1 : null
    case 'nthWeekdayOfMonth': {
      const day = 1 + daysUntil(weekdayIndexOfEpochDay(first), spec.weekday) + (spec.n - 1) * 7
      return day <= dim ? first + day - 1 : null
    }
    case 'lastWeekdayOfMonth':
      return last - daysSince(weekdayIndexOfEpochDay(last), spec.weekday)
    case 'lastDayOfMonth': {
      const base = last - spec.daysBefore
      if (spec.weekday === null) return base
      return base - daysSince(weekdayIndexOfEpochDay(base), spec.weekday)
    }
    case 'weekdayOnOrAfter': {
      if (spec.day > dim) return null
      const base = first + spec.day - 1
      return base + daysUntil(weekdayIndexOfEpochDay(base), spec.weekday)
    }
  }
}

/**
 * Epoch day a spec lands on in the given year and month, or null when the
 * day does not exist there (Feb 29 in a common year, a missing 5th weekday)
 * or would fall outside the supported year range.
 */
export function resolveDayEpoch(spec: DaySpec, year: number, month: number): number | null {
  const epochDay = resolveInMonth(spec, year, month)
  if (epochDay === null || epochDay < MIN_EPOCH_DAY || epochDay > MAX_EPOCH_DAY) return null
  return epochDay
}

export function resolveDay(spec: DaySpec, year: number, month: number): LocalDate | null {
  const epochDay = resolveDayEpoch(spec, year, month)
  return epochDay === null ? null : fromEpochDay(epochDay)
}

const SHORTEST_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

/** True when the day spec resolves in this month of every year. */
export function resolvesEveryYear(spec: DaySpec, month: number): boolean {
  const shortest = SHORTEST_MONTH[month - 1] ?? 0
  switch (spec.type) {
    case 'dayOfMonth':
    case 'weekdayOnOrAfter':
      return spec.day <= shortest
    case 'nthWeekdayOfMonth':
      return spec.n <= 4
    case 'lastWeekdayOfMonth':
    case 'lastDayOfMonth':
      return true
  }
}

// ============================================================================
// Text
// ============================================================================

function weekdayName(w: Weekday): string {
  return w.charAt(0).toUpperCase() + w.slice(1)
}

/** tz-database style text: 15, Sun#2, lastSun, last-3, Sun<=last-3, Sun>=8. */
export function formatDaySpec(spec: DaySpec): string {
  switch (spec.type) {
    case 'dayOfMonth':
      return `${spec.day}`
    case 'nthWeekdayOfMonth':
      return `${weekdayName(spec.weekday)}#${spec.n}`
    case 'lastWeekdayOfMonth':
      return `last${weekdayName(spec.weekday)}`
    case 'lastDayOfMonth': {
      const base = spec.daysBefore === 0 ? 'last' : `last-${spec.daysBefore}`
      return spec.weekday === null ? base : `${weekdayName(spec.weekday)}<=${base}`
    }
    case 'weekdayOnOrAfter':
      return `${weekdayName(spec.weekday)}>=${spec.day}`
  }
}
