/**
 * Time & Date Utilities
 *
 * Pure functions for date/time parsing, construction, arithmetic and
 * epoch conversion. Uses Julian Day Number for all date arithmetic to avoid
 * month-length edge cases; the proleptic Gregorian calendar is assumed for
 * every year in [MIN_YEAR, MAX_YEAR].
 *
 * Dates are canonical ISO 8601 strings. Years outside 0000..9999 use the
 * expanded form with an explicit sign (`-0001-01-01`, `+10000-01-01`), so
 * string equality is value equality. Ordering goes through epoch numbers,
 * never string comparison.
 */

import { type Result, Ok, Err } from './result'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** ISO 8601 time string: HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** ISO 8601 datetime string: YYYY-MM-DDThh:mm:ss */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

// ============================================================================
// Errors
// ============================================================================

export { ParseError, DateTimeRangeError } from './errors'
import { ParseError, DateTimeRangeError } from './errors'

// ============================================================================
// Limits
// ============================================================================

export const MIN_YEAR = -999_999
/** Also the "forever" sentinel for a rule's end year. */
export const MAX_YEAR = 999_999

export const SECONDS_PER_MINUTE = 60
export const SECONDS_PER_HOUR = 3600
export const SECONDS_PER_DAY = 86_400

// JDN of 1970-01-01
const EPOCH_JDN = 2_440_588

// ============================================================================
// Helpers
// ============================================================================

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_DAYS[month - 1] ?? 0
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

function formatYear(year: number): string {
  if (year < 0) return '-' + pad4(-year)
  if (year > 9999) return '+' + year
  return pad4(year)
}

function isInt(n: number): boolean {
  return Number.isInteger(n)
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  if (!isInt(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new DateTimeRangeError(`Year out of range [${MIN_YEAR}, ${MAX_YEAR}]: ${year}`)
  }
  if (!isInt(month) || month < 1 || month > 12) {
    throw new DateTimeRangeError(`Month out of range [1, 12]: ${month}`)
  }
  if (!isInt(day) || day < 1 || day > daysInMonth(year, month)) {
    throw new DateTimeRangeError(`Day out of range for ${formatYear(year)}-${pad2(month)}: ${day}`)
  }
  return `${formatYear(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second?: number): LocalTime {
  const s = second ?? 0
  if (!isInt(hour) || hour < 0 || hour > 23) {
    throw new DateTimeRangeError(`Hour out of range [0, 23]: ${hour}`)
  }
  if (!isInt(minute) || minute < 0 || minute > 59) {
    throw new DateTimeRangeError(`Minute out of range [0, 59]: ${minute}`)
  }
  if (!isInt(s) || s < 0 || s > 59) {
    throw new DateTimeRangeError(`Second out of range [0, 59]: ${s}`)
  }
  return `${pad2(hour)}:${pad2(minute)}:${pad2(s)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return `${date}T${time}` as LocalDateTime
}

/** Shorthand for makeDateTime(makeDate(...), makeTime(...)). */
export function localDateTime(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0
): LocalDateTime {
  return makeDateTime(makeDate(year, month, day), makeTime(hour, minute, second))
}

export const MIDNIGHT: LocalTime = makeTime(0, 0, 0)

/** The beginning of time. */
export const MIN_DATE_TIME: LocalDateTime = localDateTime(MIN_YEAR, 1, 1)

/** The end of time. */
export const MAX_DATE_TIME: LocalDateTime = localDateTime(MAX_YEAR, 12, 31, 23, 59, 59)

// ============================================================================
// Parsing
// ============================================================================

const DATE_PATTERN = /^([+-]\d{4,6}|\d{4})-(\d{2})-(\d{2})$/
const TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2}))?$/

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = DATE_PATTERN.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = parseInt(match[1] ?? '', 10)
  const month = parseInt(match[2] ?? '', 10)
  const day = parseInt(match[3] ?? '', 10)

  if (year < MIN_YEAR || year > MAX_YEAR)
    return Err(new ParseError(`Invalid year in date: '${str}'`))
  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(makeDate(year, month, day))
}

export function parseTime(str: string): Result<LocalTime, ParseError> {
  const match = TIME_PATTERN.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = parseInt(match[1] ?? '', 10)
  const minute = parseInt(match[2] ?? '', 10)
  const second = match[3] ? parseInt(match[3], 10) : 0

  if (hour > 23)
    return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59)
    return Err(new ParseError(`Invalid minute in time: '${str}'`))
  if (second > 59)
    return Err(new ParseError(`Invalid second in time: '${str}'`))

  return Ok(makeTime(hour, minute, second))
}

export function parseDateTime(str: string): Result<LocalDateTime, ParseError> {
  const tIdx = str.indexOf('T')
  if (tIdx === -1) return Err(new ParseError(`Invalid datetime format (missing T): '${str}'`))

  const dateResult = parseDate(str.substring(0, tIdx))
  if (!dateResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  const timeResult = parseTime(str.substring(tIdx + 1))
  if (!timeResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  return Ok(makeDateTime(dateResult.value, timeResult.value))
}

// ============================================================================
// Component Extraction
// ============================================================================

// The year has a variable width; month and day are always the last five chars.

export function yearOf(date: LocalDate): number {
  return parseInt(date.slice(0, -6), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.slice(-5, -3), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.slice(-2), 10)
}

export function hourOf(time: LocalTime): number {
  return parseInt(time.substring(0, 2), 10)
}

export function minuteOf(time: LocalTime): number {
  return parseInt(time.substring(3, 5), 10)
}

export function secondOf(time: LocalTime): number {
  return parseInt(time.substring(6, 8), 10)
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.slice(0, -9) as LocalDate
}

export function timeOf(dt: LocalDateTime): LocalTime {
  return dt.slice(-8) as LocalTime
}

// ============================================================================
// Epoch Conversion
// ============================================================================

/** Days since 1970-01-01. */
export function toEpochDay(date: LocalDate): number {
  return dateToJDN(yearOf(date), monthOf(date), dayOf(date)) - EPOCH_JDN
}

export function fromEpochDay(epochDay: number): LocalDate {
  const { year, month, day } = jdnToDate(epochDay + EPOCH_JDN)
  return makeDate(year, month, day)
}

/** Year of an epoch day, without building the date. */
export function yearOfEpochDay(epochDay: number): number {
  return jdnToDate(epochDay + EPOCH_JDN).year
}

export function secondOfDay(time: LocalTime): number {
  return hourOf(time) * SECONDS_PER_HOUR + minuteOf(time) * SECONDS_PER_MINUTE + secondOf(time)
}

export function timeFromSecondOfDay(seconds: number): LocalTime {
  const h = Math.floor(seconds / SECONDS_PER_HOUR)
  const m = Math.floor((seconds % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE)
  return makeTime(h, m, seconds % SECONDS_PER_MINUTE)
}

/**
 * Seconds since 1970-01-01T00:00:00 on the local time-line, with no offset
 * applied. Subtracting an offset gives an instant.
 */
export function toLocalEpochSecond(dt: LocalDateTime): number {
  return toEpochDay(dateOf(dt)) * SECONDS_PER_DAY + secondOfDay(timeOf(dt))
}

export function fromLocalEpochSecond(localEpochSecond: number): LocalDateTime {
  const epochDay = Math.floor(localEpochSecond / SECONDS_PER_DAY)
  const sod = localEpochSecond - epochDay * SECONDS_PER_DAY
  return makeDateTime(fromEpochDay(epochDay), timeFromSecondOfDay(sod))
}

/** Instant (seconds since 1970-01-01T00:00:00Z) of a local date-time at an offset. */
export function toEpochSecond(dt: LocalDateTime, offsetSeconds: number): number {
  return toLocalEpochSecond(dt) - offsetSeconds
}

/** Local date-time of an instant seen at an offset. */
export function fromEpochSecond(epochSecond: number, offsetSeconds: number): LocalDateTime {
  return fromLocalEpochSecond(epochSecond + offsetSeconds)
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  return fromEpochDay(toEpochDay(date) + n)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  return toEpochDay(b) - toEpochDay(a)
}

// ============================================================================
// DateTime Arithmetic
// ============================================================================

export function addSeconds(dt: LocalDateTime, n: number): LocalDateTime {
  return fromLocalEpochSecond(toLocalEpochSecond(dt) + n)
}

export function secondsBetween(a: LocalDateTime, b: LocalDateTime): number {
  return toLocalEpochSecond(b) - toLocalEpochSecond(a)
}

// ============================================================================
// Day-of-Week
// ============================================================================

const WEEKDAYS: readonly Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

/** Monday-based index (0..6) of an epoch day. */
export function weekdayIndexOfEpochDay(epochDay: number): number {
  // 1970-01-01 was a Thursday
  return (((epochDay + 3) % 7) + 7) % 7
}

export function dayOfWeek(date: LocalDate): Weekday {
  return indexToWeekday(weekdayIndexOfEpochDay(toEpochDay(date)))
}

export function weekdayToIndex(w: Weekday): number {
  return WEEKDAYS.indexOf(w)
}

export function indexToWeekday(i: number): Weekday {
  return WEEKDAYS[((i % 7) + 7) % 7] ?? 'mon'
}

export function isWeekday(value: unknown): value is Weekday {
  return typeof value === 'string' && WEEKDAYS.some((w) => w === value)
}

/** The given date if it falls on `weekday`, otherwise the next such date. */
export function nextOrSame(date: LocalDate, weekday: Weekday): LocalDate {
  const current = weekdayToIndex(dayOfWeek(date))
  const diff = (weekdayToIndex(weekday) - current + 7) % 7
  return diff === 0 ? date : addDays(date, diff)
}

/** The given date if it falls on `weekday`, otherwise the previous such date. */
export function previousOrSame(date: LocalDate, weekday: Weekday): LocalDate {
  const current = weekdayToIndex(dayOfWeek(date))
  const diff = (current - weekdayToIndex(weekday) + 7) % 7
  return diff === 0 ? date : addDays(date, -diff)
}

// ============================================================================
// Comparison
// ============================================================================

function sign(n: number): number {
  if (n < 0) return -1
  if (n > 0) return 1
  return 0
}

export function compareDates(a: LocalDate, b: LocalDate): number {
  return sign(toEpochDay(a) - toEpochDay(b))
}

export function compareTimes(a: LocalTime, b: LocalTime): number {
  return sign(secondOfDay(a) - secondOfDay(b))
}

export function compareDateTimes(a: LocalDateTime, b: LocalDateTime): number {
  return sign(toLocalEpochSecond(a) - toLocalEpochSecond(b))
}

export function dateTimeBefore(a: LocalDateTime, b: LocalDateTime): boolean {
  return compareDateTimes(a, b) < 0
}

export function dateTimeAfter(a: LocalDateTime, b: LocalDateTime): boolean {
  return compareDateTimes(a, b) > 0
}
