/**
 * Zone Offsets
 *
 * A UTC offset is a whole number of seconds in [-18:00, +18:00]. Offsets are
 * plain branded numbers, so `===` and `<` compare them directly.
 */

import { type Result, Ok, Err } from './result'
import { SECONDS_PER_HOUR, SECONDS_PER_MINUTE } from './time-date'
import type { TimeAmount } from './time-amount'
import { DateTimeRangeError, ParseError } from './errors'

export { DateTimeRangeError } from './errors'

declare const __zoneOffset: unique symbol

/** Offset from UTC in seconds. */
export type ZoneOffset = number & { readonly [__zoneOffset]: true }

export const MAX_OFFSET_SECONDS = 18 * SECONDS_PER_HOUR

// ============================================================================
// Construction
// ============================================================================

export function offsetOfTotalSeconds(totalSeconds: number): ZoneOffset {
  if (!Number.isInteger(totalSeconds) || Math.abs(totalSeconds) > MAX_OFFSET_SECONDS) {
    throw new DateTimeRangeError(`Zone offset not in valid range: -18:00 to +18:00, got ${totalSeconds}s`)
  }
  return (totalSeconds === 0 ? 0 : totalSeconds) as ZoneOffset
}

export function offsetOfHours(hours: number): ZoneOffset {
  return offsetOfHoursMinutesSeconds(hours, 0, 0)
}

export function offsetOfHoursMinutes(hours: number, minutes: number): ZoneOffset {
  return offsetOfHoursMinutesSeconds(hours, minutes, 0)
}

/** Components must share a sign: (-1, -30, 0) is -01:30, (-1, 30, 0) is rejected. */
export function offsetOfHoursMinutesSeconds(hours: number, minutes: number, seconds: number): ZoneOffset {
  if (Math.abs(hours) > 18) {
    throw new DateTimeRangeError(`Zone offset hours not in valid range: ${hours}`)
  }
  if (Math.abs(minutes) > 59 || Math.abs(seconds) > 59) {
    throw new DateTimeRangeError(`Zone offset minutes/seconds not in valid range: ${minutes}, ${seconds}`)
  }
  const signs = [hours, minutes, seconds].filter((n) => n !== 0).map(Math.sign)
  if (signs.some((s) => s !== signs[0])) {
    throw new DateTimeRangeError(`Zone offset components must share a sign: ${hours}, ${minutes}, ${seconds}`)
  }
  return offsetOfTotalSeconds(hours * SECONDS_PER_HOUR + minutes * SECONDS_PER_MINUTE + seconds)
}

export const UTC_OFFSET: ZoneOffset = offsetOfTotalSeconds(0)

// ============================================================================
// Arithmetic
// ============================================================================

/** Offset shifted by an amount of savings. */
export function offsetPlus(offset: ZoneOffset, amount: TimeAmount): ZoneOffset {
  return offsetOfTotalSeconds(offset + amount)
}

export function compareOffsets(a: ZoneOffset, b: ZoneOffset): number {
  return Math.sign(a - b)
}

// ============================================================================
// Text
// ============================================================================

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

export function formatOffset(offset: ZoneOffset): string {
  if (offset === 0) return 'Z'
  const abs = Math.abs(offset)
  const h = Math.floor(abs / SECONDS_PER_HOUR)
  const m = Math.floor((abs % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE)
  const s = abs % SECONDS_PER_MINUTE
  const text = `${offset < 0 ? '-' : '+'}${pad2(h)}:${pad2(m)}`
  return s === 0 ? text : `${text}:${pad2(s)}`
}

const OFFSET_PATTERN = /^([+-])(\d{2})(?::?(\d{2})(?::(\d{2}))?)?$/

export function parseOffset(str: string): Result<ZoneOffset, ParseError> {
  if (str === 'Z') return Ok(UTC_OFFSET)
  const match = OFFSET_PATTERN.exec(str)
  if (!match) return Err(new ParseError(`Invalid zone offset: '${str}'`))

  const sign = match[1] === '-' ? -1 : 1
  const hours = parseInt(match[2] ?? '0', 10)
  const minutes = parseInt(match[3] ?? '0', 10)
  const seconds = parseInt(match[4] ?? '0', 10)
  if (hours > 18 || minutes > 59 || seconds > 59) {
    return Err(new ParseError(`Zone offset field out of range: '${str}'`))
  }
  const total = sign * (hours * SECONDS_PER_HOUR + minutes * SECONDS_PER_MINUTE + seconds)
  if (Math.abs(total) > MAX_OFFSET_SECONDS) {
    return Err(new ParseError(`Zone offset out of range: '${str}'`))
  }
  return Ok(offsetOfTotalSeconds(total))
}
