/**
 * Time Amounts
 *
 * Signed whole-second amounts of time, used for daylight savings.
 */

import { addExact, multiplyExact } from './checked-math'
import { SECONDS_PER_HOUR, SECONDS_PER_MINUTE } from './time-date'
import { ValidationError } from './errors'

declare const __timeAmount: unique symbol

/** Signed amount of time in whole seconds. */
export type TimeAmount = number & { readonly [__timeAmount]: true }

export function amountOfSeconds(seconds: number): TimeAmount {
  if (!Number.isSafeInteger(seconds)) {
    throw new ValidationError(`Time amount must be a whole number of seconds, got ${seconds}`)
  }
  return (seconds === 0 ? 0 : seconds) as TimeAmount
}

export function amountOfMinutes(minutes: number): TimeAmount {
  return amountOfSeconds(multiplyExact(minutes, SECONDS_PER_MINUTE))
}

export function amountOfHours(hours: number): TimeAmount {
  return amountOfSeconds(multiplyExact(hours, SECONDS_PER_HOUR))
}

export function amountOf(parts: { hours?: number; minutes?: number; seconds?: number }): TimeAmount {
  const h = multiplyExact(parts.hours ?? 0, SECONDS_PER_HOUR)
  const m = multiplyExact(parts.minutes ?? 0, SECONDS_PER_MINUTE)
  return amountOfSeconds(addExact(addExact(h, m), parts.seconds ?? 0))
}

export const ZERO_AMOUNT: TimeAmount = amountOfSeconds(0)

export function plusAmounts(a: TimeAmount, b: TimeAmount): TimeAmount {
  return amountOfSeconds(addExact(a, b))
}

export function negateAmount(a: TimeAmount): TimeAmount {
  return amountOfSeconds(multiplyExact(a, -1))
}

/** ISO 8601 duration text: PT1H30M, -PT20M, PT0S. */
export function formatAmount(amount: TimeAmount): string {
  if (amount === 0) return 'PT0S'
  const abs = Math.abs(amount)
  const h = Math.floor(abs / SECONDS_PER_HOUR)
  const m = Math.floor((abs % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE)
  const s = abs % SECONDS_PER_MINUTE
  let text = amount < 0 ? '-PT' : 'PT'
  if (h > 0) text += `${h}H`
  if (m > 0) text += `${m}M`
  if (s > 0) text += `${s}S`
  return text
}
