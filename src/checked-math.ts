/**
 * Checked Integer Arithmetic
 *
 * Integer operations on plain numbers that refuse to leave the safe-integer
 * range. Epoch seconds across the full year range stay well inside it, so an
 * overflow here always means a caller passed a corrupt value.
 */

import { ArithmeticOverflowError } from './errors'

export { ArithmeticOverflowError } from './errors'

function requireInteger(value: number, op: string): void {
  if (!Number.isSafeInteger(value)) {
    throw new ArithmeticOverflowError(`${op}: operand ${value} is not a safe integer`)
  }
}

function checked(result: number, op: string, a: number, b: number): number {
  if (!Number.isSafeInteger(result)) {
    throw new ArithmeticOverflowError(`${op} overflow: ${a}, ${b}`)
  }
  // -0 would leak into formatted output
  return result === 0 ? 0 : result
}

export function addExact(a: number, b: number): number {
  requireInteger(a, 'addExact')
  requireInteger(b, 'addExact')
  return checked(a + b, 'addExact', a, b)
}

export function subtractExact(a: number, b: number): number {
  requireInteger(a, 'subtractExact')
  requireInteger(b, 'subtractExact')
  return checked(a - b, 'subtractExact', a, b)
}

export function multiplyExact(a: number, b: number): number {
  requireInteger(a, 'multiplyExact')
  requireInteger(b, 'multiplyExact')
  return checked(a * b, 'multiplyExact', a, b)
}

/** Division rounding toward negative infinity. */
export function floorDiv(a: number, b: number): number {
  requireInteger(a, 'floorDiv')
  requireInteger(b, 'floorDiv')
  if (b === 0) throw new ArithmeticOverflowError('floorDiv: division by zero')
  return checked(Math.floor(a / b), 'floorDiv', a, b)
}

/** Modulus with the sign of the divisor. */
export function floorMod(a: number, b: number): number {
  return checked(a - floorDiv(a, b) * b, 'floorMod', a, b)
}
