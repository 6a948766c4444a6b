/**
 * Core Branded Types
 *
 * Re-exports all branded primitive types from their source modules
 * into a single barrel for convenient importing.
 */

export type { LocalDate, LocalTime, LocalDateTime, Weekday } from './time-date'
export type { ZoneOffset } from './zone-offset'
export type { TimeAmount } from './time-amount'
