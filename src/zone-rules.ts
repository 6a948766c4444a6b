/**
 * Zone Rules
 *
 * The immutable, resolved rule set of one time zone: historic transitions in
 * instant order, the standard offset timeline, and the transition rules that
 * keep producing transitions after the last historic one.
 *
 * Local date-times are classified by round trip: an offset is valid for a
 * local date-time when the offset in effect at the implied instant is that
 * same offset. No valid offset means a gap, more than one an overlap.
 */

import {
  type LocalDateTime,
  MIN_YEAR,
  MAX_YEAR,
  SECONDS_PER_DAY,
  toLocalEpochSecond,
  yearOfEpochDay,
} from './time-date'
import { type ZoneOffset, MAX_OFFSET_SECONDS, formatOffset } from './zone-offset'
import { type TimeAmount, amountOfSeconds } from './time-amount'
import { isGap, isOverlap, transitionEquals, compareTransitions } from './transition'
import { createTransitionForYear, transitionRuleEquals } from './transition-rule'
import type {
  OffsetQueryResult,
  StandardOffsetChange,
  ZoneOffsetTransition,
  ZoneOffsetTransitionRule,
} from './domain-types'
import { singleOffset, discontinuity } from './offset-query'
import { upperBound, lowerBound, distinctOffsets } from './internal/helpers'
import { ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type ZoneRulesConfig = {
  id: string
  initialStandardOffset: ZoneOffset
  initialWallOffset: ZoneOffset
  standardOffsetChanges?: readonly StandardOffsetChange[]
  transitions?: readonly ZoneOffsetTransition[]
  transitionRules?: readonly ZoneOffsetTransitionRule[]
  /** Rule-generated transitions are memoised for years before this. Default 2100. */
  cacheUntilYear?: number
}

export type ZoneRules = {
  readonly id: string
  readonly transitions: readonly ZoneOffsetTransition[]
  readonly transitionRules: readonly ZoneOffsetTransitionRule[]
  readonly standardOffsetChanges: readonly StandardOffsetChange[]
  isFixedOffset(): boolean
  offsetAtStartOfTime(): ZoneOffset
  offsetAtEndOfTime(): ZoneOffset
  resolve(dateTime: LocalDateTime): OffsetQueryResult
  validOffsets(dateTime: LocalDateTime): ZoneOffset[]
  isValidOffset(dateTime: LocalDateTime, offset: ZoneOffset): boolean
  offsetAt(epochSecond: number): ZoneOffset
  standardOffsetAt(epochSecond: number): ZoneOffset
  daylightSavingsAt(epochSecond: number): TimeAmount
  isDaylightSavings(epochSecond: number): boolean
  nextTransition(epochSecond: number): ZoneOffsetTransition | null
  previousTransition(epochSecond: number): ZoneOffsetTransition | null
  transitionsBetween(fromEpochSecond: number, toEpochSecond: number): ZoneOffsetTransition[]
  equals(other: ZoneRules): boolean
  toString(): string
}

export const DEFAULT_CACHE_UNTIL_YEAR = 2100

// ============================================================================
// Validation
// ============================================================================

function assertChained(
  transitions: readonly ZoneOffsetTransition[],
  initialWallOffset: ZoneOffset
): void {
  let previous: ZoneOffsetTransition | undefined
  for (const t of transitions) {
    const expectedBefore = previous?.offsetAfter ?? initialWallOffset
    if (t.offsetBefore !== expectedBefore) {
      throw new ValidationError(
        `Transition at ${t.epochSecond} starts from ${formatOffset(t.offsetBefore)}, expected ${formatOffset(expectedBefore)}`
      )
    }
    if (previous !== undefined && t.epochSecond <= previous.epochSecond) {
      throw new ValidationError(`Transitions must be strictly increasing, got ${t.epochSecond} after ${previous.epochSecond}`)
    }
    previous = t
  }
}

function assertAscending(changes: readonly StandardOffsetChange[]): void {
  for (let i = 1; i < changes.length; i++) {
    const prev = changes[i - 1]
    const curr = changes[i]
    if (prev !== undefined && curr !== undefined && curr.epochSecond <= prev.epochSecond) {
      throw new ValidationError('Standard offset changes must be strictly increasing')
    }
  }
}

function listsEqual<T>(a: readonly T[], b: readonly T[], eq: (x: T, y: T) => boolean): boolean {
  return a.length === b.length && a.every((x, i) => {
    const y = b[i]
    return y !== undefined && eq(x, y)
  })
}

// ============================================================================
// Factory
// ============================================================================

export function createZoneRules(config: ZoneRulesConfig): ZoneRules {
  const id = config.id
  const initialStandardOffset = config.initialStandardOffset
  const initialWallOffset = config.initialWallOffset
  const standardOffsetChanges = Object.freeze([...(config.standardOffsetChanges ?? [])])
  const transitions = Object.freeze([...(config.transitions ?? [])])
  const transitionRules = Object.freeze(
    (config.transitionRules ?? []).filter((r) => r.offsetBefore !== r.offsetAfter)
  )
  const cacheUntilYear = config.cacheUntilYear ?? DEFAULT_CACHE_UNTIL_YEAR

  assertChained(transitions, initialWallOffset)
  assertAscending(standardOffsetChanges)

  const transitionEpochs = transitions.map((t) => t.epochSecond)
  const standardEpochs = standardOffsetChanges.map((c) => c.epochSecond)
  const lastTransition = transitions[transitions.length - 1]
  const historicEnd = lastTransition?.epochSecond ?? -Infinity
  const lastWallOffset = lastTransition?.offsetAfter ?? initialWallOffset
  const lastStandardOffset =
    standardOffsetChanges[standardOffsetChanges.length - 1]?.offset ?? initialStandardOffset

  const yearCache = new Map<number, ZoneOffsetTransition[]>()

  // ==========================================================================
  // Rule-generated transitions
  // ==========================================================================

  function ruleTransitionsForYear(year: number): ZoneOffsetTransition[] {
    if (year < MIN_YEAR || year > MAX_YEAR) return []
    const cached = yearCache.get(year)
    if (cached !== undefined) return cached

    const result: ZoneOffsetTransition[] = []
    for (const rule of transitionRules) {
      const t = createTransitionForYear(rule, year)
      if (t !== null) result.push(t)
    }
    result.sort(compareTransitions)
    if (year < cacheUntilYear) yearCache.set(year, result)
    return result
  }

  /** Year of an instant on the local time-line after the last historic transition. */
  function yearAt(epochSecond: number): number {
    return yearOfEpochDay(Math.floor((epochSecond + lastWallOffset) / SECONDS_PER_DAY))
  }

  function usesRules(epochSecond: number): boolean {
    return transitionRules.length > 0 && epochSecond > historicEnd
  }

  // ==========================================================================
  // Instant queries
  // ==========================================================================

  function offsetAt(epochSecond: number): ZoneOffset {
    if (usesRules(epochSecond)) {
      const yearTransitions = ruleTransitionsForYear(yearAt(epochSecond))
      for (const t of yearTransitions) {
        if (epochSecond < t.epochSecond) return t.offsetBefore
      }
      return yearTransitions[yearTransitions.length - 1]?.offsetAfter ?? lastWallOffset
    }
    const index = upperBound(transitionEpochs, epochSecond)
    return transitions[index - 1]?.offsetAfter ?? initialWallOffset
  }

  function standardOffsetAt(epochSecond: number): ZoneOffset {
    const index = upperBound(standardEpochs, epochSecond)
    return standardOffsetChanges[index - 1]?.offset ?? initialStandardOffset
  }

  function nextTransition(epochSecond: number): ZoneOffsetTransition | null {
    if (epochSecond < historicEnd) {
      return transitions[upperBound(transitionEpochs, epochSecond)] ?? null
    }
    if (transitionRules.length === 0) return null
    const year = yearAt(epochSecond)
    for (const y of [year, year + 1]) {
      const found = ruleTransitionsForYear(y).find((t) => t.epochSecond > epochSecond)
      if (found !== undefined) return found
    }
    return null
  }

  function previousTransition(epochSecond: number): ZoneOffsetTransition | null {
    if (usesRules(epochSecond)) {
      const year = yearAt(epochSecond)
      for (const y of [year, year - 1]) {
        const yearTransitions = ruleTransitionsForYear(y)
        for (let i = yearTransitions.length - 1; i >= 0; i--) {
          const t = yearTransitions[i]
          if (t !== undefined && t.epochSecond < epochSecond && t.epochSecond > historicEnd) return t
        }
      }
    }
    return transitions[lowerBound(transitionEpochs, epochSecond) - 1] ?? null
  }

  function transitionsBetween(fromEpochSecond: number, toEpochSecond: number): ZoneOffsetTransition[] {
    const result: ZoneOffsetTransition[] = []
    let t = nextTransition(fromEpochSecond - 1)
    while (t !== null && t.epochSecond < toEpochSecond) {
      result.push(t)
      t = nextTransition(t.epochSecond)
    }
    return result
  }

  // ==========================================================================
  // Local date-time queries
  // ==========================================================================

  function classify(dateTime: LocalDateTime) {
    const local = toLocalEpochSecond(dateTime)
    const from = local - MAX_OFFSET_SECONDS
    const to = local + MAX_OFFSET_SECONDS

    const nearby = transitionsBetween(from + 1, to + 1)
    const candidates = [offsetAt(from), ...nearby.map((t) => t.offsetAfter)]
    // Descending, so an overlap lists the earlier (larger) offset first
    const valid = distinctOffsets(candidates.filter((o) => offsetAt(local - o) === o)).sort((a, b) => b - a)
    return { local, nearby, valid }
  }

  function resolve(dateTime: LocalDateTime): OffsetQueryResult {
    const { local, nearby, valid } = classify(dateTime)
    const single = valid[0]
    if (valid.length === 1 && single !== undefined) return singleOffset(single)

    const kind = valid.length === 0 ? 'gap' : 'overlap'
    const transition = [...nearby].reverse().find((t) => {
      if (kind === 'gap') {
        return isGap(t) && local >= t.epochSecond + t.offsetBefore && local < t.epochSecond + t.offsetAfter
      }
      return isOverlap(t) && local >= t.epochSecond + t.offsetAfter && local < t.epochSecond + t.offsetBefore
    })
    if (transition === undefined) {
      throw new ValidationError(`No transition explains the ${kind} at ${dateTime}`)
    }
    return discontinuity(transition)
  }

  function validOffsets(dateTime: LocalDateTime): ZoneOffset[] {
    return classify(dateTime).valid
  }

  // ==========================================================================
  // Public object
  // ==========================================================================

  const rules: ZoneRules = {
    id,
    transitions,
    transitionRules,
    standardOffsetChanges,

    isFixedOffset: () => transitions.length === 0 && transitionRules.length === 0,
    offsetAtStartOfTime: () => initialWallOffset,
    offsetAtEndOfTime: () => transitionRules[transitionRules.length - 1]?.offsetAfter ?? lastWallOffset,

    resolve,
    validOffsets,
    isValidOffset: (dateTime, offset) => validOffsets(dateTime).includes(offset),

    offsetAt,
    standardOffsetAt,
    daylightSavingsAt: (epochSecond) => amountOfSeconds(offsetAt(epochSecond) - standardOffsetAt(epochSecond)),
    isDaylightSavings: (epochSecond) => offsetAt(epochSecond) !== standardOffsetAt(epochSecond),

    nextTransition,
    previousTransition,
    transitionsBetween,

    equals(other) {
      return (
        other.offsetAtStartOfTime() === initialWallOffset &&
        other.standardOffsetAt(-Infinity) === initialStandardOffset &&
        listsEqual(transitions, other.transitions, transitionEquals) &&
        listsEqual(transitionRules, other.transitionRules, transitionRuleEquals) &&
        listsEqual(standardOffsetChanges, other.standardOffsetChanges,
          (a, b) => a.epochSecond === b.epochSecond && a.offset === b.offset)
      )
    },

    toString: () => `ZoneRules[${id}, currentStandardOffset=${formatOffset(lastStandardOffset)}]`,
  }

  return Object.freeze(rules)
}

/** Rules for a zone that never changes its offset. */
export function fixedZoneRules(offset: ZoneOffset, id: string = formatOffset(offset)): ZoneRules {
  return createZoneRules({ id, initialStandardOffset: offset, initialWallOffset: offset })
}
