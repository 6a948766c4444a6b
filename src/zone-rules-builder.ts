/**
 * Zone Rules Builder
 *
 * Append-only accumulator of offset windows and their savings rules. Windows
 * are added in time order; rules and fixed savings always apply to the most
 * recently added window. `toRules` resolves everything once and freezes the
 * builder.
 *
 * State machine: empty -> accumulating (first window) -> finalized (toRules).
 */

import {
  type LocalDateTime,
  type LocalTime,
  MIN_YEAR,
  MAX_YEAR,
  MAX_DATE_TIME,
  MIDNIGHT,
  parseDateTime,
  parseTime,
  dateOf,
  timeOf,
  yearOf,
  monthOf,
  dayOf,
  compareDateTimes,
} from './time-date'
import { type ZoneOffset, MAX_OFFSET_SECONDS, offsetPlus } from './zone-offset'
import type { TimeAmount } from './time-amount'
import { TimeDefinition, isTimeDefinition } from './time-definition'
import {
  type DaySpec,
  assertDaySpec,
  dayOfMonth,
  formatDaySpec,
  resolveDayEpoch,
  resolvesEveryYear,
} from './day-rules'
import type { RuleInput } from './domain-types'
import { type ZoneRules, DEFAULT_CACHE_UNTIL_YEAR, createZoneRules } from './zone-rules'
import { resolveWindows } from './internal/resolver'
import type { InternalRule, InternalWindow } from './internal/types'
import { BuilderStateError, ValidationError } from './errors'

export { BuilderStateError, ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type ZoneRulesBuilderConfig = {
  /** Cap on concrete yearly rule occurrences in one window. Default 2000. */
  maxRulesPerWindow?: number
  /** Passed to the produced rule set. Default 2100. */
  cacheUntilYear?: number
}

export type BuilderState = 'empty' | 'accumulating' | 'finalized'

export type ZoneRulesBuilder = {
  readonly state: BuilderState
  addWindow(standardOffset: ZoneOffset, until: LocalDateTime, untilDefinition: TimeDefinition): ZoneRulesBuilder
  addWindowForever(standardOffset: ZoneOffset): ZoneRulesBuilder
  setFixedSavingsToWindow(savings: TimeAmount): ZoneRulesBuilder
  addRuleToWindow(rule: RuleInput): ZoneRulesBuilder
  addRuleToWindow(dateTime: LocalDateTime, timeDefinition: TimeDefinition, savings: TimeAmount): ZoneRulesBuilder
  toRules(id: string): ZoneRules
}

export const DEFAULT_MAX_RULES_PER_WINDOW = 2000

type NormalizedRule = {
  startYear: number
  endYear: number
  month: number
  day: DaySpec
  time: LocalTime
  timeEndOfDay: boolean
  timeDefinition: TimeDefinition
  savings: TimeAmount
}

// ============================================================================
// Validation
// ============================================================================

function requirePositiveInteger(value: number, name: string): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`)
  }
  return value
}

function requireOffset(offset: ZoneOffset): void {
  if (!Number.isInteger(offset) || Math.abs(offset) > MAX_OFFSET_SECONDS) {
    throw new ValidationError(`Invalid standard offset: ${String(offset)}`)
  }
}

function requireDateTime(dateTime: LocalDateTime, name: string): void {
  const parsed = typeof dateTime === 'string' ? parseDateTime(dateTime) : null
  if (parsed === null || !parsed.ok || parsed.value !== dateTime) {
    throw new ValidationError(`Invalid ${name}: ${String(dateTime)}`)
  }
}

function requireDefinition(definition: TimeDefinition): void {
  if (!isTimeDefinition(definition)) {
    throw new ValidationError(`Unknown time definition: ${String(definition)}`)
  }
}

function requireYear(year: number, name: string): void {
  if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new ValidationError(`${name} must be an integer in [${MIN_YEAR}, ${MAX_YEAR}], got ${year}`)
  }
}

function requireSavings(savings: TimeAmount): void {
  if (!Number.isSafeInteger(savings)) {
    throw new ValidationError(`Savings must be a whole number of seconds, got ${String(savings)}`)
  }
}

function normalizeRule(input: RuleInput): NormalizedRule {
  const years = 'year' in input
    ? { startYear: input.year, endYear: input.year }
    : { startYear: input.startYear, endYear: input.endYear }
  return {
    ...years,
    month: input.month,
    day: input.day,
    time: input.time,
    timeEndOfDay: input.timeEndOfDay ?? false,
    timeDefinition: input.timeDefinition,
    savings: input.savings,
  }
}

function validateRule(rule: NormalizedRule): void {
  requireYear(rule.startYear, 'Start year')
  requireYear(rule.endYear, 'End year')
  if (rule.startYear > rule.endYear) {
    throw new ValidationError(`Start year ${rule.startYear} must not be after end year ${rule.endYear}`)
  }
  if (!Number.isInteger(rule.month) || rule.month < 1 || rule.month > 12) {
    throw new ValidationError(`Month must be 1-12, got ${rule.month}`)
  }
  if (rule.day === null || typeof rule.day !== 'object') {
    throw new ValidationError('Day specification is required')
  }
  assertDaySpec(rule.day)
  const time = typeof rule.time === 'string' ? parseTime(rule.time) : null
  if (time === null || !time.ok || time.value !== rule.time) {
    throw new ValidationError(`Invalid rule time: ${String(rule.time)}`)
  }
  requireDefinition(rule.timeDefinition)
  requireSavings(rule.savings)
  if (rule.timeEndOfDay && rule.time !== MIDNIGHT) {
    throw new ValidationError('Time must be midnight when the end-of-day flag is set')
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createZoneRulesBuilder(config?: ZoneRulesBuilderConfig): ZoneRulesBuilder {
  const maxRulesPerWindow = requirePositiveInteger(
    config?.maxRulesPerWindow ?? DEFAULT_MAX_RULES_PER_WINDOW,
    'maxRulesPerWindow'
  )
  const cacheUntilYear = requirePositiveInteger(config?.cacheUntilYear ?? DEFAULT_CACHE_UNTIL_YEAR, 'cacheUntilYear')

  const windows: InternalWindow[] = []
  let currentWindow = -1
  let state: BuilderState = 'empty'

  function requireOpen(): void {
    if (state === 'finalized') {
      throw new BuilderStateError('Builder has already produced its rules and can no longer be changed')
    }
  }

  function requireWindow(action: string): InternalWindow {
    requireOpen()
    const window = windows[currentWindow]
    if (window === undefined) {
      throw new BuilderStateError(`Must add a window before ${action}`)
    }
    return window
  }

  function appendWindow(
    standardOffset: ZoneOffset,
    until: LocalDateTime,
    untilDefinition: TimeDefinition,
    forever: boolean
  ): void {
    const previous = windows[currentWindow]
    if (previous !== undefined) {
      if (previous.forever) {
        throw new BuilderStateError('Cannot add a window after the forever window')
      }
      if (compareDateTimes(until, previous.until) <= 0) {
        throw new BuilderStateError(
          `Windows must be added in date-time order: ${until} is not after ${previous.until}`
        )
      }
    }
    windows.push({
      standardOffset,
      until,
      untilDefinition,
      forever,
      fixedSavings: null,
      rules: [],
      foreverRules: [],
      nextOrder: 0,
    })
    currentWindow = windows.length - 1
    state = 'accumulating'
  }

  function addRule(window: InternalWindow, rule: NormalizedRule): void {
    validateRule(rule)
    // Surfaces out-of-range wall offsets now rather than at resolution
    offsetPlus(window.standardOffset, rule.savings)

    const order = window.nextOrder
    const fields = {
      month: rule.month,
      day: rule.day,
      time: rule.time,
      timeEndOfDay: rule.timeEndOfDay,
      timeDefinition: rule.timeDefinition,
      savings: rule.savings,
      order,
    }

    if (rule.endYear === MAX_YEAR) {
      if (!resolvesEveryYear(rule.day, rule.month)) {
        throw new ValidationError(
          `Day ${formatDaySpec(rule.day)} does not exist in month ${rule.month} of every year`
        )
      }
      window.foreverRules.push({ ...fields, startYear: rule.startYear })
      window.nextOrder++
      return
    }

    const count = rule.endYear - rule.startYear + 1
    if (window.rules.length + count > maxRulesPerWindow) {
      throw new ValidationError(`Window has reached the maximum number of allowed rules (${maxRulesPerWindow})`)
    }
    const occurrences: InternalRule[] = []
    for (let year = rule.startYear; year <= rule.endYear; year++) {
      if (resolveDayEpoch(rule.day, year, rule.month) === null) {
        throw new ValidationError(`Day ${formatDaySpec(rule.day)} does not exist in ${year}-${rule.month}`)
      }
      occurrences.push({ ...fields, year })
    }
    window.rules.push(...occurrences)
    window.nextOrder++
  }

  function addRuleToWindow(rule: RuleInput): ZoneRulesBuilder
  function addRuleToWindow(dateTime: LocalDateTime, timeDefinition: TimeDefinition, savings: TimeAmount): ZoneRulesBuilder
  function addRuleToWindow(
    ruleOrDateTime: RuleInput | LocalDateTime,
    timeDefinition?: TimeDefinition,
    savings?: TimeAmount
  ): ZoneRulesBuilder {
    const window = requireWindow('adding a rule')
    if (window.fixedSavings !== null) {
      throw new BuilderStateError('Window has fixed savings; cannot also add rules')
    }
    if (ruleOrDateTime === null || ruleOrDateTime === undefined) {
      throw new ValidationError('Rule is required')
    }

    if (typeof ruleOrDateTime === 'string') {
      requireDateTime(ruleOrDateTime, 'rule date-time')
      if (timeDefinition === undefined || savings === undefined) {
        throw new ValidationError('Time definition and savings are required')
      }
      const date = dateOf(ruleOrDateTime)
      addRule(window, {
        startYear: yearOf(date),
        endYear: yearOf(date),
        month: monthOf(date),
        day: dayOfMonth(dayOf(date)),
        time: timeOf(ruleOrDateTime),
        timeEndOfDay: false,
        timeDefinition,
        savings,
      })
    } else {
      addRule(window, normalizeRule(ruleOrDateTime))
    }
    return builder
  }

  const builder: ZoneRulesBuilder = {
    get state() {
      return state
    },

    addWindow(standardOffset, until, untilDefinition) {
      requireOpen()
      requireOffset(standardOffset)
      requireDateTime(until, 'window end')
      requireDefinition(untilDefinition)
      appendWindow(standardOffset, until, untilDefinition, false)
      return builder
    },

    addWindowForever(standardOffset) {
      requireOpen()
      requireOffset(standardOffset)
      appendWindow(standardOffset, MAX_DATE_TIME, TimeDefinition.WALL, true)
      return builder
    },

    setFixedSavingsToWindow(savings) {
      const window = requireWindow('setting the fixed savings')
      if (window.rules.length > 0 || window.foreverRules.length > 0) {
        throw new BuilderStateError('Window has rules; cannot also set fixed savings')
      }
      requireSavings(savings)
      offsetPlus(window.standardOffset, savings)
      window.fixedSavings = savings
      return builder
    },

    addRuleToWindow,

    toRules(id) {
      requireOpen()
      if (typeof id !== 'string' || id.length === 0) {
        throw new ValidationError('Zone id must be a non-empty string')
      }
      const last = windows[windows.length - 1]
      if (last === undefined) {
        throw new BuilderStateError('No windows have been added to the builder')
      }
      if (!last.forever) {
        throw new BuilderStateError('The last window must be the forever window')
      }
      if (windows.some((w) => w.foreverRules.length === 1)) {
        throw new BuilderStateError('Cannot have only one rule defined as being forever')
      }

      const timeline = resolveWindows(windows, maxRulesPerWindow)
      const rules = createZoneRules({ id, ...timeline, cacheUntilYear })
      state = 'finalized'
      return rules
    },
  }

  return builder
}
