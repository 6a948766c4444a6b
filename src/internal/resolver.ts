/**
 * Window Resolver
 *
 * Walks the builder's windows in order and turns every rule occurrence into
 * absolute transitions, carrying the standard offset, the savings in effect
 * and the instant the current window started.
 *
 * Within a window, rules fire strictly in instant order. A rule's instant
 * depends on the savings in effect just before it, so after each emission
 * the nearby pending rules are re-evaluated against the new savings.
 */

import {
  MIN_YEAR,
  MAX_YEAR,
  MIN_DATE_TIME,
  SECONDS_PER_HOUR,
  dateOf,
  yearOf,
  fromEpochSecond,
  toEpochSecond,
  toLocalEpochSecond,
} from '../time-date'
import { type ZoneOffset, offsetPlus } from '../zone-offset'
import { type TimeAmount, ZERO_AMOUNT } from '../time-amount'
import { definitionToEpochSecond } from '../time-definition'
import { createTransition, formatTransition } from '../transition'
import { createTransitionRule, ruleLocalEpochSecond } from '../transition-rule'
import type {
  StandardOffsetChange, ZoneOffsetTransition, ZoneOffsetTransitionRule,
} from '../domain-types'
import type { InternalRule, InternalWindow, ResolvedTimeline } from './types'
import { BuilderStateError, ValidationError } from '../errors'

/**
 * Two rules whose nominal local times are further apart than this cannot
 * swap order once offsets (each within 18 hours) are applied.
 */
const LOOKAHEAD_SECONDS = 36 * SECONDS_PER_HOUR

// Fixed leap year used to order forever rules within a year.
const ORDERING_YEAR = 2000

type PendingRule = {
  rule: InternalRule
  /** Nominal local epoch second. */
  local: number
}

// ============================================================================
// Transition List
// ============================================================================

/**
 * Append-only transition list. A transition landing on the instant of the
 * previous one is merged into it; a merge that restores the earlier offset
 * removes both.
 */
function createTransitionList() {
  const transitions: ZoneOffsetTransition[] = []

  function emit(epochSecond: number, offsetBefore: ZoneOffset, offsetAfter: ZoneOffset): void {
    const last = transitions[transitions.length - 1]
    if (last !== undefined && epochSecond < last.epochSecond) {
      throw new ValidationError(
        `Transition at epoch second ${epochSecond} is out of order after ${formatTransition(last)}`
      )
    }
    if (last !== undefined && epochSecond === last.epochSecond) {
      transitions.pop()
      if (last.offsetBefore !== offsetAfter) {
        transitions.push(createTransition(epochSecond, last.offsetBefore, offsetAfter))
      }
      return
    }
    transitions.push(createTransition(epochSecond, offsetBefore, offsetAfter))
  }

  return { transitions, emit }
}

// ============================================================================
// Rule Expansion
// ============================================================================

function clampYear(year: number): number {
  return Math.min(MAX_YEAR, Math.max(MIN_YEAR, year))
}

function byLocalThenOrder(a: PendingRule, b: PendingRule): number {
  return a.local - b.local || a.rule.order - b.rule.order
}

/**
 * Concrete occurrences of every rule in the window, sorted by nominal local
 * time. Forever rules are expanded from the year before the window starts;
 * in the last window up to the year after the latest forever start year, in
 * other windows up to the year after the window ends. The expanded total
 * counts against the per-window rule cap.
 */
function expandWindowRules(
  window: InternalWindow,
  windowStartYear: number,
  isLast: boolean,
  maxRulesPerWindow: number
): PendingRule[] {
  const occurrences: InternalRule[] = [...window.rules]

  if (window.foreverRules.length > 0) {
    const latestStart = Math.max(...window.foreverRules.map((r) => r.startYear))
    const endYear = clampYear(
      isLast ? Math.max(latestStart, windowStartYear) + 1 : yearOf(dateOf(window.until)) + 1
    )
    const fromYear = (startYear: number) => clampYear(Math.max(startYear, windowStartYear - 1))
    const expanded = window.foreverRules.reduce(
      (total, r) => total + Math.max(0, endYear - fromYear(r.startYear) + 1),
      0
    )
    if (occurrences.length + expanded > maxRulesPerWindow) {
      throw new ValidationError(
        `Window has reached the maximum number of allowed rules (${maxRulesPerWindow}) after expanding forever rules`
      )
    }
    for (const forever of window.foreverRules) {
      const { startYear, ...fields } = forever
      for (let year = fromYear(startYear); year <= endYear; year++) {
        occurrences.push({ ...fields, year })
      }
    }
  }

  const pending: PendingRule[] = []
  for (const rule of occurrences) {
    const local = ruleLocalEpochSecond(rule, rule.year)
    if (local !== null) pending.push({ rule, local })
  }
  return pending.sort(byLocalThenOrder)
}

function windowEndEpochSecond(window: InternalWindow, standard: ZoneOffset, wall: ZoneOffset): number {
  if (window.forever) return Infinity
  return definitionToEpochSecond(window.untilDefinition, toLocalEpochSecond(window.until), standard, wall)
}

function ruleInstant(pending: PendingRule, standard: ZoneOffset, wall: ZoneOffset): number {
  return definitionToEpochSecond(pending.rule.timeDefinition, pending.local, standard, wall)
}

/**
 * Savings in effect when a window starts: that of the last rule firing at or
 * before the start, judged with the offsets carried in from the previous
 * window.
 */
function savingsAtWindowStart(
  pending: readonly PendingRule[],
  windowStart: number,
  standard: ZoneOffset,
  wall: ZoneOffset
): TimeAmount {
  let savings = ZERO_AMOUNT
  for (const p of pending) {
    if (ruleInstant(p, standard, wall) > windowStart) break
    savings = p.rule.savings
  }
  return savings
}

/** Index of the pending rule that fires first, among those close enough to the head to compete. */
function earliestPending(pending: readonly PendingRule[], standard: ZoneOffset, wall: ZoneOffset) {
  const head = pending[0]
  if (head === undefined) return null
  let index = 0
  let instant = ruleInstant(head, standard, wall)
  for (let i = 1; i < pending.length; i++) {
    const p = pending[i]
    if (p === undefined || p.local > head.local + LOOKAHEAD_SECONDS) break
    const candidate = ruleInstant(p, standard, wall)
    if (candidate < instant) {
      index = i
      instant = candidate
    }
  }
  return { index, instant }
}

// ============================================================================
// Transition Rules
// ============================================================================

function buildTransitionRules(
  window: InternalWindow,
  standard: ZoneOffset,
  savings: TimeAmount
): ZoneOffsetTransitionRule[] {
  const ordered = window.foreverRules
    .map((rule) => ({ rule, local: ruleLocalEpochSecond(rule, ORDERING_YEAR) ?? 0 }))
    .sort((a, b) => a.rule.month - b.rule.month || a.local - b.local || a.rule.order - b.rule.order)

  const result: ZoneOffsetTransitionRule[] = []
  let current = savings
  for (const { rule } of ordered) {
    const offsetBefore = offsetPlus(standard, current)
    const offsetAfter = offsetPlus(standard, rule.savings)
    if (offsetBefore !== offsetAfter) {
      result.push(createTransitionRule({
        month: rule.month,
        day: rule.day,
        time: rule.time,
        timeEndOfDay: rule.timeEndOfDay,
        timeDefinition: rule.timeDefinition,
        standardOffset: standard,
        offsetBefore,
        offsetAfter,
      }))
    }
    current = rule.savings
  }
  return result
}

// ============================================================================
// Resolution
// ============================================================================

export function resolveWindows(windows: readonly InternalWindow[], maxRulesPerWindow: number): ResolvedTimeline {
  const first = windows[0]
  if (first === undefined) throw new BuilderStateError('No windows have been added to the builder')

  let standard = first.standardOffset
  let savings: TimeAmount = first.fixedSavings ?? ZERO_AMOUNT
  let wall = offsetPlus(standard, savings)
  const initialStandardOffset = standard
  const initialWallOffset = wall

  const standardOffsetChanges: StandardOffsetChange[] = []
  const list = createTransitionList()
  let transitionRules: ZoneOffsetTransitionRule[] = []
  let windowStart = toEpochSecond(MIN_DATE_TIME, wall)

  windows.forEach((window, index) => {
    const isLast = index === windows.length - 1
    const windowStartYear = yearOf(dateOf(fromEpochSecond(windowStart, wall)))
    const pending = expandWindowRules(window, windowStartYear, isLast, maxRulesPerWindow)

    const startSavings = window.fixedSavings ?? savingsAtWindowStart(pending, windowStart, standard, wall)

    if (standard !== window.standardOffset) {
      standardOffsetChanges.push({ epochSecond: windowStart, offset: window.standardOffset })
      standard = window.standardOffset
    }

    const startWall = offsetPlus(standard, startSavings)
    if (startWall !== wall) list.emit(windowStart, wall, startWall)
    savings = startSavings
    wall = startWall

    // A rule re-evaluated after a nearby change can land before it; it fires at that change instead.
    let lastFired = windowStart
    for (;;) {
      const next = earliestPending(pending, standard, wall)
      if (next === null) break
      if (next.instant >= windowEndEpochSecond(window, standard, wall)) break

      const [chosen] = pending.splice(next.index, 1)
      if (chosen === undefined || next.instant < windowStart) continue

      const instant = Math.max(next.instant, lastFired)
      const after = offsetPlus(standard, chosen.rule.savings)
      if (after !== wall) list.emit(instant, wall, after)
      savings = chosen.rule.savings
      wall = after
      lastFired = instant
    }

    if (isLast) {
      transitionRules = buildTransitionRules(window, standard, savings)
      return
    }

    const windowEnd = windowEndEpochSecond(window, standard, wall)
    if (windowEnd < windowStart) {
      throw new ValidationError(`Window ending ${window.until} ${window.untilDefinition} ends before it starts`)
    }
    windowStart = windowEnd
  })

  return {
    initialStandardOffset,
    initialWallOffset,
    standardOffsetChanges,
    transitions: list.transitions,
    transitionRules,
  }
}
