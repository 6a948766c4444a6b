/**
 * Segment 06: Window Resolver Tests
 *
 * Builds rule sets from windows and savings rules and checks the resolved
 * transitions, the transition rules left for the forever window, and how
 * local date-times around each change classify.
 */

import { describe, it, expect } from 'vitest'
import type { LocalTime } from '../src/time-date'
import { createZoneRulesBuilder } from '../src/zone-rules-builder'
import { createTransition } from '../src/transition'
import { dayOfMonth, lastWeekdayOfMonth, weekdayOnOrAfter } from '../src/day-rules'
import { ValidationError } from '../src/errors'
import {
  UTC,
  STANDARD,
  WALL,
  FOREVER,
  LAST_SUNDAY,
  dt,
  utc,
  at,
  offset,
  savings,
  rule,
  europeanStyleRules,
  expectSingle,
  expectGap,
  expectOverlap,
} from './helpers/zone-fixtures'

const PLUS_1 = offset(1)
const PLUS_2 = offset(2)
const PLUS_3 = offset(3)
const ZERO = offset(0)

describe('Segment 06: Window Resolver', () => {
  // ========================================================================
  // Single forever window
  // ========================================================================

  describe('forever window with a recurring savings pair', () => {
    const rules = europeanStyleRules()

    it('expands the forever rules into historic transitions up to the year after they start', () => {
      expect(rules.transitions).toEqual([
        createTransition(utc(2000, 3, 26), PLUS_1, PLUS_2),
        createTransition(utc(2000, 10, 28, 23), PLUS_2, PLUS_1),
        createTransition(utc(2001, 3, 25), PLUS_1, PLUS_2),
        createTransition(utc(2001, 10, 27, 23), PLUS_2, PLUS_1),
      ])
    })

    it('keeps both forever rules as transition rules, chained from the final savings', () => {
      const [spring, autumn] = rules.transitionRules
      expect(rules.transitionRules).toHaveLength(2)
      expect(spring).toMatchObject({ month: 3, offsetBefore: PLUS_1, offsetAfter: PLUS_2, standardOffset: PLUS_1 })
      expect(autumn).toMatchObject({ month: 10, offsetBefore: PLUS_2, offsetAfter: PLUS_1, standardOffset: PLUS_1 })
    })

    it('classifies the first year around both changes', () => {
      expect(expectGap(rules, dt(2000, 3, 26, 1, 30), PLUS_1, PLUS_2).epochSecond).toBe(utc(2000, 3, 26))
      expect(expectOverlap(rules, dt(2000, 10, 29, 0, 30), PLUS_2, PLUS_1).epochSecond).toBe(utc(2000, 10, 28, 23))
      expectSingle(rules, dt(2000, 10, 29, 1, 30), PLUS_1)
      expectSingle(rules, dt(2000, 6, 1), PLUS_2)
      expectSingle(rules, dt(2000, 1, 1), PLUS_1)
    })

    it('classifies years served by the transition rules', () => {
      expect(expectGap(rules, dt(2010, 3, 28, 1, 30), PLUS_1, PLUS_2).epochSecond).toBe(utc(2010, 3, 28))
      expect(expectOverlap(rules, dt(2010, 10, 31, 0, 30), PLUS_2, PLUS_1).epochSecond).toBe(utc(2010, 10, 30, 23))
      expectSingle(rules, dt(2010, 7, 1), PLUS_2)
    })

    it('does not depend on the order the rules were declared in', () => {
      const reversed = createZoneRulesBuilder()
        .addWindowForever(PLUS_1)
        .addRuleToWindow(rule([2000, FOREVER], 10, LAST_SUNDAY, at(1), WALL, savings(0)))
        .addRuleToWindow(rule([2000, FOREVER], 3, LAST_SUNDAY, at(1), WALL, savings(1)))
        .toRules('Test/Europe')
      expect(reversed.equals(rules)).toBe(true)
    })
  })

  // ========================================================================
  // Window boundaries
  // ========================================================================

  describe('window boundaries', () => {
    it('turns a change of standard offset into a transition and a standard offset change', () => {
      const rules = createZoneRulesBuilder()
        .addWindow(PLUS_1, dt(1950, 1, 1, 1), STANDARD)
        .addWindowForever(PLUS_2)
        .toRules('Test/Cutover')

      expect(rules.transitions).toEqual([createTransition(utc(1950, 1, 1), PLUS_1, PLUS_2)])
      expect(rules.standardOffsetChanges).toEqual([{ epochSecond: utc(1950, 1, 1), offset: PLUS_2 }])
      expectSingle(rules, dt(1950, 1, 1, 0, 59), PLUS_1)
      expectGap(rules, dt(1950, 1, 1, 1, 30), PLUS_1, PLUS_2)
      expectSingle(rules, dt(1950, 1, 1, 2), PLUS_2)
    })

    it('starts each window from where the previous one ended', () => {
      const rules = createZoneRulesBuilder()
        .addWindow(offset(1, 15), dt(1920, 1, 1, 1), WALL)
        .addWindow(PLUS_1, dt(1950, 1, 1, 1), WALL)
        .addWindowForever(PLUS_1)
        .addRuleToWindow(rule([2000, FOREVER], 3, LAST_SUNDAY, at(1), WALL, savings(1, 30)))
        .addRuleToWindow(rule([2000, FOREVER], 10, LAST_SUNDAY, at(1), WALL, savings(0)))
        .toRules('Test/LocalMean')

      expect(rules.transitions).toEqual([
        createTransition(utc(1919, 12, 31, 23, 45), offset(1, 15), PLUS_1),
        createTransition(utc(2000, 3, 26), PLUS_1, offset(2, 30)),
        createTransition(utc(2000, 10, 28, 22, 30), offset(2, 30), PLUS_1),
        createTransition(utc(2001, 3, 25), PLUS_1, offset(2, 30)),
        createTransition(utc(2001, 10, 27, 22, 30), offset(2, 30), PLUS_1),
      ])
      expectSingle(rules, dt(1800, 7, 1, 1), offset(1, 15))
      expectOverlap(rules, dt(1920, 1, 1, 0, 55), offset(1, 15), PLUS_1)
      expectSingle(rules, dt(1920, 1, 1, 1), PLUS_1)
      expectSingle(rules, dt(2008, 1, 1), PLUS_1)
      expectSingle(rules, dt(2008, 7, 1), offset(2, 30))
      expectGap(rules, dt(2008, 3, 30, 1, 20), PLUS_1, offset(2, 30))
      expectOverlap(rules, dt(2008, 10, 26, 0, 20), offset(2, 30), PLUS_1)
    })

    it('applies savings already in effect when a window starts part way through summer', () => {
      const rules = createZoneRulesBuilder()
        .addWindow(PLUS_1, dt(2000, 7, 1, 1), WALL)
        .addWindowForever(PLUS_1)
        .addRuleToWindow(rule([2000, FOREVER], 3, LAST_SUNDAY, at(1), WALL, savings(1)))
        .addRuleToWindow(rule([2000, FOREVER], 10, LAST_SUNDAY, at(2), WALL, savings(0)))
        .toRules('Test/MidSummer')

      expect(rules.transitions[0]).toEqual(createTransition(utc(2000, 7, 1), PLUS_1, PLUS_2))
      expect(rules.transitions[1]).toEqual(createTransition(utc(2000, 10, 29), PLUS_2, PLUS_1))
      expectSingle(rules, dt(2000, 1, 1), PLUS_1)
      expectSingle(rules, dt(2000, 7, 1), PLUS_1)
      expectGap(rules, dt(2000, 7, 1, 1, 20), PLUS_1, PLUS_2)
      expectSingle(rules, dt(2000, 7, 1, 3), PLUS_2)
      expectOverlap(rules, dt(2000, 10, 29, 1, 20), PLUS_2, PLUS_1)
      expectSingle(rules, dt(2000, 12, 1), PLUS_1)
    })

    it('truncates forever rules at the end of a window that is not the last', () => {
      const rules = createZoneRulesBuilder()
        .addWindow(PLUS_1, dt(2000, 7, 1, 1), WALL)
        .addWindow(PLUS_1, dt(2000, 8, 1, 2), WALL)
        .addRuleToWindow(rule([2000, FOREVER], 3, LAST_SUNDAY, at(1), WALL, savings(1)))
        .addRuleToWindow(rule([2000, FOREVER], 10, LAST_SUNDAY, at(2), WALL, savings(0)))
        .addWindowForever(PLUS_1)
        .toRules('Test/ShortSummer')

      expect(rules.transitions).toEqual([
        createTransition(utc(2000, 7, 1), PLUS_1, PLUS_2),
        createTransition(utc(2000, 8, 1), PLUS_2, PLUS_1),
      ])
      expect(rules.transitionRules).toEqual([])
      expectGap(rules, dt(2000, 7, 1, 1, 20), PLUS_1, PLUS_2)
      expectOverlap(rules, dt(2000, 8, 1, 1, 20), PLUS_2, PLUS_1)
      expectSingle(rules, dt(2000, 12, 1), PLUS_1)
    })

    it('ends in savings when the final rule of the year adds savings', () => {
      const rules = createZoneRulesBuilder()
        .addWindow(offset(1, 15), dt(1920, 1, 1, 1), WALL)
        .addWindowForever(PLUS_1)
        .addRuleToWindow(rule([2000, FOREVER], 3, LAST_SUNDAY, at(1), WALL, savings(0)))
        .addRuleToWindow(rule([2000, FOREVER], 10, LAST_SUNDAY, at(1), WALL, savings(1)))
        .toRules('Test/Inverted')

      expect(rules.transitions).toEqual([
        createTransition(utc(1919, 12, 31, 23, 45), offset(1, 15), PLUS_1),
        createTransition(utc(2000, 10, 29), PLUS_1, PLUS_2),
        createTransition(utc(2001, 3, 24, 23), PLUS_2, PLUS_1),
        createTransition(utc(2001, 10, 28), PLUS_1, PLUS_2),
      ])
      expect(rules.transitionRules.map((r) => [r.month, r.offsetBefore, r.offsetAfter])).toEqual([
        [3, PLUS_2, PLUS_1],
        [10, PLUS_1, PLUS_2],
      ])
      expect(rules.offsetAtEndOfTime()).toBe(PLUS_2)
      expectSingle(rules, dt(2000, 3, 26, 0, 59), PLUS_1)
      expectSingle(rules, dt(2000, 3, 26, 1), PLUS_1)
      expectGap(rules, dt(2000, 10, 29, 1, 20), PLUS_1, PLUS_2)
      expectOverlap(rules, dt(2001, 3, 25, 0, 20), PLUS_2, PLUS_1)
      expectGap(rules, dt(2001, 10, 28, 1, 20), PLUS_1, PLUS_2)
    })

    it('jumps to fixed savings at the start of a window', () => {
      const rules = createZoneRulesBuilder()
        .addWindow(PLUS_1, dt(1800, 7, 1), WALL)
        .addWindowForever(PLUS_1)
        .setFixedSavingsToWindow(savings(1, 30))
        .toRules('Test/Fixed')

      expect(rules.offsetAtStartOfTime()).toBe(PLUS_1)
      expect(rules.offsetAtEndOfTime()).toBe(offset(2, 30))
      expectGap(rules, dt(1800, 7, 1), PLUS_1, offset(2, 30))
      expectSingle(rules, dt(2008, 1, 1), offset(2, 30))
    })

    it('uses fixed savings on the first window as the initial offset', () => {
      const rules = createZoneRulesBuilder()
        .addWindowForever(PLUS_1)
        .setFixedSavingsToWindow(savings(1, 30))
        .toRules('Test/Fixed')
      expect(rules.offsetAtStartOfTime()).toBe(offset(2, 30))
      expect(rules.transitions).toEqual([])
    })

    it('rejects a window that resolves to end before it starts', () => {
      const builder = createZoneRulesBuilder()
        .addWindow(PLUS_1, dt(2000, 1, 1), WALL)
        .addWindow(offset(14), dt(2000, 1, 1, 1), STANDARD)
        .addWindowForever(PLUS_1)
      expect(() => builder.toRules('Test/Backwards')).toThrow(ValidationError)
      expect(builder.state).toBe('accumulating')
    })
  })

  // ========================================================================
  // Rule ordering within a window
  // ========================================================================

  describe('rule ordering', () => {
    function sameDay(secondTime: LocalTime) {
      return createZoneRulesBuilder()
        .addWindow(PLUS_1, dt(1920, 1, 1, 1), WALL)
        .addWindowForever(PLUS_1)
        .addRuleToWindow(rule(2000, 3, dayOfMonth(20), at(2), WALL, savings(1)))
        .addRuleToWindow(rule(2000, 3, dayOfMonth(20), secondTime, WALL, savings(0)))
        .toRules('Test/SameDay')
    }

    it('resolves the second rule of a day against the savings of the first', () => {
      const rules = sameDay(at(4, 2))
      expect(rules.transitions).toEqual([
        createTransition(utc(2000, 3, 20, 1), PLUS_1, PLUS_2),
        createTransition(utc(2000, 3, 20, 2, 2), PLUS_2, PLUS_1),
      ])
      expectSingle(rules, dt(2000, 3, 20, 1, 59), PLUS_1)
      expectGap(rules, dt(2000, 3, 20, 2), PLUS_1, PLUS_2)
      expectGap(rules, dt(2000, 3, 20, 2, 59), PLUS_1, PLUS_2)
      expectSingle(rules, dt(2000, 3, 20, 3), PLUS_2)
      expectSingle(rules, dt(2000, 3, 20, 3, 1), PLUS_2)
      expectOverlap(rules, dt(2000, 3, 20, 3, 2), PLUS_2, PLUS_1)
      expectOverlap(rules, dt(2000, 3, 20, 4, 1), PLUS_2, PLUS_1)
      expectSingle(rules, dt(2000, 3, 20, 4, 2), PLUS_1)
    })

    it('lets a gap and an overlap meet with no single-offset time between them', () => {
      const rules = sameDay(at(4))
      expectGap(rules, dt(2000, 3, 20, 2, 59), PLUS_1, PLUS_2)
      const transition = expectOverlap(rules, dt(2000, 3, 20, 3), PLUS_2, PLUS_1)
      expect(transition.epochSecond).toBe(utc(2000, 3, 20, 2))
      expectOverlap(rules, dt(2000, 3, 20, 3, 59), PLUS_2, PLUS_1)
      expectSingle(rules, dt(2000, 3, 20, 4), PLUS_1)
    })

    it('classifies partly conflicting changes by round trip', () => {
      const rules = sameDay(at(3, 30))
      expect(rules.transitions).toEqual([
        createTransition(utc(2000, 3, 20, 1), PLUS_1, PLUS_2),
        createTransition(utc(2000, 3, 20, 1, 30), PLUS_2, PLUS_1),
      ])
      expectGap(rules, dt(2000, 3, 20, 2), PLUS_1, PLUS_2)
      expectGap(rules, dt(2000, 3, 20, 2, 29), PLUS_1, PLUS_2)
      expectSingle(rules, dt(2000, 3, 20, 2, 30), PLUS_1)
      expectSingle(rules, dt(2000, 3, 20, 2, 59), PLUS_1)
      const transition = expectOverlap(rules, dt(2000, 3, 20, 3), PLUS_2, PLUS_1)
      expect(transition.epochSecond).toBe(utc(2000, 3, 20, 1, 30))
      expectOverlap(rules, dt(2000, 3, 20, 3, 29), PLUS_2, PLUS_1)
      expectSingle(rules, dt(2000, 3, 20, 3, 30), PLUS_1)
    })

    it('fires rules in instant order even when declared out of order', () => {
      const rules = createZoneRulesBuilder()
        .addWindowForever(PLUS_2)
        .addRuleToWindow(rule(2010, 8, dayOfMonth(11), at(0), STANDARD, savings(0)))
        .addRuleToWindow(rule(2010, 9, dayOfMonth(10), at(0), STANDARD, savings(1)))
        .addRuleToWindow(rule(2010, 9, lastWeekdayOfMonth('thu'), at(23), STANDARD, savings(0)))
        .toRules('Test/TwoChangesSameMonth')

      expect(rules.transitions).toEqual([
        createTransition(utc(2010, 9, 9, 22), PLUS_2, PLUS_3),
        createTransition(utc(2010, 9, 30, 21), PLUS_3, PLUS_2),
      ])
      expectGap(rules, dt(2010, 9, 10), PLUS_2, PLUS_3)
      expectSingle(rules, dt(2010, 9, 20), PLUS_3)
      expectOverlap(rules, dt(2010, 9, 30, 23), PLUS_3, PLUS_2)
    })

    it('merges rules firing at the same instant into one transition', () => {
      const rules = createZoneRulesBuilder()
        .addWindowForever(PLUS_1)
        .addRuleToWindow(rule(2000, 3, dayOfMonth(1), at(0), UTC, savings(1)))
        .addRuleToWindow(rule(2000, 3, dayOfMonth(1), at(0), UTC, savings(2)))
        .toRules('Test/Merged')
      expect(rules.transitions).toEqual([createTransition(utc(2000, 3, 1), PLUS_1, PLUS_3)])
      expectGap(rules, dt(2000, 3, 1, 2, 30), PLUS_1, PLUS_3)
    })

    it('drops both transitions when a same-instant merge restores the earlier offset', () => {
      const rules = createZoneRulesBuilder()
        .addWindowForever(PLUS_1)
        .addRuleToWindow(rule(2000, 3, dayOfMonth(1), at(0), UTC, savings(1)))
        .addRuleToWindow(rule(2000, 3, dayOfMonth(1), at(0), UTC, savings(0)))
        .toRules('Test/Cancelled')
      expect(rules.transitions).toEqual([])
      expect(rules.isFixedOffset()).toBe(true)
    })

    it('fires a rule pushed before the previous change at that change instead', () => {
      const rules = createZoneRulesBuilder()
        .addWindowForever(PLUS_1)
        .addRuleToWindow(rule(2000, 1, dayOfMonth(1), at(0), UTC, savings(-1)))
        .addRuleToWindow(rule(2000, 6, dayOfMonth(1), at(1), WALL, savings(1)))
        .addRuleToWindow(rule(2000, 6, dayOfMonth(1), at(1, 30), STANDARD, savings(0)))
        .toRules('Test/Pushed')

      expect(rules.transitions).toEqual([
        createTransition(utc(2000, 1, 1), PLUS_1, ZERO),
        createTransition(utc(2000, 6, 1, 0, 30), ZERO, PLUS_2),
      ])
      expectGap(rules, dt(2000, 6, 1, 1), ZERO, PLUS_2)
      expectSingle(rules, dt(2000, 6, 1, 2, 30), PLUS_2)
      expectSingle(rules, dt(2000, 12, 1), PLUS_2)
    })
  })

  // ========================================================================
  // Day specifications and time definitions
  // ========================================================================

  describe('day specifications and time definitions', () => {
    it('resolves the last Sunday of February in leap and common years', () => {
      const rules = createZoneRulesBuilder()
        .addWindowForever(PLUS_1)
        .addRuleToWindow(rule([2004, 2005], 2, LAST_SUNDAY, at(1), UTC, savings(1)))
        .addRuleToWindow(rule([2004, 2005], 10, LAST_SUNDAY, at(1), UTC, savings(0)))
        .toRules('Test/Feb')

      expectSingle(rules, dt(2004, 1, 1), PLUS_1)
      expect(expectGap(rules, dt(2004, 2, 29, 2, 30), PLUS_1, PLUS_2).epochSecond).toBe(utc(2004, 2, 29, 1))
      expectOverlap(rules, dt(2004, 10, 31, 2, 30), PLUS_2, PLUS_1)
      expect(expectGap(rules, dt(2005, 2, 27, 2, 30), PLUS_1, PLUS_2).epochSecond).toBe(utc(2005, 2, 27, 1))
      expectSingle(rules, dt(2006, 7, 1), PLUS_1)
    })

    it('resolves a weekday on or after a day of the month', () => {
      const rules = createZoneRulesBuilder()
        .addWindowForever(PLUS_1)
        .addRuleToWindow(rule([2000, 2001], 3, weekdayOnOrAfter(10, 'sun'), at(1), UTC, savings(1)))
        .addRuleToWindow(rule([2000, 2001], 10, weekdayOnOrAfter(10, 'sun'), at(1), UTC, savings(0)))
        .toRules('Test/OnOrAfter')

      expectGap(rules, dt(2000, 3, 12, 2, 30), PLUS_1, PLUS_2)
      expectOverlap(rules, dt(2000, 10, 15, 2, 30), PLUS_2, PLUS_1)
      expectGap(rules, dt(2001, 3, 11, 2, 30), PLUS_1, PLUS_2)
      expectOverlap(rules, dt(2001, 10, 14, 2, 30), PLUS_2, PLUS_1)
      expectSingle(rules, dt(2002, 7, 1), PLUS_1)
    })

    it('fires an end-of-day rule at the midnight ending its day', () => {
      const rules = createZoneRulesBuilder()
        .addWindowForever(PLUS_2)
        .addRuleToWindow(rule([2002, FOREVER], 3, lastWeekdayOfMonth('thu'), at(0), WALL, savings(1), true))
        .addRuleToWindow(rule([2002, FOREVER], 9, lastWeekdayOfMonth('fri'), at(0), STANDARD, savings(0)))
        .toRules('Test/EndOfDay')

      expectSingle(rules, dt(2002, 3, 28, 23), PLUS_2)
      expect(expectGap(rules, dt(2002, 3, 29), PLUS_2, PLUS_3).epochSecond).toBe(utc(2002, 3, 28, 22))
      expectSingle(rules, dt(2002, 3, 29, 1), PLUS_3)
      expectSingle(rules, dt(2002, 9, 26, 23), PLUS_3)
      expectOverlap(rules, dt(2002, 9, 27), PLUS_3, PLUS_2)
      expectSingle(rules, dt(2002, 9, 27, 1), PLUS_2)
      expect(rules.transitionRules[0]?.timeEndOfDay).toBe(true)
    })

    it('reads STANDARD rule times without the savings in effect', () => {
      const rules = createZoneRulesBuilder()
        .addWindowForever(PLUS_2)
        .addRuleToWindow(rule([2008, FOREVER], 4, lastWeekdayOfMonth('fri'), at(0), STANDARD, savings(1)))
        .addRuleToWindow(rule([2008, FOREVER], 8, lastWeekdayOfMonth('thu'), at(23), STANDARD, savings(0)))
        .toRules('Test/DateChange')

      expect(expectGap(rules, dt(2009, 4, 24), PLUS_2, PLUS_3).epochSecond).toBe(utc(2009, 4, 23, 22))
      expectSingle(rules, dt(2009, 8, 27, 22, 59), PLUS_3)
      expect(expectOverlap(rules, dt(2009, 8, 27, 23), PLUS_3, PLUS_2).epochSecond).toBe(utc(2009, 8, 27, 21))
      expectSingle(rules, dt(2009, 8, 28), PLUS_2)
    })

    it('switches from WALL to UTC rules at a window boundary', () => {
      const rules = createZoneRulesBuilder()
        .addWindow(PLUS_2, dt(1997, 1, 1), WALL)
        .addRuleToWindow(rule([1996, FOREVER], 3, LAST_SUNDAY, at(1), WALL, savings(1)))
        .addRuleToWindow(rule([1996, FOREVER], 10, LAST_SUNDAY, at(1), WALL, savings(0)))
        .addWindowForever(PLUS_2)
        .addRuleToWindow(rule([1996, FOREVER], 3, LAST_SUNDAY, at(1), UTC, savings(1)))
        .addRuleToWindow(rule([1996, FOREVER], 10, LAST_SUNDAY, at(1), UTC, savings(0)))
        .toRules('Test/RuleClash')

      expectGap(rules, dt(1996, 3, 31, 1), PLUS_2, PLUS_3)
      expectOverlap(rules, dt(1996, 10, 27), PLUS_3, PLUS_2)
      expectSingle(rules, dt(1996, 10, 27, 1), PLUS_2)
      expectSingle(rules, dt(1996, 10, 27, 2), PLUS_2)
      expect(expectGap(rules, dt(1997, 3, 30, 3, 30), PLUS_2, PLUS_3).epochSecond).toBe(utc(1997, 3, 30, 1))
      expect(expectOverlap(rules, dt(1997, 10, 26, 3, 30), PLUS_3, PLUS_2).epochSecond).toBe(utc(1997, 10, 26, 1))
    })
  })

  // ========================================================================
  // Savings carried across windows
  // ========================================================================

  describe('savings carried across windows', () => {
    it('picks up savings at a window start from the first rule of the window', () => {
      const rules = createZoneRulesBuilder()
        .addWindow(PLUS_1, dt(1944, 9, 17, 2), STANDARD)
        .addRuleToWindow(rule([1944, 1945], 4, weekdayOnOrAfter(1, 'mon'), at(2), STANDARD, savings(1)))
        .addRuleToWindow(rule(1944, 10, dayOfMonth(2), at(2), STANDARD, savings(0)))
        .addRuleToWindow(rule(1945, 9, dayOfMonth(16), at(2), STANDARD, savings(0)))
        .addWindow(PLUS_1, dt(1979, 1, 1), WALL)
        .addRuleToWindow(rule(1945, 4, dayOfMonth(8), at(2), STANDARD, savings(1)))
        .addRuleToWindow(rule(1945, 11, dayOfMonth(18), at(2), STANDARD, savings(0)))
        .addWindowForever(PLUS_1)
        .toRules('Test/WindowStart')

      expect(rules.transitions).toEqual([
        createTransition(utc(1944, 4, 3, 1), PLUS_1, PLUS_2),
        createTransition(utc(1944, 9, 17, 1), PLUS_2, PLUS_1),
        createTransition(utc(1945, 4, 8, 1), PLUS_1, PLUS_2),
        createTransition(utc(1945, 11, 18, 1), PLUS_2, PLUS_1),
      ])
      expectGap(rules, dt(1944, 4, 3, 2, 30), PLUS_1, PLUS_2)
      expectOverlap(rules, dt(1944, 9, 17, 2, 30), PLUS_2, PLUS_1)
      expectSingle(rules, dt(1944, 9, 17, 3, 30), PLUS_1)
      expectGap(rules, dt(1945, 4, 8, 2, 30), PLUS_1, PLUS_2)
      expectOverlap(rules, dt(1945, 11, 18, 2, 30), PLUS_2, PLUS_1)
    })

    it('holds a year of permanent savings between two rule-bearing windows', () => {
      const plus4 = offset(4)
      const plus5 = offset(5)
      const rules = createZoneRulesBuilder()
        .addWindow(plus4, dt(1996, 10, 27), WALL)
        .addRuleToWindow(rule([1996, FOREVER], 3, LAST_SUNDAY, at(0), WALL, savings(1)))
        .addRuleToWindow(rule([1996, FOREVER], 10, LAST_SUNDAY, at(0), WALL, savings(0)))
        .addWindow(plus4, dt(1997, 3, 30), WALL)
        .setFixedSavingsToWindow(savings(1))
        .addWindowForever(plus4)
        .addRuleToWindow(rule([1996, FOREVER], 3, LAST_SUNDAY, at(0), WALL, savings(1)))
        .addRuleToWindow(rule([1996, FOREVER], 10, LAST_SUNDAY, at(0), WALL, savings(0)))
        .toRules('Test/PermanentSummer')

      expectGap(rules, dt(1996, 3, 31, 0, 30), plus4, plus5)
      expectSingle(rules, dt(1996, 10, 26, 23, 30), plus5)
      expectSingle(rules, dt(1997, 3, 30, 0, 30), plus5)
      expect(expectOverlap(rules, dt(1997, 10, 25, 23, 30), plus5, plus4).epochSecond).toBe(utc(1997, 10, 25, 19))
    })

    it('overlaps by two hours when savings end as the standard offset drops', () => {
      const minus4 = offset(-4)
      const minus5 = offset(-5)
      const minus6 = offset(-6)
      const firstSunday = weekdayOnOrAfter(1, 'sun')
      const rules = createZoneRulesBuilder()
        .addWindow(minus5, dt(1999, 10, 31, 2), WALL)
        .addRuleToWindow(rule([1987, FOREVER], 4, firstSunday, at(2), WALL, savings(1)))
        .addRuleToWindow(rule([1987, FOREVER], 10, LAST_SUNDAY, at(2), WALL, savings(0)))
        .addWindowForever(minus6)
        .addRuleToWindow(rule([1987, FOREVER], 4, firstSunday, at(2), WALL, savings(1)))
        .addRuleToWindow(rule([1987, FOREVER], 10, LAST_SUNDAY, at(2), WALL, savings(0)))
        .toRules('Test/DoubleOverlap')

      expect(rules.offsetAtStartOfTime()).toBe(minus5)
      expect(rules.offsetAtEndOfTime()).toBe(minus6)
      expect(rules.standardOffsetChanges).toEqual([{ epochSecond: utc(1999, 10, 31, 6), offset: minus6 }])
      expectSingle(rules, dt(1999, 10, 30, 23), minus4)
      expectOverlap(rules, dt(1999, 10, 31), minus4, minus6)
      expectOverlap(rules, dt(1999, 10, 31, 1, 59), minus4, minus6)
      expectSingle(rules, dt(1999, 10, 31, 2), minus6)
    })

    it('moves the standard offset without a wall change when savings absorb it', () => {
      const minus3 = offset(-3)
      const minus4 = offset(-4)
      const seasonal = [
        rule(1993, 3, dayOfMonth(3), at(0), WALL, savings(0)),
        rule(1999, 10, dayOfMonth(3), at(0), WALL, savings(1)),
        rule(2000, 3, dayOfMonth(3), at(0), WALL, savings(0)),
      ]
      const builder = createZoneRulesBuilder()
        .addWindow(minus3, dt(1900, 1, 1), WALL)
        .addWindow(minus3, dt(1999, 10, 3), WALL)
      seasonal.forEach((r) => builder.addRuleToWindow(r))
      builder.addWindow(minus4, dt(2000, 3, 3), WALL)
      seasonal.forEach((r) => builder.addRuleToWindow(r))
      const rules = builder.addWindowForever(minus3).toRules('Test/Absorbed')

      expect(rules.transitions).toEqual([])
      expect(rules.standardOffsetChanges).toEqual([
        { epochSecond: utc(1999, 10, 3, 3), offset: minus4 },
        { epochSecond: utc(2000, 3, 3, 3), offset: minus3 },
      ])
      expectSingle(rules, dt(1999, 10, 2, 23, 59), minus3)
      expectSingle(rules, dt(1999, 10, 3), minus3)
      expectSingle(rules, dt(2000, 3, 3), minus3)
      expect(rules.isDaylightSavings(utc(2000, 1, 1))).toBe(true)
    })

    it('starts the forever rules relative to the new standard offset', () => {
      const minus5 = offset(-5)
      const minus6 = offset(-6)
      const secondSunday = weekdayOnOrAfter(8, 'sun')
      const firstSunday = weekdayOnOrAfter(1, 'sun')
      const rules = createZoneRulesBuilder()
        .addWindow(minus6, dt(2007, 11, 4, 2), WALL)
        .addRuleToWindow(rule([2007, FOREVER], 3, secondSunday, at(2), WALL, savings(1)))
        .addRuleToWindow(rule([2007, FOREVER], 11, firstSunday, at(2), WALL, savings(0)))
        .addWindowForever(minus5)
        .addRuleToWindow(rule([2007, FOREVER], 3, secondSunday, at(2), WALL, savings(1)))
        .addRuleToWindow(rule([2007, FOREVER], 11, firstSunday, at(2), WALL, savings(0)))
        .toRules('Test/NewStandard')

      expect(rules.offsetAtStartOfTime()).toBe(minus6)
      expect(rules.offsetAtEndOfTime()).toBe(minus5)
      expectSingle(rules, dt(2007, 3, 11, 1), minus6)
      expectGap(rules, dt(2007, 3, 11, 2), minus6, minus5)
      expectSingle(rules, dt(2007, 3, 11, 3), minus5)
      expectSingle(rules, dt(2007, 11, 4, 1), minus5)
      expect(expectGap(rules, dt(2008, 3, 9, 2, 30), minus5, offset(-4)).epochSecond).toBe(utc(2008, 3, 9, 7))
    })
  })
})
