/**
 * Segment 04: Calendar Arithmetic Tests
 *
 * Millis arithmetic, time-of-day replacement and day/month/year/weekday
 * stepping, including month-end carry and leap-day handling.
 */

import { describe, it, expect } from 'vitest'
import { Abstime } from '../src/abstime'
import {
  add,
  subtract,
  delta,
  withTimeOfDay,
  nextDay,
  prevDay,
  nextMonth,
  prevMonth,
  nextYear,
  prevYear,
  nextWeekday,
  prevWeekday,
  isLeapDay,
} from '../src/arithmetic'
import { Weekday } from '../src/calendar'
import { makeDuration } from '../src/core'
import { createZoneProvider } from '../src/zone'

const provider = createZoneProvider({ defaultZone: 'UTC' })
const utc = provider.utc()
const newYork = provider.zone('America/New_York')
// Skipped Friday 2011-12-30 moving from -10:00 to +14:00
const apia = provider.zone('Pacific/Apia')

const DAY = 86_400_000

function date(year: number, month: number, day: number): Abstime {
  return Abstime.fromFields(year, month, day, 0, 0, 0, 0, utc)
}

function ymd(t: Abstime): [number, number, number] {
  return [t.year, t.month, t.day]
}

// ============================================================================
// 1. MILLIS ARITHMETIC
// ============================================================================

describe('add / subtract / delta', () => {
  const t = Abstime.fromMillis(1_000_000, newYork)

  it('add moves forward and keeps the zone', () => {
    const later = add(t, makeDuration(3_600_000))
    expect(later.millis).toBe(4_600_000)
    expect(later.zone).toBe(newYork)
  })

  it('subtract moves backward', () => {
    expect(subtract(t, makeDuration(1_000_000)).millis).toBe(0)
  })

  it('delta is positive when the second instant is later', () => {
    const later = Abstime.fromMillis(1_500_000, utc)
    expect(delta(t, later)).toBe(500_000)
    expect(delta(later, t)).toBe(-500_000)
  })

  it('subtracting the delta from the later instant gives the earlier one', () => {
    const later = Abstime.fromMillis(9_999_999, utc)
    expect(subtract(later, delta(t, later)).millis).toBe(t.millis)
  })
})

describe('withTimeOfDay', () => {
  it('keeps the date and replaces the time', () => {
    const t = Abstime.fromFields(2024, 6, 15, 10, 0, 0, 0, utc)
    const u = withTimeOfDay(t, 23, 59, 59, 999)
    expect(ymd(u)).toEqual([2024, 6, 15])
    expect([u.hour, u.minute, u.second, u.millisecond]).toEqual([23, 59, 59, 999])
    expect(u.zone).toBe(utc)
  })

  it('works in the instant zone', () => {
    const t = Abstime.fromFields(2024, 1, 15, 9, 0, 0, 0, newYork)
    expect(withTimeOfDay(t, 0, 0, 0, 0).millis).toBe(Abstime.fromFields(2024, 1, 15, 0, 0, 0, 0, newYork).millis)
  })
})

// ============================================================================
// 2. DAYS
// ============================================================================

describe('nextDay / prevDay', () => {
  it('steps within a month', () => {
    expect(ymd(nextDay(date(2024, 5, 10)))).toEqual([2024, 5, 11])
    expect(ymd(prevDay(date(2024, 5, 10)))).toEqual([2024, 5, 9])
  })

  it('wraps the year', () => {
    expect(ymd(nextDay(date(2023, 12, 31)))).toEqual([2024, 1, 1])
    expect(ymd(prevDay(date(2024, 1, 1)))).toEqual([2023, 12, 31])
  })

  it('honours leap February', () => {
    expect(ymd(nextDay(date(2024, 2, 28)))).toEqual([2024, 2, 29])
    expect(ymd(nextDay(date(2023, 2, 28)))).toEqual([2023, 3, 1])
    expect(ymd(prevDay(date(2024, 3, 1)))).toEqual([2024, 2, 29])
  })

  it('honours the Julian leap day', () => {
    const leapDay = nextDay(date(1500, 2, 28))
    expect(ymd(leapDay)).toEqual([1500, 2, 29])
    expect(ymd(nextDay(leapDay))).toEqual([1500, 3, 1])
  })

  it('crosses the Gregorian cutover in one day', () => {
    const before = date(1582, 10, 4)
    const after = nextDay(before)
    expect(ymd(after)).toEqual([1582, 10, 15])
    expect(after.millis - before.millis).toBe(DAY)
  })

  it('steps back over the Gregorian cutover in one day', () => {
    const after = date(1582, 10, 15)
    const before = prevDay(after)
    expect(ymd(before)).toEqual([1582, 10, 4])
    expect(after.millis - before.millis).toBe(DAY)
  })

  it('keeps the time of day', () => {
    const t = Abstime.fromFields(2024, 1, 1, 10, 30, 15, 250, utc)
    const u = nextDay(t)
    expect(ymd(u)).toEqual([2024, 1, 2])
    expect(u.timeOfDayMillis).toBe(t.timeOfDayMillis)
  })

  it('is 23 hours long across the spring DST change', () => {
    const t = Abstime.fromFields(2024, 3, 9, 12, 0, 0, 0, newYork)
    const u = nextDay(t)
    expect(u.hour).toBe(12)
    expect(u.millis - t.millis).toBe(23 * 3_600_000)
  })
})

describe('day stepping in named zones', () => {
  const saturday = Abstime.fromFields(2011, 12, 31, 10, 0, 0, 0, apia)

  it('nextDay into a DST gap moves past the gap', () => {
    const t = Abstime.fromFields(2024, 3, 9, 2, 30, 0, 0, newYork)
    const u = nextDay(t)
    expect(ymd(u)).toEqual([2024, 3, 10])
    expect([u.hour, u.minute]).toEqual([3, 30])
    expect(u.millis).toBe(1710055800000)
  })

  it('prevDay into a DST gap moves past the gap', () => {
    const t = Abstime.fromFields(2024, 3, 11, 2, 30, 0, 0, newYork)
    const u = prevDay(t)
    expect(ymd(u)).toEqual([2024, 3, 10])
    expect(u.millis).toBe(1710055800000)
  })

  it('nextDay into a DST overlap takes the standard-time reading', () => {
    const t = Abstime.fromFields(2024, 11, 2, 1, 30, 0, 0, newYork)
    const u = nextDay(t)
    expect(u.millis).toBe(1730615400000)
    expect(u.millis - t.millis).toBe(25 * 3_600_000)
  })

  it('starts on the day after the skipped one', () => {
    expect(saturday.millis).toBe(1325275200000)
    expect(saturday.weekday).toBe(Weekday.SATURDAY)
  })

  it('prevDay skips a civil day the zone never observed', () => {
    const u = prevDay(saturday)
    expect(ymd(u)).toEqual([2011, 12, 29])
    expect(u.hour).toBe(10)
    expect(u.weekday).toBe(Weekday.THURSDAY)
    expect(u.millis).toBe(1325188800000)
  })

  it('nextDay skips a civil day the zone never observed', () => {
    const thursday = Abstime.fromFields(2011, 12, 29, 10, 0, 0, 0, apia)
    const u = nextDay(thursday)
    expect(ymd(u)).toEqual([2011, 12, 31])
    expect(u.millis).toBe(1325275200000)
  })

  it('prevWeekday searches past the skipped day', () => {
    const friday = prevWeekday(saturday, Weekday.FRIDAY)
    expect(ymd(friday)).toEqual([2011, 12, 23])
    expect(friday.weekday).toBe(Weekday.FRIDAY)
    expect(ymd(prevWeekday(saturday, Weekday.THURSDAY))).toEqual([2011, 12, 29])
  })
})

// ============================================================================
// 3. MONTHS
// ============================================================================

describe('nextMonth', () => {
  it('Jan 31 lands on Feb 28 in a common year', () => {
    expect(ymd(nextMonth(date(2023, 1, 31)))).toEqual([2023, 2, 28])
  })

  it('Jan 31 lands on Feb 29 in a leap year', () => {
    expect(ymd(nextMonth(date(2024, 1, 31)))).toEqual([2024, 2, 29])
  })

  it('carries the last day of the month forward', () => {
    expect(ymd(nextMonth(date(2023, 2, 28)))).toEqual([2023, 3, 31])
    expect(ymd(nextMonth(date(2024, 4, 30)))).toEqual([2024, 5, 31])
  })

  it('keeps a day that is not the last one', () => {
    expect(ymd(nextMonth(date(2024, 2, 28)))).toEqual([2024, 3, 28])
    expect(ymd(nextMonth(date(2024, 5, 15)))).toEqual([2024, 6, 15])
  })

  it('clamps a day beyond the next month length', () => {
    expect(ymd(nextMonth(date(2023, 1, 30)))).toEqual([2023, 2, 28])
    expect(ymd(nextMonth(date(2024, 3, 31)))).toEqual([2024, 4, 30])
  })

  it('rolls December into January of the next year', () => {
    expect(ymd(nextMonth(date(2023, 12, 31)))).toEqual([2024, 1, 31])
    expect(ymd(nextMonth(date(2023, 12, 15)))).toEqual([2024, 1, 15])
  })
})

describe('prevMonth', () => {
  it('clamps Mar 31 to Feb 28', () => {
    expect(ymd(prevMonth(date(2023, 3, 31)))).toEqual([2023, 2, 28])
  })

  it('clamps Mar 30 to Feb 29 in a leap year', () => {
    expect(ymd(prevMonth(date(2024, 3, 30)))).toEqual([2024, 2, 29])
  })

  it('carries the last day of the month backward', () => {
    expect(ymd(prevMonth(date(2024, 2, 29)))).toEqual([2024, 1, 31])
    expect(ymd(prevMonth(date(2024, 4, 30)))).toEqual([2024, 3, 31])
  })

  it('rolls January into December of the previous year', () => {
    expect(ymd(prevMonth(date(2024, 1, 15)))).toEqual([2023, 12, 15])
    expect(ymd(prevMonth(date(2024, 1, 31)))).toEqual([2023, 12, 31])
  })
})

describe('month and year steps into the 1582 cutover gap', () => {
  it('prevMonth lands on the last Julian day', () => {
    expect(ymd(prevMonth(date(1582, 11, 10)))).toEqual([1582, 10, 4])
  })

  it('nextMonth lands on the first Gregorian day', () => {
    expect(ymd(nextMonth(date(1582, 9, 10)))).toEqual([1582, 10, 15])
  })

  it('prevYear lands on the last Julian day', () => {
    expect(ymd(prevYear(date(1583, 10, 10)))).toEqual([1582, 10, 4])
  })

  it('nextYear lands on the first Gregorian day', () => {
    expect(ymd(nextYear(date(1581, 10, 10)))).toEqual([1582, 10, 15])
  })
})

// ============================================================================
// 4. YEARS
// ============================================================================

describe('nextYear / prevYear', () => {
  it('Feb 29 2024 next year is Feb 28 2025', () => {
    expect(ymd(nextYear(date(2024, 2, 29)))).toEqual([2025, 2, 28])
  })

  it('Feb 29 2024 previous year is Feb 28 2023', () => {
    expect(ymd(prevYear(date(2024, 2, 29)))).toEqual([2023, 2, 28])
  })

  it('keeps other dates', () => {
    expect(ymd(nextYear(date(2023, 3, 1)))).toEqual([2024, 3, 1])
    expect(ymd(prevYear(date(2023, 12, 31)))).toEqual([2022, 12, 31])
  })
})

describe('isLeapDay', () => {
  it('is true only on Feb 29', () => {
    expect(isLeapDay(date(2024, 2, 29))).toBe(true)
    expect(isLeapDay(date(2024, 2, 28))).toBe(false)
    expect(isLeapDay(date(2024, 3, 29))).toBe(false)
  })
})

// ============================================================================
// 5. WEEKDAYS
// ============================================================================

describe('nextWeekday / prevWeekday', () => {
  // 2024-01-01 is a Monday
  const monday = date(2024, 1, 1)

  it('never returns the same day', () => {
    const next = nextWeekday(monday, Weekday.MONDAY)
    expect(ymd(next)).toEqual([2024, 1, 8])
    expect(next.millis - monday.millis).toBe(7 * DAY)
  })

  it('finds the next Friday', () => {
    const friday = nextWeekday(monday, Weekday.FRIDAY)
    expect(ymd(friday)).toEqual([2024, 1, 5])
    expect(friday.weekday).toBe(Weekday.FRIDAY)
  })

  it('finds the next day when it matches', () => {
    expect(ymd(nextWeekday(monday, Weekday.TUESDAY))).toEqual([2024, 1, 2])
  })

  it('searches backward a full week for the same weekday', () => {
    expect(ymd(prevWeekday(monday, Weekday.MONDAY))).toEqual([2023, 12, 25])
  })

  it('finds the previous Sunday', () => {
    expect(ymd(prevWeekday(monday, Weekday.SUNDAY))).toEqual([2023, 12, 31])
  })
})
