/**
 * Calendar Arithmetic
 *
 * Pure functions returning new Abstime values in the zone of their input.
 * Millis arithmetic ignores the calendar. Day, month and year stepping keep
 * the time of day and move the civil date, using the leap-year rule of
 * ./calendar.
 */

import { Abstime } from './abstime'
import {
  dateToJDN,
  daysInMonth,
  isInCutoverGap,
  jdnToDate,
  type CivilDate,
  type Weekday,
} from './calendar'
import { makeDuration, type Duration } from './core'

// ============================================================================
// Millis Arithmetic
// ============================================================================

export function add(t: Abstime, delta: Duration): Abstime {
  return Abstime.fromMillis(t.millis + delta, t.zone)
}

export function subtract(t: Abstime, delta: Duration): Abstime {
  return Abstime.fromMillis(t.millis - delta, t.zone)
}

/** Positive when `b` is after `a`. */
export function delta(a: Abstime, b: Abstime): Duration {
  return makeDuration(b.millis - a.millis)
}

// ============================================================================
// Civil Stepping
// ============================================================================

type Direction = 1 | -1

/**
 * `t`'s time of day on the given date. A date inside the 1582 cutover gap is
 * moved to the nearest observed day in `direction`.
 */
function onDate(t: Abstime, year: number, month: number, day: number, direction: Direction): Abstime {
  if (isInCutoverGap(year, month, day)) day = direction > 0 ? 15 : 4
  return Abstime.fromFields(year, month, day, t.hour, t.minute, t.second, t.millisecond, t.zone)
}

function isOnDate(t: Abstime, date: CivilDate): boolean {
  return t.year === date.year && t.month === date.month && t.day === date.day
}

/** False for a civil day the zone skipped entirely, such as a date-line move. */
function dayExists(t: Abstime, date: CivilDate): boolean {
  return isOnDate(Abstime.fromFields(date.year, date.month, date.day, 0, 0, 0, 0, t.zone), date)
}

function stepDay(t: Abstime, direction: Direction): Abstime {
  let jdn = dateToJDN(t.year, t.month, t.day)
  for (;;) {
    jdn += direction
    const date = jdnToDate(jdn)
    const stepped = onDate(t, date.year, date.month, date.day, direction)
    if (isOnDate(stepped, date) || dayExists(t, date)) return stepped
  }
}

/** Same date, new time of day. */
export function withTimeOfDay(
  t: Abstime,
  hour: number,
  minute: number,
  second: number,
  millisecond: number
): Abstime {
  return Abstime.fromFields(t.year, t.month, t.day, hour, minute, second, millisecond, t.zone)
}

export function isLeapDay(t: Abstime): boolean {
  return t.month === 2 && t.day === 29
}

/**
 * The next civil day at the same time of day. A day the zone never observed
 * is skipped; a time of day inside a DST gap moves past the gap.
 */
export function nextDay(t: Abstime): Abstime {
  return stepDay(t, 1)
}

/** Mirror of nextDay. */
export function prevDay(t: Abstime): Abstime {
  return stepDay(t, -1)
}

/**
 * Same day next month. The last day of a month maps to the last day of the
 * next; any other day is capped to the next month's length.
 */
export function nextMonth(t: Abstime): Abstime {
  let year = t.year
  let month = t.month
  let day = t.day

  if (month === 12) {
    // Dec and Jan both have 31 days
    month = 1
    year++
  } else {
    const endOfMonth = day === daysInMonth(year, month)
    month++
    const last = daysInMonth(year, month)
    if (endOfMonth || day > last) day = last
  }
  return onDate(t, year, month, day, 1)
}

/** Mirror of nextMonth. */
export function prevMonth(t: Abstime): Abstime {
  let year = t.year
  let month = t.month
  let day = t.day

  if (month === 1) {
    month = 12
    year--
  } else {
    const endOfMonth = day === daysInMonth(year, month)
    month--
    const last = daysInMonth(year, month)
    if (endOfMonth || day > last) day = last
  }
  return onDate(t, year, month, day, -1)
}

/** Same date next year; Feb 29 becomes Feb 28. */
export function nextYear(t: Abstime): Abstime {
  return onDate(t, t.year + 1, t.month, isLeapDay(t) ? 28 : t.day, 1)
}

/** Same date last year; Feb 29 becomes Feb 28. */
export function prevYear(t: Abstime): Abstime {
  return onDate(t, t.year - 1, t.month, isLeapDay(t) ? 28 : t.day, -1)
}

/** The next date falling on `weekday`, a full week ahead if `t` already does. */
export function nextWeekday(t: Abstime, weekday: Weekday): Abstime {
  let next = nextDay(t)
  while (next.weekday !== weekday) next = nextDay(next)
  return next
}

/** The previous date falling on `weekday`, a full week back if `t` already does. */
export function prevWeekday(t: Abstime, weekday: Weekday): Abstime {
  let prev = prevDay(t)
  while (prev.weekday !== weekday) prev = prevDay(prev)
  return prev
}
