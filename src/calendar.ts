/**
 * Civil Calendar
 *
 * Leap-year rules, month lengths and the mapping between civil dates and
 * Julian Day Numbers. Dates before 15 Oct 1582 are Julian, dates from it on
 * are Gregorian, so day arithmetic agrees with the leap-year rule below.
 */

import { InvalidArgumentError } from './errors'

// ============================================================================
// Constants
// ============================================================================

export const MS_PER_SECOND = 1000
export const MS_PER_MINUTE = 60 * MS_PER_SECOND
export const MS_PER_HOUR = 60 * MS_PER_MINUTE
export const MS_PER_DAY = 24 * MS_PER_HOUR

/** Largest magnitude of a `Date` time value: 100,000,000 days either side of the epoch. */
export const MAX_INSTANT_MILLIS = 100_000_000 * MS_PER_DAY

/** First year whose leap years follow the Gregorian rule. */
export const GREGORIAN_CUTOVER_YEAR = 1582

/** JDN of 1582-10-15, the first Gregorian day. The day before is Julian 1582-10-04. */
const GREGORIAN_CUTOVER_JDN = 2299161

/** JDN of 1970-01-01. */
export const EPOCH_JDN = 2440588

const DAYS_IN_MONTH = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6

export const Weekday = {
  SUNDAY: 0,
  MONDAY: 1,
  TUESDAY: 2,
  WEDNESDAY: 3,
  THURSDAY: 4,
  FRIDAY: 5,
  SATURDAY: 6,
} as const satisfies Record<string, Weekday>

export type CivilDate = {
  year: number
  month: number
  day: number
}

// ============================================================================
// Leap Years
// ============================================================================

export function isLeapYear(year: number): boolean {
  if (year >= GREGORIAN_CUTOVER_YEAR) {
    return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0)
  }
  // Julian
  return year % 4 === 0
}

export function checkMonth(month: number): number {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new InvalidArgumentError('Month must be 1 to 12')
  }
  return month
}

export function daysInMonth(year: number, month: number): number {
  checkMonth(month)
  if (month === 2) return isLeapYear(year) ? 29 : 28
  return DAYS_IN_MONTH[month]!
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

// ============================================================================
// Julian Day Number
// ============================================================================

function isBeforeCutover(year: number, month: number, day: number): boolean {
  if (year !== 1582) return year < 1582
  if (month !== 10) return month < 10
  return day < 15
}

/** Julian 1582-10-05 through 1582-10-14 were never observed. */
export function isInCutoverGap(year: number, month: number, day: number): boolean {
  return year === 1582 && month === 10 && day > 4 && day < 15
}

/**
 * Map a civil date to its JDN. Day and month overflow are taken linearly,
 * so 31 Feb lands on 2 or 3 Mar.
 */
export function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  const base = day + Math.floor((153 * m + 2) / 5) + 365 * y + Math.floor(y / 4)
  if (isBeforeCutover(year, month, day)) return base - 32083
  return base - Math.floor(y / 100) + Math.floor(y / 400) - 32045
}

export function jdnToDate(jdn: number): CivilDate {
  if (jdn < GREGORIAN_CUTOVER_JDN) {
    const c = jdn + 32082
    const d = Math.floor((4 * c + 3) / 1461)
    const e = c - Math.floor((1461 * d) / 4)
    const m = Math.floor((5 * e + 2) / 153)
    return {
      year: d - 4800 + Math.floor(m / 10),
      month: m + 3 - 12 * Math.floor(m / 10),
      day: e - Math.floor((153 * m + 2) / 5) + 1,
    }
  }
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor((146097 * b) / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor((1461 * d) / 4)
  const m = Math.floor((5 * e + 2) / 153)
  return {
    year: 100 * b + d - 4800 + Math.floor(m / 10),
    month: m + 3 - 12 * Math.floor(m / 10),
    day: e - Math.floor((153 * m + 2) / 5) + 1,
  }
}

const WEEKDAYS: readonly Weekday[] = [0, 1, 2, 3, 4, 5, 6]

/** JDN 0 is a Monday. */
export function weekdayOfJDN(jdn: number): Weekday {
  return WEEKDAYS[(((jdn + 1) % 7) + 7) % 7]!
}

// ============================================================================
// Local Millis
// ============================================================================

/**
 * Milliseconds since 1970-01-01T00:00 of a wall-clock reading, with no zone
 * applied. Components beyond their range roll over.
 */
export function civilToLocalMillis(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  millisecond: number
): number {
  const days = dateToJDN(year, month, day) - EPOCH_JDN
  return (
    days * MS_PER_DAY +
    hour * MS_PER_HOUR +
    minute * MS_PER_MINUTE +
    second * MS_PER_SECOND +
    millisecond
  )
}
