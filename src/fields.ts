/**
 * Field Decomposition
 *
 * Pure conversions between an instant (epoch millis + zone) and the civil
 * fields observed in that zone. Both directions go through the hybrid
 * Julian/Gregorian day numbering in ./calendar.
 */

import {
  EPOCH_JDN,
  MS_PER_DAY,
  MS_PER_HOUR,
  MS_PER_MINUTE,
  MS_PER_SECOND,
  checkMonth,
  civilToLocalMillis,
  jdnToDate,
  weekdayOfJDN,
  type Weekday,
} from './calendar'
import type { Zone } from './zone'

// ============================================================================
// Types
// ============================================================================

export type DecomposedFields = {
  readonly year: number
  /** 1-12 */
  readonly month: number
  /** 1-31 */
  readonly day: number
  /** 0-23 */
  readonly hour: number
  /** 0-59 */
  readonly minute: number
  /** 0-59 */
  readonly second: number
  /** 0-999 */
  readonly millisecond: number
  /** 0 = Sunday */
  readonly weekday: Weekday
  readonly daylight: boolean
}

// ============================================================================
// Millis -> Fields
// ============================================================================

export function decomposeFields(millis: number, zone: Zone): DecomposedFields {
  const local = millis + zone.offsetAt(millis)
  const days = Math.floor(local / MS_PER_DAY)
  let rem = local - days * MS_PER_DAY

  const hour = Math.floor(rem / MS_PER_HOUR)
  rem -= hour * MS_PER_HOUR
  const minute = Math.floor(rem / MS_PER_MINUTE)
  rem -= minute * MS_PER_MINUTE
  const second = Math.floor(rem / MS_PER_SECOND)
  const millisecond = rem - second * MS_PER_SECOND

  const jdn = days + EPOCH_JDN
  const { year, month, day } = jdnToDate(jdn)

  return {
    year,
    month,
    day,
    hour,
    minute,
    second,
    millisecond,
    weekday: weekdayOfJDN(jdn),
    daylight: zone.inDaylightTime(millis),
  }
}

export function timeOfDayMillis(fields: DecomposedFields): number {
  return (
    fields.hour * MS_PER_HOUR +
    fields.minute * MS_PER_MINUTE +
    fields.second * MS_PER_SECOND +
    fields.millisecond
  )
}

// ============================================================================
// Fields -> Millis
// ============================================================================

/**
 * Resolve a wall-clock reading in `zone` to epoch millis. Only the month is
 * range-checked; other components roll over into the next unit.
 *
 * A reading skipped by a DST gap is taken as standard time, which lands it
 * after the gap. A reading repeated by a DST overlap resolves to the
 * standard-time (second) occurrence.
 */
export function composeMillis(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  millisecond: number,
  zone: Zone
): number {
  checkMonth(month)
  const local = civilToLocalMillis(year, month, day, hour, minute, second, millisecond)
  const standard = local - zone.rawOffsetAt(local)
  const candidate = local - zone.offsetAt(standard)
  if (candidate + zone.offsetAt(candidate) === local) return candidate
  return standard
}
