/**
 * abstime
 *
 * Public API exports
 */

// Error system
export {
  AbstimeError, AbstimeErrorCode,
  InvalidFormatError, InvalidArgumentError, UnknownZoneError,
} from './errors'
export type { AbstimeErrorCode as AbstimeErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Branded types
export type { Duration, CivilDate, DecomposedFields } from './core'
export { makeDuration } from './core'

// Calendar
export {
  Weekday,
  MS_PER_SECOND, MS_PER_MINUTE, MS_PER_HOUR, MS_PER_DAY, MAX_INSTANT_MILLIS,
  GREGORIAN_CUTOVER_YEAR,
  isLeapYear, daysInMonth, daysInYear,
  dateToJDN, jdnToDate, weekdayOfJDN,
} from './calendar'

// Zones
export type { Zone, ZoneProvider, ZoneProviderConfig, ZoneProviderLogger } from './zone'
export {
  UTC_ID,
  createZoneProvider, fixedOffsetZone, fixedOffsetId, sameZone, isValidTimezone,
} from './zone'

// Field decomposition
export { decomposeFields, composeMillis, timeOfDayMillis } from './fields'

// Abstime
export { Abstime, PROTOCOL_EPOCH_MILLIS, compare, valueEquals, hash } from './abstime'

// Calendar arithmetic
export {
  add, subtract, delta, withTimeOfDay,
  nextDay, prevDay, nextMonth, prevMonth, nextYear, prevYear,
  nextWeekday, prevWeekday, isLeapDay,
} from './arithmetic'

// Text codec
export type { ScanError } from './text-codec'
export {
  Scanner,
  encodeAbstime, parseAbstime, decodeAbstime, formatAbstime, formatOffset,
} from './text-codec'

// Binary & markup identity
export type { BinaryFrame } from './binary'
export { BinTypeCode, ABSTIME_ELEMENT, toBinaryFrame, fromBinaryFrame } from './binary'
