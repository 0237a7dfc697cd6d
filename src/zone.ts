/**
 * Time Zones
 *
 * A Zone turns an instant into a UTC offset and a daylight-saving flag.
 * Named zones are backed by Intl.DateTimeFormat, so the zone data is whatever
 * the runtime ships. Fixed-offset zones carry a constant offset and never
 * observe DST; they are what the text codec produces.
 */

import { MAX_INSTANT_MILLIS, MS_PER_DAY, MS_PER_HOUR, MS_PER_MINUTE, MS_PER_SECOND } from './calendar'
import { UnknownZoneError } from './errors'

// ============================================================================
// Types
// ============================================================================

export interface Zone {
  readonly id: string
  /** Offset from UTC in millis at `millis`, daylight saving included. */
  offsetAt(millis: number): number
  /** Standard (non-DST) offset from UTC in millis in effect around `millis`. */
  rawOffsetAt(millis: number): number
  inDaylightTime(millis: number): boolean
  /** Abbreviated display name, e.g. `EST` or `UTC+05:30`. */
  shortName(millis: number): string
}

export type ZoneProviderLogger = {
  warn(message: string): void
}

export type ZoneProviderConfig = {
  /** Zone used by `defaultZone()`. Defaults to the runtime's own zone. */
  defaultZone?: string
  /** Receives non-fatal warnings. Defaults to `console`. */
  logger?: ZoneProviderLogger
}

export interface ZoneProvider {
  readonly logger: ZoneProviderLogger
  utc(): Zone
  defaultZone(): Zone
  /** The zone for `id`, or undefined when the id is not known. */
  resolve(id: string): Zone | undefined
  /** Like `resolve`, but throws UnknownZoneError for an unknown id. */
  zone(id: string): Zone
  fixedOffset(offsetMillis: number): Zone
}

export const UTC_ID = 'UTC'

// ============================================================================
// Fixed-Offset Zones
// ============================================================================

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

/** `UTC` for a zero offset, otherwise `UTC+hh:mm` / `UTC-hh:mm`. */
export function fixedOffsetId(offsetMillis: number): string {
  if (offsetMillis === 0) return UTC_ID
  const abs = Math.abs(offsetMillis)
  const hours = Math.floor(abs / MS_PER_HOUR)
  const minutes = Math.floor((abs % MS_PER_HOUR) / MS_PER_MINUTE)
  return `${UTC_ID}${offsetMillis < 0 ? '-' : '+'}${pad2(hours)}:${pad2(minutes)}`
}

export function fixedOffsetZone(offsetMillis: number): Zone {
  const id = fixedOffsetId(offsetMillis)
  return {
    id,
    offsetAt: () => offsetMillis,
    rawOffsetAt: () => offsetMillis,
    inDaylightTime: () => false,
    shortName: () => id,
  }
}

const FIXED_ID_PATTERN = /^UTC([+-])(\d{2}):(\d{2})$/

function parseFixedOffsetId(id: string): number | undefined {
  const match = FIXED_ID_PATTERN.exec(id)
  if (!match) return undefined
  const hours = parseInt(match[2]!, 10)
  const minutes = parseInt(match[3]!, 10)
  if (hours > 23 || minutes > 59) return undefined
  const offset = hours * MS_PER_HOUR + minutes * MS_PER_MINUTE
  return match[1] === '-' ? -offset : offset
}

export function sameZone(a: Zone, b: Zone): boolean {
  return a === b || a.id === b.id
}

// ============================================================================
// Intl-Backed Zones
// ============================================================================

export function isValidTimezone(tz: string): boolean {
  try {
    Intl.DateTimeFormat('en-US', { timeZone: tz })
    return true
  } catch {
    return false
  }
}

/** Days from 1970-01-01 in the proleptic Gregorian calendar, which is what Intl reports. */
function prolepticDaysFromCivil(year: number, month: number, day: number): number {
  const y = month <= 2 ? year - 1 : year
  const era = Math.floor(y / 400)
  const yoe = y - era * 400
  const mp = (month + 9) % 12
  const doy = Math.floor((153 * mp + 2) / 5) + day - 1
  const doe = yoe * 365 + Math.floor(yoe / 4) - Math.floor(yoe / 100) + doy
  return era * 146097 + doe - 719468
}

function startOfSecond(millis: number): number {
  return Math.floor(millis / MS_PER_SECOND) * MS_PER_SECOND
}

/** Intl only formats `Date` time values; readings past either end use the end's offset. */
function clampToDateRange(millis: number): number {
  return Math.max(-MAX_INSTANT_MILLIS, Math.min(MAX_INSTANT_MILLIS, millis))
}

/** Noon UTC on the 15th of `monthIndex` (0-based) in `year`. */
function midMonth(year: number, monthIndex: number): number {
  return prolepticDaysFromCivil(year, monthIndex + 1, 15) * MS_PER_DAY + 12 * MS_PER_HOUR
}

function createIntlZone(id: string): Zone {
  const wallFormat = new Intl.DateTimeFormat('en-US', {
    timeZone: id,
    era: 'short',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  })
  let nameFormat: Intl.DateTimeFormat | undefined

  const offsetAt = (millis: number): number => {
    const instant = startOfSecond(clampToDateRange(millis))
    const parts = wallFormat.formatToParts(new Date(instant))
    const get = (type: Intl.DateTimeFormatPartTypes): number => {
      const part = parts.find((p) => p.type === type)
      return part ? parseInt(part.value, 10) : 0
    }
    const era = parts.find((p) => p.type === 'era')
    let year = get('year')
    if (era && era.value.startsWith('B')) year = 1 - year
    let hour = get('hour')
    if (hour === 24) hour = 0
    const wall =
      prolepticDaysFromCivil(year, get('month'), get('day')) * MS_PER_DAY +
      hour * MS_PER_HOUR +
      get('minute') * MS_PER_MINUTE +
      get('second') * MS_PER_SECOND
    return wall - instant
  }

  // Standard offset is the smaller of the January and July offsets of the year
  const rawOffsetAt = (millis: number): number => {
    const year = new Date(clampToDateRange(millis)).getUTCFullYear()
    return Math.min(offsetAt(midMonth(year, 0)), offsetAt(midMonth(year, 6)))
  }

  return {
    id,
    offsetAt,
    rawOffsetAt,
    inDaylightTime: (millis) => offsetAt(millis) > rawOffsetAt(millis),
    shortName: (millis) => {
      nameFormat ??= new Intl.DateTimeFormat('en-US', { timeZone: id, timeZoneName: 'short' })
      const part = nameFormat.formatToParts(new Date(millis)).find((p) => p.type === 'timeZoneName')
      return part ? part.value : id
    },
  }
}

// ============================================================================
// Provider
// ============================================================================

export function createZoneProvider(config: ZoneProviderConfig = {}): ZoneProvider {
  const logger = config.logger ?? console
  const utcZone = fixedOffsetZone(0)
  const named = new Map<string, Zone>()

  const resolve = (id: string): Zone | undefined => {
    if (id === UTC_ID) return utcZone
    const fixed = parseFixedOffsetId(id)
    if (fixed !== undefined) return fixedOffsetZone(fixed)

    const cached = named.get(id)
    if (cached) return cached
    if (!isValidTimezone(id)) return undefined

    const canonical = new Intl.DateTimeFormat('en-US', { timeZone: id }).resolvedOptions().timeZone
    const zone = canonical === UTC_ID ? utcZone : named.get(canonical) ?? createIntlZone(canonical)
    named.set(canonical, zone)
    named.set(id, zone)
    return zone
  }

  const zone = (id: string): Zone => {
    const found = resolve(id)
    if (!found) throw new UnknownZoneError(id)
    return found
  }

  const defaultZone = zone(config.defaultZone ?? new Intl.DateTimeFormat().resolvedOptions().timeZone)

  return {
    logger,
    utc: () => utcZone,
    defaultZone: () => defaultZone,
    resolve,
    zone,
    fixedOffset: (offsetMillis) => (offsetMillis === 0 ? utcZone : fixedOffsetZone(offsetMillis)),
  }
}
