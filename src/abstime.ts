/**
 * Abstime
 *
 * An absolute point in time as integer millis since 1970-01-01T00:00:00Z,
 * viewed through a Zone. Ordering, equality and hashing use only the millis;
 * the zone drives the civil fields, which are decomposed on first access and
 * cached until `set` or `setTz` changes the millis or the zone.
 *
 * Also carries the advisory facets `min`, `max` and `tz`. Nothing enforces
 * them.
 */

import { InvalidArgumentError } from './errors'
import { composeMillis, decomposeFields, timeOfDayMillis, type DecomposedFields } from './fields'
import { MAX_INSTANT_MILLIS, type Weekday } from './calendar'
import { sameZone, type Zone, type ZoneProvider } from './zone'

/** Millis from 1970-01-01T00:00:00Z to the protocol epoch 2000-01-01T00:00:00Z. */
export const PROTOCOL_EPOCH_MILLIS = 946684800000

function checkMillis(millis: number): number {
  if (!Number.isSafeInteger(millis)) {
    throw new InvalidArgumentError(`Millis must be an integer: ${millis}`)
  }
  if (Math.abs(millis) > MAX_INSTANT_MILLIS) {
    throw new InvalidArgumentError(`Millis outside the Date range: ${millis}`)
  }
  return millis
}

export class Abstime {
  private _millis = 0
  private _zone: Zone
  private _fields: DecomposedFields | undefined
  private _explicit = false
  private _tz: string | undefined
  private _min: Abstime | undefined
  private _max: Abstime | undefined

  private constructor(zone: Zone) {
    this._zone = zone
    this._tz = zone.id
  }

  // ==========================================================================
  // Construction
  // ==========================================================================

  static fromMillis(millis: number, zone: Zone): Abstime {
    const t = new Abstime(zone)
    t.set(millis, zone)
    return t
  }

  /**
   * Build from civil components read in `zone`. Throws InvalidArgumentError
   * when `month` is outside 1-12.
   */
  static fromFields(
    year: number,
    month: number,
    day: number,
    hour: number,
    minute: number,
    second: number,
    millisecond: number,
    zone: Zone
  ): Abstime {
    return Abstime.fromMillis(
      composeMillis(year, month, day, hour, minute, second, millisecond, zone),
      zone
    )
  }

  /** Same instant, different zone. */
  static withZone(t: Abstime, zone: Zone): Abstime {
    return Abstime.fromMillis(t._millis, zone)
  }

  /** The "no value" state: millis 0, never set. */
  static empty(zone: Zone): Abstime {
    return new Abstime(zone)
  }

  // ==========================================================================
  // Value
  // ==========================================================================

  get millis(): number {
    return this._millis
  }

  get zone(): Zone {
    return this._zone
  }

  get millisSinceProtocolEpoch(): number {
    return this._millis - PROTOCOL_EPOCH_MILLIS
  }

  get(): number {
    return this._millis
  }

  /** Replace millis and zone together. */
  set(millis: number, zone: Zone): void {
    this._fields = undefined
    this._millis = checkMillis(millis)
    this._zone = zone
    this._tz = zone.id
    this._explicit = true
  }

  isNull(): boolean {
    return this._millis === 0 && !this._explicit
  }

  // ==========================================================================
  // Civil Fields
  // ==========================================================================

  /** True once the civil fields have been decomposed for the current millis and zone. */
  get hasFields(): boolean {
    return this._fields !== undefined
  }

  private fields(): DecomposedFields {
    if (this._fields === undefined) {
      this._fields = decomposeFields(this._millis, this._zone)
    }
    return this._fields
  }

  get year(): number {
    return this.fields().year
  }

  /** 1-12 */
  get month(): number {
    return this.fields().month
  }

  /** 1-31 */
  get day(): number {
    return this.fields().day
  }

  get hour(): number {
    return this.fields().hour
  }

  get minute(): number {
    return this.fields().minute
  }

  get second(): number {
    return this.fields().second
  }

  get millisecond(): number {
    return this.fields().millisecond
  }

  /** 0 = Sunday through 6 = Saturday */
  get weekday(): Weekday {
    return this.fields().weekday
  }

  /** Millis into the day, e.g. 1:00 AM is 3600000. */
  get timeOfDayMillis(): number {
    return timeOfDayMillis(this.fields())
  }

  inDaylightTime(): boolean {
    return this.fields().daylight
  }

  /** Offset from UTC in millis, daylight saving included. */
  timeZoneOffset(): number {
    return this._zone.offsetAt(this._millis)
  }

  // ==========================================================================
  // Zone Views
  // ==========================================================================

  toLocalTime(provider: ZoneProvider): Abstime {
    const local = provider.defaultZone()
    return sameZone(this._zone, local) ? this : Abstime.withZone(this, local)
  }

  toUtcTime(provider: ZoneProvider): Abstime {
    const utc = provider.utc()
    return sameZone(this._zone, utc) ? this : Abstime.withZone(this, utc)
  }

  // ==========================================================================
  // Comparison
  // ==========================================================================

  compareTo(that: Abstime): -1 | 0 | 1 {
    return compare(this, that)
  }

  isBefore(that: Abstime): boolean {
    return this._millis < that._millis
  }

  isAfter(that: Abstime): boolean {
    return this._millis > that._millis
  }

  /** Equal millis, whatever the zones. */
  valueEquals(that: unknown): boolean {
    return that instanceof Abstime && that._millis === this._millis
  }

  hashCode(): number {
    return hash(this)
  }

  dateEquals(that: Abstime): boolean {
    return that.year === this.year && that.month === this.month && that.day === this.day
  }

  timeEquals(that: Abstime): boolean {
    return that.timeOfDayMillis === this.timeOfDayMillis
  }

  // ==========================================================================
  // Facets
  // ==========================================================================

  get min(): Abstime | undefined {
    return this._min
  }

  set min(min: Abstime | undefined) {
    this._min = min
  }

  get max(): Abstime | undefined {
    return this._max
  }

  set max(max: Abstime | undefined) {
    this._max = max
  }

  get tz(): string | undefined {
    return this._tz
  }

  /**
   * Declare the zone by id. An id the provider cannot resolve is logged and
   * ignored. A resolved zone replaces the current one for field derivation;
   * millis never change.
   */
  setTz(tz: string | undefined, provider: ZoneProvider): void {
    if (tz === undefined) return
    const zone = provider.resolve(tz)
    if (!zone) {
      provider.logger.warn(`No time zone for tz facet: ${tz}`)
      return
    }
    if (!sameZone(zone, this._zone)) {
      this._fields = undefined
    }
    this._tz = tz
    this._zone = zone
  }
}

// ============================================================================
// Ordering & Hashing
// ============================================================================

export function compare(a: Abstime, b: Abstime): -1 | 0 | 1 {
  if (a.millis < b.millis) return -1
  if (a.millis > b.millis) return 1
  return 0
}

export function valueEquals(a: Abstime, b: Abstime): boolean {
  return a.millis === b.millis
}

/** XOR of the high and low 32-bit halves of the millis, as a signed 32-bit int. */
export function hash(t: Abstime): number {
  const m = BigInt(t.millis)
  return Number(BigInt.asIntN(32, m ^ (m >> 32n)))
}
