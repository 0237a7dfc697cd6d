/**
 * Text Codec
 *
 * The canonical text form is `YYYY-MM-DDThh:mm:ss.mmm` followed by `Z` for a
 * zero offset or `+hh:mm` / `-hh:mm` otherwise. Years outside 0000-9999 take
 * the expanded form `+YYYYYY` / `-YYYYYY`. Decoding is a fixed-position
 * scan, not a general ISO 8601 parser, and yields an Abstime in a
 * fixed-offset zone built from the parsed offset.
 */

import { Abstime } from './abstime'
import { MAX_INSTANT_MILLIS, MS_PER_HOUR, MS_PER_MINUTE, daysInMonth } from './calendar'
import { InvalidFormatError } from './errors'
import { composeMillis } from './fields'
import { Err, Ok, unwrap, type Result } from './result'
import { fixedOffsetZone } from './zone'

// ============================================================================
// Scanner
// ============================================================================

export type ScanError = {
  readonly position: number
  readonly expected: string
}

export class Scanner {
  private pos = 0

  constructor(readonly text: string) {}

  get position(): number {
    return this.pos
  }

  atEnd(): boolean {
    return this.pos >= this.text.length
  }

  peek(): string | undefined {
    return this.atEnd() ? undefined : this.text.charAt(this.pos)
  }

  private fail(expected: string): Result<never, ScanError> {
    return Err({ position: this.pos, expected })
  }

  /** Consume exactly `ch`. */
  expect(ch: string): Result<string, ScanError> {
    if (this.peek() !== ch) return this.fail(`'${ch}'`)
    this.pos++
    return Ok(ch)
  }

  /** Consume one of `choices` and return it. */
  oneOf(choices: readonly string[]): Result<string, ScanError> {
    const ch = this.peek()
    if (ch === undefined || !choices.includes(ch)) {
      return this.fail(choices.map((c) => `'${c}'`).join(' or '))
    }
    this.pos++
    return Ok(ch)
  }

  /** Consume one decimal digit. */
  digit(): Result<number, ScanError> {
    const value = this.digitValue()
    if (value === undefined) return this.fail('digit')
    this.pos++
    return Ok(value)
  }

  /** Consume exactly `count` decimal digits and return their value. */
  digits(count: number): Result<number, ScanError> {
    let value = 0
    for (let i = 0; i < count; i++) {
      const d = this.digit()
      if (!d.ok) return d
      value = value * 10 + d.value
    }
    return Ok(value)
  }

  /** Consume a digit if one is next. */
  optionalDigit(): number | undefined {
    const value = this.digitValue()
    if (value !== undefined) this.pos++
    return value
  }

  private digitValue(): number | undefined {
    if (this.atEnd()) return undefined
    const value = this.text.charCodeAt(this.pos) - 48
    return value >= 0 && value <= 9 ? value : undefined
  }
}

// ============================================================================
// Encoding
// ============================================================================

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad3(n: number): string {
  if (n < 10) return '00' + n
  if (n < 100) return '0' + n
  return '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

function formatYear(year: number): string {
  if (year >= 0 && year <= 9999) return pad4(year)
  return (year < 0 ? '-' : '+') + String(Math.abs(year)).padStart(6, '0')
}

/** `Z`, or `+hh:mm` / `-hh:mm` from the magnitude of the offset. */
export function formatOffset(offsetMillis: number): string {
  if (offsetMillis === 0) return 'Z'
  const abs = Math.abs(offsetMillis)
  const hours = Math.floor(abs / MS_PER_HOUR)
  const minutes = Math.floor((abs % MS_PER_HOUR) / MS_PER_MINUTE)
  return `${offsetMillis < 0 ? '-' : '+'}${pad2(hours)}:${pad2(minutes)}`
}

export function encodeAbstime(t: Abstime): string {
  return (
    `${formatYear(t.year)}-${pad2(t.month)}-${pad2(t.day)}` +
    `T${pad2(t.hour)}:${pad2(t.minute)}:${pad2(t.second)}.${pad3(t.millisecond)}` +
    formatOffset(t.timeZoneOffset())
  )
}

// ============================================================================
// Decoding
// ============================================================================

type ParsedFields = {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  millisecond: number
  offset: number
}

function scanYear(s: Scanner): Result<number, ScanError> {
  const sign = s.peek()
  if (sign !== '+' && sign !== '-') return s.digits(4)
  s.expect(sign)
  const magnitude = s.digits(6)
  if (!magnitude.ok) return magnitude
  return Ok(sign === '-' ? -magnitude.value : magnitude.value)
}

function scanFields(s: Scanner): Result<ParsedFields, ScanError> {
  const year = scanYear(s)
  if (!year.ok) return year
  let sep = s.expect('-')
  if (!sep.ok) return sep
  const month = s.digits(2)
  if (!month.ok) return month
  sep = s.expect('-')
  if (!sep.ok) return sep
  const day = s.digits(2)
  if (!day.ok) return day
  sep = s.expect('T')
  if (!sep.ok) return sep
  const hour = s.digits(2)
  if (!hour.ok) return hour
  sep = s.expect(':')
  if (!sep.ok) return sep
  const minute = s.digits(2)
  if (!minute.ok) return minute
  sep = s.expect(':')
  if (!sep.ok) return sep
  const second = s.digits(2)
  if (!second.ok) return second

  let millisecond = 0
  if (s.peek() === '.') {
    s.expect('.')
    const first = s.digit()
    if (!first.ok) return first
    millisecond = first.value * 100
    const tens = s.optionalDigit()
    if (tens !== undefined) {
      millisecond += tens * 10
      const ones = s.optionalDigit()
      if (ones !== undefined) millisecond += ones
    }
    // Digits past millisecond precision are dropped
    while (s.optionalDigit() !== undefined) continue
  }

  const sign = s.oneOf(['Z', '+', '-'])
  if (!sign.ok) return sign

  let offset = 0
  if (sign.value !== 'Z') {
    const first = s.digit()
    if (!first.ok) return first
    let offsetHours = first.value
    if (!s.atEnd() && s.peek() !== ':') {
      const ones = s.digit()
      if (!ones.ok) return ones
      offsetHours = offsetHours * 10 + ones.value
    }
    let offsetMinutes = 0
    if (!s.atEnd()) {
      sep = s.expect(':')
      if (!sep.ok) return sep
      const minutes = s.digits(2)
      if (!minutes.ok) return minutes
      offsetMinutes = minutes.value
    }
    if (offsetHours > 23 || offsetMinutes > 59) {
      return Err({ position: s.position, expected: 'offset within ±23:59' })
    }
    offset = offsetHours * MS_PER_HOUR + offsetMinutes * MS_PER_MINUTE
    if (sign.value === '-') offset = -offset
  }

  if (!s.atEnd()) return Err({ position: s.position, expected: 'end of text' })

  return Ok({
    year: year.value,
    month: month.value,
    day: day.value,
    hour: hour.value,
    minute: minute.value,
    second: second.value,
    millisecond,
    offset,
  })
}

function checkRanges(f: ParsedFields): string | undefined {
  if (f.month < 1 || f.month > 12) return 'month out of range'
  if (f.day < 1 || f.day > daysInMonth(f.year, f.month)) return 'day out of range'
  if (f.hour > 23) return 'hour out of range'
  if (f.minute > 59) return 'minute out of range'
  if (f.second > 59) return 'second out of range'
  return undefined
}

export function parseAbstime(text: string): Result<Abstime, InvalidFormatError> {
  const scanned = scanFields(new Scanner(text))
  if (!scanned.ok) {
    const { expected, position } = scanned.error
    return Err(new InvalidFormatError(text, `expected ${expected} at ${position}`))
  }

  const f = scanned.value
  const rangeError = checkRanges(f)
  if (rangeError) return Err(new InvalidFormatError(text, rangeError))

  const zone = fixedOffsetZone(f.offset)
  const millis = composeMillis(f.year, f.month, f.day, f.hour, f.minute, f.second, f.millisecond, zone)
  if (Math.abs(millis) > MAX_INSTANT_MILLIS) return Err(new InvalidFormatError(text, 'instant out of range'))
  return Ok(Abstime.fromMillis(millis, zone))
}

/** Like parseAbstime, but throws InvalidFormatError. */
export function decodeAbstime(text: string): Abstime {
  return unwrap(parseAbstime(text))
}

// ============================================================================
// Display
// ============================================================================

const MONTH_ABBREVIATIONS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec']

/** Human display as `HH:mm:ss dd-MMM-yy z`, or `null` for the "no value" state. */
export function formatAbstime(t: Abstime): string {
  if (t.isNull()) return 'null'
  const yy = pad2(((t.year % 100) + 100) % 100)
  return (
    `${pad2(t.hour)}:${pad2(t.minute)}:${pad2(t.second)} ` +
    `${pad2(t.day)}-${MONTH_ABBREVIATIONS[t.month - 1]!}-${yy} ` +
    t.zone.shortName(t.millis)
  )
}
