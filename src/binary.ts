/**
 * Binary & Markup Identity
 *
 * What an external binary or markup encoder needs from an Abstime: the type
 * code in the binary registry, the element name, and the millis relative to
 * the 2000-01-01T00:00:00Z protocol epoch. Framing is the encoder's business.
 */

import { Abstime, PROTOCOL_EPOCH_MILLIS } from './abstime'
import type { Zone } from './zone'

export { PROTOCOL_EPOCH_MILLIS }

/** Type codes of the binary value registry. */
export const BinTypeCode = {
  OBJ: 0x01,
  BOOL: 0x02,
  INT: 0x03,
  REAL: 0x04,
  STR: 0x05,
  ENUM: 0x06,
  URI: 0x07,
  ABSTIME: 0x08,
  RELTIME: 0x09,
  DATE: 0x0a,
  TIME: 0x0b,
} as const

export type BinTypeCode = (typeof BinTypeCode)[keyof typeof BinTypeCode]

export const ABSTIME_ELEMENT = 'abstime'

export type BinaryFrame = {
  readonly typeCode: typeof BinTypeCode.ABSTIME
  readonly millisSinceProtocolEpoch: number
}

export function toBinaryFrame(t: Abstime): BinaryFrame {
  return {
    typeCode: BinTypeCode.ABSTIME,
    millisSinceProtocolEpoch: t.millisSinceProtocolEpoch,
  }
}

export function fromBinaryFrame(frame: BinaryFrame, zone: Zone): Abstime {
  return Abstime.fromMillis(frame.millisSinceProtocolEpoch + PROTOCOL_EPOCH_MILLIS, zone)
}
