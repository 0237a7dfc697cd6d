/**
 * Core Branded Types
 */

export type { Weekday, CivilDate } from './calendar'
export type { DecomposedFields } from './fields'

declare const __duration: unique symbol

/** Signed relative time in milliseconds. */
export type Duration = number & { readonly [__duration]: true }

export function makeDuration(millis: number): Duration {
  return millis as Duration
}
