/**
 * Consolidated error system for abstime.
 *
 * All error classes extend AbstimeError, which carries a typed error code.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const AbstimeErrorCode = {
  // Text codec
  INVALID_FORMAT: 'INVALID_FORMAT',

  // Construction & calendar helpers
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',

  // Zone provider
  UNKNOWN_ZONE: 'UNKNOWN_ZONE',
} as const

export type AbstimeErrorCode = (typeof AbstimeErrorCode)[keyof typeof AbstimeErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class AbstimeError extends Error {
  readonly code: AbstimeErrorCode

  constructor(code: AbstimeErrorCode, message: string) {
    super(message)
    this.name = 'AbstimeError'
    this.code = code
  }
}

// ============================================================================
// Text Codec Errors
// ============================================================================

/**
 * Raised when text is not a well-formed abstime. `text` is the input verbatim;
 * `reason` names the part that failed.
 */
export class InvalidFormatError extends AbstimeError {
  readonly text: string
  readonly reason: string | undefined

  constructor(text: string, reason?: string) {
    super(AbstimeErrorCode.INVALID_FORMAT, `Invalid abstime: ${text}`)
    this.name = 'InvalidFormatError'
    this.text = text
    this.reason = reason
  }
}

// ============================================================================
// Argument Errors
// ============================================================================

export class InvalidArgumentError extends AbstimeError {
  constructor(message: string) {
    super(AbstimeErrorCode.INVALID_ARGUMENT, message)
    this.name = 'InvalidArgumentError'
  }
}

// ============================================================================
// Zone Errors
// ============================================================================

export class UnknownZoneError extends AbstimeError {
  readonly zoneId: string

  constructor(zoneId: string) {
    super(AbstimeErrorCode.UNKNOWN_ZONE, `Unknown time zone: '${zoneId}'`)
    this.name = 'UnknownZoneError'
    this.zoneId = zoneId
  }
}
