/**
 * Consolidated error system for zone-rules-kit.
 *
 * All error classes extend ZoneRulesError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import them from
 * the module they use.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ZoneRulesErrorCode = {
  // Builder
  BUILDER_STATE: 'BUILDER_STATE',
  VALIDATION: 'VALIDATION',

  // Time & date
  OUT_OF_RANGE: 'OUT_OF_RANGE',
  PARSE_ERROR: 'PARSE_ERROR',
  ARITHMETIC_OVERFLOW: 'ARITHMETIC_OVERFLOW',

  // Zone resolvers
  LOCAL_TIME_GAP: 'LOCAL_TIME_GAP',
  LOCAL_TIME_OVERLAP: 'LOCAL_TIME_OVERLAP',
} as const

export type ZoneRulesErrorCode = (typeof ZoneRulesErrorCode)[keyof typeof ZoneRulesErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class ZoneRulesError extends Error {
  readonly code: ZoneRulesErrorCode

  constructor(code: ZoneRulesErrorCode, message: string) {
    super(message)
    this.name = 'ZoneRulesError'
    this.code = code
  }
}

// ============================================================================
// Builder Errors
// ============================================================================

/** A builder method was called in a state that does not allow it. */
export class BuilderStateError extends ZoneRulesError {
  constructor(message: string) {
    super(ZoneRulesErrorCode.BUILDER_STATE, message)
    this.name = 'BuilderStateError'
  }
}

export class ValidationError extends ZoneRulesError {
  constructor(message: string) {
    super(ZoneRulesErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class DateTimeRangeError extends ZoneRulesError {
  constructor(message: string) {
    super(ZoneRulesErrorCode.OUT_OF_RANGE, message)
    this.name = 'DateTimeRangeError'
  }
}

export class ParseError extends ZoneRulesError {
  constructor(message: string) {
    super(ZoneRulesErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

export class ArithmeticOverflowError extends ZoneRulesError {
  constructor(message: string) {
    super(ZoneRulesErrorCode.ARITHMETIC_OVERFLOW, message)
    this.name = 'ArithmeticOverflowError'
  }
}

// ============================================================================
// Zone Resolver Errors
// ============================================================================

export class LocalTimeGapError extends ZoneRulesError {
  constructor(message: string) {
    super(ZoneRulesErrorCode.LOCAL_TIME_GAP, message)
    this.name = 'LocalTimeGapError'
  }
}

export class LocalTimeOverlapError extends ZoneRulesError {
  constructor(message: string) {
    super(ZoneRulesErrorCode.LOCAL_TIME_OVERLAP, message)
    this.name = 'LocalTimeOverlapError'
  }
}
