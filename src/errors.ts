/**
 * Consolidated error system for horner-plan.
 *
 * All error classes extend HornerPlanError, which carries a typed error code.
 */

import type { Reading } from './readings'

// ============================================================================
// Error Codes
// ============================================================================

export const HornerPlanErrorCode = {
  // Plan configuration
  INVALID_CONFIG: 'INVALID_CONFIG',

  // Bookmark
  MISSING_TRANSLATION: 'MISSING_TRANSLATION',
  INVALID_DATA: 'INVALID_DATA',

  // Chapter fetching
  FETCH_FAILURE: 'FETCH_FAILURE',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',

  // Command line
  USAGE: 'USAGE',
} as const

export type HornerPlanErrorCode = (typeof HornerPlanErrorCode)[keyof typeof HornerPlanErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class HornerPlanError extends Error {
  readonly code: HornerPlanErrorCode

  constructor(code: HornerPlanErrorCode, message: string) {
    super(message)
    this.name = 'HornerPlanError'
    this.code = code
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class InvalidConfigError extends HornerPlanError {
  constructor(message: string) {
    super(HornerPlanErrorCode.INVALID_CONFIG, message)
    this.name = 'InvalidConfigError'
  }
}

// ============================================================================
// Bookmark Errors
// ============================================================================

export class MissingTranslationError extends HornerPlanError {
  constructor(message: string) {
    super(HornerPlanErrorCode.MISSING_TRANSLATION, message)
    this.name = 'MissingTranslationError'
  }
}

export class InvalidDataError extends HornerPlanError {
  constructor(message: string) {
    super(HornerPlanErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

// ============================================================================
// Fetch Errors
// ============================================================================

export class FetchFailureError extends HornerPlanError {
  readonly reading: Reading
  readonly status: number | undefined

  constructor(reading: Reading, message: string, status?: number) {
    super(HornerPlanErrorCode.FETCH_FAILURE, message)
    this.name = 'FetchFailureError'
    this.reading = reading
    this.status = status
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends HornerPlanError {
  constructor(message: string) {
    super(HornerPlanErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Command Line Errors
// ============================================================================

export class UsageError extends HornerPlanError {
  constructor(message: string) {
    super(HornerPlanErrorCode.USAGE, message)
    this.name = 'UsageError'
  }
}
