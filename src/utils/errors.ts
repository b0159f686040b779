/**
 * Central error classes and validation utilities for match-trace
 * @module utils/errors
 */

/**
 * Base error class for all match-trace errors
 */
export class MatchTraceError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'MatchTraceError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Why a text/pattern pair was rejected
 */
export type InvalidInputKind =
  | 'EMPTY_TEXT'
  | 'EMPTY_PATTERN'
  | 'PATTERN_TOO_LONG'
  | 'TEXT_TOO_LONG'

/**
 * Error thrown when a text/pattern pair fails validation.
 * No matcher runs after this is thrown.
 */
export class InvalidInputError extends MatchTraceError {
  public readonly kind: InvalidInputKind
  public readonly reason: string

  constructor(
    reason: string,
    kind: InvalidInputKind,
    context?: Record<string, unknown>
  ) {
    super(reason, 'INVALID_INPUT', { kind, ...context })
    this.name = 'InvalidInputError'
    this.kind = kind
    this.reason = reason
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends MatchTraceError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a value is an integer
 */
export function requireInteger(value: number, parameterName: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be an integer'
    )
  }
  return value
}

/**
 * Validates that a number is within a specific range (inclusive)
 */
export function requireInRange(
  value: number,
  min: number,
  max: number,
  parameterName: string
): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a number'
    )
  }
  if (value < min || value > max) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be between ${min} and ${max} (inclusive)`
    )
  }
  return value
}

/**
 * Validates that an object is a valid plain object (not null, not array)
 */
export function requirePlainObject(
  value: unknown,
  parameterName: string
): Record<string, unknown> {
  if (
    typeof value !== 'object' ||
    value === null ||
    Array.isArray(value)
  ) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a plain object'
    )
  }
  return Object.fromEntries(Object.entries(value))
}

/**
 * Validates that a logger-like object exposes every log level, on the
 * object itself or its prototype chain
 */
export function requireLogger(value: unknown, parameterName: string): void {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a plain object'
    )
  }
  for (const level of ['debug', 'info', 'warn', 'error']) {
    if (typeof Reflect.get(value, level) !== 'function') {
      throw new InvalidParameterError(
        parameterName,
        value,
        `must implement ${level}()`
      )
    }
  }
}
