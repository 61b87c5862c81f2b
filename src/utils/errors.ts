/**
 * Central error classes and validation utilities for record-scrubber
 * @module utils/errors
 */

/**
 * Base error class for all record-scrubber errors
 */
export class ScrubberError extends Error {
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
    this.name = 'ScrubberError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a source file yields no recoverable records
 */
export class LoadError extends ScrubberError {
  /** Path or label of the source that failed */
  public readonly source: string

  constructor(source: string, reason: string, context?: Record<string, unknown>) {
    super(`Cannot load records from '${source}': ${reason}`, 'LOAD_ERROR', {
      source,
      reason,
      ...context,
    })
    this.name = 'LoadError'
    this.source = source
  }
}

/**
 * Error thrown when there is nothing to merge
 */
export class MergeError extends ScrubberError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'MERGE_ERROR', context)
    this.name = 'MergeError'
  }
}

/**
 * Error thrown when the output file cannot be written
 */
export class IOError extends ScrubberError {
  /** Target path of the failed write */
  public readonly path: string

  constructor(path: string, reason: string, context?: Record<string, unknown>) {
    super(`Cannot write output to '${path}': ${reason}`, 'IO_ERROR', {
      path,
      reason,
      ...context,
    })
    this.name = 'IOError'
    this.path = path
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends ScrubberError {
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

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends ScrubberError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Extracts a readable message from anything thrown
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a number is positive (> 0)
 */
export function requirePositive(value: number, parameterName: string): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a number'
    )
  }
  if (value <= 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be positive (> 0)'
    )
  }
  return value
}

/**
 * Validates that a number is an integer within a specific range (inclusive)
 */
export function requireIntegerInRange(
  value: number,
  min: number,
  max: number,
  parameterName: string
): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be an integer'
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
 * Validates that an array is non-empty
 */
export function requireNonEmptyArray<T>(
  value: readonly T[],
  parameterName: string
): readonly T[] {
  if (!Array.isArray(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be an array'
    )
  }
  if (value.length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: string, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a string'
    )
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Validates that a string is exactly one character long
 */
export function requireSingleCharacter(value: string, parameterName: string): string {
  if (typeof value !== 'string' || Array.from(value).length !== 1) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a single character'
    )
  }
  return value
}

/**
 * Validates that a value is one of the allowed options
 */
export function requireOneOf<T>(
  value: T,
  allowedValues: readonly T[],
  parameterName: string
): T {
  if (!allowedValues.includes(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be one of: ${allowedValues.join(', ')}`
    )
  }
  return value
}

/**
 * Check if an error is a record-scrubber error
 */
export function isScrubberError(error: unknown): error is ScrubberError {
  return error instanceof ScrubberError
}
