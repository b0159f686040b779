/**
 * Input validation for matcher runs
 * @module core/validation
 */

import type { MatchRequest } from '../types/trace.js'
import type { ValidationOptions } from '../types/config.js'
import { MAX_TEXT_LENGTH } from '../types/config.js'
import {
  InvalidInputError,
  requireInRange,
  requireInteger,
} from '../utils/errors.js'

export type ValidationResult =
  | { ok: true; request: MatchRequest }
  | { ok: false; error: InvalidInputError }

/**
 * Size of the two input strings in bytes (UTF-16, two bytes per code unit).
 * Says nothing about the working memory of either matcher.
 */
export function estimateMemoryBytes(text: string, pattern: string): number {
  return 2 * (text.length + pattern.length)
}

/**
 * Validates a text/pattern pair and freezes it into a MatchRequest.
 *
 * Checks run in order and the first failure wins: empty text, empty
 * pattern, pattern longer than text, text longer than the maximum.
 *
 * @throws {InvalidInputError} If the pair cannot be matched
 * @throws {InvalidParameterError} If `options.maxTextLength` is out of range
 *
 * @example
 * ```typescript
 * const request = validate('ABABDABACDABABCABAB', 'ABABCABAB')
 * request.textChars.length // 19
 * ```
 */
export function validate(
  text: string,
  pattern: string,
  options: ValidationOptions = {}
): MatchRequest {
  const maxTextLength = options.maxTextLength ?? MAX_TEXT_LENGTH
  requireInteger(maxTextLength, 'maxTextLength')
  requireInRange(maxTextLength, 1, MAX_TEXT_LENGTH, 'maxTextLength')

  const textChars = Array.from(text)
  const patternChars = Array.from(pattern)

  if (textChars.length === 0) {
    throw new InvalidInputError('Text cannot be empty.', 'EMPTY_TEXT')
  }
  if (patternChars.length === 0) {
    throw new InvalidInputError('Pattern cannot be empty.', 'EMPTY_PATTERN')
  }
  if (patternChars.length > textChars.length) {
    throw new InvalidInputError(
      'Pattern cannot be longer than text.',
      'PATTERN_TOO_LONG',
      { textLength: textChars.length, patternLength: patternChars.length }
    )
  }
  if (textChars.length > maxTextLength) {
    throw new InvalidInputError(
      `Text too large (max ${maxTextLength.toLocaleString('en-US')} characters).`,
      'TEXT_TOO_LONG',
      { textLength: textChars.length, maxTextLength }
    )
  }

  return Object.freeze({
    text,
    pattern,
    textChars: Object.freeze(textChars),
    patternChars: Object.freeze(patternChars),
    memoryEstimateBytes: estimateMemoryBytes(text, pattern),
  })
}

/**
 * Non-throwing form of {@link validate}.
 * Parameter errors still throw; only input rejections are returned.
 */
export function tryValidate(
  text: string,
  pattern: string,
  options: ValidationOptions = {}
): ValidationResult {
  try {
    return { ok: true, request: validate(text, pattern, options) }
  } catch (error) {
    if (error instanceof InvalidInputError) {
      return { ok: false, error }
    }
    throw error
  }
}
