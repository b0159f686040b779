import { describe, it, expect } from 'vitest'
import {
  MatchTraceError,
  InvalidInputError,
  InvalidParameterError,
  requireInteger,
  requireInRange,
  requirePlainObject,
  requireLogger,
} from '../../../src/utils/errors.js'
import { createSilentLogger } from '../../../src/core/logger.js'

describe('MatchTraceError', () => {
  it('creates a base error', () => {
    const error = new MatchTraceError('Test error', 'TEST_ERROR')

    expect(error).toBeInstanceOf(Error)
    expect(error).toBeInstanceOf(MatchTraceError)
    expect(error.message).toBe('Test error')
    expect(error.code).toBe('TEST_ERROR')
    expect(error.name).toBe('MatchTraceError')
  })

  it('includes context when provided', () => {
    const error = new MatchTraceError('Test error', 'TEST_ERROR', {
      offset: 3,
    })

    expect(error.context).toEqual({ offset: 3 })
  })

  it('captures stack trace', () => {
    const error = new MatchTraceError('Test error', 'TEST_ERROR')

    expect(error.stack).toBeDefined()
  })
})

describe('InvalidInputError', () => {
  it('carries the reason and kind', () => {
    const error = new InvalidInputError(
      'Pattern cannot be empty.',
      'EMPTY_PATTERN'
    )

    expect(error).toBeInstanceOf(MatchTraceError)
    expect(error.message).toBe('Pattern cannot be empty.')
    expect(error.reason).toBe('Pattern cannot be empty.')
    expect(error.kind).toBe('EMPTY_PATTERN')
    expect(error.code).toBe('INVALID_INPUT')
    expect(error.name).toBe('InvalidInputError')
    expect(error.context).toEqual({ kind: 'EMPTY_PATTERN' })
  })
})

describe('InvalidParameterError', () => {
  it('formats the parameter name and reason', () => {
    const error = new InvalidParameterError('modulus', 1, 'must be >= 2')

    expect(error.message).toBe("Invalid parameter 'modulus': must be >= 2")
    expect(error.code).toBe('INVALID_PARAMETER')
    expect(error.parameterName).toBe('modulus')
    expect(error.value).toBe(1)
    expect(error.context).toEqual({
      parameterName: 'modulus',
      value: 1,
      reason: 'must be >= 2',
    })
  })
})

describe('validation utilities', () => {
  describe('requireInteger', () => {
    it('returns integers unchanged', () => {
      expect(requireInteger(256, 'base')).toBe(256)
    })

    it('rejects fractions and NaN', () => {
      expect(() => requireInteger(2.5, 'base')).toThrow(
        "Invalid parameter 'base': must be an integer"
      )
      expect(() => requireInteger(NaN, 'base')).toThrow(InvalidParameterError)
    })
  })

  describe('requireInRange', () => {
    it('accepts both bounds', () => {
      expect(requireInRange(1, 1, 10, 'limit')).toBe(1)
      expect(requireInRange(10, 1, 10, 'limit')).toBe(10)
    })

    it('rejects values outside the range', () => {
      expect(() => requireInRange(11, 1, 10, 'limit')).toThrow(
        "Invalid parameter 'limit': must be between 1 and 10 (inclusive)"
      )
    })
  })

  describe('requirePlainObject', () => {
    it('rejects arrays and null', () => {
      expect(() => requirePlainObject([], 'options')).toThrow(
        InvalidParameterError
      )
      expect(() => requirePlainObject(null, 'options')).toThrow(
        InvalidParameterError
      )
    })

    it('returns the object entries', () => {
      expect(requirePlainObject({ base: 2 }, 'options')).toEqual({ base: 2 })
    })
  })

  describe('requireLogger', () => {
    it('accepts a complete logger', () => {
      expect(() => requireLogger(createSilentLogger(), 'logger')).not.toThrow()
    })

    it('finds levels on the prototype chain', () => {
      class ConsoleSink {
        debug(): void {}
        info(): void {}
        warn(): void {}
        error(): void {}
      }

      expect(() => requireLogger(new ConsoleSink(), 'logger')).not.toThrow()
    })

    it('rejects arrays', () => {
      expect(() => requireLogger([], 'logger')).toThrow(
        "Invalid parameter 'logger': must be a plain object"
      )
    })

    it('names the missing level', () => {
      expect(() =>
        requireLogger({ debug: () => {}, info: () => {} }, 'logger')
      ).toThrow("Invalid parameter 'logger': must implement warn()")
    })
  })
})
