import type { Logger } from '../core/logger.js'

/** Upper bound on text length, in code points */
export const MAX_TEXT_LENGTH = 20_000

/** Default radix for the Rabin–Karp polynomial hash */
export const DEFAULT_BASE = 256

/** Default prime modulus for the Rabin–Karp polynomial hash */
export const DEFAULT_MODULUS = 101

/** Steps of the Rabin–Karp trace shown in generated reports */
export const DEFAULT_REPORT_STEP_LIMIT = 60

/**
 * Options accepted by the validator.
 */
export interface ValidationOptions {
  /** Maximum text length in code points (default: 20,000, never higher) */
  maxTextLength?: number
}

/**
 * Hash parameters for the Rabin–Karp matcher.
 * Both must be integers >= 2; see `validateRabinKarpOptions` for the
 * safe-integer bounds.
 */
export interface RabinKarpOptions {
  /** Radix of the polynomial hash (default: 256) */
  base: number
  /** Modulus of the polynomial hash (default: 101) */
  modulus: number
}

/**
 * Complete configuration for a side-by-side comparison run.
 */
export interface ComparisonConfig {
  maxTextLength: number
  rabinKarp: RabinKarpOptions
  /** How many Rabin–Karp steps a report renders */
  reportStepLimit: number
  logger: Logger
}

/**
 * Overrides accepted wherever a ComparisonConfig is expected.
 * Unset fields fall back to the defaults.
 */
export interface ComparisonOptions {
  maxTextLength?: number
  rabinKarp?: Partial<RabinKarpOptions>
  reportStepLimit?: number
  logger?: Logger
}

/** Options that affect the matcher runs themselves */
export type RunOptions = Omit<ComparisonOptions, 'reportStepLimit'>
