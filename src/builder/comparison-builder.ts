import type {
  ComparisonConfig,
  RabinKarpOptions,
} from '../types/config.js'
import { MAX_TEXT_LENGTH } from '../types/config.js'
import type { Logger } from '../core/logger.js'
import type { ComparisonResult } from '../core/comparison.js'
import {
  compareAlgorithms,
  DEFAULT_COMPARISON_CONFIG,
} from '../core/comparison.js'
import { validateRabinKarpOptions } from '../core/rabin-karp.js'
import {
  generateComparisonReport,
  type ReportOptions,
} from '../report/report-generator.js'
import {
  requireInRange,
  requireInteger,
  requireLogger,
} from '../utils/errors.js'

/**
 * A configured comparison, ready to run against any text/pattern pair.
 */
export class StringMatchComparison {
  constructor(private readonly config: ComparisonConfig) {}

  getConfig(): ComparisonConfig {
    return { ...this.config, rabinKarp: { ...this.config.rabinKarp } }
  }

  /**
   * Validates, runs both matchers and summarises them.
   *
   * @throws {InvalidInputError} If the text/pattern pair is rejected
   */
  run(text: string, pattern: string): ComparisonResult {
    return compareAlgorithms(text, pattern, {
      maxTextLength: this.config.maxTextLength,
      rabinKarp: this.config.rabinKarp,
      logger: this.config.logger,
    })
  }

  /**
   * Renders a markdown report, limiting the Rabin–Karp table and details to the
   * configured step limit unless `options.stepLimit` overrides it.
   */
  report(
    comparison: ComparisonResult,
    options: ReportOptions = {}
  ): string {
    return generateComparisonReport(comparison, {
      ...options,
      stepLimit: options.stepLimit ?? this.config.reportStepLimit,
    })
  }
}

/**
 * Fluent builder for comparison configuration.
 *
 * @example
 * ```typescript
 * const comparison = new ComparisonBuilder()
 *   .rabinKarp({ base: 31, modulus: 1_000_003 })
 *   .maxTextLength(5_000)
 *   .build()
 *
 * const result = comparison.run('AAAA', 'AA')
 * ```
 */
export class ComparisonBuilder {
  private config: ComparisonConfig = {
    ...DEFAULT_COMPARISON_CONFIG,
    rabinKarp: { ...DEFAULT_COMPARISON_CONFIG.rabinKarp },
  }

  /**
   * Lowers the text length cap. The cap can never exceed 20,000.
   */
  maxTextLength(maxTextLength: number): this {
    requireInteger(maxTextLength, 'maxTextLength')
    requireInRange(maxTextLength, 1, MAX_TEXT_LENGTH, 'maxTextLength')
    this.config.maxTextLength = maxTextLength
    return this
  }

  /**
   * Sets the hash parameters. Omitted fields keep their current values.
   */
  rabinKarp(options: Partial<RabinKarpOptions>): this {
    this.config.rabinKarp = validateRabinKarpOptions({
      ...this.config.rabinKarp,
      ...options,
    })
    return this
  }

  reportStepLimit(limit: number): this {
    requireInteger(limit, 'reportStepLimit')
    requireInRange(limit, 0, Number.MAX_SAFE_INTEGER, 'reportStepLimit')
    this.config.reportStepLimit = limit
    return this
  }

  logger(logger: Logger): this {
    requireLogger(logger, 'logger')
    this.config.logger = logger
    return this
  }

  getConfig(): ComparisonConfig {
    return { ...this.config, rabinKarp: { ...this.config.rabinKarp } }
  }

  build(): StringMatchComparison {
    return new StringMatchComparison(this.getConfig())
  }
}

/**
 * Entry point for the fluent API.
 */
export function comparison(): ComparisonBuilder {
  return new ComparisonBuilder()
}
