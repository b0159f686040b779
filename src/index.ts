/**
 * match-trace - instrumented naive and Rabin–Karp substring search
 *
 * @example
 * ```typescript
 * import { validate, runNaive, runRabinKarp, summarize } from 'match-trace'
 *
 * const request = validate('ABABDABACDABABCABAB', 'ABABCABAB')
 * const naive = summarize(runNaive(request))
 * const rabinKarp = summarize(runRabinKarp(request, { base: 256, modulus: 101 }))
 * ```
 */

export { validate, tryValidate, estimateMemoryBytes } from './core/validation.js'
export type { ValidationResult } from './core/validation.js'
export { runNaive, scanOffset } from './core/naive.js'
export {
  runRabinKarp,
  validateRabinKarpOptions,
  modPow,
  hashWindow,
  rollHash,
  ord,
  MAX_MODULUS,
} from './core/rabin-karp.js'
export { summarize, summarizeByPhase } from './core/summary.js'
export { timed } from './core/timing.js'
export type { Timed } from './core/timing.js'
export {
  compareAlgorithms,
  DEFAULT_COMPARISON_CONFIG,
} from './core/comparison.js'
export type { AlgorithmRun, ComparisonResult } from './core/comparison.js'
export {
  defaultLogger,
  createSilentLogger,
  createMatcherLogger,
} from './core/logger.js'
export type { Logger, LogContext, LogLevel } from './core/logger.js'

export {
  ComparisonBuilder,
  StringMatchComparison,
  comparison,
} from './builder/comparison-builder.js'

export {
  generateStepTable,
  generateStepDetails,
  generateComparisonReport,
} from './report/report-generator.js'
export type {
  StepRenderOptions,
  ReportOptions,
} from './report/report-generator.js'

export * from './types/index.js'

export {
  MatchTraceError,
  InvalidInputError,
  InvalidParameterError,
} from './utils/errors.js'
export type { InvalidInputKind } from './utils/errors.js'
