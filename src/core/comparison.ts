/**
 * Side-by-side runs of both matchers over one validated request
 * @module core/comparison
 */

import { v4 as uuidv4 } from 'uuid'
import type {
  MatchRequest,
  NaiveResult,
  RabinKarpResult,
  RunSummary,
} from '../types/trace.js'
import type {
  ComparisonConfig,
  RunOptions,
} from '../types/config.js'
import {
  DEFAULT_BASE,
  DEFAULT_MODULUS,
  DEFAULT_REPORT_STEP_LIMIT,
  MAX_TEXT_LENGTH,
} from '../types/config.js'
import { InvalidInputError } from '../utils/errors.js'
import { createMatcherLogger, createSilentLogger } from './logger.js'
import { validate } from './validation.js'
import { runNaive } from './naive.js'
import { runRabinKarp, validateRabinKarpOptions } from './rabin-karp.js'
import { summarize } from './summary.js'

export const DEFAULT_COMPARISON_CONFIG: ComparisonConfig = {
  maxTextLength: MAX_TEXT_LENGTH,
  rabinKarp: { base: DEFAULT_BASE, modulus: DEFAULT_MODULUS },
  reportStepLimit: DEFAULT_REPORT_STEP_LIMIT,
  logger: createSilentLogger(),
}

export interface AlgorithmRun<R> {
  result: R
  summary: RunSummary
}

export interface ComparisonResult {
  /** Unique id of this comparison run */
  id: string
  /** Text length in code points */
  textLength: number
  /** Pattern length in code points */
  patternLength: number
  naive: AlgorithmRun<NaiveResult>
  rabinKarp: AlgorithmRun<RabinKarpResult>
  /** Whether both matchers reported the same offsets */
  positionsAgree: boolean
  /** Fraction of the combined run time spent in each matcher */
  timeShare: { naive: number; rabinKarp: number }
}

function samePositions(
  a: readonly number[],
  b: readonly number[]
): boolean {
  return a.length === b.length && a.every((p, i) => p === b[i])
}

function computeTimeShare(
  naive: RunSummary,
  rabinKarp: RunSummary
): { naive: number; rabinKarp: number } {
  const total = naive.totalElapsedSeconds + rabinKarp.totalElapsedSeconds
  if (total <= 0) {
    return { naive: 0.5, rabinKarp: 0.5 }
  }
  return {
    naive: naive.totalElapsedSeconds / total,
    rabinKarp: rabinKarp.totalElapsedSeconds / total,
  }
}

/**
 * Validates the input, then runs the naive matcher followed by Rabin–Karp on
 * the same frozen request and summarises both.
 *
 * Validation is all-or-nothing: if it throws, neither matcher runs.
 *
 * @throws {InvalidInputError} If the text/pattern pair is rejected
 * @throws {InvalidParameterError} If the hash parameters are unusable
 *
 * @example
 * ```typescript
 * const comparison = compareAlgorithms('ABABDABACDABABCABAB', 'ABABCABAB')
 * comparison.naive.summary.matchPositions     // [10]
 * comparison.rabinKarp.summary.matchPositions // [10]
 * ```
 */
export function compareAlgorithms(
  text: string,
  pattern: string,
  options: RunOptions = {}
): ComparisonResult {
  const maxTextLength =
    options.maxTextLength ?? DEFAULT_COMPARISON_CONFIG.maxTextLength
  const logger = options.logger ?? DEFAULT_COMPARISON_CONFIG.logger
  const hashOptions = validateRabinKarpOptions(options.rabinKarp)

  let request: MatchRequest
  try {
    request = validate(text, pattern, { maxTextLength })
  } catch (error) {
    if (error instanceof InvalidInputError) {
      logger.warn('Input rejected', { kind: error.kind, reason: error.reason })
    }
    throw error
  }

  const id = uuidv4()
  const textLength = request.textChars.length
  const patternLength = request.patternChars.length

  const naiveResult = runNaive(request)
  const naiveSummary = summarize(naiveResult)
  createMatcherLogger(logger, 'naive', id).debug('Run complete', {
    steps: naiveSummary.stepCount,
    comparisons: naiveSummary.totalComparisons,
    matches: naiveSummary.matchPositions.length,
  })

  const rabinKarpResult = runRabinKarp(request, hashOptions)
  const rabinKarpSummary = summarize(rabinKarpResult)
  createMatcherLogger(logger, 'rabin-karp', id).debug('Run complete', {
    steps: rabinKarpSummary.stepCount,
    comparisons: rabinKarpSummary.totalComparisons,
    matches: rabinKarpSummary.matchPositions.length,
    base: hashOptions.base,
    modulus: hashOptions.modulus,
  })

  const positionsAgree = samePositions(
    naiveSummary.matchPositions,
    rabinKarpSummary.matchPositions
  )
  if (!positionsAgree) {
    logger.error('Matchers disagree on match positions', {
      id,
      naive: naiveSummary.matchPositions,
      rabinKarp: rabinKarpSummary.matchPositions,
    })
  }

  logger.info('Comparison complete', { id, textLength, patternLength })

  return {
    id,
    textLength,
    patternLength,
    naive: { result: naiveResult, summary: naiveSummary },
    rabinKarp: { result: rabinKarpResult, summary: rabinKarpSummary },
    positionsAgree,
    timeShare: computeTimeShare(naiveSummary, rabinKarpSummary),
  }
}
