import type {
  MatchResult,
  PhaseBreakdown,
  PhaseTotals,
  RunSummary,
  StepPhase,
} from '../types/trace.js'

/**
 * Reduces a trace to its totals. Pure; never fails on a result produced by
 * one of the matchers.
 *
 * @example
 * ```typescript
 * const summary = summarize(runNaive(validate('ABC', 'XYZ')))
 * summary.totalComparisons // 1
 * summary.matchPositions   // []
 * ```
 */
export function summarize(result: MatchResult): RunSummary {
  let totalElapsedSeconds = 0
  let totalComparisons = 0

  for (const step of result.trace) {
    totalElapsedSeconds += step.elapsedSeconds
    totalComparisons += step.comparisonCount
  }

  return Object.freeze({
    algorithm: result.algorithm,
    totalElapsedSeconds,
    totalComparisons,
    matchPositions: Object.freeze([...result.matchPositions]),
    stepCount: result.trace.length,
  })
}

/**
 * Totals per phase. Phases a trace never emits report zeroes.
 */
export function summarizeByPhase(result: MatchResult): PhaseBreakdown {
  const totals: Record<StepPhase, PhaseTotals> = {
    INIT: { steps: 0, comparisons: 0, elapsedSeconds: 0 },
    CHECK: { steps: 0, comparisons: 0, elapsedSeconds: 0 },
    ROLL: { steps: 0, comparisons: 0, elapsedSeconds: 0 },
  }

  for (const step of result.trace) {
    const current = totals[step.phase]
    totals[step.phase] = {
      steps: current.steps + 1,
      comparisons: current.comparisons + step.comparisonCount,
      elapsedSeconds: current.elapsedSeconds + step.elapsedSeconds,
    }
  }

  return Object.freeze(totals)
}
