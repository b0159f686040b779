import type {
  NaiveResult,
  RabinKarpResult,
  RunSummary,
} from '../../src/types/trace.js'
import type { ComparisonResult } from '../../src/core/comparison.js'

/**
 * Hand-built Rabin–Karp result with exact, binary-friendly timings.
 * Text "xAB", pattern "AB": hash mismatch at 0, match at 1.
 */
export const fixedRabinKarpResult: RabinKarpResult = {
  algorithm: 'rabin-karp',
  matchPositions: [1],
  trace: [
    {
      phase: 'INIT',
      comparisonCount: 0,
      patternHash: 4,
      textWindowHash: 2,
      highOrderFactor: 3,
      elapsedSeconds: 0.5,
      memoryEstimateBytes: 12_345,
      detailLines: ['initial p_hash=4, t_hash=2, h=3'],
    },
    {
      phase: 'CHECK',
      position: 0,
      matched: false,
      hashMatched: false,
      comparisonCount: 0,
      patternHash: 4,
      textWindowHash: 2,
      elapsedSeconds: 0.25,
      memoryEstimateBytes: 12_345,
      detailLines: ['Hash mismatch: 4 vs 2'],
    },
    {
      phase: 'ROLL',
      position: 1,
      comparisonCount: 0,
      patternHash: 4,
      textWindowHash: 4,
      elapsedSeconds: 0.125,
      memoryEstimateBytes: 12_345,
      detailLines: ['rolled t_hash -> 4'],
    },
    {
      phase: 'CHECK',
      position: 1,
      matched: true,
      hashMatched: true,
      comparisonCount: 2,
      patternHash: 4,
      textWindowHash: 4,
      elapsedSeconds: 0.125,
      memoryEstimateBytes: 12_345,
      detailLines: ["t[1]='A' == p[0]='A'", "t[2]='B' == p[1]='B'"],
    },
  ],
}

export const fixedNaiveResult: NaiveResult = {
  algorithm: 'naive',
  matchPositions: [1],
  trace: [
    {
      phase: 'CHECK',
      position: 0,
      matched: false,
      comparisonCount: 1,
      elapsedSeconds: 0.5,
      memoryEstimateBytes: 12_345,
      detailLines: ["t[0]='x' != p[0]='A' (stop)"],
    },
    {
      phase: 'CHECK',
      position: 1,
      matched: true,
      comparisonCount: 2,
      elapsedSeconds: 0.5,
      memoryEstimateBytes: 12_345,
      detailLines: ["t[1]='A' == p[0]='A'", "t[2]='B' == p[1]='B'"],
    },
  ],
}

export const fixedNaiveSummary: RunSummary = {
  algorithm: 'naive',
  totalElapsedSeconds: 1,
  totalComparisons: 3,
  matchPositions: [1],
  stepCount: 2,
}

export const fixedRabinKarpSummary: RunSummary = {
  algorithm: 'rabin-karp',
  totalElapsedSeconds: 1,
  totalComparisons: 2,
  matchPositions: [1],
  stepCount: 4,
}

export const fixedComparison: ComparisonResult = {
  id: 'run-0001',
  textLength: 3,
  patternLength: 2,
  naive: { result: fixedNaiveResult, summary: fixedNaiveSummary },
  rabinKarp: { result: fixedRabinKarpResult, summary: fixedRabinKarpSummary },
  positionsAgree: true,
  timeShare: { naive: 0.5, rabinKarp: 0.5 },
}
