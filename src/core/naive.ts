import type { MatchRequest, NaiveResult, NaiveStep } from '../types/trace.js'
import { timed } from './timing.js'

interface OffsetScan {
  matched: boolean
  comparisons: number
  detailLines: string[]
}

/**
 * Compares the pattern against the text starting at `offset`, stopping at
 * the first mismatching character. Shared with the Rabin–Karp verifier.
 */
export function scanOffset(
  textChars: readonly string[],
  patternChars: readonly string[],
  offset: number,
  markStop: boolean = true
): OffsetScan {
  const detailLines: string[] = []
  let comparisons = 0

  for (let j = 0; j < patternChars.length; j++) {
    const t = textChars[offset + j]
    const p = patternChars[j]
    comparisons++

    if (t !== p) {
      detailLines.push(
        `t[${offset + j}]='${t}' != p[${j}]='${p}'${markStop ? ' (stop)' : ''}`
      )
      return { matched: false, comparisons, detailLines }
    }
    detailLines.push(`t[${offset + j}]='${t}' == p[${j}]='${p}'`)
  }

  return { matched: true, comparisons, detailLines }
}

/**
 * Naive string matching - O(n*m) worst case, O(n) when leading characters
 * differ.
 *
 * Emits one CHECK step per offset `0..n-m`.
 *
 * @example
 * ```typescript
 * const result = runNaive(validate('AAAA', 'AA'))
 * result.matchPositions // [0, 1, 2]
 * result.trace.length   // 3
 * ```
 */
export function runNaive(request: MatchRequest): NaiveResult {
  const { textChars, patternChars, memoryEstimateBytes } = request
  const lastOffset = textChars.length - patternChars.length
  const matchPositions: number[] = []
  const trace: NaiveStep[] = []

  for (let i = 0; i <= lastOffset; i++) {
    const { value: scan, elapsedSeconds } = timed(() =>
      scanOffset(textChars, patternChars, i)
    )

    if (scan.matched) {
      matchPositions.push(i)
    }

    const step: NaiveStep = {
      phase: 'CHECK',
      position: i,
      matched: scan.matched,
      comparisonCount: scan.comparisons,
      elapsedSeconds,
      memoryEstimateBytes,
      detailLines: Object.freeze(scan.detailLines),
    }
    trace.push(Object.freeze(step))
  }

  const result: NaiveResult = {
    algorithm: 'naive',
    matchPositions: Object.freeze(matchPositions),
    trace: Object.freeze(trace),
  }
  return Object.freeze(result)
}
