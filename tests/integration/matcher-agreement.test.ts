import { describe, it, expect } from 'vitest'
import {
  validate,
  runNaive,
  runRabinKarp,
  summarize,
  compareAlgorithms,
  comparison,
  hashWindow,
  InvalidInputError,
} from '../../src/index.js'
import type { MatchRequest, MatchResult } from '../../src/index.js'

/** Deterministic pseudo-random text over a small alphabet */
function generateText(seed: number, length: number, alphabet: string): string {
  let state = seed
  let text = ''
  for (let i = 0; i < length; i++) {
    state = (state * 48271) % 2147483647
    text += alphabet[state % alphabet.length]
  }
  return text
}

function expectedPositions(text: string, pattern: string): number[] {
  const positions: number[] = []
  for (let i = 0; i + pattern.length <= text.length; i++) {
    if (text.startsWith(pattern, i)) positions.push(i)
  }
  return positions
}

const cases: Array<{ text: string; pattern: string }> = []
for (let seed = 1; seed <= 40; seed++) {
  const text = generateText(seed, 60 + seed, seed % 2 === 0 ? 'ab' : 'abcd')
  const patternLength = 1 + (seed % 5)
  cases.push({ text, pattern: generateText(seed * 7, patternLength, 'ab') })
}

describe('naive and Rabin–Karp agree', () => {
  it.each([
    { modulus: 101 },
    { modulus: 2 },
    { modulus: 1_000_003 },
  ])('on generated inputs with modulus $modulus', ({ modulus }) => {
    for (const { text, pattern } of cases) {
      const request = validate(text, pattern)
      const naive = runNaive(request)
      const rabinKarp = runRabinKarp(request, { base: 256, modulus })

      expect(naive.matchPositions).toEqual(expectedPositions(text, pattern))
      expect(rabinKarp.matchPositions).toEqual(naive.matchPositions)
    }
  })

  it('reports strictly increasing positions inside the text', () => {
    for (const { text, pattern } of cases) {
      const { matchPositions } = runRabinKarp(validate(text, pattern))

      matchPositions.forEach((position, i) => {
        expect(position).toBeGreaterThanOrEqual(0)
        expect(position).toBeLessThanOrEqual(text.length - pattern.length)
        if (i > 0) {
          expect(position).toBeGreaterThan(matchPositions[i - 1] ?? -1)
        }
      })
    }
  })

  it('produces traces of the expected length', () => {
    for (const { text, pattern } of cases) {
      const request = validate(text, pattern)
      const offsets = text.length - pattern.length + 1

      expect(runNaive(request).trace).toHaveLength(offsets)
      expect(runRabinKarp(request).trace).toHaveLength(
        1 + offsets + (offsets - 1)
      )
    }
  })

  it('keeps every rolled hash equal to a fresh hash of its window', () => {
    for (const { text, pattern } of cases.slice(0, 10)) {
      const request = validate(text, pattern)

      for (const step of runRabinKarp(request).trace) {
        if (step.phase !== 'ROLL') continue
        expect(step.textWindowHash).toBe(
          hashWindow(
            request.textChars,
            step.position,
            pattern.length,
            256,
            101
          )
        )
      }
    }
  })
})

describe('worked scenarios', () => {
  it.each([
    { text: 'ABABDABACDABABCABAB', pattern: 'ABABCABAB', positions: [10] },
    { text: 'AAAA', pattern: 'AA', positions: [0, 1, 2] },
    { text: 'ABC', pattern: 'XYZ', positions: [] },
  ])('$text / $pattern', ({ text, pattern, positions }) => {
    const result = compareAlgorithms(text, pattern)

    expect(result.naive.summary.matchPositions).toEqual(positions)
    expect(result.rabinKarp.summary.matchPositions).toEqual(positions)
    expect(result.positionsAgree).toBe(true)
  })

  it('handles a maximum-length text', () => {
    const text = 'ab'.repeat(10_000)
    const request = validate(text, 'ba')

    const naive = summarize(runNaive(request))
    const rabinKarp = summarize(runRabinKarp(request))

    expect(naive.matchPositions).toHaveLength(9_999)
    expect(naive.matchPositions[0]).toBe(1)
    expect(rabinKarp.matchPositions).toEqual(naive.matchPositions)
    expect(rabinKarp.stepCount).toBe(1 + 19_999 + 19_998)
  })

  it('runs nothing when validation fails', () => {
    expect(() => comparison().build().run('a'.repeat(20_001), 'a')).toThrow(
      InvalidInputError
    )
  })

  it('is idempotent apart from timings', () => {
    const request = validate('abababcabab', 'abab')

    const runs: Array<(request: MatchRequest) => MatchResult> = [
      runNaive,
      runRabinKarp,
    ]

    for (const run of runs) {
      const first = run(request)
      const second = run(request)

      expect(second.matchPositions).toEqual(first.matchPositions)
      expect(second.trace.map((s) => s.comparisonCount)).toEqual(
        first.trace.map((s) => s.comparisonCount)
      )
    }
  })

  it('renders a report for a live run', () => {
    const built = comparison().build()
    const report = built.report(built.run('AAAA', 'AA'), {
      includeRunId: false,
    })

    expect(report).toContain('| Naive matches | [0, 1, 2] |')
    expect(report).toContain('| Rabin–Karp matches | [0, 1, 2] |')
  })
})
