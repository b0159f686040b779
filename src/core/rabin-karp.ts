import type {
  InitStep,
  MatchRequest,
  RabinKarpCheckStep,
  RabinKarpResult,
  RabinKarpStep,
  RollStep,
} from '../types/trace.js'
import type { RabinKarpOptions } from '../types/config.js'
import { DEFAULT_BASE, DEFAULT_MODULUS } from '../types/config.js'
import {
  InvalidParameterError,
  requireInRange,
  requireInteger,
  requirePlainObject,
} from '../utils/errors.js'
import { scanOffset } from './naive.js'
import { timed } from './timing.js'

/** Largest Unicode code point; the biggest value a character folds in */
const MAX_CODE_POINT = 0x10ffff

/** Largest modulus whose square is still a safe integer */
export const MAX_MODULUS = Math.floor(Math.sqrt(Number.MAX_SAFE_INTEGER))

/**
 * Numeric value a character contributes to the hash (its code point).
 */
export function ord(char: string): number {
  return char.codePointAt(0) ?? 0
}

/**
 * Computes `base^exponent mod modulus` by square-and-multiply.
 *
 * @example
 * ```typescript
 * modPow(256, 8, 101) // 79
 * ```
 */
export function modPow(
  base: number,
  exponent: number,
  modulus: number
): number {
  if (modulus === 1) return 0

  let result = 1
  let b = base % modulus
  let e = exponent

  while (e > 0) {
    if (e % 2 === 1) {
      result = (result * b) % modulus
    }
    b = (b * b) % modulus
    e = Math.floor(e / 2)
  }

  return result
}

/**
 * Hashes `length` characters starting at `start` from scratch:
 * `hash = (base * hash + ord(char)) mod modulus` for each character.
 */
export function hashWindow(
  chars: readonly string[],
  start: number,
  length: number,
  base: number,
  modulus: number
): number {
  let hash = 0
  for (let k = start; k < start + length; k++) {
    hash = (base * hash + ord(chars[k] ?? '')) % modulus
  }
  return hash
}

/**
 * Drops `outgoing` from the front of a window hash and appends `incoming`.
 * Equals `(base * (hash - ord(outgoing) * h) + ord(incoming)) mod modulus`,
 * normalised to a non-negative residue.
 */
export function rollHash(
  hash: number,
  outgoing: string,
  incoming: string,
  highOrderFactor: number,
  base: number,
  modulus: number
): number {
  const dropped = ((ord(outgoing) % modulus) * highOrderFactor) % modulus
  let next = (hash - dropped) % modulus
  if (next < 0) next += modulus
  return (base * next + ord(incoming)) % modulus
}

/**
 * Fills in defaults and checks that every intermediate hash value stays a
 * safe integer.
 *
 * @throws {InvalidParameterError} If base or modulus is unusable
 */
export function validateRabinKarpOptions(
  options: Partial<RabinKarpOptions> = {}
): RabinKarpOptions {
  requirePlainObject(options, 'rabinKarp')
  const base = options.base ?? DEFAULT_BASE
  const modulus = options.modulus ?? DEFAULT_MODULUS

  requireInteger(base, 'base')
  requireInteger(modulus, 'modulus')
  requireInRange(modulus, 2, MAX_MODULUS, 'modulus')
  requireInRange(base, 2, Number.MAX_SAFE_INTEGER, 'base')

  if (base * modulus + MAX_CODE_POINT > Number.MAX_SAFE_INTEGER) {
    throw new InvalidParameterError(
      'base',
      base,
      `base * modulus must stay below ${Number.MAX_SAFE_INTEGER - MAX_CODE_POINT}`
    )
  }

  return { base, modulus }
}

/**
 * Rabin–Karp string matching - O(n+m) average, O(n*m) when hashes collide.
 *
 * Trace layout: one INIT step, then for every offset a CHECK step followed
 * by a ROLL step (no ROLL after the final offset). Equal hashes are always
 * verified character by character, so collisions never produce a match.
 *
 * @example
 * ```typescript
 * const result = runRabinKarp(validate('AAAA', 'AA'))
 * result.matchPositions // [0, 1, 2]
 * result.trace.map((s) => s.phase) // INIT, CHECK, ROLL, CHECK, ROLL, CHECK
 * ```
 */
export function runRabinKarp(
  request: MatchRequest,
  options: Partial<RabinKarpOptions> = {}
): RabinKarpResult {
  const { base, modulus } = validateRabinKarpOptions(options)
  const { textChars, patternChars, memoryEstimateBytes } = request
  const m = patternChars.length
  const lastOffset = textChars.length - m
  const matchPositions: number[] = []
  const trace: RabinKarpStep[] = []

  const init = timed(() => {
    const h = modPow(base, m - 1, modulus)
    const patternHash = hashWindow(patternChars, 0, m, base, modulus)
    const windowHash = hashWindow(textChars, 0, m, base, modulus)
    return { h, patternHash, windowHash }
  })
  const { h, patternHash } = init.value
  let windowHash = init.value.windowHash

  const initStep: InitStep = {
    phase: 'INIT',
    comparisonCount: 0,
    patternHash,
    textWindowHash: windowHash,
    highOrderFactor: h,
    elapsedSeconds: init.elapsedSeconds,
    memoryEstimateBytes,
    detailLines: Object.freeze([
      `initial p_hash=${patternHash}, t_hash=${windowHash}, h=${h}`,
    ]),
  }
  trace.push(Object.freeze(initStep))

  for (let i = 0; i <= lastOffset; i++) {
    const currentHash = windowHash
    const check = timed(() => {
      if (patternHash !== currentHash) {
        return {
          hashMatched: false,
          matched: false,
          comparisons: 0,
          detailLines: [`Hash mismatch: ${patternHash} vs ${currentHash}`],
        }
      }
      const scan = scanOffset(textChars, patternChars, i, false)
      return { hashMatched: true, ...scan }
    })

    if (check.value.matched) {
      matchPositions.push(i)
    }

    const checkStep: RabinKarpCheckStep = {
      phase: 'CHECK',
      position: i,
      matched: check.value.matched,
      hashMatched: check.value.hashMatched,
      comparisonCount: check.value.comparisons,
      patternHash,
      textWindowHash: currentHash,
      elapsedSeconds: check.elapsedSeconds,
      memoryEstimateBytes,
      detailLines: Object.freeze(check.value.detailLines),
    }
    trace.push(Object.freeze(checkStep))

    if (i < lastOffset) {
      const roll = timed(() =>
        rollHash(
          currentHash,
          textChars[i] ?? '',
          textChars[i + m] ?? '',
          h,
          base,
          modulus
        )
      )
      windowHash = roll.value

      const rollStep: RollStep = {
        phase: 'ROLL',
        position: i + 1,
        comparisonCount: 0,
        patternHash,
        textWindowHash: windowHash,
        elapsedSeconds: roll.elapsedSeconds,
        memoryEstimateBytes,
        detailLines: Object.freeze([`rolled t_hash -> ${windowHash}`]),
      }
      trace.push(Object.freeze(rollStep))
    }
  }

  const result: RabinKarpResult = {
    algorithm: 'rabin-karp',
    matchPositions: Object.freeze(matchPositions),
    trace: Object.freeze(trace),
  }
  return Object.freeze(result)
}
