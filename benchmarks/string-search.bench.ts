import { bench, describe } from 'vitest'
import { validate } from '../src/core/validation.js'
import { runNaive } from '../src/core/naive.js'
import { runRabinKarp } from '../src/core/rabin-karp.js'

// Test data sets
const textbook = validate('ABABDABACDABABCABAB', 'ABABCABAB')

const repetitive = validate('a'.repeat(5_000) + 'b', 'a'.repeat(20) + 'b')

const maximum = validate('abcd'.repeat(5_000), 'dabc')

// Benchmark suites
describe('Naive Performance', () => {
  bench('textbook example', () => {
    runNaive(textbook)
  })

  bench('repetitive text (worst case)', () => {
    runNaive(repetitive)
  })

  bench('20,000 characters', () => {
    runNaive(maximum)
  })
})

describe('Rabin–Karp Performance', () => {
  bench('textbook example', () => {
    runRabinKarp(textbook)
  })

  bench('repetitive text (worst case)', () => {
    runRabinKarp(repetitive)
  })

  bench('20,000 characters', () => {
    runRabinKarp(maximum)
  })

  bench('20,000 characters, large modulus', () => {
    runRabinKarp(maximum, { base: 256, modulus: 1_000_003 })
  })
})
