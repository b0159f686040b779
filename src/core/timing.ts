/**
 * Scoped timing for trace steps
 * @module core/timing
 */

export interface Timed<T> {
  value: T
  elapsedSeconds: number
}

/**
 * Runs `fn` and reports how long it took in seconds.
 *
 * @example
 * ```typescript
 * const { value, elapsedSeconds } = timed(() => hashWindow(chars, 0, 4, 256, 101))
 * ```
 */
export function timed<T>(fn: () => T): Timed<T> {
  const startTime = performance.now()
  const value = fn()
  const elapsedMs = performance.now() - startTime

  return { value, elapsedSeconds: Math.max(0, elapsedMs / 1000) }
}
