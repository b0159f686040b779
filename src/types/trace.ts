/**
 * Matcher that produced a trace.
 * - `'naive'`: offset-by-offset character scan
 * - `'rabin-karp'`: rolling-hash filter with character verification
 */
export type AlgorithmName = 'naive' | 'rabin-karp'

/**
 * Phase tag carried by every step.
 * - `'INIT'`: initial pattern and first-window hashes (Rabin–Karp only)
 * - `'CHECK'`: one aligned offset examined
 * - `'ROLL'`: window hash advanced by one character (Rabin–Karp only)
 */
export type StepPhase = 'INIT' | 'CHECK' | 'ROLL'

/**
 * A validated text/pattern pair. Frozen once created.
 *
 * Lengths and offsets are measured in code points; `textChars` and
 * `patternChars` hold the split code points the matchers index into.
 */
export interface MatchRequest {
  readonly text: string
  readonly pattern: string
  readonly textChars: readonly string[]
  readonly patternChars: readonly string[]
  /** Storage estimate for text + pattern, constant for every step of a run */
  readonly memoryEstimateBytes: number
}

interface StepBase {
  /** Character comparisons performed during this step */
  readonly comparisonCount: number
  /** Wall-clock duration of the step, non-negative */
  readonly elapsedSeconds: number
  readonly memoryEstimateBytes: number
  /** Display-only description of what happened. Never parsed. */
  readonly detailLines: readonly string[]
}

export interface CheckStep extends StepBase {
  readonly phase: 'CHECK'
  /** Text offset the pattern was aligned with */
  readonly position: number
  /** True only when all pattern characters matched at `position` */
  readonly matched: boolean
}

export interface InitStep extends StepBase {
  readonly phase: 'INIT'
  readonly comparisonCount: 0
  readonly patternHash: number
  readonly textWindowHash: number
  /** base^(m-1) mod modulus, used to drop the leading character on each roll */
  readonly highOrderFactor: number
}

export interface RabinKarpCheckStep extends CheckStep {
  readonly patternHash: number
  readonly textWindowHash: number
  /** Whether the hashes agreed and characters were verified */
  readonly hashMatched: boolean
}

export interface RollStep extends StepBase {
  readonly phase: 'ROLL'
  readonly comparisonCount: 0
  /** Offset of the window the hash now describes */
  readonly position: number
  readonly patternHash: number
  readonly textWindowHash: number
}

export type NaiveStep = CheckStep

export type RabinKarpStep = InitStep | RabinKarpCheckStep | RollStep

export type TraceStep = NaiveStep | RabinKarpStep

/**
 * Output of one matcher run. Read-only once returned.
 */
export interface MatchResult<S extends TraceStep = TraceStep> {
  readonly algorithm: AlgorithmName
  /** Strictly increasing offsets where the pattern occurs */
  readonly matchPositions: readonly number[]
  /** Steps in emission order */
  readonly trace: readonly S[]
}

export type NaiveResult = MatchResult<NaiveStep>

export type RabinKarpResult = MatchResult<RabinKarpStep>

/**
 * Aggregate of one run, derived purely from its MatchResult
 */
export interface RunSummary {
  readonly algorithm: AlgorithmName
  readonly totalElapsedSeconds: number
  readonly totalComparisons: number
  readonly matchPositions: readonly number[]
  readonly stepCount: number
}

export interface PhaseTotals {
  readonly steps: number
  readonly comparisons: number
  readonly elapsedSeconds: number
}

export type PhaseBreakdown = Readonly<Record<StepPhase, PhaseTotals>>
