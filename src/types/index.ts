export type {
  AlgorithmName,
  StepPhase,
  MatchRequest,
  CheckStep,
  InitStep,
  RabinKarpCheckStep,
  RollStep,
  NaiveStep,
  RabinKarpStep,
  TraceStep,
  MatchResult,
  NaiveResult,
  RabinKarpResult,
  RunSummary,
  PhaseTotals,
  PhaseBreakdown,
} from './trace.js'

export type {
  ValidationOptions,
  RabinKarpOptions,
  ComparisonConfig,
  ComparisonOptions,
  RunOptions,
} from './config.js'

export {
  MAX_TEXT_LENGTH,
  DEFAULT_BASE,
  DEFAULT_MODULUS,
  DEFAULT_REPORT_STEP_LIMIT,
} from './config.js'
