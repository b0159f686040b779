/**
 * Report generation for comparison runs.
 * Renders traces and summaries as markdown for display.
 */

import type { MatchResult, TraceStep } from '../types/trace.js'
import type { ComparisonResult } from '../core/comparison.js'
import { DEFAULT_REPORT_STEP_LIMIT } from '../types/config.js'

export interface StepRenderOptions {
  /** Render only the first `limit` steps (default: all) */
  limit?: number
}

export interface ReportOptions {
  title?: string
  includeRunId?: boolean
  includeDetails?: boolean
  /** Rabin–Karp steps shown in its table and details (default: 60) */
  stepLimit?: number
}

/**
 * Formats a percentage (0-1 value to percentage string).
 */
function formatPercent(value: number, decimals: number = 2): string {
  return `${(value * 100).toFixed(decimals)}%`
}

/**
 * Formats milliseconds to human-readable duration.
 */
function formatDuration(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(2)} μs`
  if (ms < 1000) return `${ms.toFixed(2)} ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(2)} s`
  return `${(ms / 60000).toFixed(2)} min`
}

function formatPositions(positions: readonly number[]): string {
  return positions.length > 0 ? `[${positions.join(', ')}]` : 'None'
}

/**
 * Generates a markdown table from headers and rows.
 */
function generateTable(headers: string[], rows: string[][]): string {
  const separator = headers.map(() => '---').join(' | ')
  const headerRow = headers.join(' | ')

  return [
    `| ${headerRow} |`,
    `| ${separator} |`,
    ...rows.map((row) => `| ${row.join(' | ')} |`),
  ].join('\n')
}

function limitSteps<S extends TraceStep>(
  trace: readonly S[],
  limit?: number
): readonly S[] {
  return limit === undefined ? trace : trace.slice(0, Math.max(0, limit))
}

function stepOffset(step: TraceStep): string {
  return step.phase === 'INIT' ? '-' : String(step.position)
}

function stepMatched(step: TraceStep): string {
  if (step.phase !== 'CHECK') return '-'
  return step.matched ? 'yes' : 'no'
}

function stepHeading(step: TraceStep): string {
  switch (step.phase) {
    case 'INIT':
      return '**INIT**'
    case 'CHECK':
      return `**CHECK at offset ${step.position}: ${step.matched ? 'match' : 'no match'}**`
    case 'ROLL':
      return `**ROLL to offset ${step.position}**`
  }
}

/**
 * Generates one table row per step: offset, phase, match flag, comparisons,
 * time in seconds and the memory estimate.
 */
export function generateStepTable(
  result: MatchResult,
  options: StepRenderOptions = {}
): string {
  const rows = limitSteps(result.trace, options.limit).map((step) => [
    stepOffset(step),
    step.phase,
    stepMatched(step),
    String(step.comparisonCount),
    step.elapsedSeconds.toFixed(6),
    step.memoryEstimateBytes.toLocaleString('en-US'),
  ])

  return generateTable(
    ['Offset', 'Phase', 'Matched', 'Comparisons', 'Time (s)', 'Memory (bytes)'],
    rows
  )
}

/**
 * Generates a heading and a fenced block of detail lines for each step.
 */
export function generateStepDetails(
  result: MatchResult,
  options: StepRenderOptions = {}
): string {
  return limitSteps(result.trace, options.limit)
    .map((step) =>
      [stepHeading(step), '```', ...step.detailLines, '```'].join('\n')
    )
    .join('\n\n')
}

/**
 * Generates a full markdown report for a comparison run.
 */
export function generateComparisonReport(
  comparison: ComparisonResult,
  options: ReportOptions = {}
): string {
  const {
    title = 'String Matching Comparison',
    includeRunId = true,
    includeDetails = false,
    stepLimit = DEFAULT_REPORT_STEP_LIMIT,
  } = options
  const { naive, rabinKarp } = comparison

  const sections: string[] = [`# ${title}`]

  if (includeRunId) {
    sections.push(`_Run ${comparison.id}_`)
  }

  sections.push(
    '## Overview',
    generateTable(
      ['Metric', 'Value'],
      [
        ['Text length (n)', String(comparison.textLength)],
        ['Pattern length (m)', String(comparison.patternLength)],
        ['Naive matches', formatPositions(naive.summary.matchPositions)],
        ['Rabin–Karp matches', formatPositions(rabinKarp.summary.matchPositions)],
        ['Positions agree', comparison.positionsAgree ? 'yes' : 'no'],
      ]
    )
  )

  sections.push(
    '## Summary',
    generateTable(
      ['Algorithm', 'Total Time', 'Comparisons', 'Steps', 'Time Share'],
      [
        [
          'Naive',
          formatDuration(naive.summary.totalElapsedSeconds * 1000),
          String(naive.summary.totalComparisons),
          String(naive.summary.stepCount),
          formatPercent(comparison.timeShare.naive),
        ],
        [
          'Rabin–Karp',
          formatDuration(rabinKarp.summary.totalElapsedSeconds * 1000),
          String(rabinKarp.summary.totalComparisons),
          String(rabinKarp.summary.stepCount),
          formatPercent(comparison.timeShare.rabinKarp),
        ],
      ]
    )
  )

  sections.push('## Naive Algorithm', generateStepTable(naive.result))
  if (includeDetails) {
    sections.push('### Naive Details', generateStepDetails(naive.result))
  }

  sections.push(
    '## Rabin–Karp Algorithm',
    generateStepTable(rabinKarp.result, { limit: stepLimit })
  )
  if (includeDetails) {
    sections.push(
      '### Rabin–Karp Details',
      generateStepDetails(rabinKarp.result, { limit: stepLimit })
    )
  }

  sections.push(
    '## Notes',
    [
      '- **Naive:** compares characters at every shift (O(n·m)).',
      '- **Rabin–Karp:** uses a rolling hash for O(n+m) average performance; equal hashes are verified character by character.',
    ].join('\n')
  )

  return sections.join('\n\n') + '\n'
}
