/**
 * Built-in heuristic viewpoint evaluators.
 *
 * Each evaluator is deterministic: the same artifact content always yields
 * the same score and issues. They are deliberately shallow; deployments that
 * have model-backed reviewers register them as custom evaluators instead.
 */

import { contentTerms, termCoverage } from '../../utils/text.js'
import { roundTo } from '../../utils/helpers.js'
import type { EvaluationInput, ViewpointEvaluation, ViewpointEvaluator } from './types.js'

interface Rule {
  pattern: RegExp
  issue: string
}

function deduct(issueCount: number, perIssue: number): number {
  return roundTo(Math.max(0, 1 - perIssue * issueCount), 4)
}

function applyRules(content: string, rules: Rule[]): string[] {
  return rules.filter((rule) => rule.pattern.test(content)).map((rule) => rule.issue)
}

// ---------------------------------------------------------------------------
// security
// ---------------------------------------------------------------------------

const SECURITY_RULES: Rule[] = [
  {
    pattern: /\b(api[_-]?key|secret|password|passwd|token)\b\s*[:=]\s*['"][^'"\s]{4,}['"]/i,
    issue: 'Hard-coded credential',
  },
  { pattern: /-----BEGIN [A-Z ]*PRIVATE KEY-----/, issue: 'Embedded private key' },
  { pattern: /\beval\s*\(/, issue: 'Dynamic code evaluation (eval)' },
  { pattern: /\bnew Function\s*\(/, issue: 'Dynamic code evaluation (new Function)' },
  { pattern: /\bchmod\s+777\b/, issue: 'World-writable file permissions' },
]

export async function evaluateSecurity(input: EvaluationInput): Promise<ViewpointEvaluation> {
  const issues = applyRules(input.content, SECURITY_RULES)
  return { score: deduct(issues.length, 0.5), issues }
}

// ---------------------------------------------------------------------------
// correctness
// ---------------------------------------------------------------------------

const PLACEHOLDER = /\b(TBD|lorem ipsum|not implemented|NotImplemented)\b/i

const BRACKET_PAIRS: [string, string][] = [
  ['(', ')'],
  ['[', ']'],
  ['{', '}'],
]

function countChar(content: string, char: string): number {
  let count = 0
  for (const c of content) {
    if (c === char) count++
  }
  return count
}

export async function evaluateCorrectness(input: EvaluationInput): Promise<ViewpointEvaluation> {
  const issues: string[] = []
  const placeholder = PLACEHOLDER.exec(input.content)
  if (placeholder !== null) {
    issues.push(`Placeholder content (${placeholder[0]})`)
  }
  for (const [open, close] of BRACKET_PAIRS) {
    if (countChar(input.content, open) !== countChar(input.content, close)) {
      issues.push(`Unbalanced brackets: ${open} ${close}`)
    }
  }
  return { score: deduct(issues.length, 0.25), issues }
}

// ---------------------------------------------------------------------------
// robustness
// ---------------------------------------------------------------------------

const MIN_REVIEWABLE_CHARS = 20

export async function evaluateRobustness(input: EvaluationInput): Promise<ViewpointEvaluation> {
  const compact = input.content.replace(/\s+/g, '')
  if (compact.length === 0) {
    return { score: 0, issues: ['Artifact is empty'] }
  }

  const issues: string[] = []
  let penalty = 0
  const markers = input.content.match(/\b(TODO|FIXME|XXX|HACK)\b/g) ?? []
  if (markers.length > 0) {
    issues.push(`${markers.length} unresolved TODO/FIXME marker(s)`)
    penalty += 0.2 * markers.length
  }
  if (compact.length < MIN_REVIEWABLE_CHARS) {
    issues.push('Artifact is too short to review')
    penalty += 0.3
  }
  return { score: roundTo(Math.max(0, 1 - penalty), 4), issues }
}

// ---------------------------------------------------------------------------
// resilience
// ---------------------------------------------------------------------------

const RESILIENCE_RULES: Rule[] = [
  { pattern: /catch\s*(\([^)]*\))?\s*\{\s*\}/, issue: 'Empty catch block swallows errors' },
  { pattern: /\bprocess\.exit\s*\(/, issue: 'Hard process exit' },
  { pattern: /\bwhile\s*\(\s*true\s*\)/, issue: 'Unbounded loop' },
]

export async function evaluateResilience(input: EvaluationInput): Promise<ViewpointEvaluation> {
  const issues = applyRules(input.content, RESILIENCE_RULES)
  return { score: deduct(issues.length, 0.25), issues }
}

// ---------------------------------------------------------------------------
// maintainability
// ---------------------------------------------------------------------------

const MAX_LINE_LENGTH = 160
const MAX_LINES = 1500

export async function evaluateMaintainability(input: EvaluationInput): Promise<ViewpointEvaluation> {
  const lines = input.content.split('\n')
  const issues: string[] = []
  let penalty = 0
  const longLines = lines.filter((line) => line.length > MAX_LINE_LENGTH).length
  if (longLines > 0) {
    issues.push(`${longLines} line(s) longer than ${MAX_LINE_LENGTH} characters`)
    penalty += Math.min(0.5, 0.05 * longLines)
  }
  if (lines.length > MAX_LINES) {
    issues.push(`Artifact exceeds ${MAX_LINES} lines`)
    penalty += 0.25
  }
  return { score: roundTo(Math.max(0, 1 - penalty), 4), issues }
}

// ---------------------------------------------------------------------------
// alignment
// ---------------------------------------------------------------------------

export async function evaluateAlignment(input: EvaluationInput): Promise<ViewpointEvaluation> {
  if (input.goal === undefined || input.goal.trim() === '') {
    return { score: 1, issues: [] }
  }
  const goalTerms = contentTerms(input.goal)
  if (goalTerms.length === 0) {
    return { score: 1, issues: [] }
  }
  const artifactTerms = contentTerms(input.content)
  const coverage = termCoverage(goalTerms, artifactTerms)
  const issues: string[] = []
  if (coverage < 0.5) {
    const present = new Set(artifactTerms)
    const missing = goalTerms.filter((t) => !present.has(t))
    issues.push(`Artifact covers ${Math.round(coverage * 100)}% of the goal terms (missing: ${missing.join(', ')})`)
  }
  return { score: roundTo(0.4 + 0.6 * coverage, 4), issues }
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export const DEFAULT_EVALUATORS: Readonly<Record<string, ViewpointEvaluator>> = {
  security: evaluateSecurity,
  correctness: evaluateCorrectness,
  robustness: evaluateRobustness,
  resilience: evaluateResilience,
  maintainability: evaluateMaintainability,
  alignment: evaluateAlignment,
}
