/**
 * Unit tests for the built-in heuristic evaluators.
 */

import { describe, it, expect } from 'vitest'
import {
  evaluateSecurity,
  evaluateCorrectness,
  evaluateRobustness,
  evaluateResilience,
  evaluateMaintainability,
  evaluateAlignment,
} from '../evaluators.js'
import type { EvaluationInput } from '../types.js'

function input(content: string, goal?: string): EvaluationInput {
  return { viewpoint: 'x', artifactRef: 'a.md', phase: 'specification', content, goal }
}

describe('evaluateSecurity', () => {
  it('passes clean content', async () => {
    expect(await evaluateSecurity(input('The API returns JSON.'))).toEqual({ score: 1, issues: [] })
  })

  it('deducts half a point per finding', async () => {
    expect(await evaluateSecurity(input('api_key = "placeholder-value"'))).toEqual({
      score: 0.5,
      issues: ['Hard-coded credential'],
    })
    expect(await evaluateSecurity(input('password: "test-secret"\nresult = eval(code)'))).toEqual({
      score: 0,
      issues: ['Hard-coded credential', 'Dynamic code evaluation (eval)'],
    })
  })
})

describe('evaluateCorrectness', () => {
  it('flags placeholders and unbalanced brackets', async () => {
    expect(await evaluateCorrectness(input('Error handling: TBD (see below'))).toEqual({
      score: 0.5,
      issues: ['Placeholder content (TBD)', 'Unbalanced brackets: ( )'],
    })
  })
})

describe('evaluateRobustness', () => {
  it('scores empty content 0', async () => {
    expect(await evaluateRobustness(input('   \n'))).toEqual({ score: 0, issues: ['Artifact is empty'] })
  })

  it('deducts per TODO marker', async () => {
    expect(await evaluateRobustness(input('Endpoints are listed below. TODO: auth. FIXME: paging'))).toEqual({
      score: 0.6,
      issues: ['2 unresolved TODO/FIXME marker(s)'],
    })
  })

  it('flags very short content', async () => {
    expect(await evaluateRobustness(input('ok'))).toEqual({ score: 0.7, issues: ['Artifact is too short to review'] })
  })
})

describe('evaluateResilience', () => {
  it('flags swallowed errors', async () => {
    expect(await evaluateResilience(input('try { run() } catch (e) {}'))).toEqual({
      score: 0.75,
      issues: ['Empty catch block swallows errors'],
    })
  })
})

describe('evaluateMaintainability', () => {
  it('flags long lines', async () => {
    const content = `${'x'.repeat(200)}\nshort\n${'y'.repeat(161)}`
    expect(await evaluateMaintainability(input(content))).toEqual({
      score: 0.9,
      issues: ['2 line(s) longer than 160 characters'],
    })
  })
})

describe('evaluateAlignment', () => {
  it('is neutral without a goal', async () => {
    expect(await evaluateAlignment(input('anything'))).toEqual({ score: 1, issues: [] })
  })

  it('scores goal term coverage', async () => {
    expect(await evaluateAlignment(input('We build the APIs in stages.', 'build an API'))).toEqual({ score: 1, issues: [] })
    expect(await evaluateAlignment(input('A recipe for bread.', 'build an API'))).toEqual({
      score: 0.4,
      issues: ['Artifact covers 0% of the goal terms (missing: build, api)'],
    })
  })
})
