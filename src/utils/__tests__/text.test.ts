/**
 * Unit tests for src/utils/text.ts
 */

import { describe, it, expect } from 'vitest'
import { tokenize, stem, contentTerms, termCoverage, normalizeText } from '../text.js'

describe('tokenize', () => {
  it('splits on non-alphanumerics and lower-cases', () => {
    expect(tokenize("Don't use Paid-APIs!")).toEqual(['don', 't', 'use', 'paid', 'apis'])
  })
})

describe('stem', () => {
  it('maps singular and plural forms to one stem', () => {
    expect(stem('dependencies')).toBe('dependenc')
    expect(stem('dependency')).toBe('dependenc')
    expect(stem('apis')).toBe('api')
    expect(stem('class')).toBe('class')
    expect(stem('paid')).toBe('paid')
  })
})

describe('contentTerms', () => {
  it('drops stopwords and duplicates', () => {
    expect(contentTerms('Build an API and the APIs')).toEqual(['build', 'api'])
  })
})

describe('termCoverage', () => {
  it('is the share of concept terms present in the text', () => {
    expect(termCoverage(['paid', 'dependenc'], ['add', 'paid', 'dependenc', 'stripe'])).toBe(1)
    expect(termCoverage(['paid', 'dependenc'], ['dependenc'])).toBe(0.5)
    expect(termCoverage([], ['x'])).toBe(0)
  })
})

describe('normalizeText', () => {
  it('collapses case, punctuation and whitespace', () => {
    expect(normalizeText('  Use   REST, please! ')).toBe('use rest please')
  })
})
