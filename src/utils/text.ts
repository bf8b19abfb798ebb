/**
 * Small text helpers shared by the embedder, the heuristic evaluators and
 * the intent tracker.
 */

/** Words too common to carry meaning in overlap comparisons */
export const STOPWORDS: ReadonlySet<string> = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'has', 'have',
  'i', 'in', 'is', 'it', 'its', 'of', 'on', 'or', 'our', 'so', 'that', 'the',
  'their', 'this', 'to', 'was', 'we', 'will', 'with', 'you', 'your',
])

/** Lower-cased alphanumeric tokens of `text` */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? []
}

/**
 * Crude suffix stripping so that singular and plural forms compare equal
 * ("dependency" / "dependencies" → "dependenc").
 */
export function stem(token: string): string {
  if (token.length > 4 && token.endsWith('ies')) return token.slice(0, -3)
  if (token.length > 3 && token.endsWith('y')) return token.slice(0, -1)
  if (token.length > 5 && token.endsWith('ing')) return token.slice(0, -3)
  if (token.length > 4 && token.endsWith('ed')) return token.slice(0, -2)
  if (token.length > 3 && token.endsWith('s') && !token.endsWith('ss')) return token.slice(0, -1)
  return token
}

/** Unique stems of the meaningful tokens of `text`, in first-seen order */
export function contentTerms(text: string, ignore: ReadonlySet<string> = STOPWORDS): string[] {
  const terms = new Set<string>()
  for (const token of tokenize(text)) {
    if (ignore.has(token)) continue
    terms.add(stem(token))
  }
  return [...terms]
}

/**
 * Fraction of `concept` terms that also appear in `text` terms.
 * Returns 0 for an empty concept.
 */
export function termCoverage(concept: string[], text: string[]): number {
  if (concept.length === 0) return 0
  const present = new Set(text)
  return concept.filter((term) => present.has(term)).length / concept.length
}

/** Canonical form used to deduplicate free-text entries */
export function normalizeText(text: string): string {
  return tokenize(text).join(' ')
}
