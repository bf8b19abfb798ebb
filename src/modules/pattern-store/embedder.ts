/**
 * Embedders turn free text into fixed-length vectors for similarity search.
 */

import { createHash } from 'crypto'
import { tokenize } from '../../utils/text.js'

export interface Embedder {
  readonly dimensions: number
  embed(text: string): number[]
}

/**
 * Cosine similarity of two vectors. Vectors of different length or zero
 * magnitude have similarity 0.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0
  let dot = 0
  let normA = 0
  let normB = 0
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0
    const y = b[i] ?? 0
    dot += x * y
    normA += x * x
    normB += y * y
  }
  if (normA === 0 || normB === 0) return 0
  return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

/**
 * Feature-hashing embedder: each token (and each adjacent token pair) is
 * hashed into one of `dimensions` buckets with a hash-derived sign, and the
 * result is L2-normalised. Deterministic and dependency-free, so identical
 * text always embeds identically across processes.
 */
export class HashingEmbedder implements Embedder {
  readonly dimensions: number

  constructor(dimensions = 256) {
    if (!Number.isInteger(dimensions) || dimensions < 8) {
      throw new RangeError(`HashingEmbedder dimensions must be an integer >= 8, got ${dimensions}`)
    }
    this.dimensions = dimensions
  }

  embed(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0)
    const tokens = tokenize(text)
    const features = [...tokens]
    for (let i = 0; i + 1 < tokens.length; i++) {
      features.push(`${tokens[i] ?? ''} ${tokens[i + 1] ?? ''}`)
    }

    for (const feature of features) {
      const digest = createHash('md5').update(feature).digest()
      const bucket = digest.readUInt32BE(0) % this.dimensions
      const sign = (digest[4] ?? 0) & 1 ? -1 : 1
      vector[bucket] = (vector[bucket] ?? 0) + sign
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0))
    return norm === 0 ? vector : vector.map((v) => v / norm)
  }
}
