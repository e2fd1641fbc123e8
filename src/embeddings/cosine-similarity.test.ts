import { describe, expect, it } from 'vitest'
import { cosineSimilarity, findTopK } from './cosine-similarity'

describe('Cosine Similarity', () => {
  describe('cosineSimilarity', () => {
    it('returns 1 for identical vectors', () => {
      const a = new Float32Array([1, 0, 0])

      expect(cosineSimilarity(a, new Float32Array([1, 0, 0]))).toBeCloseTo(1, 5)
    })

    it('returns 0 for orthogonal vectors', () => {
      expect(cosineSimilarity(new Float32Array([1, 0]), new Float32Array([0, 1]))).toBeCloseTo(0, 5)
    })

    it('returns -1 for opposite vectors', () => {
      expect(cosineSimilarity(new Float32Array([1, 0]), new Float32Array([-1, 0]))).toBeCloseTo(
        -1,
        5
      )
    })

    it('ignores magnitude', () => {
      const a = new Float32Array([2, 4, 6])
      const b = new Float32Array([1, 2, 3])

      expect(cosineSimilarity(a, b)).toBeCloseTo(1, 5)
    })

    it('returns 0 when either vector is zero', () => {
      expect(cosineSimilarity(new Float32Array([0, 0]), new Float32Array([1, 2]))).toBe(0)
    })

    it('throws on mismatched dimensions', () => {
      expect(() => cosineSimilarity(new Float32Array(2), new Float32Array(3))).toThrow(
        'Embedding dimensions must match: 2 vs 3'
      )
    })
  })

  describe('findTopK', () => {
    const query = new Float32Array([1, 0])
    const candidates = [
      { key: 'orthogonal', embedding: new Float32Array([0, 1]) },
      { key: 'close', embedding: new Float32Array([0.9, 0.43589]) },
      { key: 'same', embedding: new Float32Array([1, 0]) },
      { key: 'other-model', embedding: new Float32Array([1, 0, 0]) }
    ]

    it('returns the best matches in descending order', () => {
      const results = findTopK(query, candidates, 2)

      expect(results.map((r) => r.candidate.key)).toEqual(['same', 'close'])
      expect(results[1]?.similarity).toBeCloseTo(0.9, 4)
    })

    it('drops matches under the minimum similarity', () => {
      const results = findTopK(query, candidates, 5, 0.95)

      expect(results.map((r) => r.candidate.key)).toEqual(['same'])
    })

    it('skips candidates with different dimensions', () => {
      const results = findTopK(query, candidates, 10)

      expect(results.map((r) => r.candidate.key)).not.toContain('other-model')
      expect(results).toHaveLength(3)
    })
  })
})
