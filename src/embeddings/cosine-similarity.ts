/**
 * Cosine Similarity
 *
 * Pure functions for comparing embedding vectors.
 */

/**
 * Calculate cosine similarity between two embedding vectors.
 *
 * @returns Similarity score between -1 and 1 (1 = identical, 0 = orthogonal, -1 = opposite)
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) {
    throw new Error(`Embedding dimensions must match: ${a.length} vs ${b.length}`)
  }

  let dotProduct = 0
  let normA = 0
  let normB = 0

  for (let i = 0; i < a.length; i++) {
    const aVal = a[i] ?? 0
    const bVal = b[i] ?? 0
    dotProduct += aVal * bVal
    normA += aVal * aVal
    normB += bVal * bVal
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB)

  if (magnitude === 0) {
    return 0
  }

  return dotProduct / magnitude
}

/**
 * Find the top-K candidates most similar to a query vector.
 *
 * Candidates whose dimensions differ from the query are skipped rather than
 * compared, since they come from a different embedding model.
 *
 * @returns Matches sorted by similarity descending
 */
export function findTopK<T extends { readonly key: string; readonly embedding: Float32Array }>(
  query: Float32Array,
  candidates: readonly T[],
  topK: number,
  minSimilarity = 0
): Array<{ candidate: T; similarity: number }> {
  const results: Array<{ candidate: T; similarity: number }> = []

  for (const candidate of candidates) {
    if (candidate.embedding.length !== query.length) continue
    const similarity = cosineSimilarity(query, candidate.embedding)
    if (similarity >= minSimilarity) {
      results.push({ candidate, similarity })
    }
  }

  return results.sort((a, b) => b.similarity - a.similarity).slice(0, topK)
}
