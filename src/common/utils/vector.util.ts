/**
 * Vector helpers for the in-process index
 */

/**
 * Euclidean norm of a vector
 */
export function vectorNorm(vector: readonly number[]): number {
    let sum = 0;
    for (const value of vector) {
        sum += value * value;
    }
    return Math.sqrt(sum);
}

export function dotProduct(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
        throw new Error('Embeddings must have the same dimension');
    }

    let dot = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
    }
    return dot;
}

/**
 * Cosine similarity with precomputed norms. A zero-norm side yields 0.
 */
export function cosineWithNorms(
    a: readonly number[],
    normA: number,
    b: readonly number[],
    normB: number,
): number {
    const denominator = normA * normB;
    if (denominator === 0) {
        return 0;
    }
    return dotProduct(a, b) / denominator;
}

/**
 * Calculate cosine similarity between two embeddings
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    return cosineWithNorms(a, vectorNorm(a), b, vectorNorm(b));
}

/**
 * Validate embedding values
 */
export function validateEmbeddingValues(embedding: readonly number[]): void {
    if (embedding.length === 0) {
        throw new Error('Embedding must not be empty');
    }

    for (let i = 0; i < embedding.length; i++) {
        if (!Number.isFinite(embedding[i])) {
            throw new Error(`Invalid embedding value at index ${i}: ${embedding[i]}`);
        }
    }
}
