const EPSILON = 1e-9;

/**
 * Cosine similarity as dot / (|a|·|b| + ε). Zero vectors score 0 instead of NaN.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
    if (a.length !== b.length) {
        throw new RangeError(`Vector dimensions must match (${a.length} vs ${b.length})`);
    }
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    return dot / (Math.sqrt(normA) * Math.sqrt(normB) + EPSILON);
}

export function l2Normalize(vector: readonly number[]): number[] {
    let norm = 0;
    for (const v of vector) norm += v * v;
    norm = Math.sqrt(norm);
    if (norm < EPSILON) return [...vector];
    return vector.map(v => v / norm);
}

export interface Ranked<T> {
    item: T;
    score: number;
}

/**
 * Scores every entry against the query and keeps the topK best.
 * Equal scores keep insertion order.
 */
export function rankBySimilarity<T extends { vector: readonly number[] }>(
    entries: readonly T[],
    query: readonly number[],
    topK: number
): Ranked<T>[] {
    const limit = Math.max(0, Math.floor(topK));
    if (limit === 0) return [];
    return entries
        .map((item, position) => ({ item, score: cosineSimilarity(query, item.vector), position }))
        .sort((a, b) => b.score - a.score || a.position - b.position)
        .slice(0, limit)
        .map(({ item, score }) => ({ item, score }));
}
