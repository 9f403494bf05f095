import { tokenize } from './TextPreprocessor';

export function jaccardSimilarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    if (a.size === 0 || b.size === 0) {
        return 0;
    }
    let intersection = 0;
    for (const item of a) {
        if (b.has(item)) {
            intersection++;
        }
    }
    return intersection / (a.size + b.size - intersection);
}

export function tokenJaccard(a: string, b: string): number {
    return jaccardSimilarity(new Set(tokenize(a)), new Set(tokenize(b)));
}

/**
 * Cosine similarity of two vectors of equal length. Zero-norm or mismatched
 * inputs score 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length === 0 || a.length !== b.length) {
        return 0;
    }
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    const denominator = Math.sqrt(normA) * Math.sqrt(normB);
    return denominator === 0 ? 0 : dot / denominator;
}

export function meanVector(vectors: readonly (readonly number[])[]): number[] {
    if (vectors.length === 0) {
        return [];
    }
    const sum = new Array<number>(vectors[0].length).fill(0);
    for (const vector of vectors) {
        vector.forEach((value, i) => {
            sum[i] += value;
        });
    }
    return sum.map(value => value / vectors.length);
}
