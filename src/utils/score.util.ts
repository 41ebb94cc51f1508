import type { ScoreOrder } from '../types/retrieval';

/**
 * Min-max normalise a score list into [0, 1], higher is better.
 *
 * A degenerate list (single value, or all equal) maps every member to 1.0.
 * For lower-is-better scales the normalised value is inverted so both
 * retrieval branches fuse on the same orientation.
 */
export function minMaxNormalize(scores: number[], order: ScoreOrder = 'higher-is-better'): number[] {
    if (scores.length === 0) {
        return [];
    }

    let min = Infinity;
    let max = -Infinity;
    for (const score of scores) {
        if (score < min) min = score;
        if (score > max) max = score;
    }

    if (max === min) {
        return scores.map(() => 1.0);
    }

    const range = max - min;
    return scores.map(score => {
        const norm = (score - min) / range;
        return order === 'lower-is-better' ? 1 - norm : norm;
    });
}

export function dotProduct(a: number[], b: number[]): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        sum += a[i] * b[i];
    }
    return sum;
}

/**
 * L2-normalise and round to float32 precision. Returns null for zero or
 * non-finite input, which has no direction to normalise.
 */
export function l2Normalize(vector: number[]): number[] | null {
    let squares = 0;
    for (const value of vector) {
        if (!Number.isFinite(value)) {
            return null;
        }
        squares += value * value;
    }

    const magnitude = Math.sqrt(squares);
    if (magnitude === 0) {
        return null;
    }

    return Array.from(Float32Array.from(vector, value => value / magnitude));
}
