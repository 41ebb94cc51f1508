import { describe, it, expect } from 'vitest';
import { dotProduct, l2Normalize, minMaxNormalize } from '../../../src/utils/score.util';

describe('score utilities', () => {
    describe('minMaxNormalize', () => {
        it('should map the best score to 1 and the worst to 0', () => {
            expect(minMaxNormalize([2, 4, 6])).toEqual([0, 0.5, 1]);
        });

        it('should invert lower-is-better scales', () => {
            expect(minMaxNormalize([-6, -4, -2], 'lower-is-better')).toEqual([1, 0.5, 0]);
        });

        it('should map a single score to 1', () => {
            expect(minMaxNormalize([0.42])).toEqual([1]);
        });

        it('should map equal scores to 1 whatever the orientation', () => {
            expect(minMaxNormalize([-3, -3], 'lower-is-better')).toEqual([1, 1]);
        });

        it('should return an empty list for no scores', () => {
            expect(minMaxNormalize([])).toEqual([]);
        });
    });

    describe('l2Normalize', () => {
        it('should scale to unit length', () => {
            const unit = l2Normalize([3, 4]);
            expect(unit).not.toBeNull();
            expect(unit?.[0]).toBeCloseTo(0.6, 6);
            expect(unit?.[1]).toBeCloseTo(0.8, 6);
        });

        it('should round components to float32 precision', () => {
            const unit = l2Normalize([1, 1, 1]);
            expect(unit?.[0]).toBe(Math.fround(1 / Math.sqrt(3)));
        });

        it('should reject the zero vector', () => {
            expect(l2Normalize([0, 0, 0])).toBeNull();
        });

        it('should reject non-finite components', () => {
            expect(l2Normalize([1, Number.NaN])).toBeNull();
            expect(l2Normalize([Number.POSITIVE_INFINITY, 1])).toBeNull();
        });
    });

    it('should compute inner products', () => {
        expect(dotProduct([1, 2, 3], [4, 5, 6])).toBe(32);
    });
});
