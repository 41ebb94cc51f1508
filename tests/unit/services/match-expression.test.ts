import { describe, it, expect } from 'vitest';
import {
    compileMatchExpression,
    toTsQuery,
    MAX_MATCH_TERMS
} from '../../../src/services/match-expression';
import { InvalidMatchExpressionError } from '../../../src/types/errors';

describe('compileMatchExpression', () => {
    it('should AND adjacent terms', () => {
        const expression = compileMatchExpression('compressor startup');
        expect(expression.root).toEqual({
            kind: 'and',
            children: [{ kind: 'term', value: 'compressor' }, { kind: 'term', value: 'startup' }]
        });
        expect(toTsQuery(expression)).toBe('compressor & startup');
    });

    it('should bind AND tighter than OR', () => {
        const expression = compileMatchExpression('pump AND seal OR "mechanical seal"');
        expect(toTsQuery(expression)).toBe('(pump & seal) | (mechanical <-> seal)');
    });

    it('should lower-case words and split hyphenated identifiers into a phrase', () => {
        const expression = compileMatchExpression('K-101');
        expect(expression.root).toEqual({ kind: 'phrase', words: ['k', '101'] });
    });

    it.each([
        ['compressor*', 'unsupported character "*" at position 10'],
        ['title:pump', 'unsupported character ":" at position 5'],
        ['(pump)', 'unsupported character "(" at position 0'],
        ['"open phrase', 'unbalanced quote at position 0'],
        ['pump NOT seal', 'operator NOT is not supported'],
        ['pump NEAR seal', 'operator NEAR is not supported'],
        ['OR pump', 'dangling operator OR'],
        ['pump AND', 'expression ends with an operator'],
        ['""', 'empty phrase'],
        ['   ', 'expression has no searchable terms']
    ])('should reject %j', (input, reason) => {
        expect(() => compileMatchExpression(input)).toThrow(`Invalid match expression: ${reason}`);
    });

    it('should cap the number of terms', () => {
        const input = Array.from({ length: MAX_MATCH_TERMS + 1 }, (_, i) => `w${i}`).join(' ');
        expect(() => compileMatchExpression(input)).toThrow(InvalidMatchExpressionError);
    });
});
