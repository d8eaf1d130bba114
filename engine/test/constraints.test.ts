import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { deriveConstraints, filterByHistory, isConsistent } from '../src/constraints.js';
import { evaluateFeedback } from '../src/evaluator.js';
import { parseFeedback } from '../src/feedback.js';
import { InvalidArgumentError } from '../src/errors.js';

describe('deriveConstraints', () => {
    it('groups every position of a letter into one constraint', () => {
        expect(deriveConstraints('app', parseFeedback('ggb'))).toEqual([
            { letter: 'a', at: [0], notAt: [], minCount: 1, maxCount: null },
            { letter: 'p', at: [1], notAt: [2], minCount: 1, maxCount: 1 },
        ]);
    });

    it('caps a letter at zero when it is only ever absent', () => {
        expect(deriveConstraints('xx', parseFeedback('bb'))).toEqual([
            { letter: 'x', at: [], notAt: [0, 1], minCount: 0, maxCount: 0 },
        ]);
    });

    it('counts a present mark that follows the absent one', () => {
        expect(deriveConstraints('pap', parseFeedback('bby'))).toEqual([
            { letter: 'p', at: [], notAt: [0, 2], minCount: 1, maxCount: 1 },
            { letter: 'a', at: [], notAt: [1], minCount: 0, maxCount: 0 },
        ]);
    });
});

describe('isConsistent', () => {
    it('re-checks a single word', () => {
        const result = parseFeedback('bbbgg');
        expect(isConsistent('crank', 'stink', result)).toBe(true);
        expect(isConsistent('thank', 'stink', result)).toBe(false);
        expect(isConsistent('cranks', 'stink', result)).toBe(false);
    });

    it('agrees with the evaluator for feedback the puzzle could produce', () => {
        const word = fc
            .array(fc.constantFrom('a', 'b', 'c'), { minLength: 5, maxLength: 5 })
            .map((letters) => letters.join(''));

        fc.assert(
            fc.property(word, word, word, (guess, target, candidate) => {
                const observed = evaluateFeedback(guess, target);
                const expected = evaluateFeedback(guess, candidate) === observed;
                return isConsistent(candidate, guess, parseFeedback(observed)) === expected;
            })
        );
    });
});

describe('filterByHistory', () => {
    it('applies the whole history at once', () => {
        const words = ['abc', 'bcd', 'pqr', 'abf', 'abr'];
        expect(
            filterByHistory(words, [
                { guess: 'abf', feedback: 'ggb' },
                { guess: 'abc', feedback: 'ggb' },
            ])
        ).toEqual(['abr']);
    });

    it('returns every word for an empty history', () => {
        expect(filterByHistory(['abc', 'xyz'], [])).toEqual(['abc', 'xyz']);
    });

    it('rejects malformed feedback', () => {
        expect(() => filterByHistory(['abc'], [{ guess: 'abc', feedback: 'gxg' }])).toThrow(InvalidArgumentError);
    });
});
