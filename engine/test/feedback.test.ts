import { describe, it, expect } from 'vitest';
import {
    assertValidRound,
    formatFeedback,
    isFound,
    looksLikeFeedback,
    parseFeedback,
} from '../src/feedback.js';
import { InvalidArgumentError } from '../src/errors.js';

describe('parseFeedback', () => {
    it('maps b/y/g to absent/present/correct', () => {
        expect(parseFeedback('byg')).toEqual(['absent', 'present', 'correct']);
    });

    it('rejects other characters and names the allowed set', () => {
        expect(() => parseFeedback('bxg')).toThrow(InvalidArgumentError);
        expect(() => parseFeedback('BYG')).toThrow(
            'Invalid status characters in [BYG], status characters must be from: [byg]'
        );
    });
});

describe('formatFeedback', () => {
    it('writes results back as b/y/g', () => {
        expect(formatFeedback(['correct', 'absent', 'present', 'absent', 'correct'])).toBe('gbybg');
    });
});

describe('assertValidRound', () => {
    it('returns the parsed feedback for a valid round', () => {
        expect(assertValidRound('ab', 'gy', 2)).toEqual(['correct', 'present']);
    });

    it('checks lengths before characters', () => {
        expect(() => assertValidRound('abc', 'xx', 3)).toThrow(
            'Invalid number of characters in [abc], and/or [xx], they must contain exactly [3] characters'
        );
    });
});

describe('isFound', () => {
    it('recognizes an all-correct feedback as solved', () => {
        expect(isFound('ggggg')).toBe(true);
        expect(isFound('ggg')).toBe(true);
    });

    it('is false for anything else', () => {
        expect(isFound('ggggy')).toBe(false);
        expect(isFound('bbbbb')).toBe(false);
        expect(isFound('')).toBe(false);
        expect(isFound('GGGGG')).toBe(false);
    });
});

describe('looksLikeFeedback', () => {
    it('flags text made only of b, y and g', () => {
        expect(looksLikeFeedback('bygyb')).toBe(true);
        expect(looksLikeFeedback('bygone')).toBe(false);
        expect(looksLikeFeedback('')).toBe(false);
    });
});
