import { describe, it, expect } from 'vitest';
import { createRandom, mulberry32, sampleWords, seedFromString } from '../src/sampling.js';

const WORDS = ['alpha', 'bravo', 'charm', 'delta', 'eagle', 'fresh', 'ghost', 'hotel'];

describe('seedFromString', () => {
    it('is deterministic and unsigned', () => {
        expect(seedFromString('practice')).toBe(seedFromString('practice'));
        expect(seedFromString('practice')).not.toBe(seedFromString('practise'));
        expect(seedFromString('')).toBe(5381);
    });
});

describe('mulberry32', () => {
    it('produces the same sequence for the same seed, within [0, 1)', () => {
        const a = mulberry32(42);
        const b = mulberry32(42);
        for (let i = 0; i < 20; i++) {
            const value = a();
            expect(value).toBe(b());
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        }
    });
});

describe('sampleWords', () => {
    it('returns every word when the sample is at least as large', () => {
        expect(sampleWords(WORDS, 8, createRandom('x'))).toEqual(WORDS);
        expect(sampleWords(WORDS, 20, createRandom('x'))).toEqual(WORDS);
    });

    it('returns nothing for a zero count', () => {
        expect(sampleWords(WORDS, 0, createRandom('x'))).toEqual([]);
    });

    it('picks distinct words in dictionary order', () => {
        const sample = sampleWords(WORDS, 3, createRandom('seed'));
        expect(sample).toHaveLength(3);
        expect(new Set(sample).size).toBe(3);
        const positions = sample.map((word) => WORDS.indexOf(word));
        expect(positions).toEqual([...positions].sort((a, b) => a - b));
        expect(positions.every((position) => position >= 0)).toBe(true);
    });

    it('repeats the same sample for the same seed', () => {
        expect(sampleWords(WORDS, 4, createRandom('seed'))).toEqual(sampleWords(WORDS, 4, createRandom('seed')));
    });

    it('follows the random source', () => {
        // swaps slot 0 with slot 4, then slot 1 with slot 1 + 3, which now holds 0
        const values = [0.5, 0.5];
        let call = 0;
        const random = () => values[call++];
        expect(sampleWords(WORDS, 2, random)).toEqual(['alpha', 'eagle']);
    });
});
