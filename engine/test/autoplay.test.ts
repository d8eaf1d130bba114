import { describe, it, expect } from 'vitest';
import { CandidateStore } from '../src/candidateStore.js';
import { autoPlay } from '../src/autoplay.js';
import { InvalidArgumentError } from '../src/errors.js';

const RANKED = [
    { word: 'stink', rank: 90 },
    { word: 'drunk', rank: 80 },
    { word: 'prank', rank: 70 },
    { word: 'frank', rank: 60 },
    { word: 'crank', rank: 50 },
    { word: 'blank', rank: 40 },
];

describe('autoPlay', () => {
    it('guesses the best candidate each round until solved', () => {
        const store = new CandidateStore(5, RANKED);
        const state = autoPlay(store, { target: 'crank' });

        expect(state.status).toBe('solved');
        expect(state.rounds.map((round) => round.guess)).toEqual(['stink', 'drunk', 'prank', 'frank', 'crank']);
        expect(state.rounds.map((round) => round.remaining)).toEqual([5, 3, 2, 1, 1]);
    });

    it('starts from the given first guess', () => {
        const store = new CandidateStore(5, RANKED);
        const state = autoPlay(store, { target: 'crank', firstGuess: 'plonk' });

        expect(state.rounds[0].guess).toBe('plonk');
        expect(state.status).toBe('solved');
    });

    it('reports exhaustion when the target is not in the dictionary', () => {
        const store = new CandidateStore(5, RANKED);
        const state = autoPlay(store, { target: 'chunk' });

        expect(state.status).toBe('exhausted');
        expect(state.remaining).toBe(0);
    });

    it('plays no round when the dictionary has no word of the target size', () => {
        const store = new CandidateStore(5, ['cranky', 'plonks']);
        const state = autoPlay(store, { target: 'crank' });

        expect(state.status).toBe('exhausted');
        expect(state.rounds).toEqual([]);
    });

    it('stops after the allowed number of rounds', () => {
        const store = new CandidateStore(5, RANKED);
        const state = autoPlay(store, { target: 'crank', maxRounds: 2 });

        expect(state.status).toBe('out-of-rounds');
        expect(state.rounds).toHaveLength(2);
    });

    it('rejects a target of the wrong length', () => {
        const store = new CandidateStore(5, RANKED);
        expect(() => autoPlay(store, { target: 'cranky' })).toThrow(InvalidArgumentError);
    });
});
