import type { AutoPlayOptions, SessionState } from './types.js';
import type { CandidateStore } from './candidateStore.js';
import { InvalidArgumentError } from './errors.js';
import { evaluateFeedback } from './evaluator.js';
import { createSession, nextGuess, submitRound } from './session.js';

/**
 * Plays a whole session without user input: each round guesses the best
 * remaining candidate and scores it against the known target.
 *
 * Stops when the word is found, when no candidate is left (target missing
 * from the dictionary) or after `maxRounds` rounds.
 */
export function autoPlay(store: CandidateStore, options: AutoPlayOptions): SessionState {
    const target = options.target.toLowerCase();
    const { firstGuess, maxRounds = Number.POSITIVE_INFINITY } = options;

    if (target.length !== store.wordSize) {
        throw new InvalidArgumentError(
            `Target [${target}] must contain exactly [${store.wordSize}] characters`
        );
    }

    let state = createSession(store);

    while (state.status === 'playing') {
        if (state.rounds.length >= maxRounds) {
            return { ...state, status: 'out-of-rounds' };
        }

        const guess = state.rounds.length === 0 && firstGuess !== undefined
            ? firstGuess.toLowerCase()
            : nextGuess(store);
        if (guess === null) {
            return { ...state, status: 'exhausted' };
        }

        state = submitRound(store, state, guess, evaluateFeedback(guess, target));
    }

    return state;
}
