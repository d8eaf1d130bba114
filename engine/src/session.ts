import type { LetterResult, Round, SessionState } from './types.js';
import type { CandidateStore } from './candidateStore.js';
import { assertValidRound, isFound, isFeedbackSymbol } from './feedback.js';

const LETTERS = /^[a-z]+$/;

/**
 * Creates a new solving session over a store.
 * A store with no words of the chosen size starts out exhausted.
 */
export function createSession(store: CandidateStore): SessionState {
    const remaining = store.size();
    return {
        wordSize: store.wordSize,
        rounds: [],
        remaining,
        status: remaining === 0 ? 'exhausted' : 'playing',
    };
}

/**
 * Validates a guess typed by the user before submission
 */
export function validateGuess(guess: string, wordSize: number): { valid: boolean; error?: string } {
    if (guess.length !== wordSize) {
        return { valid: false, error: `Guess must be ${wordSize} letters` };
    }

    if (!LETTERS.test(guess)) {
        return { valid: false, error: 'Guess must contain only lowercase letters' };
    }

    return { valid: true };
}

/**
 * Validates a feedback string typed by the user before submission
 */
export function validateFeedback(feedback: string, wordSize: number): { valid: boolean; error?: string } {
    if (feedback.length !== wordSize) {
        return { valid: false, error: `Feedback must be ${wordSize} characters` };
    }

    if (![...feedback].every(isFeedbackSymbol)) {
        return { valid: false, error: 'Feedback must use b (absent), y (present) and g (correct)' };
    }

    return { valid: true };
}

/**
 * Plays one round and returns the updated session state.
 * The store is narrowed in place; the state itself is never mutated.
 * Invalid input throws InvalidArgumentError and leaves both untouched.
 */
export function submitRound(
    store: CandidateStore,
    state: SessionState,
    guess: string,
    feedback: string
): SessionState {
    if (state.status !== 'playing') {
        return state;
    }

    const result = assertValidRound(guess, feedback, store.wordSize);

    if (isFound(feedback)) {
        const round: Round = { guess, result, remaining: store.size() };
        return { ...state, rounds: [...state.rounds, round], status: 'solved' };
    }

    const remaining = store.update(guess, feedback);
    const round: Round = { guess, result, remaining };

    return {
        ...state,
        rounds: [...state.rounds, round],
        remaining,
        status: remaining === 0 ? 'exhausted' : 'playing',
    };
}

/**
 * Best remaining candidate: the highest ranked one, or the first in
 * dictionary order. Null once nothing is left.
 */
export function nextGuess(store: CandidateStore): string | null {
    const [best] = store.candidateWords(1);
    return best ?? null;
}

/**
 * Computes per-letter statuses from every played round, for the keyboard display.
 * Uses max precedence: correct > present > absent.
 * Only letters that appear in a guess have a status.
 */
export function computeLetterStatuses(rounds: readonly Round[]): Record<string, LetterResult> {
    const statuses: Record<string, LetterResult> = {};

    for (const { guess, result } of rounds) {
        for (let i = 0; i < guess.length; i++) {
            const letter = guess[i];
            const status = result[i];

            if (status === 'correct') {
                statuses[letter] = 'correct';
            } else if (status === 'present' && statuses[letter] !== 'correct') {
                statuses[letter] = 'present';
            } else if (status === 'absent' && !statuses[letter]) {
                statuses[letter] = 'absent';
            }
        }
    }

    return statuses;
}
