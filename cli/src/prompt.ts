import {
    InvalidArgumentError,
    createSession,
    looksLikeFeedback,
    nextGuess,
    submitRound,
    validateFeedback,
    validateGuess,
} from '@wordle-assist/engine';
import type { CandidateStore, SessionState } from '@wordle-assist/engine';

export type Phase = 'guess' | 'confirm' | 'feedback';

/** Where the interactive loop stands between two prompts */
export interface PromptState {
    session: SessionState;
    phase: Phase;
    /** Guess the next feedback applies to */
    guess: string;
    /** Shown under the prompt until the next submission */
    message: string | null;
}

/**
 * Starts the loop. In automatic mode the best candidate is proposed and the
 * first prompt asks for its feedback.
 */
export function createPromptState(store: CandidateStore, auto: boolean): PromptState {
    return {
        session: createSession(store),
        phase: auto ? 'feedback' : 'guess',
        guess: auto ? nextGuess(store) ?? '' : '',
        message: null,
    };
}

function submitGuess(store: CandidateStore, state: PromptState, value: string): PromptState {
    const validation = validateGuess(value, store.wordSize);
    if (!validation.valid) {
        return { ...state, message: validation.error ?? 'Invalid guess' };
    }

    // a guess made only of b/y/g is probably feedback typed too early
    const phase = looksLikeFeedback(value) ? 'confirm' : 'feedback';
    return { ...state, phase, guess: value, message: null };
}

function confirmGuess(state: PromptState, value: string): PromptState {
    if (value === 'y') {
        return { ...state, phase: 'guess', guess: '', message: 'Okay! Try again.' };
    }
    if (value === 'n') {
        return { ...state, phase: 'feedback', message: null };
    }
    return { ...state, message: 'Answer y or n' };
}

function submitFeedback(store: CandidateStore, state: PromptState, value: string, auto: boolean): PromptState {
    const validation = validateFeedback(value, store.wordSize);
    if (!validation.valid) {
        return { ...state, message: validation.error ?? 'Invalid feedback' };
    }

    let session: SessionState;
    try {
        session = submitRound(store, state.session, state.guess, value);
    } catch (e) {
        if (e instanceof InvalidArgumentError) {
            return { ...state, message: e.message };
        }
        throw e;
    }

    if (auto) {
        return { session, phase: 'feedback', guess: nextGuess(store) ?? '', message: null };
    }
    return { session, phase: 'guess', guess: '', message: null };
}

/**
 * Applies one line of user input. Narrows the store when a round is
 * submitted; once the session has ended the state is returned unchanged.
 */
export function submitInput(store: CandidateStore, state: PromptState, input: string, auto: boolean): PromptState {
    if (state.session.status !== 'playing') {
        return state;
    }

    const value = input.trim();
    switch (state.phase) {
        case 'guess':
            return submitGuess(store, state, value);
        case 'confirm':
            return confirmGuess(state, value);
        case 'feedback':
            return submitFeedback(store, state, value, auto);
    }
}
