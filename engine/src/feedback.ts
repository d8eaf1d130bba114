import type { FeedbackSymbol, GuessResult, LetterResult } from './types.js';
import { InvalidArgumentError } from './errors.js';

/** Allowed feedback characters, in the order they are reported in errors */
export const FEEDBACK_SYMBOLS = 'byg';

const SYMBOL_RESULTS: Record<FeedbackSymbol, LetterResult> = {
    b: 'absent',
    y: 'present',
    g: 'correct',
};

const RESULT_SYMBOLS: Record<LetterResult, FeedbackSymbol> = {
    absent: 'b',
    present: 'y',
    correct: 'g',
};

export function isFeedbackSymbol(ch: string): ch is FeedbackSymbol {
    return ch === 'b' || ch === 'y' || ch === 'g';
}

function invalidStatusError(feedback: string): InvalidArgumentError {
    return new InvalidArgumentError(
        `Invalid status characters in [${feedback}], status characters must be from: [${FEEDBACK_SYMBOLS}]`
    );
}

/**
 * Converts a feedback string ("bbygg") into letter results.
 * Throws InvalidArgumentError on any character outside b/y/g.
 */
export function parseFeedback(feedback: string): GuessResult {
    const result: GuessResult = [];
    for (const ch of feedback) {
        if (!isFeedbackSymbol(ch)) {
            throw invalidStatusError(feedback);
        }
        result.push(SYMBOL_RESULTS[ch]);
    }
    return result;
}

export function formatFeedback(result: GuessResult): string {
    return result.map((r) => RESULT_SYMBOLS[r]).join('');
}

/**
 * Checks a guess/feedback pair against the word size and parses the feedback.
 * Nothing is filtered until both checks pass.
 */
export function assertValidRound(guess: string, feedback: string, wordSize: number): GuessResult {
    if (guess.length !== wordSize || feedback.length !== wordSize) {
        throw new InvalidArgumentError(
            `Invalid number of characters in [${guess}], and/or [${feedback}], they must contain exactly [${wordSize}] characters`
        );
    }
    return parseFeedback(feedback);
}

/** True when the feedback marks every letter correct */
export function isFound(feedback: string): boolean {
    return feedback.length > 0 && [...feedback].every((ch) => ch === 'g');
}

/** True when the text is made only of feedback symbols (e.g. typed where a guess was expected) */
export function looksLikeFeedback(text: string): boolean {
    return text.length > 0 && [...text].every(isFeedbackSymbol);
}
