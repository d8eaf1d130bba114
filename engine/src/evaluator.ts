import type { GuessResult, LetterResult } from './types.js';
import { InvalidArgumentError } from './errors.js';
import { formatFeedback } from './feedback.js';

/**
 * Scores a guess against a target word the way the puzzle does.
 *
 * Algorithm:
 * 1. First pass: mark all correct letters
 * 2. Second pass: mark present letters, left to right, while the target
 *    still has unmatched copies of the letter
 */
export function evaluateGuess(guess: string, target: string): GuessResult {
    const guessLower = guess.toLowerCase();
    const targetLower = target.toLowerCase();

    if (guessLower.length !== targetLower.length) {
        throw new InvalidArgumentError(
            `Guess length (${guessLower.length}) must match target length (${targetLower.length})`
        );
    }

    const result: LetterResult[] = new Array<LetterResult>(guessLower.length).fill('absent');
    const unmatched = new Map<string, number>();

    // Target letters not consumed by a correct match
    for (let i = 0; i < targetLower.length; i++) {
        if (guessLower[i] === targetLower[i]) {
            result[i] = 'correct';
        } else {
            const letter = targetLower[i];
            unmatched.set(letter, (unmatched.get(letter) ?? 0) + 1);
        }
    }

    for (let i = 0; i < guessLower.length; i++) {
        if (result[i] === 'correct') continue;

        const letter = guessLower[i];
        const remaining = unmatched.get(letter) ?? 0;
        if (remaining > 0) {
            result[i] = 'present';
            unmatched.set(letter, remaining - 1);
        }
    }

    return result;
}

/** Same as evaluateGuess, written as a b/y/g feedback string */
export function evaluateFeedback(guess: string, target: string): string {
    return formatFeedback(evaluateGuess(guess, target));
}

/**
 * Checks if a guess result indicates a solved word (all correct)
 */
export function isSolved(result: GuessResult): boolean {
    return result.length > 0 && result.every((r) => r === 'correct');
}
