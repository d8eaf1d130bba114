import type { GuessResult, HistoryEntry, LetterConstraint } from './types.js';
import type { Words } from './words.js';
import { countLetter } from './words.js';
import { parseFeedback } from './feedback.js';

/**
 * Groups the positions of a guess by letter, in order of first appearance,
 * and turns each group's marks into one constraint.
 *
 * Every correct mark pins the letter to its position; present and absent marks
 * forbid it there. Present and correct marks together set the minimum count.
 * A single absent mark among them caps the letter at exactly that count,
 * which is zero (letter not in the word) when no mark confirmed it.
 */
export function deriveConstraints(guess: string, result: GuessResult): LetterConstraint[] {
    const byLetter = new Map<string, LetterConstraint>();
    const capped = new Set<string>();

    for (let i = 0; i < guess.length; i++) {
        const letter = guess[i];
        let constraint = byLetter.get(letter);
        if (!constraint) {
            constraint = { letter, at: [], notAt: [], minCount: 0, maxCount: null };
            byLetter.set(letter, constraint);
        }

        switch (result[i]) {
            case 'correct':
                constraint.at.push(i);
                constraint.minCount++;
                break;
            case 'present':
                constraint.notAt.push(i);
                constraint.minCount++;
                break;
            case 'absent':
                constraint.notAt.push(i);
                capped.add(letter);
                break;
        }
    }

    for (const letter of capped) {
        const constraint = byLetter.get(letter);
        if (constraint) constraint.maxCount = constraint.minCount;
    }

    return [...byLetter.values()];
}

/** Narrows the stored words to those satisfying one letter constraint */
export function applyConstraint(words: Words, constraint: LetterConstraint): void {
    const { letter, at, notAt, minCount, maxCount } = constraint;

    for (const position of at) {
        words.exists(letter, position);
    }
    for (const position of notAt) {
        words.doesNotExist(letter, position);
    }

    if (maxCount === 0) {
        words.doesNotExist(letter);
        return;
    }
    if (minCount === 1) {
        words.exists(letter);
    } else if (minCount > 1) {
        words.removeIfFewerThan(letter, minCount);
    }
    if (maxCount !== null) {
        words.removeIfAtLeast(letter, maxCount + 1);
    }
}

function satisfies(word: string, constraint: LetterConstraint): boolean {
    const { letter, at, notAt, minCount, maxCount } = constraint;
    if (!at.every((position) => word[position] === letter)) return false;
    if (notAt.some((position) => word[position] === letter)) return false;

    const count = countLetter(word, letter);
    return count >= minCount && (maxCount === null || count <= maxCount);
}

/** Re-checks a single word against one guess and its feedback */
export function isConsistent(word: string, guess: string, result: GuessResult): boolean {
    if (word.length !== guess.length) return false;
    return deriveConstraints(guess, result).every((constraint) => satisfies(word, constraint));
}

/**
 * Filters a word list against a whole history of guesses in one go.
 * Agrees with replaying the same history through CandidateStore.update.
 */
export function filterByHistory(words: readonly string[], history: readonly HistoryEntry[]): string[] {
    const checks = history.map(({ guess, feedback }) => ({ guess, result: parseFeedback(feedback) }));
    return words.filter((word) => checks.every(({ guess, result }) => isConsistent(word, guess, result)));
}
