import type { CandidateList } from './types.js';
import type { Words } from './words.js';
import { createWords } from './words.js';
import { InvalidArgumentError } from './errors.js';
import { assertValidRound } from './feedback.js';
import { applyConstraint, deriveConstraints } from './constraints.js';

/**
 * Holds the words still consistent with every feedback seen so far and
 * narrows them one guess at a time.
 *
 * Not safe for concurrent use: callers own the instance exclusively.
 */
export class CandidateStore {
    private readonly words: Words;

    /**
     * @param wordSize - Length of every word in the puzzle
     * @param candidates - Plain words, or words with ranks (highest rank listed first).
     *   Words of any other length are dropped.
     */
    constructor(wordSize: number, candidates: CandidateList) {
        if (!Number.isInteger(wordSize) || wordSize <= 0) {
            throw new InvalidArgumentError(`Word size must be a positive integer, got [${wordSize}]`);
        }
        this.words = createWords(wordSize, candidates);
    }

    get wordSize(): number {
        return this.words.wordSize;
    }

    /**
     * Applies the feedback for one guess, e.g. update('crane', 'bbygg').
     * Invalid input throws InvalidArgumentError before anything is removed.
     *
     * @returns The number of candidates left
     */
    update(guess: string, feedback: string): number {
        const result = assertValidRound(guess, feedback, this.wordSize);

        for (const constraint of deriveConstraints(guess, result)) {
            applyConstraint(this.words, constraint);
        }

        return this.words.countAll();
    }

    size(): number {
        return this.words.countAll();
    }

    /**
     * Up to `limit` candidates in storage order (rank order for ranked dictionaries).
     * Ranked storage builds the strings on each call, so large limits are O(n).
     */
    candidateWords(limit: number): string[] {
        return this.words.wordsUpTo(limit);
    }

    allWords(): string[] {
        return this.words.allWords();
    }
}
