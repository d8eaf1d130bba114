import type { CandidateList, RankedWord } from './types.js';
import { IndexOutOfRangeError } from './errors.js';

/**
 * Storage for the remaining candidate words.
 * Every operation only ever removes entries; nothing is added back.
 */
export interface Words {
    readonly wordSize: number;

    /** Keep only words containing `letter` (anywhere, or at `position` when given) */
    exists(letter: string, position?: number): void;

    /** Drop words containing `letter` (anywhere, or at `position` when given) */
    doesNotExist(letter: string, position?: number): void;

    /** Drop words with `n` or more occurrences of `letter` */
    removeIfAtLeast(letter: string, n: number): void;

    /** Drop words with fewer than `n` occurrences of `letter` */
    removeIfFewerThan(letter: string, n: number): void;

    countAll(): number;

    /**
     * Up to `n` remaining words in storage order.
     * All of them when fewer remain, an empty list when none do.
     */
    wordsUpTo(n: number): string[];

    allWords(): string[];
}

/** Counts occurrences of a single letter in a word */
export function countLetter(word: string, letter: string): number {
    let count = 0;
    for (const ch of word) {
        if (ch === letter) count++;
    }
    return count;
}

abstract class FilteredWords<T> implements Words {
    readonly wordSize: number;
    private entries: T[];

    protected constructor(wordSize: number, entries: T[]) {
        this.wordSize = wordSize;
        this.entries = entries.filter((entry) => this.wordOf(entry).length === wordSize);
    }

    protected abstract wordOf(entry: T): string;

    exists(letter: string, position?: number): void {
        if (position === undefined) {
            this.keep((word) => word.includes(letter));
            return;
        }
        this.validateIndex(position);
        this.keep((word) => word[position] === letter);
    }

    doesNotExist(letter: string, position?: number): void {
        if (position === undefined) {
            this.keep((word) => !word.includes(letter));
            return;
        }
        this.validateIndex(position);
        this.keep((word) => word[position] !== letter);
    }

    removeIfAtLeast(letter: string, n: number): void {
        this.keep((word) => countLetter(word, letter) < n);
    }

    removeIfFewerThan(letter: string, n: number): void {
        this.keep((word) => countLetter(word, letter) >= n);
    }

    countAll(): number {
        return this.entries.length;
    }

    wordsUpTo(n: number): string[] {
        return this.entries.slice(0, Math.max(0, n)).map((entry) => this.wordOf(entry));
    }

    allWords(): string[] {
        return this.entries.map((entry) => this.wordOf(entry));
    }

    private keep(predicate: (word: string) => boolean): void {
        this.entries = this.entries.filter((entry) => predicate(this.wordOf(entry)));
    }

    private validateIndex(position: number): void {
        if (!Number.isInteger(position) || position < 0 || position >= this.wordSize) {
            throw new IndexOutOfRangeError(
                `Index [${position}] must be less than word size [${this.wordSize}]`
            );
        }
    }
}

/** Plain word list, kept in insertion order */
export class PlainWords extends FilteredWords<string> {
    constructor(wordSize: number, words: readonly string[]) {
        super(wordSize, [...words]);
    }

    protected wordOf(entry: string): string {
        return entry;
    }
}

/**
 * Word list ordered by rank, highest first. Equal ranks keep their input order.
 * Strings are materialized on every read, so large reads cost O(n).
 */
export class RankedWords extends FilteredWords<RankedWord> {
    constructor(wordSize: number, words: readonly RankedWord[]) {
        super(
            wordSize,
            words.map((entry) => ({ ...entry })).sort((a, b) => b.rank - a.rank)
        );
    }

    protected wordOf(entry: RankedWord): string {
        return entry.word;
    }
}

function isRankedList(candidates: CandidateList): candidates is readonly RankedWord[] {
    for (const candidate of candidates) {
        if (typeof candidate !== 'string') return true;
    }
    return false;
}

/** Picks the storage variant from the shape of the dictionary */
export function createWords(wordSize: number, candidates: CandidateList): Words {
    if (isRankedList(candidates)) {
        return new RankedWords(wordSize, candidates);
    }
    return new PlainWords(wordSize, candidates);
}
