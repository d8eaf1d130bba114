/** Result of evaluating a single letter in a guess */
export type LetterResult = 'correct' | 'present' | 'absent';

/** Result of evaluating a full guess against a target word */
export type GuessResult = LetterResult[];

/** Textual feedback symbol: b = absent, y = present, g = correct */
export type FeedbackSymbol = 'b' | 'y' | 'g';

/** A dictionary word paired with its rank (e.g. usage frequency); higher ranks sort first */
export interface RankedWord {
    word: string;
    rank: number;
}

/** Initial dictionary handed to a candidate store */
export type CandidateList = readonly string[] | readonly RankedWord[];

/** Everything one guess+feedback pair says about a single letter */
export interface LetterConstraint {
    letter: string;
    /** Positions where the letter must appear */
    at: number[];
    /** Positions where the letter must not appear */
    notAt: number[];
    minCount: number;
    maxCount: number | null; // null when no absent mark caps the letter
}

/** A guess and its feedback, as typed by the user */
export interface HistoryEntry {
    guess: string;
    feedback: string;
}

/** One played round of a solving session */
export interface Round {
    guess: string;
    result: GuessResult;
    /** Candidates left after the round was applied */
    remaining: number;
}

export type SessionStatus = 'playing' | 'solved' | 'exhausted' | 'out-of-rounds';

/** State of a solving session */
export interface SessionState {
    wordSize: number;
    rounds: Round[];
    remaining: number;
    status: SessionStatus;
}

/** Options for playing a session automatically against a known target */
export interface AutoPlayOptions {
    target: string;
    firstGuess?: string;
    maxRounds?: number;
}
