// Types
export type {
    LetterResult,
    GuessResult,
    FeedbackSymbol,
    RankedWord,
    CandidateList,
    LetterConstraint,
    HistoryEntry,
    Round,
    SessionStatus,
    SessionState,
    AutoPlayOptions,
} from './types.js';

// Errors
export { InvalidArgumentError, IndexOutOfRangeError, DictionaryFormatError } from './errors.js';

// Candidate store
export { CandidateStore } from './candidateStore.js';
export type { Words } from './words.js';
export { PlainWords, RankedWords, createWords, countLetter } from './words.js';

// Feedback
export {
    FEEDBACK_SYMBOLS,
    isFeedbackSymbol,
    parseFeedback,
    formatFeedback,
    assertValidRound,
    isFound,
    looksLikeFeedback,
} from './feedback.js';

// Consistency
export { deriveConstraints, applyConstraint, isConsistent, filterByHistory } from './constraints.js';

// Evaluator
export { evaluateGuess, evaluateFeedback, isSolved } from './evaluator.js';

// Session
export {
    createSession,
    submitRound,
    validateGuess,
    validateFeedback,
    nextGuess,
    computeLetterStatuses,
} from './session.js';
export { autoPlay } from './autoplay.js';

// Dictionary and display sampling
export { parseDictionary } from './dictionary.js';
export { createRandom, mulberry32, seedFromString, sampleWords } from './sampling.js';
