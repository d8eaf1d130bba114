/** A guess, feedback or construction argument that the engine cannot accept */
export class InvalidArgumentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidArgumentError';
    }
}

/**
 * A letter position outside the word. Indicates a programming defect:
 * validated input never produces one.
 */
export class IndexOutOfRangeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'IndexOutOfRangeError';
    }
}

export class DictionaryFormatError extends Error {
    readonly lineNumber: number;

    constructor(message: string, lineNumber: number) {
        super(message);
        this.name = 'DictionaryFormatError';
        this.lineNumber = lineNumber;
    }
}
