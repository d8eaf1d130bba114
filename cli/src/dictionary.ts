import { readFile } from 'node:fs/promises';
import { parseDictionary } from '@wordle-assist/engine';
import type { CandidateList } from '@wordle-assist/engine';

export class DictionaryLoadError extends Error {
    readonly path: string;

    constructor(path: string, cause: unknown) {
        super(`Failed to open the dictionary file: ${path}`, { cause });
        this.name = 'DictionaryLoadError';
        this.path = path;
    }
}

/**
 * Reads a dictionary file. Format errors propagate as DictionaryFormatError;
 * only failures to read the file are wrapped.
 */
export async function loadDictionary(path: string): Promise<CandidateList> {
    let text: string;
    try {
        text = await readFile(path, 'utf8');
    } catch (error) {
        throw new DictionaryLoadError(path, error);
    }
    return parseDictionary(text);
}
