import type { RankedWord } from './types.js';
import { DictionaryFormatError } from './errors.js';

/**
 * Parses dictionary text: one word per line, or one `word,count` pair per line.
 * Blank lines are skipped and words are lowercased. The two formats cannot be mixed.
 */
export function parseDictionary(text: string): string[] | RankedWord[] {
    const plain: string[] = [];
    const ranked: RankedWord[] = [];

    const lines = text.split('\n');
    for (let i = 0; i < lines.length; i++) {
        const line = lines[i].trim();
        if (line === '') continue;
        const lineNumber = i + 1;

        const separator = line.indexOf(',');
        if (separator === -1) {
            plain.push(line.toLowerCase());
        } else {
            const word = line.slice(0, separator).trim().toLowerCase();
            const count = line.slice(separator + 1).trim();
            if (word === '' || !/^\d+$/.test(count)) {
                throw new DictionaryFormatError(
                    `Line ${lineNumber}: expected "word,count" but found "${line}"`,
                    lineNumber
                );
            }
            ranked.push({ word, rank: Number(count) });
        }

        if (plain.length > 0 && ranked.length > 0) {
            throw new DictionaryFormatError(
                `Line ${lineNumber}: plain words and "word,count" entries cannot be mixed`,
                lineNumber
            );
        }
    }

    return ranked.length > 0 ? ranked : plain;
}
