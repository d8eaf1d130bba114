import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { DictionaryFormatError } from '@wordle-assist/engine';
import { DEFAULT_DICTIONARY_PATH } from '../src/config.js';
import { DictionaryLoadError, loadDictionary } from '../src/dictionary.js';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe('loadDictionary', () => {
    it('loads a plain word list', async () => {
        await expect(loadDictionary(fixture('plain.txt'))).resolves.toEqual(['crane', 'slate', 'trace']);
    });

    it('loads a ranked word list', async () => {
        await expect(loadDictionary(fixture('ranked.txt'))).resolves.toEqual([
            { word: 'crank', rank: 900 },
            { word: 'drank', rank: 800 },
            { word: 'prank', rank: 700 },
        ]);
    });

    it('loads the bundled dictionary', async () => {
        const words = await loadDictionary(DEFAULT_DICTIONARY_PATH);
        expect(words).toHaveLength(435);
        expect(words[0]).toEqual({ word: 'about', rank: 98000000 });
    });

    it('wraps a missing file in a DictionaryLoadError', async () => {
        const path = fixture('missing.txt');
        const error = await loadDictionary(path).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(DictionaryLoadError);
        expect(error).toMatchObject({
            message: `Failed to open the dictionary file: ${path}`,
            path,
            cause: { code: 'ENOENT' },
        });
    });

    it('lets format errors through', async () => {
        await expect(loadDictionary(fixture('mixed.txt'))).rejects.toThrow(
            new DictionaryFormatError('Line 2: plain words and "word,count" entries cannot be mixed', 2)
        );
    });
});
