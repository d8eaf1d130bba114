import { Box } from 'ink';
import type { GuessResult } from '@wordle-assist/engine';
import { Tile } from './Tile.js';

interface BoardRowProps {
    guess: string;
    wordSize: number;
    result?: GuessResult;
}

export function BoardRow({ guess, wordSize, result }: BoardRowProps) {
    const letters = guess.padEnd(wordSize, ' ').split('');

    return (
        <Box>
            {letters.map((letter, i) => (
                <Tile key={i} letter={letter.trim()} result={result?.[i]} />
            ))}
        </Box>
    );
}
