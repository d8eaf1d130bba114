import { Box, Text } from 'ink';
import type { Round } from '@wordle-assist/engine';
import { BoardRow } from './BoardRow.js';

interface BoardProps {
    rounds: Round[];
    wordSize: number;
    /** Guess being typed or waiting for its feedback */
    pending?: string;
}

export function Board({ rounds, wordSize, pending }: BoardProps) {
    return (
        <Box flexDirection="column" marginY={1}>
            {rounds.map((round, i) => (
                <Box key={i}>
                    <BoardRow guess={round.guess} wordSize={wordSize} result={round.result} />
                    <Text dimColor>  {round.remaining} left</Text>
                </Box>
            ))}
            {pending !== undefined && <BoardRow guess={pending} wordSize={wordSize} />}
        </Box>
    );
}
