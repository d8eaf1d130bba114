import { Box, Text } from 'ink';
import type { SessionState } from '@wordle-assist/engine';
import { Board } from './Board.js';
import { SessionBanner } from './SessionBanner.js';

interface TranscriptProps {
    session: SessionState;
    target: string;
}

/** Finished automatic game, printed once */
export function Transcript({ session, target }: TranscriptProps) {
    return (
        <Box flexDirection="column">
            <Text>
                Target: <Text bold>{target.toUpperCase()}</Text>
            </Text>
            <Board rounds={session.rounds} wordSize={session.wordSize} />
            <SessionBanner session={session} />
        </Box>
    );
}
