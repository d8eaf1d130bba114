import { Box, Text } from 'ink';
import type { SessionState } from '@wordle-assist/engine';

interface SessionBannerProps {
    session: SessionState;
}

export function SessionBanner({ session }: SessionBannerProps) {
    const { status, rounds, remaining } = session;

    if (status === 'playing') {
        return (
            <Text color="gray">
                Round {rounds.length + 1}, {remaining} candidates left
            </Text>
        );
    }

    const won = status === 'solved';
    return (
        <Box borderStyle="round" borderColor={won ? 'green' : 'red'} paddingX={1} flexDirection="column">
            <Text bold color={won ? 'green' : 'red'}>
                {won && 'Congratulations! You found the word!'}
                {status === 'exhausted' && 'Unable to find any suitable words from dictionary'}
                {status === 'out-of-rounds' && 'Out of rounds before finding the word'}
            </Text>
            <Text color="gray">
                Rounds played: {rounds.length}
            </Text>
        </Box>
    );
}
