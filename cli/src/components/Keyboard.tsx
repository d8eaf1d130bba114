import { Box, Text } from 'ink';
import type { LetterResult } from '@wordle-assist/engine';

const KEYBOARD_ROWS = [
    ['q', 'w', 'e', 'r', 't', 'y', 'u', 'i', 'o', 'p'],
    ['a', 's', 'd', 'f', 'g', 'h', 'j', 'k', 'l'],
    ['z', 'x', 'c', 'v', 'b', 'n', 'm'],
];

interface KeyboardProps {
    statuses: Record<string, LetterResult>;
}

const stateColors: Record<LetterResult, string> = {
    correct: 'green',
    present: 'yellow',
    absent: 'gray',
};

function Key({ letter, status }: { letter: string; status?: LetterResult }) {
    if (!status) {
        return <Text>{letter.toUpperCase()} </Text>;
    }
    return (
        <Text color={stateColors[status]} strikethrough={status === 'absent'}>
            {letter.toUpperCase()}{' '}
        </Text>
    );
}

export function Keyboard({ statuses }: KeyboardProps) {
    return (
        <Box flexDirection="column" alignItems="center">
            {KEYBOARD_ROWS.map((row, rowIndex) => (
                <Box key={rowIndex}>
                    {row.map((letter) => (
                        <Key key={letter} letter={letter} status={statuses[letter]} />
                    ))}
                </Box>
            ))}
        </Box>
    );
}
