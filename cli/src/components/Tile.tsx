import { Text } from 'ink';
import type { LetterResult } from '@wordle-assist/engine';

interface TileProps {
    letter: string;
    result?: LetterResult;
}

const resultColors: Record<LetterResult, string> = {
    correct: 'green',
    present: 'yellow',
    absent: 'gray',
};

export function Tile({ letter, result }: TileProps) {
    const label = ` ${letter === '' ? '_' : letter.toUpperCase()} `;

    if (!result) {
        return <Text>{label}</Text>;
    }

    return (
        <Text bold color="white" backgroundColor={resultColors[result]}>
            {label}
        </Text>
    );
}
