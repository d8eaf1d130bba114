import { Box, Text } from 'ink';

interface SuggestionsProps {
    total: number;
    words: string[];
    displayLimit: number;
    /** Guess picked by the tool in automatic mode */
    proposed?: string;
}

export function Suggestions({ total, words, displayLimit, proposed }: SuggestionsProps) {
    const header = total > displayLimit
        ? `There are ${total} possible words, try one of these:`
        : `Only following ${total} possible words remaining:`;

    return (
        <Box flexDirection="column" marginY={1}>
            <Text>{header}</Text>
            {words.map((word, i) => (
                <Text key={`${i}-${word}`} color={word === proposed ? 'cyan' : undefined}>
                    {'  '}{word}
                </Text>
            ))}
            {proposed !== undefined && (
                <Text>
                    Next guess: <Text bold color="cyan">{proposed}</Text>
                </Text>
            )}
        </Box>
    );
}
