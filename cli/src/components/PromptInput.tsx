import { Box, Text } from 'ink';
import TextInput from 'ink-text-input';

interface PromptInputProps {
    label: string;
    value: string;
    onChange: (value: string) => void;
    onSubmit: (value: string) => void;
}

export function PromptInput({ label, value, onChange, onSubmit }: PromptInputProps) {
    return (
        <Box>
            <Text bold>{label} </Text>
            <TextInput value={value} onChange={(next) => onChange(next.toLowerCase())} onSubmit={onSubmit} />
        </Box>
    );
}
