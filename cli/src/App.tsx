import { useEffect, useMemo, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import { computeLetterStatuses, sampleWords } from '@wordle-assist/engine';
import type { CandidateStore } from '@wordle-assist/engine';
import { Board } from './components/Board.js';
import { Keyboard } from './components/Keyboard.js';
import { PromptInput } from './components/PromptInput.js';
import { SessionBanner } from './components/SessionBanner.js';
import { Suggestions } from './components/Suggestions.js';
import { createPromptState, submitInput } from './prompt.js';
import type { Phase } from './prompt.js';

export interface AppProps {
    store: CandidateStore;
    displayLimit: number;
    /** Propose the best candidate instead of asking for a guess */
    auto: boolean;
    random: () => number;
}

function promptLabel(phase: Phase, guess: string): string {
    switch (phase) {
        case 'guess':
            return 'Enter the selected word:';
        case 'confirm':
            return 'Did you just enter feedback instead of a word (y/n)?';
        case 'feedback':
            return `Enter the feedback for ${guess.toUpperCase()} (b/y/g):`;
    }
}

export function App({ store, displayLimit, auto, random }: AppProps) {
    const { exit } = useApp();
    const [prompt, setPrompt] = useState(() => createPromptState(store, auto));
    const [input, setInput] = useState('');
    const { session, phase, guess, message } = prompt;

    // Resampled only when a round narrows the store
    const suggestions = useMemo(
        () => sampleWords(store.allWords(), displayLimit, random),
        [session, store, displayLimit, random]
    );

    useEffect(() => {
        if (session.status !== 'playing') {
            exit();
        }
    }, [session.status, exit]);

    const handleSubmit = (value: string) => {
        setPrompt(submitInput(store, prompt, value, auto));
        setInput('');
    };

    const playing = session.status === 'playing';
    const pending = !playing ? undefined : phase === 'guess' ? input : guess;

    return (
        <Box flexDirection="column">
            <SessionBanner session={session} />
            <Board rounds={session.rounds} wordSize={store.wordSize} pending={pending} />
            <Keyboard statuses={computeLetterStatuses(session.rounds)} />
            {playing && (
                <Box flexDirection="column">
                    <Suggestions
                        total={session.remaining}
                        words={suggestions}
                        displayLimit={displayLimit}
                        proposed={auto ? guess : undefined}
                    />
                    <PromptInput
                        label={promptLabel(phase, guess)}
                        value={input}
                        onChange={setInput}
                        onSubmit={handleSubmit}
                    />
                    {message !== null && <Text color="red">{message}</Text>}
                </Box>
            )}
        </Box>
    );
}
