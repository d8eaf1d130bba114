import * as dotenv from 'dotenv';
import { render } from 'ink';
import { CandidateStore, autoPlay, createRandom } from '@wordle-assist/engine';
import { App } from './App.js';
import { Transcript } from './components/Transcript.js';
import { helpText, resolveConfig } from './config.js';
import { loadDictionary } from './dictionary.js';

dotenv.config();

async function main() {
    const config = resolveConfig(process.argv.slice(2), process.env);
    if (config.help) {
        console.log(helpText());
        return;
    }

    const candidates = await loadDictionary(config.dictionaryPath);
    const store = new CandidateStore(config.wordSize, candidates);

    if (config.target !== undefined) {
        const session = autoPlay(store, { target: config.target, maxRounds: config.maxRounds });
        const { unmount } = render(<Transcript session={session} target={config.target} />);
        unmount();
        if (session.status !== 'solved') {
            process.exitCode = 1;
        }
        return;
    }

    const { waitUntilExit } = render(
        <App
            store={store}
            displayLimit={config.displayLimit}
            auto={config.auto}
            random={createRandom(config.seed)}
        />
    );
    await waitUntilExit();
}

main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
});
