import { parseArgs } from 'node:util';
import { fileURLToPath } from 'node:url';

/** Resolved command-line configuration */
export interface CliConfig {
    wordSize: number;
    displayLimit: number;
    auto: boolean;
    dictionaryPath: string;
    target?: string;
    seed?: string;
    maxRounds?: number;
    help: boolean;
}

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export const DEFAULT_WORD_SIZE = 5;
export const DEFAULT_DISPLAY_LIMIT = 10;
export const DEFAULT_DICTIONARY_PATH = fileURLToPath(new URL('../dictionary/words_freq.txt', import.meta.url));

function parseFlags(argv: string[]) {
    return parseArgs({
        args: argv,
        options: {
            width: { type: 'string', short: 'w' },
            'display-limit': { type: 'string', short: 'd' },
            auto: { type: 'boolean', short: 'a' },
            target: { type: 'string' },
            dictionary: { type: 'string' },
            seed: { type: 'string' },
            'max-rounds': { type: 'string' },
            help: { type: 'boolean', short: 'h' },
        },
        allowPositionals: false,
        strict: true,
    });
}

/** Blank environment values count as unset */
function fromEnv(env: Env, name: string): string | undefined {
    const value = env[name]?.trim();
    return value === undefined || value === '' ? undefined : value;
}

function parsePositiveInt(raw: string | undefined, source: string): number | undefined {
    if (raw === undefined) return undefined;
    if (!/^\d+$/.test(raw) || Number(raw) === 0) {
        throw new ConfigError(`${source} must be a positive integer, got "${raw}"`);
    }
    return Number(raw);
}

/**
 * Builds the configuration from flags, then environment variables, then defaults.
 *
 * @param argv - Arguments after the script name
 * @param env - Usually process.env, after .env has been loaded
 */
export function resolveConfig(argv: string[], env: Env): CliConfig {
    let values: ReturnType<typeof parseFlags>['values'];
    try {
        ({ values } = parseFlags(argv));
    } catch (error) {
        throw new ConfigError(error instanceof Error ? error.message : String(error));
    }

    const wordSize =
        parsePositiveInt(values.width, '--width') ??
        parsePositiveInt(fromEnv(env, 'WORDLE_WIDTH'), 'WORDLE_WIDTH') ??
        DEFAULT_WORD_SIZE;
    const displayLimit =
        parsePositiveInt(values['display-limit'], '--display-limit') ??
        parsePositiveInt(fromEnv(env, 'WORDLE_DISPLAY_LIMIT'), 'WORDLE_DISPLAY_LIMIT') ??
        DEFAULT_DISPLAY_LIMIT;

    const target = values.target?.trim().toLowerCase();
    if (target !== undefined && (target.length !== wordSize || !/^[a-z]+$/.test(target))) {
        throw new ConfigError(`--target must be a word of ${wordSize} letters, got "${values.target}"`);
    }

    return {
        wordSize,
        displayLimit,
        // simulating against a target always picks guesses automatically
        auto: (values.auto ?? false) || target !== undefined,
        dictionaryPath: values.dictionary ?? fromEnv(env, 'WORDLE_DICTIONARY') ?? DEFAULT_DICTIONARY_PATH,
        target,
        seed: values.seed ?? fromEnv(env, 'WORDLE_SEED'),
        maxRounds: parsePositiveInt(values['max-rounds'], '--max-rounds'),
        help: values.help ?? false,
    };
}

export function helpText(): string {
    return [
        'Usage: wordle-assist [options]',
        '',
        'Suggests candidate words for a Wordle-style puzzle and narrows them',
        'with the feedback of each guess (b = absent, y = present, g = correct).',
        '',
        'Options:',
        `  -w, --width <n>          word size (default ${DEFAULT_WORD_SIZE}, env WORDLE_WIDTH)`,
        `  -d, --display-limit <n>  suggestions shown per round (default ${DEFAULT_DISPLAY_LIMIT}, env WORDLE_DISPLAY_LIMIT)`,
        '  -a, --auto               propose the best candidate as the next guess',
        '      --target <word>      play a whole game against <word> without input',
        '      --max-rounds <n>     stop a --target game after n rounds',
        '      --dictionary <path>  word list, "word" or "word,count" per line (env WORDLE_DICTIONARY)',
        '      --seed <text>        seed for the suggestion sample (env WORDLE_SEED)',
        '  -h, --help               show this message',
    ].join('\n');
}
