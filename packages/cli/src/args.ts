import type { CliOptions } from './types.js';

export const USAGE = [
    'Usage: wallet-ledger [options]',
    '',
    'Options:',
    '  --config <path>   Read settings from a YAML file (default: config/wallet.yaml)',
    '  --log-dir <dir>   Write the session log to this directory',
    '  --no-log          Do not write a session log',
    '  -h, --help        Show this help',
];

/**
 * Parses command-line flags.
 *
 * @throws Error on an unknown flag or a flag missing its value
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
    const options: CliOptions = { help: false, noLog: false };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        switch (arg) {
            case '-h':
            case '--help':
                options.help = true;
                break;
            case '--no-log':
                options.noLog = true;
                break;
            case '--config':
                options.configPath = requireValue(argv, ++i, arg);
                break;
            case '--log-dir':
                options.logDir = requireValue(argv, ++i, arg);
                break;
            default:
                throw new Error(`Unknown option: ${arg}`);
        }
    }

    return options;
}

function requireValue(argv: readonly string[], index: number, flag: string): string {
    const value = argv[index];
    if (value === undefined || value.startsWith('-')) {
        throw new Error(`Option ${flag} requires a value`);
    }
    return value;
}
