import type { CliArgs } from '../types.js';

const VALUE_FLAGS = {
    '--config': 'config',
    '--report': 'report',
    '--manifest': 'manifest',
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(arg: string): arg is ValueFlag {
    return Object.hasOwn(VALUE_FLAGS, arg);
}

/**
 * Parse `ledger-replay [input] [output] [--config file] [--report file.xlsx]
 * [--manifest file.json] [--quiet] [--help]`.
 *
 * @throws Error on unknown flags, flags missing their value, or extra positionals
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
    const args: CliArgs = { quiet: false, help: false };
    const positionals: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '--help' || arg === '-h') {
            args.help = true;
        } else if (arg === '--quiet' || arg === '-q') {
            args.quiet = true;
        } else if (isValueFlag(arg)) {
            const value = argv[i + 1];
            if (value === undefined || value.startsWith('-')) {
                throw new Error(`Missing value for ${arg}`);
            }
            args[VALUE_FLAGS[arg]] = value;
            i++;
        } else if (arg.startsWith('-')) {
            throw new Error(`Unknown option: ${arg}`);
        } else {
            positionals.push(arg);
        }
    }

    if (positionals.length > 2) {
        throw new Error(`Too many arguments: ${positionals.slice(2).join(' ')}`);
    }

    [args.input, args.output] = positionals;
    return args;
}

export const USAGE = [
    'Usage: ledger-replay [input.csv] [output.csv] [options]',
    '',
    'Replays transactions from input.csv (default: transactions.csv) and writes',
    'the final account balances to output.csv (default: accounts.csv).',
    '',
    'Options:',
    '  --config <file>     YAML config (default: ./ledger-replay.yaml if present)',
    '  --report <file>     Also write an Excel report of the balances',
    '  --manifest <file>   Also write a JSON run manifest',
    '  -q, --quiet         No progress output and no CSV echo on stdout',
    '  -h, --help          Show this message',
].join('\n');
