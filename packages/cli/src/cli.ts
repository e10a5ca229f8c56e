import { parseCliArgs, USAGE } from './utils/args.js';
import { loadConfig } from './workspace/config.js';
import { resolveReplayOptions } from './workspace/paths.js';
import { replay } from './commands/replay.js';
import { log, logError, error } from './utils/console.js';

/**
 * Run the CLI on `argv` (without the node and script entries); resolves to the exit code.
 */
export async function run(argv: string[]): Promise<number> {
    let args;
    try {
        args = parseCliArgs(argv);
    } catch (err) {
        error((err as Error).message);
        logError(USAGE);
        return 1;
    }

    if (args.help) {
        log(USAGE);
        return 0;
    }

    let config;
    try {
        config = loadConfig(args.config);
    } catch (err) {
        error(`Failed to load config. ${(err as Error).message}`);
        return 1;
    }

    return replay(resolveReplayOptions(args, config));
}

