import { resolve } from 'node:path';
import { DEFAULT_PATHS } from '@ledger-replay/shared';
import type { CliArgs, ReplayOptions } from '../types.js';
import type { LoadedConfig } from './config.js';

/**
 * Merges command-line arguments, config and defaults into ReplayOptions.
 *
 * Precedence: CLI > config > defaults. CLI paths resolve against the working
 * directory, config paths against the config file's directory.
 */
export function resolveReplayOptions(
    args: CliArgs,
    { config, baseDir }: LoadedConfig,
    cwd: string = process.cwd()
): ReplayOptions {
    const pick = (fromArgs: string | undefined, fromConfig: string | undefined): string | undefined => {
        if (fromArgs) return resolve(cwd, fromArgs);
        if (fromConfig) return resolve(baseDir, fromConfig);
        return undefined;
    };

    return {
        input: pick(args.input, config.input) ?? resolve(cwd, DEFAULT_PATHS.INPUT),
        output: pick(args.output, config.output) ?? resolve(cwd, DEFAULT_PATHS.OUTPUT),
        report: pick(args.report, config.report),
        manifest: pick(args.manifest, config.manifest),
        echo: !args.quiet && config.echo,
        quiet: args.quiet,
    };
}
