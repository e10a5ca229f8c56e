import { readFileSync, existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse } from 'yaml';
import { DEFAULT_PATHS, ReplayConfigSchema, type ReplayConfig } from '@ledger-replay/shared';

export interface LoadedConfig {
    config: ReplayConfig;
    /** Directory that relative paths in the config resolve against */
    baseDir: string;
}

/**
 * Loads the replay config.
 *
 * An explicit path must exist. Without one, ./ledger-replay.yaml is used when
 * present, otherwise defaults apply.
 */
export function loadConfig(path: string | undefined, cwd: string = process.cwd()): LoadedConfig {
    const configPath = path ? resolve(cwd, path) : join(cwd, DEFAULT_PATHS.CONFIG);

    if (!existsSync(configPath)) {
        if (path) {
            throw new Error(`Config file not found: ${configPath}`);
        }
        return { config: ReplayConfigSchema.parse({}), baseDir: cwd };
    }

    const content = readFileSync(configPath, 'utf-8');
    const data: unknown = parse(content) ?? {};

    const result = ReplayConfigSchema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid config ${configPath}: ${issues}`);
    }

    return { config: result.data, baseDir: dirname(configPath) };
}
