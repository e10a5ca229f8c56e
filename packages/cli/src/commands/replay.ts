import { relative } from 'node:path';
import { runPipeline } from '../pipeline/runner.js';
import { success, warn, error, arrow } from '../utils/console.js';
import type { ReplayOptions } from '../types.js';

/**
 * Runs a replay and reports the outcome.
 * @returns process exit code
 */
export async function replay(options: ReplayOptions): Promise<number> {
    const state = await runPipeline(options);

    for (const w of state.warnings) {
        warn(w);
    }

    for (const e of state.errors) {
        error(`ERROR [${e.step}]: ${e.message}`);
    }
    if (state.errors.some(e => e.fatal)) {
        error('Replay failed with fatal errors.');
        return 1;
    }

    if (!options.quiet) {
        success(`Replayed ${state.parseResult?.records.length ?? 0} transactions.`);
        arrow(`Accounts: ${state.snapshots.length} (${state.snapshots.filter(s => s.locked).length} locked)`);
        arrow(`Balances saved to: ${relative(process.cwd(), options.output) || options.output}`);
    }

    return state.errors.length > 0 ? 1 : 0;
}
