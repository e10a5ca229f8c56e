import type { PipelineState, PipelineStep } from './types.js';
import { readInput } from './steps/read.js';
import { parseInput } from './steps/parse.js';
import { replayLedger } from './steps/replay.js';
import { exportResults } from './steps/export.js';
import { writeManifest } from './steps/manifest.js';
import { arrow, error } from '../utils/console.js';
import type { ReplayOptions } from '../types.js';

/**
 * Orchestrates the execution of the replay pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(options: ReplayOptions): Promise<PipelineState> {
    let state: PipelineState = {
        options,
        snapshots: [],
        warnings: [],
        errors: [],
    };

    const steps: { name: string; fn: PipelineStep }[] = [
        { name: 'Read Input', fn: readInput },
        { name: 'Parsing', fn: parseInput },
        { name: 'Replay', fn: replayLedger },
        { name: 'Export Results', fn: exportResults },
        { name: 'Run Manifest', fn: writeManifest },
    ];

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        if (!options.quiet) {
            arrow(`Step ${i + 1}/${steps.length}: ${step.name}...`);
        }

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            error(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
