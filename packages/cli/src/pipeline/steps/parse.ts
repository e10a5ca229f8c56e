import { parseTransactions } from '@ledger-replay/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 2: Parsing
 * Decodes the CSV into transaction records. Malformed files are fatal.
 */
export const parseInput: PipelineStep = async (state) => {
    if (!state.input) {
        return state;
    }

    try {
        const result = parseTransactions(state.input);
        state.parseResult = result;

        // Forward parser warnings to pipeline state
        for (const warning of result.warnings) {
            state.warnings.push(warning);
        }
    } catch (err) {
        state.errors.push({
            step: 'parse',
            message: `Failed to parse ${state.options.input}: ${(err as Error).message}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
