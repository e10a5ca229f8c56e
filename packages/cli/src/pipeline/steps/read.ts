import { readFile } from 'node:fs/promises';
import type { PipelineStep } from '../types.js';
import { hashContent } from '../../utils/hash.js';

/**
 * Step 1: Read Input
 * Loads the transaction file into memory. The core never touches the file system.
 */
export const readInput: PipelineStep = async (state) => {
    const { input } = state.options;

    try {
        const buffer = await readFile(input);
        state.input = buffer;
        state.inputHash = hashContent(buffer);
    } catch (err) {
        state.errors.push({
            step: 'read',
            message: `Failed to read ${input}: ${(err as Error).message}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
