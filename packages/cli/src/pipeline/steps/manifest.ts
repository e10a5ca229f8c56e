import { writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { RunManifestSchema, VERSION, type RunManifest } from '@ledger-replay/shared';
import type { PipelineStep } from '../types.js';

/**
 * Step 5: Run Manifest
 * Records what was replayed: input hash, counts and version.
 */
export const writeManifest: PipelineStep = async (state) => {
    const { manifest: manifestPath, input } = state.options;
    if (!manifestPath) {
        return state;
    }

    try {
        const manifest: RunManifest = RunManifestSchema.parse({
            input_file: basename(input),
            input_hash: state.inputHash,
            run_timestamp: new Date().toISOString(),
            record_count: state.parseResult?.records.length ?? 0,
            skipped_rows: state.parseResult?.skippedRows ?? 0,
            account_count: state.snapshots.length,
            locked_account_count: state.snapshots.filter(s => s.locked).length,
            version: VERSION,
        });

        await writeFile(manifestPath, JSON.stringify(manifest, null, 2), 'utf-8');
    } catch (err) {
        state.errors.push({
            step: 'manifest',
            message: `Failed to write manifest ${manifestPath}: ${(err as Error).message}`,
            fatal: false,
            error: err,
        });
    }

    return state;
};
