import { writeFile } from 'node:fs/promises';
import { serializeAccounts } from '@ledger-replay/core';
import type { PipelineStep } from '../types.js';
import { generateAccountsExcel } from '../../excel/accounts.js';
import { log } from '../../utils/console.js';

/**
 * Step 4: Export
 * Writes the snapshot CSV, echoes it to stdout, and saves the optional Excel report.
 */
export const exportResults: PipelineStep = async (state) => {
    const { output, report, echo } = state.options;
    const csv = serializeAccounts(state.snapshots);

    try {
        await writeFile(output, csv, 'utf-8');
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to write ${output}: ${(err as Error).message}`,
            fatal: true,
            error: err,
        });
        return state;
    }

    if (echo) {
        log(csv.trimEnd());
    }

    if (report) {
        try {
            const workbook = generateAccountsExcel(state.snapshots);
            const buffer = await workbook.xlsx.writeBuffer();
            await writeFile(report, new Uint8Array(buffer));
        } catch (err) {
            state.errors.push({
                step: 'export',
                message: `Failed to write report ${report}: ${(err as Error).message}`,
                fatal: false,
                error: err,
            });
        }
    }

    return state;
};
