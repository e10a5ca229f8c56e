import { replayTransactions, snapshotLedger } from '@ledger-replay/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 3: Replay
 * Applies every record in input order and takes the final account snapshot.
 */
export const replayLedger: PipelineStep = async (state) => {
    if (!state.parseResult) {
        return state;
    }

    const ledger = replayTransactions(state.parseResult.records);
    state.ledger = ledger;
    state.snapshots = snapshotLedger(ledger);

    if (state.parseResult.records.length === 0) {
        state.warnings.push('No transactions found in the input file.');
    }

    return state;
};
