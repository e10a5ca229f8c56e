import type { AccountSnapshot } from '@ledger-replay/shared';
import { OUTPUT_DECIMAL_PLACES } from '@ledger-replay/shared';
import { formatAmount, roundAmount } from '../utils/decimal.js';
import type { Ledger } from './ledger.js';
import type { ClientId, ReadonlyAccount } from './types.js';

/**
 * Project an account onto its output line.
 *
 * available and held are rounded to 4 decimal places first; total is the sum
 * of the rounded values so that the printed line always adds up.
 */
export function snapshotAccount(client: ClientId, account: ReadonlyAccount): AccountSnapshot {
    const available = roundAmount(account.available, OUTPUT_DECIMAL_PLACES);
    const held = roundAmount(account.held, OUTPUT_DECIMAL_PLACES);

    return {
        client,
        available: formatAmount(available),
        held: formatAmount(held),
        total: formatAmount(available.plus(held)),
        locked: account.locked,
    };
}

/**
 * Snapshot every account in the ledger, ordered by client id.
 */
export function snapshotLedger(ledger: Ledger): AccountSnapshot[] {
    const snapshots: AccountSnapshot[] = [];
    for (const [client, account] of ledger.accounts()) {
        snapshots.push(snapshotAccount(client, account));
    }
    return snapshots.sort((a, b) => a.client - b.client);
}
