import type { TransactionRecord } from '@ledger-replay/shared';
import { Ledger } from './ledger.js';
import type { TransactionKind } from './types.js';
import { LedgerDecimal } from '../utils/decimal.js';

/**
 * Convert a decoded record into the ledger's transaction type.
 * Amounts become Decimal here; a deposit or withdrawal without amount yields null.
 */
export function toTransactionKind(record: TransactionRecord): TransactionKind | null {
    switch (record.type) {
        case 'deposit':
        case 'withdrawal':
            if (record.amount === undefined) {
                return null;
            }
            return { type: record.type, amount: new LedgerDecimal(record.amount) };
        case 'dispute':
        case 'resolve':
        case 'chargeback':
            return { type: record.type };
    }
}

/**
 * Replay records in input order against a fresh ledger.
 */
export function replayTransactions(records: readonly TransactionRecord[]): Ledger {
    const ledger = new Ledger();

    for (const record of records) {
        const transaction = toTransactionKind(record);
        if (transaction) {
            ledger.apply(record.client, record.tx, transaction);
        }
    }

    return ledger;
}
