/**
 * Ledger module: per-client account state machine and replay.
 */

export { Ledger } from './ledger.js';
export { Account } from './account.js';
export { replayTransactions, toTransactionKind } from './replay.js';
export { snapshotAccount, snapshotLedger } from './snapshot.js';
export { isMoneyMovement } from './types.js';
export type {
    ClientId,
    TransactionId,
    MoneyMovement,
    TransactionKind,
    LoggedTransaction,
    LoggedTransactionState,
    ReadonlyAccount,
} from './types.js';
