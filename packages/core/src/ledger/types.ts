import type Decimal from 'decimal.js';

/**
 * Unsigned 16-bit client identifier.
 */
export type ClientId = number;

/**
 * Unsigned 32-bit transaction identifier.
 * Unique across deposits and withdrawals; disputes, resolves and chargebacks reuse it.
 */
export type TransactionId = number;

/**
 * A transaction that moves money in or out of an account.
 */
export type MoneyMovement =
    | { type: 'deposit'; amount: Decimal }
    | { type: 'withdrawal'; amount: Decimal };

/**
 * A transaction as handed to the ledger.
 * Dispute, resolve and chargeback carry no amount: they point at an earlier movement.
 */
export type TransactionKind =
    | MoneyMovement
    | { type: 'dispute' }
    | { type: 'resolve' }
    | { type: 'chargeback' };

/**
 * Dispute lifecycle of a logged movement: resolved -> disputed -> resolved | chargedBack.
 * chargedBack is terminal.
 */
export type LoggedTransactionState = 'resolved' | 'disputed' | 'chargedBack';

export interface LoggedTransaction {
    movement: MoneyMovement;
    state: LoggedTransactionState;
}

/**
 * Read-only view of an account. The ledger never hands out anything mutable.
 */
export interface ReadonlyAccount {
    readonly available: Decimal;
    readonly held: Decimal;
    readonly total: Decimal;
    readonly locked: boolean;
    getLoggedTransaction(tx: TransactionId): Readonly<LoggedTransaction> | undefined;
    loggedTransactions(): ReadonlyMap<TransactionId, Readonly<LoggedTransaction>>;
}

export function isMoneyMovement(transaction: TransactionKind): transaction is MoneyMovement {
    return transaction.type === 'deposit' || transaction.type === 'withdrawal';
}
