import type Decimal from 'decimal.js';
import { LedgerDecimal } from '../utils/decimal.js';
import type {
    LoggedTransaction,
    LoggedTransactionState,
    ReadonlyAccount,
    TransactionId,
    TransactionKind,
} from './types.js';

/**
 * Per-client balance state machine.
 *
 * Every deposit and accepted withdrawal is logged under its transaction id
 * together with its dispute state. Disputes, resolves and chargebacks act on
 * those log entries. A chargeback locks the account and nothing changes after that.
 *
 * Invalid references, wrong-state transitions and insufficient funds are silent
 * no-ops: replay is total over any well-typed transaction stream.
 */
export class Account implements ReadonlyAccount {
    private availableBalance = new LedgerDecimal(0);
    private heldBalance = new LedgerDecimal(0);
    private isLocked = false;
    private readonly log = new Map<TransactionId, LoggedTransaction>();

    private constructor() {}

    /**
     * Open an account from its first transaction.
     * Only a deposit can open an account; anything else returns null.
     */
    static open(tx: TransactionId, transaction: TransactionKind): Account | null {
        if (transaction.type !== 'deposit') {
            return null;
        }
        const account = new Account();
        account.applyTransaction(tx, transaction);
        return account;
    }

    get available(): Decimal {
        return this.availableBalance;
    }

    get held(): Decimal {
        return this.heldBalance;
    }

    get total(): Decimal {
        return this.availableBalance.plus(this.heldBalance);
    }

    get locked(): boolean {
        return this.isLocked;
    }

    getLoggedTransaction(tx: TransactionId): Readonly<LoggedTransaction> | undefined {
        return this.log.get(tx);
    }

    loggedTransactions(): ReadonlyMap<TransactionId, Readonly<LoggedTransaction>> {
        return this.log;
    }

    applyTransaction(tx: TransactionId, transaction: TransactionKind): void {
        if (this.isLocked) {
            return;
        }

        switch (transaction.type) {
            case 'deposit':
                this.log.set(tx, { movement: transaction, state: 'resolved' });
                this.availableBalance = this.availableBalance.plus(transaction.amount);
                break;
            case 'withdrawal':
                // Insufficient funds: dropped without a log entry
                if (this.availableBalance.greaterThanOrEqualTo(transaction.amount)) {
                    this.availableBalance = this.availableBalance.minus(transaction.amount);
                    this.log.set(tx, { movement: transaction, state: 'resolved' });
                }
                break;
            case 'dispute':
                this.dispute(tx);
                break;
            case 'resolve':
                this.resolve(tx);
                break;
            case 'chargeback':
                this.chargeback(tx);
                break;
        }
    }

    private dispute(tx: TransactionId): void {
        const entry = this.transition(tx, 'resolved', 'disputed');
        if (!entry) {
            return;
        }

        const { movement } = entry;
        switch (movement.type) {
            case 'deposit':
                this.availableBalance = this.availableBalance.minus(movement.amount);
                this.heldBalance = this.heldBalance.plus(movement.amount);
                break;
            case 'withdrawal':
                // The withdrawn funds are already gone; hold the disputed amount only
                this.heldBalance = this.heldBalance.plus(movement.amount);
                break;
        }
    }

    private resolve(tx: TransactionId): void {
        const entry = this.transition(tx, 'disputed', 'resolved');
        if (!entry) {
            return;
        }

        const { movement } = entry;
        switch (movement.type) {
            case 'deposit':
                this.heldBalance = this.heldBalance.minus(movement.amount);
                this.availableBalance = this.availableBalance.plus(movement.amount);
                break;
            case 'withdrawal':
                this.heldBalance = this.heldBalance.minus(movement.amount);
                break;
        }
    }

    private chargeback(tx: TransactionId): void {
        const entry = this.transition(tx, 'disputed', 'chargedBack');
        if (!entry) {
            return;
        }

        this.heldBalance = this.heldBalance.minus(entry.movement.amount);
        this.isLocked = true;
    }

    /**
     * Move the log entry for `tx` from `from` to `to`.
     * Returns the updated entry, or null when the entry is missing or in another state.
     */
    private transition(
        tx: TransactionId,
        from: LoggedTransactionState,
        to: LoggedTransactionState
    ): LoggedTransaction | null {
        const entry = this.log.get(tx);
        if (!entry || entry.state !== from) {
            return null;
        }
        entry.state = to;
        return entry;
    }
}
