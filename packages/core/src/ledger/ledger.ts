import { Account } from './account.js';
import type { ClientId, ReadonlyAccount, TransactionId, TransactionKind } from './types.js';
import { isMoneyMovement } from './types.js';

/**
 * Owns every client account and the set of transaction ids already used
 * by a deposit or withdrawal. Accounts live as long as the ledger.
 */
export class Ledger {
    private readonly accountsByClient = new Map<ClientId, Account>();
    private readonly consumedTransactionIds = new Set<TransactionId>();

    /**
     * Apply one transaction. Never throws; anything that cannot be applied is dropped.
     *
     * - A deposit or withdrawal whose id was seen before is ignored, for every client.
     * - Only a deposit opens an account. Other transactions for an unknown client are dropped.
     */
    apply(client: ClientId, tx: TransactionId, transaction: TransactionKind): void {
        if (isMoneyMovement(transaction)) {
            if (this.consumedTransactionIds.has(tx)) {
                return;
            }
            this.consumedTransactionIds.add(tx);
        }

        const account = this.accountsByClient.get(client);
        if (account) {
            account.applyTransaction(tx, transaction);
            return;
        }

        const opened = Account.open(tx, transaction);
        if (opened) {
            this.accountsByClient.set(client, opened);
        }
    }

    getAccount(client: ClientId): ReadonlyAccount | undefined {
        return this.accountsByClient.get(client);
    }

    /**
     * Iterate accounts in the order they were opened.
     * Each call starts a fresh iteration.
     */
    *accounts(): IterableIterator<[ClientId, ReadonlyAccount]> {
        for (const entry of this.accountsByClient) {
            yield entry;
        }
    }

    get size(): number {
        return this.accountsByClient.size;
    }
}
