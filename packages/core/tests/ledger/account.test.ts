import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { Account } from '../../src/ledger/account.js';
import type { TransactionKind } from '../../src/ledger/types.js';

const deposit = (amount: string): TransactionKind => ({ type: 'deposit', amount: new Decimal(amount) });
const withdrawal = (amount: string): TransactionKind => ({ type: 'withdrawal', amount: new Decimal(amount) });
const dispute: TransactionKind = { type: 'dispute' };
const resolve: TransactionKind = { type: 'resolve' };
const chargeback: TransactionKind = { type: 'chargeback' };

function openWith(tx: number, amount: string): Account {
    const account = Account.open(tx, deposit(amount));
    if (!account) {
        throw new Error('expected a deposit to open the account');
    }
    return account;
}

describe('Account.open', () => {
    it('opens with the deposit as available balance', () => {
        const account = openWith(1, '100');

        expect(account.available.toString()).toBe('100');
        expect(account.held.toString()).toBe('0');
        expect(account.locked).toBe(false);
        expect(account.getLoggedTransaction(1)?.state).toBe('resolved');
        expect(account.getLoggedTransaction(1)?.movement.type).toBe('deposit');
    });

    it.each([
        ['withdrawal', withdrawal('10')],
        ['dispute', dispute],
        ['resolve', resolve],
        ['chargeback', chargeback],
    ])('returns null for a %s', (_name, transaction) => {
        expect(Account.open(1, transaction)).toBeNull();
    });
});

describe('Account.applyTransaction', () => {
    describe('deposit', () => {
        it('adds to available and logs the deposit', () => {
            const account = openWith(1, '1.5');
            account.applyTransaction(2, deposit('2.25'));

            expect(account.available.toString()).toBe('3.75');
            expect(account.loggedTransactions().size).toBe(2);
        });

        it('keeps exact cents where binary floats drift', () => {
            const account = openWith(1, '0.1');
            account.applyTransaction(2, deposit('0.2'));

            expect(account.available.toString()).toBe('0.3');
        });
    });

    describe('withdrawal', () => {
        it('debits available when funds suffice', () => {
            const account = openWith(1, '100');
            account.applyTransaction(2, withdrawal('100'));

            expect(account.available.toString()).toBe('0');
            expect(account.getLoggedTransaction(2)).toEqual({
                movement: { type: 'withdrawal', amount: new Decimal('100') },
                state: 'resolved',
            });
        });

        it('is dropped without a log entry on insufficient funds', () => {
            const account = openWith(1, '100');
            account.applyTransaction(2, withdrawal('100.0001'));

            expect(account.available.toString()).toBe('100');
            expect(account.getLoggedTransaction(2)).toBeUndefined();
        });
    });

    describe('dispute', () => {
        it('moves a disputed deposit from available to held', () => {
            const account = openWith(1, '100');
            account.applyTransaction(1, dispute);

            expect(account.available.toString()).toBe('0');
            expect(account.held.toString()).toBe('100');
            expect(account.getLoggedTransaction(1)?.state).toBe('disputed');
        });

        it('holds a disputed withdrawal without touching available', () => {
            const account = openWith(1, '100');
            account.applyTransaction(2, withdrawal('40'));
            account.applyTransaction(2, dispute);

            expect(account.available.toString()).toBe('60');
            expect(account.held.toString()).toBe('40');
            expect(account.total.toString()).toBe('100');
        });

        it('ignores unknown transaction ids', () => {
            const account = openWith(1, '100');
            account.applyTransaction(99, dispute);

            expect(account.available.toString()).toBe('100');
            expect(account.held.toString()).toBe('0');
        });

        it('ignores a second dispute of the same transaction', () => {
            const account = openWith(1, '100');
            account.applyTransaction(1, dispute);
            account.applyTransaction(1, dispute);

            expect(account.available.toString()).toBe('0');
            expect(account.held.toString()).toBe('100');
        });

        it('ignores a rejected withdrawal id', () => {
            const account = openWith(1, '10');
            account.applyTransaction(2, withdrawal('50'));
            account.applyTransaction(2, dispute);

            expect(account.available.toString()).toBe('10');
            expect(account.held.toString()).toBe('0');
        });

        it('lets available go negative when the deposit was already spent', () => {
            const account = openWith(1, '100');
            account.applyTransaction(2, withdrawal('100'));
            account.applyTransaction(1, dispute);

            expect(account.available.toString()).toBe('-100');
            expect(account.held.toString()).toBe('100');
        });
    });

    describe('resolve', () => {
        it('restores pre-dispute balances for a deposit', () => {
            const account = openWith(1, '100');
            account.applyTransaction(2, deposit('23.4567'));
            account.applyTransaction(2, dispute);
            account.applyTransaction(2, resolve);

            expect(account.available.toString()).toBe('123.4567');
            expect(account.held.toString()).toBe('0');
            expect(account.getLoggedTransaction(2)?.state).toBe('resolved');
        });

        it('releases the hold of a withdrawal without re-crediting', () => {
            const account = openWith(1, '100');
            account.applyTransaction(2, withdrawal('40'));
            account.applyTransaction(2, dispute);
            account.applyTransaction(2, resolve);

            expect(account.available.toString()).toBe('60');
            expect(account.held.toString()).toBe('0');
        });

        it('ignores transactions that are not disputed', () => {
            const account = openWith(1, '100');
            account.applyTransaction(1, resolve);

            expect(account.available.toString()).toBe('100');
            expect(account.held.toString()).toBe('0');
            expect(account.getLoggedTransaction(1)?.state).toBe('resolved');
        });

        it('allows a resolved transaction to be disputed again', () => {
            const account = openWith(1, '100');
            account.applyTransaction(1, dispute);
            account.applyTransaction(1, resolve);
            account.applyTransaction(1, dispute);

            expect(account.available.toString()).toBe('0');
            expect(account.held.toString()).toBe('100');
        });
    });

    describe('chargeback', () => {
        it('removes a disputed deposit and locks the account', () => {
            const account = openWith(1, '100');
            account.applyTransaction(1, dispute);
            account.applyTransaction(1, chargeback);

            expect(account.available.toString()).toBe('0');
            expect(account.held.toString()).toBe('0');
            expect(account.locked).toBe(true);
            expect(account.getLoggedTransaction(1)?.state).toBe('chargedBack');
        });

        it('clears the hold of a disputed withdrawal and locks the account', () => {
            const account = openWith(1, '100');
            account.applyTransaction(2, withdrawal('100'));
            account.applyTransaction(2, dispute);
            account.applyTransaction(2, chargeback);

            expect(account.available.toString()).toBe('0');
            expect(account.held.toString()).toBe('0');
            expect(account.locked).toBe(true);
            expect(account.getLoggedTransaction(2)).toEqual({
                movement: { type: 'withdrawal', amount: new Decimal('100') },
                state: 'chargedBack',
            });
        });

        it('ignores transactions that are not disputed', () => {
            const account = openWith(1, '100');
            account.applyTransaction(1, chargeback);

            expect(account.available.toString()).toBe('100');
            expect(account.locked).toBe(false);
        });

        it('can leave a negative total behind', () => {
            const account = openWith(1, '100');
            account.applyTransaction(2, withdrawal('100'));
            account.applyTransaction(1, dispute);
            account.applyTransaction(1, chargeback);

            expect(account.available.toString()).toBe('-100');
            expect(account.held.toString()).toBe('0');
            expect(account.total.toString()).toBe('-100');
            expect(account.locked).toBe(true);
        });
    });

    describe('locked account', () => {
        it('ignores every transaction kind after a chargeback', () => {
            const account = openWith(1, '100');
            account.applyTransaction(2, deposit('50'));
            account.applyTransaction(3, deposit('30'));
            account.applyTransaction(3, dispute);
            account.applyTransaction(2, dispute);
            account.applyTransaction(2, chargeback);

            expect(account.available.toString()).toBe('100');
            expect(account.held.toString()).toBe('30');

            account.applyTransaction(4, deposit('100'));
            account.applyTransaction(5, withdrawal('10'));
            account.applyTransaction(1, dispute);
            account.applyTransaction(3, resolve);
            account.applyTransaction(3, chargeback);

            expect(account.available.toString()).toBe('100');
            expect(account.held.toString()).toBe('30');
            expect(account.loggedTransactions().size).toBe(3);
            expect(account.getLoggedTransaction(3)?.state).toBe('disputed');
            expect(account.getLoggedTransaction(1)?.state).toBe('resolved');
        });
    });
});

describe('large balances', () => {
    it('keeps every digit past twenty significant digits', () => {
        const account = openWith(1, '12345678901234567.8901');
        account.applyTransaction(2, deposit('0.0001'));
        account.applyTransaction(3, deposit('0.0001'));

        expect(account.available.toFixed()).toBe('12345678901234567.8903');
    });

    it('adds and subtracts amounts at the digit limit exactly', () => {
        const account = openWith(1, '9999999999999999999999.999999');
        account.applyTransaction(2, deposit('9999999999999999999999.999999'));
        account.applyTransaction(3, withdrawal('0.000001'));

        expect(account.available.toFixed()).toBe('19999999999999999999999.999997');
    });

    it('restores the exact balance after a dispute and resolve', () => {
        const account = openWith(1, '0.0000000000000000000000000001');
        account.applyTransaction(2, deposit('1000000000000000000000000000'));

        account.applyTransaction(1, dispute);
        expect(account.available.toFixed()).toBe('1000000000000000000000000000');
        expect(account.held.toFixed()).toBe('0.0000000000000000000000000001');

        account.applyTransaction(1, resolve);
        expect(account.available.toFixed()).toBe('1000000000000000000000000000.0000000000000000000000000001');
        expect(account.held.toFixed()).toBe('0');
    });
});
