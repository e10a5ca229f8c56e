/**
 * Constants for Ledger Replay.
 */

/**
 * Client identifiers are unsigned 16-bit integers.
 */
export const CLIENT_ID_MAX = 65_535;

/**
 * Transaction identifiers are unsigned 32-bit integers.
 */
export const TRANSACTION_ID_MAX = 4_294_967_295;

/**
 * Transaction types accepted in the `type` column.
 * Deposits and withdrawals move money; the rest reference an earlier movement by id.
 */
export const TRANSACTION_TYPES = ['deposit', 'withdrawal', 'dispute', 'resolve', 'chargeback'] as const;

/**
 * Amounts carry at most this many digits, integer and fractional part together.
 */
export const AMOUNT_MAX_DIGITS = 28;

/**
 * Balances in the account snapshot are rounded to this many decimal places.
 */
export const OUTPUT_DECIMAL_PLACES = 4;

/**
 * Column layout of the input and output CSV files.
 */
export const CSV_COLUMNS = {
    INPUT: ['type', 'client', 'tx', 'amount'],
    OUTPUT: ['client', 'available', 'held', 'total', 'locked'],
} as const;

/**
 * Default file locations, relative to the working directory.
 */
export const DEFAULT_PATHS = {
    INPUT: 'transactions.csv',
    OUTPUT: 'accounts.csv',
    CONFIG: 'ledger-replay.yaml',
} as const;

export const VERSION = '1.0.0';
