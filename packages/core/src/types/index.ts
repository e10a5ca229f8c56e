/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    InputRecord,
    TransactionType,
    TransactionRecord,
    ParseResult,
    AccountSnapshot,
} from '@ledger-replay/shared';

export {
    InputRecordSchema,
    TransactionTypeSchema,
    TransactionRecordSchema,
    ParseResultSchema,
    AccountSnapshotSchema,
    CLIENT_ID_MAX,
    TRANSACTION_ID_MAX,
    AMOUNT_MAX_DIGITS,
    TRANSACTION_TYPES,
    OUTPUT_DECIMAL_PLACES,
    CSV_COLUMNS,
} from '@ledger-replay/shared';
