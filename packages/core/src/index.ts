// Types (re-exported from shared)
export type {
    InputRecord,
    TransactionType,
    TransactionRecord,
    ParseResult,
    AccountSnapshot,
} from './types/index.js';

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
} from './types/index.js';

// Ledger
export {
    Ledger,
    Account,
    replayTransactions,
    toTransactionKind,
    snapshotAccount,
    snapshotLedger,
    isMoneyMovement,
} from './ledger/index.js';
export type {
    ClientId,
    TransactionId,
    MoneyMovement,
    TransactionKind,
    LoggedTransaction,
    LoggedTransactionState,
    ReadonlyAccount,
} from './ledger/index.js';

// Parser & writer
export { parseTransactions } from './parser/index.js';
export { serializeAccounts } from './writer/index.js';

// Utils
export { LedgerDecimal, roundAmount, formatAmount } from './utils/decimal.js';
