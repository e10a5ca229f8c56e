// Schemas
export {
    InputRecordSchema,
    TransactionTypeSchema,
    TransactionRecordSchema,
    ParseResultSchema,
    AccountSnapshotSchema,
    ReplayConfigSchema,
    RunManifestSchema,
} from './schemas.js';

// Types
export type {
    InputRecord,
    TransactionType,
    TransactionRecord,
    ParseResult,
    AccountSnapshot,
    ReplayConfig,
    RunManifest,
} from './schemas.js';

// Constants
export {
    CLIENT_ID_MAX,
    TRANSACTION_ID_MAX,
    AMOUNT_MAX_DIGITS,
    TRANSACTION_TYPES,
    OUTPUT_DECIMAL_PLACES,
    CSV_COLUMNS,
    DEFAULT_PATHS,
    VERSION,
} from './constants.js';
