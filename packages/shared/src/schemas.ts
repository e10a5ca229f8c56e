/**
 * Zod schemas for Ledger Replay data structures.
 *
 * IMPORTANT: Decimal values are stored as strings in schemas.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';
import { AMOUNT_MAX_DIGITS, CLIENT_ID_MAX, TRANSACTION_ID_MAX, TRANSACTION_TYPES } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * Non-negative decimal amount as string (never native number for money).
 */
const amountString = z
    .string()
    .regex(/^\d+(\.\d+)?$/, 'Must be a non-negative decimal string')
    .refine((value) => value.replace('.', '').length <= AMOUNT_MAX_DIGITS, {
        message: `Must have at most ${AMOUNT_MAX_DIGITS} digits`,
    });

/**
 * Balance as string. Balances may go negative (a deposit disputed after it was withdrawn).
 */
const balanceString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

const clientId = z.number().int().min(0).max(CLIENT_ID_MAX);

const transactionId = z.number().int().min(0).max(TRANSACTION_ID_MAX);

/**
 * Unsigned integer written as text, as it appears in a CSV cell.
 */
function unsignedIntString(max: number) {
    return z
        .string()
        .regex(/^\d+$/, 'Must be an unsigned integer')
        .transform(Number)
        .pipe(z.number().int().max(max, `Must be at most ${max}`));
}

// ============================================================================
// Input Schemas
// ============================================================================

/**
 * One raw CSV row after trimming. Empty cells arrive as undefined.
 * `type` is left free-form here: unknown types are skipped, not rejected.
 */
export const InputRecordSchema = z.object({
    type: z.string(),
    client: unsignedIntString(CLIENT_ID_MAX),
    tx: unsignedIntString(TRANSACTION_ID_MAX),
    amount: amountString.optional(),
});

export type InputRecord = z.infer<typeof InputRecordSchema>;

export const TransactionTypeSchema = z.enum(TRANSACTION_TYPES);

export type TransactionType = z.infer<typeof TransactionTypeSchema>;

/**
 * A decoded transaction record, ready to hand to the ledger.
 * Deposits and withdrawals always carry an amount.
 */
export const TransactionRecordSchema = z
    .object({
        type: TransactionTypeSchema,
        client: clientId,
        tx: transactionId,
        amount: amountString.optional(),
    })
    .refine(
        (record) => !(record.type === 'deposit' || record.type === 'withdrawal') || record.amount !== undefined,
        { message: 'Deposits and withdrawals require an amount', path: ['amount'] }
    );

export type TransactionRecord = z.infer<typeof TransactionRecordSchema>;

/**
 * Result returned by the transaction parser.
 * Parsers return data, not side effects. Warnings are returned as data.
 */
export const ParseResultSchema = z.object({
    records: z.array(TransactionRecordSchema),
    warnings: z.array(z.string()),
    skippedRows: z.number().int().min(0),
});

export type ParseResult = z.infer<typeof ParseResultSchema>;

// ============================================================================
// Output Schemas
// ============================================================================

/**
 * Final per-client balance line.
 * available and held are rounded; total is the sum of the rounded values.
 */
export const AccountSnapshotSchema = z.object({
    client: clientId,
    available: balanceString,
    held: balanceString,
    total: balanceString,
    locked: z.boolean(),
});

export type AccountSnapshot = z.infer<typeof AccountSnapshotSchema>;

// ============================================================================
// Configuration Schema
// ============================================================================

/**
 * Replay configuration (ledger-replay.yaml).
 * Command-line flags override any value given here.
 */
export const ReplayConfigSchema = z.object({
    input: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    report: z.string().min(1).optional(),
    manifest: z.string().min(1).optional(),
    echo: z.boolean().default(true),
});

export type ReplayConfig = z.infer<typeof ReplayConfigSchema>;

// ============================================================================
// Run Manifest Schema
// ============================================================================

/**
 * Run manifest describing one replay.
 */
export const RunManifestSchema = z.object({
    input_file: z.string(),
    input_hash: z.string().regex(/^sha256:[0-9a-f]{64}$/, 'Must be sha256:<hex>'),
    run_timestamp: z.string(),
    record_count: z.number().int().min(0),
    skipped_rows: z.number().int().min(0),
    account_count: z.number().int().min(0),
    locked_account_count: z.number().int().min(0),
    version: z.string(),
});

export type RunManifest = z.infer<typeof RunManifestSchema>;
