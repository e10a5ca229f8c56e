/**
 * Transaction CSV parser.
 *
 * Format:
 * - CSV with header row: type, client, tx, amount
 * - Header names and cell values may carry surrounding whitespace
 * - amount is empty (or the column absent) for dispute, resolve and chargeback
 *
 * Rows with an unknown type, and deposits or withdrawals without amount, are skipped.
 * Rows whose client, tx or amount cannot be decoded abort the parse.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned in ParseResult.
 */

import * as XLSX from 'xlsx';
import type { InputRecord, ParseResult, TransactionRecord } from '../types/index.js';
import { InputRecordSchema, TransactionTypeSchema } from '../types/index.js';
import { normalizeHeaderCell } from '../utils/csv.js';

const REQUIRED_COLUMNS = ['type', 'client', 'tx'] as const;

type InputColumn = keyof InputRecord;

/**
 * Parse a transaction CSV export.
 *
 * @param data - File contents
 * @returns ParseResult with records in input order, warnings, and skip count
 * @throws Error when required columns are missing or a row cannot be decoded
 */
export function parseTransactions(data: ArrayBuffer | Uint8Array): ParseResult {
    const records: TransactionRecord[] = [];
    const warnings: string[] = [];

    if (data.byteLength === 0) {
        return { records, warnings, skippedRows: 0 };
    }

    // raw: keep every cell as text so amounts never pass through a float
    const workbook = XLSX.read(new Uint8Array(data), { type: 'array', raw: true });
    const sheet = workbook.Sheets[workbook.SheetNames[0]];
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: '', blankrows: false });

    if (rows.length === 0) {
        return { records, warnings, skippedRows: 0 };
    }

    const header = rows[0].map(normalizeHeaderCell);
    const missingColumns = REQUIRED_COLUMNS.filter((col) => !header.includes(col));

    if (missingColumns.length > 0) {
        throw new Error(
            `Transaction parser: Missing required columns: ${missingColumns.join(', ')}. ` +
            `Found: ${header.join(', ')}`
        );
    }

    const columnIndex = (col: InputColumn): number => header.indexOf(col);

    let skippedTypes = 0;
    let skippedAmounts = 0;

    for (let i = 1; i < rows.length; i++) {
        const row = rows[i];
        const cell = (col: InputColumn): string | undefined => {
            const index = columnIndex(col);
            if (index < 0) {
                return undefined;
            }
            const value = String(row[index] ?? '').trim();
            return value === '' ? undefined : value;
        };

        const parsed = InputRecordSchema.safeParse({
            type: cell('type') ?? '',
            client: cell('client') ?? '',
            tx: cell('tx') ?? '',
            amount: cell('amount'),
        });

        if (!parsed.success) {
            const issues = parsed.error.issues
                .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
                .join('; ');
            // Header is line 1
            throw new Error(`Transaction parser: Invalid record on line ${i + 1}: ${issues}`);
        }

        const type = TransactionTypeSchema.safeParse(parsed.data.type);
        if (!type.success) {
            skippedTypes++;
            continue;
        }

        const { client, tx, amount } = parsed.data;
        if ((type.data === 'deposit' || type.data === 'withdrawal') && amount === undefined) {
            skippedAmounts++;
            continue;
        }

        records.push({ type: type.data, client, tx, amount });
    }

    if (skippedTypes) {
        warnings.push(`Skipped ${skippedTypes} rows with unknown transaction type`);
    }
    if (skippedAmounts) {
        warnings.push(`Skipped ${skippedAmounts} deposit/withdrawal rows without amount`);
    }

    return { records, warnings, skippedRows: skippedTypes + skippedAmounts };
}
