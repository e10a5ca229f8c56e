/**
 * Account snapshot CSV writer.
 */

import * as XLSX from 'xlsx';
import type { AccountSnapshot } from '../types/index.js';
import { CSV_COLUMNS } from '../types/index.js';

/**
 * Serialize snapshots to CSV: header `client,available,held,total,locked`,
 * one line per snapshot, newline-terminated.
 * Every cell is written as text so balances keep their exact digits.
 */
export function serializeAccounts(snapshots: readonly AccountSnapshot[]): string {
    const rows: string[][] = [
        [...CSV_COLUMNS.OUTPUT],
        ...snapshots.map((s) => [String(s.client), s.available, s.held, s.total, String(s.locked)]),
    ];
    const sheet = XLSX.utils.aoa_to_sheet(rows);
    return `${XLSX.utils.sheet_to_csv(sheet)}\n`;
}
