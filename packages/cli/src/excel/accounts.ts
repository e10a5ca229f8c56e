import type { Workbook } from 'exceljs';
import type { AccountSnapshot } from '@ledger-replay/shared';
import { createWorkbook, formatHeaderRow, formatBalanceColumn } from './utils.js';

const BALANCE_COLUMNS = ['available', 'held', 'total'] as const;

/**
 * Builds the account balance report: one row per client, locked accounts highlighted.
 */
export function generateAccountsExcel(snapshots: readonly AccountSnapshot[]): Workbook {
    const workbook = createWorkbook();
    const sheet = workbook.addWorksheet('Accounts');

    sheet.columns = [
        { header: 'client', key: 'client', width: 10 },
        { header: 'available', key: 'available', width: 18 },
        { header: 'held', key: 'held', width: 18 },
        { header: 'total', key: 'total', width: 18 },
        { header: 'locked', key: 'locked', width: 10 },
    ];

    for (const snapshot of snapshots) {
        const row = sheet.addRow({
            client: snapshot.client,
            // Report only: the CSV output keeps the exact decimal strings
            available: Number(snapshot.available),
            held: Number(snapshot.held),
            total: Number(snapshot.total),
            locked: snapshot.locked,
        });

        if (snapshot.locked) {
            row.font = { color: { argb: 'FFC00000' } };
        }
    }

    formatHeaderRow(sheet);
    for (const key of BALANCE_COLUMNS) {
        formatBalanceColumn(sheet, key);
    }

    return workbook;
}
