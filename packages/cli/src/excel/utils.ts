import exceljs from 'exceljs';
import type { Worksheet, Workbook } from 'exceljs';

/**
 * Creates a new workbook with standard metadata.
 */
export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Ledger Replay';
    workbook.created = new Date();
    return workbook;
}

/**
 * Bold header row with a filled background, frozen in place.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = {
        bold: true,
        color: { argb: 'FFFFFFFF' },
        size: 11,
    };

    headerRow.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FF2F5597' },
    };

    headerRow.alignment = {
        vertical: 'middle',
        horizontal: 'center',
    };

    worksheet.views = [
        { state: 'frozen', xSplit: 0, ySplit: 1 },
    ];
}

/**
 * Four-decimal number format, negatives in red.
 */
export function formatBalanceColumn(worksheet: Worksheet, col: string | number): void {
    const column = worksheet.getColumn(col);
    column.numFmt = '#,##0.0000;[Red]-#,##0.0000';
    column.alignment = { horizontal: 'right' };
}
