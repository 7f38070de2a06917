import exceljs from 'exceljs';
import type { Worksheet, Workbook } from 'exceljs';

/**
 * Creates a new workbook with standard metadata.
 */
export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Payee Mapper';
    workbook.created = new Date();
    return workbook;
}

/**
 * Bold white-on-blue header row, frozen.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = {
        bold: true,
        color: { argb: 'FFFFFFFF' },
        size: 11
    };

    headerRow.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FF4472C4' }
    };

    headerRow.alignment = {
        vertical: 'middle',
        horizontal: 'center'
    };

    worksheet.views = [
        { state: 'frozen', xSplit: 0, ySplit: 1 }
    ];
}

/**
 * Sizes each column to its longest value, between 10 and `maxWidth` characters.
 */
export function autoFitColumns(worksheet: Worksheet, maxWidth = 100): void {
    worksheet.columns.forEach(column => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, cell => {
            if (cell.value !== null && cell.value !== undefined) {
                const len = cell.value.toString().length;
                if (len > maxLen) maxLen = len;
            }
        });
        column.width = Math.min(maxLen + 2, maxWidth);
    });
}

/**
 * Highlights every data row whose `key` cell equals `value`.
 */
export function highlightRows(worksheet: Worksheet, key: string, value: string, argb: string): void {
    const columnNumber = worksheet.getColumn(key).number;
    worksheet.eachRow((row, rowNumber) => {
        if (rowNumber === 1) return;
        if (row.getCell(columnNumber).value === value) {
            row.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb } };
        }
    });
}
