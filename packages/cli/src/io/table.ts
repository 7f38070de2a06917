import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, extname } from 'node:path';
import * as XLSX from 'xlsx';
import { formatIsoDate, stripBom, type RawRecord } from '@payee-mapper/core';
import { errorMessage } from '../utils/console.js';

/**
 * Reads the first sheet of a CSV or XLSX file into records keyed by header.
 *
 * CSV cells stay text (no number or date guessing); XLSX cells keep their
 * native types, dates as Date objects. Missing cells are "".
 */
export async function readTable(path: string): Promise<RawRecord[]> {
    let workbook: XLSX.WorkBook;
    try {
        if (extname(path).toLowerCase() === '.csv') {
            const text = stripBom(await readFile(path, 'utf-8'));
            if (text.trim() === '') return [];
            workbook = XLSX.read(text, { type: 'string', raw: true });
        } else {
            const data = await readFile(path);
            workbook = XLSX.read(data, { type: 'buffer', cellDates: true });
        }
    } catch (err) {
        throw new Error(`Failed to read ${path}: ${errorMessage(err)}`);
    }

    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
    if (!sheet) {
        throw new Error(`No sheet found in ${path}`);
    }

    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '' });
    return rows.map(cleanHeaders);
}

/**
 * Reads several tables and concatenates their rows in argument order.
 */
export async function readTables(paths: readonly string[]): Promise<RawRecord[]> {
    const records: RawRecord[] = [];
    for (const path of paths) {
        records.push(...(await readTable(path)));
    }
    return records;
}

/**
 * Writes rows as a UTF-8 CSV with a BOM, so spreadsheet apps keep Hebrew text.
 * `columns` come first, in order; any other keys found on the rows follow.
 */
export async function writeCsv(
    path: string,
    rows: ReadonlyArray<Record<string, unknown>>,
    columns: readonly string[]
): Promise<void> {
    const header = [...columns];
    for (const row of rows) {
        for (const key of Object.keys(row)) {
            if (!header.includes(key)) header.push(key);
        }
    }

    const sheet = XLSX.utils.aoa_to_sheet([header, ...rows.map((row) => header.map((column) => csvCell(row[column])))]);
    const csv = XLSX.utils.sheet_to_csv(sheet);

    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `\uFEFF${csv}\n`, 'utf-8');
}

function csvCell(value: unknown): string {
    if (value === null || value === undefined) return '';
    if (value instanceof Date) return formatIsoDate(value);
    if (typeof value === 'number' && Number.isNaN(value)) return '';
    return String(value);
}

function cleanHeaders(row: Record<string, unknown>): RawRecord {
    return Object.fromEntries(Object.entries(row).map(([key, value]) => [stripBom(key).trim(), value]));
}
