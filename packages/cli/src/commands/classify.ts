import { classifyAll, prepareTransactions } from '@payee-mapper/core';
import { CLASSIFICATION_COLUMNS } from '@payee-mapper/shared';
import type { RawRecord } from '@payee-mapper/shared';
import { findWorkspace, getClassifiedPath, resolvePath } from '../workspace/paths.js';
import { loadPayeeMap } from '../io/payee-map.js';
import { readTables, writeCsv } from '../io/table.js';
import { log, success, arrow } from '../utils/console.js';
import type { ClassifyOptions } from '../types.js';

/**
 * Classifies normalized records against the payee map and writes them back
 * with the classification columns appended.
 */
export async function classifyFiles(options: ClassifyOptions): Promise<void> {
    const workspace = findWorkspace(options.workspace);
    const mapPath = resolvePath(options.map, workspace, w => w.payeeMapPath, 'payee map (--map)');
    const outPath = resolvePath(options.out, workspace, getClassifiedPath, 'output file (--out)');

    const rules = await loadPayeeMap(mapPath);
    success(`Loaded ${rules.length} rules from ${mapPath}`);

    const records = await readTables(options.in);
    const { results, stats } = classifyAll(prepareTransactions(records), rules);

    const rows = records.map((record, i) => ({ ...record, ...results[i] }));
    await writeCsv(outPath, rows, [...recordColumns(records), ...CLASSIFICATION_COLUMNS]);

    log('\n--- Classification Summary ---');
    arrow(`Transactions: ${stats.total}`);
    arrow(`Unique: ${stats.byStatus.unique}`);
    arrow(`Ambiguous: ${stats.byStatus.ambiguous}`);
    arrow(`None: ${stats.byStatus.none}`);
    success(`Wrote ${outPath}`);
}

/**
 * Input columns in first-seen order, minus any stale classification columns.
 */
function recordColumns(records: readonly RawRecord[]): string[] {
    const classification: readonly string[] = CLASSIFICATION_COLUMNS;
    const columns: string[] = [];
    for (const record of records) {
        for (const key of Object.keys(record)) {
            if (!columns.includes(key) && !classification.includes(key)) columns.push(key);
        }
    }
    return columns;
}
