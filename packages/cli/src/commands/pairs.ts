import { matchPairs } from '@payee-mapper/core';
import { MATCHED_PAIR_COLUMNS } from '@payee-mapper/shared';
import { findWorkspace, getMatchedPairsPath, resolvePath } from '../workspace/paths.js';
import { readTables, writeCsv } from '../io/table.js';
import { log, success, warn, arrow } from '../utils/console.js';
import type { PairsOptions } from '../types.js';

/**
 * Joins bank and card statements to the budgeting register and writes the
 * matched pairs.
 */
export async function matchPairFiles(options: PairsOptions): Promise<void> {
    const workspace = findWorkspace(options.workspace);
    const outPath = resolvePath(options.out, workspace, getMatchedPairsPath, 'output file (--out)');

    const bank = await readTables(options.bank);
    const card = await readTables(options.card);
    const register = await readTables(options.ynab);

    const { pairs, warnings, stats } = matchPairs(bank, card, register);
    for (const w of warnings) {
        warn(w);
    }

    await writeCsv(outPath, pairs, MATCHED_PAIR_COLUMNS);

    log('\n--- Pairing Summary ---');
    arrow(`Bank rows: ${stats.bank_rows}, card rows: ${stats.card_rows}, register rows: ${stats.register_rows}`);
    arrow(`Pairs found: ${stats.pairs_found} (${stats.ambiguous_pairs} ambiguous)`);
    success(`Wrote ${outPath}`);
}
