import { buildFingerprintGroups, cellText, fingerprintV0 } from '@payee-mapper/core';
import type { GroupablePair } from '@payee-mapper/core';
import { FINGERPRINT_GROUP_COLUMNS } from '@payee-mapper/shared';
import type { RawRecord } from '@payee-mapper/shared';
import { findWorkspace, getFingerprintGroupsPath, getMatchedPairsPath, resolvePath } from '../workspace/paths.js';
import { readTable, writeCsv } from '../io/table.js';
import { success, arrow } from '../utils/console.js';
import type { GroupsOptions } from '../types.js';

/**
 * Groups matched pairs by fingerprint_v0 for first-pass payee naming.
 */
export async function buildGroupsFile(options: GroupsOptions): Promise<void> {
    const workspace = findWorkspace(options.workspace);
    const pairsPath = resolvePath(options.pairs, workspace, getMatchedPairsPath, 'matched pairs file (--pairs)');
    const outPath = resolvePath(options.out, workspace, getFingerprintGroupsPath, 'output file (--out)');

    const records = await readTable(pairsPath);
    const groups = buildFingerprintGroups(records.map(toGroupablePair));

    await writeCsv(outPath, groups, FINGERPRINT_GROUP_COLUMNS);

    arrow(`${records.length} pairs in ${groups.length} groups`);
    success(`Wrote ${outPath}`);
}

/**
 * A matched pairs row as written by the pairs command. A blank
 * fingerprint_v0 is recomputed from raw_text.
 */
export function toGroupablePair(record: RawRecord): GroupablePair {
    const rawText = cellText(record.raw_text);
    return {
        fingerprint_v0: cellText(record.fingerprint_v0) || fingerprintV0(rawText),
        raw_text: rawText,
        ynab_payee_raw: cellText(record.ynab_payee_raw),
        ynab_category_raw: cellText(record.ynab_category_raw),
    };
}
