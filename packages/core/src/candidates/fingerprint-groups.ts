/**
 * Fingerprint groups: matched pairs grouped by fingerprint_v0.
 *
 * The first-pass review sheet, before payee map rules exist. A human fills
 * canonical_payee for each group. Groups are sorted by fingerprint.
 */

import { CANDIDATES } from '../types/index.js';
import type { FingerprintGroup, MatchedPair } from '../types/index.js';
import { mostCommon, topCounts } from './distribution.js';

/**
 * The pair fields fingerprint grouping reads.
 */
export type GroupablePair = Pick<MatchedPair, 'fingerprint_v0' | 'raw_text' | 'ynab_payee_raw' | 'ynab_category_raw'>;

export function buildFingerprintGroups(pairs: readonly GroupablePair[]): FingerprintGroup[] {
    const groups = new Map<string, GroupablePair[]>();
    for (const pair of pairs) {
        const members = groups.get(pair.fingerprint_v0);
        if (members) {
            members.push(pair);
        } else {
            groups.set(pair.fingerprint_v0, [pair]);
        }
    }

    return [...groups.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([fingerprint, members]) => ({
            fingerprint_v0: fingerprint,
            count: members.length,
            example_raw_text: mostCommon(members.map((pair) => pair.raw_text)),
            top_ynab_payees: topCounts(members.map((pair) => pair.ynab_payee_raw), CANDIDATES.DISTRIBUTION_TOP_N),
            top_ynab_categories: topCounts(
                members.map((pair) => pair.ynab_category_raw),
                CANDIDATES.DISTRIBUTION_TOP_N
            ),
            canonical_payee: '',
        }));
}
