/**
 * Payee map candidate aggregation.
 *
 * Groups classified transactions by (txn_kind, fingerprint_hash,
 * description_clean_norm) into rows a human reviews to author new rules.
 *
 * PURE FUNCTION: no I/O, inputs not mutated. Groups are emitted in the order
 * their first transaction appears.
 */

import { CANDIDATES, RULE_ID_SEPARATOR } from '../types/index.js';
import type {
    CandidateGroup,
    CandidateStatus,
    ClassificationResult,
    MatchStatus,
    PairHint,
    PreparedTransaction,
} from '../types/index.js';
import { pickExamples } from './examples.js';
import { topCounts } from './distribution.js';

interface GroupAccumulator {
    txn_kind: string;
    fingerprint_hash: string;
    description_clean_norm: string;
    transactions: PreparedTransaction[];
    statuses: MatchStatus[];
    ruleIds: Set<string>;
}

interface HintValues {
    payees: string[];
    categories: string[];
}

/**
 * Build the candidate report.
 *
 * @param transactions - Prepared transactions, source order
 * @param results - Classification results, parallel to `transactions`
 * @param hints - Optional register hints from reconciled pairs
 * @throws Error when `results` is not parallel to `transactions`
 */
export function buildPayeeMapCandidates(
    transactions: readonly PreparedTransaction[],
    results: readonly ClassificationResult[],
    hints: readonly PairHint[] = []
): CandidateGroup[] {
    if (transactions.length !== results.length) {
        throw new Error(
            `Expected one classification result per transaction (got ${results.length} for ${transactions.length})`
        );
    }

    const groups = new Map<string, GroupAccumulator>();
    transactions.forEach((txn, i) => {
        const key = groupKey(txn.txn_kind, txn.fingerprint_hash, txn.description_clean_norm);
        let group = groups.get(key);
        if (!group) {
            group = {
                txn_kind: txn.txn_kind,
                fingerprint_hash: txn.fingerprint_hash,
                description_clean_norm: txn.description_clean_norm,
                transactions: [],
                statuses: [],
                ruleIds: new Set(),
            };
            groups.set(key, group);
        }

        const result = results[i];
        group.transactions.push(txn);
        group.statuses.push(result.match_status);
        for (const id of result.match_candidate_rule_ids.split(RULE_ID_SEPARATOR)) {
            const ruleId = id.trim();
            if (ruleId !== '') group.ruleIds.add(ruleId);
        }
    });

    const hintIndex = indexHints(hints);

    return [...groups.values()].map((group) => {
        const [example1 = '', example2 = ''] = pickExamples(group.transactions);
        const hint = hintIndex.get(groupKey(group.txn_kind, group.fingerprint_hash));

        return {
            txn_kind: group.txn_kind,
            fingerprint_hash: group.fingerprint_hash,
            description_clean_norm: group.description_clean_norm,
            count_in_period: group.transactions.length,
            example_1: example1,
            example_2: example2,
            suggested_payee_distribution: hint ? topCounts(hint.payees, CANDIDATES.DISTRIBUTION_TOP_N) : '',
            suggested_category_distribution: hint ? topCounts(hint.categories, CANDIDATES.DISTRIBUTION_TOP_N) : '',
            existing_rules_hit_count: group.ruleIds.size,
            status: candidateStatus(group.statuses),
        };
    });
}

/**
 * Group status from its rows' match statuses.
 *
 * - every row "none" (or no rows): unmatched
 * - any row "ambiguous", or a mix of matched and unmatched rows: ambiguous
 * - otherwise: matched_uniquely
 */
export function candidateStatus(statuses: readonly MatchStatus[]): CandidateStatus {
    const distinct = new Set(statuses);
    if (distinct.size === 0 || (distinct.size === 1 && distinct.has('none'))) {
        return 'unmatched';
    }
    if (distinct.has('ambiguous') || distinct.has('none')) {
        return 'ambiguous';
    }
    return 'matched_uniquely';
}

function indexHints(hints: readonly PairHint[]): Map<string, HintValues> {
    const index = new Map<string, HintValues>();
    for (const hint of hints) {
        const key = groupKey(hint.txn_kind, hint.fingerprint_hash);
        let values = index.get(key);
        if (!values) {
            values = { payees: [], categories: [] };
            index.set(key, values);
        }
        values.payees.push(hint.ynab_payee_raw);
        values.categories.push(hint.ynab_category_raw);
    }
    return index;
}

function groupKey(...parts: string[]): string {
    return parts.join('\u0000');
}
