/**
 * Payee classification against the payee map.
 *
 * Outcome per transaction:
 * - no rule matches: "none", empty suggestions
 * - one rule alone in the top (priority, specificity) tier: "unique",
 *   suggestions from that rule
 * - several rules share the top tier: "ambiguous", empty suggestions,
 *   match_rule_id lists the tied rules
 *
 * ARCHITECTURAL NOTE: No console.* calls, no I/O. An empty rule set yields
 * "none" for every transaction.
 */

import { RULE_ID_SEPARATOR } from '../types/index.js';
import type { ClassificationResult, PayeeRule, PreparedTransaction } from '../types/index.js';
import { activeRules } from '../payee-map/load.js';
import { ruleMatches } from './match.js';
import { rankRules, topTier } from './rank.js';
import { RuleIndex } from './rule-index.js';
import type { ClassificationOutput, ClassificationStats } from './types.js';

const NO_MATCH: ClassificationResult = {
    payee_canonical_suggested: '',
    category_target_suggested: '',
    match_rule_id: '',
    match_specificity_score: 0,
    match_status: 'none',
    match_candidate_rule_ids: '',
    match_rule_count: 0,
};

/**
 * Classify a single transaction by scanning every active rule.
 *
 * @param txn - Prepared transaction
 * @param rules - Payee map rules; inactive rules are skipped
 */
export function classifyTransaction(
    txn: PreparedTransaction,
    rules: readonly PayeeRule[]
): ClassificationResult {
    return resolveOutcome(activeRules(rules).filter((rule) => ruleMatches(rule, txn)));
}

/**
 * Classify a batch. Builds the rule index once for the pass.
 *
 * @param transactions - Prepared transactions (not mutated)
 * @param rules - Payee map rules; inactive rules are skipped
 * @returns Results in input order, plus stats
 */
export function classifyAll(
    transactions: readonly PreparedTransaction[],
    rules: readonly PayeeRule[]
): ClassificationOutput {
    const index = new RuleIndex(activeRules(rules));
    const stats: ClassificationStats = {
        total: transactions.length,
        byStatus: {
            unique: 0,
            ambiguous: 0,
            none: 0,
        },
        activeRules: index.size,
    };

    const results = transactions.map((txn) => {
        const matched = index.candidatesFor(txn).filter((rule) => ruleMatches(rule, txn));
        const result = resolveOutcome(matched);
        stats.byStatus[result.match_status]++;
        return result;
    });

    return { results, stats };
}

function resolveOutcome(matched: readonly PayeeRule[]): ClassificationResult {
    if (matched.length === 0) {
        return { ...NO_MATCH };
    }

    const ranked = rankRules(matched);
    const tied = topTier(ranked);
    const top = ranked[0];
    const candidateIds = joinIds(ranked);

    if (tied.length > 1) {
        return {
            payee_canonical_suggested: '',
            category_target_suggested: '',
            match_rule_id: joinIds(tied),
            match_specificity_score: top.specificity,
            match_status: 'ambiguous',
            match_candidate_rule_ids: candidateIds,
            match_rule_count: matched.length,
        };
    }

    return {
        payee_canonical_suggested: top.payee_canonical ?? '',
        category_target_suggested: top.category_target ?? '',
        match_rule_id: top.rule_id,
        match_specificity_score: top.specificity,
        match_status: 'unique',
        match_candidate_rule_ids: candidateIds,
        match_rule_count: matched.length,
    };
}

function joinIds(rules: readonly PayeeRule[]): string {
    return rules.map((rule) => rule.rule_id).join(RULE_ID_SEPARATOR);
}
