/**
 * Deterministic ranking of matched rules.
 */

import type { PayeeRule } from '../types/index.js';

/**
 * Order: priority DESC, specificity DESC, rule_id ASC.
 * The rule_id step only stabilizes output order; it never breaks a tie
 * for outcome selection.
 */
export function compareRules(a: PayeeRule, b: PayeeRule): number {
    if (a.priority !== b.priority) return b.priority - a.priority;
    if (a.specificity !== b.specificity) return b.specificity - a.specificity;
    if (a.rule_id < b.rule_id) return -1;
    if (a.rule_id > b.rule_id) return 1;
    return 0;
}

/**
 * PURE FUNCTION: Returns a new sorted array. Does not mutate input.
 */
export function rankRules(rules: readonly PayeeRule[]): PayeeRule[] {
    return [...rules].sort(compareRules);
}

/**
 * Rules sharing the top (priority, specificity) tier of a ranked list.
 */
export function topTier(ranked: readonly PayeeRule[]): PayeeRule[] {
    const top = ranked[0];
    if (!top) return [];
    return ranked.filter(
        (rule) => rule.priority === top.priority && rule.specificity === top.specificity
    );
}
