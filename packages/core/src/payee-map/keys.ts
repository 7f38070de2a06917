/**
 * Rule key canonicalization and the specificity suppression rule.
 *
 * Rule cells and transaction fields go through the same normalization, so
 * matching is a plain string comparison.
 */

import { normalizeText } from '../utils/normalize.js';
import { cellText } from '../utils/cell.js';
import { RULE_KEY_COLUMNS } from '../types/index.js';
import type { PayeeRule, RuleKeyColumn } from '../types/index.js';

/**
 * Wildcard marker for a blank rule key. Distinct from "".
 */
export const WILDCARD = null;

/**
 * Canonical form of a key value for `column`.
 *
 * @returns Normalized text, or WILDCARD (null) for a blank value
 */
export function normalizeKeyValue(column: RuleKeyColumn, value: unknown): string | null {
    const text = cellText(value);
    if (text === '') return WILDCARD;

    switch (column) {
        case 'txn_kind':
        case 'source':
        case 'direction':
        case 'fingerprint_hash':
            return text.toLowerCase();
        case 'currency':
            return text.toUpperCase();
        case 'description_clean_norm':
            return normalizeText(text) || WILDCARD;
        default:
            return text;
    }
}

/**
 * Key columns a rule is actually evaluated on.
 *
 * Suppression rule (deliberate, not emergent): a pinned fingerprint_hash
 * supersedes fingerprint and description_clean_norm, and a pinned fingerprint
 * supersedes description_clean_norm. Superseded columns are neither compared
 * nor counted toward specificity, whatever value they hold. Ranking and
 * tie detection depend on this exact behavior.
 */
export function evaluatedKeyColumns(
    rule: Pick<PayeeRule, 'fingerprint_hash' | 'fingerprint'>
): RuleKeyColumn[] {
    const hasHash = rule.fingerprint_hash !== WILDCARD;
    const hasFingerprint = rule.fingerprint !== WILDCARD;

    return RULE_KEY_COLUMNS.filter((column) => {
        if (hasHash && (column === 'fingerprint' || column === 'description_clean_norm')) return false;
        if (hasFingerprint && column === 'description_clean_norm') return false;
        return true;
    });
}

/**
 * Non-wildcard, non-suppressed key constraints of a rule.
 */
export function ruleConstraints(
    rule: Pick<PayeeRule, RuleKeyColumn>
): Array<[RuleKeyColumn, string]> {
    const constraints: Array<[RuleKeyColumn, string]> = [];
    for (const column of evaluatedKeyColumns(rule)) {
        const value = rule[column];
        if (value !== WILDCARD) {
            constraints.push([column, value]);
        }
    }
    return constraints;
}

/**
 * Specificity = number of key columns the rule actually constrains.
 */
export function computeSpecificity(rule: Pick<PayeeRule, RuleKeyColumn>): number {
    return ruleConstraints(rule).length;
}
