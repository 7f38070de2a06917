/**
 * Payee map (rule store) normalization and validation.
 *
 * ARCHITECTURAL NOTE: No I/O. Callers read the table and pass its rows in.
 */

import {
    PayeeMapRowSchema,
    BOOLEAN_VOCABULARY,
    ValidationError,
} from '../types/index.js';
import type { PayeeMapRow, PayeeRule, RuleKeyColumn } from '../types/index.js';
import { normalizeKeyValue, computeSpecificity } from './keys.js';

const TRUE_VALUES: readonly string[] = BOOLEAN_VOCABULARY.TRUE;
const FALSE_VALUES: readonly string[] = BOOLEAN_VOCABULARY.FALSE;

/**
 * Validate and normalize payee map rows into rules.
 *
 * Missing columns are blank. Blank key cells become wildcards.
 * Specificity is computed once here and stored on the rule.
 *
 * @param rows - Table rows in file order; each is validated against PayeeMapRowSchema
 * @returns Frozen rules in file order (inactive rules included)
 * @throws ValidationError on empty or duplicate rule_id, an unrecognized
 *   is_active value, or a non-integer priority. Every problem is listed.
 */
export function normalizePayeeMapRules(rows: readonly unknown[]): PayeeRule[] {
    const issues: string[] = [];
    const parsed: PayeeMapRow[] = [];

    rows.forEach((row, index) => {
        const result = PayeeMapRowSchema.safeParse(row);
        if (!result.success) {
            for (const issue of result.error.issues) {
                issues.push(`row ${index + 1}: ${issue.path.join('.') || 'row'} ${issue.message}`);
            }
            return;
        }
        parsed.push(result.data);
    });
    if (issues.length > 0) {
        throw new ValidationError(issues);
    }

    const ruleIds = parsed.map((row) => row.rule_id.trim());

    ruleIds.forEach((ruleId, index) => {
        if (ruleId === '') {
            issues.push(`row ${index + 1}: empty rule_id`);
        }
    });

    const duplicates = findDuplicates(ruleIds.filter((id) => id !== ''));
    if (duplicates.length > 0) {
        issues.push(`duplicate rule_id values: ${duplicates.join(', ')}`);
    }

    const rules: PayeeRule[] = [];
    parsed.forEach((row, index) => {
        const label = `row ${index + 1} (rule_id "${ruleIds[index]}")`;

        const isActive = parseIsActive(row.is_active);
        if (isActive === null) {
            issues.push(`${label}: invalid is_active value "${row.is_active}"`);
        }

        const priority = parsePriority(row.priority);
        if (priority === null) {
            issues.push(`${label}: invalid priority value "${row.priority}"`);
        }

        if (isActive === null || priority === null) return;

        const keys = normalizeKeys(row);
        rules.push(Object.freeze({
            rule_id: ruleIds[index],
            is_active: isActive,
            priority,
            ...keys,
            payee_canonical: blankToNull(row.payee_canonical),
            category_target: blankToNull(row.category_target),
            notes: blankToNull(row.notes),
            specificity: computeSpecificity(keys),
        }));
    });

    if (issues.length > 0) {
        throw new ValidationError(issues);
    }

    return rules;
}

/**
 * Rules taking part in matching.
 */
export function activeRules(rules: readonly PayeeRule[]): PayeeRule[] {
    return rules.filter((rule) => rule.is_active);
}

/**
 * Parse is_active. Blank means active.
 *
 * @returns boolean, or null when the value is outside the vocabulary
 */
export function parseIsActive(value: string): boolean | null {
    const text = value.trim().toLowerCase();
    if (text === '') return true;
    if (TRUE_VALUES.includes(text)) return true;
    if (FALSE_VALUES.includes(text)) return false;
    return null;
}

/**
 * Parse priority. Blank means 0.
 *
 * @returns integer, or null when the value is not a safe integer
 */
export function parsePriority(value: string): number | null {
    const text = value.trim();
    if (text === '') return 0;
    if (!/^[-+]?\d+$/.test(text)) return null;
    const priority = parseInt(text, 10);
    return Number.isSafeInteger(priority) ? priority : null;
}

function normalizeKeys(row: PayeeMapRow): Record<RuleKeyColumn, string | null> {
    return {
        txn_kind: normalizeKeyValue('txn_kind', row.txn_kind),
        fingerprint_hash: normalizeKeyValue('fingerprint_hash', row.fingerprint_hash),
        fingerprint: normalizeKeyValue('fingerprint', row.fingerprint),
        description_clean_norm: normalizeKeyValue('description_clean_norm', row.description_clean_norm),
        account_name: normalizeKeyValue('account_name', row.account_name),
        source: normalizeKeyValue('source', row.source),
        direction: normalizeKeyValue('direction', row.direction),
        currency: normalizeKeyValue('currency', row.currency),
        amount_bucket: normalizeKeyValue('amount_bucket', row.amount_bucket),
    };
}

function blankToNull(value: string): string | null {
    const text = value.trim();
    return text === '' ? null : text;
}

function findDuplicates(values: readonly string[]): string[] {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const value of values) {
        if (seen.has(value)) {
            duplicates.add(value);
        }
        seen.add(value);
    }
    return [...duplicates];
}
