import { describe, it, expect } from 'vitest';
import { classifyTransaction, classifyAll } from '../../src/categorizer/categorize.js';
import { prepareTransaction } from '../../src/preparer/prepare.js';
import { normalizePayeeMapRules } from '../../src/payee-map/load.js';
import type { PayeeMapRowInput, RawRecord } from '@payee-mapper/shared';

function txn(overrides: RawRecord = {}) {
    return prepareTransaction({
        txn_kind: 'expense',
        source: 'bank',
        account_name: 'Main',
        amount_ils: -20,
        description_clean_norm: 'coffee shop',
        ...overrides,
    });
}

function rules(...rows: PayeeMapRowInput[]) {
    return normalizePayeeMapRules(rows);
}

describe('classifyTransaction', () => {
    it('returns none with empty suggestions when no rule matches', () => {
        expect(classifyTransaction(txn(), [])).toEqual({
            payee_canonical_suggested: '',
            category_target_suggested: '',
            match_rule_id: '',
            match_specificity_score: 0,
            match_status: 'none',
            match_candidate_rule_ids: '',
            match_rule_count: 0,
        });
    });

    it('matches an all-wildcard rule with specificity 0', () => {
        const result = classifyTransaction(txn(), rules({ rule_id: 'any', payee_canonical: 'Anything' }));
        expect(result).toEqual({
            payee_canonical_suggested: 'Anything',
            category_target_suggested: '',
            match_rule_id: 'any',
            match_specificity_score: 0,
            match_status: 'unique',
            match_candidate_rule_ids: 'any',
            match_rule_count: 1,
        });
    });

    it('prefers the more specific rule', () => {
        const result = classifyTransaction(txn(), rules(
            { rule_id: 'generic', txn_kind: 'expense', payee_canonical: 'Generic' },
            { rule_id: 'specific', txn_kind: 'expense', description_clean_norm: 'coffee shop', payee_canonical: 'Cafe', category_target: 'Food' },
        ));
        expect(result.match_status).toBe('unique');
        expect(result.match_rule_id).toBe('specific');
        expect(result.payee_canonical_suggested).toBe('Cafe');
        expect(result.category_target_suggested).toBe('Food');
        expect(result.match_specificity_score).toBe(2);
        expect(result.match_candidate_rule_ids).toBe('specific;generic');
        expect(result.match_rule_count).toBe(2);
    });

    it('lets priority beat specificity', () => {
        const result = classifyTransaction(txn(), rules(
            { rule_id: 'low', txn_kind: 'expense', description_clean_norm: 'coffee shop', payee_canonical: 'Cafe' },
            { rule_id: 'high', txn_kind: 'expense', priority: '10', payee_canonical: 'Override' },
        ));
        expect(result.match_rule_id).toBe('high');
        expect(result.payee_canonical_suggested).toBe('Override');
        expect(result.match_specificity_score).toBe(1);
        expect(result.match_candidate_rule_ids).toBe('high;low');
    });

    it('reports a tie in the top tier as ambiguous', () => {
        const result = classifyTransaction(txn(), rules(
            { rule_id: 'b_rule', description_clean_norm: 'coffee shop', payee_canonical: 'B' },
            { rule_id: 'a_rule', description_clean_norm: 'coffee shop', payee_canonical: 'A' },
        ));
        expect(result).toEqual({
            payee_canonical_suggested: '',
            category_target_suggested: '',
            match_rule_id: 'a_rule;b_rule',
            match_specificity_score: 1,
            match_status: 'ambiguous',
            match_candidate_rule_ids: 'a_rule;b_rule',
            match_rule_count: 2,
        });
    });

    it('ignores inactive rules', () => {
        const result = classifyTransaction(txn(), rules(
            { rule_id: 'off', is_active: 'false', description_clean_norm: 'coffee shop', payee_canonical: 'Off' },
        ));
        expect(result.match_status).toBe('none');
    });

    it('requires every pinned key to match', () => {
        const result = classifyTransaction(txn(), rules(
            { rule_id: 'other-account', account_name: 'Other', description_clean_norm: 'coffee shop' },
        ));
        expect(result.match_status).toBe('none');
    });

    it('never matches a pinned key against a blank value', () => {
        const result = classifyTransaction(txn({ source: '' }), rules({ rule_id: 'bank-only', source: 'bank' }));
        expect(result.match_status).toBe('none');
    });

    it('skips description when the hash is pinned', () => {
        const result = classifyTransaction(txn(), rules(
            { rule_id: 'by-hash', fingerprint_hash: '610547D2F1E0', description_clean_norm: 'something else' },
        ));
        expect(result.match_status).toBe('unique');
        expect(result.match_specificity_score).toBe(1);
    });

    it('skips fingerprint when the hash is pinned', () => {
        const result = classifyTransaction(txn(), rules(
            { rule_id: 'by-hash', fingerprint_hash: '610547d2f1e0', fingerprint: 'something else' },
        ));
        expect(result.match_status).toBe('unique');
        expect(result.match_rule_id).toBe('by-hash');
        expect(result.match_specificity_score).toBe(1);
    });

    it('skips description when the fingerprint is pinned', () => {
        const result = classifyTransaction(txn(), rules(
            { rule_id: 'by-fp', fingerprint: 'coffee shop', description_clean_norm: 'no match' },
        ));
        expect(result.match_status).toBe('unique');
        expect(result.match_specificity_score).toBe(1);
    });

    it('ranks fingerprint rules by specificity at equal priority', () => {
        const result = classifyTransaction(txn({ fingerprint: 'bit', source: 'bank' }), rules(
            { rule_id: 'b2', fingerprint: 'bit', payee_canonical: 'Transfer' },
            { rule_id: 'b1', fingerprint: 'bit', source: 'bank', payee_canonical: 'Bank Transfer' },
        ));
        expect(result.match_status).toBe('unique');
        expect(result.match_rule_id).toBe('b1');
        expect(result.match_specificity_score).toBe(2);
        expect(result.payee_canonical_suggested).toBe('Bank Transfer');
        expect(result.match_candidate_rule_ids).toBe('b1;b2');
    });

    it('lets the higher priority win between identically keyed rules', () => {
        const result = classifyTransaction(txn({ fingerprint: 'rent', source: 'bank' }), rules(
            { rule_id: 'r0', fingerprint: 'rent', source: 'bank', priority: '0', payee_canonical: 'Old Landlord' },
            { rule_id: 'r10', fingerprint: 'rent', source: 'bank', priority: '10', payee_canonical: 'Landlord' },
        ));
        expect(result.match_status).toBe('unique');
        expect(result.match_rule_id).toBe('r10');
        expect(result.payee_canonical_suggested).toBe('Landlord');
        expect(result.match_candidate_rule_ids).toBe('r10;r0');
    });

    it('normalizes rule and transaction values the same way', () => {
        const result = classifyTransaction(txn({ currency: 'ils', direction: 'OUTFLOW' }), rules(
            { rule_id: 'norm', currency: 'ILS', direction: 'outflow', txn_kind: 'EXPENSE' },
        ));
        expect(result.match_status).toBe('unique');
        expect(result.match_specificity_score).toBe(3);
    });
});

describe('classifyAll', () => {
    const ruleSet = rules(
        { rule_id: 'r_hash', fingerprint_hash: '610547d2f1e0', payee_canonical: 'Cafe' },
        { rule_id: 'r_kind', txn_kind: 'expense', payee_canonical: 'Expense' },
        { rule_id: 'r_super', txn_kind: 'expense', description_clean_norm: 'supermarket', payee_canonical: 'Super' },
        { rule_id: 'r_off', is_active: 'no', payee_canonical: 'Never' },
    );
    const transactions = [
        txn(),
        txn({ description_clean_norm: 'supermarket' }),
        txn({ txn_kind: 'transfer', description_clean_norm: 'bit transfer' }),
        txn({ description_clean_norm: 'local cafe' }),
    ];

    it('gives the same results as a full scan, in input order', () => {
        const { results } = classifyAll(transactions, ruleSet);
        expect(results).toEqual(transactions.map(t => classifyTransaction(t, ruleSet)));
        expect(results.map(r => r.match_status)).toEqual(['ambiguous', 'unique', 'none', 'unique']);
        expect(results.map(r => r.match_rule_id)).toEqual(['r_hash;r_kind', 'r_super', '', 'r_kind']);
    });

    it('counts results per status', () => {
        const { stats } = classifyAll(transactions, ruleSet);
        expect(stats).toEqual({
            total: 4,
            byStatus: { unique: 2, ambiguous: 1, none: 1 },
            activeRules: 3,
        });
    });

    it('matches a fingerprint-only rule whatever the source or account', () => {
        const { results } = classifyAll(
            [
                txn({ fingerprint: 'supermarket', source: 'bank', account_name: 'Main' }),
                txn({ fingerprint: 'supermarket', source: 'card', account_name: 'Visa' }),
            ],
            rules({ rule_id: 'super', fingerprint: 'supermarket', payee_canonical: 'Supermarket' }),
        );
        expect(results.map(r => r.match_status)).toEqual(['unique', 'unique']);
        expect(results.map(r => r.match_rule_id)).toEqual(['super', 'super']);
        expect(results.map(r => r.payee_canonical_suggested)).toEqual(['Supermarket', 'Supermarket']);
    });

    it('classifies everything as none without rules', () => {
        const { results } = classifyAll(transactions, []);
        expect(results.every(r => r.match_status === 'none')).toBe(true);
    });
});
