import { describe, it, expect } from 'vitest';
import {
    PayeeMapRowSchema,
    PayeeRuleSchema,
    ClassificationResultSchema,
    CandidateGroupSchema,
    MatchedPairSchema,
} from '../src/schemas.js';
import { ValidationError } from '../src/errors.js';

describe('PayeeMapRowSchema', () => {
    it('turns every cell into a string', () => {
        const row = PayeeMapRowSchema.parse({ rule_id: 'r1', priority: 5, is_active: true, notes: null });
        expect(row.rule_id).toBe('r1');
        expect(row.priority).toBe('5');
        expect(row.is_active).toBe('true');
        expect(row.notes).toBe('');
    });

    it('treats missing columns as blank', () => {
        const row = PayeeMapRowSchema.parse({});
        expect(row.txn_kind).toBe('');
        expect(row.payee_canonical).toBe('');
    });

    it('drops unknown columns', () => {
        expect(PayeeMapRowSchema.parse({ rule_id: 'r1', extra: 'x' })).not.toHaveProperty('extra');
    });

    it('rejects nested values', () => {
        expect(PayeeMapRowSchema.safeParse({ rule_id: { id: 1 } }).success).toBe(false);
    });
});

describe('PayeeRuleSchema', () => {
    const rule = {
        rule_id: 'r1',
        is_active: true,
        priority: 0,
        txn_kind: 'expense',
        fingerprint_hash: null,
        fingerprint: null,
        description_clean_norm: 'coffee shop',
        account_name: null,
        source: null,
        direction: null,
        currency: null,
        amount_bucket: null,
        payee_canonical: 'Cafe',
        category_target: null,
        notes: null,
        specificity: 2,
    };

    it('accepts a normalized rule', () => {
        expect(PayeeRuleSchema.safeParse(rule).success).toBe(true);
    });

    it('rejects an empty string where a wildcard belongs', () => {
        expect(PayeeRuleSchema.safeParse({ ...rule, source: '' }).success).toBe(false);
    });

    it('rejects a fractional priority', () => {
        expect(PayeeRuleSchema.safeParse({ ...rule, priority: 1.5 }).success).toBe(false);
    });
});

describe('ClassificationResultSchema', () => {
    it('accepts only known statuses', () => {
        const result = {
            payee_canonical_suggested: '',
            category_target_suggested: '',
            match_rule_id: '',
            match_specificity_score: 0,
            match_status: 'none',
            match_candidate_rule_ids: '',
            match_rule_count: 0,
        };
        expect(ClassificationResultSchema.safeParse(result).success).toBe(true);
        expect(ClassificationResultSchema.safeParse({ ...result, match_status: 'partial' }).success).toBe(false);
    });
});

describe('CandidateGroupSchema', () => {
    const group = {
        txn_kind: 'expense',
        fingerprint_hash: 'c774019916f2',
        description_clean_norm: 'local cafe',
        count_in_period: 2,
        example_1: 'LOCAL CAFE',
        example_2: '',
        suggested_payee_distribution: '',
        suggested_category_distribution: '',
        existing_rules_hit_count: 0,
        status: 'unmatched',
    };

    it('accepts a candidate group', () => {
        expect(CandidateGroupSchema.safeParse(group).success).toBe(true);
    });

    it('rejects examples over 100 characters', () => {
        expect(CandidateGroupSchema.safeParse({ ...group, example_1: 'x'.repeat(101) }).success).toBe(false);
    });

    it('rejects an upper-case hash', () => {
        expect(CandidateGroupSchema.safeParse({ ...group, fingerprint_hash: 'C774019916F2' }).success).toBe(false);
    });
});

describe('MatchedPairSchema', () => {
    it('requires ISO dates and decimal strings', () => {
        const pair = {
            account_name: 'Main',
            date: '2026-01-15',
            amount_ils: '-20.5',
            txn_kind: 'expense',
            source: 'bank',
            raw_text: 'AROMA',
            raw_norm: 'aroma',
            fingerprint_v0: 'aroma',
            ynab_payee_raw: 'Aroma',
            ynab_category_raw: 'Dining',
            pair_source: 'bank-ynab',
            ambiguous_key: false,
        };
        expect(MatchedPairSchema.safeParse(pair).success).toBe(true);
        expect(MatchedPairSchema.safeParse({ ...pair, date: '15/01/2026' }).success).toBe(false);
        expect(MatchedPairSchema.safeParse({ ...pair, amount_ils: '20,5' }).success).toBe(false);
    });
});

describe('ValidationError', () => {
    it('joins issues into its message', () => {
        const err = new ValidationError(['row 1: empty rule_id', 'duplicate rule_id values: a']);
        expect(err).toBeInstanceOf(Error);
        expect(err.name).toBe('ValidationError');
        expect(err.issues).toHaveLength(2);
        expect(err.message).toBe('Invalid payee map: row 1: empty rule_id; duplicate rule_id values: a');
    });
});
