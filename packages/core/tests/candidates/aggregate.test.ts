import { describe, it, expect } from 'vitest';
import { buildPayeeMapCandidates, candidateStatus } from '../../src/candidates/aggregate.js';
import { preparePairHints } from '../../src/candidates/hints.js';
import { prepareTransactions } from '../../src/preparer/prepare.js';
import { classifyAll } from '../../src/categorizer/categorize.js';
import { normalizePayeeMapRules } from '../../src/payee-map/load.js';
import { CandidateGroupSchema } from '@payee-mapper/shared';
import type { PayeeMapRowInput } from '@payee-mapper/shared';

const records = [
    {
        txn_kind: 'expense',
        source: 'bank',
        account_name: 'A',
        currency: 'ILS',
        outflow_ils: 20,
        inflow_ils: 0,
        description_clean_norm: 'local cafe',
        merchant_raw: 'M'.repeat(140),
    },
    {
        txn_kind: 'expense',
        source: 'bank',
        account_name: 'A',
        currency: 'ILS',
        outflow_ils: 21,
        inflow_ils: 0,
        description_clean_norm: 'local cafe',
        merchant_raw: 'Second merchant example',
    },
    {
        txn_kind: 'transfer',
        source: 'bank',
        account_name: 'A',
        currency: 'ILS',
        outflow_ils: 30,
        inflow_ils: 0,
        description_clean_norm: 'bit transfer',
        merchant_raw: 'BIT',
    },
];

function candidatesFor(rows: PayeeMapRowInput[], hints = preparePairHints([])) {
    const transactions = prepareTransactions(records);
    const { results } = classifyAll(transactions, normalizePayeeMapRules(rows));
    return buildPayeeMapCandidates(transactions, results, hints);
}

describe('buildPayeeMapCandidates', () => {
    it('groups by kind, hash and description with bounded examples', () => {
        expect(candidatesFor([])).toEqual([
            {
                txn_kind: 'expense',
                fingerprint_hash: 'c774019916f2',
                description_clean_norm: 'local cafe',
                count_in_period: 2,
                example_1: 'M'.repeat(100),
                example_2: 'Second merchant example',
                suggested_payee_distribution: '',
                suggested_category_distribution: '',
                existing_rules_hit_count: 0,
                status: 'unmatched',
            },
            {
                txn_kind: 'transfer',
                fingerprint_hash: '752b4d624952',
                description_clean_norm: 'bit transfer',
                count_in_period: 1,
                example_1: 'BIT',
                example_2: '',
                suggested_payee_distribution: '',
                suggested_category_distribution: '',
                existing_rules_hit_count: 0,
                status: 'unmatched',
            },
        ]);
    });

    it('produces rows that satisfy the candidate schema', () => {
        for (const candidate of candidatesFor([])) {
            expect(CandidateGroupSchema.safeParse(candidate).success).toBe(true);
        }
    });

    it('summarizes register hints joined on kind and hash', () => {
        const hints = preparePairHints([
            { txn_kind: 'expense', raw_text: 'Local Cafe', ynab_payee_raw: 'Cafe Local', ynab_category_raw: 'Dining' },
            { txn_kind: 'expense', raw_text: 'LOCAL-CAFE', ynab_payee_raw: 'Cafe L', ynab_category_raw: 'Dining' },
            { txn_kind: 'expense', raw_text: 'local cafe', ynab_payee_raw: 'Cafe Local', ynab_category_raw: 'Dining' },
            { txn_kind: 'transfer', raw_text: 'bit transfer', ynab_payee_raw: 'Friend', ynab_category_raw: '' },
            { txn_kind: 'transfer', raw_text: 'local cafe', ynab_payee_raw: 'Wrong Kind', ynab_category_raw: 'X' },
        ]);
        const [cafe, transfer] = candidatesFor([], hints);

        expect(cafe.suggested_payee_distribution).toBe('Cafe Local (2); Cafe L (1)');
        expect(cafe.suggested_category_distribution).toBe('Dining (3)');
        expect(transfer.suggested_payee_distribution).toBe('Friend (1)');
        expect(transfer.suggested_category_distribution).toBe('');
    });

    it('reports groups fully matched by one rule', () => {
        const [cafe, transfer] = candidatesFor([
            { rule_id: 'cafe', description_clean_norm: 'local cafe', payee_canonical: 'Cafe' },
        ]);
        expect(cafe.status).toBe('matched_uniquely');
        expect(cafe.existing_rules_hit_count).toBe(1);
        expect(transfer.status).toBe('unmatched');
    });

    it('counts every distinct candidate rule of an ambiguous group', () => {
        const [cafe] = candidatesFor([
            { rule_id: 'one', description_clean_norm: 'local cafe' },
            { rule_id: 'two', txn_kind: 'expense' },
        ]);
        expect(cafe.status).toBe('ambiguous');
        expect(cafe.existing_rules_hit_count).toBe(2);
    });

    it('rejects results that are not parallel to transactions', () => {
        const transactions = prepareTransactions(records);
        expect(() => buildPayeeMapCandidates(transactions, [])).toThrow(
            'Expected one classification result per transaction (got 0 for 3)'
        );
    });

    it('returns no groups for no transactions', () => {
        expect(buildPayeeMapCandidates([], [])).toEqual([]);
    });
});

describe('candidateStatus', () => {
    it('is unmatched when no row matched', () => {
        expect(candidateStatus(['none', 'none'])).toBe('unmatched');
        expect(candidateStatus([])).toBe('unmatched');
    });

    it('is ambiguous on any tie or a matched/unmatched mix', () => {
        expect(candidateStatus(['unique', 'ambiguous'])).toBe('ambiguous');
        expect(candidateStatus(['unique', 'none'])).toBe('ambiguous');
    });

    it('is matched_uniquely when every row matched uniquely', () => {
        expect(candidateStatus(['unique', 'unique'])).toBe('matched_uniquely');
    });
});
