import { describe, it, expect } from 'vitest';
import { matchPairs } from '../../src/matcher/match-pairs.js';
import { MatchedPairSchema } from '@payee-mapper/shared';
import type { RawRecord } from '@payee-mapper/shared';

const bank: RawRecord[] = [
    {
        account_name: 'Main',
        date: '15/01/2026',
        amount_ils: '-20.00',
        txn_kind: 'Expense',
        source: 'bank',
        description_clean: '',
        merchant_raw: 'Aroma TLV 1234567',
        description_raw: 'AROMA RAW',
    },
    {
        account_name: 'Main',
        date: '2026-01-16',
        amount_ils: '-35.5',
        txn_kind: 'expense',
        source: 'bank',
        merchant_raw: 'Supersal 12',
        description_raw: 'x',
    },
    { account_name: 'Main', date: 'bad', amount_ils: '-1' },
];

const card: RawRecord[] = [
    {
        account_name: 'Card',
        date: 46037,
        amount_ils: -12.5,
        txn_kind: 'expense',
        source: 'card',
        description_clean: '',
        description_raw: 'WOLT ORDER',
        merchant_raw: 'Wolt',
    },
];

const register: RawRecord[] = [
    { account_name: 'Main', date: '2026-01-15', amount_ils: -20, payee_raw: 'Aroma', category_raw: 'Dining' },
    { account_name: 'Main', date: '2026-01-16', amount_ils: '-35.50', payee_raw: 'Shufersal', category_raw: 'Groceries' },
    { account_name: 'Main', date: '2026-01-16', amount_ils: '-35.5', payee_raw: 'Shufersal Again', category_raw: 'Groceries' },
    { account_name: 'Card', date: '15/01/2026', amount_ils: '-12.50', payee_raw: 'Wolt', category_raw: 'Dining' },
    { account_name: 'Main', date: '2026-01-17', amount_ils: -20, payee_raw: 'No Pair', category_raw: '' },
];

describe('matchPairs', () => {
    const result = matchPairs(bank, card, register);

    it('joins on account, date and amount, bank first', () => {
        expect(result.pairs.map(p => p.ynab_payee_raw)).toEqual(['Aroma', 'Shufersal', 'Shufersal Again', 'Wolt']);
    });

    it('builds the pair row from the statement side', () => {
        expect(result.pairs[0]).toEqual({
            account_name: 'Main',
            date: '2026-01-15',
            amount_ils: '-20',
            txn_kind: 'expense',
            source: 'bank',
            raw_text: 'Aroma TLV 1234567',
            raw_norm: 'aroma tlv',
            fingerprint_v0: 'aroma tlv',
            ynab_payee_raw: 'Aroma',
            ynab_category_raw: 'Dining',
            pair_source: 'bank-ynab',
            ambiguous_key: false,
        });
        expect(MatchedPairSchema.safeParse(result.pairs[0]).success).toBe(true);
    });

    it('picks the raw text column once per batch', () => {
        expect(result.pairs[1].raw_text).toBe('Supersal 12');
        expect(result.pairs[1].fingerprint_v0).toBe('supersal');
        expect(result.pairs[3].raw_text).toBe('WOLT ORDER');
        expect(result.pairs[3].pair_source).toBe('card-ynab');
    });

    it('flags pairs sharing a join key', () => {
        expect(result.pairs.map(p => p.ambiguous_key)).toEqual([false, true, true, false]);
    });

    it('reports dropped rows and shared keys as warnings', () => {
        expect(result.warnings).toEqual([
            '1 row(s) skipped: missing or invalid date/amount',
            '2 pair(s) share a join key with another pair',
        ]);
    });

    it('returns stats', () => {
        expect(result.stats).toEqual({
            bank_rows: 3,
            card_rows: 1,
            register_rows: 5,
            dropped_rows: 1,
            pairs_found: 4,
            ambiguous_pairs: 2,
        });
    });

    it('does not pair near misses', () => {
        const near = matchPairs(
            [{ account_name: 'Main', date: '2026-01-15', amount_ils: '-20.01' }],
            [],
            [{ account_name: 'Main', date: '2026-01-15', amount_ils: '-20' }]
        );
        expect(near.pairs).toEqual([]);
        expect(near.warnings).toEqual([]);
    });

    it('rounds amounts to cents before joining', () => {
        const rounded = matchPairs(
            [{ account_name: 'Main', date: '2026-01-15', amount_ils: '-20.004' }],
            [],
            [{ account_name: 'Main', date: '2026-01-15', amount_ils: -20 }]
        );
        expect(rounded.pairs).toHaveLength(1);
        expect(rounded.pairs[0].amount_ils).toBe('-20');
    });
});
