import type { MatchedPair, PairSource } from '../types/index.js';

/**
 * Raw-text column candidates per statement kind, in priority order.
 * Picked once per batch (first column with any value), not per row.
 */
export const RAW_TEXT_COLUMNS: Record<PairSource, readonly string[]> = {
    'bank-ynab': ['description_clean', 'merchant_raw', 'description_raw'],
    'card-ynab': ['description_clean', 'description_raw', 'merchant_raw'],
};

/**
 * Internal join row: a statement or register record reduced to its join key.
 */
export interface JoinRow {
    key: string;
    account_name: string;
    date: string;
    amount_ils: string;
}

export interface StatementJoinRow extends JoinRow {
    txn_kind: string;
    source: string;
    raw_text: string;
    pair_source: PairSource;
}

export interface RegisterJoinRow extends JoinRow {
    payee_raw: string;
    category_raw: string;
}

/**
 * Matching statistics for transparency.
 */
export interface PairingStats {
    bank_rows: number;
    card_rows: number;
    register_rows: number;
    dropped_rows: number;
    pairs_found: number;
    ambiguous_pairs: number;
}

/**
 * Result of matchPairs.
 */
export interface PairingResult {
    pairs: MatchedPair[];
    warnings: string[];
    stats: PairingStats;
}
