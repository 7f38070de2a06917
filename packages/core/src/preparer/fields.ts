/**
 * Column fallbacks per logical field.
 *
 * Each list is scanned in order and the first non-empty cell wins.
 * This is the only place record column names are interpreted; everything
 * downstream works on PreparedTransaction.
 */
export const FIELD_FALLBACKS = {
    txn_kind: ['txn_kind'],
    source: ['source'],
    account_name: ['account_name'],
    currency: ['currency'],
    direction: ['direction'],
    amount_bucket: ['amount_bucket'],
    description: [
        'description_clean_norm',
        'description_clean',
        'merchant_raw',
        'description_raw',
        'raw_norm',
        'raw_text',
    ],
    fingerprint: ['fingerprint', 'fingerprint_v0'],
    example_text: [
        'description_raw',
        'raw_text',
        'description_clean',
        'merchant_raw',
        'description_clean_norm',
    ],
    merchant_raw: ['merchant_raw'],
} as const satisfies Record<string, readonly string[]>;

/**
 * Signed amount column used to derive direction when a record has none.
 * Split inflow/outflow columns are not read.
 */
export const SIGNED_AMOUNT_COLUMN = 'amount_ils';
