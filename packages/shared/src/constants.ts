/**
 * Constants for Payee Mapper.
 * Column layouts are the external table contracts; keep their order stable.
 */

/**
 * Currency assumed when a record leaves it blank.
 */
export const DEFAULT_CURRENCY = 'ILS';

/**
 * Separator used for rule id lists in classification output.
 */
export const RULE_ID_SEPARATOR = ';';

/**
 * Fingerprint configuration.
 */
export const FINGERPRINT = {
    V0_MAX_TOKENS: 6,
    HASH_LENGTH: 12,
} as const;

/**
 * Candidate report limits.
 */
export const CANDIDATES = {
    MAX_EXAMPLES: 2,
    EXAMPLE_MAX_LENGTH: 100,
    DISTRIBUTION_TOP_N: 3,
} as const;

/**
 * Recognized spellings for the payee map's is_active column (case-insensitive).
 */
export const BOOLEAN_VOCABULARY = {
    TRUE: ['1', 'true', 't', 'yes', 'y'],
    FALSE: ['0', 'false', 'f', 'no', 'n'],
} as const;

/**
 * Payee map table columns, in file order.
 */
export const PAYEE_MAP_COLUMNS = [
    'rule_id',
    'is_active',
    'priority',
    'txn_kind',
    'fingerprint_hash',
    'fingerprint',
    'description_clean_norm',
    'account_name',
    'source',
    'direction',
    'currency',
    'amount_bucket',
    'payee_canonical',
    'category_target',
    'notes',
] as const;

export type PayeeMapColumn = (typeof PAYEE_MAP_COLUMNS)[number];

/**
 * Rule fields compared against the prepared transaction field of the same name.
 */
export const RULE_KEY_COLUMNS = [
    'txn_kind',
    'fingerprint_hash',
    'fingerprint',
    'description_clean_norm',
    'account_name',
    'source',
    'direction',
    'currency',
    'amount_bucket',
] as const;

export type RuleKeyColumn = (typeof RULE_KEY_COLUMNS)[number];

/**
 * Classification columns appended to each record.
 */
export const CLASSIFICATION_COLUMNS = [
    'payee_canonical_suggested',
    'category_target_suggested',
    'match_rule_id',
    'match_specificity_score',
    'match_status',
    'match_candidate_rule_ids',
    'match_rule_count',
] as const;

/**
 * Candidate report columns.
 */
export const CANDIDATE_COLUMNS = [
    'txn_kind',
    'fingerprint_hash',
    'description_clean_norm',
    'count_in_period',
    'example_1',
    'example_2',
    'suggested_payee_distribution',
    'suggested_category_distribution',
    'existing_rules_hit_count',
    'status',
] as const;

/**
 * Reconciled pair columns (bank/card record joined to a register entry).
 */
export const MATCHED_PAIR_COLUMNS = [
    'account_name',
    'date',
    'amount_ils',
    'txn_kind',
    'source',
    'raw_text',
    'raw_norm',
    'fingerprint_v0',
    'ynab_payee_raw',
    'ynab_category_raw',
    'pair_source',
    'ambiguous_key',
] as const;

/**
 * Fingerprint group columns.
 */
export const FINGERPRINT_GROUP_COLUMNS = [
    'fingerprint_v0',
    'count',
    'example_raw_text',
    'top_ynab_payees',
    'top_ynab_categories',
    'canonical_payee',
] as const;
