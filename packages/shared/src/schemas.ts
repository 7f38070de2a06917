/**
 * Zod schemas for Payee Mapper data structures.
 *
 * All text fields are plain strings; an empty string means "no value".
 * Rule key fields use null as the wildcard marker instead.
 */

import { z } from 'zod';
import { CANDIDATES, FINGERPRINT } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * A single table cell as delivered by a CSV/XLSX/YAML reader.
 * Normalized to a string; missing cells become "".
 */
const cell = z
    .union([z.string(), z.number(), z.boolean(), z.null()])
    .optional()
    .transform((value) => (value === null || value === undefined ? '' : String(value)));

/**
 * Truncated SHA-1 hex produced by fingerprintHashV1.
 */
const fingerprintHash = z.string().regex(/^[0-9a-f]{1,40}$/, 'Must be a lower-case hex digest');

/**
 * Wildcard-capable rule key: null matches anything.
 */
const ruleKey = z.string().min(1).nullable();

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Decimal amount as string (never native number for money).
 */
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

// ============================================================================
// Transaction Schemas
// ============================================================================

/**
 * Incoming transaction-like record: column name to value, any shape.
 */
export const RawRecordSchema = z.record(z.string(), z.unknown());

export type RawRecord = z.infer<typeof RawRecordSchema>;

/**
 * Uniform comparison view of a record, derived by the transaction preparer.
 */
export const PreparedTransactionSchema = z.object({
    txn_kind: z.string(),
    source: z.string(),
    account_name: z.string(),
    currency: z.string().min(1),
    direction: z.string().min(1),
    amount_bucket: z.string(),
    description_clean_norm: z.string(),
    fingerprint: z.string(),
    fingerprint_hash: fingerprintHash.length(FINGERPRINT.HASH_LENGTH),
    example_text: z.string(),
    merchant_raw: z.string(),
});

export type PreparedTransaction = z.infer<typeof PreparedTransactionSchema>;

// ============================================================================
// Payee Map Schemas
// ============================================================================

/**
 * One payee map row as read from a table. Every column is optional;
 * missing columns are treated as blank.
 */
export const PayeeMapRowSchema = z.object({
    rule_id: cell,
    is_active: cell,
    priority: cell,
    txn_kind: cell,
    fingerprint_hash: cell,
    fingerprint: cell,
    description_clean_norm: cell,
    account_name: cell,
    source: cell,
    direction: cell,
    currency: cell,
    amount_bucket: cell,
    payee_canonical: cell,
    category_target: cell,
    notes: cell,
});

export type PayeeMapRowInput = z.input<typeof PayeeMapRowSchema>;
export type PayeeMapRow = z.output<typeof PayeeMapRowSchema>;

/**
 * Normalized classification rule.
 * Key fields hold the canonical form of the value, or null for a wildcard.
 */
export const PayeeRuleSchema = z.object({
    rule_id: z.string().min(1),
    is_active: z.boolean(),
    priority: z.number().int(),
    txn_kind: ruleKey,
    fingerprint_hash: ruleKey,
    fingerprint: ruleKey,
    description_clean_norm: ruleKey,
    account_name: ruleKey,
    source: ruleKey,
    direction: ruleKey,
    currency: ruleKey,
    amount_bucket: ruleKey,
    payee_canonical: z.string().min(1).nullable(),
    category_target: z.string().min(1).nullable(),
    notes: z.string().min(1).nullable(),
    specificity: z.number().int().min(0),
});

export type PayeeRule = z.infer<typeof PayeeRuleSchema>;

// ============================================================================
// Classification Schemas
// ============================================================================

export const MatchStatusSchema = z.enum(['unique', 'ambiguous', 'none']);

export type MatchStatus = z.infer<typeof MatchStatusSchema>;

/**
 * Classification result - one per prepared transaction.
 */
export const ClassificationResultSchema = z.object({
    payee_canonical_suggested: z.string(),
    category_target_suggested: z.string(),
    match_rule_id: z.string(),
    match_specificity_score: z.number().int().min(0),
    match_status: MatchStatusSchema,
    match_candidate_rule_ids: z.string(),
    match_rule_count: z.number().int().min(0),
});

export type ClassificationResult = z.infer<typeof ClassificationResultSchema>;

// ============================================================================
// Candidate Schemas
// ============================================================================

export const CandidateStatusSchema = z.enum(['unmatched', 'ambiguous', 'matched_uniquely']);

export type CandidateStatus = z.infer<typeof CandidateStatusSchema>;

/**
 * Rule candidate: transactions sharing kind, fingerprint hash and description.
 */
export const CandidateGroupSchema = z.object({
    txn_kind: z.string(),
    fingerprint_hash: fingerprintHash,
    description_clean_norm: z.string(),
    count_in_period: z.number().int().min(1),
    example_1: z.string().max(CANDIDATES.EXAMPLE_MAX_LENGTH),
    example_2: z.string().max(CANDIDATES.EXAMPLE_MAX_LENGTH),
    suggested_payee_distribution: z.string(),
    suggested_category_distribution: z.string(),
    existing_rules_hit_count: z.number().int().min(0),
    status: CandidateStatusSchema,
});

export type CandidateGroup = z.infer<typeof CandidateGroupSchema>;

/**
 * Register payee/category observed for a reconciled transaction,
 * keyed the same way as candidate groups.
 */
export const PairHintSchema = z.object({
    txn_kind: z.string(),
    fingerprint_hash: fingerprintHash,
    ynab_payee_raw: z.string(),
    ynab_category_raw: z.string(),
});

export type PairHint = z.infer<typeof PairHintSchema>;

// ============================================================================
// Reconciliation Schemas
// ============================================================================

export const PairSourceSchema = z.enum(['bank-ynab', 'card-ynab']);

export type PairSource = z.infer<typeof PairSourceSchema>;

/**
 * Bank/card record joined to a budgeting-register entry
 * on exact account + date + signed amount.
 */
export const MatchedPairSchema = z.object({
    account_name: z.string(),
    date: isoDateString,
    amount_ils: decimalString,
    txn_kind: z.string(),
    source: z.string(),
    raw_text: z.string(),
    raw_norm: z.string(),
    fingerprint_v0: z.string(),
    ynab_payee_raw: z.string(),
    ynab_category_raw: z.string(),
    pair_source: PairSourceSchema,
    ambiguous_key: z.boolean(),
});

export type MatchedPair = z.infer<typeof MatchedPairSchema>;

/**
 * Matched pairs grouped by fingerprint_v0, for manual payee naming.
 */
export const FingerprintGroupSchema = z.object({
    fingerprint_v0: z.string(),
    count: z.number().int().min(1),
    example_raw_text: z.string(),
    top_ynab_payees: z.string(),
    top_ynab_categories: z.string(),
    canonical_payee: z.string(),
});

export type FingerprintGroup = z.infer<typeof FingerprintGroupSchema>;
