/**
 * Transaction preparation: arbitrary-shaped records to a uniform comparison view.
 *
 * PURE FUNCTIONS: input records are never mutated, no row is dropped,
 * output order equals input order.
 */

import { normalizeText } from '../utils/normalize.js';
import { fingerprintV0, fingerprintHashV1 } from '../utils/fingerprint.js';
import { parseAmount, directionFromAmount } from '../utils/amount.js';
import { pickField } from '../utils/cell.js';
import { DEFAULT_CURRENCY } from '../types/index.js';
import type { RawRecord, PreparedTransaction } from '../types/index.js';
import { FIELD_FALLBACKS, SIGNED_AMOUNT_COLUMN } from './fields.js';

/**
 * Prepare a single record.
 *
 * @param record - Column name to value; every column optional
 * @returns Prepared comparison view
 */
export function prepareTransaction(record: RawRecord): PreparedTransaction {
    const txnKind = pickField(record, FIELD_FALLBACKS.txn_kind).toLowerCase();
    const descriptionCleanNorm = normalizeText(pickField(record, FIELD_FALLBACKS.description));
    const fingerprint = pickField(record, FIELD_FALLBACKS.fingerprint) || fingerprintV0(descriptionCleanNorm);

    return {
        txn_kind: txnKind,
        source: pickField(record, FIELD_FALLBACKS.source).toLowerCase(),
        account_name: pickField(record, FIELD_FALLBACKS.account_name),
        currency: pickField(record, FIELD_FALLBACKS.currency, DEFAULT_CURRENCY).toUpperCase(),
        direction: resolveDirection(record),
        amount_bucket: pickField(record, FIELD_FALLBACKS.amount_bucket),
        description_clean_norm: descriptionCleanNorm,
        fingerprint,
        fingerprint_hash: fingerprintHashV1(txnKind, descriptionCleanNorm),
        example_text: pickField(record, FIELD_FALLBACKS.example_text),
        merchant_raw: pickField(record, FIELD_FALLBACKS.merchant_raw),
    };
}

/**
 * Prepare a batch of records.
 *
 * @param records - Records in source order
 * @returns One prepared transaction per record, same order
 */
export function prepareTransactions(records: readonly RawRecord[]): PreparedTransaction[] {
    return records.map(prepareTransaction);
}

/**
 * Existing direction wins; otherwise derive from the signed amount.
 * A missing or non-numeric amount is "zero".
 */
function resolveDirection(record: RawRecord): string {
    const existing = pickField(record, FIELD_FALLBACKS.direction).toLowerCase();
    if (existing !== '') return existing;

    const signed = parseAmount(record[SIGNED_AMOUNT_COLUMN]);
    return signed ? directionFromAmount(signed) : 'zero';
}
