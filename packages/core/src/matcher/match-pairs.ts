/**
 * Reconciliation pairing between statements and the budgeting register.
 *
 * A bank or card record pairs with a register entry when account name,
 * date and signed amount (rounded to cents) are exactly equal. No tolerance
 * windows: a near miss is not a pair.
 *
 * PURE FUNCTION: Does not mutate records. Warnings returned as data.
 */

import { normalizeText } from '../utils/normalize.js';
import { fingerprintV0 } from '../utils/fingerprint.js';
import { parseAmount, toAmountKey } from '../utils/amount.js';
import { parseDateValue, formatIsoDate } from '../utils/date-parse.js';
import { cellText, pickBatchColumn } from '../utils/cell.js';
import type { MatchedPair, PairSource, RawRecord } from '../types/index.js';
import { RAW_TEXT_COLUMNS } from './types.js';
import type { JoinRow, PairingResult, RegisterJoinRow, StatementJoinRow } from './types.js';

/**
 * Join bank and card records to register entries.
 *
 * Rows with an unparseable date or amount cannot be keyed and are dropped
 * (reported in warnings). Pairs are emitted bank first, then card, each in
 * statement order; a statement row matching several register entries yields
 * one pair per entry, and every pair sharing a key is flagged ambiguous_key.
 *
 * @param bank - Normalized bank statement records
 * @param card - Normalized card statement records
 * @param register - Normalized register records (payee_raw, category_raw)
 */
export function matchPairs(
    bank: readonly RawRecord[],
    card: readonly RawRecord[],
    register: readonly RawRecord[]
): PairingResult {
    const warnings: string[] = [];

    const bankRows = prepareStatement(bank, 'bank-ynab');
    const cardRows = prepareStatement(card, 'card-ynab');
    const registerRows = prepareRegister(register);

    const dropped =
        bank.length - bankRows.length +
        (card.length - cardRows.length) +
        (register.length - registerRows.length);
    if (dropped > 0) {
        warnings.push(`${dropped} row(s) skipped: missing or invalid date/amount`);
    }

    const registerByKey = new Map<string, RegisterJoinRow[]>();
    for (const row of registerRows) {
        const bucket = registerByKey.get(row.key);
        if (bucket) {
            bucket.push(row);
        } else {
            registerByKey.set(row.key, [row]);
        }
    }

    const joined: Array<{ key: string; pair: Omit<MatchedPair, 'ambiguous_key'> }> = [];
    for (const row of [...bankRows, ...cardRows]) {
        for (const entry of registerByKey.get(row.key) ?? []) {
            joined.push({
                key: row.key,
                pair: {
                    account_name: row.account_name,
                    date: row.date,
                    amount_ils: row.amount_ils,
                    txn_kind: row.txn_kind,
                    source: row.source,
                    raw_text: row.raw_text,
                    raw_norm: normalizeText(row.raw_text),
                    fingerprint_v0: fingerprintV0(row.raw_text),
                    ynab_payee_raw: entry.payee_raw,
                    ynab_category_raw: entry.category_raw,
                    pair_source: row.pair_source,
                },
            });
        }
    }

    const keyCounts = new Map<string, number>();
    for (const { key } of joined) {
        keyCounts.set(key, (keyCounts.get(key) ?? 0) + 1);
    }

    const pairs: MatchedPair[] = joined.map(({ key, pair }) => ({
        ...pair,
        ambiguous_key: (keyCounts.get(key) ?? 0) > 1,
    }));

    const ambiguous = pairs.filter((pair) => pair.ambiguous_key).length;
    if (ambiguous > 0) {
        warnings.push(`${ambiguous} pair(s) share a join key with another pair`);
    }

    return {
        pairs,
        warnings,
        stats: {
            bank_rows: bank.length,
            card_rows: card.length,
            register_rows: register.length,
            dropped_rows: dropped,
            pairs_found: pairs.length,
            ambiguous_pairs: ambiguous,
        },
    };
}

function prepareStatement(records: readonly RawRecord[], pairSource: PairSource): StatementJoinRow[] {
    const rawColumn = pickBatchColumn(records, RAW_TEXT_COLUMNS[pairSource]);
    const rows: StatementJoinRow[] = [];

    for (const record of records) {
        const base = joinRow(record);
        if (!base) continue;
        rows.push({
            ...base,
            txn_kind: cellText(record.txn_kind).toLowerCase(),
            source: cellText(record.source).toLowerCase(),
            raw_text: rawColumn ? cellText(record[rawColumn]) : '',
            pair_source: pairSource,
        });
    }
    return rows;
}

function prepareRegister(records: readonly RawRecord[]): RegisterJoinRow[] {
    const rows: RegisterJoinRow[] = [];
    for (const record of records) {
        const base = joinRow(record);
        if (!base) continue;
        rows.push({
            ...base,
            payee_raw: cellText(record.payee_raw),
            category_raw: cellText(record.category_raw),
        });
    }
    return rows;
}

/**
 * Key a record on account + date + amount, or null when it cannot be keyed.
 */
function joinRow(record: RawRecord): JoinRow | null {
    const date = parseDateValue(record.date);
    const amount = parseAmount(record.amount_ils);
    if (!date || !amount) return null;

    const accountName = cellText(record.account_name);
    const isoDate = formatIsoDate(date);
    const amountKey = toAmountKey(amount);

    return {
        key: `${accountName}|${isoDate}|${amountKey}`,
        account_name: accountName,
        date: isoDate,
        amount_ils: amountKey,
    };
}
