/**
 * Register hints from reconciled pairs.
 *
 * A matched pair tells us which payee/category a human chose in the
 * budgeting register for a given bank/card transaction. Pairs are prepared
 * like any other record, so their hashes line up with candidate groups.
 */

import { prepareTransactions } from '../preparer/prepare.js';
import { cellText } from '../utils/cell.js';
import type { PairHint, RawRecord } from '../types/index.js';

export function preparePairHints(pairs: readonly RawRecord[]): PairHint[] {
    const prepared = prepareTransactions(pairs);
    return prepared.map((txn, i) => ({
        txn_kind: txn.txn_kind,
        fingerprint_hash: txn.fingerprint_hash,
        ynab_payee_raw: cellText(pairs[i].ynab_payee_raw),
        ynab_category_raw: cellText(pairs[i].ynab_category_raw),
    }));
}
