/**
 * Rule-to-transaction matching.
 *
 * ARCHITECTURAL NOTE: No console.* calls, no I/O. Pure function of its inputs.
 */

import { normalizeKeyValue, ruleConstraints } from '../payee-map/keys.js';
import type { PayeeRule, PreparedTransaction } from '../types/index.js';

/**
 * A rule matches iff every constrained key equals the transaction's value
 * for that key, both sides normalized the same way.
 *
 * Wildcards and keys superseded by a stronger key (see evaluatedKeyColumns)
 * impose no constraint. A blank transaction value never equals a pinned key.
 */
export function ruleMatches(rule: PayeeRule, txn: PreparedTransaction): boolean {
    for (const [column, expected] of ruleConstraints(rule)) {
        if (normalizeKeyValue(column, txn[column]) !== expected) {
            return false;
        }
    }
    return true;
}
