/**
 * Rule pre-index for batch classification.
 *
 * Rules pinning a fingerprint_hash can only match transactions with that
 * hash, so they are bucketed by it. Every other rule is a candidate for every
 * transaction. Candidate lists feed the same matching and ranking as a full
 * scan, so results are identical.
 */

import { normalizeKeyValue, WILDCARD } from '../payee-map/keys.js';
import type { PayeeRule, PreparedTransaction } from '../types/index.js';

export class RuleIndex {
    private readonly byHash = new Map<string, PayeeRule[]>();
    private readonly unhashed: PayeeRule[] = [];

    constructor(rules: readonly PayeeRule[]) {
        for (const rule of rules) {
            if (rule.fingerprint_hash === WILDCARD) {
                this.unhashed.push(rule);
                continue;
            }
            const bucket = this.byHash.get(rule.fingerprint_hash);
            if (bucket) {
                bucket.push(rule);
            } else {
                this.byHash.set(rule.fingerprint_hash, [rule]);
            }
        }
    }

    /**
     * Rules that could match `txn`. Not yet filtered on the other keys.
     */
    candidatesFor(txn: PreparedTransaction): readonly PayeeRule[] {
        const hash = normalizeKeyValue('fingerprint_hash', txn.fingerprint_hash);
        const bucket = hash === WILDCARD ? undefined : this.byHash.get(hash);
        if (!bucket) return this.unhashed;
        return [...this.unhashed, ...bucket];
    }

    get size(): number {
        let total = this.unhashed.length;
        for (const bucket of this.byHash.values()) {
            total += bucket.length;
        }
        return total;
    }
}
