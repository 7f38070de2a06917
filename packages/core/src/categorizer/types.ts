/**
 * Internal types for categorizer module.
 */

import type { ClassificationResult, MatchStatus } from '../types/index.js';

/**
 * Statistics from batch classification.
 */
export interface ClassificationStats {
    total: number;
    byStatus: Record<MatchStatus, number>;
    activeRules: number;
}

/**
 * Output of classifyAll: one result per transaction, input order.
 */
export interface ClassificationOutput {
    results: ClassificationResult[];
    stats: ClassificationStats;
}
