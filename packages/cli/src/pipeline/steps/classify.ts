import { classifyAll } from '@payee-mapper/core';
import type { PipelineStep } from '../types.js';
import { arrow } from '../../utils/console.js';

/**
 * Step 4: Classify
 * Matches every prepared transaction against the active payee map rules.
 */
export const classifyTransactions: PipelineStep = async (state) => {
    const { results, stats } = classifyAll(state.transactions, state.rules);

    state.results = results;
    state.classificationStats = stats;

    arrow(`unique: ${stats.byStatus.unique}, ambiguous: ${stats.byStatus.ambiguous}, none: ${stats.byStatus.none}`);
    if (stats.byStatus.ambiguous > 0) {
        state.warnings.push(`${stats.byStatus.ambiguous} transaction(s) matched tied rules. Raise a priority to break the tie.`);
    }

    return state;
};
