import { prepareTransactions } from '@payee-mapper/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 3: Prepare
 * Derives the comparison view of every record. Never drops a row.
 */
export const prepareRecords: PipelineStep = async (state) => {
    state.transactions = prepareTransactions(state.records);

    const blank = state.transactions.filter(txn => txn.description_clean_norm === '').length;
    if (blank > 0) {
        state.warnings.push(`${blank} transaction(s) have no description; they share one empty-description group.`);
    }

    return state;
};
