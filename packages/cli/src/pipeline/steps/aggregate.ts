import { buildPayeeMapCandidates } from '@payee-mapper/core';
import type { PipelineStep } from '../types.js';
import { errorMessage, success } from '../../utils/console.js';

/**
 * Step 6: Aggregate Candidates
 * Groups classified transactions into payee map rule candidates.
 */
export const aggregateCandidates: PipelineStep = async (state) => {
    try {
        state.candidates = buildPayeeMapCandidates(state.transactions, state.results, state.hints);
    } catch (err) {
        state.errors.push({
            step: 'aggregate',
            message: errorMessage(err),
            fatal: true,
            error: err
        });
        return state;
    }

    const unmatched = state.candidates.filter(c => c.status === 'unmatched').length;
    success(`${state.candidates.length} candidate groups (${unmatched} unmatched)`);
    return state;
};
