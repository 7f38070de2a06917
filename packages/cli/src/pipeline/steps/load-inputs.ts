import type { PipelineStep } from '../types.js';
import { readTable } from '../../io/table.js';
import { arrow, errorMessage } from '../../utils/console.js';

/**
 * Step 2: Load Inputs
 * Reads every normalized transaction file, concatenated in argument order.
 */
export const loadInputs: PipelineStep = async (state) => {
    for (const path of state.options.in) {
        try {
            const rows = await readTable(path);
            arrow(`${path}: ${rows.length} rows`);
            state.records.push(...rows);
        } catch (err) {
            state.errors.push({
                step: 'load-inputs',
                message: errorMessage(err),
                fatal: true,
                error: err
            });
            return state;
        }
    }

    if (state.records.length === 0) {
        state.warnings.push('No transactions found in input files.');
    }

    return state;
};
