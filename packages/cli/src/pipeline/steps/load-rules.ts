import { ValidationError } from '@payee-mapper/core';
import type { PipelineStep } from '../types.js';
import { loadPayeeMap } from '../../io/payee-map.js';
import { errorMessage, success } from '../../utils/console.js';

/**
 * Step 1: Load Payee Map
 * Reads and validates the payee map. Any invalid row is fatal.
 */
export const loadRules: PipelineStep = async (state) => {
    try {
        state.rules = await loadPayeeMap(state.mapPath);
    } catch (err) {
        const message = err instanceof ValidationError
            ? `Invalid payee map ${state.mapPath}:\n  ${err.issues.join('\n  ')}`
            : `Failed to load payee map: ${errorMessage(err)}`;
        state.errors.push({ step: 'load-rules', message, fatal: true, error: err });
        return state;
    }

    const active = state.rules.filter(rule => rule.is_active).length;
    success(`Loaded ${state.rules.length} rules (${active} active) from ${state.mapPath}`);
    return state;
};
