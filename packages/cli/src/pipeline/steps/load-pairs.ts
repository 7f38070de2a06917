import { existsSync } from 'node:fs';
import { preparePairHints } from '@payee-mapper/core';
import type { PipelineStep } from '../types.js';
import { readTables } from '../../io/table.js';
import { getMatchedPairsPath } from '../../workspace/paths.js';
import { arrow, errorMessage, info } from '../../utils/console.js';

/**
 * Step 5: Load Pair Hints
 * Register payee/category choices from matched pairs, used for the
 * suggested distributions. Optional: without pairs the distributions are blank.
 */
export const loadPairHints: PipelineStep = async (state) => {
    const paths = pairPaths(state.options.pairs, state.workspace ? getMatchedPairsPath(state.workspace) : null);
    if (paths.length === 0) {
        info('No matched pairs given; suggested distributions will be empty.');
        return state;
    }

    try {
        const pairs = await readTables(paths);
        state.hints = preparePairHints(pairs);
        arrow(`${state.hints.length} pair hints from ${paths.join(', ')}`);
    } catch (err) {
        state.errors.push({
            step: 'load-pairs',
            message: errorMessage(err),
            fatal: true,
            error: err
        });
    }

    return state;
};

/**
 * Explicit --pairs files, else the workspace's matched_pairs.csv when present.
 */
function pairPaths(explicit: readonly string[] | undefined, workspaceDefault: string | null): string[] {
    if (explicit && explicit.length > 0) return [...explicit];
    if (workspaceDefault && existsSync(workspaceDefault)) return [workspaceDefault];
    return [];
}
