import type { PipelineState, PipelineStep } from './types.js';
import { loadRules } from './steps/load-rules.js';
import { loadInputs } from './steps/load-inputs.js';
import { prepareRecords } from './steps/prepare.js';
import { classifyTransactions } from './steps/classify.js';
import { loadPairHints } from './steps/load-pairs.js';
import { aggregateCandidates } from './steps/aggregate.js';
import { exportResults } from './steps/export.js';
import { log, error } from '../utils/console.js';
import type { Workspace, BuildPayeeMapOptions } from '../types.js';

export interface PipelinePaths {
    mapPath: string;
    outDir: string;
}

export const PIPELINE_STEPS: ReadonlyArray<{ name: string; fn: PipelineStep }> = [
    { name: 'Load Payee Map', fn: loadRules },
    { name: 'Load Inputs', fn: loadInputs },
    { name: 'Prepare', fn: prepareRecords },
    { name: 'Classify', fn: classifyTransactions },
    { name: 'Load Pair Hints', fn: loadPairHints },
    { name: 'Aggregate Candidates', fn: aggregateCandidates },
    { name: 'Export Results', fn: exportResults },
];

export function createPipelineState(
    workspace: Workspace | null,
    options: BuildPayeeMapOptions,
    paths: PipelinePaths
): PipelineState {
    return {
        workspace,
        options,
        mapPath: paths.mapPath,
        outDir: paths.outDir,
        rules: [],
        records: [],
        transactions: [],
        results: [],
        hints: [],
        candidates: [],
        writtenFiles: [],
        warnings: [],
        errors: [],
    };
}

/**
 * Orchestrates the execution of the payee map pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(
    workspace: Workspace | null,
    options: BuildPayeeMapOptions,
    paths: PipelinePaths
): Promise<PipelineState> {
    let state = createPipelineState(workspace, options, paths);

    for (let i = 0; i < PIPELINE_STEPS.length; i++) {
        const step = PIPELINE_STEPS[i];
        log(`\n→ Step ${i + 1}/${PIPELINE_STEPS.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            error(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
