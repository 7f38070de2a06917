import type {
    CandidateGroup,
    ClassificationResult,
    PairHint,
    PayeeRule,
    PreparedTransaction,
    RawRecord,
} from '@payee-mapper/shared';
import type { ClassificationStats } from '@payee-mapper/core';
import type { Workspace, BuildPayeeMapOptions } from '../types.js';

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Central state object passed through the payee map pipeline.
 */
export interface PipelineState {
    workspace: Workspace | null;
    options: BuildPayeeMapOptions;
    mapPath: string;
    outDir: string;

    // Accumulated during pipeline execution
    rules: PayeeRule[];
    records: RawRecord[];
    transactions: PreparedTransaction[];
    results: ClassificationResult[];
    classificationStats?: ClassificationStats;
    hints: PairHint[];
    candidates: CandidateGroup[];
    writtenFiles: string[];

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
