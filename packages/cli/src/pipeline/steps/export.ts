import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import {
    CANDIDATE_COLUMNS,
    CLASSIFICATION_COLUMNS,
    PreparedTransactionSchema,
} from '@payee-mapper/shared';
import type { PipelineStep } from '../types.js';
import { writeCsv } from '../../io/table.js';
import { generateCandidateReviewExcel } from '../../excel/review.js';
import { errorMessage } from '../../utils/console.js';

export const OUTPUT_FILES = {
    CANDIDATES: 'payee_map_candidates.csv',
    PREVIEW: 'payee_map_preview.csv',
    REVIEW: 'payee_map_review.xlsx',
} as const;

/**
 * Preview columns: the prepared view followed by the classification.
 */
export const PREVIEW_COLUMNS: readonly string[] = [
    ...Object.keys(PreparedTransactionSchema.shape),
    ...CLASSIFICATION_COLUMNS,
];

/**
 * Step 7: Export
 * Writes the candidate report, the per-transaction preview and the review workbook.
 */
export const exportResults: PipelineStep = async (state) => {
    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping file export.');
        return state;
    }

    const candidatesPath = join(state.outDir, OUTPUT_FILES.CANDIDATES);
    const previewPath = join(state.outDir, OUTPUT_FILES.PREVIEW);
    const reviewPath = join(state.outDir, OUTPUT_FILES.REVIEW);

    try {
        await mkdir(state.outDir, { recursive: true });

        await writeCsv(candidatesPath, state.candidates, CANDIDATE_COLUMNS);
        state.writtenFiles.push(candidatesPath);

        const preview = state.transactions.map((txn, i) => ({ ...txn, ...state.results[i] }));
        await writeCsv(previewPath, preview, PREVIEW_COLUMNS);
        state.writtenFiles.push(previewPath);

        if (state.classificationStats) {
            const reviewWb = await generateCandidateReviewExcel(state.candidates, state.classificationStats);
            await reviewWb.xlsx.writeFile(reviewPath);
            state.writtenFiles.push(reviewPath);
        }
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export results to ${state.outDir}: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
    }

    return state;
};
