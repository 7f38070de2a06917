import type { Workbook } from 'exceljs';
import { CANDIDATE_COLUMNS } from '@payee-mapper/shared';
import type { CandidateGroup, CandidateStatus } from '@payee-mapper/shared';
import type { ClassificationStats } from '@payee-mapper/core';
import { createWorkbook, formatHeaderRow, autoFitColumns, highlightRows } from './utils.js';

/**
 * Groups needing a rule come first.
 */
const STATUS_ORDER: Record<CandidateStatus, number> = {
    unmatched: 0,
    ambiguous: 1,
    matched_uniquely: 2,
};

/**
 * Generates the payee map review workbook: a Candidates sheet (most
 * frequent unmatched groups first) and a Summary sheet.
 */
export async function generateCandidateReviewExcel(
    candidates: readonly CandidateGroup[],
    stats: ClassificationStats
): Promise<Workbook> {
    const workbook = createWorkbook();

    addCandidatesSheet(workbook, candidates);
    addSummarySheet(workbook, candidates, stats);

    return workbook;
}

/**
 * Sheet: Candidates
 * Columns: the candidate report columns, in report order.
 */
function addCandidatesSheet(workbook: Workbook, candidates: readonly CandidateGroup[]): void {
    const sheet = workbook.addWorksheet('Candidates');
    sheet.columns = CANDIDATE_COLUMNS.map((column) => ({ header: column, key: column }));

    const ordered = [...candidates].sort(
        (a, b) => STATUS_ORDER[a.status] - STATUS_ORDER[b.status] || b.count_in_period - a.count_in_period
    );
    for (const candidate of ordered) {
        sheet.addRow({ ...candidate });
    }

    formatHeaderRow(sheet);
    highlightRows(sheet, 'status', 'ambiguous', 'FFFFF2CC');
    autoFitColumns(sheet);
}

/**
 * Sheet: Summary
 * Rows: transaction counts per match status, candidate counts per status.
 */
function addSummarySheet(
    workbook: Workbook,
    candidates: readonly CandidateGroup[],
    stats: ClassificationStats
): void {
    const sheet = workbook.addWorksheet('Summary');
    sheet.columns = [
        { header: 'Metric', key: 'metric' },
        { header: 'Value', key: 'value' },
    ];

    const groupsWith = (status: CandidateStatus) => candidates.filter((c) => c.status === status).length;

    sheet.addRow({ metric: 'Transactions', value: stats.total });
    sheet.addRow({ metric: 'Active rules', value: stats.activeRules });
    sheet.addRow({ metric: 'Matched uniquely', value: stats.byStatus.unique });
    sheet.addRow({ metric: 'Ambiguous', value: stats.byStatus.ambiguous });
    sheet.addRow({ metric: 'Unmatched', value: stats.byStatus.none });
    sheet.addRow({ metric: 'Candidate groups', value: candidates.length });
    sheet.addRow({ metric: 'Unmatched groups', value: groupsWith('unmatched') });
    sheet.addRow({ metric: 'Ambiguous groups', value: groupsWith('ambiguous') });

    formatHeaderRow(sheet);
    autoFitColumns(sheet);
}
