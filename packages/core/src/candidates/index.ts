/**
 * Candidates module: reviewable summaries for authoring payee map rules.
 */

export { buildPayeeMapCandidates, candidateStatus } from './aggregate.js';
export { buildFingerprintGroups } from './fingerprint-groups.js';
export type { GroupablePair } from './fingerprint-groups.js';
export { preparePairHints } from './hints.js';
export { pickExamples, rowExample, truncate } from './examples.js';
export { valueCounts, topCounts, mostCommon } from './distribution.js';
