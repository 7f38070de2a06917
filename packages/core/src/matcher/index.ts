/**
 * Matcher module: reconciliation pairing between bank/card statements and
 * the budgeting register.
 */

export { matchPairs } from './match-pairs.js';
export { RAW_TEXT_COLUMNS } from './types.js';
export type { PairingResult, PairingStats } from './types.js';
