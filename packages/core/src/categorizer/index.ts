/**
 * Categorizer module: payee classification against the payee map.
 */

export { classifyTransaction, classifyAll } from './categorize.js';
export { ruleMatches } from './match.js';
export { compareRules, rankRules, topTier } from './rank.js';
export { RuleIndex } from './rule-index.js';
export type { ClassificationStats, ClassificationOutput } from './types.js';
