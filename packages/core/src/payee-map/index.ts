/**
 * Payee map module: rule table validation, normalization and specificity.
 */

export { normalizePayeeMapRules, activeRules, parseIsActive, parsePriority } from './load.js';
export {
    WILDCARD,
    normalizeKeyValue,
    evaluatedKeyColumns,
    ruleConstraints,
    computeSpecificity,
} from './keys.js';
