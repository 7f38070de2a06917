// Types (re-exported from shared)
export type {
    RawRecord,
    PreparedTransaction,
    PayeeMapRowInput,
    PayeeMapRow,
    PayeeRule,
    MatchStatus,
    ClassificationResult,
    CandidateStatus,
    CandidateGroup,
    PairHint,
    PairSource,
    MatchedPair,
    FingerprintGroup,
} from './types/index.js';

export { ValidationError } from './types/index.js';

// Utils
export {
    normalizeText,
    fingerprintV0,
    fingerprintHashV1,
    parseAmount,
    directionFromAmount,
    parseDateValue,
    formatIsoDate,
    cellText,
    stripBom,
} from './utils/index.js';
export type { Direction } from './utils/index.js';

// Preparer
export { prepareTransaction, prepareTransactions, FIELD_FALLBACKS } from './preparer/index.js';

// Payee map (rule store)
export {
    normalizePayeeMapRules,
    activeRules,
    normalizeKeyValue,
    evaluatedKeyColumns,
    computeSpecificity,
    WILDCARD,
} from './payee-map/index.js';

// Categorizer (rule matching engine)
export { classifyTransaction, classifyAll, ruleMatches, rankRules, RuleIndex } from './categorizer/index.js';
export type { ClassificationStats, ClassificationOutput } from './categorizer/index.js';

// Candidates
export {
    buildPayeeMapCandidates,
    buildFingerprintGroups,
    preparePairHints,
    candidateStatus,
    topCounts,
} from './candidates/index.js';
export type { GroupablePair } from './candidates/index.js';

// Matcher (reconciliation pairing)
export { matchPairs } from './matcher/index.js';
export type { PairingResult, PairingStats } from './matcher/index.js';
