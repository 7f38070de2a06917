// Schemas
export {
    RawRecordSchema,
    PreparedTransactionSchema,
    PayeeMapRowSchema,
    PayeeRuleSchema,
    MatchStatusSchema,
    ClassificationResultSchema,
    CandidateStatusSchema,
    CandidateGroupSchema,
    PairHintSchema,
    PairSourceSchema,
    MatchedPairSchema,
    FingerprintGroupSchema,
} from './schemas.js';

// Types
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
} from './schemas.js';

// Constants
export {
    DEFAULT_CURRENCY,
    RULE_ID_SEPARATOR,
    FINGERPRINT,
    CANDIDATES,
    BOOLEAN_VOCABULARY,
    PAYEE_MAP_COLUMNS,
    RULE_KEY_COLUMNS,
    CLASSIFICATION_COLUMNS,
    CANDIDATE_COLUMNS,
    MATCHED_PAIR_COLUMNS,
    FINGERPRINT_GROUP_COLUMNS,
} from './constants.js';
export type { PayeeMapColumn, RuleKeyColumn } from './constants.js';

// Errors
export { ValidationError } from './errors.js';
