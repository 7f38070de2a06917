/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
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
    RuleKeyColumn,
} from '@payee-mapper/shared';

export {
    PayeeMapRowSchema,
    DEFAULT_CURRENCY,
    RULE_ID_SEPARATOR,
    FINGERPRINT,
    CANDIDATES,
    BOOLEAN_VOCABULARY,
    PAYEE_MAP_COLUMNS,
    RULE_KEY_COLUMNS,
    ValidationError,
} from '@payee-mapper/shared';
