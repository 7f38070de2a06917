/**
 * Free-text canonicalization for comparison keys.
 *
 * Word characters follow the Unicode definition (letters, numbers, underscore),
 * so Hebrew descriptions keep their letters.
 */

const NON_WORD = /[^\p{L}\p{N}_\s]/gu;
const LONG_DIGIT_RUN = /\p{Nd}{4,}/gu;
const WHITESPACE = /\s+/g;

/**
 * Normalize text for matching.
 *
 * Transformations:
 * - Convert to lowercase
 * - Replace punctuation and symbols with space
 * - Replace runs of 4+ digits with space (card, account and reference numbers)
 * - Collapse multiple whitespace to single space
 * - Trim leading/trailing whitespace
 *
 * Total and idempotent. null/undefined normalize to "".
 */
export function normalizeText(value: unknown): string {
    if (value === null || value === undefined) return '';

    return String(value)
        .toLowerCase()
        .replace(NON_WORD, ' ')
        .replace(LONG_DIGIT_RUN, ' ')
        .replace(WHITESPACE, ' ')
        .trim();
}
