/**
 * Fingerprints: short comparable keys derived from noisy descriptions.
 *
 * The v1 hash is SHA-1 so existing payee maps keep matching; changing the
 * algorithm or the payload invalidates every pinned fingerprint_hash.
 */

import { sha1 } from 'js-sha1';
import { FINGERPRINT } from '../types/index.js';
import { normalizeText } from './normalize.js';

const STANDALONE_NUMBER = /^\p{Nd}+$/u;

/**
 * Lossy, human-scannable fingerprint.
 *
 * Normalizes the text, drops every all-digit token (till numbers, branch
 * numbers) and keeps the first 6 tokens. Not collision-free.
 *
 * @example fingerprintV0('SUPERSAL 1234567 Tel Aviv 23') // 'supersal tel aviv'
 */
export function fingerprintV0(value: unknown): string {
    return normalizeText(value)
        .split(' ')
        .filter((token) => token !== '' && !STANDALONE_NUMBER.test(token))
        .slice(0, FINGERPRINT.V0_MAX_TOKENS)
        .join(' ');
}

/**
 * Stable join key for rules and candidate groups.
 *
 * Payload format: "{kind}\n{normalized description}", SHA-1, hex,
 * truncated to `length` characters. Kind is part of the key, so the same
 * description under two kinds never collides.
 *
 * @param kind - Transaction kind (case-insensitive)
 * @param description - Description text; normalized before hashing
 * @param length - Hex characters to keep
 */
export function fingerprintHashV1(
    kind: unknown,
    description: unknown,
    length: number = FINGERPRINT.HASH_LENGTH
): string {
    const normalizedKind = kind === null || kind === undefined ? '' : String(kind).trim().toLowerCase();
    const payload = `${normalizedKind}\n${normalizeText(description)}`;
    return sha1(payload).slice(0, length);
}
