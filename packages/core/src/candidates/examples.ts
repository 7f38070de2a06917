import { CANDIDATES } from '../types/index.js';
import type { PreparedTransaction } from '../types/index.js';

/**
 * Display text for one transaction.
 * Merchant text is preferred; when it differs from the example text the
 * longer of the two wins.
 */
export function rowExample(txn: Pick<PreparedTransaction, 'merchant_raw' | 'example_text'>): string {
    const merchant = txn.merchant_raw.trim();
    const example = txn.example_text.trim();

    if (merchant !== '' && example !== '' && merchant !== example) {
        return example.length > merchant.length ? example : merchant;
    }
    return merchant || example;
}

export function truncate(text: string, maxLength: number = CANDIDATES.EXAMPLE_MAX_LENGTH): string {
    return text.length > maxLength ? text.slice(0, maxLength) : text;
}

/**
 * Up to MAX_EXAMPLES distinct, bounded examples, in first-occurrence order.
 */
export function pickExamples(
    transactions: ReadonlyArray<Pick<PreparedTransaction, 'merchant_raw' | 'example_text'>>
): string[] {
    const examples: string[] = [];
    for (const txn of transactions) {
        const example = truncate(rowExample(txn));
        if (example === '' || examples.includes(example)) continue;
        examples.push(example);
        if (examples.length === CANDIDATES.MAX_EXAMPLES) break;
    }
    return examples;
}
