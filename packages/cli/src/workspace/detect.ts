import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

/**
 * Payee map file names, in lookup order. CSV is the canonical table.
 */
export const PAYEE_MAP_FILENAMES = ['payee_map.csv', 'payee_map.yaml', 'payee_map.yml'] as const;

/**
 * Searches for the workspace root by looking for a payee map under 'mappings/'.
 * Starts at startPath and bubbles up to the root.
 */
export function detectWorkspaceRoot(startPath: string = process.cwd()): string | null {
    let current = resolve(startPath);
    while (true) {
        const found = PAYEE_MAP_FILENAMES.some((name) => existsSync(join(current, 'mappings', name)));
        if (found) {
            return current;
        }
        const parent = dirname(current);
        if (parent === current) {
            break;
        }
        current = parent;
    }
    return null;
}
