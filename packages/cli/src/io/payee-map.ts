import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse } from 'yaml';
import { normalizePayeeMapRules, type PayeeRule } from '@payee-mapper/core';
import { readTable } from './table.js';

/**
 * Loads and validates the payee map from CSV, XLSX or YAML.
 *
 * YAML holds the same rows as the table, either as a top-level list or
 * under a "rules" key.
 *
 * @throws Error when the file is missing or malformed
 * @throws ValidationError when a row breaks the payee map rules
 */
export async function loadPayeeMap(path: string): Promise<PayeeRule[]> {
    if (!existsSync(path)) {
        throw new Error(`Payee map not found: ${path}`);
    }

    const ext = extname(path).toLowerCase();
    const rows = ext === '.yaml' || ext === '.yml' ? await readYamlRows(path) : await readTable(path);
    return normalizePayeeMapRules(rows);
}

async function readYamlRows(path: string): Promise<unknown[]> {
    const data: unknown = parse(await readFile(path, 'utf-8'));
    if (data === null || data === undefined) return [];
    if (Array.isArray(data)) return data;

    if (isRecord(data)) {
        const rules = data.rules;
        if (rules === null || rules === undefined) return [];
        if (Array.isArray(rules)) return rules;
    }

    throw new Error(`Invalid YAML structure in ${path}: expected a list of rules or a "rules" list.`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
