#!/usr/bin/env node
/**
 * Payee Mapper CLI
 *
 * The CLI owns all file I/O and console output; the core receives records
 * and returns results and warnings as data.
 */

import { Command } from 'commander';
import { ValidationError } from '@payee-mapper/core';
import { classifyFiles } from './commands/classify.js';
import { matchPairFiles } from './commands/pairs.js';
import { buildGroupsFile } from './commands/groups.js';
import { buildPayeeMap } from './commands/build-payee-map.js';
import { error, errorMessage } from './utils/console.js';
import type { BuildPayeeMapOptions, ClassifyOptions, GroupsOptions, PairsOptions } from './types.js';

function createProgram(): Command {
    const program = new Command();

    program
        .name('payee-map')
        .description('Classify bank and card transactions against a payee map and build rule candidates')
        .version('1.0.0');

    program
        .command('classify')
        .description('Append payee/category suggestions from the payee map to normalized records')
        .requiredOption('--in <files...>', 'normalized transaction files (CSV or XLSX)')
        .option('--map <file>', 'payee map (CSV, XLSX or YAML); defaults to the workspace payee map')
        .option('--out <file>', 'output CSV; defaults to outputs/classified.csv')
        .option('--workspace <dir>', 'workspace root')
        .action(async (options: ClassifyOptions) => {
            await classifyFiles(options);
        });

    program
        .command('pairs')
        .description('Join bank and card statements to budgeting register entries on account, date and amount')
        .requiredOption('--bank <files...>', 'normalized bank statement files')
        .requiredOption('--card <files...>', 'normalized card statement files')
        .requiredOption('--ynab <files...>', 'normalized register files')
        .option('--out <file>', 'output CSV; defaults to data/derived/matched_pairs.csv')
        .option('--workspace <dir>', 'workspace root')
        .action(async (options: PairsOptions) => {
            await matchPairFiles(options);
        });

    program
        .command('groups')
        .description('Group matched pairs by fingerprint for payee naming')
        .option('--pairs <file>', 'matched pairs CSV; defaults to data/derived/matched_pairs.csv')
        .option('--out <file>', 'output CSV; defaults to data/derived/fingerprint_groups.csv')
        .option('--workspace <dir>', 'workspace root')
        .action(async (options: GroupsOptions) => {
            await buildGroupsFile(options);
        });

    program
        .command('build-payee-map')
        .description('Classify inputs and write payee map candidates, a preview and a review workbook')
        .requiredOption('--in <files...>', 'normalized transaction files (CSV or XLSX)')
        .option('--pairs <files...>', 'matched pairs files for register payee/category hints')
        .option('--map <file>', 'payee map (CSV, XLSX or YAML); defaults to the workspace payee map')
        .option('--out-dir <dir>', 'output directory; defaults to outputs/')
        .option('--dry-run', 'run all steps without writing files', false)
        .option('--workspace <dir>', 'workspace root')
        .action(async (options: BuildPayeeMapOptions) => {
            await buildPayeeMap(options);
        });

    return program;
}

async function main(): Promise<void> {
    await createProgram().parseAsync(process.argv);
}

main().catch((err: unknown) => {
    if (err instanceof ValidationError) {
        error('Invalid payee map:');
        for (const issue of err.issues) {
            console.error(`  - ${issue}`);
        }
    } else {
        error(`Error: ${errorMessage(err)}`);
    }
    process.exit(1);
});
