import { findWorkspace, resolvePath } from '../workspace/paths.js';
import { runPipeline } from '../pipeline/runner.js';
import type { PipelineState } from '../pipeline/types.js';
import { log, success, warn, arrow, error } from '../utils/console.js';
import type { BuildPayeeMapOptions } from '../types.js';

/**
 * Runs the payee map pipeline and reports the outcome.
 *
 * @returns The final pipeline state
 * @throws Error when any step failed fatally
 */
export async function buildPayeeMap(options: BuildPayeeMapOptions): Promise<PipelineState> {
    log('\nPayee Mapper - Building payee map candidates');

    const workspace = findWorkspace(options.workspace);
    if (workspace) {
        success(`Workspace: ${workspace.root}`);
    }
    const mapPath = resolvePath(options.map, workspace, w => w.payeeMapPath, 'payee map (--map)');
    const outDir = resolvePath(options.outDir, workspace, w => w.outputs, 'output directory (--out-dir)');

    const state = await runPipeline(workspace, options, { mapPath, outDir });

    log('\n--- Processing Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            error(`ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            throw new Error('Processing failed with fatal errors.');
        }
    }

    arrow(`Total transactions: ${state.transactions.length}`);
    arrow(`Candidate groups: ${state.candidates.length}`);

    if (options.dryRun) {
        log('\n[DRY RUN] No files were written.');
    } else {
        for (const file of state.writtenFiles) {
            success(`Wrote ${file}`);
        }
    }

    return state;
}
