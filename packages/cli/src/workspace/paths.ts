import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { Workspace } from '../types.js';
import { detectWorkspaceRoot, PAYEE_MAP_FILENAMES } from './detect.js';

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    const mappings = join(root, 'mappings');
    const existing = PAYEE_MAP_FILENAMES.map((name) => join(mappings, name)).find((path) => existsSync(path));

    return {
        root,
        raw: join(root, 'data', 'raw'),
        derived: join(root, 'data', 'derived'),
        outputs: join(root, 'outputs'),
        mappings,
        payeeMapPath: existing ?? join(mappings, PAYEE_MAP_FILENAMES[0]),
    };
}

/**
 * Workspace from an explicit --workspace flag, else detected from the cwd.
 */
export function findWorkspace(explicitRoot?: string): Workspace | null {
    const root = explicitRoot ? resolve(explicitRoot) : detectWorkspaceRoot();
    return root ? resolveWorkspace(root) : null;
}

/**
 * An explicit path wins; otherwise the path inside the workspace.
 * Throws when neither is available.
 */
export function resolvePath(
    explicit: string | undefined,
    workspace: Workspace | null,
    fromWorkspace: (workspace: Workspace) => string,
    what: string
): string {
    if (explicit) return explicit;
    if (workspace) return fromWorkspace(workspace);
    throw new Error(
        `No ${what} given and no workspace found. Pass it explicitly or run inside a directory with mappings/payee_map.csv.`
    );
}

export function getMatchedPairsPath(workspace: Workspace): string {
    return join(workspace.derived, 'matched_pairs.csv');
}

export function getFingerprintGroupsPath(workspace: Workspace): string {
    return join(workspace.derived, 'fingerprint_groups.csv');
}

export function getClassifiedPath(workspace: Workspace): string {
    return join(workspace.outputs, 'classified.csv');
}
