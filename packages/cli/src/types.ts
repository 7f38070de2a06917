/**
 * Payee Mapper CLI - Core Types
 */

export interface Workspace {
    root: string;
    raw: string;
    derived: string;
    outputs: string;
    mappings: string;
    payeeMapPath: string;
}

export interface WorkspaceOption {
    workspace?: string;
}

export interface ClassifyOptions extends WorkspaceOption {
    in: string[];
    map?: string;
    out?: string;
}

export interface PairsOptions extends WorkspaceOption {
    bank: string[];
    card: string[];
    ynab: string[];
    out?: string;
}

export interface GroupsOptions extends WorkspaceOption {
    pairs?: string;
    out?: string;
}

export interface BuildPayeeMapOptions extends WorkspaceOption {
    in: string[];
    pairs?: string[];
    map?: string;
    outDir?: string;
    dryRun?: boolean;
}
