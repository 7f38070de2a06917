/**
 * Raised when a payee map table is structurally invalid.
 * Fatal: callers abort before any matching runs.
 */
export class ValidationError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid payee map: ${issues.join('; ')}`);
        this.name = 'ValidationError';
        this.issues = issues;
    }
}
