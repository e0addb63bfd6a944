/** Request rejected before scoring. */
export class ValidationError extends Error {
    readonly code = "VALIDATION_ERROR";
    readonly issues: readonly string[];

    constructor(issues: string[]) {
        super(`Invalid assessment request: ${issues.join("; ")}`);
        this.name = "ValidationError";
        this.issues = Object.freeze([...issues]);
    }
}
