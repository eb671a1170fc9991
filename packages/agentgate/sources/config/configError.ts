/**
 * Raised when startup configuration is missing or invalid.
 */
export class ConfigError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}\n${issues.map((issue) => `- ${issue}`).join("\n")}` : message);
        this.name = "ConfigError";
        this.issues = issues;
    }
}
