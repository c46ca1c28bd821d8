/**
 * @fileoverview Error raised when a rule document or resolver setting is invalid
 * @module core/ConfigurationError
 */

import type { ZodIssue } from 'zod';

export class ConfigurationError extends Error {
    readonly issues: string[];

    constructor(source: string, issues: string[]) {
        super(`[${source}] Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigurationError';
        this.issues = issues;
    }

    /**
     * Build from zod issues, one "path: message" entry per issue
     */
    static fromZod(source: string, issues: readonly ZodIssue[]): ConfigurationError {
        return new ConfigurationError(
            source,
            issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        );
    }
}
