/**
 * This module defines custom error classes for the application.
 */
import z from 'zod';

/**
 * This error is thrown when the OPENAI_API_KEY environment variable is missing. Without it no model call can be made, so the run cannot start.
 */
export class MissingApiKeyError extends Error {
    constructor() {
        super('OPENAI_API_KEY environment variable not set');
        this.name = 'MissingApiKeyError';
    }
}

/**
 * This error is thrown when the resume file cannot be read or yields no text.
 */
export class ResumeParseError extends Error {
    constructor(filePath: string, detail?: string) {
        super(`Could not parse resume: ${filePath}${detail ? ` (${detail})` : ''}`);
        this.name = 'ResumeParseError';
    }
}

export class UnsupportedResumeFormatError extends ResumeParseError {
    constructor(filePath: string) {
        super(filePath, 'unsupported file type, expected .pdf, .docx or .txt');
        this.name = 'UnsupportedResumeFormatError';
    }
}

/**
 * This error is thrown when the language model could not produce a usable resume profile.
 */
export class ProfileExtractionError extends Error {
    constructor(detail: string) {
        super(`Failed to extract a resume profile: ${detail}`);
        this.name = 'ProfileExtractionError';
    }
}

/**
 * This error is thrown when the model reply is not JSON or does not conform to the schema of the call kind.
 */
export class InvalidModelOutputError extends Error {
    issues: string[];

    constructor(kind: string, issues: string[]) {
        super(`Model returned invalid output for ${kind}: ${issues.join('; ')}`);
        this.name = 'InvalidModelOutputError';
        this.issues = issues;
    }

    static fromZod(kind: string, error: z.ZodError): InvalidModelOutputError {
        return new InvalidModelOutputError(kind, error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`));
    }
}

export class CrawlError extends Error {
    constructor(board: string, query: string, cause: unknown) {
        super(`Crawl of ${board} failed for "${query}": ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
        this.name = 'CrawlError';
    }
}

export class ConfigError extends Error {
    constructor(error: z.ZodError) {
        super('Invalid configuration: ' + error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
        this.name = 'ConfigError';
    }
}

/**
 * This error is thrown when the target location does not name a city and a US state the location rules know.
 */
export class UnknownTargetAreaError extends Error {
    constructor(location: string) {
        super(`Cannot resolve target area from "${location}"; expected "City, State", e.g. "Seattle, Washington, United States"`);
        this.name = 'UnknownTargetAreaError';
    }
}
