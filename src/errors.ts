import { FailureReason } from './types.js';

/**
 * A failure scoped to a single query. The coordinator records it as that
 * query's status and keeps the rest of the batch running.
 */
export class SearchFailure extends Error {
    public readonly reason: FailureReason;

    constructor(reason: FailureReason, message: string) {
        super(message);
        this.name = 'SearchFailure';
        this.reason = reason;
    }
}

export class TimeoutError extends SearchFailure {
    constructor(message: string) {
        super('Timeout', message);
        this.name = 'TimeoutError';
    }
}

export class NetworkError extends SearchFailure {
    constructor(message: string) {
        super('NetworkError', message);
        this.name = 'NetworkError';
    }
}

export class ParseError extends SearchFailure {
    constructor(message: string) {
        super('ParseError', message);
        this.name = 'ParseError';
    }
}

export class AuthExpiredError extends SearchFailure {
    constructor(message: string) {
        super('AuthExpired', message);
        this.name = 'AuthExpiredError';
    }
}

export class CancelledError extends SearchFailure {
    constructor(message = 'Search cancelled before it started') {
        super('Cancelled', message);
        this.name = 'CancelledError';
    }
}

/** Fatal to a whole run; raised before any query has started. */
export class RunError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'RunError';
    }
}

export class InvalidBatchError extends RunError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidBatchError';
    }
}

export class ExportError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ExportError';
    }
}

export class ConfigError extends Error {
    public readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error occurred';
}
