/**
 * Standardized error classes for the application.
 * The scoring engine itself never throws; these cover the I/O boundary.
 */

export class LeadEngineError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class FetchError extends LeadEngineError {
    constructor(message: string, public url: string, public status: number = 0) {
        super(message, 'FETCH_ERROR', { url, status });
    }
}

export class ConfigurationError extends LeadEngineError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR', { fatal: true });
    }
}

export class InputError extends LeadEngineError {
    constructor(message: string, line?: number) {
        super(message, 'INPUT_ERROR', { line });
    }
}

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
