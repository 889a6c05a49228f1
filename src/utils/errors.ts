/**
 * 🚨 ERROR HANDLING UTILITIES
 * Standardized error classes for the application.
 */

import { FetchFailure } from '../types';

export class AppError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class FetchError extends AppError {
    constructor(public failure: FetchFailure) {
        super(`Fetch failed (${failure.kind}) for ${failure.url}: ${failure.detail}`, 'FETCH_ERROR', {
            kind: failure.kind,
            status: failure.status,
        });
    }
}

export class OracleError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'ORACLE_ERROR', context);
    }
}

export class ConfigurationError extends AppError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR', { fatal: true });
    }
}

export class ValidationError extends AppError {
    constructor(message: string) {
        super(message, 'VALIDATION_ERROR', { fatal: false });
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
