/**
 * Error classes shared by the prober.
 */

import type { TransportErrorKind } from '../types';

export class ProberError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

/** The word list could not be read. Fatal before any probe is issued. */
export class GenerationError extends ProberError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'GENERATION_ERROR', { ...context, fatal: true });
    }
}

export class TransportError extends ProberError {
    constructor(message: string, public kind: TransportErrorKind, context?: Record<string, unknown>) {
        super(message, 'TRANSPORT_ERROR', { ...context, kind });
    }
}

/** A store could not be written. The run must stop rather than keep probing. */
export class PersistenceError extends ProberError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'PERSISTENCE_ERROR', { ...context, fatal: true });
    }
}

export class ConfigurationError extends ProberError {
    constructor(message: string, public issues: string[] = []) {
        super(message, 'CONFIG_ERROR', { fatal: true, issues });
    }
}

export const isFatal = (error: unknown): error is ProberError =>
    error instanceof GenerationError || error instanceof PersistenceError || error instanceof ConfigurationError;

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
