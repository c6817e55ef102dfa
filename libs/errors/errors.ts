/**
 * Audit trail error taxonomy.
 *
 * Synchronous failures of `submit` are ValidationError, ChainContinuityError
 * and PersistenceError. ArchivalError and DeliveryError only ever surface
 * inside the fan-out path. Tamper detection is not an error at all: the
 * verifier reports it as a structured result.
 */

export type AuditErrorCode =
    | 'VALIDATION_FAILED'
    | 'CHAIN_CONFLICT'
    | 'PERSISTENCE_FAILED'
    | 'ARCHIVAL_FAILED'
    | 'DELIVERY_FAILED'
    | 'CONFIG_INVALID';

export class AuditTrailError extends Error {
    readonly code: AuditErrorCode;
    readonly retryable: boolean;
    readonly details?: unknown;

    constructor(code: AuditErrorCode, message: string, options?: { retryable?: boolean; details?: unknown; cause?: unknown }) {
        super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
        this.name = 'AuditTrailError';
        this.code = code;
        this.retryable = options?.retryable ?? false;
        this.details = options?.details;
    }

    toJSON(): { code: AuditErrorCode; message: string; retryable: boolean; details?: unknown } {
        return {
            code: this.code,
            message: this.message,
            retryable: this.retryable,
            ...(this.details !== undefined && { details: this.details })
        };
    }
}

export interface ValidationIssue {
    readonly path: string;
    readonly message: string;
}

/** Malformed submission. Raised before any hashing or I/O. */
export class ValidationError extends AuditTrailError {
    readonly issues: readonly ValidationIssue[];

    constructor(message: string, issues: readonly ValidationIssue[] = []) {
        super('VALIDATION_FAILED', message, { details: { issues } });
        this.name = 'ValidationError';
        this.issues = issues;
    }
}

/** Another writer moved the tenant's tip between read and append. */
export class ChainContinuityError extends AuditTrailError {
    constructor(
        public readonly tenantId: string,
        public readonly expectedTip: string,
        public readonly attempts: number
    ) {
        super('CHAIN_CONFLICT', `Chain tip for tenant ${tenantId} moved during append after ${attempts} attempt(s)`, {
            retryable: true,
            details: { tenantId, expectedTip, attempts }
        });
        this.name = 'ChainContinuityError';
    }
}

/** The primary commit failed; the submission did not happen. */
export class PersistenceError extends AuditTrailError {
    constructor(message: string, cause?: unknown) {
        super('PERSISTENCE_FAILED', message, { cause });
        this.name = 'PersistenceError';
    }
}

export class ArchivalError extends AuditTrailError {
    constructor(message: string, cause?: unknown) {
        super('ARCHIVAL_FAILED', message, { retryable: true, cause });
        this.name = 'ArchivalError';
    }
}

export class DeliveryError extends AuditTrailError {
    constructor(
        message: string,
        public readonly platform: string,
        public readonly statusCode?: number,
        cause?: unknown
    ) {
        super('DELIVERY_FAILED', message, { retryable: true, cause, details: { platform, statusCode } });
        this.name = 'DeliveryError';
    }
}

export class ConfigurationError extends AuditTrailError {
    constructor(message: string, public readonly violations: readonly string[]) {
        super('CONFIG_INVALID', message, { details: { violations } });
        this.name = 'ConfigurationError';
    }
}

export function isAuditTrailError(error: unknown): error is AuditTrailError {
    return error instanceof AuditTrailError;
}
