import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Wraps driver and SDK errors in a generic message with an incident id, so
 * raw SQL or stack details stay in the logs and out of caller-facing errors.
 */

export class SanitizedError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public readonly sqlState?: string;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        options?: { cause?: unknown; contextLabel?: string; sqlState?: string }
    ) {
        super(publicMessage, options?.cause !== undefined ? { cause: options.cause } : undefined);
        this.name = 'SanitizedError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.sqlState = options?.sqlState;

        // Full internal details are only ever written here, keyed by incident id
        logger.error({
            incidentId: this.incidentId,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a SanitizedError.
     */
    sanitize: (err: unknown, contextLabel: string): SanitizedError => {
        if (err instanceof SanitizedError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;
        let sqlState: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else if (err && typeof err === 'object' && 'message' in err) {
            if (typeof err.message === 'string') {
                originalErrorMessage = err.message;
            }
            if ('stack' in err && typeof err.stack === 'string') {
                originalErrorStack = err.stack;
            }
        } else {
            originalErrorMessage = String(err);
        }

        if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
            sqlState = err.code;
        }

        return new SanitizedError(
            `An internal audit storage error occurred. Reference: ${contextLabel}`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            { cause: err, contextLabel, sqlState }
        );
    }
};
