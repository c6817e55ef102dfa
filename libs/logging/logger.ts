import pino from 'pino';
import type { CorrelationContext } from '../correlation/context.js';

import { REDACT_KEYS, REDACT_CENSOR } from './redactionConfig.js';

export const logger = pino({
    level: process.env.LOG_LEVEL ?? 'info',
    base: {
        system: 'audit-chain'
    },
    redact: {
        paths: REDACT_KEYS,
        censor: REDACT_CENSOR
    }
});

/**
 * Returns a child logger with correlation context attached.
 */
export function getCorrelationLogger(context: CorrelationContext) {
    return logger.child({
        tenantId: context.tenantId,
        correlationId: context.correlationId,
        spanId: context.spanId
    });
}

/**
 * Named logger for detached components, sharing the root level and redaction.
 */
export function getComponentLogger(name: string) {
    return logger.child({ component: name });
}
