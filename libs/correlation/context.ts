import crypto from 'crypto';

/**
 * Multi-tenant correlation context.
 *
 * - tenantId: partition key of the audit chain (business unit, department)
 * - correlationId: one external request
 * - spanId: one operation within that request
 *
 * Contexts are frozen value objects. A child span keeps tenant and
 * correlation identity and only gets a fresh spanId.
 */
export interface CorrelationContext {
    readonly tenantId: string;
    readonly correlationId: string;
    readonly spanId: string;
}

export interface CorrelationContextInit {
    tenantId: string;
    correlationId?: string;
    spanId?: string;
}

function shortHex(length: number): string {
    return crypto.randomBytes(Math.ceil(length / 2)).toString('hex').slice(0, length);
}

export function generateCorrelationId(): string {
    return `req-${shortHex(12)}`;
}

export function generateSpanId(prefix = 'span'): string {
    return `${prefix}-${shortHex(8)}`;
}

export function createCorrelationContext(init: CorrelationContextInit): CorrelationContext {
    return Object.freeze({
        tenantId: init.tenantId,
        correlationId: init.correlationId ?? generateCorrelationId(),
        spanId: init.spanId ?? generateSpanId()
    });
}

/**
 * Derive a span for a nested operation (e.g. 'retrieval', 'generation').
 */
export function createChildSpan(parent: CorrelationContext, operation: string): CorrelationContext {
    const prefix = operation.trim() === '' ? 'span' : operation.trim();
    return Object.freeze({
        tenantId: parent.tenantId,
        correlationId: parent.correlationId,
        spanId: generateSpanId(prefix)
    });
}
