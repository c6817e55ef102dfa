import type { AuditEvent, AuditEventContent, SubmitRequest } from '../../libs/audit/schema.js';
import { GENESIS_HASH } from '../../libs/audit/schema.js';
import { sealEvent } from '../../libs/audit/hashChain.js';
import { createCorrelationContext } from '../../libs/correlation/context.js';
import type { CorrelationContext } from '../../libs/correlation/context.js';

export const T0 = '2026-03-01T12:00:00.000Z';

export function contextFor(tenantId: string, n = 1): CorrelationContext {
    return createCorrelationContext({
        tenantId,
        correlationId: `req-${String(n).padStart(12, '0')}`,
        spanId: `span-${String(n).padStart(8, '0')}`
    });
}

/**
 * Clock that advances by stepMs on every read, starting at T0.
 */
export function steppingClock(start: string = T0, stepMs = 1000): () => Date {
    let next = Date.parse(start);
    return () => {
        const now = new Date(next);
        next += stepMs;
        return now;
    };
}

export function sequentialIds(): () => string {
    let n = 0;
    return () => {
        n += 1;
        return `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`;
    };
}

export function sampleRequest(overrides: Partial<SubmitRequest> = {}): SubmitRequest {
    return {
        eventType: 'DATA_ACCESS',
        context: { tenantId: 'tenant-a', correlationId: 'req-000000000001', spanId: 'span-00000001' },
        actor: { id: 'analyst-7', role: 'analyst', orgUnit: 'finance' },
        payload: { query: 'quarterly revenue', documents: 3 },
        classification: 'CONFIDENTIAL',
        complianceFlags: ['SOX_RELEVANT'],
        ...overrides
    };
}

export function sampleContent(tenantId: string, n: number, overrides: Partial<AuditEventContent> = {}): AuditEventContent {
    return {
        eventId: `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`,
        timestamp: new Date(Date.parse(T0) + n * 1000).toISOString(),
        eventType: 'RAG_QUERY',
        context: contextFor(tenantId, n),
        actor: { id: `user-${n}`, type: 'user', role: 'analyst', orgUnit: 'finance' },
        payload: { step: n, note: `event ${n}` },
        classification: 'INTERNAL',
        complianceFlags: [],
        ...overrides
    };
}

/**
 * A correctly linked chain of n events for one tenant.
 */
export function buildChain(tenantId: string, n: number): AuditEvent[] {
    const events: AuditEvent[] = [];
    let previous = GENESIS_HASH;
    for (let i = 0; i < n; i++) {
        const event = sealEvent(sampleContent(tenantId, i), previous);
        events.push(event);
        previous = event.currentHash;
    }
    return events;
}
