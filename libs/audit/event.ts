import crypto from 'crypto';
import type { AuditEvent, AuditEventContent, AuditEventType, AuditActor, AuditPayload, AuditResource, DataClassification } from './schema.js';
import type { CorrelationContext } from '../correlation/context.js';
import { compareCodePoints } from './canonical.js';

export interface EventDraft {
    eventType: AuditEventType;
    context: CorrelationContext;
    actor: AuditActor;
    resource?: AuditResource;
    payload: AuditPayload;
    classification: DataClassification;
    complianceFlags: readonly string[];
}

/**
 * Compliance flags are a set: order and repetition carry no meaning.
 */
export function normalizeFlags(flags: readonly string[]): string[] {
    return [...new Set(flags)].sort(compareCodePoints);
}

/**
 * Assign identity and time once. Retries of the same submission reuse the
 * returned content, so eventId and timestamp never change after this point.
 */
export function draftContent(
    draft: EventDraft,
    clock: () => Date = () => new Date(),
    newId: () => string = () => crypto.randomUUID()
): AuditEventContent {
    const content: AuditEventContent = {
        eventId: newId(),
        timestamp: clock().toISOString(),
        eventType: draft.eventType,
        context: {
            tenantId: draft.context.tenantId,
            correlationId: draft.context.correlationId,
            spanId: draft.context.spanId
        },
        actor: { ...draft.actor },
        payload: draft.payload,
        classification: draft.classification,
        complianceFlags: normalizeFlags(draft.complianceFlags)
    };
    return draft.resource ? { ...content, resource: { ...draft.resource } } : content;
}

/**
 * Flat snake_case record sent to archival storage and SIEM platforms.
 */
export interface AuditWireRecord {
    event_id: string;
    timestamp: string;
    event_type: AuditEventType;
    tenant_id: string;
    correlation_id: string;
    span_id: string;
    user_id: string;
    user_type: string;
    user_role: string;
    user_department: string;
    resource_type: string | null;
    resource_id: string | null;
    data: AuditPayload;
    data_classification: DataClassification;
    compliance_flags: string[];
    previous_hash: string;
    current_hash: string;
}

export function toWireRecord(event: AuditEvent): AuditWireRecord {
    return {
        event_id: event.eventId,
        timestamp: event.timestamp,
        event_type: event.eventType,
        tenant_id: event.context.tenantId,
        correlation_id: event.context.correlationId,
        span_id: event.context.spanId,
        user_id: event.actor.id,
        user_type: event.actor.type,
        user_role: event.actor.role,
        user_department: event.actor.orgUnit,
        resource_type: event.resource?.type ?? null,
        resource_id: event.resource?.id ?? null,
        data: event.payload,
        data_classification: event.classification,
        compliance_flags: [...event.complianceFlags],
        previous_hash: event.previousHash,
        current_hash: event.currentHash
    };
}
