import { z } from 'zod';
import type { CorrelationContext, CorrelationContextInit } from '../correlation/context.js';

/**
 * Canonical Audit Schema
 *
 * Objectives:
 * - Immutability (records are frozen once hashed)
 * - Non-repudiation (hash chain per tenant)
 * - Deterministic hashing across implementations (closed payload type)
 */

export const AuditEventTypeEnum = z.enum([
    'RAG_QUERY',
    'RAG_RETRIEVAL',
    'RAG_GENERATION',
    'ACCESS_CONTROL',
    'RESPONSE_DELIVERY',
    'DATA_ACCESS',
    'PII_DETECTION',
    'CONFIG_CHANGE',
    'INCIDENT',
    'ERROR',
    'SYSTEM'
]);

export type AuditEventType = z.infer<typeof AuditEventTypeEnum>;

export const DataClassificationEnum = z.enum([
    'PUBLIC',
    'INTERNAL',
    'CONFIDENTIAL',
    'RESTRICTED'
]);

export type DataClassification = z.infer<typeof DataClassificationEnum>;

/**
 * Payload values are restricted to what canonicalizes identically everywhere:
 * strings, safe integers, booleans and maps of the same. No floats, no null,
 * no arrays.
 */
export type CanonicalValue = string | number | boolean | CanonicalMap;

export interface CanonicalMap {
    readonly [key: string]: CanonicalValue;
}

export type AuditPayload = CanonicalMap;

export type ActorType = 'user' | 'service';

export interface AuditActor {
    readonly id: string;
    readonly type: ActorType;
    readonly role: string;
    /** Department or business unit */
    readonly orgUnit: string;
}

export interface AuditResource {
    readonly type: string;
    readonly id: string;
}

export interface AuditEvent {
    readonly eventId: string;
    /** ISO-8601, UTC, millisecond precision */
    readonly timestamp: string;
    readonly eventType: AuditEventType;
    readonly context: CorrelationContext;
    readonly actor: AuditActor;
    readonly resource?: AuditResource;
    readonly payload: AuditPayload;
    readonly classification: DataClassification;
    /** Sorted, de-duplicated regulatory tags */
    readonly complianceFlags: readonly string[];
    readonly previousHash: string;
    readonly currentHash: string;
}

/** An event as read back from the primary store, with its chain position. */
export interface CommittedAuditEvent extends AuditEvent {
    readonly sequence: number;
}

/** The event minus its chain fields: exactly what gets canonicalized. */
export type AuditEventContent = Omit<AuditEvent, 'previousHash' | 'currentHash'>;

export interface SubmitRequest {
    eventType: AuditEventType;
    /** Falls back to the active CorrelationScope when omitted */
    context?: CorrelationContextInit | CorrelationContext;
    actor: {
        id: string;
        type?: ActorType;
        role: string;
        orgUnit: string;
    };
    resource?: AuditResource;
    payload?: AuditPayload;
    classification?: DataClassification;
    complianceFlags?: readonly string[];
}

/** What collaborators get back from submit(). */
export interface SubmitReceipt {
    readonly eventId: string;
    readonly timestamp: string;
    readonly previousHash: string;
    readonly currentHash: string;
}

export const GENESIS_HASH = '0'.repeat(64);
