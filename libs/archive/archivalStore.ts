import type { AuditEvent } from '../audit/schema.js';
import type { ObjectLockMode } from '../config/auditConfig.js';
import { toWireRecord } from '../audit/event.js';

export const DEFAULT_RETENTION_DAYS = 2555;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ArchiveReceipt {
    /** 'duplicate' means an object already exists under the key; nothing was written */
    readonly status: 'archived' | 'duplicate';
    readonly key: string;
    readonly retainUntil: string;
}

/**
 * Write-once, retention-locked copy of committed events.
 */
export interface ArchivalStore {
    archive(event: AuditEvent): Promise<ArchiveReceipt>;
}

export interface RetentionPolicy {
    readonly retentionDays: number;
    readonly lockMode: ObjectLockMode;
}

/**
 * tenant/yyyy/mm/dd/eventId.json, dated by the event timestamp in UTC.
 */
export function archiveKey(event: AuditEvent): string {
    const at = new Date(event.timestamp);
    const yyyy = String(at.getUTCFullYear()).padStart(4, '0');
    const mm = String(at.getUTCMonth() + 1).padStart(2, '0');
    const dd = String(at.getUTCDate()).padStart(2, '0');
    return `${encodeURIComponent(event.context.tenantId)}/${yyyy}/${mm}/${dd}/${event.eventId}.json`;
}

/**
 * Retention runs from the event's own timestamp, so re-archiving later never
 * extends or shortens the lock.
 */
export function retainUntil(event: AuditEvent, retentionDays: number): Date {
    return new Date(Date.parse(event.timestamp) + retentionDays * DAY_MS);
}

export function archiveBody(event: AuditEvent): string {
    return JSON.stringify(toWireRecord(event));
}
