import type { AuditEvent } from '../audit/schema.js';
import type { ObjectLockMode } from '../config/auditConfig.js';
import { ArchivalError } from '../errors/errors.js';
import { archiveBody, archiveKey, DEFAULT_RETENTION_DAYS, retainUntil } from './archivalStore.js';
import type { ArchivalStore, ArchiveReceipt, RetentionPolicy } from './archivalStore.js';

export interface ArchivedObject {
    readonly key: string;
    readonly body: string;
    readonly lockMode: ObjectLockMode;
    readonly retainUntil: Date;
}

/**
 * In-process write-once archive with the same retention semantics as the S3
 * Object Lock store. Used for local runs and tests.
 */
export class MemoryArchivalStore implements ArchivalStore {
    private readonly objects = new Map<string, ArchivedObject>();

    constructor(
        private readonly policy: RetentionPolicy = { retentionDays: DEFAULT_RETENTION_DAYS, lockMode: 'COMPLIANCE' },
        private readonly clock: () => Date = () => new Date()
    ) { }

    async archive(event: AuditEvent): Promise<ArchiveReceipt> {
        const key = archiveKey(event);
        const existing = this.objects.get(key);
        if (existing) {
            return { status: 'duplicate', key, retainUntil: existing.retainUntil.toISOString() };
        }

        const until = retainUntil(event, this.policy.retentionDays);
        this.objects.set(key, Object.freeze({
            key,
            body: archiveBody(event),
            lockMode: this.policy.lockMode,
            retainUntil: until
        }));
        return { status: 'archived', key, retainUntil: until.toISOString() };
    }

    get(key: string): ArchivedObject | undefined {
        return this.objects.get(key);
    }

    keys(): string[] {
        return [...this.objects.keys()];
    }

    /**
     * Refused while the retention lock is active.
     */
    async delete(key: string): Promise<void> {
        const object = this.objects.get(key);
        if (!object) return;
        if (this.clock().getTime() < object.retainUntil.getTime()) {
            throw new ArchivalError(`Object ${key} is retention-locked until ${object.retainUntil.toISOString()}`);
        }
        this.objects.delete(key);
    }
}
