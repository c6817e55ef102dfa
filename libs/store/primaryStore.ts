import type { AuditEvent, AuditEventType, CommittedAuditEvent } from '../audit/schema.js';

export type AppendResult =
    | { readonly status: 'committed'; readonly sequence: number }
    | { readonly status: 'conflict'; readonly currentTip: string };

export interface EventFilters {
    correlationId?: string;
    actorId?: string;
    eventType?: AuditEventType;
    /** ISO-8601, inclusive */
    from?: string;
    /** ISO-8601, exclusive */
    to?: string;
}

export interface Pagination {
    /** Cursor: return events with sequence strictly greater than this */
    afterSequence?: number;
    limit?: number;
}

export interface EventPage {
    readonly events: readonly CommittedAuditEvent[];
    /** Pass back as afterSequence for the next page; null when exhausted */
    readonly nextCursor: number | null;
}

export const DEFAULT_PAGE_SIZE = 100;
export const MAX_PAGE_SIZE = 1000;

/**
 * Authoritative, insert-only, per-tenant ordered store.
 *
 * appendIfTipMatches is the serialization point of the whole subsystem: the
 * tip check and the insert are one atomic step, so two writers racing on the
 * same tip get exactly one 'committed' and one 'conflict'.
 */
export interface PrimaryStore {
    /** Current chain tip for the tenant, or GENESIS_HASH when it has no events. */
    getTip(tenantId: string): Promise<string>;

    appendIfTipMatches(tenantId: string, event: AuditEvent, expectedPreviousTip: string): Promise<AppendResult>;

    listEvents(tenantId: string, filters?: EventFilters, pagination?: Pagination): Promise<EventPage>;

    /** Raw chain order from fromSequence, for verification. No filtering. */
    readChain(tenantId: string, fromSequence: number, limit: number): Promise<readonly CommittedAuditEvent[]>;
}

export function clampPageSize(limit: number | undefined): number {
    if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_PAGE_SIZE;
    return Math.min(Math.max(Math.trunc(limit), 1), MAX_PAGE_SIZE);
}

export function assertAppendable(tenantId: string, event: AuditEvent, expectedPreviousTip: string): void {
    if (event.context.tenantId !== tenantId) {
        throw new Error(`Event ${event.eventId} belongs to tenant ${event.context.tenantId}, not ${tenantId}`);
    }
    if (event.previousHash !== expectedPreviousTip) {
        throw new Error(`Event ${event.eventId} is linked to ${event.previousHash}, not the expected tip ${expectedPreviousTip}`);
    }
}

export function matchesFilters(event: AuditEvent, filters: EventFilters): boolean {
    if (filters.correlationId !== undefined && event.context.correlationId !== filters.correlationId) return false;
    if (filters.actorId !== undefined && event.actor.id !== filters.actorId) return false;
    if (filters.eventType !== undefined && event.eventType !== filters.eventType) return false;
    const at = Date.parse(event.timestamp);
    if (filters.from !== undefined && at < Date.parse(filters.from)) return false;
    if (filters.to !== undefined && at >= Date.parse(filters.to)) return false;
    return true;
}
