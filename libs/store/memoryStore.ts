import type { AuditEvent, CommittedAuditEvent } from '../audit/schema.js';
import { GENESIS_HASH } from '../audit/schema.js';
import { assertAppendable, clampPageSize, matchesFilters } from './primaryStore.js';
import type { AppendResult, EventFilters, EventPage, Pagination, PrimaryStore } from './primaryStore.js';

/**
 * In-process primary store: one array per tenant, index = sequence.
 *
 * Each call runs to completion without awaiting, so the tip check and the
 * push in appendIfTipMatches cannot interleave with another writer.
 * Not durable; forbidden in production/staging by the config guards.
 */
export class MemoryAuditStore implements PrimaryStore {
    constructor(private readonly partitions: Map<string, AuditEvent[]> = new Map()) { }

    async getTip(tenantId: string): Promise<string> {
        const chain = this.partitions.get(tenantId);
        return chain?.[chain.length - 1]?.currentHash ?? GENESIS_HASH;
    }

    async appendIfTipMatches(tenantId: string, event: AuditEvent, expectedPreviousTip: string): Promise<AppendResult> {
        assertAppendable(tenantId, event, expectedPreviousTip);

        const chain = this.partitions.get(tenantId) ?? [];
        const currentTip = chain[chain.length - 1]?.currentHash ?? GENESIS_HASH;
        if (currentTip !== expectedPreviousTip) {
            return { status: 'conflict', currentTip };
        }

        chain.push(event);
        this.partitions.set(tenantId, chain);
        return { status: 'committed', sequence: chain.length - 1 };
    }

    async listEvents(tenantId: string, filters: EventFilters = {}, pagination: Pagination = {}): Promise<EventPage> {
        const limit = clampPageSize(pagination.limit);
        const after = pagination.afterSequence ?? -1;

        const matched = this.committed(tenantId)
            .filter(e => e.sequence > after && matchesFilters(e, filters));

        const events = matched.slice(0, limit);
        const last = events[events.length - 1];
        return {
            events,
            nextCursor: matched.length > limit && last ? last.sequence : null
        };
    }

    async readChain(tenantId: string, fromSequence: number, limit: number): Promise<readonly CommittedAuditEvent[]> {
        return this.committed(tenantId).slice(fromSequence, fromSequence + limit);
    }

    tenants(): string[] {
        return [...this.partitions.keys()];
    }

    private committed(tenantId: string): CommittedAuditEvent[] {
        return (this.partitions.get(tenantId) ?? []).map((event, sequence) => ({ ...event, sequence }));
    }
}
