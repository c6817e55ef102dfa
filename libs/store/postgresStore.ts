import fs from 'fs/promises';
import type { AuditDatabase } from '../db/index.js';
import type { DbRole } from '../db/roles.js';
import { isImmutabilityViolation, isSerializationFailure, isUniqueViolation } from '../db/errors.js';
import { PersistenceError } from '../errors/errors.js';
import { getComponentLogger } from '../logging/logger.js';
import type {
    ActorType,
    AuditEvent,
    AuditEventType,
    AuditPayload,
    CommittedAuditEvent,
    DataClassification
} from '../audit/schema.js';
import { GENESIS_HASH } from '../audit/schema.js';
import { assertAppendable, clampPageSize } from './primaryStore.js';
import type { AppendResult, EventFilters, EventPage, Pagination, PrimaryStore } from './primaryStore.js';

const logger = getComponentLogger('PostgresAuditStore');

export const SCHEMA_FILE = new URL('../../sql/001_audit_events.sql', import.meta.url);

interface AuditEventRow {
    tenant_id: string;
    sequence: string;
    event_id: string;
    event_timestamp: string;
    event_type: AuditEventType;
    correlation_id: string;
    span_id: string;
    actor_id: string;
    actor_type: ActorType;
    actor_role: string;
    actor_org_unit: string;
    resource_type: string | null;
    resource_id: string | null;
    payload: AuditPayload;
    classification: DataClassification;
    compliance_flags: string[];
    previous_hash: string;
    current_hash: string;
}

const EVENT_COLUMNS = `
    tenant_id, sequence, event_id, event_timestamp, event_type,
    correlation_id, span_id, actor_id, actor_type, actor_role, actor_org_unit,
    resource_type, resource_id, payload, classification, compliance_flags,
    previous_hash, current_hash`;

export function rowToEvent(row: AuditEventRow): CommittedAuditEvent {
    const event: CommittedAuditEvent = {
        sequence: Number(row.sequence),
        eventId: row.event_id,
        timestamp: row.event_timestamp,
        eventType: row.event_type,
        context: {
            tenantId: row.tenant_id,
            correlationId: row.correlation_id,
            spanId: row.span_id
        },
        actor: {
            id: row.actor_id,
            type: row.actor_type,
            role: row.actor_role,
            orgUnit: row.actor_org_unit
        },
        payload: row.payload,
        classification: row.classification,
        complianceFlags: row.compliance_flags,
        previousHash: row.previous_hash,
        currentHash: row.current_hash
    };
    return row.resource_type !== null && row.resource_id !== null
        ? { ...event, resource: { type: row.resource_type, id: row.resource_id } }
        : event;
}

/**
 * PostgreSQL primary store.
 *
 * Appends take a transaction-scoped advisory lock on the tenant, re-read the
 * tip and insert at tip+1 only when it still equals the expected hash. The
 * UNIQUE (tenant_id, previous_hash) constraint backs this up for writers that
 * bypass the lock. UPDATE, DELETE and TRUNCATE are rejected by trigger.
 */
export class PostgresAuditStore implements PrimaryStore {
    constructor(
        private readonly db: AuditDatabase,
        private readonly writerRole: DbRole = 'audit_writer',
        private readonly readerRole: DbRole = 'audit_reader'
    ) { }

    async createSchema(schemaFile: URL = SCHEMA_FILE): Promise<void> {
        const sql = await fs.readFile(schemaFile, 'utf8');
        await this.db.executeAsOwner(sql);
        logger.info('Audit events schema applied');
    }

    async getTip(tenantId: string): Promise<string> {
        try {
            const result = await this.db.queryAsRole<{ current_hash: string }>(
                this.writerRole,
                `SELECT current_hash
                 FROM audit_events
                 WHERE tenant_id = $1
                 ORDER BY sequence DESC
                 LIMIT 1`,
                [tenantId]
            );
            return result.rows[0]?.current_hash ?? GENESIS_HASH;
        } catch (error) {
            logger.error({ tenantId }, 'Failed to read chain tip');
            throw new PersistenceError('Audit substrate unavailable: chain tip could not be read', error);
        }
    }

    async appendIfTipMatches(tenantId: string, event: AuditEvent, expectedPreviousTip: string): Promise<AppendResult> {
        assertAppendable(tenantId, event, expectedPreviousTip);

        try {
            return await this.db.transactionAsRole(this.writerRole, async (tx): Promise<AppendResult> => {
                await tx.query('SELECT pg_advisory_xact_lock(hashtextextended($1, 0))', [tenantId]);

                const tip = await tx.query<{ sequence: string; current_hash: string }>(
                    `SELECT sequence, current_hash
                     FROM audit_events
                     WHERE tenant_id = $1
                     ORDER BY sequence DESC
                     LIMIT 1`,
                    [tenantId]
                );

                const row = tip.rows[0];
                const currentTip = row?.current_hash ?? GENESIS_HASH;
                if (currentTip !== expectedPreviousTip) {
                    return { status: 'conflict', currentTip };
                }

                const sequence = row ? Number(row.sequence) + 1 : 0;
                await tx.query(
                    `INSERT INTO audit_events (${EVENT_COLUMNS}, occurred_at)
                     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19)`,
                    [
                        tenantId,
                        sequence,
                        event.eventId,
                        event.timestamp,
                        event.eventType,
                        event.context.correlationId,
                        event.context.spanId,
                        event.actor.id,
                        event.actor.type,
                        event.actor.role,
                        event.actor.orgUnit,
                        event.resource?.type ?? null,
                        event.resource?.id ?? null,
                        JSON.stringify(event.payload),
                        event.classification,
                        [...event.complianceFlags],
                        event.previousHash,
                        event.currentHash,
                        event.timestamp
                    ]
                );

                return { status: 'committed', sequence };
            });
        } catch (error) {
            if (isUniqueViolation(error) || isSerializationFailure(error)) {
                const currentTip = await this.getTip(tenantId);
                logger.warn({ tenantId, eventId: event.eventId }, 'Chain tip taken by a concurrent writer');
                return { status: 'conflict', currentTip };
            }
            if (isImmutabilityViolation(error)) {
                logger.error({ tenantId, eventId: event.eventId }, 'Append-only trigger rejected the write');
                throw new PersistenceError('Audit events are append-only', error);
            }
            logger.error({ tenantId, eventId: event.eventId }, 'Audit event commit failed');
            throw new PersistenceError('Audit event could not be committed', error);
        }
    }

    async listEvents(tenantId: string, filters: EventFilters = {}, pagination: Pagination = {}): Promise<EventPage> {
        const limit = clampPageSize(pagination.limit);
        const conditions = ['tenant_id = $1', 'sequence > $2'];
        const params: unknown[] = [tenantId, pagination.afterSequence ?? -1];

        const bind = (clause: (placeholder: string) => string, value: unknown) => {
            params.push(value);
            conditions.push(clause(`$${params.length}`));
        };

        if (filters.correlationId !== undefined) bind(p => `correlation_id = ${p}`, filters.correlationId);
        if (filters.actorId !== undefined) bind(p => `actor_id = ${p}`, filters.actorId);
        if (filters.eventType !== undefined) bind(p => `event_type = ${p}`, filters.eventType);
        if (filters.from !== undefined) bind(p => `occurred_at >= ${p}`, filters.from);
        if (filters.to !== undefined) bind(p => `occurred_at < ${p}`, filters.to);

        params.push(limit + 1);
        const result = await this.readRows(
            `SELECT ${EVENT_COLUMNS}
             FROM audit_events
             WHERE ${conditions.join(' AND ')}
             ORDER BY sequence ASC
             LIMIT $${params.length}`,
            params
        );

        const events = result.slice(0, limit).map(rowToEvent);
        const last = events[events.length - 1];
        return {
            events,
            nextCursor: result.length > limit && last ? last.sequence : null
        };
    }

    async readChain(tenantId: string, fromSequence: number, limit: number): Promise<readonly CommittedAuditEvent[]> {
        const rows = await this.readRows(
            `SELECT ${EVENT_COLUMNS}
             FROM audit_events
             WHERE tenant_id = $1 AND sequence >= $2
             ORDER BY sequence ASC
             LIMIT $3`,
            [tenantId, fromSequence, limit]
        );
        return rows.map(rowToEvent);
    }

    private async readRows(text: string, params: unknown[]): Promise<AuditEventRow[]> {
        try {
            const result = await this.db.queryAsRole<AuditEventRow>(this.readerRole, text, params);
            return result.rows;
        } catch (error) {
            throw new PersistenceError('Audit events could not be read', error);
        }
    }
}
