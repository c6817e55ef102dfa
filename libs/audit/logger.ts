import crypto from 'crypto';
import type { AuditEvent, AuditEventContent, SubmitReceipt, SubmitRequest } from './schema.js';
import { canonicalizePayload } from './canonical.js';
import { draftContent } from './event.js';
import { sealEvent } from './hashChain.js';
import { createCorrelationContext } from '../correlation/context.js';
import { CorrelationScope } from '../correlation/scope.js';
import { KeyedMutex } from '../concurrency/keyedMutex.js';
import { ChainContinuityError, ConfigurationError, PersistenceError } from '../errors/errors.js';
import type { FanoutDispatcher } from '../fanout/FanoutDispatcher.js';
import { getCorrelationLogger } from '../logging/logger.js';
import type { AppendResult, PrimaryStore } from '../store/primaryStore.js';
import { SubmitRequestSchema } from '../validation/schema.js';
import { validate } from '../validation/zod-middleware.js';

export const DEFAULT_CHAIN_MAX_RETRIES = 5;

export interface AuditLoggerOptions {
    store: PrimaryStore;
    /** Secondary targets; omitted means storage-only mode */
    dispatcher?: FanoutDispatcher;
    /** Compare-and-append attempts before ChainContinuityError */
    maxRetries?: number;
    clock?: () => Date;
    newId?: () => string;
}

type ContextLogger = ReturnType<typeof getCorrelationLogger>;

const shortHash = (hash: string) => `${hash.substring(0, 16)}...`;

/**
 * Hash-chained Audit Logger
 *
 * submit() is fail-closed on the primary path: it returns only once the
 * chain-linked event is committed, and throws ValidationError,
 * ChainContinuityError or PersistenceError otherwise. Fan-out to archive and
 * SIEM happens after the commit and cannot fail the call.
 */
export class AuditLogger {
    private readonly store: PrimaryStore;
    private readonly dispatcher: FanoutDispatcher | undefined;
    private readonly maxRetries: number;
    private readonly clock: () => Date;
    private readonly newId: () => string;
    private readonly tenantLocks = new KeyedMutex();

    constructor(options: AuditLoggerOptions) {
        this.store = options.store;
        this.dispatcher = options.dispatcher;
        this.maxRetries = options.maxRetries ?? DEFAULT_CHAIN_MAX_RETRIES;
        if (!Number.isSafeInteger(this.maxRetries) || this.maxRetries < 1) {
            throw new ConfigurationError('Invalid AuditLogger options', [
                `maxRetries must be a positive integer, got ${this.maxRetries}`
            ]);
        }
        this.clock = options.clock ?? (() => new Date());
        this.newId = options.newId ?? (() => crypto.randomUUID());
    }

    public async submit(request: SubmitRequest): Promise<AuditEvent> {
        const input = validate(
            SubmitRequestSchema,
            { ...request, context: request.context ?? CorrelationScope.current() },
            'AuditLogger.submit'
        );
        canonicalizePayload(input.payload);

        const context = createCorrelationContext(input.context);
        const log = getCorrelationLogger(context);

        const content = draftContent({
            eventType: input.eventType,
            context,
            actor: input.actor,
            ...(input.resource !== undefined && { resource: input.resource }),
            payload: input.payload,
            classification: input.classification,
            complianceFlags: input.complianceFlags
        }, this.clock, this.newId);

        const event = await this.tenantLocks.runExclusive(
            context.tenantId,
            () => this.commit(content, log)
        );

        this.dispatcher?.enqueue(event);
        return event;
    }

    /**
     * Read tip, seal, compare-and-append. A conflict re-seals the same content
     * against the tip the store reported; eventId and timestamp are kept.
     */
    private async commit(content: AuditEventContent, log: ContextLogger): Promise<AuditEvent> {
        const tenantId = content.context.tenantId;
        let expectedTip = await this.readTip(tenantId, log);

        for (let attempt = 1; attempt <= this.maxRetries; attempt += 1) {
            const event = sealEvent(content, expectedTip);

            let result: AppendResult;
            try {
                result = await this.store.appendIfTipMatches(tenantId, event, expectedTip);
            } catch (error) {
                log.error({ eventId: event.eventId, attempt }, 'CRITICAL: Audit commit failed. Fail-closed engaged.');
                throw error instanceof PersistenceError
                    ? error
                    : new PersistenceError('Audit event could not be committed', error);
            }

            if (result.status === 'committed') {
                log.info({
                    auditEvent: event.eventType,
                    eventId: event.eventId,
                    sequence: result.sequence,
                    integrityHash: shortHash(event.currentHash)
                }, 'Audit event committed');
                return event;
            }

            log.warn({
                eventId: event.eventId,
                attempt,
                expectedTip: shortHash(expectedTip),
                currentTip: shortHash(result.currentTip)
            }, 'Chain tip moved; re-linking');
            expectedTip = result.currentTip;
        }

        throw new ChainContinuityError(tenantId, expectedTip, this.maxRetries);
    }

    private async readTip(tenantId: string, log: ContextLogger): Promise<string> {
        try {
            return await this.store.getTip(tenantId);
        } catch (error) {
            log.error('Failed to read chain tip');
            throw error instanceof PersistenceError
                ? error
                : new PersistenceError('Audit substrate unavailable: chain tip could not be read', error);
        }
    }
}

export function toReceipt(event: AuditEvent): SubmitReceipt {
    return {
        eventId: event.eventId,
        timestamp: event.timestamp,
        previousHash: event.previousHash,
        currentHash: event.currentHash
    };
}
