import type { CommittedAuditEvent } from './schema.js';
import { GENESIS_HASH } from './schema.js';
import { verifyHash } from './hashChain.js';
import type { PrimaryStore } from '../store/primaryStore.js';
import { getComponentLogger } from '../logging/logger.js';
import { VerifyRangeSchema } from '../validation/schema.js';

const logger = getComponentLogger('ChainVerifier');

export const DEFAULT_VERIFY_BATCH_SIZE = 500;

export type BreakReason = 'linkage_mismatch' | 'hash_mismatch';

export interface ChainBreak {
    /** Chain position of the offending event */
    readonly index: number;
    readonly eventId: string;
    readonly reason: BreakReason;
    readonly expected: string;
    readonly actual: string;
}

export interface VerifyRange {
    /** First chain position to check (default 0) */
    fromSequence?: number;
    /** Stop before this position; unbounded when omitted */
    toSequence?: number;
}

export interface VerificationResult {
    readonly tenantId: string;
    readonly valid: boolean;
    readonly eventsChecked: number;
    readonly firstBreak?: ChainBreak;
    /** Set when the chain could not be read at all; valid is then false */
    readonly error?: string;
}

/**
 * Audit Integrity Verifier
 * Replays a tenant's chain in order, checking linkage then content hash.
 * Read-only, and always returns a result instead of throwing.
 */
export class ChainVerifier {
    constructor(
        private readonly store: PrimaryStore,
        private readonly batchSize: number = DEFAULT_VERIFY_BATCH_SIZE
    ) { }

    async verify(tenantId: string, range: VerifyRange = {}): Promise<VerificationResult> {
        const parsed = VerifyRangeSchema.safeParse(range);
        if (!parsed.success) {
            const error = `Invalid range [${range.fromSequence ?? 0}, ${range.toSequence ?? Number.POSITIVE_INFINITY})`;
            logger.warn({ tenantId, issues: parsed.error.issues.map(i => i.message) }, error);
            return { tenantId, valid: false, eventsChecked: 0, error };
        }
        const from = parsed.data.fromSequence;
        const to = parsed.data.toSequence ?? Number.POSITIVE_INFINITY;

        try {
            const result = await this.replay(tenantId, from, to);
            if (result.valid) {
                logger.info({ tenantId, eventsChecked: result.eventsChecked }, 'Audit chain verified');
            } else {
                logger.warn({ tenantId, eventsChecked: result.eventsChecked, firstBreak: result.firstBreak }, 'Audit chain integrity violation');
            }
            return result;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error({ tenantId, error: message }, 'Audit chain could not be read');
            return { tenantId, valid: false, eventsChecked: 0, error: message };
        }
    }

    private async replay(tenantId: string, from: number, to: number): Promise<VerificationResult> {
        let expectedPrevious = await this.anchor(tenantId, from);
        if (expectedPrevious === null) {
            return { tenantId, valid: true, eventsChecked: 0 };
        }

        let index = from;
        let eventsChecked = 0;

        while (index < to) {
            const limit = Math.min(this.batchSize, to - index);
            const batch = await this.store.readChain(tenantId, index, limit);

            for (const event of batch) {
                const broken = this.check(event, index, expectedPrevious);
                if (broken) {
                    return { tenantId, valid: false, eventsChecked, firstBreak: broken };
                }
                expectedPrevious = event.currentHash;
                eventsChecked += 1;
                index += 1;
            }

            if (batch.length < limit) break;
        }

        return { tenantId, valid: true, eventsChecked };
    }

    /**
     * The hash the first checked event must link to, or null when the range
     * starts past the end of the chain.
     */
    private async anchor(tenantId: string, from: number): Promise<string | null> {
        if (from === 0) return GENESIS_HASH;
        const [previous] = await this.store.readChain(tenantId, from - 1, 1);
        return previous ? previous.currentHash : null;
    }

    private check(event: CommittedAuditEvent, index: number, expectedPrevious: string): ChainBreak | null {
        if (event.previousHash !== expectedPrevious) {
            return {
                index,
                eventId: event.eventId,
                reason: 'linkage_mismatch',
                expected: expectedPrevious,
                actual: event.previousHash
            };
        }

        const { matches, computed } = verifyHash(event);
        if (!matches) {
            return {
                index,
                eventId: event.eventId,
                reason: 'hash_mismatch',
                expected: computed ?? 'uncanonicalizable content',
                actual: event.currentHash
            };
        }

        return null;
    }
}
