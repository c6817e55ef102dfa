import crypto from 'crypto';
import { canonicalize, canonicalizePayload } from './canonical.js';
import type { AuditEvent, AuditEventContent } from './schema.js';
import { GENESIS_HASH } from './schema.js';

/**
 * Hash chain engine.
 *
 * currentHash = SHA-256( UTF-8( canonical(content) || previousHash ) ), hex.
 * Pure: no clock, no randomness, no I/O.
 */

export const HASH_ALGORITHM = 'sha256';

const HEX_DIGEST = /^[0-9a-f]{64}$/;

export function isDigest(value: string): boolean {
    return HEX_DIGEST.test(value);
}

/**
 * Pick the hashed fields in a fixed shape so stray properties on the input
 * (sequence numbers, store metadata) never leak into the digest.
 */
export function hashedContent(event: AuditEventContent): Record<string, unknown> {
    return {
        eventId: event.eventId,
        timestamp: event.timestamp,
        eventType: event.eventType,
        context: {
            tenantId: event.context.tenantId,
            correlationId: event.context.correlationId,
            spanId: event.context.spanId
        },
        actor: {
            id: event.actor.id,
            type: event.actor.type,
            role: event.actor.role,
            orgUnit: event.actor.orgUnit
        },
        resource: event.resource ? { type: event.resource.type, id: event.resource.id } : undefined,
        payload: event.payload,
        classification: event.classification,
        complianceFlags: [...event.complianceFlags]
    };
}

export function canonicalContent(event: AuditEventContent): string {
    // Payload carries the stricter rules (no arrays), check it on its own first
    canonicalizePayload(event.payload);
    return canonicalize(hashedContent(event));
}

export function computeHash(event: AuditEventContent, previousHash: string): string {
    return crypto.createHash(HASH_ALGORITHM)
        .update(canonicalContent(event) + previousHash, 'utf8')
        .digest('hex');
}

/**
 * Seal content into an immutable event linked to previousHash.
 */
export function sealEvent(content: AuditEventContent, previousHash: string = GENESIS_HASH): AuditEvent {
    const currentHash = computeHash(content, previousHash);
    return deepFreeze({
        ...content,
        complianceFlags: [...content.complianceFlags],
        previousHash,
        currentHash
    });
}

/**
 * Recompute and compare. Content that no longer canonicalizes counts as a mismatch.
 */
export function verifyHash(event: AuditEvent): { matches: boolean; computed: string | null } {
    try {
        const computed = computeHash(event, event.previousHash);
        return { matches: computed === event.currentHash, computed };
    } catch {
        return { matches: false, computed: null };
    }
}

export function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object') {
        if (!Object.isFrozen(value)) Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}
