import { z } from 'zod';
import { AuditEventTypeEnum, DataClassificationEnum } from '../audit/schema.js';
import type { CanonicalValue } from '../audit/schema.js';
import { isStorableText, UNSTORABLE_TEXT_MESSAGE } from '../audit/canonical.js';

/**
 * Input validation for everything that enters the audit trail.
 */

// Everything that reaches a TEXT or JSONB column
const storableText = () => z.string().refine(isStorableText, { message: UNSTORABLE_TEXT_MESSAGE });

const nonBlank = (max: number) => z.string()
    .min(1)
    .max(max)
    .refine(isStorableText, { message: UNSTORABLE_TEXT_MESSAGE })
    .refine(v => v.trim().length > 0, { message: 'Must not be blank' });

// --- Payload ---

/**
 * Object parsing drops an own `__proto__` key from its output, so check the
 * raw input before it is rebuilt.
 */
function rejectProtoKey(value: unknown, ctx: z.RefinementCtx): void {
    if (typeof value === 'object' && value !== null && Object.prototype.hasOwnProperty.call(value, '__proto__')) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['__proto__'],
            message: 'Reserved key __proto__ is not allowed'
        });
    }
}

const canonicalMap = () => z.unknown()
    .superRefine(rejectProtoKey)
    .pipe(z.record(storableText(), CanonicalValueSchema));

export const CanonicalValueSchema: z.ZodType<CanonicalValue, z.ZodTypeDef, unknown> = z.lazy(() => z.union([
    storableText(),
    z.number().int().safe(),
    z.boolean(),
    canonicalMap()
]));

export const PayloadSchema = canonicalMap();

// --- Envelope ---

export const CorrelationInputSchema = z.object({
    tenantId: nonBlank(100),
    correlationId: nonBlank(100).optional(),
    spanId: nonBlank(100).optional()
});

export const ActorSchema = z.object({
    id: nonBlank(100),
    type: z.enum(['user', 'service']).default('user'),
    role: nonBlank(50),
    orgUnit: nonBlank(100)
});

export const ResourceSchema = z.object({
    type: nonBlank(50),
    id: nonBlank(200)
});

export const ComplianceFlagSchema = z.string().regex(/^[A-Z][A-Z0-9_]{0,49}$/, {
    message: 'Compliance flags are upper-snake tags such as SOX_RELEVANT'
});

export const SubmitRequestSchema = z.object({
    eventType: AuditEventTypeEnum,
    context: CorrelationInputSchema,
    actor: ActorSchema,
    resource: ResourceSchema.optional(),
    payload: PayloadSchema.default({}),
    classification: DataClassificationEnum.default('INTERNAL'),
    complianceFlags: z.array(ComplianceFlagSchema).max(32).default([])
});

// --- Query ---

export const EventFiltersSchema = z.object({
    correlationId: nonBlank(100).optional(),
    actorId: nonBlank(100).optional(),
    eventType: AuditEventTypeEnum.optional(),
    from: z.string().datetime().optional(),
    to: z.string().datetime().optional()
});

export const PaginationSchema = z.object({
    afterSequence: z.number().int().min(-1).optional(),
    limit: z.number().int().positive().max(1000).default(100)
});

export const VerifyRangeSchema = z.object({
    fromSequence: z.number().int().nonnegative().default(0),
    toSequence: z.number().int().nonnegative().optional()
}).refine(r => r.toSequence === undefined || r.toSequence >= r.fromSequence, {
    message: 'toSequence must not precede fromSequence'
});
