import type { ZodSchema, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';
import { ValidationError } from '../errors/errors.js';

/**
 * Fail-closed validation. Returns the parsed value or throws ValidationError;
 * never logs the rejected data itself.
 */
export function validate<T, I = T>(schema: ZodSchema<T, ZodTypeDef, I>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const issues = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({ context, errors: issues }, 'Input validation failure');

        throw new ValidationError(`Validation failed in ${context}`, issues);
    }

    return result.data;
}

/**
 * Factory for reusable validators.
 */
export const createValidator = <T, I = T>(schema: ZodSchema<T, ZodTypeDef, I>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
