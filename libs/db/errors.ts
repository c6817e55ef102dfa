import { SanitizedError } from '../errors/sanitizer.js';

function sqlStateOf(error: unknown): string | undefined {
    if (error instanceof SanitizedError) return error.sqlState;
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/** 23505: a UNIQUE constraint rejected the row (tenant tip already taken). */
export function isUniqueViolation(error: unknown): boolean {
    return sqlStateOf(error) === '23505';
}

/** 40001 / 40P01: the transaction lost a serialization race. */
export function isSerializationFailure(error: unknown): boolean {
    const state = sqlStateOf(error);
    return state === '40001' || state === '40P01';
}

/** P0001 raised by the append-only trigger. */
export function isImmutabilityViolation(error: unknown): boolean {
    return sqlStateOf(error) === 'P0001';
}
