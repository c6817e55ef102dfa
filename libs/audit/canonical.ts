import { ValidationError } from '../errors/errors.js';

/**
 * Canonical text for hashing.
 *
 * - object keys sorted by Unicode code point, no whitespace, `,` and `:`
 * - strings as JSON string literals (JSON.stringify escaping)
 * - integers in base 10, safe range only
 * - booleans as true / false
 * - arrays only where the envelope allows them (compliance flags)
 * - object members whose value is undefined are omitted, as JSON storage would
 *
 * Anything else (floats, NaN, null, bigint, Dates, class
 * instances) is rejected, because its textual form is not stable across
 * runtimes.
 */

const NUL = /\u0000/;
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Text PostgreSQL can store in TEXT and JSONB columns: no NUL character and
 * no unpaired UTF-16 surrogate.
 */
export function isStorableText(value: string): boolean {
    return !NUL.test(value) && !LONE_SURROGATE.test(value);
}

export const UNSTORABLE_TEXT_MESSAGE = 'NUL characters and unpaired surrogates are not allowed';

export function compareCodePoints(a: string, b: string): number {
    const left = Array.from(a);
    const right = Array.from(b);
    const length = Math.min(left.length, right.length);
    for (let i = 0; i < length; i++) {
        const l = left[i]?.codePointAt(0) ?? 0;
        const r = right[i]?.codePointAt(0) ?? 0;
        if (l !== r) return l - r;
    }
    return left.length - right.length;
}

function isPlainObject(value: object): boolean {
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

function reject(path: string, reason: string): never {
    throw new ValidationError(`Value at ${path} cannot be canonicalized: ${reason}`, [{ path, message: reason }]);
}

function write(value: unknown, path: string, allowArrays: boolean): string {
    switch (typeof value) {
        case 'string':
            if (!isStorableText(value)) return reject(path, UNSTORABLE_TEXT_MESSAGE);
            return JSON.stringify(value);
        case 'boolean':
            return value ? 'true' : 'false';
        case 'number':
            if (!Number.isSafeInteger(value)) {
                return reject(path, Number.isInteger(value) ? 'integer outside safe range' : 'non-integer number');
            }
            // -0 and 0 must render identically
            return value === 0 ? '0' : String(value);
        case 'object': {
            if (value === null) return reject(path, 'null');
            if (Array.isArray(value)) {
                if (!allowArrays) return reject(path, 'array');
                const items: unknown[] = value;
                return `[${items.map((item, i) => write(item, `${path}[${i}]`, allowArrays)).join(',')}]`;
            }
            if (!isPlainObject(value)) return reject(path, 'non-plain object');
            if (Object.prototype.hasOwnProperty.call(value, '__proto__')) return reject(`${path}.__proto__`, 'reserved key');
            const entries = Object.entries(value)
                .filter(([, v]) => v !== undefined)
                .sort(([a], [b]) => compareCodePoints(a, b));
            for (const [k] of entries) {
                if (!isStorableText(k)) return reject(`${path}.${k}`, UNSTORABLE_TEXT_MESSAGE);
            }
            const body = entries
                .map(([k, v]) => `${JSON.stringify(k)}:${write(v, `${path}.${k}`, allowArrays)}`)
                .join(',');
            return `{${body}}`;
        }
        default:
            return reject(path, typeof value);
    }
}

/**
 * Canonical form of a restricted payload value. Arrays are rejected.
 */
export function canonicalizePayload(value: unknown, path = 'payload'): string {
    return write(value, path, false);
}

/**
 * Canonical form of an envelope document. Arrays are allowed at any level,
 * but payload subtrees must be routed through canonicalizePayload by the caller.
 */
export function canonicalize(value: unknown, path = '$'): string {
    return write(value, path, true);
}
