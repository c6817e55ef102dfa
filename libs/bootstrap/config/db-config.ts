import type { Env, GuardRule } from '../config-guard.js';

const usesPostgres = (env: Env) =>
    (env.AUDIT_STORAGE ?? 'postgres') === 'postgres';

const isProtected = (env: Env) =>
    ['production', 'staging'].includes(env.NODE_ENV ?? '');

/**
 * Primary store configuration guards.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST', when: usesPostgres },
    { type: 'required', name: 'DB_USER', when: usesPostgres },
    { type: 'required', name: 'DB_PASSWORD', sensitive: true, when: usesPostgres },

    {
        type: 'forbidIf',
        name: 'MEMORY_STORAGE_IN_PROTECTED_ENV',
        when: env => isProtected(env) && !usesPostgres(env),
        message: 'In-memory primary store is not durable and is forbidden in production/staging'
    },
    {
        type: 'assert',
        check: env => !isProtected(env) || !usesPostgres(env) || !!env.DB_CA_CERT,
        message: 'DB_CA_CERT is required in production/staging'
    }
];
