import type { Env, GuardRule } from '../config-guard.js';

const archiveEnabled = (env: Env) =>
    (env.ARCHIVE_ENABLED ?? 'false').trim().toLowerCase() === 'true';

/**
 * Archival store guards. Only evaluated when archival is switched on.
 */
export const ARCHIVE_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'S3_BUCKET_NAME', when: archiveEnabled },
    {
        type: 'assert',
        check: env => !archiveEnabled(env) || Number(env.S3_RETENTION_DAYS ?? '2555') >= 1,
        message: 'S3_RETENTION_DAYS must be at least one day'
    }
];
