import { z } from 'zod';
import { ConfigGuard } from '../bootstrap/config-guard.js';
import type { Env, GuardRule } from '../bootstrap/config-guard.js';
import { DB_CONFIG_GUARDS } from '../bootstrap/config/db-config.js';
import { ARCHIVE_CONFIG_GUARDS } from '../bootstrap/config/archive-config.js';
import { SIEM_CONFIG_GUARDS } from '../bootstrap/config/siem-config.js';
import { ConfigurationError } from '../errors/errors.js';
import { logger } from '../logging/logger.js';

/**
 * Audit trail configuration, read from environment variables.
 *
 * Deployment modes fall out of the switches:
 * - storage only (ARCHIVE_ENABLED=false, SIEM_ENABLED=false)
 * - storage + S3 archival
 * - storage + SIEM streaming
 * - everything
 */

const flag = (fallback: boolean) => z.string()
    .default(fallback ? 'true' : 'false')
    .transform(v => v.trim().toLowerCase() === 'true');

const int = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalText = z.string().trim().optional().transform(v => (v === undefined || v === '' ? undefined : v));

export const AuditEnvSchema = z.object({
    NODE_ENV: z.string().default('development'),
    AUDIT_STORAGE: z.enum(['postgres', 'memory']).default('postgres'),
    AUDIT_APPEND_ONLY: flag(true),
    CHAIN_MAX_RETRIES: int(5),

    DB_HOST: z.string().default('localhost'),
    DB_PORT: int(5432),
    DB_NAME: z.string().default('audit_logs'),
    DB_USER: z.string().default('audit_user'),
    DB_PASSWORD: z.string().default(''),
    DB_POOL_MAX: int(10),
    DB_SSL: flag(false),
    DB_CA_CERT: optionalText,

    ARCHIVE_ENABLED: flag(false),
    S3_BUCKET_NAME: z.string().default(''),
    AWS_REGION: z.string().default('us-east-1'),
    S3_ENDPOINT: optionalText,
    S3_RETENTION_DAYS: int(2555),
    S3_LOCK_MODE: z.enum(['COMPLIANCE', 'GOVERNANCE']).default('COMPLIANCE'),

    SIEM_ENABLED: flag(false),
    SIEM_PLATFORM: z.string().default('splunk').transform(v => v.trim().toLowerCase()).pipe(z.enum(['splunk', 'elasticsearch', 'datadog'])),
    SPLUNK_HEC_URL: z.string().default(''),
    SPLUNK_HEC_TOKEN: z.string().default(''),
    ELASTICSEARCH_URL: z.string().default(''),
    ELASTICSEARCH_INDEX: z.string().default('audit-logs'),
    ELASTICSEARCH_API_KEY: z.string().default(''),
    DATADOG_API_KEY: z.string().default(''),
    DATADOG_SITE: z.string().default('datadoghq.com'),

    FANOUT_MAX_ATTEMPTS: int(3),
    FANOUT_BACKOFF_MS: int(250),
    FANOUT_TIMEOUT_MS: int(10_000),
    FANOUT_CONCURRENCY: int(8)
});

export type SiemPlatform = 'splunk' | 'elasticsearch' | 'datadog';
export type StorageMode = 'postgres' | 'memory';
export type ObjectLockMode = 'COMPLIANCE' | 'GOVERNANCE';

export interface DatabaseConfig {
    readonly host: string;
    readonly port: number;
    readonly name: string;
    readonly user: string;
    readonly password: string;
    readonly poolMax: number;
    readonly ssl: boolean;
    readonly caCert?: string;
}

export interface ArchiveConfig {
    readonly enabled: boolean;
    readonly bucket: string;
    readonly region: string;
    readonly endpoint?: string;
    readonly retentionDays: number;
    readonly lockMode: ObjectLockMode;
}

export interface SiemConfig {
    readonly enabled: boolean;
    readonly platform: SiemPlatform;
    readonly splunk: { readonly hecUrl: string; readonly hecToken: string };
    readonly elasticsearch: { readonly url: string; readonly index: string; readonly apiKey: string };
    readonly datadog: { readonly apiKey: string; readonly site: string };
}

export interface FanoutConfig {
    readonly maxAttempts: number;
    readonly backoffMs: number;
    readonly timeoutMs: number;
    readonly concurrency: number;
}

export interface AuditConfig {
    readonly nodeEnv: string;
    readonly storage: StorageMode;
    readonly appendOnly: boolean;
    readonly chainMaxRetries: number;
    readonly database: DatabaseConfig;
    readonly archive: ArchiveConfig;
    readonly siem: SiemConfig;
    readonly fanout: FanoutConfig;
}

export const AUDIT_CONFIG_GUARDS: readonly GuardRule[] = [
    ...DB_CONFIG_GUARDS,
    ...ARCHIVE_CONFIG_GUARDS,
    ...SIEM_CONFIG_GUARDS
];

/**
 * Parse and guard the environment. Throws ConfigurationError listing every
 * problem found, never a partially valid config.
 */
export function loadAuditConfig(env: Env = process.env): AuditConfig {
    const parsed = AuditEnvSchema.safeParse(env);
    if (!parsed.success) {
        const violations = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        logger.fatal({ errors: violations }, 'Audit configuration could not be parsed');
        throw new ConfigurationError('Audit configuration could not be parsed', violations);
    }

    ConfigGuard.enforce(AUDIT_CONFIG_GUARDS, env);

    const e = parsed.data;
    const config: AuditConfig = {
        nodeEnv: e.NODE_ENV,
        storage: e.AUDIT_STORAGE,
        appendOnly: e.AUDIT_APPEND_ONLY,
        chainMaxRetries: e.CHAIN_MAX_RETRIES,
        database: {
            host: e.DB_HOST,
            port: e.DB_PORT,
            name: e.DB_NAME,
            user: e.DB_USER,
            password: e.DB_PASSWORD,
            poolMax: e.DB_POOL_MAX,
            ssl: e.DB_SSL,
            ...(e.DB_CA_CERT !== undefined && { caCert: e.DB_CA_CERT })
        },
        archive: {
            enabled: e.ARCHIVE_ENABLED,
            bucket: e.S3_BUCKET_NAME,
            region: e.AWS_REGION,
            ...(e.S3_ENDPOINT !== undefined && { endpoint: e.S3_ENDPOINT }),
            retentionDays: e.S3_RETENTION_DAYS,
            lockMode: e.S3_LOCK_MODE
        },
        siem: {
            enabled: e.SIEM_ENABLED,
            platform: e.SIEM_PLATFORM,
            splunk: { hecUrl: e.SPLUNK_HEC_URL, hecToken: e.SPLUNK_HEC_TOKEN },
            elasticsearch: { url: e.ELASTICSEARCH_URL, index: e.ELASTICSEARCH_INDEX, apiKey: e.ELASTICSEARCH_API_KEY },
            datadog: { apiKey: e.DATADOG_API_KEY, site: e.DATADOG_SITE }
        },
        fanout: {
            maxAttempts: e.FANOUT_MAX_ATTEMPTS,
            backoffMs: e.FANOUT_BACKOFF_MS,
            timeoutMs: e.FANOUT_TIMEOUT_MS,
            concurrency: e.FANOUT_CONCURRENCY
        }
    };

    logger.info({
        storage: config.storage,
        archive: config.archive.enabled,
        siem: config.siem.enabled ? config.siem.platform : false
    }, 'Audit configuration loaded');

    return config;
}
