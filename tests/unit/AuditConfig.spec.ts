/**
 * Unit Tests: Audit configuration
 *
 * @see libs/config/auditConfig.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { loadAuditConfig } from '../../libs/config/auditConfig.js';
import { ConfigurationError } from '../../libs/errors/errors.js';

const POSTGRES_ENV = {
    DB_HOST: 'db.internal',
    DB_USER: 'audit_app',
    DB_PASSWORD: 'test-secret'
};

function violationsOf(fn: () => unknown): readonly string[] {
    try {
        fn();
    } catch (error) {
        if (error instanceof ConfigurationError) return error.violations;
        throw error;
    }
    assert.fail('expected a ConfigurationError');
}

describe('loadAuditConfig', () => {
    it('applies defaults for an in-memory deployment', () => {
        const config = loadAuditConfig({ AUDIT_STORAGE: 'memory' });

        assert.strictEqual(config.nodeEnv, 'development');
        assert.strictEqual(config.storage, 'memory');
        assert.strictEqual(config.appendOnly, true);
        assert.strictEqual(config.chainMaxRetries, 5);
        assert.strictEqual(config.database.port, 5432);
        assert.strictEqual(config.database.name, 'audit_logs');
        assert.strictEqual(config.archive.enabled, false);
        assert.strictEqual(config.archive.retentionDays, 2555);
        assert.strictEqual(config.archive.lockMode, 'COMPLIANCE');
        assert.strictEqual(config.siem.enabled, false);
        assert.strictEqual(config.siem.elasticsearch.index, 'audit-logs');
        assert.strictEqual(config.siem.datadog.site, 'datadoghq.com');
        assert.deepStrictEqual(config.fanout, { maxAttempts: 3, backoffMs: 250, timeoutMs: 10_000, concurrency: 8 });
    });

    it('maps postgres settings', () => {
        const config = loadAuditConfig({ ...POSTGRES_ENV, DB_PORT: '6432', DB_POOL_MAX: '4', DB_SSL: 'TRUE' });

        assert.strictEqual(config.storage, 'postgres');
        assert.deepStrictEqual(config.database, {
            host: 'db.internal',
            port: 6432,
            name: 'audit_logs',
            user: 'audit_app',
            password: 'test-secret',
            poolMax: 4,
            ssl: true
        });
    });

    it('requires connection settings for postgres storage', () => {
        const violations = violationsOf(() => loadAuditConfig({}));
        assert.ok(violations.includes('FATAL CONFIG: Required env var DB_HOST is missing'));
        assert.ok(violations.includes('FATAL CONFIG: Required env var DB_USER is missing'));
        assert.ok(violations.includes('FATAL CONFIG: Required env var DB_PASSWORD is missing'));
    });

    it('reports unparseable values by variable name', () => {
        assert.throws(
            () => loadAuditConfig({ AUDIT_STORAGE: 'memory', CHAIN_MAX_RETRIES: 'zero' }),
            (error: unknown) => {
                assert.ok(error instanceof ConfigurationError);
                assert.strictEqual(error.message, 'Audit configuration could not be parsed');
                assert.match(error.violations[0] ?? '', /^CHAIN_MAX_RETRIES: /);
                return true;
            }
        );
    });

    it('rejects an unknown storage mode', () => {
        assert.throws(() => loadAuditConfig({ AUDIT_STORAGE: 'sqlite' }), ConfigurationError);
    });

    it('requires a bucket when archival is enabled', () => {
        const violations = violationsOf(() => loadAuditConfig({ AUDIT_STORAGE: 'memory', ARCHIVE_ENABLED: 'true' }));
        assert.deepStrictEqual(violations, ['FATAL CONFIG: Required env var S3_BUCKET_NAME is missing']);
    });

    it('maps archival settings', () => {
        const config = loadAuditConfig({
            AUDIT_STORAGE: 'memory',
            ARCHIVE_ENABLED: 'true',
            S3_BUCKET_NAME: 'audit-archive',
            AWS_REGION: 'eu-west-1',
            S3_RETENTION_DAYS: '3650',
            S3_LOCK_MODE: 'GOVERNANCE'
        });
        assert.deepStrictEqual(config.archive, {
            enabled: true,
            bucket: 'audit-archive',
            region: 'eu-west-1',
            retentionDays: 3650,
            lockMode: 'GOVERNANCE'
        });
    });

    it('requires per-platform SIEM credentials', () => {
        const violations = violationsOf(() => loadAuditConfig({
            AUDIT_STORAGE: 'memory',
            SIEM_ENABLED: 'true',
            SIEM_PLATFORM: 'elasticsearch',
            ELASTICSEARCH_URL: 'https://es.example.test'
        }));
        assert.deepStrictEqual(violations, ['FATAL CONFIG: Required env var ELASTICSEARCH_API_KEY is missing']);
    });

    it('normalizes the SIEM platform name', () => {
        const config = loadAuditConfig({
            AUDIT_STORAGE: 'memory',
            SIEM_ENABLED: 'true',
            SIEM_PLATFORM: 'Datadog',
            DATADOG_API_KEY: 'test-api-key',
            DATADOG_SITE: 'datadoghq.eu'
        });
        assert.strictEqual(config.siem.enabled, true);
        assert.strictEqual(config.siem.platform, 'datadog');
        assert.deepStrictEqual(config.siem.datadog, { apiKey: 'test-api-key', site: 'datadoghq.eu' });
    });

    it('forbids in-memory storage in production', () => {
        const violations = violationsOf(() => loadAuditConfig({ NODE_ENV: 'production', AUDIT_STORAGE: 'memory' }));
        assert.ok(violations.some(v => v.includes('MEMORY_STORAGE_IN_PROTECTED_ENV')));
    });

    it('requires a CA certificate for postgres in production', () => {
        const violations = violationsOf(() => loadAuditConfig({ ...POSTGRES_ENV, NODE_ENV: 'production' }));
        assert.deepStrictEqual(violations, ['FATAL CONFIG: DB_CA_CERT is required in production/staging']);
    });
});
