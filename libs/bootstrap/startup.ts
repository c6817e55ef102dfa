import { logger } from '../logging/logger.js';
import { loadAuditConfig } from '../config/auditConfig.js';
import type { Env } from './config-guard.js';
import { createAuditTrail } from '../audit/trail.js';
import type { AuditTrail, AuditTrailOverrides } from '../audit/trail.js';
import { PostgresAuditStore } from '../store/postgresStore.js';

export interface BootstrapOptions {
    env?: Env;
    /** Apply sql/001_audit_events.sql before probing roles */
    migrate?: boolean;
    overrides?: AuditTrailOverrides;
}

/**
 * Load config, assemble the trail and run the startup checks. Any failure
 * closes what was opened and rethrows.
 */
export async function bootstrap(serviceName: string, options: BootstrapOptions = {}): Promise<AuditTrail> {
    logger.info({ serviceName }, 'Bootstrapping audit trail');

    const config = loadAuditConfig(options.env ?? process.env);
    const trail = createAuditTrail(config, options.overrides);

    try {
        if (trail.database) {
            if (options.migrate && trail.store instanceof PostgresAuditStore) {
                await trail.store.createSchema();
            }
            await trail.database.probeRoles();
        }
    } catch (error) {
        logger.fatal({ serviceName }, 'Startup checks failed');
        await trail.close();
        throw error;
    }

    logger.info({ serviceName, storage: config.storage }, 'Startup checks passed');
    return trail;
}
