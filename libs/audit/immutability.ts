import type { AuditConfig } from '../config/auditConfig.js';
import { ConfigurationError } from '../errors/errors.js';

/**
 * Audit Immutability Guard
 * Enforces append-only audit posture in protected environments.
 */

const PROTECTED_ENVS = new Set(['production', 'staging']);

export function enforceAuditImmutability(config: Pick<AuditConfig, 'nodeEnv' | 'appendOnly' | 'storage'>): void {
    if (!PROTECTED_ENVS.has(config.nodeEnv)) {
        return;
    }

    const violations: string[] = [];
    if (!config.appendOnly) {
        violations.push('AUDIT_APPEND_ONLY must be enabled in production/staging');
    }
    if (config.storage !== 'postgres') {
        violations.push('AUDIT_STORAGE must be postgres in production/staging');
    }

    if (violations.length > 0) {
        throw new ConfigurationError('Audit immutability posture violated', violations);
    }
}
