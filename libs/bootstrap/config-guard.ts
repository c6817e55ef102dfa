import { logger } from '../logging/logger.js';
import { ConfigurationError } from '../errors/errors.js';

export type Env = Readonly<Record<string, string | undefined>>;

export type GuardRule =
    | { type: 'required'; name: string; sensitive?: boolean; when?: (env: Env) => boolean }
    | { type: 'forbidIf'; name: string; when: (env: Env) => boolean; message: string }
    | { type: 'assert'; check: (env: Env) => boolean; message: string };

/**
 * Hardened Configuration Guard
 * Fail-closed: a missing value that a rule requires is never defaulted.
 */
export class ConfigGuard {
    /**
     * Evaluate rules and return every violation (empty when the env is sound).
     */
    static check(rules: readonly GuardRule[], env: Env = process.env): string[] {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        if (rule.when && !rule.when(env)) break;
                        const value = env[rule.name];
                        if (!value || value.trim() === '') {
                            errors.push(`FATAL CONFIG: Required env var ${rule.name} is missing`);
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message}`);
                        }
                        break;
                    }
                }
            } catch (err: unknown) {
                errors.push(`Check failed for rule: ${err instanceof Error ? err.message : String(err)}`);
            }
        }

        return errors;
    }

    static enforce(rules: readonly GuardRule[], env: Env = process.env): void {
        const errors = ConfigGuard.check(rules, env);

        if (errors.length > 0) {
            logger.fatal({
                errors,
                remediation: 'Check environment variables. Required values have no defaults.'
            }, 'Configuration Guard Violation');

            throw new ConfigurationError('Configuration guard violation', errors);
        }

        logger.info('Configuration guard passed.');
    }
}
