import type { Env, GuardRule } from '../config-guard.js';

const siemEnabled = (env: Env) => (env.SIEM_ENABLED ?? 'false').trim().toLowerCase() === 'true';
const platformIs = (platform: string) => (env: Env) =>
    siemEnabled(env) && (env.SIEM_PLATFORM ?? 'splunk').trim().toLowerCase() === platform;

/**
 * SIEM platform guards: each platform needs its endpoint and credential.
 */
export const SIEM_CONFIG_GUARDS: GuardRule[] = [
    {
        type: 'assert',
        check: env => !siemEnabled(env) || ['splunk', 'elasticsearch', 'datadog'].includes((env.SIEM_PLATFORM ?? 'splunk').trim().toLowerCase()),
        message: 'SIEM_PLATFORM must be one of splunk, elasticsearch, datadog'
    },
    { type: 'required', name: 'SPLUNK_HEC_URL', when: platformIs('splunk') },
    { type: 'required', name: 'SPLUNK_HEC_TOKEN', sensitive: true, when: platformIs('splunk') },
    { type: 'required', name: 'ELASTICSEARCH_URL', when: platformIs('elasticsearch') },
    { type: 'required', name: 'ELASTICSEARCH_API_KEY', sensitive: true, when: platformIs('elasticsearch') },
    { type: 'required', name: 'DATADOG_API_KEY', sensitive: true, when: platformIs('datadog') }
];
