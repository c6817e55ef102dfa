/**
 * Centralized Redaction Configuration
 * Keys that must never reach log output: sink credentials, archive
 * credentials and the PII-shaped fields collaborators tend to pass along.
 */
export const REDACT_KEYS = [
    // Credentials (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'password', '*.password',
    'secret', '*.secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',
    'hecToken', '*.hecToken',
    'secretAccessKey', '*.secretAccessKey',
    'headers.Authorization', '*.headers.Authorization',
    'headers["DD-API-KEY"]', '*.headers["DD-API-KEY"]',

    // PII (Root and Nested)
    'ssn', '*.ssn',
    'pan', '*.pan',
    'email', '*.email',
    'account_number', '*.account_number',
    'national_id', '*.national_id',

    // Audit payloads are evidence, not log material
    'payload', '*.payload'
];

export const REDACT_CENSOR = '[REDACTED]';
