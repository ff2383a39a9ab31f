/**
 * Centralized Redaction Configuration
 * Keys redacted from log lines. Profile specifications routinely carry
 * credentials inside `parameters` or `context` maps, so the
 * nested forms are listed next to the root ones.
 */
export const REDACT_KEYS = [
    // Credentials (Root and Nested)
    'password', '*.password',
    'secret', '*.secret',
    'token', '*.token',
    'auth_token', '*.auth_token',
    'api_key', '*.api_key',
    'apiKey', '*.apiKey',
    'private_key', '*.private_key',

    // Spec maps that commonly embed the above
    'spec.parameters.*', 'properties.parameters.*',
    'spec.context.*', 'properties.context.*'
];

export const REDACT_CENSOR = '[REDACTED]';
