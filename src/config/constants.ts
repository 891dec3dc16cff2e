// src/config/constants.ts

// --- Injection Tokens ---
/** Environment record consumed by ConfigService. */
export const PROCESS_ENV = 'PROCESS_ENV';

// --- Required Environment Variables ---
/**
 * Variables that must be set, paired with the description shown when one is missing.
 */
export type RequiredEnvVariable =
    | 'CONTENT_CHECK_URL'
    | 'CONTENT_CHECK_SSO_TOKEN'
    | 'CONTENT_CHECK_USERNAME'
    | 'CONTENT_CHECK_CLIENT_SIGNATURE'
    | 'CONTENT_CHECK_CONTENT_DIR';

export const REQUIRED_ENV_VARIABLES: ReadonlyArray<{ name: RequiredEnvVariable; description: string }> = [
    { name: 'CONTENT_CHECK_URL', description: 'Content check service URL' },
    { name: 'CONTENT_CHECK_SSO_TOKEN', description: 'SSO Token' },
    { name: 'CONTENT_CHECK_USERNAME', description: 'Username' },
    { name: 'CONTENT_CHECK_CLIENT_SIGNATURE', description: 'Client Signature' },
    { name: 'CONTENT_CHECK_CONTENT_DIR', description: 'Content Directory' },
];

// --- Placeholder Values shipped in .env.example ---
export const SECRET_PLACEHOLDER_MARKERS: readonly string[] = ['SECURELY-PROVISIONED', 'PROVISIONED'];
export const USERNAME_PLACEHOLDER = 'your-username';

// --- Remote API ---
export const SIGN_IN_PATH = '/api/v1/auth/sign-ins';
export const SUBMIT_CHECK_PATH = '/api/v1/checking/checks';
export const DEFAULT_CONTENT_FORMAT = 'AUTO';

export const HEADER_USERNAME = 'X-Content-Check-Username';
export const HEADER_SSO_TOKEN = 'X-Content-Check-SSO-Token';
export const HEADER_CLIENT_SIGNATURE = 'X-Content-Check-Client';
export const HEADER_ACCESS_TOKEN = 'X-Content-Check-Auth';
