// src/config/schemas.ts
import { z } from 'zod';

// --- Helper Functions for Environment Variable Parsing ---

/**
 * Treats blank or whitespace-only values as unset, so that missing settings are
 * reported by the configuration validator rather than by the schema.
 */
const optionalTrimmedString = () =>
    z.string().optional().transform(val => {
        const trimmed = val?.trim();
        return trimmed ? trimmed : undefined;
    });

const booleanFlag = (defaultValue: 'true' | 'false') =>
    z.enum(['true', 'false']).transform(val => val === 'true').default(defaultValue);

// --- Zod Schema Definition for Environment Variables ---
/**
 * Zod schema defining the structure and validation rules for environment variables.
 * Each property corresponds to an environment variable.
 */
export const envSchema = z.object({
    /**
     * The current Node.js environment.
     * @default 'development'
     */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // --- Remote Checking Service (required, validated by ConfigService) ---
    /** Base URL of the content checking platform, e.g. `https://acme.example.cloud`. */
    CONTENT_CHECK_URL: optionalTrimmedString(),
    /** Shared single sign-on secret for a trusted environment. */
    CONTENT_CHECK_SSO_TOKEN: optionalTrimmedString(),
    /** User on whose behalf checks are requested. */
    CONTENT_CHECK_USERNAME: optionalTrimmedString(),
    /** Signature identifying this integration to the platform. */
    CONTENT_CHECK_CLIENT_SIGNATURE: optionalTrimmedString(),
    /** Directory scanned in batch mode and monitored in watch mode. */
    CONTENT_CHECK_CONTENT_DIR: optionalTrimmedString(),

    // --- Dispatch Tuning ---
    /**
     * Maximum number of checks in flight at once.
     * @default 2
     */
    CHECK_CONCURRENCY: z.coerce.number().int().positive().default(2),
    /**
     * Delay held after each check before its slot is released.
     * @default 500
     */
    CHECK_PACING_MS: z.coerce.number().int().nonnegative().default(500),
    /**
     * Files larger than this are rejected before upload.
     * @default 5242880 (5 MiB)
     */
    MAX_FILE_SIZE_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),

    // --- HTTP Client ---
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    CHECK_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
    CHECK_POLL_TIMEOUT_MS: z.coerce.number().int().positive().default(300000),

    // --- Presentation ---
    /**
     * Whether result links are opened in the default browser.
     * @default true
     */
    OPEN_BROWSER: booleanFlag('true'),
    /**
     * Whether watch mode also monitors nested directories.
     * @default true
     */
    WATCH_INCLUDE_SUBDIRECTORIES: booleanFlag('true'),

    // --- Logging Configuration ---
    /**
     * Minimum log level for the application.
     * @default 'info'
     */
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    /**
     * Directory where log files will be stored.
     * @default './logs'
     */
    LOGS_DIRECTORY: z.string().default('./logs'),
    APP_LOG_FILE_NAME: z.string().default('app.log'),
    /**
     * Whether logs should also be output to the console.
     * @default true
     */
    LOG_TO_CONSOLE: booleanFlag('true'),
});
