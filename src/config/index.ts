/**
 * Configuration module with Zod schema validation
 * Fail-fast with actionable error messages
 */
import { z } from 'zod';

// Custom validators
const urlSchema = z.string().url('Must be a valid URL');
const portSchema = z.coerce.number().int().min(1).max(65535);
const positiveIntSchema = z.coerce.number().int().positive();

export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';

// Configuration schema
export const configSchema = z.object({
    // Generation API
    geminiApiKey: z.string().min(1).nullable().default(null),
    geminiModel: z.string().min(1).default(DEFAULT_GEMINI_MODEL),
    geminiBaseUrl: urlSchema.default('https://generativelanguage.googleapis.com/v1beta'),
    generationTimeoutMs: positiveIntSchema.default(30000),

    // HTTP server
    port: portSchema.default(5000),
    host: z.string().min(1).default('0.0.0.0'),

    // Feeds
    feedsConfigPath: z.string().nullable().default(null),
    feedTimeoutMs: positiveIntSchema.default(10000),
    feedMaxItems: positiveIntSchema.default(20),
    feedUserAgent: z.string().min(1).default(
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36'
    ),

    // Response shaping
    responseItems: positiveIntSchema.default(10),
    summaryMaxLength: positiveIntSchema.default(150),

    // Logging
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    // Circuit Breaker Tuning
    cbFailureThreshold: positiveIntSchema.default(5),
    cbResetTimeoutMs: positiveIntSchema.default(30000),
    cbHalfOpenRequests: positiveIntSchema.default(1),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Map environment variables to config object
 */
export function mapEnvToConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
    return {
        // First credential present wins
        geminiApiKey: env.GEMINI_API_KEY || env.GOOGLE_API_KEY || null,
        geminiModel: env.GEMINI_MODEL || undefined,
        geminiBaseUrl: env.GEMINI_BASE_URL || undefined,
        generationTimeoutMs: env.GENERATION_TIMEOUT_MS,

        port: env.PORT,
        host: env.HOST || undefined,

        feedsConfigPath: env.FEEDS_CONFIG_PATH || null,
        feedTimeoutMs: env.FEED_TIMEOUT_MS,
        feedMaxItems: env.FEED_MAX_ITEMS,
        feedUserAgent: env.FEED_USER_AGENT || undefined,

        responseItems: env.RESPONSE_ITEMS,
        summaryMaxLength: env.SUMMARY_MAX_LENGTH,

        logLevel: env.LOG_LEVEL || undefined,

        cbFailureThreshold: env.CB_FAILURE_THRESHOLD,
        cbResetTimeoutMs: env.CB_RESET_TIMEOUT_MS,
        cbHalfOpenRequests: env.CB_HALF_OPEN_REQUESTS,
    };
}

/**
 * Load and validate configuration
 * Fails fast with clear error messages
 */
function loadConfig(): Config {
    const rawConfig = mapEnvToConfig();

    const result = configSchema.safeParse(rawConfig);

    if (!result.success) {
        const errors = result.error.issues.map(issue => {
            const path = issue.path.join('.');
            const envVar = pathToEnvVar(path);
            return `  - ${envVar}: ${issue.message}`;
        });

        console.error('\n❌ Configuration Error\n');
        console.error('The following environment variables are missing or invalid:\n');
        console.error(errors.join('\n'));
        console.error('\nSee .env.example for required configuration.\n');

        process.exit(1);
    }

    return result.data;
}

/**
 * Convert config path to environment variable name
 */
export function pathToEnvVar(path: string): string {
    return path
        .replace(/([A-Z])/g, '_$1')
        .toUpperCase()
        .replace(/^_/, '');
}

/**
 * Redact sensitive values for logging
 */
export function getRedactedConfig(cfg: Config): Record<string, unknown> {
    return {
        geminiApiKey: cfg.geminiApiKey ? '[CONFIGURED]' : null,
        geminiModel: cfg.geminiModel,
        geminiBaseUrl: cfg.geminiBaseUrl,
        generationTimeoutMs: cfg.generationTimeoutMs,
        host: cfg.host,
        port: cfg.port,
        feedsConfigPath: cfg.feedsConfigPath,
        feedTimeoutMs: cfg.feedTimeoutMs,
        feedMaxItems: cfg.feedMaxItems,
        responseItems: cfg.responseItems,
        logLevel: cfg.logLevel,
        cbFailureThreshold: cfg.cbFailureThreshold,
        cbResetTimeoutMs: cfg.cbResetTimeoutMs,
    };
}

// Export singleton config
export const config = loadConfig();
