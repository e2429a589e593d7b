import dotenv from 'dotenv';
import { CacheStrategy, isCacheStrategy } from '../domain/entities/CacheEntry';

// Load environment variables
dotenv.config();

export type MetricsAdapterName = 'prometheus' | 'console' | 'none';

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;

    // OpenAI
    openaiApiKey: string;
    openaiModel: string;
    openaiBaseUrl: string;

    // Cache
    cacheStrategy: CacheStrategy;
    cacheDir: string; // Empty disables file persistence
    cacheMaxAgeMs?: number; // Freshness window for cache reads
    redisUrl?: string; // Takes precedence over cacheDir

    // Rate limiting
    rateLimitDefaultRps: number;
    rateLimitHostOverrides: Record<string, number>;

    // Circuit breaker
    breakerFailureThreshold: number;
    breakerRecoveryTimeoutMs: number;

    // Retry
    retryMaxAttempts: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;

    // Stage timeouts (per attempt)
    fetchTimeoutMs: number;
    fetchPageTimeoutMs: number; // Per request inside the fetch stage
    extractTimeoutMs: number;
    renderTimeoutMs: number;

    // Background refresh
    backgroundRefreshEnabled: boolean;

    // Collaborators
    subjectsFile: string;

    // Observability
    metricsAdapter: MetricsAdapterName;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Proactive cleanup: trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value.trim().toLowerCase() === 'true';
}

function getOptionalEnvVarNumber(key: string): number | undefined {
    const value = getEnvVar(key, '');
    return value === '' ? undefined : getEnvVarNumber(key);
}

/**
 * Parses "host=rate,host=rate" into a map. Malformed pairs are rejected.
 */
export function parseHostOverrides(raw: string): Record<string, number> {
    const overrides: Record<string, number> = {};
    for (const pair of raw.split(',').map(part => part.trim()).filter(Boolean)) {
        const [host, rate] = pair.split('=').map(part => part.trim());
        const parsed = parseFloat(rate ?? '');
        if (!host || isNaN(parsed)) {
            throw new Error(`Invalid RATE_LIMIT_HOST_OVERRIDES entry: "${pair}" (expected host=rate)`);
        }
        overrides[host] = parsed;
    }
    return overrides;
}

function getCacheStrategy(): CacheStrategy {
    const value = getEnvVar('CACHE_STRATEGY', 'balanced');
    if (!isCacheStrategy(value)) {
        throw new Error(
            `CACHE_STRATEGY must be one of aggressive, balanced, conservative, no_cache, got: ${value}`
        );
    }
    return value;
}

function getMetricsAdapter(): MetricsAdapterName {
    const value = getEnvVar('METRICS_ADAPTER', 'prometheus');
    if (value !== 'prometheus' && value !== 'console' && value !== 'none') {
        throw new Error(`METRICS_ADAPTER must be prometheus, console or none, got: ${value}`);
    }
    return value;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),

        // OpenAI
        openaiApiKey: getEnvVar('OPENAI_API_KEY', ''),
        openaiModel: getEnvVar('OPENAI_MODEL', 'gpt-4.1'),
        openaiBaseUrl: getEnvVar('OPENAI_BASE_URL', 'https://api.openai.com'),

        // Cache
        cacheStrategy: getCacheStrategy(),
        cacheDir: getEnvVar('CACHE_DIR', './data/cache'),
        cacheMaxAgeMs: getOptionalEnvVarNumber('CACHE_MAX_AGE_MS'),
        redisUrl: getEnvVar('REDIS_URL', '') || undefined,

        // Rate limiting
        rateLimitDefaultRps: getEnvVarNumber('RATE_LIMIT_DEFAULT_RPS', 5),
        rateLimitHostOverrides: parseHostOverrides(getEnvVar('RATE_LIMIT_HOST_OVERRIDES', '')),

        // Circuit breaker
        breakerFailureThreshold: getEnvVarNumber('BREAKER_FAILURE_THRESHOLD', 5),
        breakerRecoveryTimeoutMs: getEnvVarNumber('BREAKER_RECOVERY_TIMEOUT_MS', 60000),

        // Retry
        retryMaxAttempts: getEnvVarNumber('RETRY_MAX_ATTEMPTS', 3),
        retryBaseDelayMs: getEnvVarNumber('RETRY_BASE_DELAY_MS', 1000),
        retryMaxDelayMs: getEnvVarNumber('RETRY_MAX_DELAY_MS', 60000),

        // Stage timeouts
        fetchTimeoutMs: getEnvVarNumber('FETCH_TIMEOUT_MS', 30000),
        fetchPageTimeoutMs: getEnvVarNumber('FETCH_PAGE_TIMEOUT_MS', 5000),
        extractTimeoutMs: getEnvVarNumber('EXTRACT_TIMEOUT_MS', 60000),
        renderTimeoutMs: getEnvVarNumber('RENDER_TIMEOUT_MS', 30000),

        // Background refresh
        backgroundRefreshEnabled: getEnvVarBoolean('BACKGROUND_REFRESH_ENABLED', true),

        // Collaborators
        subjectsFile: getEnvVar('SUBJECTS_FILE', './data/subjects.json'),

        // Observability
        metricsAdapter: getMetricsAdapter(),
    };
}

/**
 * Returns a list of configuration problems; empty when the config is usable.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.openaiApiKey) {
        errors.push('OPENAI_API_KEY is required for structured extraction');
    }
    if (config.rateLimitDefaultRps <= 0) {
        errors.push('RATE_LIMIT_DEFAULT_RPS must be positive');
    }
    for (const [host, rate] of Object.entries(config.rateLimitHostOverrides)) {
        if (rate <= 0) {
            errors.push(`RATE_LIMIT_HOST_OVERRIDES rate for ${host} must be positive`);
        }
    }
    if (config.breakerFailureThreshold < 1) {
        errors.push('BREAKER_FAILURE_THRESHOLD must be at least 1');
    }
    if (config.retryMaxAttempts < 1) {
        errors.push('RETRY_MAX_ATTEMPTS must be at least 1');
    }
    if (config.retryBaseDelayMs > config.retryMaxDelayMs) {
        errors.push('RETRY_BASE_DELAY_MS must not exceed RETRY_MAX_DELAY_MS');
    }
    if (config.cacheMaxAgeMs !== undefined && config.cacheMaxAgeMs < 0) {
        errors.push('CACHE_MAX_AGE_MS must not be negative');
    }
    if (config.fetchPageTimeoutMs >= config.fetchTimeoutMs) {
        errors.push('FETCH_PAGE_TIMEOUT_MS must be less than FETCH_TIMEOUT_MS');
    }

    return errors;
}

const FETCH_BUDGET_HEADROOM_MS = 1000;

/**
 * Time the page fetcher may spend per fetch attempt. Kept under the stage timeout so a slow
 * subpage ends the subpage loop instead of timing out the whole attempt.
 */
export function fetchBudgetMs(config: Config): number {
    return Math.max(config.fetchPageTimeoutMs, config.fetchTimeoutMs - FETCH_BUDGET_HEADROOM_MS);
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
