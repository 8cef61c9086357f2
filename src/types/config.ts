import type { ProviderTag } from './paper.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Token bucket settings for one provider.
 */
export interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

/**
 * Source fetcher configuration.
 */
export interface FetchConfig {
    /** Maximum citing works collected per seed paper and provider */
    maxCiting: number;

    /** Maximum references collected per seed paper and provider */
    maxReferences: number;

    /** Per-request timeout */
    timeoutMs: number;

    /** Contact email for the OpenAlex polite pool */
    email?: string;

    rateLimits: Record<ProviderTag, RateLimit>;
}

/**
 * Response cache configuration.
 */
export interface CacheConfig {
    enabled: boolean;
    dir: string;
    ttlHours: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface CociteConfig {
    // Thresholds
    kCited: number;
    kCiting: number;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    // Fetcher
    fetch: FetchConfig;

    // Cache
    cache: CacheConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CociteConfig = {
    kCited: 2,
    kCiting: 2,
    logLevel: 'info',
    jsonLogs: false,
    fetch: {
        maxCiting: 500,
        maxReferences: 500,
        timeoutMs: 30000,
        rateLimits: {
            openalex: { tokensPerSecond: 10, maxBurst: 10 },
            semantic_scholar: { tokensPerSecond: 1, maxBurst: 1 },
        },
    },
    cache: {
        enabled: true,
        dir: '.cocite-cache',
        ttlHours: 24,
    },
};
