import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type CacheConfig, type CociteConfig, type FetchConfig, type LogLevel } from '../types/index.js';
import { getLogger, parseLogLevel } from './logger.js';

const RateLimitSchema = z.object({
    tokensPerSecond: z.number().positive(),
    maxBurst: z.number().int().positive(),
});

/**
 * Shape of cocite.config.json. Every key is optional; unknown keys are rejected.
 */
const FileConfigSchema = z
    .object({
        kCited: z.number().int().positive(),
        kCiting: z.number().int().positive(),
        logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
        jsonLogs: z.boolean(),
        fetch: z
            .object({
                maxCiting: z.number().int().positive(),
                maxReferences: z.number().int().positive(),
                timeoutMs: z.number().int().positive(),
                email: z.string().email(),
                rateLimits: z
                    .object({
                        openalex: RateLimitSchema,
                        semantic_scholar: RateLimitSchema,
                    })
                    .partial()
                    .strict(),
            })
            .partial()
            .strict(),
        cache: z
            .object({
                enabled: z.boolean(),
                dir: z.string().min(1),
                ttlHours: z.number().positive(),
            })
            .partial()
            .strict(),
    })
    .partial()
    .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

/**
 * Values that override the config file, usually from CLI flags.
 */
export interface ConfigOverrides {
    kCited?: number;
    kCiting?: number;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
    fetch?: Partial<Omit<FetchConfig, 'rateLimits'>>;
    cache?: Partial<CacheConfig>;
}

export interface ResolveOptions {
    /** Directory to start the config file search from (default: cwd) */
    searchFrom?: string;
}

/**
 * Load configuration from cocite.config.json using cosmiconfig.
 * Returns null if no config file is found, or if it is unreadable or invalid;
 * defaults are used in that case.
 */
export async function loadConfigFile(searchFrom?: string): Promise<FileConfig | null> {
    const explorer = cosmiconfig('cocite', {
        searchPlaces: ['cocite.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (!result || result.isEmpty) return null;

        const parsed = FileConfigSchema.safeParse(result.config);
        if (!parsed.success) {
            getLogger().warn(
                {
                    path: result.filepath,
                    issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
                },
                'Invalid config file, using defaults'
            );
            return null;
        }

        getLogger().debug({ path: result.filepath }, 'Loaded config file');
        return parsed.data;
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 * API keys are read where needed (see `getApiKey`), not stored in config.
 */
function loadEnvVars(): ConfigOverrides {
    const env: ConfigOverrides = {};

    const logLevel = parseLogLevel(process.env['COCITE_LOG_LEVEL']);
    if (logLevel) env.logLevel = logLevel;

    const email = process.env['OPENALEX_EMAIL'];
    if (email) env.fetch = { email };

    return env;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: ResolveOptions = {}
): Promise<CociteConfig> {
    const file = await loadConfigFile(options.searchFrom);
    const env = loadEnvVars();
    const defaults = DEFAULT_CONFIG;

    return {
        kCited: cliFlags.kCited ?? file?.kCited ?? defaults.kCited,
        kCiting: cliFlags.kCiting ?? file?.kCiting ?? defaults.kCiting,
        logLevel: cliFlags.logLevel ?? env.logLevel ?? file?.logLevel ?? defaults.logLevel,
        jsonLogs: cliFlags.jsonLogs ?? file?.jsonLogs ?? defaults.jsonLogs,
        // Deep merge nested objects
        fetch: {
            maxCiting: cliFlags.fetch?.maxCiting ?? file?.fetch?.maxCiting ?? defaults.fetch.maxCiting,
            maxReferences: cliFlags.fetch?.maxReferences ?? file?.fetch?.maxReferences ?? defaults.fetch.maxReferences,
            timeoutMs: cliFlags.fetch?.timeoutMs ?? file?.fetch?.timeoutMs ?? defaults.fetch.timeoutMs,
            email: cliFlags.fetch?.email ?? env.fetch?.email ?? file?.fetch?.email ?? defaults.fetch.email,
            rateLimits: {
                openalex: file?.fetch?.rateLimits?.openalex ?? defaults.fetch.rateLimits.openalex,
                semantic_scholar:
                    file?.fetch?.rateLimits?.semantic_scholar ?? defaults.fetch.rateLimits.semantic_scholar,
            },
        },
        cache: {
            enabled: cliFlags.cache?.enabled ?? file?.cache?.enabled ?? defaults.cache.enabled,
            dir: cliFlags.cache?.dir ?? file?.cache?.dir ?? defaults.cache.dir,
            ttlHours: cliFlags.cache?.ttlHours ?? file?.cache?.ttlHours ?? defaults.cache.ttlHours,
        },
    };
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name] || undefined;
}
