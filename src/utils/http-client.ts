import type { RateLimit } from '../types/index.js';
import type { ResponseCache } from '../cache/response-cache.js';
import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

const DEFAULT_RATE_LIMIT: RateLimit = { tokensPerSecond: 5, maxBurst: 5 };

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 * Concurrent callers are served one at a time, in call order.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;
    private queue: Promise<void> = Promise.resolve();

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    acquire(): Promise<void> {
        const turn = this.queue.then(() => this.take());
        this.queue = turn;
        return turn;
    }

    private async take(): Promise<void> {
        this.refill();

        if (this.tokens < 1) {
            const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
            await sleep(waitMs);
            this.refill();
        }

        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
    source?: string;  // For per-source rate limiting
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
    fromCache: boolean;
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;

    /** Token bucket per source name; unknown sources get 5/s */
    rateLimits?: Record<string, RateLimit>;

    /** Cache consulted for GET requests */
    cache?: ResponseCache;

    maxRetries?: number;
    initialBackoffMs?: number;
    maxBackoffMs?: number;
}

/**
 * HTTP error with classification.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * Centralized HTTP client with per-source rate limiting, retry logic and an
 * optional response cache.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly rateLimits: Record<string, RateLimit>;
    private readonly cache?: ResponseCache;
    private readonly maxRetries: number;
    private readonly initialBackoff: number;
    private readonly maxBackoff: number;

    constructor(options: HttpClientOptions = {}) {
        this.defaultTimeout = options.timeout ?? 30000;
        const version = options.version ?? '1.0.0';
        const email = options.email ?? 'cocite@example.com';
        this.userAgent = `cocite/${version} (mailto:${email})`;
        this.rateLimits = options.rateLimits ?? {};
        this.cache = options.cache;
        this.maxRetries = options.maxRetries ?? 3;
        this.initialBackoff = options.initialBackoffMs ?? 1000;
        this.maxBackoff = options.maxBackoffMs ?? 30000;
    }

    /**
     * GET a URL with caching, rate limiting and retry.
     */
    async get<T = unknown>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        const {
            headers = {},
            timeout = this.defaultTimeout,
            source = 'default',
        } = options;

        if (this.cache) {
            const cached = this.cache.get(url);
            if (cached !== null) {
                return { status: 200, headers: {}, data: cached as T, ok: true, fromCache: true };
            }
        }

        // Acquire rate limit token
        await this.getBucket(source).acquire();

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        const logger = getLogger();

        for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
            try {
                const controller = new AbortController();
                const timeoutId = setTimeout(() => controller.abort(), timeout);

                let response: Response;
                try {
                    response = await fetch(url, {
                        method: 'GET',
                        headers: requestHeaders,
                        signal: controller.signal,
                    });
                } finally {
                    clearTimeout(timeoutId);
                }

                const contentType = response.headers.get('content-type') ?? '';
                const data: unknown = contentType.includes('application/json')
                    ? await response.json()
                    : await response.text();

                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });

                if (!response.ok) {
                    const retryable = RETRYABLE_STATUS_CODES.has(response.status);

                    if (retryable && attempt < this.maxRetries) {
                        const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
                        const backoff = retryAfter ?? this.calculateBackoff(attempt);

                        logger.warn(
                            { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                            'Retryable HTTP error, backing off'
                        );
                        await sleep(backoff);
                        continue;
                    }

                    throw new HttpError(
                        `HTTP ${response.status}: ${response.statusText}`,
                        response.status,
                        retryable,
                        data
                    );
                }

                if (this.cache) {
                    this.cache.set(url, data);
                }

                return { status: response.status, headers: responseHeaders, data: data as T, ok: true, fromCache: false };
            } catch (error) {
                if (error instanceof HttpError) throw error;

                const code = errorCode(error);
                const retryable = code !== undefined && RETRYABLE_ERROR_CODES.has(code);

                if (retryable && attempt < this.maxRetries) {
                    const backoff = this.calculateBackoff(attempt);
                    logger.warn(
                        { errorCode: code, attempt: attempt + 1, backoffMs: backoff, url },
                        'Retryable network error, backing off'
                    );
                    await sleep(backoff);
                    continue;
                }

                if (error instanceof Error && error.name === 'AbortError') {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
                }

                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable
                );
            }
        }

        throw new HttpError(`Max retries exceeded for ${url}`, 0, false);
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = this.rateLimits[source] ?? DEFAULT_RATE_LIMIT;
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }

    private parseRetryAfter(header: string | null): number | null {
        if (!header) return null;

        // Try parsing as seconds
        const seconds = parseInt(header, 10);
        if (!isNaN(seconds)) return seconds * 1000;

        // Try parsing as HTTP date
        const date = new Date(header);
        if (!isNaN(date.getTime())) {
            return Math.max(0, date.getTime() - Date.now());
        }

        return null;
    }

    private calculateBackoff(attempt: number): number {
        // Exponential backoff with jitter
        const exponential = this.initialBackoff * Math.pow(2, attempt);
        const jitter = Math.random() * exponential * 0.5;
        return Math.min(this.maxBackoff, exponential + jitter);
    }
}

/**
 * System error code of a failed request; undici puts it on `cause`.
 */
function errorCode(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    if ('code' in error && typeof error.code === 'string') return error.code;
    return errorCode(error.cause);
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
