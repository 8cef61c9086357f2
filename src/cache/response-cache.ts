import { mkdirSync, existsSync, readFileSync, readdirSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import { getLogger } from '../utils/logger.js';

interface CacheEntry {
    timestamp: number;
    url: string;
    data: unknown;
}

/**
 * File-system cache for provider responses.
 * Stores one JSON file per URL in the cache directory.
 *
 * Cache key = SHA-256 of the URL.
 * TTL = 24 hours by default.
 */
export class ResponseCache {
    private cacheDir: string;
    private ttlMs: number;
    private enabled: boolean;

    constructor(options: {
        cacheDir?: string;
        ttlHours?: number;
        enabled?: boolean;
    } = {}) {
        this.cacheDir = options.cacheDir ?? '.cocite-cache';
        this.ttlMs = (options.ttlHours ?? 24) * 60 * 60 * 1000;
        this.enabled = options.enabled ?? true;

        if (this.enabled) {
            mkdirSync(this.cacheDir, { recursive: true });
            getLogger().debug({ cacheDir: this.cacheDir }, 'Cache initialized');
        }
    }

    private makeKey(url: string): string {
        return createHash('sha256').update(url).digest('hex');
    }

    private entryPath(url: string): string {
        return join(this.cacheDir, `${this.makeKey(url)}.json`);
    }

    /**
     * Get a cached response, or null if not found/expired/unreadable.
     */
    get(url: string): unknown {
        if (!this.enabled) return null;

        const filePath = this.entryPath(url);
        if (!existsSync(filePath)) return null;

        let entry: CacheEntry;
        try {
            entry = JSON.parse(readFileSync(filePath, 'utf-8')) as CacheEntry;
        } catch (error) {
            getLogger().warn({ filePath, error }, 'Ignoring unreadable cache entry');
            return null;
        }

        if (Date.now() - entry.timestamp > this.ttlMs) {
            getLogger().debug({ url: url.slice(0, 80) }, 'Cache expired');
            return null;
        }

        getLogger().debug({ url: url.slice(0, 80) }, 'Cache hit');
        return entry.data;
    }

    /**
     * Store a response in the cache.
     */
    set(url: string, data: unknown): void {
        if (!this.enabled) return;

        const entry: CacheEntry = {
            timestamp: Date.now(),
            url: url.slice(0, 200), // truncated, for debugging only
            data,
        };

        try {
            writeFileSync(this.entryPath(url), JSON.stringify(entry), 'utf-8');
        } catch (error) {
            getLogger().warn({ error }, 'Failed to write cache entry');
        }
    }

    /**
     * Check if a URL is cached and not expired.
     */
    has(url: string): boolean {
        return this.get(url) !== null;
    }

    /**
     * Remove every cached entry.
     */
    clear(): void {
        rmSync(this.cacheDir, { recursive: true, force: true });
        if (this.enabled) {
            mkdirSync(this.cacheDir, { recursive: true });
        }
    }

    /**
     * Get cache stats.
     */
    getStats(): { enabled: boolean; directory: string; entries: number; bytes: number } {
        let entries = 0;
        let bytes = 0;

        if (existsSync(this.cacheDir)) {
            for (const file of readdirSync(this.cacheDir)) {
                if (!file.endsWith('.json')) continue;
                entries++;
                bytes += statSync(join(this.cacheDir, file)).size;
            }
        }

        return { enabled: this.enabled, directory: this.cacheDir, entries, bytes };
    }
}
