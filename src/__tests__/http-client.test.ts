import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { HttpClient, HttpError } from '../utils/http-client.js';
import { ResponseCache } from '../cache/response-cache.js';

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json', ...headers },
    });
}

const FAST = { maxRetries: 3, initialBackoffMs: 1, maxBackoffMs: 5 };

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        client = new HttpClient({ timeout: 5000, version: '1.2.3', email: 'test@example.com', ...FAST });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    describe('responses', () => {
        it('should parse JSON and send the user agent', async () => {
            const mockFetch = vi.fn(async () => jsonResponse({ id: 'W1' }));
            vi.stubGlobal('fetch', mockFetch);

            const response = await client.get<{ id: string }>('https://api.example.com/works/W1');

            expect(response.data).toEqual({ id: 'W1' });
            expect(response.ok).toBe(true);
            expect(response.fromCache).toBe(false);
            expect(mockFetch).toHaveBeenCalledWith(
                'https://api.example.com/works/W1',
                expect.objectContaining({
                    method: 'GET',
                    headers: expect.objectContaining({ 'User-Agent': 'cocite/1.2.3 (mailto:test@example.com)' }),
                })
            );
        });

        it('should send bodiless GET requests with caller headers', async () => {
            const mockFetch = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({}));
            vi.stubGlobal('fetch', mockFetch);

            await client.get('https://api.example.com/works/W2', { headers: { 'x-api-key': 'test-key' } });

            const init = mockFetch.mock.calls[0]?.[1];
            expect(init?.method).toBe('GET');
            expect(init?.body).toBeUndefined();
            expect(init?.headers).toEqual({
                'User-Agent': 'cocite/1.2.3 (mailto:test@example.com)',
                'x-api-key': 'test-key',
            });
        });

        it('should return text bodies as strings', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('plain', { status: 200 })));
            const response = await client.get('https://api.example.com/text');
            expect(response.data).toBe('plain');
        });

        it('should not retry a 404', async () => {
            const mockFetch = vi.fn(async () => jsonResponse({ error: 'missing' }, 404));
            vi.stubGlobal('fetch', mockFetch);

            const error = await client.get('https://api.example.com/missing').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({ status: 404, retryable: false, response: { error: 'missing' } });
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });
    });

    describe('retries', () => {
        it('should retry server errors and succeed', async () => {
            const mockFetch = vi
                .fn()
                .mockResolvedValueOnce(jsonResponse({}, 503))
                .mockResolvedValueOnce(jsonResponse({ done: true }));
            vi.stubGlobal('fetch', mockFetch);

            const response = await client.get('https://api.example.com/flaky');

            expect(response.data).toEqual({ done: true });
            expect(mockFetch).toHaveBeenCalledTimes(2);
        });

        it('should honor Retry-After on 429', async () => {
            const mockFetch = vi
                .fn()
                .mockResolvedValueOnce(jsonResponse({}, 429, { 'retry-after': '0' }))
                .mockResolvedValueOnce(jsonResponse({ done: true }));
            vi.stubGlobal('fetch', mockFetch);

            const response = await client.get('https://api.example.com/limited');
            expect(response.status).toBe(200);
            expect(mockFetch).toHaveBeenCalledTimes(2);
        });

        it('should give up after the last retry', async () => {
            const limited = new HttpClient({ ...FAST, maxRetries: 1 });
            const mockFetch = vi.fn(async () => jsonResponse({}, 500));
            vi.stubGlobal('fetch', mockFetch);

            await expect(limited.get('https://api.example.com/down')).rejects.toMatchObject({
                name: 'HttpError',
                status: 500,
                retryable: true,
            });
            expect(mockFetch).toHaveBeenCalledTimes(2);
        });

        it('should retry network errors carrying a retryable code on their cause', async () => {
            const reset = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
            const mockFetch = vi
                .fn()
                .mockRejectedValueOnce(new TypeError('fetch failed', { cause: reset }))
                .mockResolvedValueOnce(jsonResponse({ done: true }));
            vi.stubGlobal('fetch', mockFetch);

            const response = await client.get('https://api.example.com/reset');
            expect(response.data).toEqual({ done: true });
            expect(mockFetch).toHaveBeenCalledTimes(2);
        });

        it('should wrap other network errors', async () => {
            vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('boom')));

            await expect(client.get('https://api.example.com/boom')).rejects.toMatchObject({
                message: 'Network error: boom',
                status: 0,
                retryable: false,
            });
        });
    });

    describe('caching', () => {
        let dir: string;

        beforeEach(() => {
            dir = mkdtempSync(join(tmpdir(), 'cocite-http-'));
        });

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true });
        });

        it('should answer repeated GETs from the cache', async () => {
            const cached = new HttpClient({ ...FAST, cache: new ResponseCache({ cacheDir: dir }) });
            const mockFetch = vi.fn(async () => jsonResponse({ id: 'W1' }));
            vi.stubGlobal('fetch', mockFetch);

            const first = await cached.get('https://api.example.com/works/W1', { source: 'openalex' });
            const second = await cached.get('https://api.example.com/works/W1', { source: 'openalex' });

            expect(first.fromCache).toBe(false);
            expect(second.fromCache).toBe(true);
            expect(second.data).toEqual({ id: 'W1' });
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should not cache failed responses', async () => {
            const cached = new HttpClient({ ...FAST, maxRetries: 0, cache: new ResponseCache({ cacheDir: dir }) });
            const mockFetch = vi.fn(async () => jsonResponse({}, 404));
            vi.stubGlobal('fetch', mockFetch);

            await expect(cached.get('https://api.example.com/missing')).rejects.toBeInstanceOf(HttpError);
            await expect(cached.get('https://api.example.com/missing')).rejects.toBeInstanceOf(HttpError);
            expect(mockFetch).toHaveBeenCalledTimes(2);
        });
    });

    describe('rate limiting', () => {
        it('should throttle requests based on source rate limits', async () => {
            const throttled = new HttpClient({
                ...FAST,
                rateLimits: { slow: { tokensPerSecond: 4, maxBurst: 1 } },
            });
            const mockFetch = vi.fn(async () => jsonResponse({ data: 'ok' }));
            vi.stubGlobal('fetch', mockFetch);

            const start = Date.now();

            // One token up front, then one every 250ms
            await Promise.all([
                throttled.get('https://api.example.com/1', { source: 'slow' }),
                throttled.get('https://api.example.com/2', { source: 'slow' }),
                throttled.get('https://api.example.com/3', { source: 'slow' }),
            ]);

            const elapsed = Date.now() - start;
            expect(elapsed).toBeGreaterThanOrEqual(450);
            expect(mockFetch).toHaveBeenCalledTimes(3);
        });
    });

    describe('HttpError', () => {
        it('should carry status, retryable flag and response data', () => {
            const error = new HttpError('Bad Request', 400, false, { error: 'bad request' });
            expect(error.name).toBe('HttpError');
            expect(error.status).toBe(400);
            expect(error.retryable).toBe(false);
            expect(error.response).toEqual({ error: 'bad request' });
        });
    });
});
