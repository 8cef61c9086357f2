import { describe, it, expect } from 'vitest';
import { COMBINED_SOURCE, DEFAULT_CONFIG, EdgeType, SOURCE_TAGS } from '../types/index.js';

describe('Types', () => {
    describe('EdgeType', () => {
        it('should have a single cites relation', () => {
            expect(Object.values(EdgeType)).toEqual(['cites']);
        });
    });

    describe('SOURCE_TAGS', () => {
        it('should list both providers and the combined marker', () => {
            expect(SOURCE_TAGS).toEqual(['openalex', 'semantic_scholar', 'openalex+semantic_scholar']);
            expect(SOURCE_TAGS).toContain(COMBINED_SOURCE);
        });
    });

    describe('DEFAULT_CONFIG', () => {
        it('should require two seeds for both thresholds', () => {
            expect(DEFAULT_CONFIG.kCited).toBe(2);
            expect(DEFAULT_CONFIG.kCiting).toBe(2);
        });

        it('should cap relation lists at 500 per provider', () => {
            expect(DEFAULT_CONFIG.fetch.maxCiting).toBe(500);
            expect(DEFAULT_CONFIG.fetch.maxReferences).toBe(500);
        });

        it('should rate-limit Semantic Scholar to one request per second', () => {
            expect(DEFAULT_CONFIG.fetch.rateLimits.semantic_scholar).toEqual({ tokensPerSecond: 1, maxBurst: 1 });
        });

        it('should cache responses for 24 hours by default', () => {
            expect(DEFAULT_CONFIG.cache).toEqual({ enabled: true, dir: '.cocite-cache', ttlHours: 24 });
        });
    });
});
