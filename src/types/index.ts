/**
 * Barrel export for all shared types.
 */
export { COMBINED_SOURCE, SOURCE_TAGS } from './paper.js';
export type {
    PaperRecord,
    ProviderTag,
    SourceTag,
    CanonicalKey,
    KeyNamespace,
    CanonicalRecord,
    SeedEntry,
    QueryInfo,
    CitationDocument,
} from './paper.js';
export { EdgeType } from './edge.js';
export type { GraphNode, GraphEdge, CitationGraph, NodePartition } from './edge.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    CociteConfig,
    LogLevel,
    RateLimit,
    FetchConfig,
    CacheConfig,
} from './config.js';
export type { SourceAdapter, SourceAdapterOptions, SourceWork } from './source-adapter.js';
