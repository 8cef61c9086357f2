import type { CanonicalKey } from '../types/index.js';
import type { AggregatedEntry } from './aggregator.js';
import type { SeedRef } from './citation-indexer.js';

// ─── Output shapes ───────────────────────────────────────

interface ResultPaperBase {
    key: CanonicalKey;
    doi: string;
    arxiv_id: string;
    title: string;
    authors: string[];
    year: number | null;
    venue: string;
    is_in_seed_set: false;
}

export interface CitedPaperJson extends ResultPaperBase {
    c_in: number;
    cited_by_seed_papers: SeedRef[];
}

export interface CitingPaperJson extends ResultPaperBase {
    c_out: number;
    cites_seed_papers: SeedRef[];
}

export interface CitedResultDocument {
    description: string;
    k_cited: number;
    count: number;
    papers: CitedPaperJson[];
}

export interface CitingResultDocument {
    description: string;
    k_citing: number;
    count: number;
    papers: CitingPaperJson[];
}

// ─── Serialization ───────────────────────────────────────

function toBase(entry: AggregatedEntry): Omit<ResultPaperBase, 'is_in_seed_set'> {
    const { record } = entry;
    return {
        key: entry.key,
        doi: record.doi ?? '',
        arxiv_id: record.arxiv_id ?? '',
        title: record.title ?? '',
        authors: record.authors ? [...record.authors] : [],
        year: record.year ?? null,
        venue: record.venue ?? '',
    };
}

/**
 * Result document for R_k, the papers cited by at least `k` seed papers.
 */
export function toCitedDocument(entries: readonly AggregatedEntry[], k: number): CitedResultDocument {
    return {
        description: `Papers cited by at least ${k} papers from the seed set`,
        k_cited: k,
        count: entries.length,
        papers: entries.map((entry) => ({
            ...toBase(entry),
            c_in: entry.count,
            cited_by_seed_papers: entry.seeds.map((seed) => ({ ...seed })),
            is_in_seed_set: entry.isInSeedSet,
        })),
    };
}

/**
 * Result document for Q_k', the papers citing at least `k` seed papers.
 */
export function toCitingDocument(entries: readonly AggregatedEntry[], k: number): CitingResultDocument {
    return {
        description: `Papers citing at least ${k} papers from the seed set`,
        k_citing: k,
        count: entries.length,
        papers: entries.map((entry) => ({
            ...toBase(entry),
            c_out: entry.count,
            cites_seed_papers: entry.seeds.map((seed) => ({ ...seed })),
            is_in_seed_set: entry.isInSeedSet,
        })),
    };
}
