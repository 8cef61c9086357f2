import type { CanonicalKey, CanonicalRecord, CitationDocument } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { compareCodePoints } from '../utils/text.js';
import {
    buildCitationIndex,
    buildSeedSet,
    type CitationIndex,
    type SeedRef,
    type SeedSet,
} from './citation-indexer.js';

/**
 * Candidate paper that passed the threshold, with the seeds it relates to.
 */
export interface AggregatedEntry {
    key: CanonicalKey;
    record: CanonicalRecord;

    /** c_in for references, c_out for citing papers */
    count: number;

    /** Contributing seeds in first-seen order */
    seeds: SeedRef[];

    /** Always false: seed papers are excluded before ranking */
    isInSeedSet: false;
}

export interface ThresholdOptions {
    kCited: number;
    kCiting: number;
}

export interface CitationAnalysis extends ThresholdOptions {
    seedSet: SeedSet;
    referenceIndex: CitationIndex;
    citingIndex: CitationIndex;

    /** R_k: papers outside the seed set cited by at least kCited seeds */
    cited: AggregatedEntry[];

    /** Q_k': papers outside the seed set citing at least kCiting seeds */
    citing: AggregatedEntry[];
}

/**
 * Throw a ConfigError unless the threshold is a positive integer.
 */
export function assertThreshold(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 1) {
        throw new ConfigError(`${name} must be a positive integer, got ${value}`);
    }
}

/**
 * Order entries by count (descending), then title (ascending, by code point).
 * Entries equal on both keep their index order.
 */
export function compareEntries(a: AggregatedEntry, b: AggregatedEntry): number {
    if (a.count !== b.count) return b.count - a.count;

    return compareCodePoints(a.record.title ?? '', b.record.title ?? '');
}

/**
 * Keep the index entries outside the seed set whose contributor count is at
 * least `k`, ranked by count then title.
 */
export function rankIndex(
    index: CitationIndex,
    seedKeys: ReadonlySet<CanonicalKey>,
    k: number
): AggregatedEntry[] {
    const entries: AggregatedEntry[] = [];

    for (const entry of index.values()) {
        if (seedKeys.has(entry.key)) continue;

        const count = entry.contributors.size;
        if (count < k) continue;

        entries.push({
            key: entry.key,
            record: entry.record,
            count,
            seeds: [...entry.contributors.values()],
            isInSeedSet: false,
        });
    }

    return entries.sort(compareEntries);
}

/**
 * Run the full analysis over a citation document: seed set, both citation
 * indices and both ranked result lists.
 */
export function analyzeCitations(document: CitationDocument, options: ThresholdOptions): CitationAnalysis {
    const { kCited, kCiting } = options;
    assertThreshold('kCited', kCited);
    assertThreshold('kCiting', kCiting);

    const seedSet = buildSeedSet(document.papers);
    const referenceIndex = buildCitationIndex(seedSet.papers, 'references');
    const citingIndex = buildCitationIndex(seedSet.papers, 'cited_by');

    const cited = rankIndex(referenceIndex, seedSet.keys, kCited);
    const citing = rankIndex(citingIndex, seedSet.keys, kCiting);

    getLogger().info(
        {
            entries: document.papers.length,
            seeds: seedSet.keys.size,
            references: referenceIndex.size,
            citingPapers: citingIndex.size,
            cited: cited.length,
            citing: citing.length,
        },
        'Citation analysis complete'
    );

    return { kCited, kCiting, seedSet, referenceIndex, citingIndex, cited, citing };
}
