import type { CanonicalKey, CanonicalRecord, PaperRecord, SeedEntry } from '../types/index.js';
import { presentString, resolveKey } from '../identity/key-resolver.js';
import { mergeRecords } from '../identity/record-merger.js';
import { truncate } from '../utils/text.js';
import { getLogger } from '../utils/logger.js';

/** Maximum length of a seed paper label in result documents. */
export const SEED_LABEL_LENGTH = 60;

/**
 * How a seed paper is referred to in result documents.
 */
export interface SeedRef {
    /** The DOI the user supplied for the seed */
    doi: string;
    /** Seed title, shortened for display */
    title: string;
}

/**
 * One input entry that made it into the seed set, with its relation lists.
 */
export interface SeedPaper {
    key: CanonicalKey;
    ref: SeedRef;
    references: readonly PaperRecord[];
    citedBy: readonly PaperRecord[];
}

/**
 * Seed metadata after merging every entry that resolved to the same key.
 */
export interface SeedInfo {
    key: CanonicalKey;
    ref: SeedRef;
    record: CanonicalRecord;
}

export interface SeedSet {
    keys: ReadonlySet<CanonicalKey>;
    seeds: ReadonlyMap<CanonicalKey, SeedInfo>;
    /** Entries in input order; several may share a key */
    papers: readonly SeedPaper[];
}

export type Relation = 'references' | 'cited_by';

export interface IndexEntry {
    key: CanonicalKey;

    /** Metadata of the first record seen for this key */
    record: CanonicalRecord;

    /** Seeds related to this paper, keyed by seed key, in first-seen order */
    contributors: Map<CanonicalKey, SeedRef>;
}

/** Insertion-ordered index of candidate papers for one relation. */
export type CitationIndex = Map<CanonicalKey, IndexEntry>;

/**
 * Readable label for a seed paper: its title cut to 60 characters, or "Unknown".
 */
export function seedLabel(metadata: PaperRecord): string {
    return truncate(presentString(metadata.title) ?? 'Unknown', SEED_LABEL_LENGTH);
}

/**
 * Build the seed set from the document entries.
 *
 * Entries without metadata, or whose metadata has no identity key, are not
 * seeds and their relation lists are ignored. Entries sharing a key are one
 * seed: their metadata is merged and the first entry's reference is kept.
 */
export function buildSeedSet(entries: readonly SeedEntry[]): SeedSet {
    const logger = getLogger();
    const papers: SeedPaper[] = [];
    const groups = new Map<CanonicalKey, { ref: SeedRef; records: PaperRecord[] }>();

    for (const entry of entries) {
        if (!entry.metadata) {
            logger.debug({ inputDoi: entry.input_doi }, 'Seed entry has no metadata, skipping');
            continue;
        }

        const key = resolveKey(entry.metadata);
        if (key === undefined) {
            logger.debug({ inputDoi: entry.input_doi }, 'Seed metadata has no identity key, skipping');
            continue;
        }

        let group = groups.get(key);
        if (group) {
            group.records.push(entry.metadata);
        } else {
            group = { ref: { doi: entry.input_doi, title: seedLabel(entry.metadata) }, records: [entry.metadata] };
            groups.set(key, group);
        }

        papers.push({ key, ref: group.ref, references: entry.references, citedBy: entry.cited_by });
    }

    const seeds = new Map<CanonicalKey, SeedInfo>();
    for (const [key, group] of groups) {
        seeds.set(key, { key, ref: group.ref, record: mergeRecords(group.records) });
    }

    return { keys: new Set(seeds.keys()), seeds, papers };
}

/**
 * The records a seed paper lists for a relation.
 */
export function relatedRecords(paper: SeedPaper, relation: Relation): readonly PaperRecord[] {
    return relation === 'references' ? paper.references : paper.citedBy;
}

/**
 * Index every paper related to the seeds through one relation.
 *
 * Each resolvable record gets an entry created from the first record seen
 * for its key. The seed is added to the entry's contributor set, so a seed
 * listing the same paper twice still counts once.
 */
export function buildCitationIndex(papers: readonly SeedPaper[], relation: Relation): CitationIndex {
    const index: CitationIndex = new Map();
    let unresolved = 0;

    for (const paper of papers) {
        for (const record of relatedRecords(paper, relation)) {
            const key = resolveKey(record);
            if (key === undefined) {
                unresolved++;
                continue;
            }

            let entry = index.get(key);
            if (!entry) {
                entry = { key, record: mergeRecords([record]), contributors: new Map() };
                index.set(key, entry);
            }

            if (!entry.contributors.has(paper.key)) {
                entry.contributors.set(paper.key, paper.ref);
            }
        }
    }

    getLogger().debug({ relation, entries: index.size, unresolved }, 'Citation index built');
    return index;
}
