import { describe, it, expect } from 'vitest';
import { buildCitationIndex, buildSeedSet, seedLabel } from '../analysis/citation-indexer.js';
import { analyzeCitations, assertThreshold } from '../analysis/aggregator.js';
import { toCitedDocument, toCitingDocument } from '../analysis/results.js';
import { ConfigError } from '../utils/errors.js';
import type { CitationDocument, PaperRecord, SeedEntry } from '../types/index.js';

function seed(
    doi: string,
    title: string,
    references: PaperRecord[] = [],
    citedBy: PaperRecord[] = []
): SeedEntry {
    return { input_doi: doi, metadata: { title, doi }, references, cited_by: citedBy };
}

function doc(...papers: SeedEntry[]): CitationDocument {
    return { papers };
}

const X: PaperRecord = { title: 'Paper X', year: 2020, doi: '10.1/x' };
const C: PaperRecord = { title: 'Paper C', authors: ['Cee'] };

describe('CitationIndexer', () => {
    describe('seedLabel', () => {
        it('should cut long titles to 60 characters', () => {
            const label = seedLabel({ title: 'T'.repeat(70) });
            expect(label).toBe(`${'T'.repeat(57)}...`);
            expect(label).toHaveLength(60);
        });

        it('should fall back to Unknown', () => {
            expect(seedLabel({ doi: '10.1/x' })).toBe('Unknown');
        });
    });

    describe('buildSeedSet', () => {
        it('should skip entries without metadata or without a key', () => {
            const seedSet = buildSeedSet([
                seed('10.1/a', 'Paper A'),
                { input_doi: '10.1/missing', metadata: null, references: [X], cited_by: [] },
                { input_doi: '10.1/keyless', metadata: { year: 2020 }, references: [X], cited_by: [] },
            ]);

            expect([...seedSet.keys]).toEqual(['title:paper a']);
            expect(seedSet.papers).toHaveLength(1);
        });

        it('should merge entries that share a key and keep the first reference', () => {
            const seedSet = buildSeedSet([
                seed('10.1/a', 'Paper A'),
                { input_doi: '10.1/a-v2', metadata: { title: 'paper a', venue: 'V' }, references: [], cited_by: [] },
            ]);

            expect(seedSet.keys.size).toBe(1);
            expect(seedSet.papers.map((p) => p.ref)).toEqual([
                { doi: '10.1/a', title: 'Paper A' },
                { doi: '10.1/a', title: 'Paper A' },
            ]);
            expect(seedSet.seeds.get('title:paper a')?.record.venue).toBe('V');
        });
    });

    describe('buildCitationIndex', () => {
        it('should count each seed once per paper', () => {
            const seedSet = buildSeedSet([
                seed('10.1/a', 'Paper A', [X, { ...X }]),
                seed('10.1/b', 'Paper B', [{ title: 'paper x', venue: 'V' }, {}]),
            ]);
            const index = buildCitationIndex(seedSet.papers, 'references');

            expect([...index.keys()]).toEqual(['title:paper x']);
            const entry = index.get('title:paper x');
            expect(entry?.contributors.size).toBe(2);
            expect([...(entry?.contributors.values() ?? [])]).toEqual([
                { doi: '10.1/a', title: 'Paper A' },
                { doi: '10.1/b', title: 'Paper B' },
            ]);
        });

        it('should keep the metadata of the first record seen', () => {
            const seedSet = buildSeedSet([
                seed('10.1/a', 'Paper A', [X]),
                seed('10.1/b', 'Paper B', [{ title: 'Paper X', venue: 'V' }]),
            ]);
            const entry = buildCitationIndex(seedSet.papers, 'references').get('title:paper x');

            expect(entry?.record.year).toBe(2020);
            expect(entry?.record.venue).toBeUndefined();
        });

        it('should index the cited_by lists for the citing relation', () => {
            const seedSet = buildSeedSet([seed('10.1/a', 'Paper A', [X], [C])]);
            const index = buildCitationIndex(seedSet.papers, 'cited_by');
            expect([...index.keys()]).toEqual(['title:paper c']);
        });
    });
});

describe('Aggregator', () => {
    // A and B both cite X; C cites A and is not a seed
    const scenario = doc(seed('10.1/a', 'Paper A', [X], [C]), seed('10.1/b', 'Paper B', [X]));

    it('should find papers cited by k seeds with their contributors', () => {
        const analysis = analyzeCitations(scenario, { kCited: 2, kCiting: 1 });

        expect(analysis.cited).toHaveLength(1);
        expect(analysis.cited[0]?.key).toBe('title:paper x');
        expect(analysis.cited[0]?.count).toBe(2);
        expect(analysis.cited[0]?.seeds).toEqual([
            { doi: '10.1/a', title: 'Paper A' },
            { doi: '10.1/b', title: 'Paper B' },
        ]);
    });

    it('should find papers citing k seeds', () => {
        const loose = analyzeCitations(scenario, { kCited: 2, kCiting: 1 });
        expect(loose.citing.map((e) => [e.key, e.count])).toEqual([['title:paper c', 1]]);

        const strict = analyzeCitations(scenario, { kCited: 2, kCiting: 2 });
        expect(strict.citing).toEqual([]);
    });

    it('should not double count a reference listed twice by one seed', () => {
        const analysis = analyzeCitations(doc(seed('10.1/a', 'Paper A', [X, X]), seed('10.1/b', 'Paper B')), {
            kCited: 1,
            kCiting: 1,
        });
        expect(analysis.cited[0]?.count).toBe(1);

        const strict = analyzeCitations(doc(seed('10.1/a', 'Paper A', [X, X]), seed('10.1/b', 'Paper B')), {
            kCited: 2,
            kCiting: 1,
        });
        expect(strict.cited).toEqual([]);
    });

    it('should exclude seed papers from both result lists', () => {
        const selfCiting = doc(
            seed('10.1/a', 'Paper A', [{ title: 'Paper A' }, X], [{ title: 'Paper B' }]),
            seed('10.1/b', 'Paper B', [{ title: 'Paper A' }, X], [{ title: 'Paper A' }])
        );

        for (const k of [1, 2]) {
            const analysis = analyzeCitations(selfCiting, { kCited: k, kCiting: k });
            for (const entry of [...analysis.cited, ...analysis.citing]) {
                expect(analysis.seedSet.keys.has(entry.key)).toBe(false);
                expect(entry.isInSeedSet).toBe(false);
            }
            expect(analysis.cited.map((e) => e.key)).toEqual(['title:paper x']);
            expect(analysis.citing).toEqual([]);
        }
    });

    it('should shrink monotonically as k grows', () => {
        const Y: PaperRecord = { title: 'Paper Y' };
        const Z: PaperRecord = { title: 'Paper Z' };
        const document = doc(
            seed('10.1/a', 'Paper A', [X, Y, Z], [C]),
            seed('10.1/b', 'Paper B', [X, Y], [C]),
            seed('10.1/c', 'Paper Q', [X], [C])
        );

        let previous: Set<string> | undefined;
        for (const k of [1, 2, 3, 4]) {
            const keys = new Set(analyzeCitations(document, { kCited: k, kCiting: k }).cited.map((e) => e.key));
            if (previous) {
                for (const key of keys) expect(previous.has(key)).toBe(true);
            }
            previous = keys;
        }
        expect(previous?.size).toBe(0);
    });

    it('should rank by count, then by title', () => {
        const document = doc(
            seed('10.1/a', 'Paper A', [{ title: 'Beta' }, X, { doi: '10.1/q' }]),
            seed('10.1/b', 'Paper B', [X, { title: 'Alpha' }])
        );
        const analysis = analyzeCitations(document, { kCited: 1, kCiting: 1 });

        expect(analysis.cited.map((e) => e.key)).toEqual(['title:paper x', 'doi:10.1/q', 'title:alpha', 'title:beta']);
    });

    it('should keep index order for entries equal on count and title', () => {
        const document = doc(seed('10.1/a', 'Paper A', [{ doi: '10.1/z' }, { doi: '10.1/y' }]));
        const analysis = analyzeCitations(document, { kCited: 1, kCiting: 1 });

        expect(analysis.cited.map((e) => e.key)).toEqual(['doi:10.1/z', 'doi:10.1/y']);
    });

    it('should order titles by code point', () => {
        // U+FF21 sorts before U+1F600, although its UTF-16 unit is larger than the high surrogate
        const document = doc(seed('10.1/a', 'Paper A', [{ title: '\u{1F600} Smile' }, { title: 'Ａ Wide' }]));
        const analysis = analyzeCitations(document, { kCited: 1, kCiting: 1 });

        expect(analysis.cited.map((e) => e.record.title)).toEqual(['Ａ Wide', '\u{1F600} Smile']);
    });

    it('should return empty results for an empty document', () => {
        const analysis = analyzeCitations(doc(), { kCited: 2, kCiting: 2 });
        expect(analysis.cited).toEqual([]);
        expect(analysis.citing).toEqual([]);
        expect(analysis.seedSet.keys.size).toBe(0);
    });

    it('should reject thresholds that are not positive integers', () => {
        expect(() => analyzeCitations(scenario, { kCited: 0, kCiting: 2 })).toThrow(ConfigError);
        expect(() => assertThreshold('kCiting', 1.5)).toThrow(ConfigError);
        expect(() => assertThreshold('kCiting', 1)).not.toThrow();
    });
});

describe('Result documents', () => {
    const scenario = doc(seed('10.1/a', 'Paper A', [X], [C]), seed('10.1/b', 'Paper B', [X]));
    const analysis = analyzeCitations(scenario, { kCited: 2, kCiting: 1 });

    it('should serialize the cited list', () => {
        expect(toCitedDocument(analysis.cited, 2)).toEqual({
            description: 'Papers cited by at least 2 papers from the seed set',
            k_cited: 2,
            count: 1,
            papers: [
                {
                    key: 'title:paper x',
                    doi: '10.1/x',
                    arxiv_id: '',
                    title: 'Paper X',
                    authors: [],
                    year: 2020,
                    venue: '',
                    c_in: 2,
                    cited_by_seed_papers: [
                        { doi: '10.1/a', title: 'Paper A' },
                        { doi: '10.1/b', title: 'Paper B' },
                    ],
                    is_in_seed_set: false,
                },
            ],
        });
    });

    it('should serialize the citing list with fields in order', () => {
        const document = toCitingDocument(analysis.citing, 1);

        expect(document.description).toBe('Papers citing at least 1 papers from the seed set');
        expect(document.papers[0]).toEqual({
            key: 'title:paper c',
            doi: '',
            arxiv_id: '',
            title: 'Paper C',
            authors: ['Cee'],
            year: null,
            venue: '',
            c_out: 1,
            cites_seed_papers: [{ doi: '10.1/a', title: 'Paper A' }],
            is_in_seed_set: false,
        });
        expect(Object.keys(document.papers[0] ?? {})).toEqual([
            'key',
            'doi',
            'arxiv_id',
            'title',
            'authors',
            'year',
            'venue',
            'c_out',
            'cites_seed_papers',
            'is_in_seed_set',
        ]);
    });
});
