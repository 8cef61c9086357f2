import { describe, it, expect } from 'vitest';
import {
    extractArxivIdFromDoi,
    keyNamespace,
    normalizeTitle,
    presentString,
    resolveKey,
} from '../identity/key-resolver.js';
import { mergeRecordLists, mergeRecords, toPaperRecord } from '../identity/record-merger.js';
import { COMBINED_SOURCE, type PaperRecord } from '../types/index.js';

describe('KeyResolver', () => {
    describe('normalizeTitle', () => {
        it('should lowercase and collapse punctuation variants', () => {
            expect(normalizeTitle('Deep Learning: A Survey')).toBe('deep learning a survey');
            expect(normalizeTitle('deep learning - a  survey')).toBe('deep learning a survey');
        });

        it('should replace smart quotes and dashes', () => {
            expect(normalizeTitle('It’s “Attention”—All')).toBe('it s attention all');
        });

        it('should cut titles to 150 characters', () => {
            const title = 'x'.repeat(200);
            expect(normalizeTitle(title)).toHaveLength(150);
        });

        it('should cut by code points without splitting surrogate pairs', () => {
            const key = normalizeTitle(`${'a'.repeat(149)}\u{1D4AA}bc`);

            expect(key).toBe(`${'a'.repeat(149)}\u{1D4AA}`);
            expect(Array.from(key)).toHaveLength(150);
        });

        it('should be idempotent when the cut lands on a space', () => {
            const once = normalizeTitle(`${'a'.repeat(149)} b`);
            expect(once).toBe('a'.repeat(149));
            expect(normalizeTitle(once)).toBe(once);
        });

        it('should return an empty string for missing titles', () => {
            expect(normalizeTitle(undefined)).toBe('');
            expect(normalizeTitle('')).toBe('');
        });
    });

    describe('extractArxivIdFromDoi', () => {
        it('should extract the ID from an arXiv DOI regardless of case', () => {
            expect(extractArxivIdFromDoi('10.48550/arXiv.2201.05125')).toBe('2201.05125');
            expect(extractArxivIdFromDoi('10.48550/ARXIV.2201.05125')).toBe('2201.05125');
        });

        it('should return undefined for other DOIs', () => {
            expect(extractArxivIdFromDoi('10.1145/3292500')).toBeUndefined();
            expect(extractArxivIdFromDoi(undefined)).toBeUndefined();
        });
    });

    describe('presentString', () => {
        it('should treat blank strings and non-strings as absent', () => {
            expect(presentString('  ')).toBeUndefined();
            expect(presentString(42)).toBeUndefined();
            expect(presentString(' x ')).toBe('x');
        });
    });

    describe('resolveKey', () => {
        it('should prefer the normalized title', () => {
            expect(resolveKey({ title: 'Paper A', doi: '10.1/x' })).toBe('title:paper a');
        });

        it('should give titles that differ only after 150 characters the same key', () => {
            const prefix = 'x'.repeat(150);
            const first = resolveKey({ title: `${prefix} first edition`, doi: '10.1/first' });
            const second = resolveKey({ title: `${prefix} second edition`, doi: '10.1/second' });

            expect(first).toBe(`title:${prefix}`);
            expect(second).toBe(first);
        });

        it('should take the arXiv ID from an arXiv DOI before arxiv_id', () => {
            expect(resolveKey({ doi: '10.48550/arXiv.2201.05125', arxiv_id: '9999.00001' })).toBe(
                'arxiv:2201.05125'
            );
        });

        it('should lowercase and trim identifiers', () => {
            expect(resolveKey({ arxiv_id: ' 2301.00001V2 ' })).toBe('arxiv:2301.00001v2');
            expect(resolveKey({ doi: '10.1/XYZ' })).toBe('doi:10.1/xyz');
            expect(resolveKey({ s2_id: 'ABC' })).toBe('s2:abc');
        });

        it('should fall through titles that normalize to nothing', () => {
            expect(resolveKey({ title: '::', doi: '10.1/a' })).toBe('doi:10.1/a');
            expect(resolveKey({ title: '   ', doi: '', s2_id: 'S1' })).toBe('s2:s1');
        });

        it('should return undefined when no identifier is present', () => {
            expect(resolveKey({})).toBeUndefined();
            expect(resolveKey({ year: 2020, authors: ['Ann'] })).toBeUndefined();
        });

        it('should give the same paper different keys as identifiers are added', () => {
            // Keys are not stable across enrichment unless a title unifies them
            expect(resolveKey({ openalex_id: 'W123' })).toBe('openalex:w123');
            expect(resolveKey({ openalex_id: 'W123', doi: '10.1/xyz' })).toBe('doi:10.1/xyz');
        });

        it('should be deterministic', () => {
            const record: PaperRecord = { title: 'Graph Neural Networks: A Review', doi: '10.1/gnn' };
            expect(resolveKey(record)).toBe(resolveKey({ ...record }));
        });
    });

    describe('keyNamespace', () => {
        it('should return the key prefix', () => {
            expect(keyNamespace('doi:10.1/x')).toBe('doi');
            expect(keyNamespace('title:paper a')).toBe('title');
        });

        it('should return undefined for unknown prefixes', () => {
            expect(keyNamespace('isbn:123')).toBeUndefined();
            expect(keyNamespace('bogus')).toBeUndefined();
        });
    });
});

describe('RecordMerger', () => {
    describe('mergeRecords', () => {
        it('should fill fields missing from one record with the other', () => {
            const merged = mergeRecords([
                { title: 'Paper X', year: 2020, source: 'openalex' },
                { title: 'paper x', venue: 'NeurIPS', source: 'semantic_scholar' },
            ]);

            expect(merged).toEqual({
                title: 'Paper X',
                year: 2020,
                venue: 'NeurIPS',
                source: COMBINED_SOURCE,
            });
        });

        it('should keep the first value when records disagree', () => {
            const merged = mergeRecords([
                { title: 'T', year: 2019 },
                { title: 'T', year: 2021 },
            ]);
            expect(merged.year).toBe(2019);
        });

        it('should skip blank strings, non-finite numbers and empty author lists', () => {
            const merged = mergeRecords([
                { title: 'T', doi: '  ', year: Number.NaN, authors: [] },
                { doi: '10.1/b', year: 2000, authors: ['Ann'] },
            ]);
            expect(merged.doi).toBe('10.1/b');
            expect(merged.year).toBe(2000);
            expect(merged.authors).toEqual(['Ann']);
        });

        it('should keep a single provider tag', () => {
            const merged = mergeRecords([{ source: 'openalex' }, { source: 'openalex' }]);
            expect(merged.source).toBe('openalex');
        });

        it('should treat an already combined tag as both providers', () => {
            const merged = mergeRecords([{ source: COMBINED_SOURCE }, { source: 'openalex' }]);
            expect(merged.source).toBe(COMBINED_SOURCE);
        });

        it('should leave inputs untouched and freeze the result', () => {
            const first: PaperRecord = { title: 'T', authors: ['Ann'] };
            const second: PaperRecord = { venue: 'V' };
            const merged = mergeRecords([first, second]);

            expect(first).toEqual({ title: 'T', authors: ['Ann'] });
            expect(second).toEqual({ venue: 'V' });
            expect(Object.isFrozen(merged)).toBe(true);
            expect(merged.authors).not.toBe(first.authors);
        });
    });

    describe('mergeRecordLists', () => {
        it('should collapse records with the same key and keep first-seen order', () => {
            const openalex: PaperRecord[] = [
                { title: 'A', doi: '10.1/a', source: 'openalex' },
                { year: 2020 },
            ];
            const s2: PaperRecord[] = [
                { title: 'a', s2_id: 's1', source: 'semantic_scholar' },
                { title: 'B', source: 'semantic_scholar' },
            ];

            expect(mergeRecordLists(openalex, s2)).toEqual([
                { title: 'A', doi: '10.1/a', s2_id: 's1', source: COMBINED_SOURCE },
                { year: 2020 },
                { title: 'B', source: 'semantic_scholar' },
            ]);
        });

        it('should return an empty list for no input', () => {
            expect(mergeRecordLists()).toEqual([]);
            expect(mergeRecordLists([], [])).toEqual([]);
        });
    });

    describe('toPaperRecord', () => {
        it('should return a mutable copy', () => {
            const copy = toPaperRecord(mergeRecords([{ title: 'T', authors: ['Ann'] }]));
            copy.authors?.push('Bob');
            expect(copy.authors).toEqual(['Ann', 'Bob']);
            expect(Object.isFrozen(copy)).toBe(false);
        });
    });
});
