import { COMBINED_SOURCE } from '../types/index.js';
import type { CanonicalKey, CanonicalRecord, PaperRecord, SourceTag } from '../types/index.js';
import { presentString, resolveKey } from './key-resolver.js';

type StringField = 'title' | 'doi' | 'arxiv_id' | 'openalex_id' | 's2_id' | 'venue' | 'type';
type NumberField = 'year' | 'cited_by_count';

const STRING_FIELDS: readonly StringField[] = ['title', 'doi', 'arxiv_id', 'openalex_id', 's2_id', 'venue', 'type'];
const NUMBER_FIELDS: readonly NumberField[] = ['year', 'cited_by_count'];

/**
 * Merge records that denote the same paper into one canonical record.
 *
 * The group is walked in the caller's order and each field keeps the first
 * non-empty value it meets; later values never overwrite it, even when they
 * disagree. The source tag becomes the combined marker once more than one
 * provider contributed. Inputs are left untouched and the result is frozen.
 */
export function mergeRecords(group: readonly (PaperRecord | CanonicalRecord)[]): CanonicalRecord {
    const merged: PaperRecord = {};
    const providers = new Set<SourceTag>();

    for (const record of group) {
        for (const field of STRING_FIELDS) {
            if (merged[field] === undefined && presentString(record[field]) !== undefined) {
                merged[field] = record[field];
            }
        }

        for (const field of NUMBER_FIELDS) {
            const value = record[field];
            if (merged[field] === undefined && typeof value === 'number' && Number.isFinite(value)) {
                merged[field] = value;
            }
        }

        if (merged.authors === undefined && record.authors && record.authors.length > 0) {
            merged.authors = [...record.authors];
        }

        if (record.source === COMBINED_SOURCE) {
            providers.add('openalex');
            providers.add('semantic_scholar');
        } else if (record.source !== undefined) {
            providers.add(record.source);
        }
    }

    const [firstProvider] = providers;
    if (providers.size > 1) {
        merged.source = COMBINED_SOURCE;
    } else if (firstProvider !== undefined) {
        merged.source = firstProvider;
    }

    if (merged.authors) Object.freeze(merged.authors);
    return Object.freeze(merged);
}

/**
 * Merge several record lists into one, collapsing records that resolve to the
 * same canonical key. Groups keep the position of their first member; records
 * without a key pass through unchanged.
 */
export function mergeRecordLists(...lists: readonly PaperRecord[][]): PaperRecord[] {
    const slots: Array<{ key: CanonicalKey; group: PaperRecord[] } | { key: undefined; record: PaperRecord }> = [];
    const groups = new Map<CanonicalKey, PaperRecord[]>();

    for (const list of lists) {
        for (const record of list) {
            const key = resolveKey(record);
            if (key === undefined) {
                slots.push({ key: undefined, record });
                continue;
            }

            const existing = groups.get(key);
            if (existing) {
                existing.push(record);
            } else {
                const group = [record];
                groups.set(key, group);
                slots.push({ key, group });
            }
        }
    }

    return slots.map((slot) => (slot.key === undefined ? slot.record : toPaperRecord(mergeRecords(slot.group))));
}

/**
 * Mutable copy of a canonical record, for output documents.
 */
export function toPaperRecord(record: CanonicalRecord): PaperRecord {
    const { authors, ...rest } = record;
    return authors ? { ...rest, authors: [...authors] } : { ...rest };
}
