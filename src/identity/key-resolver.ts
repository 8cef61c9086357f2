import type { CanonicalKey, CanonicalRecord, KeyNamespace, PaperRecord } from '../types/index.js';

/** Maximum length of a normalized title used as a key. */
export const MAX_TITLE_KEY_LENGTH = 150;

/**
 * Punctuation that differs between versions of the same title
 * (colon, hyphen, en/em dash, straight and smart quotes).
 */
const TITLE_PUNCTUATION = /[:\-–—'‘’"“”]/g;

const ARXIV_DOI_PATTERN = /10\.48550\/arxiv\.(\d+\.\d+)/;

/**
 * Return the trimmed string, or undefined when the value is not a non-blank string.
 */
export function presentString(value: unknown): string | undefined {
    if (typeof value !== 'string') return undefined;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Normalize a paper title for identity matching.
 *
 * "Deep Learning: A Survey" and "deep learning - a  survey" both become
 * "deep learning a survey". Titles that only differ after the first
 * 150 characters collapse to the same key.
 */
export function normalizeTitle(title: string | undefined): string {
    if (!title) return '';

    const collapsed = title
        .toLowerCase()
        .replace(/\s+/g, ' ')
        .replace(TITLE_PUNCTUATION, ' ')
        .replace(/\s+/g, ' ')
        .trim();

    // Cut by code points so a surrogate pair is never split
    return Array.from(collapsed).slice(0, MAX_TITLE_KEY_LENGTH).join('').trimEnd();
}

/**
 * Extract the arXiv ID from an arXiv-issued DOI.
 * "10.48550/arXiv.2201.05125" → "2201.05125"
 */
export function extractArxivIdFromDoi(doi: string | undefined): string | undefined {
    if (!doi) return undefined;
    const match = doi.toLowerCase().match(ARXIV_DOI_PATTERN);
    return match?.[1];
}

/**
 * Derive the canonical key for a record.
 *
 * Priority: normalized title → arXiv ID from an arXiv DOI → arXiv ID →
 * DOI → OpenAlex ID → Semantic Scholar ID. Returns undefined when the
 * record exposes none of them.
 */
export function resolveKey(record: PaperRecord | CanonicalRecord): CanonicalKey | undefined {
    const title = normalizeTitle(presentString(record.title));
    if (title) return makeKey('title', title);

    const doi = presentString(record.doi);
    const arxivFromDoi = extractArxivIdFromDoi(doi);
    if (arxivFromDoi) return makeKey('arxiv', arxivFromDoi);

    const arxivId = presentString(record.arxiv_id);
    if (arxivId) return makeKey('arxiv', arxivId.toLowerCase());

    if (doi) return makeKey('doi', doi.toLowerCase());

    const openalexId = presentString(record.openalex_id);
    if (openalexId) return makeKey('openalex', openalexId.toLowerCase());

    const s2Id = presentString(record.s2_id);
    if (s2Id) return makeKey('s2', s2Id.toLowerCase());

    return undefined;
}

/**
 * Namespace of a canonical key ("doi:10.1/x" → "doi").
 */
export function keyNamespace(key: CanonicalKey): KeyNamespace | undefined {
    const prefix = key.slice(0, key.indexOf(':'));
    switch (prefix) {
        case 'title':
        case 'arxiv':
        case 'doi':
        case 'openalex':
        case 's2':
            return prefix;
        default:
            return undefined;
    }
}

function makeKey(namespace: KeyNamespace, value: string): CanonicalKey {
    return `${namespace}:${value}`;
}
