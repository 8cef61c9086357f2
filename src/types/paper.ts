/**
 * Paper record — the common shape of every metadata record in a citation document,
 * whether it describes a seed paper, one of its references, or a citing paper.
 *
 * Every field is optional. Absence is `undefined`; an empty string, a
 * whitespace-only identifier or an empty author list are treated as absent too.
 */
export interface PaperRecord {
    /** Paper title as reported by the provider */
    title?: string;

    /** Digital Object Identifier (without https://doi.org/ prefix) */
    doi?: string;

    /** arXiv identifier (e.g., "2401.01234") */
    arxiv_id?: string;

    /** OpenAlex work ID, usually the full https://openalex.org/W… URL */
    openalex_id?: string;

    /** Semantic Scholar paperId */
    s2_id?: string;

    /** Author display names in byline order */
    authors?: string[];

    /** Publication year */
    year?: number;

    /** Published venue/journal name */
    venue?: string;

    /** Work type reported by OpenAlex (article, preprint, …) */
    type?: string;

    /** Citation count reported by the provider */
    cited_by_count?: number;

    /** Provider that produced the record */
    source?: SourceTag;
}

export type ProviderTag = 'openalex' | 'semantic_scholar';

/** Marker for a record assembled from more than one provider. */
export const COMBINED_SOURCE = 'openalex+semantic_scholar';

export type SourceTag = ProviderTag | typeof COMBINED_SOURCE;

export const SOURCE_TAGS: readonly SourceTag[] = ['openalex', 'semantic_scholar', COMBINED_SOURCE];

/**
 * Namespaced identity string: `title:…`, `arxiv:…`, `doi:…`, `openalex:…` or `s2:…`.
 */
export type CanonicalKey = string;

export type KeyNamespace = 'title' | 'arxiv' | 'doi' | 'openalex' | 's2';

/** Merged, read-only record for one canonical key. */
export type CanonicalRecord = Readonly<Omit<PaperRecord, 'authors'>> & {
    readonly authors?: readonly string[];
};

/**
 * One entry of the input document: a seed paper with its collected relations.
 */
export interface SeedEntry {
    /** DOI the user supplied for this seed paper */
    input_doi: string;

    /** Metadata of the seed paper itself; null when no provider found it */
    metadata: PaperRecord | null;

    /** Papers the seed paper cites */
    references: PaperRecord[];

    /** Papers that cite the seed paper */
    cited_by: PaperRecord[];

    /** Providers that answered for this DOI */
    sources_used?: string[];

    /** Lookup failure message, if any */
    error?: string | null;
}

export interface QueryInfo {
    input_file?: string;
    num_dois?: number;
    max_citing_per_paper?: number;
    sources?: string[];
}

/**
 * Citation document produced by the fetcher and consumed by the analysis.
 */
export interface CitationDocument {
    query_info?: QueryInfo;
    papers: SeedEntry[];
}
