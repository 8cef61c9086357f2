import type { PaperRecord, ProviderTag } from './paper.js';

/**
 * A provider's answer for one DOI: the normalized record plus the
 * provider-specific handle needed to page through its relations.
 */
export interface SourceWork {
    record: PaperRecord;

    /** Provider ID used for follow-up requests (OpenAlex work URL, S2 paperId) */
    handle: string;

    /** OpenAlex embeds the reference list in the work itself */
    referencedWorks?: string[];
}

/**
 * Interface for data source adapters (OpenAlex, Semantic Scholar).
 * Each adapter normalizes results into the common PaperRecord shape.
 */
export interface SourceAdapter {
    /** Human-readable source name */
    readonly name: string;

    /** Source tag written into every record */
    readonly sourceTag: ProviderTag;

    /**
     * Look up a paper by DOI. Returns null when the provider does not know it.
     */
    fetchByDoi(doi: string): Promise<SourceWork | null>;

    /**
     * Fetch papers that the given work references (outgoing citations).
     * @param limit - Maximum number of references to fetch
     */
    fetchReferences(work: SourceWork, limit: number): Promise<PaperRecord[]>;

    /**
     * Fetch papers that cite the given work (incoming citations).
     * @param limit - Maximum number of citing papers to fetch
     */
    fetchCitations(work: SourceWork, limit: number): Promise<PaperRecord[]>;
}

/**
 * Options for source adapter initialization.
 */
export interface SourceAdapterOptions {
    /** API key (from environment variable) */
    apiKey?: string;

    /** Contact email for polite pool (OpenAlex) */
    email?: string;
}
