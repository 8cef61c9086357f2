import type { CitationDocument, PaperRecord, SeedEntry, SourceAdapter, SourceWork } from '../types/index.js';
import { mergeRecordLists } from '../identity/record-merger.js';
import { normalizeDoi } from '../sources/utils.js';
import { getLogger } from '../utils/logger.js';

export const NOT_FOUND_ERROR = 'Paper not found in any source';

export interface FetchOptions {
    /** Providers in priority order; the first one that knows a DOI supplies its metadata */
    adapters: SourceAdapter[];
    maxCiting: number;
    maxReferences: number;

    /** Recorded in query_info */
    inputFile?: string;

    /** Called after each DOI with its 1-based position */
    onProgress?: (done: number, total: number, entry: SeedEntry) => void;
}

/**
 * What one provider returned for one DOI.
 */
interface ProviderResult {
    record: PaperRecord | null;
    references: PaperRecord[];
    citing: PaperRecord[];
}

const EMPTY_RESULT: ProviderResult = { record: null, references: [], citing: [] };

/**
 * Fetch metadata, references and citing works for every DOI and assemble the
 * citation document the analysis reads.
 *
 * DOIs are processed one at a time. A provider failure is logged and the DOI
 * continues with whatever the other providers returned.
 */
export async function fetchCitationDocument(
    dois: string[],
    options: FetchOptions
): Promise<CitationDocument> {
    const logger = getLogger();
    const papers: SeedEntry[] = [];

    logger.info(
        { dois: dois.length, sources: options.adapters.map((a) => a.sourceTag), maxCiting: options.maxCiting },
        'Fetching citations'
    );

    for (const [index, doi] of dois.entries()) {
        logger.info({ doi, position: index + 1, total: dois.length }, 'Processing DOI');
        const entry = await fetchSeedEntry(doi, options);
        papers.push(entry);
        options.onProgress?.(index + 1, dois.length, entry);
    }

    const found = papers.filter((p) => !p.error).length;
    logger.info({ found, total: dois.length }, 'Fetch complete');

    return {
        query_info: {
            input_file: options.inputFile,
            num_dois: dois.length,
            max_citing_per_paper: options.maxCiting,
            sources: options.adapters.map((a) => a.sourceTag),
        },
        papers,
    };
}

/**
 * Query every provider for one DOI and merge their answers.
 */
export async function fetchSeedEntry(inputDoi: string, options: FetchOptions): Promise<SeedEntry> {
    const doi = normalizeDoi(inputDoi);
    const entry: SeedEntry = {
        input_doi: inputDoi,
        metadata: null,
        references: [],
        cited_by: [],
        sources_used: [],
        error: null,
    };

    const referenceLists: PaperRecord[][] = [];
    const citingLists: PaperRecord[][] = [];

    for (const adapter of options.adapters) {
        const result = await queryProvider(adapter, doi, options);
        if (!result.record) continue;

        entry.sources_used?.push(adapter.sourceTag);
        entry.metadata ??= result.record;
        referenceLists.push(result.references);
        citingLists.push(result.citing);
    }

    entry.references = mergeRecordLists(...referenceLists);
    entry.cited_by = mergeRecordLists(...citingLists);

    if (!entry.metadata) {
        entry.error = NOT_FOUND_ERROR;
        getLogger().warn({ doi: inputDoi }, NOT_FOUND_ERROR);
    } else {
        getLogger().info(
            { doi: inputDoi, references: entry.references.length, citedBy: entry.cited_by.length },
            'DOI processed'
        );
    }

    return entry;
}

async function queryProvider(
    adapter: SourceAdapter,
    doi: string,
    options: FetchOptions
): Promise<ProviderResult> {
    const logger = getLogger();

    let work: SourceWork | null;
    try {
        work = await adapter.fetchByDoi(doi);
    } catch (error) {
        logger.warn({ source: adapter.sourceTag, doi, error }, 'Lookup failed');
        return EMPTY_RESULT;
    }
    if (!work) return EMPTY_RESULT;

    let references: PaperRecord[] = [];
    try {
        references = await adapter.fetchReferences(work, options.maxReferences);
        logger.debug({ source: adapter.sourceTag, doi, count: references.length }, 'References fetched');
    } catch (error) {
        logger.warn({ source: adapter.sourceTag, doi, error }, 'Failed to fetch references');
    }

    let citing: PaperRecord[] = [];
    try {
        citing = await adapter.fetchCitations(work, options.maxCiting);
        logger.debug({ source: adapter.sourceTag, doi, count: citing.length }, 'Citing works fetched');
    } catch (error) {
        logger.warn({ source: adapter.sourceTag, doi, error }, 'Failed to fetch citing works');
    }

    return { record: work.record, references, citing };
}
