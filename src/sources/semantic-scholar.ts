import type { PaperRecord, SourceAdapter, SourceAdapterOptions, SourceWork } from '../types/index.js';
import { HttpError, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { extractArxivIdFromDoi } from '../identity/key-resolver.js';
import { nonEmpty, normalizeDoi } from './utils.js';

export const S2_BASE = 'https://api.semanticscholar.org/graph/v1';

/** Fields to request for the seed paper */
const PAPER_FIELDS = 'paperId,externalIds,title,authors,year,venue,citationCount,referenceCount';

/** Fields to request for references and citations */
const RELATION_FIELDS = 'paperId,externalIds,title,authors,year,venue,citationCount';

const PAGE_SIZE = 100;

/**
 * Semantic Scholar API response types.
 */
export interface S2Paper {
    paperId?: string | null;
    externalIds?: {
        DOI?: string;
        ArXiv?: string;
    } | null;
    title?: string | null;
    year?: number | null;
    venue?: string | null;
    citationCount?: number | null;
    authors?: Array<{
        authorId?: string | null;
        name?: string | null;
    }>;
}

interface S2RelationPage {
    offset: number;
    next?: number;
    data?: Array<{ citedPaper?: S2Paper | null; citingPaper?: S2Paper | null }>;
}

/**
 * Semantic Scholar source adapter.
 * Secondary source with good coverage of arXiv preprints.
 *
 * @see https://api.semanticscholar.org/
 */
export class SemanticScholarAdapter implements SourceAdapter {
    readonly name = 'Semantic Scholar';
    readonly sourceTag = 'semantic_scholar' as const;
    private apiKey?: string;

    constructor(
        private readonly httpClient: HttpClient,
        options?: SourceAdapterOptions
    ) {
        this.apiKey = options?.apiKey ?? process.env['S2_API_KEY'];
    }

    async fetchByDoi(doi: string): Promise<SourceWork | null> {
        const url = `${S2_BASE}/paper/${encodeURIComponent(lookupId(doi))}?fields=${PAPER_FIELDS}`;
        getLogger().debug({ url }, 'S2 fetch paper');

        try {
            const response = await this.httpClient.get<S2Paper>(url, {
                source: this.sourceTag,
                headers: this.buildHeaders(),
            });
            const paper = response.data;
            if (!paper.paperId) return null;
            return { record: this.toRecord(paper), handle: paper.paperId };
        } catch (error) {
            if (error instanceof HttpError && error.status === 404) {
                getLogger().info({ doi }, 'DOI not found in Semantic Scholar');
                return null;
            }
            throw error;
        }
    }

    async fetchReferences(work: SourceWork, limit: number): Promise<PaperRecord[]> {
        return this.fetchRelation(work.handle, 'references', limit);
    }

    async fetchCitations(work: SourceWork, limit: number): Promise<PaperRecord[]> {
        return this.fetchRelation(work.handle, 'citations', limit);
    }

    /**
     * Normalize a Semantic Scholar paper into a PaperRecord.
     */
    toRecord(paper: S2Paper): PaperRecord {
        const authors = (paper.authors ?? [])
            .map((author) => author.name)
            .filter((name): name is string => !!name);

        return {
            s2_id: nonEmpty(paper.paperId),
            doi: nonEmpty(paper.externalIds?.DOI),
            arxiv_id: nonEmpty(paper.externalIds?.ArXiv),
            title: nonEmpty(paper.title),
            authors,
            year: paper.year ?? undefined,
            venue: nonEmpty(paper.venue),
            cited_by_count: paper.citationCount ?? 0,
            source: this.sourceTag,
        };
    }

    // ─── Private helpers ──────────────────────────────────────

    /**
     * Offset-page through /references or /citations until `limit` records or
     * an empty page.
     */
    private async fetchRelation(
        paperId: string,
        relation: 'references' | 'citations',
        limit: number
    ): Promise<PaperRecord[]> {
        const records: PaperRecord[] = [];

        for (let offset = 0; offset < limit; offset += PAGE_SIZE) {
            const params = new URLSearchParams({
                fields: RELATION_FIELDS,
                offset: String(offset),
                limit: String(PAGE_SIZE),
            });
            const url = `${S2_BASE}/paper/${encodeURIComponent(paperId)}/${relation}?${params.toString()}`;
            getLogger().debug({ url }, `S2 fetch ${relation}`);

            const response = await this.httpClient.get<S2RelationPage>(url, {
                source: this.sourceTag,
                headers: this.buildHeaders(),
            });

            const page = response.data.data ?? [];
            if (page.length === 0) break;

            for (const item of page) {
                const paper = relation === 'references' ? item.citedPaper : item.citingPaper;
                if (paper) records.push(this.toRecord(paper));
            }
        }

        return records.slice(0, limit);
    }

    private buildHeaders(): Record<string, string> {
        const headers: Record<string, string> = {};
        if (this.apiKey) {
            headers['x-api-key'] = this.apiKey;
        }
        return headers;
    }
}

/**
 * S2 lookup ID for a DOI: `arXiv:<id>` for arXiv DOIs (better preprint
 * coverage), `DOI:<doi>` otherwise.
 */
export function lookupId(doi: string): string {
    const normalized = normalizeDoi(doi);
    const arxivId = extractArxivIdFromDoi(normalized);
    return arxivId ? `arXiv:${arxivId}` : `DOI:${normalized}`;
}
