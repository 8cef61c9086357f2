import type { PaperRecord, SourceAdapter, SourceAdapterOptions, SourceWork } from '../types/index.js';
import { HttpError, type HttpClient, type HttpResponse } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { nonEmpty, normalizeDoi, stripDoiPrefix } from './utils.js';

export const OPENALEX_BASE = 'https://api.openalex.org';

/** IDs per `filter=openalex:` batch (API URL length limits) */
const REFERENCE_BATCH_SIZE = 50;

/** Page size for cursor paging through citing works */
const CITING_PAGE_SIZE = 100;

/**
 * OpenAlex API response types (subset of relevant fields).
 */
export interface OpenAlexWork {
    id: string;
    doi?: string | null;
    title?: string | null;
    display_name?: string | null;
    publication_year?: number | null;
    type?: string | null;
    primary_location?: {
        source?: { display_name?: string | null } | null;
    } | null;
    cited_by_count?: number;
    authorships?: Array<{
        author?: { id?: string; display_name?: string | null };
    }>;
    referenced_works?: string[];
}

interface OpenAlexListResponse {
    meta: { count: number; per_page: number; next_cursor?: string | null };
    results: OpenAlexWork[];
}

/**
 * OpenAlex source adapter.
 * Primary source: seed metadata comes from here when OpenAlex knows the DOI.
 *
 * @see https://docs.openalex.org/
 */
export class OpenAlexAdapter implements SourceAdapter {
    readonly name = 'OpenAlex';
    readonly sourceTag = 'openalex' as const;
    private apiKey?: string;
    private email?: string;

    constructor(
        private readonly httpClient: HttpClient,
        options?: SourceAdapterOptions
    ) {
        this.apiKey = options?.apiKey ?? process.env['OPENALEX_API_KEY'];
        this.email = options?.email ?? process.env['OPENALEX_EMAIL'];
    }

    async fetchByDoi(doi: string): Promise<SourceWork | null> {
        const params = this.authParams();
        const url = `${OPENALEX_BASE}/works/https://doi.org/${encodeURIComponent(normalizeDoi(doi))}${this.query(params)}`;
        getLogger().debug({ url }, 'OpenAlex fetch work');

        try {
            const response = await this.httpClient.get<OpenAlexWork>(url, { source: this.sourceTag });
            const work = response.data;
            return {
                record: this.toRecord(work),
                handle: work.id,
                referencedWorks: work.referenced_works ?? [],
            };
        } catch (error) {
            if (error instanceof HttpError && error.status === 404) {
                getLogger().info({ doi }, 'DOI not found in OpenAlex');
                return null;
            }
            throw error;
        }
    }

    async fetchReferences(work: SourceWork, limit: number): Promise<PaperRecord[]> {
        const ids = (work.referencedWorks ?? []).slice(0, limit);
        const records: PaperRecord[] = [];

        for (let i = 0; i < ids.length; i += REFERENCE_BATCH_SIZE) {
            const batch = ids.slice(i, i + REFERENCE_BATCH_SIZE);
            const params = new URLSearchParams({
                filter: `openalex:${batch.map((id) => shortId(id)).join('|')}`,
                'per-page': String(REFERENCE_BATCH_SIZE),
            });
            this.addAuthParams(params);

            const url = `${OPENALEX_BASE}/works${this.query(params)}`;
            getLogger().debug({ url, batchIndex: i / REFERENCE_BATCH_SIZE }, 'OpenAlex fetch references');

            const response = await this.httpClient.get<OpenAlexListResponse>(url, { source: this.sourceTag });
            records.push(...response.data.results.map((result) => this.toRecord(result)));
        }

        return records;
    }

    async fetchCitations(work: SourceWork, limit: number): Promise<PaperRecord[]> {
        const records: PaperRecord[] = [];
        let cursor: string | null | undefined = '*';

        while (cursor && records.length < limit) {
            const params: URLSearchParams = new URLSearchParams({
                filter: `cites:${shortId(work.handle)}`,
                'per-page': String(CITING_PAGE_SIZE),
                cursor,
            });
            this.addAuthParams(params);

            const url: string = `${OPENALEX_BASE}/works${this.query(params)}`;
            getLogger().debug({ url }, 'OpenAlex fetch citing works');

            const response: HttpResponse<OpenAlexListResponse> = await this.httpClient.get<OpenAlexListResponse>(url, {
                source: this.sourceTag,
            });
            const page: OpenAlexListResponse = response.data;
            const { results, meta } = page;
            if (results.length === 0) break;

            records.push(...results.map((result) => this.toRecord(result)));
            cursor = meta.next_cursor;
        }

        return records.slice(0, limit);
    }

    /**
     * Normalize an OpenAlex work into a PaperRecord.
     */
    toRecord(work: OpenAlexWork): PaperRecord {
        const authors = (work.authorships ?? [])
            .map((authorship) => authorship.author?.display_name)
            .filter((name): name is string => !!name);

        return {
            openalex_id: nonEmpty(work.id),
            doi: stripDoiPrefix(work.doi),
            title: nonEmpty(work.title ?? work.display_name),
            authors,
            year: work.publication_year ?? undefined,
            venue: nonEmpty(work.primary_location?.source?.display_name),
            type: nonEmpty(work.type),
            cited_by_count: work.cited_by_count ?? 0,
            source: this.sourceTag,
        };
    }

    // ─── Private helpers ──────────────────────────────────────

    private authParams(): URLSearchParams {
        const params = new URLSearchParams();
        this.addAuthParams(params);
        return params;
    }

    private addAuthParams(params: URLSearchParams): void {
        if (this.apiKey) {
            params.set('api_key', this.apiKey);
        }
        if (this.email) {
            params.set('mailto', this.email);
        }
    }

    private query(params: URLSearchParams): string {
        const text = params.toString();
        return text ? `?${text}` : '';
    }
}

/**
 * "https://openalex.org/W123" → "W123"
 */
export function shortId(id: string): string {
    return id.replace('https://openalex.org/', '');
}
