import { readFileSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import { SOURCE_TAGS } from '../types/index.js';
import type { CitationDocument, PaperRecord, SourceTag } from '../types/index.js';
import { DocumentError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

// ─── Schemas ─────────────────────────────────────────────

// Field-level problems never reject a document: a bad value becomes absent.
const optionalString = z.string().optional().catch(undefined);
const optionalInteger = z.number().int().optional().catch(undefined);

const sourceTag = z
    .string()
    .optional()
    .catch(undefined)
    .transform((value): SourceTag | undefined => SOURCE_TAGS.find((tag) => tag === value));

const authorList = z
    .array(z.unknown())
    .optional()
    .catch(undefined)
    .transform((authors) => authors?.filter((name): name is string => typeof name === 'string'));

const PaperRecordSchema = z.object({
    title: optionalString,
    doi: optionalString,
    arxiv_id: optionalString,
    openalex_id: optionalString,
    s2_id: optionalString,
    authors: authorList,
    year: optionalInteger,
    venue: optionalString,
    type: optionalString,
    cited_by_count: optionalInteger,
    source: sourceTag,
});

const emptyRecord: PaperRecord = {};

// A list item that is not an object is an unresolvable record.
const RelationListSchema = z.array(PaperRecordSchema.catch(emptyRecord)).default([]);

const SeedEntrySchema = z.object({
    input_doi: z.string().catch(''),
    metadata: PaperRecordSchema.nullish()
        .catch(null)
        .transform((metadata) => metadata ?? null),
    references: RelationListSchema,
    cited_by: RelationListSchema,
    sources_used: z.array(z.string()).optional().catch(undefined),
    error: z.string().nullish().catch(undefined),
});

const QueryInfoSchema = z
    .object({
        input_file: optionalString,
        num_dois: optionalInteger,
        max_citing_per_paper: optionalInteger,
        sources: z.array(z.string()).optional().catch(undefined),
    })
    .optional()
    .catch(undefined);

const CitationDocumentSchema = z.object({
    query_info: QueryInfoSchema,
    papers: z.array(SeedEntrySchema),
});

// ─── Loading ─────────────────────────────────────────────

/**
 * Validate a parsed JSON value as a citation document.
 *
 * Structural problems (no `papers` array, an entry that is not an object, a
 * relation list that is not an array) throw a DocumentError. Malformed
 * fields inside records are dropped.
 */
export function parseCitationDocument(value: unknown): CitationDocument {
    const result = CitationDocumentSchema.safeParse(value);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => {
            const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            return `${path}: ${issue.message}`;
        });
        throw new DocumentError(`Invalid citation document: ${issues.join('; ')}`, issues);
    }

    return result.data;
}

/**
 * Read and validate a citation document from disk.
 */
export function loadCitationDocument(path: string): CitationDocument {
    let raw: string;
    try {
        raw = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new DocumentError(`Unable to read citation document: ${path}`, [], { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new DocumentError(`Citation document is not valid JSON: ${path}`, [], { cause: error });
    }

    const document = parseCitationDocument(parsed);
    getLogger().debug({ path, entries: document.papers.length }, 'Loaded citation document');
    return document;
}

/**
 * Write a value as pretty-printed JSON.
 */
export function writeJsonFile(path: string, value: unknown): void {
    writeFileSync(path, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
    getLogger().debug({ path }, 'Wrote JSON file');
}

/**
 * Read a DOI list: one DOI per line, blank lines ignored.
 */
export function readDoiList(path: string): string[] {
    let raw: string;
    try {
        raw = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new DocumentError(`Unable to read DOI list: ${path}`, [], { cause: error });
    }

    return raw
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
}
