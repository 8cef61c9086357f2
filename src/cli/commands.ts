import { extname } from 'node:path';
import type { CitationGraph, CociteConfig, NodePartition, SourceAdapter } from '../types/index.js';
import { analyzeCitations } from '../analysis/aggregator.js';
import { toCitedDocument, toCitingDocument, type CitedResultDocument, type CitingResultDocument } from '../analysis/results.js';
import { buildGraphFromAnalysis, nodesIn } from '../builder/graph-builder.js';
import { ResponseCache } from '../cache/response-cache.js';
import { exportGraph, type ExportFormat } from '../exporters/export.js';
import { fetchCitationDocument } from '../fetcher/citation-fetcher.js';
import { loadCitationDocument, readDoiList, writeJsonFile } from '../io/document.js';
import { OpenAlexAdapter } from '../sources/openalex.js';
import { SemanticScholarAdapter } from '../sources/semantic-scholar.js';
import { getApiKey } from '../utils/config.js';
import { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { generateViewer } from '../viewer/html-viewer.js';
import { formatSummary } from './summary.js';

export const VERSION = '0.1.0';

const EXPORT_EXTENSIONS: Record<ExportFormat, string> = {
    json: '.json',
    graphml: '.graphml',
    gexf: '.gexf',
    csv: '.csv',
    mermaid: '.md',
};

// ─── fetch ────────────────────────────────────────────────

export interface FetchCommandOptions {
    input: string;
    output: string;
}

export interface FetchSummary {
    total: number;
    found: number;
    references: number;
    citedBy: number;
}

/**
 * OpenAlex first, Semantic Scholar second, sharing one rate-limited client.
 */
export function createAdapters(config: CociteConfig): SourceAdapter[] {
    const client = new HttpClient({
        timeout: config.fetch.timeoutMs,
        version: VERSION,
        email: config.fetch.email,
        rateLimits: config.fetch.rateLimits,
        cache: openCache(config),
    });

    return [
        new OpenAlexAdapter(client, { apiKey: getApiKey('OPENALEX_API_KEY'), email: config.fetch.email }),
        new SemanticScholarAdapter(client, { apiKey: getApiKey('S2_API_KEY') }),
    ];
}

export async function runFetch(
    config: CociteConfig,
    options: FetchCommandOptions,
    adapters: SourceAdapter[] = createAdapters(config)
): Promise<FetchSummary> {
    const dois = readDoiList(options.input);
    const document = await fetchCitationDocument(dois, {
        adapters,
        maxCiting: config.fetch.maxCiting,
        maxReferences: config.fetch.maxReferences,
        inputFile: options.input,
    });

    writeJsonFile(options.output, document);
    getLogger().info({ output: options.output }, 'Citation document written');

    return {
        total: document.papers.length,
        found: document.papers.filter((paper) => !paper.error).length,
        references: document.papers.reduce((sum, paper) => sum + paper.references.length, 0),
        citedBy: document.papers.reduce((sum, paper) => sum + paper.cited_by.length, 0),
    };
}

// ─── analyze ──────────────────────────────────────────────

export interface AnalyzeCommandOptions {
    input: string;
    outputCited: string;
    outputCiting: string;
}

export interface AnalyzeResult {
    seeds: number;
    cited: CitedResultDocument;
    citing: CitingResultDocument;
    summary: string[];
}

export function runAnalyze(config: CociteConfig, options: AnalyzeCommandOptions): AnalyzeResult {
    const document = loadCitationDocument(options.input);
    const analysis = analyzeCitations(document, { kCited: config.kCited, kCiting: config.kCiting });

    const cited = toCitedDocument(analysis.cited, analysis.kCited);
    const citing = toCitingDocument(analysis.citing, analysis.kCiting);
    writeJsonFile(options.outputCited, cited);
    writeJsonFile(options.outputCiting, citing);
    getLogger().info({ cited: options.outputCited, citing: options.outputCiting }, 'Result documents written');

    return {
        seeds: analysis.seedSet.keys.size,
        cited,
        citing,
        summary: formatSummary(cited, citing),
    };
}

// ─── graph / export ───────────────────────────────────────

export interface GraphCommandOptions {
    input: string;
    output: string;
}

export type PartitionCounts = Record<NodePartition, number> & { edges: number };

function loadGraph(config: CociteConfig, input: string): CitationGraph {
    const document = loadCitationDocument(input);
    const analysis = analyzeCitations(document, { kCited: config.kCited, kCiting: config.kCiting });
    return buildGraphFromAnalysis(analysis);
}

export function countPartitions(graph: CitationGraph): PartitionCounts {
    return {
        seed: nodesIn(graph, 'seed').length,
        cited: nodesIn(graph, 'cited').length,
        citing: nodesIn(graph, 'citing').length,
        edges: graph.edges.length,
    };
}

export function runGraph(config: CociteConfig, options: GraphCommandOptions): PartitionCounts {
    const graph = loadGraph(config, options.input);
    generateViewer(graph, options.output, { kCited: config.kCited, kCiting: config.kCiting });
    return countPartitions(graph);
}

export interface ExportCommandOptions {
    input: string;
    format: ExportFormat;
    output?: string;
}

/**
 * Default export path: the input path with its extension swapped,
 * e.g. citations.json → citations.graph.gexf.
 */
export function defaultExportPath(input: string, format: ExportFormat): string {
    const extension = extname(input);
    const base = extension ? input.slice(0, -extension.length) : input;
    return `${base}.graph${EXPORT_EXTENSIONS[format]}`;
}

export function runExport(config: CociteConfig, options: ExportCommandOptions): string {
    const graph = loadGraph(config, options.input);
    const outputPath = options.output ?? defaultExportPath(options.input, options.format);
    exportGraph(graph, outputPath, options.format, { kCited: config.kCited, kCiting: config.kCiting });
    return outputPath;
}

// ─── cache ────────────────────────────────────────────────

export function openCache(config: CociteConfig): ResponseCache {
    return new ResponseCache({
        cacheDir: config.cache.dir,
        ttlHours: config.cache.ttlHours,
        enabled: config.cache.enabled,
    });
}
