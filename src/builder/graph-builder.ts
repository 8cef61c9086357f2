import GraphDefault from 'graphology';
import type { DirectedGraph } from 'graphology';
import { EdgeType } from '../types/index.js';
import type { CanonicalKey, CitationGraph, GraphNode, NodePartition } from '../types/index.js';
import { resolveKey } from '../identity/key-resolver.js';
import { rankIndex, type AggregatedEntry, type CitationAnalysis } from '../analysis/aggregator.js';
import type { CitationIndex, SeedInfo, SeedSet } from '../analysis/citation-indexer.js';
import { truncate } from '../utils/text.js';
import { getLogger } from '../utils/logger.js';

/** Maximum length of a node label. */
export const NODE_LABEL_LENGTH = 30;

const SEED_NODE_SIZE = 30;

// Type aliases rather than interfaces: graphology attributes need an index signature.
type NodeAttributes = { node: GraphNode };
type EdgeAttributes = { type: EdgeType };

export type DirectedGraphConstructor = new (options: { type: 'directed' }) => DirectedGraph<NodeAttributes, EdgeAttributes>;

/**
 * The Graph class from a loaded graphology module. Node's ESM loader hands over
 * the CommonJS build, where the module itself is the class; ES module builds
 * carry it as `default`.
 */
export function graphConstructor(graphology: unknown): DirectedGraphConstructor {
    const loaded = graphology as DirectedGraphConstructor & { default?: DirectedGraphConstructor };
    return loaded.default ?? loaded;
}

const Graph = graphConstructor(GraphDefault);

/**
 * Renderer-facing view of a node.
 */
export interface RendererNode {
    key: CanonicalKey;
    title: string;
    authors: string[];
    year: number | null;
    venue: string;
    doi?: string;
    c_in?: number;
    c_out?: number;
}

/**
 * Graph handed to renderers and exporters: three keyed node collections plus
 * `[source, target, "cites"]` triples.
 */
export interface RendererGraph {
    seed_papers: Record<CanonicalKey, RendererNode>;
    cited_papers: Record<CanonicalKey, RendererNode>;
    citing_papers: Record<CanonicalKey, RendererNode>;
    edges: Array<[CanonicalKey, CanonicalKey, EdgeType]>;
}

/**
 * Build the seed / cited / citing graph from the citation indices.
 *
 * Cited and citing nodes go through the same threshold and seed exclusion as
 * the ranked result lists. A key lands in one partition only, with seed before
 * cited before citing. Edges run seed → reference and citer → seed, are kept
 * only when both ends are nodes, and collapse to one per (source, target).
 */
export function buildCitationGraph(
    seedSet: SeedSet,
    referenceIndex: CitationIndex,
    citingIndex: CitationIndex,
    kCited: number,
    kCiting: number
): CitationGraph {
    const graph = new Graph({ type: 'directed' });

    for (const seed of seedSet.seeds.values()) {
        graph.addNode(seed.key, { node: seedNode(seed) });
    }

    for (const entry of rankIndex(referenceIndex, seedSet.keys, kCited)) {
        if (!graph.hasNode(entry.key)) {
            graph.addNode(entry.key, { node: candidateNode(entry, 'cited') });
        }
    }

    for (const entry of rankIndex(citingIndex, seedSet.keys, kCiting)) {
        if (!graph.hasNode(entry.key)) {
            graph.addNode(entry.key, { node: candidateNode(entry, 'citing') });
        }
    }

    let selfLoops = 0;
    const addCitation = (source: CanonicalKey, target: CanonicalKey): void => {
        if (source === target) {
            selfLoops++;
            return;
        }
        if (!graph.hasNode(source) || !graph.hasNode(target) || graph.hasEdge(source, target)) return;
        graph.addEdge(source, target, { type: EdgeType.CITES });
    };

    for (const paper of seedSet.papers) {
        for (const reference of paper.references) {
            const key = resolveKey(reference);
            if (key !== undefined) addCitation(paper.key, key);
        }
        for (const citer of paper.citedBy) {
            const key = resolveKey(citer);
            if (key !== undefined) addCitation(key, paper.key);
        }
    }

    if (selfLoops > 0) {
        getLogger().warn({ selfLoops }, 'Dropped self-citations between a seed and itself');
    }

    const nodes = graph.mapNodes((_key, attributes) => attributes.node);
    const edges = graph.mapEdges((_edge, attributes, source, target) => ({
        source,
        target,
        type: attributes.type,
    }));

    getLogger().debug({ nodes: graph.order, edges: graph.size }, 'Citation graph built');
    return { nodes, edges };
}

/**
 * Build the graph for a finished analysis, with the analysis thresholds.
 */
export function buildGraphFromAnalysis(analysis: CitationAnalysis): CitationGraph {
    return buildCitationGraph(
        analysis.seedSet,
        analysis.referenceIndex,
        analysis.citingIndex,
        analysis.kCited,
        analysis.kCiting
    );
}

/**
 * Regroup graph nodes by partition, keyed by canonical key.
 */
export function toRendererGraph(graph: CitationGraph): RendererGraph {
    const result: RendererGraph = {
        seed_papers: {},
        cited_papers: {},
        citing_papers: {},
        edges: graph.edges.map((edge) => [edge.source, edge.target, edge.type]),
    };

    for (const node of graph.nodes) {
        const view: RendererNode = {
            key: node.key,
            title: node.record.title ?? 'Unknown',
            authors: node.record.authors ? [...node.record.authors] : [],
            year: node.record.year ?? null,
            venue: node.record.venue ?? '',
        };

        switch (node.partition) {
            case 'seed':
                result.seed_papers[node.key] = { ...view, doi: node.inputDoi ?? '' };
                break;
            case 'cited':
                result.cited_papers[node.key] = { ...view, c_in: node.count ?? 0 };
                break;
            case 'citing':
                result.citing_papers[node.key] = { ...view, c_out: node.count ?? 0 };
                break;
        }
    }

    return result;
}

/**
 * Nodes of one partition, in graph order.
 */
export function nodesIn(graph: CitationGraph, partition: NodePartition): GraphNode[] {
    return graph.nodes.filter((node) => node.partition === partition);
}

// ─── Internal helpers ─────────────────────────────────

function nodeLabel(title: string | undefined): string {
    return truncate(title || 'Unknown', NODE_LABEL_LENGTH);
}

function seedNode(seed: SeedInfo): GraphNode {
    return {
        key: seed.key,
        partition: 'seed',
        record: seed.record,
        count: null,
        inputDoi: seed.ref.doi,
        label: nodeLabel(seed.record.title),
        size: SEED_NODE_SIZE,
    };
}

function candidateNode(entry: AggregatedEntry, partition: 'cited' | 'citing'): GraphNode {
    return {
        key: entry.key,
        partition,
        record: entry.record,
        count: entry.count,
        label: nodeLabel(entry.record.title),
        size: 15 + entry.count * 5,
    };
}
