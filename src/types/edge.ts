import type { CanonicalKey, CanonicalRecord } from './paper.js';

/**
 * Relation carried by graph edges. Seeds cite their references and citing
 * papers cite the seeds, so a single relation covers both directions.
 */
export enum EdgeType {
    CITES = 'cites',
}

/** Node partition in the citation graph. */
export type NodePartition = 'seed' | 'cited' | 'citing';

export interface GraphNode {
    key: CanonicalKey;
    partition: NodePartition;
    record: CanonicalRecord;

    /** c_in for cited nodes, c_out for citing nodes, null for seeds */
    count: number | null;

    /** DOI the user supplied, seeds only */
    inputDoi?: string;

    /** Short display title */
    label: string;

    /** Display size in pixels */
    size: number;
}

/**
 * Directed edge between two canonical keys.
 */
export interface GraphEdge {
    source: CanonicalKey;
    target: CanonicalKey;
    type: EdgeType;
}

export interface CitationGraph {
    nodes: GraphNode[];
    edges: GraphEdge[];
}
