import { writeFileSync } from 'node:fs';
import type { CanonicalKey, CitationGraph, GraphNode } from '../types/index.js';
import type { ThresholdOptions } from '../analysis/aggregator.js';
import { toRendererGraph } from '../builder/graph-builder.js';
import { keyNamespace } from '../identity/key-resolver.js';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

export const EXPORT_FORMATS = ['json', 'graphml', 'gexf', 'csv', 'mermaid'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some((format) => format === value);
}

/** Mermaid diagrams stop rendering usefully well before this */
const MERMAID_MAX_EDGES = 100;

// ─── Main Export Function ────────────────────────────────

/**
 * Export a citation graph to a file in the given format.
 */
export function exportGraph(
    graph: CitationGraph,
    outputPath: string,
    format: ExportFormat,
    thresholds: ThresholdOptions
): void {
    const content = renderExport(graph, format, thresholds);
    writeFileSync(outputPath, content, 'utf-8');
    getLogger().info(
        { format, outputPath, nodes: graph.nodes.length, edges: graph.edges.length },
        'Graph exported'
    );
}

/**
 * Render a citation graph in the given format.
 */
export function renderExport(graph: CitationGraph, format: ExportFormat, thresholds: ThresholdOptions): string {
    switch (format) {
        case 'json':
            return exportJson(graph, thresholds);
        case 'graphml':
            return exportGraphML(graph);
        case 'gexf':
            return exportGEXF(graph);
        case 'csv':
            return exportCSV(graph);
        case 'mermaid':
            return exportMermaid(graph);
    }
}

// ─── Format Implementations ─────────────────────────────

function exportJson(graph: CitationGraph, thresholds: ThresholdOptions): string {
    return JSON.stringify(
        {
            k_cited: thresholds.kCited,
            k_citing: thresholds.kCiting,
            ...toRendererGraph(graph),
        },
        null,
        2
    );
}

function esc(value: string | null | undefined): string {
    return (value ?? '')
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

function exportGraphML(graph: CitationGraph): string {
    let xml = `<?xml version="1.0" encoding="UTF-8"?>
<graphml xmlns="http://graphml.graphdrawing.org/xmlns"
         xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
  <key id="partition" for="node" attr.name="partition" attr.type="string"/>
  <key id="title" for="node" attr.name="title" attr.type="string"/>
  <key id="year" for="node" attr.name="year" attr.type="int"/>
  <key id="venue" for="node" attr.name="venue" attr.type="string"/>
  <key id="doi" for="node" attr.name="doi" attr.type="string"/>
  <key id="count" for="node" attr.name="count" attr.type="int"/>
  <key id="type" for="edge" attr.name="type" attr.type="string"/>
  <graph id="citations" edgedefault="directed">
`;

    for (const node of graph.nodes) {
        xml += `    <node id="${esc(node.key)}">
      <data key="partition">${node.partition}</data>
      <data key="title">${esc(node.record.title)}</data>
      <data key="year">${node.record.year ?? ''}</data>
      <data key="venue">${esc(node.record.venue)}</data>
      <data key="doi">${esc(nodeDoi(node))}</data>
      <data key="count">${node.count ?? ''}</data>
    </node>
`;
    }

    for (const edge of graph.edges) {
        xml += `    <edge source="${esc(edge.source)}" target="${esc(edge.target)}">
      <data key="type">${edge.type}</data>
    </edge>
`;
    }

    xml += `  </graph>
</graphml>
`;

    return xml;
}

function exportGEXF(graph: CitationGraph): string {
    let xml = `<?xml version="1.0" encoding="UTF-8"?>
<gexf xmlns="http://www.gexf.net/1.3"
      version="1.3">
  <meta>
    <creator>cocite</creator>
    <description>Seed, cited and citing papers</description>
  </meta>
  <graph defaultedgetype="directed">
    <attributes class="node">
      <attribute id="0" title="partition" type="string"/>
      <attribute id="1" title="title" type="string"/>
      <attribute id="2" title="year" type="integer"/>
      <attribute id="3" title="venue" type="string"/>
      <attribute id="4" title="count" type="integer"/>
    </attributes>
    <attributes class="edge">
      <attribute id="0" title="type" type="string"/>
    </attributes>
    <nodes>
`;

    for (const node of graph.nodes) {
        xml += `      <node id="${esc(node.key)}" label="${esc(node.label)}">
        <attvalues>
          <attvalue for="0" value="${node.partition}"/>
          <attvalue for="1" value="${esc(node.record.title)}"/>
          <attvalue for="2" value="${node.record.year ?? 0}"/>
          <attvalue for="3" value="${esc(node.record.venue)}"/>
          <attvalue for="4" value="${node.count ?? 0}"/>
        </attvalues>
      </node>
`;
    }

    xml += `    </nodes>
    <edges>
`;

    graph.edges.forEach((edge, i) => {
        xml += `      <edge id="${i}" source="${esc(edge.source)}" target="${esc(edge.target)}">
        <attvalues>
          <attvalue for="0" value="${edge.type}"/>
        </attvalues>
      </edge>
`;
    });

    xml += `    </edges>
  </graph>
</gexf>
`;

    return xml;
}

function csvField(value: string | number | null | undefined): string {
    if (value === null || value === undefined) return '';
    if (typeof value === 'number') return String(value);
    return `"${value.replace(/"/g, '""')}"`;
}

function exportCSV(graph: CitationGraph): string {
    let csv = 'key,key_type,partition,doi,title,year,venue,count\n';
    for (const node of graph.nodes) {
        csv += [
            csvField(node.key),
            keyNamespace(node.key) ?? '',
            node.partition,
            csvField(nodeDoi(node)),
            csvField(node.record.title),
            csvField(node.record.year),
            csvField(node.record.venue),
            csvField(node.count),
        ].join(',') + '\n';
    }

    csv += '\n# EDGES\nsource,target,type\n';
    for (const edge of graph.edges) {
        csv += `${csvField(edge.source)},${csvField(edge.target)},${edge.type}\n`;
    }

    return csv;
}

function exportMermaid(graph: CitationGraph): string {
    // Canonical keys contain spaces and colons, so nodes get positional IDs
    const ids = new Map<CanonicalKey, string>();
    let diagram = 'graph TD\n';

    graph.nodes.forEach((node, i) => {
        const id = `N${i}`;
        ids.set(node.key, id);
        const label = node.label.replace(/"/g, "'");
        diagram += `  ${id}["${label}"]:::${node.partition}\n`;
    });

    diagram += '\n';

    const edgesToRender = graph.edges.slice(0, MERMAID_MAX_EDGES);
    for (const edge of edgesToRender) {
        diagram += `  ${ids.get(edge.source)} --> ${ids.get(edge.target)}\n`;
    }

    if (graph.edges.length > MERMAID_MAX_EDGES) {
        diagram += `\n  %% Note: ${graph.edges.length - MERMAID_MAX_EDGES} additional edges omitted\n`;
    }

    diagram += `
  classDef seed fill:#4CAF50,color:#fff
  classDef cited fill:#2196F3,color:#fff
  classDef citing fill:#FF9800,color:#fff
`;

    return diagram;
}

function nodeDoi(node: GraphNode): string | undefined {
    return node.inputDoi ?? node.record.doi;
}
