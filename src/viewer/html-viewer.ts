import { writeFileSync } from 'node:fs';
import type { CitationGraph, GraphNode, NodePartition } from '../types/index.js';
import type { ThresholdOptions } from '../analysis/aggregator.js';
import { nodesIn } from '../builder/graph-builder.js';
import { getLogger } from '../utils/logger.js';

/** Fill color and Cytoscape shape per partition */
export const PARTITION_STYLE: Record<NodePartition, { color: string; shape: string }> = {
    seed: { color: '#4CAF50', shape: 'rectangle' },
    cited: { color: '#2196F3', shape: 'ellipse' },
    citing: { color: '#FF9800', shape: 'triangle' },
};

interface CytoscapeElement {
    data: Record<string, unknown>;
}

/**
 * Generate a self-contained HTML viewer using Cytoscape.js.
 *
 * Features:
 * - Seed / cited / citing partitions by color and shape
 * - Node sizing by citation count
 * - Legend with partition counts and thresholds
 * - Search / filter
 * - Click-to-show paper details
 */
export function generateViewer(graph: CitationGraph, outputPath: string, thresholds: ThresholdOptions): void {
    writeFileSync(outputPath, renderViewerHtml(graph, thresholds), 'utf-8');
    getLogger().info(
        { outputPath, nodes: graph.nodes.length, edges: graph.edges.length },
        'HTML viewer generated'
    );
}

/**
 * Render the viewer page as a string.
 */
export function renderViewerHtml(graph: CitationGraph, thresholds: ThresholdOptions): string {
    const counts = {
        seed: nodesIn(graph, 'seed').length,
        cited: nodesIn(graph, 'cited').length,
        citing: nodesIn(graph, 'citing').length,
    };
    return buildHtml(buildCytoscapeData(graph), counts, graph.edges.length, thresholds);
}

/**
 * Cytoscape elements as a JSON literal that is safe inside a <script> tag.
 */
export function buildCytoscapeData(graph: CitationGraph): string {
    const nodes: CytoscapeElement[] = graph.nodes.map((node) => ({ data: nodeData(node) }));

    const edges: CytoscapeElement[] = graph.edges.map((edge, i) => ({
        data: {
            id: `e${i}`,
            source: edge.source,
            target: edge.target,
            type: edge.type,
        },
    }));

    return JSON.stringify([...nodes, ...edges]).replace(/</g, '\\u003c');
}

function nodeData(node: GraphNode): Record<string, unknown> {
    const style = PARTITION_STYLE[node.partition];
    const { record } = node;

    return {
        id: node.key,
        label: node.label,
        partition: node.partition,
        title: record.title ?? 'Unknown',
        authors: record.authors ? [...record.authors] : [],
        year: record.year ?? null,
        venue: record.venue ?? '',
        doi: node.inputDoi ?? record.doi ?? '',
        count: node.count,
        color: style.color,
        shape: style.shape,
        size: node.size,
    };
}

function buildHtml(
    graphData: string,
    counts: Record<NodePartition, number>,
    edgeCount: number,
    thresholds: ThresholdOptions
): string {
    const nodeCount = counts.seed + counts.cited + counts.citing;

    return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>Citation Graph</title>
<script src="https://unpkg.com/cytoscape@3.30.4/dist/cytoscape.min.js"></script>
<style>
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body {
    font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', sans-serif;
    background: #ffffff;
    color: #333333;
    height: 100vh;
    overflow: hidden;
  }
  #cy {
    width: 100%;
    height: 100vh;
    position: absolute;
    top: 0;
    left: 0;
  }
  .panel {
    position: absolute;
    background: rgba(255, 255, 255, 0.95);
    border-radius: 8px;
    box-shadow: 0 2px 10px rgba(0, 0, 0, 0.2);
    padding: 15px;
    z-index: 10;
  }
  .legend { top: 10px; left: 10px; font-size: 12px; }
  .legend h3 { margin: 0 0 10px 0; font-size: 14px; }
  .legend-item { display: flex; align-items: center; gap: 8px; margin: 5px 0; }
  .swatch { width: 20px; height: 20px; flex-shrink: 0; }
  .swatch.seed { background: ${PARTITION_STYLE.seed.color}; }
  .swatch.cited { background: ${PARTITION_STYLE.cited.color}; border-radius: 50%; }
  .swatch.citing {
    width: 0; height: 0;
    border-left: 10px solid transparent;
    border-right: 10px solid transparent;
    border-bottom: 18px solid ${PARTITION_STYLE.citing.color};
  }
  .legend .note { margin-top: 10px; font-size: 11px; color: #666666; }
  .search-panel { top: 10px; right: 10px; width: 300px; }
  .search-panel input {
    width: 100%;
    padding: 8px 12px;
    border: 1px solid #cccccc;
    border-radius: 6px;
    font-size: 14px;
    outline: none;
  }
  .search-panel input:focus { border-color: ${PARTITION_STYLE.cited.color}; }
  .detail-panel {
    bottom: 10px;
    right: 10px;
    width: 360px;
    max-height: 50vh;
    overflow-y: auto;
    display: none;
  }
  .detail-panel.active { display: block; }
  .detail-panel h4 { font-size: 12px; color: #666666; margin-bottom: 4px; }
  .detail-panel h3 { font-size: 15px; margin-bottom: 8px; line-height: 1.3; }
  .detail-field {
    display: flex;
    justify-content: space-between;
    gap: 12px;
    font-size: 12px;
    padding: 4px 0;
    border-bottom: 1px solid #eeeeee;
  }
  .detail-field .label { color: #666666; }
  .detail-field a { color: ${PARTITION_STYLE.cited.color}; text-decoration: none; }
</style>
</head>
<body>
  <div id="cy"></div>

  <div class="panel legend">
    <h3>Citation Graph Legend</h3>
    <div class="legend-item"><span class="swatch seed"></span> Seed papers: ${counts.seed}</div>
    <div class="legend-item"><span class="swatch cited"></span> Cited by &ge;${thresholds.kCited} seeds: ${counts.cited}</div>
    <div class="legend-item"><span class="swatch citing"></span> Citing &ge;${thresholds.kCiting} seeds: ${counts.citing}</div>
    <div class="note">${nodeCount} papers &middot; ${edgeCount} edges &middot; paper &rarr; cites &rarr; paper</div>
  </div>

  <div class="panel search-panel">
    <input type="text" id="search" placeholder="Search papers..." autocomplete="off" />
  </div>

  <div class="panel detail-panel" id="detail">
    <h4 id="detail-kind"></h4>
    <h3 id="detail-title"></h3>
    <div id="detail-fields"></div>
  </div>

<script>
const graphData = ${graphData};

const cy = cytoscape({
  container: document.getElementById('cy'),
  elements: graphData,
  style: [
    {
      selector: 'node',
      style: {
        'label': 'data(label)',
        'background-color': 'data(color)',
        'shape': 'data(shape)',
        'width': 'data(size)',
        'height': 'data(size)',
        'font-size': '8px',
        'color': '#333333',
        'text-valign': 'bottom',
        'text-margin-y': 5,
        'text-max-width': '100px',
        'text-wrap': 'ellipsis',
        'border-width': 2,
        'border-color': '#ffffff',
      },
    },
    {
      selector: 'node[partition = "seed"]',
      style: { 'border-width': 3, 'border-color': '#2e7d32' },
    },
    {
      selector: 'edge',
      style: {
        'width': 1,
        'line-color': '#cccccc',
        'target-arrow-color': '#cccccc',
        'target-arrow-shape': 'triangle',
        'curve-style': 'bezier',
        'arrow-scale': 0.8,
      },
    },
    {
      selector: '.highlighted',
      style: { 'opacity': 1, 'border-width': 3, 'border-color': '#f44336' },
    },
    {
      selector: '.faded',
      style: { 'opacity': 0.15 },
    },
  ],
  layout: {
    name: 'cose',
    animate: false,
    nodeRepulsion: 8000,
    idealEdgeLength: 120,
    nodeOverlap: 20,
  },
  wheelSensitivity: 0.3,
});

const KIND = { seed: 'Seed paper', cited: 'Cited paper', citing: 'Citing paper' };

function field(label, value) {
  const row = document.createElement('div');
  row.className = 'detail-field';
  const name = document.createElement('span');
  name.className = 'label';
  name.textContent = label;
  row.appendChild(name);
  if (value instanceof Node) {
    row.appendChild(value);
  } else {
    const text = document.createElement('span');
    text.textContent = value === null || value === '' ? '-' : String(value);
    row.appendChild(text);
  }
  return row;
}

// Detail panel
cy.on('tap', 'node', function(evt) {
  const d = evt.target.data();
  document.getElementById('detail').classList.add('active');
  document.getElementById('detail-kind').textContent = KIND[d.partition];
  document.getElementById('detail-title').textContent = d.title;

  const authors = d.authors.slice(0, 3).join(', ') + (d.authors.length > 3 ? '...' : '');
  const fields = document.getElementById('detail-fields');
  fields.replaceChildren(
    field('Year', d.year),
    field('Authors', authors),
    field('Venue', d.venue),
  );
  if (d.partition === 'cited') fields.appendChild(field('Cited by seeds (c_in)', d.count));
  if (d.partition === 'citing') fields.appendChild(field('Cites seeds (c_out)', d.count));
  if (d.doi) {
    const link = document.createElement('a');
    link.href = 'https://doi.org/' + d.doi;
    link.target = '_blank';
    link.textContent = d.doi;
    fields.appendChild(field('DOI', link));
  }

  cy.elements().addClass('faded');
  evt.target.closedNeighborhood().removeClass('faded').addClass('highlighted');
});

cy.on('tap', function(evt) {
  if (evt.target === cy) {
    document.getElementById('detail').classList.remove('active');
    cy.elements().removeClass('highlighted faded');
  }
});

// Search
document.getElementById('search').addEventListener('input', function(e) {
  const q = e.target.value.toLowerCase().trim();
  cy.elements().removeClass('highlighted faded');
  if (!q) return;
  cy.elements().addClass('faded');
  cy.nodes().filter(n => {
    const d = n.data();
    return d.title.toLowerCase().includes(q) ||
           d.venue.toLowerCase().includes(q) ||
           d.doi.toLowerCase().includes(q) ||
           d.authors.some(a => a.toLowerCase().includes(q));
  }).removeClass('faded').addClass('highlighted');
});
</script>
</body>
</html>`;
}
