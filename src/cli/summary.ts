import type { CitedPaperJson, CitedResultDocument, CitingPaperJson, CitingResultDocument } from '../analysis/results.js';

/** Papers listed per result list */
export const SUMMARY_PAPER_LIMIT = 20;

/** Longest title printed before it is cut */
export const SUMMARY_TITLE_LENGTH = 100;

const RULE = '='.repeat(70);
const DIVIDER = '-'.repeat(70);

/**
 * Human-readable summary of both result documents, one string per line.
 */
export function formatSummary(cited: CitedResultDocument, citing: CitingResultDocument): string[] {
    const lines = ['', RULE, 'ANALYSIS SUMMARY', RULE];

    lines.push('', `📚 Papers CITED by at least ${cited.k_cited} seed papers (R_k): ${cited.count}`);
    lines.push(...paperLines(cited.papers, (p) => `c_in=${p.c_in}`));

    lines.push('', `📖 Papers CITING at least ${citing.k_citing} seed papers (Q_k'): ${citing.count}`);
    lines.push(...paperLines(citing.papers, (p) => `c_out=${p.c_out}`));

    lines.push('', RULE);
    return lines;
}

function paperLines<T extends CitedPaperJson | CitingPaperJson>(papers: T[], count: (paper: T) => string): string[] {
    if (papers.length === 0) return [];

    const lines = [DIVIDER];
    papers.slice(0, SUMMARY_PAPER_LIMIT).forEach((paper, i) => {
        const position = String(i + 1).padStart(2);
        lines.push(`  ${position}. [${count(paper)}] ${cutTitle(paper.title)}`);
        lines.push(`      Year: ${paper.year ?? 'None'} | ${identifier(paper)}`);
    });

    if (papers.length > SUMMARY_PAPER_LIMIT) {
        lines.push(`  ... and ${papers.length - SUMMARY_PAPER_LIMIT} more`);
    }
    return lines;
}

function cutTitle(title: string): string {
    const chars = Array.from(title);
    return chars.length > SUMMARY_TITLE_LENGTH ? `${chars.slice(0, SUMMARY_TITLE_LENGTH).join('')}...` : title;
}

function identifier(paper: CitedPaperJson | CitingPaperJson): string {
    if (paper.doi) return `DOI: ${paper.doi}`;
    if (paper.arxiv_id) return `arXiv: ${paper.arxiv_id}`;
    return 'No ID';
}
