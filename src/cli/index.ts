#!/usr/bin/env node
import { Command } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import type { CociteConfig, LogLevel } from '../types/index.js';
import type { ExportFormat } from '../exporters/export.js';
import { openCache, runAnalyze, runExport, runFetch, runGraph, VERSION } from './commands.js';
import { parseExportFormat, parseLogLevelOption, parsePositiveInt } from './options.js';

interface GlobalFlags {
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface ThresholdFlags {
    kCited?: number;
    kCiting?: number;
}

interface FetchFlags {
    input: string;
    output: string;
    maxCiting?: number;
    maxReferences?: number;
    cache: boolean;
}

interface AnalyzeFlags extends ThresholdFlags {
    input: string;
    outputCited: string;
    outputCiting: string;
}

interface GraphFlags extends ThresholdFlags {
    input: string;
    out: string;
}

interface ExportFlags extends ThresholdFlags {
    input: string;
    format: ExportFormat;
    out?: string;
}

const program = new Command();

program
    .name('cocite')
    .description('Find the papers a seed set of papers cites, and is cited by, in common.')
    .version(VERSION)
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseLogLevelOption)
    .option('--json-logs', 'Output JSON logs');

/**
 * Resolve config with the global flags folded in and start the logger.
 */
async function setup(command: Command, overrides: ConfigOverrides): Promise<CociteConfig> {
    const globals = command.optsWithGlobals<GlobalFlags>();
    const config = await resolveConfig({
        ...overrides,
        logLevel: globals.logLevel,
        jsonLogs: globals.jsonLogs,
    });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

function fail(action: string, error: unknown): never {
    getLogger().error({ error }, `${action} failed`);
    process.exit(1);
}

// ─── FETCH command ────────────────────────────────────────

program
    .command('fetch')
    .description('Fetch metadata, references and citing works for a list of DOIs')
    .requiredOption('-i, --input <path>', 'Text file with one DOI per line')
    .requiredOption('-o, --output <path>', 'Output citation document (JSON)')
    .option('--max-citing <n>', 'Max citing works per paper and source', parsePositiveInt)
    .option('--max-references <n>', 'Max references per paper and source', parsePositiveInt)
    .option('--no-cache', 'Disable response caching')
    .action(async (opts: FetchFlags, command: Command) => {
        const config = await setup(command, {
            fetch: { maxCiting: opts.maxCiting, maxReferences: opts.maxReferences },
            cache: opts.cache ? undefined : { enabled: false },
        });

        try {
            const summary = await runFetch(config, { input: opts.input, output: opts.output });
            console.log(`\nResults saved to: ${opts.output}`);
            console.log(`Successfully processed: ${summary.found}/${summary.total} papers`);
            console.log(`Total references found: ${summary.references}`);
            console.log(`Total citing works found: ${summary.citedBy}`);
        } catch (error) {
            fail('Fetch', error);
        }
    });

// ─── ANALYZE command ──────────────────────────────────────

program
    .command('analyze')
    .description('Rank the papers cited by, and citing, at least k seed papers')
    .requiredOption('-i, --input <path>', 'Citation document from `cocite fetch`')
    .option('--k-cited <n>', 'Minimum number of seeds that must cite a paper', parsePositiveInt)
    .option('--k-citing <n>', 'Minimum number of seeds a paper must cite', parsePositiveInt)
    .option('--output-cited <path>', 'Output file for cited papers', 'k_cited.json')
    .option('--output-citing <path>', 'Output file for citing papers', 'k_citing.json')
    .action(async (opts: AnalyzeFlags, command: Command) => {
        const config = await setup(command, { kCited: opts.kCited, kCiting: opts.kCiting });

        try {
            const result = runAnalyze(config, {
                input: opts.input,
                outputCited: opts.outputCited,
                outputCiting: opts.outputCiting,
            });
            console.log(`Seed set contains ${result.seeds} papers`);
            console.log(`Saved cited papers to: ${opts.outputCited}`);
            console.log(`Saved citing papers to: ${opts.outputCiting}`);
            console.log(result.summary.join('\n'));
        } catch (error) {
            fail('Analysis', error);
        }
    });

// ─── GRAPH command ────────────────────────────────────────

program
    .command('graph')
    .description('Generate a self-contained HTML viewer of the seed / cited / citing graph')
    .requiredOption('-i, --input <path>', 'Citation document from `cocite fetch`')
    .option('--k-cited <n>', 'Minimum number of seeds that must cite a paper', parsePositiveInt)
    .option('--k-citing <n>', 'Minimum number of seeds a paper must cite', parsePositiveInt)
    .option('-o, --out <path>', 'Output HTML file path', 'graph.html')
    .action(async (opts: GraphFlags, command: Command) => {
        const config = await setup(command, { kCited: opts.kCited, kCiting: opts.kCiting });

        try {
            const counts = runGraph(config, { input: opts.input, output: opts.out });
            console.log(`Viewer generated: ${opts.out}`);
            console.log(`  Seed papers:   ${counts.seed}`);
            console.log(`  Cited papers:  ${counts.cited} (k=${config.kCited})`);
            console.log(`  Citing papers: ${counts.citing} (k=${config.kCiting})`);
            console.log(`  Edges:         ${counts.edges}`);
        } catch (error) {
            fail('Graph generation', error);
        }
    });

// ─── EXPORT command ───────────────────────────────────────

program
    .command('export')
    .description('Export the graph to JSON, GraphML, GEXF, CSV, or Mermaid')
    .requiredOption('-i, --input <path>', 'Citation document from `cocite fetch`')
    .requiredOption('-f, --format <format>', 'Export format: json | graphml | gexf | csv | mermaid', parseExportFormat)
    .option('-o, --out <path>', 'Output file path')
    .option('--k-cited <n>', 'Minimum number of seeds that must cite a paper', parsePositiveInt)
    .option('--k-citing <n>', 'Minimum number of seeds a paper must cite', parsePositiveInt)
    .action(async (opts: ExportFlags, command: Command) => {
        const config = await setup(command, { kCited: opts.kCited, kCiting: opts.kCiting });

        try {
            const outputPath = runExport(config, { input: opts.input, format: opts.format, output: opts.out });
            console.log(`Exported to ${outputPath}`);
        } catch (error) {
            fail('Export', error);
        }
    });

// ─── CACHE command ────────────────────────────────────────

program
    .command('cache')
    .description('Manage the response cache')
    .argument('<action>', 'Action: clear | stats')
    .action(async (action: string, _opts: object, command: Command) => {
        const config = await setup(command, {});
        const cache = openCache(config);

        switch (action) {
            case 'clear':
                cache.clear();
                console.log('Cache cleared.');
                break;
            case 'stats': {
                const stats = cache.getStats();
                console.log(`Cache (${stats.directory}): ${stats.entries} entries, ${(stats.bytes / 1024).toFixed(1)} KB`);
                break;
            }
            default:
                console.error(`Unknown action: ${action}. Valid: clear, stats`);
                process.exit(1);
        }
    });

program.parseAsync().catch((error: unknown) => fail('Command', error));
