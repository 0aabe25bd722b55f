#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { runHarvest } from '../builder/harvest-builder.js';
import { EXPORT_EXTENSIONS, exportSnapshot, parseExportFormat } from '../exporters/export.js';
import { HarvestDatabase } from '../storage/database.js';
import { VERSION } from '../version.js';
import type { LogLevel, PrepubGraphConfig, PreprintServer } from '../types/index.js';

// ─── Option parsing ───────────────────────────────────────

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Not a non-negative integer.');
    }
    return parsed;
}

function parseServer(value: string): PreprintServer {
    if (value === 'biorxiv' || value === 'medrxiv') return value;
    throw new InvalidArgumentError('Expected biorxiv or medrxiv.');
}

function parseLogLevel(value: string): LogLevel {
    if (value === 'error' || value === 'warn' || value === 'info' || value === 'debug') return value;
    throw new InvalidArgumentError('Expected debug, info, warn or error.');
}

interface HarvestOptions {
    from: string;
    to: string;
    server?: PreprintServer;
    out?: string;
    apiBase?: string;
    mailto?: string;
    pageSize?: number;
    maxAttempts?: number;
    baseDelay?: number;
    concurrency?: number;
    timeout?: number;
    rps?: number;
    journals?: boolean;
    links?: boolean;
    missingVersions?: boolean;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface ExportOptions {
    input: string;
    format: string;
    out?: string;
}

interface InputOptions {
    input: string;
}

const program = new Command();

program
    .name('prepubgraph')
    .description('Harvest bioRxiv / medRxiv preprint metadata into a cross-reference graph.')
    .version(VERSION);

// ─── HARVEST command ──────────────────────────────────────

program
    .command('harvest')
    .description('Harvest an interval of preprints and write a snapshot database')
    .requiredOption('--from <date>', 'Interval start (YYYY-MM-DD)')
    .requiredOption('--to <date>', 'Interval end (YYYY-MM-DD)')
    .option('-s, --server <server>', 'Preprint server: biorxiv | medrxiv', parseServer)
    .option('-o, --out <path>', 'Output database path')
    .option('--api-base <url>', 'Details API base URL')
    .option('--mailto <email>', 'Contact address sent in the User-Agent')
    .option('--page-size <n>', 'Records per page', parseInteger)
    .option('--max-attempts <n>', 'Attempts per request before giving up', parseInteger)
    .option('--base-delay <ms>', 'Delay before the first retry', parseInteger)
    .option('-c, --concurrency <n>', 'Requests in flight at once', parseInteger)
    .option('--timeout <ms>', 'Per-request timeout', parseInteger)
    .option('--rps <n>', 'Requests per second per API', parseInteger)
    .option('--no-journals', 'Skip journal and publication lookups')
    .option('--links', 'Classify full-text links through Crossref')
    .option('--no-missing-versions', 'Skip fetching missing initial versions')
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: HarvestOptions) => {
        const cliConfig: Partial<PrepubGraphConfig> = {
            from: opts.from,
            to: opts.to,
            server: opts.server,
            out: opts.out,
            apiBase: opts.apiBase,
            mailto: opts.mailto,
            pageSize: opts.pageSize,
            maxAttempts: opts.maxAttempts,
            baseDelayMs: opts.baseDelay,
            concurrency: opts.concurrency,
            timeout: opts.timeout,
            requestsPerSecond: opts.rps,
            // Negated flags default to true; only an explicit --no-* overrides the file
            resolveJournals: opts.journals === false ? false : undefined,
            resolveLinks: opts.links,
            fetchMissingVersions: opts.missingVersions === false ? false : undefined,
            logLevel: opts.logLevel,
            jsonLogs: opts.jsonLogs,
        };

        const config = await resolveConfig(cliConfig);
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

        const logger = getLogger();
        try {
            const result = await runHarvest(config);
            logger.info({ out: result.out, failedPages: result.stats.failedPages }, 'Harvest finished');
        } catch (error) {
            logger.error({ error }, 'Harvest failed');
            process.exit(1);
        }
    });

// ─── EXPORT command ───────────────────────────────────────

program
    .command('export')
    .description('Export a snapshot to JSON, CSV, or GraphML')
    .requiredOption('-i, --input <dbPath>', 'Input database path')
    .requiredOption('-f, --format <format>', 'Export format: json | csv | graphml')
    .option('-o, --out <path>', 'Output file path')
    .action((opts: ExportOptions) => {
        try {
            const format = parseExportFormat(opts.format);
            const outputPath = opts.out ?? opts.input.replace(/\.db$/, '') + EXPORT_EXTENSIONS[format];
            exportSnapshot(opts.input, outputPath, format);
            console.log(`Exported to ${outputPath}`);
        } catch (error) {
            console.error('Export failed:', error);
            process.exit(1);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show snapshot statistics')
    .requiredOption('-i, --input <dbPath>', 'Input database path')
    .action((opts: InputOptions) => {
        try {
            const db = new HarvestDatabase(opts.input);
            const stats = db.getStats();
            db.close();

            console.log('\nprepubgraph snapshot\n');
            console.log(`  Articles:         ${stats.articles} (${stats.revisions} revisions)`);
            console.log(`  Journals:         ${stats.journals}`);
            console.log(`  Publications:     ${stats.publications}`);
            console.log(`  Missing version 1: ${stats.missingVersions}`);
            console.log(`  Graph:            ${stats.nodes} nodes, ${stats.edges} edges`);
            console.log(`  Runs:             ${stats.runs}`);

            if (Object.keys(stats.edgesByRelationship).length > 0) {
                console.log('\n  Relationships:');
                for (const [relationship, count] of Object.entries(stats.edgesByRelationship)) {
                    console.log(`    ${relationship}: ${count}`);
                }
            }

            console.log('');
        } catch (error) {
            console.error('Inspect failed:', error);
            process.exit(1);
        }
    });

// ─── MISSING command ──────────────────────────────────────

program
    .command('missing')
    .description('List preprint DOIs whose publication still lacks version 1')
    .requiredOption('-i, --input <dbPath>', 'Input database path')
    .action((opts: InputOptions) => {
        try {
            const db = new HarvestDatabase(opts.input);
            const rows = db.getMissingVersions();
            db.close();

            for (const doi of [...new Set(rows.map((row) => row.doi))].sort()) {
                console.log(doi);
            }
        } catch (error) {
            console.error('Missing-version listing failed:', error);
            process.exit(1);
        }
    });

await program.parseAsync();
