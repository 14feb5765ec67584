#!/usr/bin/env node
import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, type HarvestConfigInput } from '../utils/config.js';
import { initLogger, isLogLevel } from '../utils/logger.js';
import { createContext } from '../utils/context.js';
import { BatchOrchestrator } from '../builder/harvester.js';
import { CitationDownloader, DirectoryArtifactSink } from '../downloads/citation-downloader.js';
import { exportFromDatabase, exportResults } from '../exporters/export.js';
import { HarvestDatabase } from '../storage/database.js';
import { HARVEST_VERSION, type ExportFormat } from '../types/index.js';

const program = new Command();

function integer(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

function seconds(value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative number of seconds.');
    }
    return Math.round(parsed * 1000);
}

function exportFormat(value: string): ExportFormat {
    const format = value.toLowerCase();
    if (format !== 'csv' && format !== 'json') {
        throw new InvalidArgumentError('Valid formats: csv, json.');
    }
    return format;
}

function logLevel(value: string): HarvestConfigInput['logLevel'] {
    if (!isLogLevel(value)) {
        throw new InvalidArgumentError('Valid levels: error, warn, info, debug, silent.');
    }
    return value;
}

program
    .name('dblp-harvest')
    .description('Query DBLP for keyword × venue × year combinations and collect the hits per keyword.')
    .version(HARVEST_VERSION);

// ─── SEARCH command ───────────────────────────────────────

interface SearchOptions {
    keywords?: string[];
    venues?: string[];
    years?: string[];
    outdir?: string;
    saveBibtex?: boolean;
    format?: ExportFormat;
    maxRetries?: number;
    backoff?: number;
    delay?: number;
    paceAlways?: boolean;
    maxHits?: number;
    timeout?: number;
    logLevel?: HarvestConfigInput['logLevel'];
    jsonLogs?: boolean;
    logFile?: string;
}

program
    .command('search')
    .description('Run every query and write the results database and report')
    .option('-k, --keywords <keywords...>', 'Search keywords')
    .option('-v, --venues <venues...>', 'Conference venues, or "all"')
    .option('-y, --years <years...>', 'Publication years, or "all"')
    .option('-o, --outdir <dir>', 'Output directory')
    .option('--save-bibtex', 'Download a BibTeX record for every hit')
    .option('-f, --format <format>', 'Report format: csv | json', exportFormat)
    .option('--max-retries <n>', 'Retries per query', integer)
    .option('--backoff <seconds>', 'Initial retry backoff', seconds)
    .option('--delay <seconds>', 'Pause between queries', seconds)
    .option('--pace-always', 'Pause after every query, not only successful ones')
    .option('--max-hits <n>', 'Hits requested per query (max 1000)', integer)
    .option('--timeout <seconds>', 'Per-request timeout', seconds)
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', logLevel)
    .option('--json-logs', 'Output JSON logs')
    .option('--log-file <path>', 'Also write JSON logs to a file')
    .action(async (opts: SearchOptions) => {
        const cliConfig: HarvestConfigInput = {
            keywords: opts.keywords,
            venues: opts.venues,
            years: opts.years,
            outdir: opts.outdir,
            saveBibtex: opts.saveBibtex,
            format: opts.format,
            maxHits: opts.maxHits,
            timeoutMs: opts.timeout,
            interQueryDelayMs: opts.delay,
            pacing: opts.paceAlways ? 'always' : undefined,
            logLevel: opts.logLevel,
            jsonLogs: opts.jsonLogs,
            logFile: opts.logFile,
            retry: {
                maxRetries: opts.maxRetries,
                backoffBaseMs: opts.backoff,
            },
        };

        const config = await resolveConfig(cliConfig).catch((error: unknown) => {
            console.error(`Invalid configuration: ${error instanceof Error ? error.message : String(error)}`);
            process.exit(1);
        });

        const logger = initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs, logFile: config.logFile });
        mkdirSync(config.outdir, { recursive: true });

        const ctx = createContext(config, { logger });
        const downloader = config.saveBibtex
            ? new CitationDownloader(ctx, new DirectoryArtifactSink(join(config.outdir, 'bibs'), config.bibExtension))
            : undefined;
        const orchestrator = new BatchOrchestrator(ctx, { downloader });

        try {
            const aggregation = await orchestrator.run(config.keywords, config.venues, config.years);

            const dbPath = join(config.outdir, 'results.db');
            const db = new HarvestDatabase(dbPath);
            try {
                const runId = db.insertRun({
                    created_at: new Date().toISOString(),
                    harvest_version: HARVEST_VERSION,
                    config_json: JSON.stringify(config),
                    stats_json: JSON.stringify(orchestrator.getStats()),
                });
                db.insertResults(runId, aggregation);
                logger.info({ dbPath, runId }, 'Results stored');
            } finally {
                db.close();
            }

            const files = exportResults(aggregation, config.outdir, config.format);
            logger.info({ files }, 'Search complete!');
        } catch (error) {
            logger.error({ error }, 'Search failed');
            process.exit(1);
        }
    });

// ─── EXPORT command ───────────────────────────────────────

program
    .command('export')
    .description('Write the report for a stored run')
    .requiredOption('-i, --input <dbPath>', 'Input database path')
    .requiredOption('-f, --format <format>', 'Export format: csv | json', exportFormat)
    .option('-o, --out <dir>', 'Output directory', '.')
    .option('--run <id>', 'Run id (default: latest)', integer)
    .action((opts: { input: string; format: ExportFormat; out: string; run?: number }) => {
        try {
            const files = exportFromDatabase(opts.input, opts.out, opts.format, opts.run);
            for (const file of files) {
                console.log(`Exported to ${file}`);
            }
        } catch (error) {
            console.error('Export failed:', error);
            process.exit(1);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show database statistics')
    .requiredOption('-i, --input <dbPath>', 'Input database path')
    .action((opts: { input: string }) => {
        try {
            const db = new HarvestDatabase(opts.input);
            const stats = db.getStats();
            const runs = db.getRuns();
            db.close();

            console.log('\n📚 dblp-harvest Database Statistics\n');
            console.log(`  Runs:     ${stats.runs}`);
            console.log(`  Results:  ${stats.results}`);

            if (Object.keys(stats.resultsByKeyword).length > 0) {
                console.log('\n  Results by keyword:');
                for (const [keyword, count] of Object.entries(stats.resultsByKeyword)) {
                    console.log(`    ${keyword}: ${count}`);
                }
            }

            if (runs.length > 0) {
                console.log('\n  Runs:');
                for (const run of runs) {
                    console.log(`    #${run.run_id}  ${run.created_at}  ${run.result_count} results`);
                }
            }

            console.log('');
        } catch (error) {
            console.error('Inspect failed:', error);
            process.exit(1);
        }
    });

program.parseAsync().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
});
