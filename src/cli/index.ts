#!/usr/bin/env node
import { writeFileSync } from 'node:fs';
import { Command } from 'commander';
import { resolveConfig, getApiKey } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import { ConfigError, PipelineAbortedError, errorMessage } from '../utils/errors.js';
import { GEMRADAR_VERSION } from '../utils/version.js';
import { GemRadarDatabase } from '../storage/database.js';
import { SqliteCheckpointStore } from '../storage/checkpoint-store.js';
import { SqliteClassificationStore } from '../storage/classification-store.js';
import { generateSeedPoints, seedsToGeoJSON } from '../collector/seeds.js';
import { createListingSource } from '../sources/index.js';
import { createLlmProvider } from '../classify/providers/index.js';
import { runCollection } from '../pipeline/collect-pipeline.js';
import { runScoring } from '../pipeline/score-pipeline.js';
import { exportScores, type ExportFormat } from '../exporters/export.js';
import { selectTop } from '../scoring/scorer.js';
import type { GemRadarConfig, LlmProvider, Tier } from '../types/index.js';
import {
    buildOverrides,
    parseExportFormat,
    parseInteger,
    parseLogLevel,
    parseNumber,
    parseProvider,
    parseSource,
    parseTier,
    type CollectOptions,
    type GlobalOptions,
    type ScoreOptions,
} from './options.js';

const program = new Command();

program
    .name('gemradar')
    .description('Rank restaurants by how far their rating departs from what their context predicts.')
    .version(GEMRADAR_VERSION);

// ─── Shared helpers ───────────────────────────────────────

function addGlobalOptions(command: Command): Command {
    return command
        .option('--db <path>', 'SQLite database path')
        .option('--config-dir <dir>', 'Directory to search for gemradar.config.json')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseLogLevel)
        .option('--json-logs', 'Output JSON logs');
}

function addCollectOptions(command: Command): Command {
    return command
        .option('-s, --source <source>', 'Listing source: places | synthetic', parseSource)
        .option('--limit <n>', 'Collect at most n seed points this run', parseInteger)
        .option('--concurrency <n>', 'Concurrent collection workers', parseInteger)
        .option('--rps <n>', 'Aggregate requests per second', parseNumber)
        .option('--spacing <m>', 'Seed grid spacing in metres', parseNumber)
        .option('--extra-seeds <file>', 'GeoJSON points to sweep before the grid')
        .option('--retry-failed', 'Re-attempt seeds that failed earlier')
        .option('--no-retry-failed', 'Leave previously failed seeds alone');
}

function addScoreOptions(command: Command): Command {
    return command
        .option('--classify', 'Classify unresolved cuisines with the LLM provider')
        .option('--no-classify', 'Skip LLM classification')
        .option('--provider <provider>', 'Classifier provider: openai | ollama', parseProvider)
        .option('--model <name>', 'Classifier model')
        .option('--max-cv-rmse <x>', 'Quality bound on cross-validated RMSE', parseNumber)
        .option('--seed <n>', 'Model random seed', parseInteger)
        .option('--reclassify', 'Forget stored classifier answers and ask again');
}

async function loadConfig(opts: GlobalOptions & CollectOptions & ScoreOptions): Promise<GemRadarConfig> {
    const config = await resolveConfig(buildOverrides(opts), { searchFrom: opts.configDir });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    getHttpClient({ timeout: 30000, version: GEMRADAR_VERSION });
    return config;
}

/**
 * Abort controller tied to SIGINT. A second SIGINT exits immediately.
 */
function interruptSignal(): AbortSignal {
    const controller = new AbortController();
    process.once('SIGINT', () => {
        getLogger().warn('Interrupt received, finishing the current unit of work (Ctrl-C again to force)');
        controller.abort();
        process.once('SIGINT', () => process.exit(130));
    });
    return controller.signal;
}

function fail(error: unknown, what: string): never {
    if (error instanceof PipelineAbortedError) {
        getLogger().warn(`${what} aborted`);
        process.exit(130);
    }
    if (error instanceof ConfigError) {
        getLogger().error({ issues: error.issues }, error.message);
    } else {
        getLogger().error({ error: errorMessage(error) }, `${what} failed`);
    }
    process.exit(1);
}

function classificationProvider(config: GemRadarConfig): LlmProvider | undefined {
    if (!config.classifier.enabled) return undefined;
    try {
        return createLlmProvider(config.classifier.provider, {
            model: config.classifier.model,
            apiKey: config.classifier.provider === 'openai' ? getApiKey('OPENAI_API_KEY') : undefined,
            baseUrl: config.classifier.provider === 'ollama' ? getApiKey('OLLAMA_BASE_URL') : undefined,
        });
    } catch (error) {
        getLogger().warn({ error: errorMessage(error) }, 'Classifier unavailable, continuing without it');
        return undefined;
    }
}

async function collect(config: GemRadarConfig, db: GemRadarDatabase, signal: AbortSignal): Promise<boolean> {
    const source = createListingSource(config.collector, getApiKey('GOOGLE_PLACES_API_KEY'));
    const { report } = await runCollection(config, { source, store: new SqliteCheckpointStore(db), signal });
    console.log(
        `\nCollected ${report.completed} seed points (${report.entities} listings), ` +
            `${report.failed} failed, ${report.skipped} already done.`
    );
    return !report.aborted;
}

async function score(config: GemRadarConfig, db: GemRadarDatabase, signal: AbortSignal, reclassify = false): Promise<void> {
    const classifications = new SqliteClassificationStore(db);
    if (reclassify) classifications.clear();

    const { table, stats } = await runScoring(new SqliteCheckpointStore(db), db, config, {
        provider: classificationProvider(config),
        signal,
        classifications,
    });
    const cv = stats.crossValidation;
    console.log(`\nScored ${table.length} restaurants.`);
    console.log(
        `  Hidden Gem: ${stats.tiers['Hidden Gem']}  Fair Value: ${stats.tiers['Fair Value']}  Overvalued: ${stats.tiers.Overvalued}`
    );
    if (cv) {
        console.log(`  CV RMSE: ${cv.meanRmse.toFixed(3)} ± ${cv.stdRmse.toFixed(3)} (baseline ${cv.baselineRmse.toFixed(3)})`);
    }
}

// ─── SEEDS command ────────────────────────────────────────

addGlobalOptions(
    program
        .command('seeds')
        .description('Generate the seed points and optionally write them as GeoJSON')
        .option('-o, --out <path>', 'Write seeds as GeoJSON')
        .option('--spacing <m>', 'Seed grid spacing in metres', parseNumber)
        .option('--extra-seeds <file>', 'GeoJSON points to sweep before the grid')
).action(async (opts: GlobalOptions & CollectOptions & { out?: string }) => {
    try {
        const config = await loadConfig(opts);
        const seeds = generateSeedPoints(config.seeds);
        if (opts.out) {
            writeFileSync(opts.out, JSON.stringify(seedsToGeoJSON(seeds), null, 2), 'utf-8');
            console.log(`Wrote ${seeds.length} seed points to ${opts.out}`);
        } else {
            const extra = seeds.filter((s) => s.kind === 'extra').length;
            console.log(`${seeds.length} seed points (${extra} extra, ${seeds.length - extra} grid)`);
        }
    } catch (error) {
        fail(error, 'Seed generation');
    }
});

// ─── COLLECT command ──────────────────────────────────────

addCollectOptions(
    addGlobalOptions(program.command('collect').description('Resumable sweep of the seed points into the checkpoint store'))
).action(async (opts: GlobalOptions & CollectOptions) => {
    let db: GemRadarDatabase | undefined;
    try {
        const config = await loadConfig(opts);
        db = new GemRadarDatabase(config.db);
        const completed = await collect(config, db, interruptSignal());
        db.close();
        if (!completed) process.exit(130);
    } catch (error) {
        db?.close();
        fail(error, 'Collection');
    }
});

// ─── SCORE command ────────────────────────────────────────

addScoreOptions(
    addGlobalOptions(program.command('score').description('Deduplicate, classify, train and score the collected corpus'))
).action(async (opts: GlobalOptions & ScoreOptions) => {
    let db: GemRadarDatabase | undefined;
    try {
        const config = await loadConfig(opts);
        db = new GemRadarDatabase(config.db);
        await score(config, db, interruptSignal(), opts.reclassify);
        db.close();
    } catch (error) {
        db?.close();
        fail(error, 'Scoring');
    }
});

// ─── RUN command ──────────────────────────────────────────

addScoreOptions(
    addCollectOptions(addGlobalOptions(program.command('run').description('Collect, then score')))
).action(async (opts: GlobalOptions & CollectOptions & ScoreOptions) => {
    let db: GemRadarDatabase | undefined;
    try {
        const config = await loadConfig(opts);
        db = new GemRadarDatabase(config.db);
        const signal = interruptSignal();
        const completed = await collect(config, db, signal);
        if (!completed) {
            db.close();
            process.exit(130);
        }
        await score(config, db, signal, opts.reclassify);
        db.close();
    } catch (error) {
        db?.close();
        fail(error, 'Run');
    }
});

// ─── TOP command ──────────────────────────────────────────

interface TopCommandOptions extends GlobalOptions {
    n?: number;
    minReviews?: number;
    tier?: Tier;
    zone?: string;
    category?: string;
    json?: boolean;
}

addGlobalOptions(
    program
        .command('top')
        .description('Print the top rows of the scored table')
        .option('-n <n>', 'Number of rows', parseInteger)
        .option('--min-reviews <n>', 'Minimum review count', parseInteger)
        .option('--tier <tier>', 'Only this tier: hidden-gem | fair-value | overvalued', parseTier)
        .option('--zone <zone>', 'Only this planning area')
        .option('--category <category>', 'Only this cuisine')
        .option('--json', 'Print JSON')
).action(async (opts: TopCommandOptions) => {
    try {
        const config = await loadConfig(opts);
        const db = new GemRadarDatabase(config.db);
        const rows = selectTop(db.getScoredEntities(), {
            n: opts.n ?? config.output.topN,
            minReviews: opts.minReviews ?? config.output.minReviews,
            tier: opts.tier,
            zone: opts.zone,
            category: opts.category,
        });
        db.close();

        if (opts.json) {
            console.log(JSON.stringify(rows, null, 2));
            return;
        }

        console.log('\n💎 GemRadar Top Restaurants\n');
        rows.forEach((row, i) => {
            const residual = `${row.residual >= 0 ? '+' : ''}${row.residual.toFixed(2)}`;
            console.log(`  ${String(i + 1).padStart(3)}. ${row.name} [${row.tier}] ${row.rating.toFixed(1)}★ (${residual})`);
            console.log(`       ${row.explanation}`);
        });
        console.log('');
    } catch (error) {
        fail(error, 'Top');
    }
});

// ─── EXPORT command ───────────────────────────────────────

const EXTENSIONS: Record<ExportFormat, string> = { json: '.json', csv: '.csv', geojson: '.geojson' };

addGlobalOptions(
    program
        .command('export')
        .description('Export the scored table to JSON, CSV or GeoJSON')
        .requiredOption('-f, --format <format>', 'Export format: json | csv | geojson', parseExportFormat)
        .option('-o, --out <path>', 'Output file path')
).action(async (opts: GlobalOptions & { format: ExportFormat; out?: string }) => {
    try {
        const config = await loadConfig(opts);
        const outputPath = opts.out ?? config.db.replace(/\.db$/, '') + EXTENSIONS[opts.format];
        const rows = exportScores(config.db, outputPath, opts.format);
        console.log(`Exported ${rows} rows to ${outputPath}`);
    } catch (error) {
        fail(error, 'Export');
    }
});

// ─── INSPECT command ──────────────────────────────────────

addGlobalOptions(program.command('inspect').description('Show database statistics')).action(
    async (opts: GlobalOptions) => {
        try {
            const config = await loadConfig(opts);
            const db = new GemRadarDatabase(config.db);
            const stats = db.getStats();
            const latest = db.getLatestRun();
            db.close();

            console.log('\n📊 GemRadar Database Statistics\n');
            console.log(`  Seeds complete: ${stats.seeds.complete}`);
            console.log(`  Seeds failed:   ${stats.seeds.failed}`);
            console.log(`  Seeds staged:   ${stats.seeds.staged}`);
            console.log(`  Raw listings:   ${stats.rawEntities}`);
            console.log(`  Classified:     ${stats.classifications}`);
            console.log(`  Scored:         ${stats.scoredEntities}`);
            console.log(`  Runs:           ${stats.runs}`);

            if (Object.keys(stats.tiers).length > 0) {
                console.log('\n  Tiers:');
                for (const [tier, count] of Object.entries(stats.tiers)) {
                    console.log(`    ${tier}: ${count}`);
                }
            }
            if (latest) {
                console.log(`\n  Last run: #${latest.run_id ?? '?'} at ${latest.created_at} (v${latest.gemradar_version})`);
            }

            console.log('');
        } catch (error) {
            fail(error, 'Inspect');
        }
    }
);

program.parseAsync().catch((error: unknown) => fail(error, 'Command'));
