import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type GemRadarConfig } from '../types/index.js';
import { ConfigError } from './errors.js';
import { getLogger } from './logger.js';

/**
 * Partial configuration as given by CLI flags; nested sections may be partial.
 */
export type ConfigOverrides = {
    [K in keyof GemRadarConfig]?: GemRadarConfig[K] extends readonly unknown[]
        ? GemRadarConfig[K]
        : GemRadarConfig[K] extends object
          ? Partial<GemRadarConfig[K]>
          : GemRadarConfig[K];
};

const boundsSchema = z
    .object({
        latMin: z.number().min(-90).max(90),
        latMax: z.number().min(-90).max(90),
        lonMin: z.number().min(-180).max(180),
        lonMax: z.number().min(-180).max(180),
    })
    .refine((b) => b.latMin < b.latMax && b.lonMin < b.lonMax, 'bounds must have min < max');

const configSchema = z.object({
    db: z.string().min(1),
    seeds: z.object({
        bounds: boundsSchema,
        spacingM: z.number().positive(),
        extraSeedsFile: z.string().optional(),
    }),
    region: boundsSchema,
    collector: z.object({
        source: z.enum(['places', 'synthetic']),
        radiusM: z.number().positive(),
        concurrency: z.number().int().min(1),
        requestsPerSecond: z.number().positive(),
        maxPagesPerSeed: z.number().int().min(1),
        retry: z.object({
            maxAttempts: z.number().int().min(1),
            initialBackoffMs: z.number().min(0),
            maxBackoffMs: z.number().min(0),
        }),
        retryFailed: z.boolean(),
        limit: z.number().int().positive().optional(),
        syntheticSeed: z.number().int(),
    }),
    dedup: z.object({
        tieBreak: z.array(z.enum(['collectedAt', 'firstSeen'])),
    }),
    classifier: z.object({
        enabled: z.boolean(),
        provider: z.enum(['openai', 'ollama']),
        model: z.string().min(1),
        batchSize: z.number().int().min(1).max(20),
        minDelayMs: z.number().min(0),
        keywordPass: z.boolean(),
    }),
    features: z.object({
        densityRadiusM: z.number().positive(),
        chainMinSightings: z.number().int().min(1),
        maxZoneDistanceM: z.number().positive(),
    }),
    model: z.object({
        learningRate: z.number().positive().max(1),
        maxIterations: z.number().int().min(1),
        maxDepth: z.number().int().min(1),
        minSamplesLeaf: z.number().int().min(1),
        l2Regularization: z.number().min(0),
        maxBins: z.number().int().min(2).max(1024),
        subsample: z.number().positive().max(1),
        seed: z.number().int(),
        cvFolds: z.number().int().min(2),
        maxCvRmse: z.number().positive().optional(),
    }),
    tiers: z
        .object({
            hiddenGem: z.number(),
            fairValue: z.number(),
        })
        .refine((t) => t.hiddenGem >= t.fairValue, 'tiers.hiddenGem must be >= tiers.fairValue'),
    output: z.object({
        minReviews: z.number().int().min(0),
        topN: z.number().int().min(1),
    }),
    logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
    jsonLogs: z.boolean(),
});

/**
 * Load configuration from gemradar.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults apply.
 */
async function loadConfigFile(searchFrom?: string): Promise<unknown> {
    const explorer = cosmiconfig('gemradar', {
        searchPlaces: ['gemradar.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return result.config;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 * API keys are read where needed (not stored in config).
 */
function loadEnvVars(): ConfigOverrides {
    const env: ConfigOverrides = {};
    const db = process.env['GEMRADAR_DB'];
    if (db) env.db = db;
    return env;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge plain objects left to right. Nested objects merge recursively,
 * arrays and scalars replace, `undefined` never overrides.
 */
export function deepMerge(...layers: unknown[]): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const layer of layers) {
        if (!isRecord(layer)) continue;
        for (const [key, value] of Object.entries(layer)) {
            if (value === undefined) continue;
            const current = out[key];
            out[key] = isRecord(value) && isRecord(current) ? deepMerge(current, value) : value;
        }
    }
    return out;
}

/**
 * Validate a merged configuration object.
 * @throws ConfigError listing every invalid path
 */
export function validateConfig(candidate: unknown): GemRadarConfig {
    const parsed = configSchema.safeParse(candidate);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }
    return parsed.data;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { searchFrom?: string } = {}
): Promise<GemRadarConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars();

    return validateConfig(deepMerge(DEFAULT_CONFIG, fileConfig, envConfig, cliFlags));
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name];
}
