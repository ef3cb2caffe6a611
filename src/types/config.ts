/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Latitude/longitude rectangle.
 */
export interface Bounds {
    latMin: number;
    latMax: number;
    lonMin: number;
    lonMax: number;
}

/**
 * Seed-point tiling.
 */
export interface SeedConfig {
    bounds: Bounds;
    /** Grid spacing in metres */
    spacingM: number;
    /** GeoJSON file of extra seed points placed before the grid */
    extraSeedsFile?: string;
}

/**
 * Bounded retry schedule: exponential backoff with jitter, capped.
 */
export interface RetryPolicy {
    maxAttempts: number;
    initialBackoffMs: number;
    maxBackoffMs: number;
}

export type ListingSourceKind = 'places' | 'synthetic';

export interface CollectorConfig {
    source: ListingSourceKind;
    radiusM: number;
    concurrency: number;
    /** Aggregate request rate across all workers */
    requestsPerSecond: number;
    maxPagesPerSeed: number;
    retry: RetryPolicy;
    /** Re-attempt seeds that failed in an earlier run */
    retryFailed: boolean;
    /** Stop after this many seeds in one run */
    limit?: number;
    /** PRNG seed for the synthetic source */
    syntheticSeed: number;
}

export type TieBreakField = 'collectedAt' | 'firstSeen';

export interface DedupConfig {
    tieBreak: TieBreakField[];
}

export type LlmProviderKind = 'openai' | 'ollama';

export interface ClassifierConfig {
    enabled: boolean;
    provider: LlmProviderKind;
    model: string;
    batchSize: number;
    /** Minimum delay between classification calls */
    minDelayMs: number;
    /** Resolve obvious cuisines from name keywords before calling out */
    keywordPass: boolean;
}

export interface FeatureConfig {
    densityRadiusM: number;
    chainMinSightings: number;
    maxZoneDistanceM: number;
}

export interface ModelConfig {
    learningRate: number;
    maxIterations: number;
    maxDepth: number;
    minSamplesLeaf: number;
    l2Regularization: number;
    maxBins: number;
    subsample: number;
    seed: number;
    cvFolds: number;
    /** Quality bound on mean cross-validated RMSE */
    maxCvRmse?: number;
}

export interface TierThresholds {
    hiddenGem: number;
    fairValue: number;
}

export interface OutputConfig {
    minReviews: number;
    topN: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface GemRadarConfig {
    db: string;
    seeds: SeedConfig;
    /** Coordinates outside these bounds are flagged as data-quality issues */
    region: Bounds;
    collector: CollectorConfig;
    dedup: DedupConfig;
    classifier: ClassifierConfig;
    features: FeatureConfig;
    model: ModelConfig;
    tiers: TierThresholds;
    output: OutputConfig;
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: GemRadarConfig = {
    db: './gemradar.db',
    seeds: {
        bounds: { latMin: 1.2, latMax: 1.48, lonMin: 103.6, lonMax: 104.05 },
        spacingM: 700,
    },
    region: { latMin: 1.15, latMax: 1.48, lonMin: 103.6, lonMax: 104.05 },
    collector: {
        source: 'places',
        radiusM: 500,
        concurrency: 2,
        requestsPerSecond: 2,
        maxPagesPerSeed: 3,
        retry: { maxAttempts: 3, initialBackoffMs: 1000, maxBackoffMs: 30000 },
        retryFailed: true,
        syntheticSeed: 42,
    },
    dedup: {
        tieBreak: ['collectedAt', 'firstSeen'],
    },
    classifier: {
        enabled: true,
        provider: 'openai',
        model: 'gpt-4.1-mini',
        batchSize: 20,
        minDelayMs: 6000,
        keywordPass: true,
    },
    features: {
        densityRadiusM: 200,
        chainMinSightings: 3,
        maxZoneDistanceM: 2000,
    },
    model: {
        learningRate: 0.1,
        maxIterations: 100,
        maxDepth: 4,
        minSamplesLeaf: 20,
        l2Regularization: 1.0,
        maxBins: 255,
        subsample: 1.0,
        seed: 42,
        cvFolds: 5,
    },
    tiers: {
        hiddenGem: 0.5,
        fairValue: 0,
    },
    output: {
        minReviews: 0,
        topN: 20,
    },
    logLevel: 'info',
    jsonLogs: false,
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    gemradar_version: string;
    config_json: string;
    stats_json: string;
    model_json: string | null;
}
