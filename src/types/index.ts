/**
 * Barrel export for all shared types.
 */
export type {
    RawEntity,
    CanonicalEntity,
    CategoryResolution,
    UnresolvedReason,
    ResolutionSource,
    Caveat,
    Tier,
    ScoredEntity,
} from './entity.js';
export { CUISINE_LABELS, UNKNOWN_CATEGORY, GENERIC_CATEGORY_LABELS, toCuisineLabel } from './cuisine.js';
export type { CuisineLabel } from './cuisine.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    GemRadarConfig,
    LogLevel,
    Bounds,
    SeedConfig,
    RetryPolicy,
    ListingSourceKind,
    CollectorConfig,
    TieBreakField,
    DedupConfig,
    LlmProviderKind,
    ClassifierConfig,
    FeatureConfig,
    ModelConfig,
    TierThresholds,
    OutputConfig,
    RunRecord,
} from './config.js';
export type { SeedPoint, Listing, ListingPage, ListingSource, ListingSourceOptions } from './source-adapter.js';
export type {
    LlmProvider,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProviderOptions,
} from './llm-provider.js';
