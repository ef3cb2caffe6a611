/**
 * Library entry point. The CLI in `cli/index.ts` is a thin shell over these.
 */
export * from './types/index.js';

export { GemRadarDatabase, type DatabaseStats } from './storage/database.js';
export { SqliteCheckpointStore, type CheckpointStore, type CheckpointStatus } from './storage/checkpoint-store.js';
export { SqliteClassificationStore, type ClassificationStore } from './storage/classification-store.js';

export { generateSeedPoints, generateGrid, loadExtraSeeds, seedsToGeoJSON } from './collector/seeds.js';
export { collectSeeds, type CollectionReport } from './collector/collector.js';
export { createListingSource, PlacesListingSource, SyntheticListingSource } from './sources/index.js';

export { deduplicate, normalizeName, type DedupStats } from './dedup/deduplicator.js';
export { deduceCuisine, loadKeywordTable, type KeywordTable } from './classify/keyword-classifier.js';
export { classifyUnresolved, type ClassificationReport } from './classify/batch-classifier.js';
export { createLlmProvider, OpenAiProvider, OllamaProvider } from './classify/providers/index.js';

export { buildFeatures, FEATURE_SCHEMA, type FeatureRow } from './features/feature-builder.js';
export { ZoneIndex, UNKNOWN_ZONE } from './features/zones.js';
export { clusterDensities } from './features/density.js';

export { ExpectationModel, trainExpectationModel } from './model/expectation-model.js';
export { crossValidate, type CrossValidationResult } from './model/cross-validation.js';
export { permutationImportance, type FeatureImportance } from './model/importance.js';

export { assignTier, TIERS } from './scoring/tiers.js';
export { explain } from './scoring/explainer.js';
export { scoreEntities, selectTop, type TopOptions } from './scoring/scorer.js';

export { runCollection } from './pipeline/collect-pipeline.js';
export { runScoring, type ScoringResult, type ScoringStats } from './pipeline/score-pipeline.js';
export { exportScores, renderScores, type ExportFormat } from './exporters/export.js';

export { resolveConfig, validateConfig } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export * from './utils/errors.js';
