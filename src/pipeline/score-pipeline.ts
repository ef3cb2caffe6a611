import type { CanonicalEntity, GemRadarConfig, LlmProvider, ScoredEntity, Tier } from '../types/index.js';
import type { CheckpointStore } from '../storage/checkpoint-store.js';
import type { GemRadarDatabase } from '../storage/database.js';
import { SqliteClassificationStore, type ClassificationStore } from '../storage/classification-store.js';
import { deduplicate, type DedupStats } from '../dedup/deduplicator.js';
import { markUnresolved, preResolveCategories } from '../classify/category-resolution.js';
import { applyKeywordPass, type KeywordTable } from '../classify/keyword-classifier.js';
import { categoryDistribution, classifyUnresolved, type ClassificationReport } from '../classify/batch-classifier.js';
import { buildFeatures, type FeatureRow } from '../features/feature-builder.js';
import { ZoneIndex } from '../features/zones.js';
import { crossValidate, type CrossValidationResult } from '../model/cross-validation.js';
import { trainExpectationModel, type ExpectationModel } from '../model/expectation-model.js';
import { permutationImportance, type FeatureImportance } from '../model/importance.js';
import { scoreEntities } from '../scoring/scorer.js';
import { tierCounts } from '../scoring/tiers.js';
import { InsufficientTrainingDataError, throwIfAborted } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { GEMRADAR_VERSION } from '../utils/version.js';

export interface ScoringDeps {
    /** Classification provider; without one, unresolved categories stay unresolved */
    provider?: LlmProvider;
    signal?: AbortSignal;
    zones?: ZoneIndex;
    keywordTable?: KeywordTable;
    /** Classifier answers kept across runs; defaults to the table in `db` */
    classifications?: ClassificationStore;
}

export interface ScoringStats {
    raw: number;
    dedup: DedupStats;
    keywordResolved: number;
    classification: ClassificationReport | null;
    categories: Record<string, number>;
    training: { rows: number; excluded: number };
    crossValidation: CrossValidationResult | null;
    /** Mean CV RMSE exceeded `model.maxCvRmse` */
    qualityBoundExceeded: boolean;
    importance: FeatureImportance[];
    tiers: Record<Tier, number>;
    durationMs: number;
}

export interface ScoringResult {
    table: ScoredEntity[];
    stats: ScoringStats;
    model: ExpectationModel;
    runId: number;
}

/**
 * Rows that may train the model: a usable rating and no data-quality caveat.
 */
export function isTrainable(entity: CanonicalEntity): entity is CanonicalEntity & { rating: number } {
    return entity.rating !== null && entity.caveats.length === 0;
}

/**
 * Scoring pipeline over one checkpoint snapshot:
 *
 * 1. Replay the checkpoint store and deduplicate
 * 2. Resolve categories (listing label, keywords, classifier)
 * 3. Build features against the whole canonical corpus
 * 4. Cross-validate, then train the expectation model
 * 5. Score, explain and rank
 * 6. Replace the scored table and record the run
 */
export async function runScoring(
    store: CheckpointStore,
    db: GemRadarDatabase,
    config: GemRadarConfig,
    deps: ScoringDeps = {}
): Promise<ScoringResult> {
    const logger = getLogger();
    const startTime = Date.now();

    // ──────────────────────────────────────────────────
    // Step 1: Snapshot + dedup
    // ──────────────────────────────────────────────────
    const snapshot = store.loadAll();
    logger.info({ raw: snapshot.length }, 'Loaded checkpoint snapshot');

    const { entities: canonical, stats: dedup } = deduplicate(snapshot, {
        tieBreak: config.dedup.tieBreak,
        region: config.region,
        chainMinSightings: config.features.chainMinSightings,
    });

    // ──────────────────────────────────────────────────
    // Step 2: Category resolution
    // ──────────────────────────────────────────────────
    let entities = preResolveCategories(canonical);
    let keywordResolved = 0;

    if (config.classifier.keywordPass) {
        const pass = applyKeywordPass(entities, deps.keywordTable);
        entities = pass.entities;
        keywordResolved = pass.resolved;
    }

    let classification: ClassificationReport | null = null;
    if (config.classifier.enabled && deps.provider) {
        const outcome = await classifyUnresolved(entities, deps.provider, {
            batchSize: config.classifier.batchSize,
            minDelayMs: config.classifier.minDelayMs,
            model: config.classifier.model,
            signal: deps.signal,
            store: deps.classifications ?? new SqliteClassificationStore(db),
        });
        entities = outcome.entities;
        classification = outcome.report;
    } else {
        entities = markUnresolved(entities, 'classifier-disabled');
        logger.info({ enabled: config.classifier.enabled }, 'Classifier skipped');
    }
    throwIfAborted(deps.signal);

    // ──────────────────────────────────────────────────
    // Step 3: Features
    // ──────────────────────────────────────────────────
    const zones = deps.zones ?? ZoneIndex.load(config.region, config.features.maxZoneDistanceM);
    const features = buildFeatures(entities, { zones, densityRadiusM: config.features.densityRadiusM });

    // ──────────────────────────────────────────────────
    // Step 4: Cross-validation + training
    // ──────────────────────────────────────────────────
    const trainRows: FeatureRow[] = [];
    const trainRatings: number[] = [];
    entities.forEach((entity, i) => {
        const row = features[i];
        if (row && isTrainable(entity)) {
            trainRows.push(row);
            trainRatings.push(entity.rating);
        }
    });

    if (trainRows.length === 0) {
        throw new InsufficientTrainingDataError(
            `No usable training rows among ${entities.length} canonical entities`,
            0
        );
    }

    const rated = entities.filter((e) => e.rating !== null).length;
    logger.info({ rows: trainRows.length, excluded: rated - trainRows.length }, 'Training set assembled');

    const crossValidation = crossValidate(trainRows, trainRatings, config.model);
    const maxCvRmse = config.model.maxCvRmse;
    const qualityBoundExceeded =
        crossValidation !== null && maxCvRmse !== undefined && crossValidation.meanRmse > maxCvRmse;
    if (qualityBoundExceeded) {
        logger.error(
            { meanRmse: crossValidation?.meanRmse, maxCvRmse },
            'Cross-validated RMSE exceeds the configured bound'
        );
    }

    const model = trainExpectationModel(trainRows, trainRatings, config.model);
    const importance = permutationImportance(model, trainRows, trainRatings, { repeats: 3, seed: config.model.seed });

    // ──────────────────────────────────────────────────
    // Step 5: Score
    // ──────────────────────────────────────────────────
    const predictions = model.predictAll(features);
    const table = scoreEntities(entities, features, predictions, config.tiers);

    // ──────────────────────────────────────────────────
    // Step 6: Persist
    // ──────────────────────────────────────────────────
    const stats: ScoringStats = {
        raw: snapshot.length,
        dedup,
        keywordResolved,
        classification,
        categories: categoryDistribution(entities),
        training: { rows: trainRows.length, excluded: rated - trainRows.length },
        crossValidation,
        qualityBoundExceeded,
        importance,
        tiers: tierCounts(table),
        durationMs: Date.now() - startTime,
    };

    const runId = db.transaction(() => {
        db.replaceScoredEntities(table);
        return db.insertRun({
            created_at: new Date().toISOString(),
            gemradar_version: GEMRADAR_VERSION,
            config_json: JSON.stringify(config),
            stats_json: JSON.stringify(stats),
            model_json: JSON.stringify(model.toJSON()),
        });
    });

    const elapsed = (stats.durationMs / 1000).toFixed(1);
    logger.info({ scored: table.length, ...stats.tiers, runId, elapsed: `${elapsed}s` }, 'Scoring complete');

    return { table, stats, model, runId };
}
