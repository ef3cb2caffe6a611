import type { CanonicalEntity, ScoredEntity, Tier, TierThresholds } from '../types/index.js';
import type { FeatureRow } from '../features/feature-builder.js';
import { getLogger } from '../utils/logger.js';
import { explain } from './explainer.js';
import { assignTier, tierCounts } from './tiers.js';

/**
 * Residual descending, then key ascending.
 */
export function compareScored(a: ScoredEntity, b: ScoredEntity): number {
    return b.residual - a.residual || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0);
}

/**
 * One row per entity with a rating. `features` and `predictions` are aligned
 * with `entities`. Entities carrying caveats are scored like any other; the
 * caveats travel with the row.
 */
export function scoreEntities(
    entities: readonly CanonicalEntity[],
    features: readonly FeatureRow[],
    predictions: readonly number[],
    thresholds: TierThresholds
): ScoredEntity[] {
    if (features.length !== entities.length || predictions.length !== entities.length) {
        throw new Error(
            `Misaligned inputs: ${entities.length} entities, ${features.length} feature rows, ${predictions.length} predictions`
        );
    }

    const rows: ScoredEntity[] = [];
    entities.forEach((entity, i) => {
        const feature = features[i];
        const predicted = predictions[i];
        if (entity.rating === null || !feature || predicted === undefined) return;

        const residual = entity.rating - predicted;
        const tier = assignTier(residual, thresholds);

        rows.push({
            key: entity.key,
            name: entity.name,
            rating: entity.rating,
            predicted_rating: predicted,
            residual,
            tier,
            zone: feature.zone,
            category: feature.category,
            review_count: entity.reviewCount,
            is_chain: entity.isChain,
            cluster_density: feature.clusterDensity,
            explanation: explain({
                category: feature.category,
                zone: feature.zone,
                predictedRating: predicted,
                rating: entity.rating,
                reviewCount: entity.reviewCount,
                residual,
                tier,
                isChain: entity.isChain,
                clusterDensity: feature.clusterDensity,
                caveats: entity.caveats,
            }),
            coordinates: { lat: entity.lat, lon: entity.lon },
            caveats: [...entity.caveats],
        });
    });

    rows.sort(compareScored);
    getLogger().info({ scored: rows.length, ...tierCounts(rows) }, 'Scored entities');
    return rows;
}

export interface TopOptions {
    n: number;
    minReviews?: number;
    tier?: Tier;
    zone?: string;
    category?: string;
}

/**
 * Top `n` rows by residual after filtering. Zone and category match
 * case-insensitively.
 */
export function selectTop(table: readonly ScoredEntity[], options: TopOptions): ScoredEntity[] {
    const zone = options.zone?.toLowerCase();
    const category = options.category?.toLowerCase();

    return table
        .filter(
            (row) =>
                row.review_count >= (options.minReviews ?? 0) &&
                (options.tier === undefined || row.tier === options.tier) &&
                (zone === undefined || row.zone.toLowerCase() === zone) &&
                (category === undefined || row.category.toLowerCase() === category)
        )
        .sort(compareScored)
        .slice(0, Math.max(0, options.n));
}
