import type { Bounds, CanonicalEntity } from '../types/index.js';
import { UNKNOWN_CATEGORY } from '../types/index.js';
import { clusterDensities } from './density.js';
import { ZoneIndex } from './zones.js';

/**
 * Model input for one canonical entity. Field order is the feature order.
 */
export interface FeatureRow {
    zone: string;
    logReviews: number;
    category: string;
    isChain: number;
    clusterDensity: number;
}

export type FeatureName = keyof FeatureRow;

export type FeatureKind = 'categorical' | 'numeric';

/**
 * Fixed feature schema shared by training, prediction and importance.
 */
export const FEATURE_SCHEMA: ReadonlyArray<{ name: FeatureName; kind: FeatureKind }> = [
    { name: 'zone', kind: 'categorical' },
    { name: 'logReviews', kind: 'numeric' },
    { name: 'category', kind: 'categorical' },
    { name: 'isChain', kind: 'numeric' },
    { name: 'clusterDensity', kind: 'numeric' },
];

export interface FeatureBuilderOptions {
    zones: ZoneIndex;
    densityRadiusM: number;
}

/**
 * Category level fed to the model: the resolved label, or `Unknown`.
 */
export function categoryLevel(entity: CanonicalEntity): string {
    return entity.category.status === 'resolved' ? entity.category.label : UNKNOWN_CATEGORY;
}

/**
 * Build one complete feature vector per entity, aligned with the input.
 *
 * Density is computed against the entities given here, so callers pass the
 * whole current corpus, including rows that will not be scored.
 */
export function buildFeatures(entities: readonly CanonicalEntity[], options: FeatureBuilderOptions): FeatureRow[] {
    const densities = clusterDensities(entities, options.densityRadiusM);

    return entities.map((entity, i) => ({
        zone: options.zones.lookup(entity.lat, entity.lon),
        logReviews: Math.log1p(Math.max(0, entity.reviewCount)),
        category: categoryLevel(entity),
        isChain: entity.isChain ? 1 : 0,
        clusterDensity: densities[i] ?? 0,
    }));
}

/**
 * Convenience constructor used by the pipeline.
 */
export function createFeatureOptions(region: Bounds, maxZoneDistanceM: number, densityRadiusM: number): FeatureBuilderOptions {
    return { zones: ZoneIndex.load(region, maxZoneDistanceM), densityRadiusM };
}
