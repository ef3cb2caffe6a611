import type { CuisineLabel } from './cuisine.js';

/**
 * One observation of a listing at one seed point.
 * Written once to the checkpoint store and never updated in place.
 */
export interface RawEntity {
    /** Identifier from the listing source (absent or unstable for some sources) */
    externalId: string | null;

    /** Display name as listed */
    name: string;

    /** Raw category label; frequently a generic placeholder such as "Restaurant" */
    category: string | null;

    /** Star rating 0–5, null when the listing shows none */
    rating: number | null;

    /** Number of reviews, 0 when unknown */
    reviewCount: number;

    lat: number;
    lon: number;

    /** Seed point that produced this sighting */
    seedIndex: number;

    /** ISO timestamp of collection */
    collectedAt: string;

    url: string | null;
}

/**
 * Why an entity has no cuisine label.
 */
export type UnresolvedReason =
    | 'placeholder'
    | 'classifier-failed'
    | 'classifier-omitted'
    | 'classifier-invalid'
    | 'classifier-disabled';

/**
 * Where a cuisine label came from.
 */
export type ResolutionSource = 'listing' | 'keyword' | 'classifier';

export type CategoryResolution =
    | { status: 'resolved'; label: CuisineLabel; source: ResolutionSource }
    | { status: 'unresolved'; reason: UnresolvedReason };

/**
 * Data-quality caveats. An entity carrying any of these is excluded from
 * training but still scored and shown.
 */
export type Caveat = 'rating-without-reviews' | 'outside-region' | 'missing-rating';

/**
 * The deduplicated record for one real-world restaurant.
 */
export interface CanonicalEntity {
    /** Normalized name; unique across the corpus */
    key: string;

    /** Display name from the chosen sighting */
    name: string;

    externalId: string | null;
    rating: number | null;
    reviewCount: number;
    lat: number;
    lon: number;
    rawCategory: string | null;
    url: string | null;

    /** Raw sightings merged into this entity */
    sightings: number;

    /** Sightings that carried a usable rating (drives the chain flag) */
    ratedSightings: number;

    isChain: boolean;
    category: CategoryResolution;
    caveats: readonly Caveat[];
}

export type Tier = 'Hidden Gem' | 'Fair Value' | 'Overvalued';

/**
 * One row of the terminal output table. Field names are the contract
 * consumed by the map layer.
 */
export interface ScoredEntity {
    key: string;
    name: string;
    rating: number;
    predicted_rating: number;
    residual: number;
    tier: Tier;
    zone: string;
    category: string;
    review_count: number;
    is_chain: boolean;
    cluster_density: number;
    explanation: string;
    coordinates: { lat: number; lon: number };
    caveats: Caveat[];
}
