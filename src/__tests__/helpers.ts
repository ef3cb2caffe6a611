import type { CanonicalEntity, RawEntity, ScoredEntity } from '../types/index.js';

/**
 * Test fixtures shared by the suites in this directory.
 */
export function rawEntity(overrides: Partial<RawEntity> = {}): RawEntity {
    return {
        externalId: null,
        name: 'Test Kitchen',
        category: 'Restaurant',
        rating: 4.2,
        reviewCount: 100,
        lat: 1.3048,
        lon: 103.8318,
        seedIndex: 0,
        collectedAt: '2024-01-01T00:00:00.000Z',
        url: null,
        ...overrides,
    };
}

export function canonicalEntity(overrides: Partial<CanonicalEntity> = {}): CanonicalEntity {
    return {
        key: 'test kitchen',
        name: 'Test Kitchen',
        externalId: null,
        rating: 4.2,
        reviewCount: 100,
        lat: 1.3048,
        lon: 103.8318,
        rawCategory: 'Restaurant',
        url: null,
        sightings: 1,
        ratedSightings: 1,
        isChain: false,
        category: { status: 'unresolved', reason: 'placeholder' },
        caveats: [],
        ...overrides,
    };
}

export function scoredEntity(overrides: Partial<ScoredEntity> = {}): ScoredEntity {
    return {
        key: 'test kitchen',
        name: 'Test Kitchen',
        rating: 4.5,
        predicted_rating: 4.0,
        residual: 0.5,
        tier: 'Hidden Gem',
        zone: 'ORCHARD',
        category: 'Japanese',
        review_count: 120,
        is_chain: false,
        cluster_density: 3,
        explanation: 'Test explanation.',
        coordinates: { lat: 1.3048, lon: 103.8318 },
        caveats: [],
        ...overrides,
    };
}
