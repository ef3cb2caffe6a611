import { describe, it, expect } from 'vitest';
import { assignTier, tierCounts } from '../scoring/tiers.js';
import { explain, type ExplanationInput } from '../scoring/explainer.js';
import { compareScored, scoreEntities, selectTop } from '../scoring/scorer.js';
import type { FeatureRow } from '../features/feature-builder.js';
import { canonicalEntity, scoredEntity } from './helpers.js';

const THRESHOLDS = { hiddenGem: 0.5, fairValue: 0 };

describe('assignTier', () => {
    it('should put boundaries in the higher tier', () => {
        expect(assignTier(0.5, THRESHOLDS)).toBe('Hidden Gem');
        expect(assignTier(0, THRESHOLDS)).toBe('Fair Value');
    });

    it('should split just below each boundary', () => {
        expect(assignTier(0.4999, THRESHOLDS)).toBe('Fair Value');
        expect(assignTier(-0.0001, THRESHOLDS)).toBe('Overvalued');
    });

    it('should honour custom thresholds', () => {
        expect(assignTier(0.3, { hiddenGem: 0.25, fairValue: -0.25 })).toBe('Hidden Gem');
        expect(assignTier(-0.2, { hiddenGem: 0.25, fairValue: -0.25 })).toBe('Fair Value');
    });

    it('should count every tier, including empty ones', () => {
        expect(tierCounts([{ tier: 'Hidden Gem' }, { tier: 'Hidden Gem' }])).toEqual({
            'Hidden Gem': 2,
            'Fair Value': 0,
            Overvalued: 0,
        });
    });
});

describe('explain', () => {
    const base: ExplanationInput = {
        category: 'Japanese',
        zone: 'ORCHARD',
        predictedRating: 4.1234,
        rating: 4.7,
        reviewCount: 1234,
        residual: 0.5766,
        tier: 'Hidden Gem',
        isChain: false,
        clusterDensity: 3,
        caveats: [],
    };

    it('should explain a hidden gem', () => {
        expect(explain(base)).toBe(
            'Japanese listings in ORCHARD average 4.12★ among comparable entities; this one achieves 4.7★ with 1,234 reviews. ' +
                'It beats that expectation by 0.58★, a Hidden Gem.'
        );
    });

    it('should explain a fair-value listing with no neighbours', () => {
        expect(explain({ ...base, residual: 0, tier: 'Fair Value', clusterDensity: 0, rating: 4.1 })).toBe(
            'Japanese listings in ORCHARD average 4.12★ among comparable entities; this one achieves 4.1★ with 1,234 reviews. ' +
                'That is in line with expectation (+0.00★), Fair Value. No other restaurants are close by.'
        );
    });

    it('should name unknown categories and zones plainly and add every caveat', () => {
        const text = explain({
            category: 'Unknown',
            zone: 'UNKNOWN',
            predictedRating: 4,
            rating: 3.9,
            reviewCount: 1,
            residual: -0.1,
            tier: 'Overvalued',
            isChain: true,
            clusterDensity: 12,
            caveats: ['rating-without-reviews', 'outside-region'],
        });

        expect(text).toBe(
            'Restaurant listings in unmapped areas average 4.00★ among comparable entities; this one achieves 3.9★ with 1 review. ' +
                'It falls 0.10★ short of expectation, Overvalued. ' +
                'Listed at several locations, so it is treated as a chain. ' +
                'Competition is high with 12 restaurants close by. ' +
                'Few reviews so far, so treat the score with caution. ' +
                'Data caveats: rating-without-reviews, outside-region.'
        );
    });

    it('should be deterministic', () => {
        expect(explain(base)).toBe(explain({ ...base }));
    });
});

describe('scoreEntities', () => {
    const feature = (zone: string, category: string, clusterDensity = 2): FeatureRow => ({
        zone,
        logReviews: 1,
        category,
        isChain: 0,
        clusterDensity,
    });

    it('should score rated entities and rank by residual', () => {
        const entities = [
            canonicalEntity({ key: 'b', name: 'B', rating: 4.1, reviewCount: 40 }),
            canonicalEntity({ key: 'a', name: 'A', rating: 4.9, reviewCount: 347, caveats: ['outside-region'] }),
            canonicalEntity({ key: 'unrated', name: 'Unrated', rating: null }),
        ];
        const features = [feature('ORCHARD', 'Western'), feature('TENGAH', 'Western'), feature('ORCHARD', 'Unknown')];

        const rows = scoreEntities(entities, features, [4.3, 4.2, 4.0], THRESHOLDS);

        expect(rows.map((r) => r.key)).toEqual(['a', 'b']);
        const [a, b] = rows;
        expect(a?.residual).toBeCloseTo(0.7, 10);
        expect(a?.tier).toBe('Hidden Gem');
        expect(a?.zone).toBe('TENGAH');
        expect(a?.caveats).toEqual(['outside-region']);
        expect(a?.explanation).toContain('Data caveats: outside-region.');
        expect(b?.residual).toBeCloseTo(-0.2, 10);
        expect(b?.tier).toBe('Overvalued');
        expect(b?.predicted_rating).toBe(4.3);
    });

    it('should break residual ties by key', () => {
        const entities = [canonicalEntity({ key: 'zeta', rating: 4 }), canonicalEntity({ key: 'alpha', rating: 4 })];
        const rows = scoreEntities(entities, [feature('X', 'Cafe'), feature('X', 'Cafe')], [4, 4], THRESHOLDS);
        expect(rows.map((r) => r.key)).toEqual(['alpha', 'zeta']);
    });

    it('should reject misaligned inputs', () => {
        expect(() => scoreEntities([canonicalEntity()], [], [4], THRESHOLDS)).toThrow(/Misaligned inputs/);
    });
});

describe('selectTop', () => {
    const table = [
        scoredEntity({ key: 'a', residual: 0.9, review_count: 5, zone: 'ORCHARD', category: 'Japanese', tier: 'Hidden Gem' }),
        scoredEntity({ key: 'b', residual: 0.6, review_count: 50, zone: 'TENGAH', category: 'Western', tier: 'Hidden Gem' }),
        scoredEntity({ key: 'c', residual: 0.1, review_count: 80, zone: 'ORCHARD', category: 'Western', tier: 'Fair Value' }),
        scoredEntity({ key: 'd', residual: -0.4, review_count: 200, zone: 'ORCHARD', category: 'Cafe', tier: 'Overvalued' }),
    ];

    it('should return the top n by residual', () => {
        expect(selectTop(table, { n: 2 }).map((r) => r.key)).toEqual(['a', 'b']);
    });

    it('should apply the review floor', () => {
        expect(selectTop(table, { n: 10, minReviews: 50 }).map((r) => r.key)).toEqual(['b', 'c', 'd']);
    });

    it('should filter by tier, zone and category', () => {
        expect(selectTop(table, { n: 10, tier: 'Overvalued' }).map((r) => r.key)).toEqual(['d']);
        expect(selectTop(table, { n: 10, zone: 'orchard' }).map((r) => r.key)).toEqual(['a', 'c', 'd']);
        expect(selectTop(table, { n: 10, category: 'WESTERN', zone: 'Orchard' }).map((r) => r.key)).toEqual(['c']);
    });

    it('should sort rows given out of order', () => {
        const shuffledTable = [...table].reverse();
        expect(selectTop(shuffledTable, { n: 4 }).map((r) => r.key)).toEqual(['a', 'b', 'c', 'd']);
        expect([...shuffledTable].sort(compareScored).map((r) => r.key)).toEqual(['a', 'b', 'c', 'd']);
    });

    it('should return nothing for n = 0', () => {
        expect(selectTop(table, { n: 0 })).toEqual([]);
    });
});
