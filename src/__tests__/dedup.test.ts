import { describe, it, expect } from 'vitest';
import { assessDataQuality, deduplicate, normalizeName, usableRating, type DedupOptions } from '../dedup/deduplicator.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { rawEntity } from './helpers.js';

const OPTIONS: DedupOptions = {
    tieBreak: ['collectedAt', 'firstSeen'],
    region: DEFAULT_CONFIG.region,
    chainMinSightings: 3,
};

describe('normalizeName', () => {
    it('should lower-case, strip punctuation and collapse whitespace', () => {
        expect(normalizeName('  Chez-West  ')).toBe('chezwest');
        expect(normalizeName("Ah Hock's   Fried  Hokkien Mee!")).toBe('ah hocks fried hokkien mee');
    });

    it('should fold full-width characters', () => {
        expect(normalizeName('ＲＡＭＥＮ Bar')).toBe('ramen bar');
    });

    it('should return an empty key for punctuation-only names', () => {
        expect(normalizeName('...')).toBe('');
    });
});

describe('usableRating', () => {
    it('should accept values on the 0-5 scale', () => {
        expect(usableRating(0)).toBe(true);
        expect(usableRating(5)).toBe(true);
        expect(usableRating(4.3)).toBe(true);
    });

    it('should reject null, NaN and out-of-range values', () => {
        expect(usableRating(null)).toBe(false);
        expect(usableRating(Number.NaN)).toBe(false);
        expect(usableRating(5.1)).toBe(false);
        expect(usableRating(-1)).toBe(false);
    });
});

describe('assessDataQuality', () => {
    it('should flag a rating without reviews', () => {
        const issues = assessDataQuality('x', rawEntity({ reviewCount: 0 }), OPTIONS.region);
        expect(issues.map((e) => e.caveat)).toEqual(['rating-without-reviews']);
        expect(issues[0]?.key).toBe('x');
    });

    it('should flag missing ratings and coordinates outside the region together', () => {
        const issues = assessDataQuality('x', rawEntity({ rating: null, lat: 2.0 }), OPTIONS.region);
        expect(issues.map((e) => e.caveat)).toEqual(['missing-rating', 'outside-region']);
    });

    it('should pass a clean sighting', () => {
        expect(assessDataQuality('x', rawEntity(), OPTIONS.region)).toEqual([]);
    });
});

describe('deduplicate', () => {
    it('should merge duplicate sightings into the one with most reviews', () => {
        const raw = [
            rawEntity({ name: 'Chez West', rating: 4.9, reviewCount: 347, lat: 1.36, lon: 103.73, seedIndex: 0 }),
            rawEntity({ name: 'Bistro B', rating: 4.1, reviewCount: 40, lat: 1.3048, lon: 103.8318, seedIndex: 1 }),
            rawEntity({ name: 'Chez West', rating: 4.8, reviewCount: 300, lat: 1.3601, lon: 103.7301, seedIndex: 2 }),
        ];

        const { entities, stats } = deduplicate(raw, OPTIONS);

        expect(entities).toHaveLength(2);
        expect(entities.map((e) => e.key)).toEqual(['chez west', 'bistro b']);
        expect(entities[0]).toMatchObject({ rating: 4.9, reviewCount: 347, lat: 1.36, lon: 103.73, sightings: 2 });
        expect(stats).toEqual({ raw: 3, canonical: 2, nameless: 0, duplicates: 1, compressionRatio: 2 / 3 });
    });

    it('should be independent of the order sightings arrive in', () => {
        const a = rawEntity({ name: 'Chez West', rating: 4.9, reviewCount: 347, collectedAt: '2024-01-01T00:00:00Z' });
        const c = rawEntity({ name: 'chez west', rating: 4.8, reviewCount: 300, collectedAt: '2024-02-01T00:00:00Z' });

        const forward = deduplicate([a, c], OPTIONS).entities[0];
        const backward = deduplicate([c, a], OPTIONS).entities[0];
        expect(forward?.rating).toBe(4.9);
        expect(backward?.rating).toBe(4.9);
    });

    it('should break review-count ties by the latest collection time', () => {
        const older = rawEntity({ name: 'Tie', rating: 3.5, collectedAt: '2024-01-01T00:00:00Z' });
        const newer = rawEntity({ name: 'Tie', rating: 4.5, collectedAt: '2024-06-01T00:00:00Z' });

        expect(deduplicate([older, newer], OPTIONS).entities[0]?.rating).toBe(4.5);
        expect(deduplicate([newer, older], OPTIONS).entities[0]?.rating).toBe(4.5);
    });

    it('should fall back to first-seen order on a full tie', () => {
        const first = rawEntity({ name: 'Same', rating: 3.0 });
        const second = rawEntity({ name: 'Same', rating: 4.0 });

        expect(deduplicate([first, second], OPTIONS).entities[0]?.rating).toBe(3.0);
    });

    it('should honour a first-seen-only tie break', () => {
        const older = rawEntity({ name: 'Tie', rating: 3.5, collectedAt: '2024-01-01T00:00:00Z' });
        const newer = rawEntity({ name: 'Tie', rating: 4.5, collectedAt: '2024-06-01T00:00:00Z' });

        const { entities } = deduplicate([older, newer], { ...OPTIONS, tieBreak: ['firstSeen'] });
        expect(entities[0]?.rating).toBe(3.5);
    });

    it('should drop records whose name normalizes to nothing', () => {
        const { entities, stats } = deduplicate([rawEntity({ name: '!!!' }), rawEntity({ name: 'Real' })], OPTIONS);
        expect(entities.map((e) => e.key)).toEqual(['real']);
        expect(stats.nameless).toBe(1);
        expect(stats.duplicates).toBe(0);
    });

    it('should keep unrated records with a missing-rating caveat', () => {
        const { entities } = deduplicate([rawEntity({ name: 'Unrated', rating: null })], OPTIONS);
        expect(entities[0]?.rating).toBeNull();
        expect(entities[0]?.caveats).toEqual(['missing-rating']);
    });

    it('should flag chains by rated sightings', () => {
        const raw = [
            rawEntity({ name: 'Chain', seedIndex: 0 }),
            rawEntity({ name: 'Chain', seedIndex: 1 }),
            rawEntity({ name: 'Chain', seedIndex: 2, rating: null }),
            rawEntity({ name: 'Bigger Chain', seedIndex: 0 }),
            rawEntity({ name: 'Bigger Chain', seedIndex: 1 }),
            rawEntity({ name: 'Bigger Chain', seedIndex: 2 }),
        ];

        const { entities } = deduplicate(raw, OPTIONS);
        expect(entities.map((e) => [e.key, e.sightings, e.ratedSightings, e.isChain])).toEqual([
            ['chain', 3, 2, false],
            ['bigger chain', 3, 3, true],
        ]);
    });

    it('should start every entity with an unresolved placeholder category', () => {
        const { entities } = deduplicate([rawEntity({ category: 'japanese_restaurant' })], OPTIONS);
        expect(entities[0]?.category).toEqual({ status: 'unresolved', reason: 'placeholder' });
        expect(entities[0]?.rawCategory).toBe('japanese_restaurant');
    });

    it('should not mutate its input', () => {
        const raw = [rawEntity({ name: '  Padded  ' })];
        const copy = structuredClone(raw);
        deduplicate(raw, OPTIONS);
        expect(raw).toEqual(copy);
    });

    it('should report a zero ratio for an empty corpus', () => {
        expect(deduplicate([], OPTIONS).stats.compressionRatio).toBe(0);
    });
});
