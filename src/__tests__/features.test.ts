import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '../types/index.js';
import { haversineMeters, inBounds, METERS_PER_DEGREE_LAT } from '../features/geo.js';
import { clusterDensities } from '../features/density.js';
import { UNKNOWN_ZONE, ZoneIndex } from '../features/zones.js';
import { buildFeatures, FEATURE_SCHEMA } from '../features/feature-builder.js';
import { canonicalEntity } from './helpers.js';

const REGION = DEFAULT_CONFIG.region;

describe('geo', () => {
    it('should measure one degree of latitude', () => {
        expect(haversineMeters(1, 103.8, 2, 103.8)).toBeCloseTo(METERS_PER_DEGREE_LAT, 3);
    });

    it('should be symmetric and zero for identical points', () => {
        expect(haversineMeters(1.3, 103.8, 1.31, 103.82)).toBeCloseTo(haversineMeters(1.31, 103.82, 1.3, 103.8), 6);
        expect(haversineMeters(1.3, 103.8, 1.3, 103.8)).toBe(0);
    });

    it('should treat region edges as inside', () => {
        expect(inBounds(REGION.latMin, REGION.lonMax, REGION)).toBe(true);
        expect(inBounds(REGION.latMax + 0.001, 103.8, REGION)).toBe(false);
    });
});

describe('clusterDensities', () => {
    it('should count other points within the radius', () => {
        const points = [
            { lat: 1.3, lon: 103.8 },
            { lat: 1.3009, lon: 103.8 }, // ~100m north
            { lat: 1.303, lon: 103.8 }, // ~233m beyond that
        ];
        expect(clusterDensities(points, 200)).toEqual([1, 1, 0]);
    });

    it('should include points exactly on the radius', () => {
        const a = { lat: 1.3, lon: 103.8 };
        const b = { lat: 1.3018, lon: 103.8 };
        const radius = haversineMeters(a.lat, a.lon, b.lat, b.lon);

        expect(clusterDensities([a, b], radius)).toEqual([1, 1]);
    });

    it('should count co-located points but never the point itself', () => {
        const p = { lat: 1.35, lon: 103.9 };
        expect(clusterDensities([p, { ...p }, { ...p }], 200)).toEqual([2, 2, 2]);
    });

    it('should match a brute-force count', () => {
        const points = Array.from({ length: 60 }, (_, i) => ({
            lat: 1.3 + ((i * 37) % 50) * 0.0004,
            lon: 103.8 + ((i * 53) % 50) * 0.0004,
        }));
        const expected = points.map((p, i) =>
            points.filter((q, j) => j !== i && haversineMeters(p.lat, p.lon, q.lat, q.lon) <= 200).length
        );

        expect(clusterDensities(points, 200)).toEqual(expected);
    });

    it('should handle an empty corpus', () => {
        expect(clusterDensities([], 200)).toEqual([]);
    });

    it('should handle a corpus of 200k points', () => {
        // 100k pairs ~100m apart, pairs 0.01 degrees from each other
        const points = Array.from({ length: 200000 }, (_, i) => {
            const pair = Math.floor(i / 2);
            return {
                lat: 1 + Math.floor(pair / 400) * 0.01 + (i % 2) * 0.0009,
                lon: 103 + (pair % 400) * 0.01,
            };
        });

        const densities = clusterDensities(points, 200);

        expect(densities).toHaveLength(200000);
        expect(densities.every((d) => d === 1)).toBe(true);
    });
});

describe('ZoneIndex', () => {
    const zones = new ZoneIndex(
        [
            { name: 'WEST', lat: 1.3, lon: 103.7 },
            { name: 'EAST', lat: 1.3, lon: 103.9 },
            { name: 'EAST TWIN', lat: 1.3, lon: 103.9 },
        ],
        REGION,
        2000
    );

    it('should assign the nearest centroid', () => {
        expect(zones.lookup(1.301, 103.705)).toBe('WEST');
        expect(zones.lookup(1.299, 103.895)).toBe('EAST');
    });

    it('should resolve equidistant centroids to the first listed', () => {
        expect(zones.lookup(1.3, 103.9)).toBe('EAST');
    });

    it('should return UNKNOWN beyond the distance cap', () => {
        expect(zones.lookup(1.3, 103.8)).toBe(UNKNOWN_ZONE);
    });

    it('should return UNKNOWN outside the region', () => {
        expect(zones.lookup(1.0, 103.7)).toBe(UNKNOWN_ZONE);
    });

    it('should load the planning-area table', () => {
        const index = ZoneIndex.load(REGION, 2000);
        expect(index.zoneNames()).toHaveLength(55);
        expect(index.lookup(1.3048, 103.8318)).toBe('ORCHARD');
        expect(index.lookup(1.36, 103.73)).toBe('TENGAH');
    });
});

describe('buildFeatures', () => {
    const zones = new ZoneIndex([{ name: 'CENTRE', lat: 1.3, lon: 103.8 }], REGION, 2000);

    it('should build one aligned row per entity', () => {
        const entities = [
            canonicalEntity({ key: 'a', reviewCount: 99, isChain: true, category: { status: 'resolved', label: 'Thai', source: 'listing' }, lat: 1.3, lon: 103.8 }),
            canonicalEntity({ key: 'b', reviewCount: 0, lat: 1.3009, lon: 103.8 }),
            canonicalEntity({ key: 'c', reviewCount: 5, lat: 1.45, lon: 103.8 }),
        ];

        const rows = buildFeatures(entities, { zones, densityRadiusM: 200 });

        expect(rows).toHaveLength(3);
        expect(rows[0]).toEqual({ zone: 'CENTRE', logReviews: Math.log1p(99), category: 'Thai', isChain: 1, clusterDensity: 1 });
        expect(rows[1]).toEqual({ zone: 'CENTRE', logReviews: 0, category: 'Unknown', isChain: 0, clusterDensity: 1 });
        expect(rows[2]).toEqual({ zone: UNKNOWN_ZONE, logReviews: Math.log1p(5), category: 'Unknown', isChain: 0, clusterDensity: 0 });
    });

    it('should clamp negative review counts to zero', () => {
        const [row] = buildFeatures([canonicalEntity({ reviewCount: -3 })], { zones, densityRadiusM: 200 });
        expect(row?.logReviews).toBe(0);
    });

    it('should name every row field in the schema', () => {
        const [row] = buildFeatures([canonicalEntity()], { zones, densityRadiusM: 200 });
        expect(Object.keys(row ?? {})).toEqual(FEATURE_SCHEMA.map((f) => f.name));
    });
});
