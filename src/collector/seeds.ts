import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { SeedConfig, SeedPoint } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/** Degrees of latitude per kilometre, used for both grid axes. */
const DEGREES_PER_KM = 0.009;

const pointSchema = z.object({
    type: z.literal('Point'),
    coordinates: z.array(z.number()).min(2),
});

const seedFileSchema = z.object({
    type: z.literal('FeatureCollection'),
    features: z.array(
        z.object({
            type: z.literal('Feature'),
            geometry: pointSchema,
            properties: z.record(z.string(), z.unknown()).nullable().optional(),
        })
    ),
});

/**
 * Point features of a GeoJSON file, in file order.
 * @throws ConfigError when the file is not a FeatureCollection of Points
 */
export function loadExtraSeeds(path: string): Array<{ lat: number; lon: number }> {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    const parsed = seedFileSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
        throw new ConfigError(`Invalid seed file ${path}`, issues);
    }
    return parsed.data.features.map((feature) => {
        const [lon = 0, lat = 0] = feature.geometry.coordinates;
        return { lat, lon };
    });
}

/**
 * Regular grid over the bounds, latitude-major. Both axes start at the
 * minimum (inclusive) and stop before the maximum.
 */
export function generateGrid(bounds: SeedConfig['bounds'], spacingM: number): Array<{ lat: number; lon: number }> {
    const step = DEGREES_PER_KM * (spacingM / 1000);
    const rows = Math.max(0, Math.ceil((bounds.latMax - bounds.latMin) / step));
    const cols = Math.max(0, Math.ceil((bounds.lonMax - bounds.lonMin) / step));

    const points: Array<{ lat: number; lon: number }> = [];
    for (let r = 0; r < rows; r++) {
        for (let c = 0; c < cols; c++) {
            points.push({ lat: bounds.latMin + r * step, lon: bounds.lonMin + c * step });
        }
    }
    return points;
}

/**
 * The fixed, ordered seed set: extra seeds first, then the grid.
 * Indices are positions in this list and identify checkpoints, so the same
 * config always yields the same indices.
 */
export function generateSeedPoints(config: SeedConfig): SeedPoint[] {
    const extra = config.extraSeedsFile ? loadExtraSeeds(config.extraSeedsFile) : [];
    const grid = generateGrid(config.bounds, config.spacingM);

    const seeds: SeedPoint[] = [
        ...extra.map((p) => ({ ...p, kind: 'extra' as const })),
        ...grid.map((p) => ({ ...p, kind: 'grid' as const })),
    ].map((p, index) => ({ index, lat: p.lat, lon: p.lon, kind: p.kind }));

    getLogger().info({ extra: extra.length, grid: grid.length, total: seeds.length }, 'Generated seed points');
    return seeds;
}

/**
 * Seeds as a GeoJSON FeatureCollection (for inspection on a map).
 */
export function seedsToGeoJSON(seeds: readonly SeedPoint[]): object {
    return {
        type: 'FeatureCollection',
        features: seeds.map((seed) => ({
            type: 'Feature',
            geometry: { type: 'Point', coordinates: [seed.lon, seed.lat] },
            properties: { index: seed.index, kind: seed.kind },
        })),
    };
}
