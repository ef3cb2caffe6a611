import { z } from 'zod';
import type { Bounds } from '../types/index.js';
import { readDataFile } from '../utils/data-files.js';
import { haversineMeters, inBounds } from './geo.js';

/** Zone level for coordinates that match no planning area. */
export const UNKNOWN_ZONE = 'UNKNOWN';

export interface ZoneCentroid {
    name: string;
    lat: number;
    lon: number;
}

const zoneFileSchema = z.object({
    zones: z
        .array(
            z.object({
                name: z.string().min(1),
                lat: z.number(),
                lon: z.number(),
            })
        )
        .min(1),
});

/**
 * Coordinate → planning-area lookup by nearest centroid.
 *
 * A point is assigned the zone whose centroid is closest, provided it lies
 * inside `region` and within `maxDistanceM` of that centroid. Everything
 * else is `UNKNOWN`. Equidistant centroids resolve to the one listed first.
 */
export class ZoneIndex {
    constructor(
        private readonly centroids: readonly ZoneCentroid[],
        private readonly region: Bounds,
        private readonly maxDistanceM: number
    ) {}

    /**
     * Load the planning-area table shipped in `data/planning-areas.json`.
     */
    static load(region: Bounds, maxDistanceM: number, path?: string): ZoneIndex {
        const file = readDataFile('planning-areas.json', zoneFileSchema, path);
        return new ZoneIndex(file.zones, region, maxDistanceM);
    }

    lookup(lat: number, lon: number): string {
        if (!inBounds(lat, lon, this.region)) return UNKNOWN_ZONE;

        let best: ZoneCentroid | undefined;
        let bestDistance = Infinity;
        for (const centroid of this.centroids) {
            const distance = haversineMeters(lat, lon, centroid.lat, centroid.lon);
            if (distance < bestDistance) {
                best = centroid;
                bestDistance = distance;
            }
        }

        return best && bestDistance <= this.maxDistanceM ? best.name : UNKNOWN_ZONE;
    }

    zoneNames(): string[] {
        return this.centroids.map((c) => c.name);
    }
}
