import { haversineMeters, metersToLonDegrees, METERS_PER_DEGREE_LAT } from './geo.js';

export interface GeoPoint {
    lat: number;
    lon: number;
}

/**
 * For each point, the number of *other* points within `radiusM`
 * (boundary inclusive).
 *
 * Points are bucketed into a grid whose cells are at least `radiusM` wide,
 * so only the 3×3 neighbourhood of a cell needs checking.
 */
export function clusterDensities(points: readonly GeoPoint[], radiusM: number): number[] {
    if (points.length === 0) return [];

    const maxAbsLat = points.reduce((max, p) => Math.max(max, Math.abs(p.lat)), 0);
    const cellLat = radiusM / METERS_PER_DEGREE_LAT;
    const cellLon = metersToLonDegrees(radiusM, Math.min(89, maxAbsLat));

    const cellOf = (p: GeoPoint): [number, number] => [Math.floor(p.lat / cellLat), Math.floor(p.lon / cellLon)];

    const grid = new Map<string, number[]>();
    points.forEach((p, i) => {
        const [row, col] = cellOf(p);
        const key = `${row}:${col}`;
        const bucket = grid.get(key);
        if (bucket) bucket.push(i);
        else grid.set(key, [i]);
    });

    return points.map((p, i) => {
        const [row, col] = cellOf(p);
        let count = 0;
        for (let dr = -1; dr <= 1; dr++) {
            for (let dc = -1; dc <= 1; dc++) {
                for (const j of grid.get(`${row + dr}:${col + dc}`) ?? []) {
                    if (j === i) continue;
                    const other = points[j];
                    if (other && haversineMeters(p.lat, p.lon, other.lat, other.lon) <= radiusM) {
                        count++;
                    }
                }
            }
        }
        return count;
    });
}
