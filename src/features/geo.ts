import type { Bounds } from '../types/index.js';

/** Mean Earth radius (IUGG) in metres. */
export const EARTH_RADIUS_M = 6_371_008.8;

/** Great-circle metres per degree of latitude on the sphere above. */
export const METERS_PER_DEGREE_LAT = (EARTH_RADIUS_M * Math.PI) / 180;

const toRadians = (deg: number) => (deg * Math.PI) / 180;

/**
 * Great-circle distance in metres.
 */
export function haversineMeters(aLat: number, aLon: number, bLat: number, bLon: number): number {
    const dLat = toRadians(bLat - aLat);
    const dLon = toRadians(bLon - aLon);
    const h =
        Math.sin(dLat / 2) ** 2 +
        Math.cos(toRadians(aLat)) * Math.cos(toRadians(bLat)) * Math.sin(dLon / 2) ** 2;
    return 2 * EARTH_RADIUS_M * Math.asin(Math.min(1, Math.sqrt(h)));
}

export function inBounds(lat: number, lon: number, bounds: Bounds): boolean {
    return lat >= bounds.latMin && lat <= bounds.latMax && lon >= bounds.lonMin && lon <= bounds.lonMax;
}

/**
 * Degrees of longitude spanning `meters` at the given latitude.
 */
export function metersToLonDegrees(meters: number, lat: number): number {
    return meters / (METERS_PER_DEGREE_LAT * Math.max(1e-6, Math.cos(toRadians(lat))));
}
