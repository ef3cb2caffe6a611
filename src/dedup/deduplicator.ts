import type { Bounds, CanonicalEntity, Caveat, RawEntity, TieBreakField } from '../types/index.js';
import { inBounds } from '../features/geo.js';
import { DataQualityError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface DedupOptions {
    /** Tie-break rules applied after max review count; first-seen order always closes */
    tieBreak: readonly TieBreakField[];
    /** Coordinates outside this rectangle get an `outside-region` caveat */
    region: Bounds;
    /** Rated sightings needed to flag a name as a chain */
    chainMinSightings: number;
}

export interface DedupStats {
    raw: number;
    canonical: number;
    /** Records whose name normalized to nothing */
    nameless: number;
    /** Named records folded into another sighting */
    duplicates: number;
    /** canonical / raw; 0 for an empty corpus */
    compressionRatio: number;
}

export interface DedupResult {
    entities: CanonicalEntity[];
    stats: DedupStats;
}

/**
 * Identity key for a listing name: NFKC, lower case, punctuation removed,
 * whitespace collapsed.
 */
export function normalizeName(name: string): string {
    return name
        .normalize('NFKC')
        .toLowerCase()
        .replace(/\p{P}+/gu, '')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * A rating is usable when it is a finite value on the 0–5 scale.
 */
export function usableRating(rating: number | null): rating is number {
    return rating !== null && Number.isFinite(rating) && rating >= 0 && rating <= 5;
}

interface Sighting {
    raw: RawEntity;
    order: number;
}

/**
 * Negative when `a` is the better canonical source.
 */
function compareSightings(a: Sighting, b: Sighting, tieBreak: readonly TieBreakField[]): number {
    if (a.raw.reviewCount !== b.raw.reviewCount) {
        return b.raw.reviewCount - a.raw.reviewCount;
    }
    for (const field of tieBreak) {
        if (field === 'collectedAt') {
            const diff = Date.parse(b.raw.collectedAt) - Date.parse(a.raw.collectedAt);
            if (Number.isFinite(diff) && diff !== 0) return diff;
        } else {
            return a.order - b.order;
        }
    }
    return a.order - b.order;
}

/**
 * Entity-level data problems of a chosen sighting.
 */
export function assessDataQuality(key: string, chosen: RawEntity, region: Bounds): DataQualityError[] {
    const issues: DataQualityError[] = [];
    if (!usableRating(chosen.rating)) {
        issues.push(new DataQualityError(`${key}: no usable rating`, key, 'missing-rating'));
    } else if (chosen.reviewCount <= 0) {
        issues.push(new DataQualityError(`${key}: rating ${chosen.rating} with no reviews`, key, 'rating-without-reviews'));
    }
    if (!inBounds(chosen.lat, chosen.lon, region)) {
        issues.push(new DataQualityError(`${key}: coordinates outside region`, key, 'outside-region'));
    }
    return issues;
}

function toCaveat(error: DataQualityError): Caveat {
    switch (error.caveat) {
        case 'missing-rating':
        case 'rating-without-reviews':
        case 'outside-region':
            return error.caveat;
        default:
            throw new Error(`Unknown data-quality caveat: ${error.caveat}`);
    }
}

/**
 * Collapse raw sightings into one canonical entity per normalized name.
 *
 * The canonical source of rating, coordinates and category is the sighting
 * with the most reviews; ties go through `tieBreak`, then first-seen order.
 * Output follows the first-seen order of each key. Unrated records are kept
 * so that density can count them.
 */
export function deduplicate(raw: readonly RawEntity[], options: DedupOptions): DedupResult {
    const logger = getLogger();
    const groups = new Map<string, Sighting[]>();
    let nameless = 0;

    raw.forEach((record, order) => {
        const key = normalizeName(record.name);
        if (key === '') {
            nameless++;
            return;
        }
        const group = groups.get(key);
        if (group) group.push({ raw: record, order });
        else groups.set(key, [{ raw: record, order }]);
    });

    const entities: CanonicalEntity[] = [];
    let flagged = 0;

    for (const [key, sightings] of groups) {
        const ranked = [...sightings].sort((a, b) => compareSightings(a, b, options.tieBreak));
        const chosen = ranked[0]?.raw;
        if (!chosen) continue;

        const ratedSightings = sightings.filter((s) => usableRating(s.raw.rating)).length;
        const issues = assessDataQuality(key, chosen, options.region);
        if (issues.length > 0) {
            flagged++;
            logger.debug({ key, caveats: issues.map((e) => e.caveat) }, 'Data-quality caveat');
        }

        entities.push({
            key,
            name: chosen.name.trim(),
            externalId: chosen.externalId,
            rating: usableRating(chosen.rating) ? chosen.rating : null,
            reviewCount: Math.max(0, chosen.reviewCount),
            lat: chosen.lat,
            lon: chosen.lon,
            rawCategory: chosen.category,
            url: chosen.url,
            sightings: sightings.length,
            ratedSightings,
            isChain: ratedSightings >= options.chainMinSightings,
            category: { status: 'unresolved', reason: 'placeholder' },
            caveats: issues.map(toCaveat),
        });
    }

    const stats: DedupStats = {
        raw: raw.length,
        canonical: entities.length,
        nameless,
        duplicates: raw.length - nameless - entities.length,
        compressionRatio: raw.length === 0 ? 0 : entities.length / raw.length,
    };

    logger.info({ ...stats, flagged }, 'Deduplicated raw sightings');
    return { entities, stats };
}
