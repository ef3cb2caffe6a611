import type { Listing, ListingPage, ListingSource, SeedPoint } from '../types/index.js';
import { deriveSeed, gaussian, mulberry32, pick, randomInt } from '../utils/random.js';

const PREFIXES = ['Ah', 'Uncle', 'Grandma', 'Best', 'Tasty', 'Singapore', 'Golden', 'Silver', 'Happy', 'Lucky'];
const SUFFIXES = ['Huat', 'Seng', 'Kee', 'Kitchen', 'Bistro', 'Cafe', 'Restaurant', 'Stall', 'Delights', 'Eats'];
const DISHES = ['Chicken Rice', 'Laksa', 'Western', 'Japanese', 'Indian', 'Malay', 'Chinese', 'Cafe', 'Fast Food', 'Thai', 'Seafood', 'Noodles'];

/** Listings per synthetic page. */
const PAGE_SIZE = 10;

/** Roughly ±220 m around the seed point. */
const JITTER_DEG = 0.002;

/**
 * Deterministic stand-in for a live listing source. Each seed point draws
 * from its own PRNG, so results do not depend on collection order or
 * concurrency.
 */
export class SyntheticListingSource implements ListingSource {
    readonly name = 'synthetic';

    constructor(private readonly seed = 42) {}

    async fetchPage(seed: SeedPoint, _radiusM: number, pageToken?: string): Promise<ListingPage> {
        const all = this.listingsFor(seed);
        const page = pageToken ? Number.parseInt(pageToken, 10) : 0;
        const start = Number.isFinite(page) ? page * PAGE_SIZE : 0;
        const end = start + PAGE_SIZE;

        return {
            listings: all.slice(start, end),
            nextPageToken: end < all.length ? String(page + 1) : undefined,
        };
    }

    /**
     * Every listing around one seed point, across all pages.
     */
    listingsFor(seed: SeedPoint): Listing[] {
        const random = mulberry32(deriveSeed(this.seed, seed.index));
        const count = randomInt(random, 3, 15);
        const listings: Listing[] = [];

        for (let i = 0; i < count; i++) {
            const lat = seed.lat + (random() * 2 - 1) * JITTER_DEG;
            const lon = seed.lon + (random() * 2 - 1) * JITTER_DEG;
            const dish = pick(random, DISHES);
            const name = `${pick(random, PREFIXES)} ${pick(random, SUFFIXES)} ${dish}`;
            const rating = Math.round(Math.min(5, Math.max(1, gaussian(random, 4.0, 0.5))) * 10) / 10;

            let reviewCount = Math.floor(Math.expm1(1 + random() * 5));
            if (random() < 0.1) reviewCount = Math.floor(Math.expm1(6 + random() * 3));

            listings.push({
                externalId: `synthetic-${seed.index}-${i}`,
                name,
                category: dish,
                rating,
                reviewCount,
                lat,
                lon,
                url: `https://maps.google.com/?q=${lat.toFixed(6)},${lon.toFixed(6)}`,
            });
        }

        return listings;
    }
}
