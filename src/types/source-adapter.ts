/**
 * A fixed geographic coordinate used as the centre of one collection query.
 */
export interface SeedPoint {
    index: number;
    lat: number;
    lon: number;
    kind: 'grid' | 'extra';
}

/**
 * A listing as returned by a source, before it is tagged with its seed point
 * and collection time.
 */
export interface Listing {
    externalId: string | null;
    name: string;
    category: string | null;
    rating: number | null;
    reviewCount: number;
    lat: number;
    lon: number;
    url: string | null;
}

/**
 * One page of listings near a seed point.
 */
export interface ListingPage {
    listings: Listing[];
    /** Token for the next page; absent on the last page */
    nextPageToken?: string;
}

/**
 * Interface for listing sources (Google Places, synthetic, ...).
 * Sources are treated as unreliable: implementations throw
 * `TransientSourceError` for failures worth retrying and
 * `PersistentSourceError` for everything else.
 */
export interface ListingSource {
    /** Human-readable source name */
    readonly name: string;

    /**
     * Fetch one page of listings around a seed point.
     * @param radiusM - Search radius in metres
     * @param pageToken - Token from the previous page, if any
     */
    fetchPage(seed: SeedPoint, radiusM: number, pageToken?: string, signal?: AbortSignal): Promise<ListingPage>;
}

/**
 * Options for listing source initialization.
 */
export interface ListingSourceOptions {
    /** API key (from environment variable) */
    apiKey?: string;

    /** Search phrase sent with every query */
    query?: string;
}
