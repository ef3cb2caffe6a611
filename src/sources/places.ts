import { z } from 'zod';
import type { Listing, ListingPage, ListingSource, ListingSourceOptions, SeedPoint } from '../types/index.js';
import { PersistentSourceError } from '../utils/errors.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { classifySourceError } from './utils.js';

const PLACES_BASE = 'https://places.googleapis.com/v1';

/** Results per page; the Text Search maximum. */
const PAGE_SIZE = 20;

const FIELD_MASK = [
    'places.id',
    'places.displayName',
    'places.primaryType',
    'places.rating',
    'places.userRatingCount',
    'places.location',
    'places.googleMapsUri',
    'nextPageToken',
].join(',');

/**
 * Text Search response (subset of relevant fields).
 */
const placeSchema = z.object({
    id: z.string().optional(),
    displayName: z.object({ text: z.string() }).optional(),
    primaryType: z.string().optional(),
    rating: z.number().optional(),
    userRatingCount: z.number().optional(),
    location: z.object({ latitude: z.number(), longitude: z.number() }),
    googleMapsUri: z.string().optional(),
});

const searchTextResponseSchema = z.object({
    places: z.array(placeSchema).optional(),
    nextPageToken: z.string().optional(),
});

type Place = z.infer<typeof placeSchema>;

/**
 * Google Places (New) Text Search listing source.
 *
 * @see https://developers.google.com/maps/documentation/places/web-service/text-search
 */
export class PlacesListingSource implements ListingSource {
    readonly name = 'places';
    private httpClient: HttpClient;
    private readonly apiKey?: string;
    private readonly query: string;

    constructor(options?: ListingSourceOptions) {
        this.apiKey = options?.apiKey ?? process.env['GOOGLE_PLACES_API_KEY'];
        this.query = options?.query ?? 'restaurants';
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async fetchPage(seed: SeedPoint, radiusM: number, pageToken?: string, signal?: AbortSignal): Promise<ListingPage> {
        if (!this.apiKey) {
            throw new PersistentSourceError('GOOGLE_PLACES_API_KEY is not set', seed.index);
        }

        const body = {
            textQuery: this.query,
            pageSize: PAGE_SIZE,
            locationBias: {
                circle: {
                    center: { latitude: seed.lat, longitude: seed.lon },
                    radius: radiusM,
                },
            },
            ...(pageToken ? { pageToken } : {}),
        };

        getLogger().debug({ seed: seed.index, page: pageToken ? 'next' : 'first' }, 'Places text search');

        try {
            const response = await this.httpClient.post(`${PLACES_BASE}/places:searchText`, body, {
                source: 'places',
                headers: {
                    'X-Goog-Api-Key': this.apiKey,
                    'X-Goog-FieldMask': FIELD_MASK,
                },
                signal,
            });

            const data = searchTextResponseSchema.parse(response.data);
            return {
                listings: (data.places ?? []).flatMap((place) => this.normalizePlace(place)),
                nextPageToken: data.nextPageToken || undefined,
            };
        } catch (error) {
            throw classifySourceError(error, seed.index, this.name);
        }
    }

    /**
     * Places without a display name are dropped here.
     */
    private normalizePlace(place: Place): Listing[] {
        const name = place.displayName?.text.trim();
        if (!name) return [];
        return [
            {
                externalId: place.id ?? null,
                name,
                category: place.primaryType ?? null,
                rating: place.rating ?? null,
                reviewCount: place.userRatingCount ?? 0,
                lat: place.location.latitude,
                lon: place.location.longitude,
                url: place.googleMapsUri ?? null,
            },
        ];
    }
}
