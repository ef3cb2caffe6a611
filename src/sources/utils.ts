/**
 * Shared utilities for listing sources.
 */
import { ZodError } from 'zod';
import type { Listing, RawEntity, SeedPoint } from '../types/index.js';
import { PersistentSourceError, PipelineAbortedError, TransientSourceError, errorMessage } from '../utils/errors.js';
import { HttpError } from '../utils/http-client.js';

/**
 * Tag a source listing with its seed point and collection time.
 */
export function toRawEntity(listing: Listing, seed: SeedPoint, collectedAt: string): RawEntity {
    return {
        externalId: listing.externalId,
        name: listing.name,
        category: listing.category,
        rating: listing.rating,
        reviewCount: Math.max(0, Math.round(listing.reviewCount)),
        lat: listing.lat,
        lon: listing.lon,
        seedIndex: seed.index,
        collectedAt,
        url: listing.url,
    };
}

/**
 * Convert whatever a source call threw into the collector's taxonomy.
 *
 * Retryable HTTP failures (429, 5xx, network, timeout) are transient; other
 * HTTP statuses and malformed payloads are persistent. Cancellation passes
 * through untouched.
 */
export function classifySourceError(error: unknown, seedIndex: number, sourceName: string): Error {
    if (
        error instanceof PipelineAbortedError ||
        error instanceof TransientSourceError ||
        error instanceof PersistentSourceError
    ) {
        return error;
    }
    if (error instanceof HttpError) {
        const message = `${sourceName}: ${error.message}`;
        return error.retryable || error.status === 0
            ? new TransientSourceError(message, seedIndex, error)
            : new PersistentSourceError(message, seedIndex, error);
    }
    if (error instanceof ZodError) {
        return new PersistentSourceError(`${sourceName}: malformed response (${error.issues[0]?.message ?? 'invalid'})`, seedIndex, error);
    }
    return new TransientSourceError(`${sourceName}: ${errorMessage(error)}`, seedIndex, error);
}
