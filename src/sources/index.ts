import type { CollectorConfig, ListingSource } from '../types/index.js';
import { PlacesListingSource } from './places.js';
import { SyntheticListingSource } from './synthetic.js';

export { PlacesListingSource } from './places.js';
export { SyntheticListingSource } from './synthetic.js';

/**
 * Build the listing source named in the collector config.
 */
export function createListingSource(config: Pick<CollectorConfig, 'source' | 'syntheticSeed'>, apiKey?: string): ListingSource {
    switch (config.source) {
        case 'places':
            return new PlacesListingSource({ apiKey });
        case 'synthetic':
            return new SyntheticListingSource(config.syntheticSeed);
    }
}
