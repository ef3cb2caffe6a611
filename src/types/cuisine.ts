/**
 * Closed cuisine vocabulary used by the listing pre-resolution, the keyword
 * pass and the external classifier.
 */
export const CUISINE_LABELS = [
    'Japanese',
    'Korean',
    'Chinese',
    'Indian',
    'Thai',
    'Vietnamese',
    'Malay',
    'Western',
    'Italian',
    'Mexican',
    'Middle Eastern',
    'Seafood',
    'Hawker',
    'Cafe',
    'Fast Food',
    'BBQ',
    'Other',
] as const;

export type CuisineLabel = (typeof CUISINE_LABELS)[number];

/** Feature level used when an entity has no resolved cuisine. */
export const UNKNOWN_CATEGORY = 'Unknown';

/**
 * Raw listing labels that say nothing about cuisine.
 */
export const GENERIC_CATEGORY_LABELS: ReadonlySet<string> = new Set([
    '',
    'restaurant',
    'restaurants',
    'food',
    'unknown',
    'other',
    'point of interest',
    'establishment',
    'meal takeaway',
    'meal delivery',
    'eatery',
]);

/**
 * Case-insensitive lookup of an exact vocabulary label.
 */
export function toCuisineLabel(value: string): CuisineLabel | null {
    const needle = value.trim().toLowerCase();
    for (const label of CUISINE_LABELS) {
        if (label.toLowerCase() === needle) return label;
    }
    return null;
}
