import type { CanonicalEntity, CategoryResolution, UnresolvedReason } from '../types/index.js';
import { GENERIC_CATEGORY_LABELS, toCuisineLabel } from '../types/index.js';

/**
 * Resolve a cuisine from the listing's own category label.
 *
 * Labels such as `japanese_restaurant` are reduced to `japanese` first.
 * Generic placeholders and labels outside the vocabulary stay unresolved.
 */
export function resolveListingCategory(rawCategory: string | null): CategoryResolution {
    const cleaned = (rawCategory ?? '')
        .replace(/_/g, ' ')
        .replace(/\s+/g, ' ')
        .trim()
        .toLowerCase();

    if (GENERIC_CATEGORY_LABELS.has(cleaned)) {
        return { status: 'unresolved', reason: 'placeholder' };
    }

    const label = toCuisineLabel(cleaned) ?? toCuisineLabel(cleaned.replace(/ restaurants?$/, ''));
    return label ? { status: 'resolved', label, source: 'listing' } : { status: 'unresolved', reason: 'placeholder' };
}

/**
 * Apply listing pre-resolution to every entity. Returns new objects.
 */
export function preResolveCategories(entities: readonly CanonicalEntity[]): CanonicalEntity[] {
    return entities.map((entity) => ({ ...entity, category: resolveListingCategory(entity.rawCategory) }));
}

/**
 * Give every still-unresolved entity the same reason (for example when no
 * classifier is configured).
 */
export function markUnresolved(entities: readonly CanonicalEntity[], reason: UnresolvedReason): CanonicalEntity[] {
    return entities.map((entity): CanonicalEntity =>
        entity.category.status === 'unresolved' ? { ...entity, category: { status: 'unresolved', reason } } : entity
    );
}
