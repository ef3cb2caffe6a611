import type { Caveat, Tier } from '../types/index.js';
import { UNKNOWN_CATEGORY } from '../types/index.js';
import { UNKNOWN_ZONE } from '../features/zones.js';

/** Neighbours within the density radius at which competition counts as high. */
export const HIGH_COMPETITION = 10;

/** Review counts below this are called out as thin evidence. */
export const LOW_REVIEW_VOLUME = 20;

export interface ExplanationInput {
    category: string;
    zone: string;
    predictedRating: number;
    rating: number;
    reviewCount: number;
    residual: number;
    tier: Tier;
    isChain: boolean;
    clusterDensity: number;
    caveats: readonly Caveat[];
}

function formatReviews(count: number): string {
    return `${count.toLocaleString('en-US')} ${count === 1 ? 'review' : 'reviews'}`;
}

function signed(value: number): string {
    return `${value >= 0 ? '+' : '-'}${Math.abs(value).toFixed(2)}`;
}

function tierClause(input: ExplanationInput): string {
    switch (input.tier) {
        case 'Hidden Gem':
            return `It beats that expectation by ${input.residual.toFixed(2)}★, a Hidden Gem.`;
        case 'Fair Value':
            return `That is in line with expectation (${signed(input.residual)}★), Fair Value.`;
        case 'Overvalued':
            return `It falls ${Math.abs(input.residual).toFixed(2)}★ short of expectation, Overvalued.`;
    }
}

function contextClauses(input: ExplanationInput): string[] {
    const clauses: string[] = [];
    if (input.isChain) {
        clauses.push('Listed at several locations, so it is treated as a chain.');
    }
    if (input.clusterDensity >= HIGH_COMPETITION) {
        clauses.push(`Competition is high with ${input.clusterDensity} restaurants close by.`);
    } else if (input.clusterDensity === 0) {
        clauses.push('No other restaurants are close by.');
    }
    if (input.reviewCount < LOW_REVIEW_VOLUME) {
        clauses.push('Few reviews so far, so treat the score with caution.');
    }
    if (input.caveats.length > 0) {
        clauses.push(`Data caveats: ${input.caveats.join(', ')}.`);
    }
    return clauses;
}

/**
 * Deterministic explanation built only from computed fields.
 */
export function explain(input: ExplanationInput): string {
    const category = input.category === UNKNOWN_CATEGORY ? 'Restaurant' : input.category;
    const zone = input.zone === UNKNOWN_ZONE ? 'unmapped areas' : input.zone;

    const headline =
        `${category} listings in ${zone} average ${input.predictedRating.toFixed(2)}★ among comparable entities; ` +
        `this one achieves ${input.rating.toFixed(1)}★ with ${formatReviews(input.reviewCount)}.`;

    return [headline, tierClause(input), ...contextClauses(input)].join(' ');
}
