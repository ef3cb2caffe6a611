import type { ScoredEntity, Tier, TierThresholds } from '../types/index.js';

export const TIERS: readonly Tier[] = ['Hidden Gem', 'Fair Value', 'Overvalued'];

/**
 * `residual >= hiddenGem` → Hidden Gem, `>= fairValue` → Fair Value,
 * anything lower → Overvalued. Boundaries belong to the higher tier.
 */
export function assignTier(residual: number, thresholds: TierThresholds): Tier {
    if (residual >= thresholds.hiddenGem) return 'Hidden Gem';
    if (residual >= thresholds.fairValue) return 'Fair Value';
    return 'Overvalued';
}

export function tierCounts(rows: readonly Pick<ScoredEntity, 'tier'>[]): Record<Tier, number> {
    const counts: Record<Tier, number> = { 'Hidden Gem': 0, 'Fair Value': 0, Overvalued: 0 };
    for (const row of rows) counts[row.tier]++;
    return counts;
}
