import { FEATURE_SCHEMA, type FeatureName, type FeatureRow } from '../features/feature-builder.js';
import { mulberry32, shuffled } from '../utils/random.js';
import { rmse } from './cross-validation.js';
import type { ExpectationModel } from './expectation-model.js';

export interface FeatureImportance {
    feature: FeatureName;
    /** Mean RMSE increase when the column is shuffled */
    importance: number;
    std: number;
}

/**
 * Permutation importance: how much worse the model gets when one feature
 * column is shuffled across rows, averaged over `repeats` seeded shuffles.
 * Returned in feature order.
 */
export function permutationImportance(
    model: ExpectationModel,
    rows: readonly FeatureRow[],
    ratings: readonly number[],
    options: { repeats?: number; seed?: number } = {}
): FeatureImportance[] {
    const repeats = Math.max(1, options.repeats ?? 5);
    const random = mulberry32(options.seed ?? 42);
    const baseline = rmse(model.predictAll(rows), ratings);

    return FEATURE_SCHEMA.map(({ name }) => {
        const increases: number[] = [];
        for (let r = 0; r < repeats; r++) {
            const order = shuffled(random, rows.map((_, i) => i));
            const permuted = rows.map((row, i) => {
                const donor = rows[order[i] ?? i] ?? row;
                return { ...row, [name]: donor[name] };
            });
            increases.push(rmse(model.predictAll(permuted), ratings) - baseline);
        }
        const importance = increases.reduce((a, b) => a + b, 0) / repeats;
        const std = Math.sqrt(increases.reduce((a, b) => a + (b - importance) ** 2, 0) / repeats);
        return { feature: name, importance, std };
    });
}
