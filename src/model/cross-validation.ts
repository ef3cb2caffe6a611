import type { FeatureRow } from '../features/feature-builder.js';
import { getLogger } from '../utils/logger.js';
import { mulberry32, shuffled } from '../utils/random.js';
import { fitBoostedTrees, predictTree, type BoostingParams } from './gbdt.js';

export interface CrossValidationResult {
    folds: number;
    foldRmse: number[];
    meanRmse: number;
    stdRmse: number;
    /** RMSE of predicting each training fold's mean rating */
    baselineRmse: number;
}

export function rmse(predicted: readonly number[], actual: readonly number[]): number {
    if (predicted.length === 0) return 0;
    let sum = 0;
    predicted.forEach((p, i) => {
        const diff = p - (actual[i] ?? 0);
        sum += diff * diff;
    });
    return Math.sqrt(sum / predicted.length);
}

function mean(values: readonly number[]): number {
    return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Seeded k-fold split: row indices are shuffled once with `seed`, then dealt
 * round-robin. `k` is clamped to the row count.
 */
export function kFoldAssignments(n: number, k: number, seed: number): number[] {
    const folds = new Array<number>(n).fill(0);
    const order = shuffled(mulberry32(seed), Array.from({ length: n }, (_, i) => i));
    const effectiveK = Math.max(1, Math.min(k, n));
    order.forEach((row, position) => {
        folds[row] = position % effectiveK;
    });
    return folds;
}

/**
 * k-fold cross-validated RMSE of the boosted model against the mean baseline.
 * Returns null when there are fewer than two rows.
 */
export function crossValidate(
    rows: readonly FeatureRow[],
    ratings: readonly number[],
    params: BoostingParams & { cvFolds: number }
): CrossValidationResult | null {
    const n = rows.length;
    if (n < 2) {
        getLogger().warn({ rows: n }, 'Too few rows to cross-validate');
        return null;
    }

    const k = Math.max(2, Math.min(params.cvFolds, n));
    const assignment = kFoldAssignments(n, k, params.seed);
    const foldRmse: number[] = [];
    const baselineFoldRmse: number[] = [];

    for (let fold = 0; fold < k; fold++) {
        const trainRows: FeatureRow[] = [];
        const trainY: number[] = [];
        const testRows: FeatureRow[] = [];
        const testY: number[] = [];
        rows.forEach((row, i) => {
            const y = ratings[i] ?? 0;
            if (assignment[i] === fold) {
                testRows.push(row);
                testY.push(y);
            } else {
                trainRows.push(row);
                trainY.push(y);
            }
        });
        if (testRows.length === 0 || trainRows.length === 0) continue;

        const { baseScore, trees } = fitBoostedTrees(trainRows, trainY, params);
        const predicted = testRows.map((row) => trees.reduce((sum, tree) => sum + predictTree(tree, row), baseScore));
        foldRmse.push(rmse(predicted, testY));

        const trainMean = mean(trainY);
        baselineFoldRmse.push(rmse(testY.map(() => trainMean), testY));
    }

    const meanRmse = mean(foldRmse);
    const stdRmse = Math.sqrt(mean(foldRmse.map((r) => (r - meanRmse) ** 2)));
    const result: CrossValidationResult = {
        folds: foldRmse.length,
        foldRmse,
        meanRmse,
        stdRmse,
        baselineRmse: mean(baselineFoldRmse),
    };

    getLogger().info(
        {
            folds: result.folds,
            meanRmse: Number(meanRmse.toFixed(4)),
            stdRmse: Number(stdRmse.toFixed(4)),
            baselineRmse: Number(result.baselineRmse.toFixed(4)),
        },
        'Cross-validation complete'
    );
    return result;
}
