import { z } from 'zod';
import type { FeatureRow } from '../features/feature-builder.js';
import { FEATURE_SCHEMA } from '../features/feature-builder.js';
import { getLogger } from '../utils/logger.js';
import { boostingParams, fitBoostedTrees, predictTree, treeNodeSchema, type BoostingParams, type TreeNode } from './gbdt.js';

/** Bumped when the serialized layout changes. */
export const MODEL_FORMAT_VERSION = 1;

export interface SerializedModel {
    version: number;
    features: string[];
    params: BoostingParams;
    baseScore: number;
    trees: TreeNode[];
}

const serializedModelSchema = z.object({
    version: z.literal(MODEL_FORMAT_VERSION),
    features: z.array(z.string()),
    params: z.object({
        learningRate: z.number(),
        maxIterations: z.number(),
        maxDepth: z.number(),
        minSamplesLeaf: z.number(),
        l2Regularization: z.number(),
        maxBins: z.number(),
        subsample: z.number(),
        seed: z.number(),
    }),
    baseScore: z.number(),
    trees: z.array(treeNodeSchema),
});

/**
 * Predicts the rating an average restaurant with a given feature vector
 * would receive.
 */
export class ExpectationModel {
    constructor(
        readonly baseScore: number,
        readonly trees: readonly TreeNode[],
        readonly params: BoostingParams
    ) {}

    predict(row: FeatureRow): number {
        let value = this.baseScore;
        for (const tree of this.trees) {
            value += predictTree(tree, row);
        }
        return value;
    }

    predictAll(rows: readonly FeatureRow[]): number[] {
        return rows.map((row) => this.predict(row));
    }

    toJSON(): SerializedModel {
        return {
            version: MODEL_FORMAT_VERSION,
            features: FEATURE_SCHEMA.map((f) => f.name),
            params: { ...this.params },
            baseScore: this.baseScore,
            trees: [...this.trees],
        };
    }

    /**
     * Rebuild a model from `toJSON()` output (parsed or as a string).
     * @throws ZodError on malformed input, Error on a feature-set mismatch
     */
    static fromJSON(input: unknown): ExpectationModel {
        const raw: unknown = typeof input === 'string' ? JSON.parse(input) : input;
        const data = serializedModelSchema.parse(raw);
        const expected = FEATURE_SCHEMA.map((f) => f.name).join(',');
        if (data.features.join(',') !== expected) {
            throw new Error(`Model was trained on features [${data.features.join(', ')}], expected [${expected}]`);
        }
        return new ExpectationModel(data.baseScore, data.trees, data.params);
    }
}

/**
 * Train on rows with usable ratings.
 * @throws InsufficientTrainingDataError when there are no rows
 */
export function trainExpectationModel(
    rows: readonly FeatureRow[],
    ratings: readonly number[],
    params: BoostingParams
): ExpectationModel {
    const started = Date.now();
    const { baseScore, trees } = fitBoostedTrees(rows, ratings, params);
    const kept = boostingParams(params);
    getLogger().info(
        { rows: rows.length, trees: trees.length, baseScore: Number(baseScore.toFixed(4)), ms: Date.now() - started },
        'Trained expectation model'
    );
    return new ExpectationModel(baseScore, trees, kept);
}
