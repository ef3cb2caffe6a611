import { z } from 'zod';
import type { ModelConfig } from '../types/index.js';
import { FEATURE_SCHEMA, type FeatureKind, type FeatureName, type FeatureRow } from '../features/feature-builder.js';
import { InsufficientTrainingDataError } from '../utils/errors.js';
import { mulberry32 } from '../utils/random.js';

/**
 * Hyper-parameters that shape training (cross-validation settings excluded).
 */
export type BoostingParams = Pick<
    ModelConfig,
    'learningRate' | 'maxIterations' | 'maxDepth' | 'minSamplesLeaf' | 'l2Regularization' | 'maxBins' | 'subsample' | 'seed'
>;

/**
 * Only the boosting fields of a wider config object.
 */
export function boostingParams(config: BoostingParams): BoostingParams {
    const { learningRate, maxIterations, maxDepth, minSamplesLeaf, l2Regularization, maxBins, subsample, seed } = config;
    return { learningRate, maxIterations, maxDepth, minSamplesLeaf, l2Regularization, maxBins, subsample, seed };
}

/**
 * Regression tree node. Split nodes send a row left when its numeric value
 * is `<= threshold`, or when its category is in `leftLevels`. Categories the
 * tree never saw go to the side that held more training rows.
 */
export type TreeNode =
    | { kind: 'leaf'; value: number }
    | { kind: 'numeric'; feature: FeatureName; threshold: number; left: TreeNode; right: TreeNode }
    | {
          kind: 'categorical';
          feature: FeatureName;
          leftLevels: string[];
          rightLevels: string[];
          unseenLeft: boolean;
          left: TreeNode;
          right: TreeNode;
      };

/** Smallest gain that justifies a split. */
const MIN_SPLIT_GAIN = 1e-10;

// ─── Binning ──────────────────────────────────────────────

/**
 * Upper bin edges for a numeric column: midpoints between distinct values,
 * thinned to quantiles when there are more than `maxBins` of them.
 */
export function numericThresholds(values: readonly number[], maxBins: number): number[] {
    const sorted = [...values].sort((a, b) => a - b);
    const unique = sorted.filter((v, i) => i === 0 || v !== sorted[i - 1]);
    if (unique.length <= 1) return [];

    const edges: number[] = [];
    if (unique.length <= maxBins) {
        for (let i = 1; i < unique.length; i++) {
            edges.push(((unique[i - 1] ?? 0) + (unique[i] ?? 0)) / 2);
        }
        return edges;
    }

    for (let b = 1; b < maxBins; b++) {
        const idx = Math.floor((b * sorted.length) / maxBins);
        const lo = sorted[idx - 1];
        const hi = sorted[idx];
        if (lo === undefined || hi === undefined || lo === hi) continue;
        const edge = (lo + hi) / 2;
        if (edges.length === 0 || edge > (edges[edges.length - 1] ?? -Infinity)) edges.push(edge);
    }
    return edges;
}

/**
 * Index of the first edge `>= value`, or `edges.length`.
 */
export function binOf(value: number, edges: readonly number[]): number {
    let lo = 0;
    let hi = edges.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        if (value <= (edges[mid] ?? Infinity)) hi = mid;
        else lo = mid + 1;
    }
    return lo;
}

interface BinnedColumn {
    name: FeatureName;
    kind: FeatureKind;
    bins: Int32Array;
    binCount: number;
    /** Numeric: upper edges. */
    edges: number[];
    /** Categorical: level per bin. */
    levels: string[];
}

function binColumns(rows: readonly FeatureRow[], maxBins: number): BinnedColumn[] {
    return FEATURE_SCHEMA.map(({ name, kind }) => {
        const bins = new Int32Array(rows.length);
        if (kind === 'numeric') {
            const values = rows.map((row) => Number(row[name]));
            const edges = numericThresholds(values, maxBins);
            values.forEach((v, i) => {
                bins[i] = binOf(v, edges);
            });
            return { name, kind, bins, binCount: edges.length + 1, edges, levels: [] };
        }

        const levels = [...new Set(rows.map((row) => String(row[name])))].sort();
        const index = new Map(levels.map((level, i) => [level, i]));
        rows.forEach((row, i) => {
            bins[i] = index.get(String(row[name])) ?? 0;
        });
        return { name, kind, bins, binCount: levels.length, edges: [], levels };
    });
}

// ─── Tree growth ──────────────────────────────────────────

interface SplitCandidate {
    gain: number;
    column: BinnedColumn;
    /** Bins routed left */
    leftBins: Set<number>;
    /** Categorical: non-empty bins routed right */
    rightBins: number[];
    leftCount: number;
    rightCount: number;
    /** Numeric split: last bin on the left */
    lastLeftBin: number;
}

interface GrowContext {
    columns: BinnedColumn[];
    gradients: Float64Array;
    params: BoostingParams;
}

function leafScore(gradSum: number, count: number, lambda: number): number {
    return (gradSum * gradSum) / (count + lambda);
}

function findBestSplit(rowIdx: readonly number[], gradSum: number, ctx: GrowContext): SplitCandidate | null {
    const { l2Regularization: lambda, minSamplesLeaf } = ctx.params;
    const n = rowIdx.length;
    const parent = leafScore(gradSum, n, lambda);
    let best: SplitCandidate | null = null;

    for (const column of ctx.columns) {
        if (column.binCount < 2) continue;

        const grad = new Float64Array(column.binCount);
        const count = new Int32Array(column.binCount);
        for (const i of rowIdx) {
            const b = column.bins[i] ?? 0;
            grad[b] = (grad[b] ?? 0) + (ctx.gradients[i] ?? 0);
            count[b] = (count[b] ?? 0) + 1;
        }

        // Numeric bins are scanned in value order; categorical bins in order
        // of their mean gradient, which makes the best prefix the best subset.
        const order: number[] = [];
        for (let b = 0; b < column.binCount; b++) {
            if (column.kind === 'numeric' || (count[b] ?? 0) > 0) order.push(b);
        }
        if (column.kind === 'categorical') {
            order.sort((a, b) => {
                const ma = (grad[a] ?? 0) / ((count[a] ?? 0) + lambda);
                const mb = (grad[b] ?? 0) / ((count[b] ?? 0) + lambda);
                return ma - mb || a - b;
            });
        }

        let gradLeft = 0;
        let countLeft = 0;
        for (let k = 0; k < order.length - 1; k++) {
            const b = order[k] ?? 0;
            gradLeft += grad[b] ?? 0;
            countLeft += count[b] ?? 0;
            const countRight = n - countLeft;
            if (countLeft < minSamplesLeaf) continue;
            if (countRight < minSamplesLeaf) break;

            const gain = leafScore(gradLeft, countLeft, lambda) + leafScore(gradSum - gradLeft, countRight, lambda) - parent;
            if (gain > (best?.gain ?? MIN_SPLIT_GAIN)) {
                best = {
                    gain,
                    column,
                    leftBins: new Set(order.slice(0, k + 1)),
                    rightBins: column.kind === 'categorical' ? order.slice(k + 1) : [],
                    leftCount: countLeft,
                    rightCount: countRight,
                    lastLeftBin: b,
                };
            }
        }
    }

    return best;
}

function levelsOf(column: BinnedColumn, bins: readonly number[]): string[] {
    return [...bins].sort((a, b) => a - b).map((b) => column.levels[b] ?? '');
}

function growTree(rowIdx: number[], depth: number, ctx: GrowContext): TreeNode {
    const { l2Regularization: lambda, learningRate, maxDepth, minSamplesLeaf } = ctx.params;
    let gradSum = 0;
    for (const i of rowIdx) gradSum += ctx.gradients[i] ?? 0;

    const leaf: TreeNode = { kind: 'leaf', value: (-gradSum / (rowIdx.length + lambda)) * learningRate };
    if (depth >= maxDepth || rowIdx.length < 2 * minSamplesLeaf) return leaf;

    const split = findBestSplit(rowIdx, gradSum, ctx);
    if (!split) return leaf;

    const leftRows: number[] = [];
    const rightRows: number[] = [];
    for (const i of rowIdx) {
        if (split.leftBins.has(split.column.bins[i] ?? 0)) leftRows.push(i);
        else rightRows.push(i);
    }

    const left = growTree(leftRows, depth + 1, ctx);
    const right = growTree(rightRows, depth + 1, ctx);

    if (split.column.kind === 'numeric') {
        return {
            kind: 'numeric',
            feature: split.column.name,
            threshold: split.column.edges[split.lastLeftBin] ?? Infinity,
            left,
            right,
        };
    }
    return {
        kind: 'categorical',
        feature: split.column.name,
        leftLevels: levelsOf(split.column, [...split.leftBins]),
        rightLevels: levelsOf(split.column, split.rightBins),
        unseenLeft: split.leftCount >= split.rightCount,
        left,
        right,
    };
}

export function predictTree(node: TreeNode, row: FeatureRow): number {
    let current = node;
    for (;;) {
        switch (current.kind) {
            case 'leaf':
                return current.value;
            case 'numeric':
                current = Number(row[current.feature]) <= current.threshold ? current.left : current.right;
                break;
            case 'categorical': {
                const level = String(row[current.feature]);
                const goLeft = current.leftLevels.includes(level)
                    || (!current.rightLevels.includes(level) && current.unseenLeft);
                current = goLeft ? current.left : current.right;
                break;
            }
        }
    }
}

// ─── Boosting ─────────────────────────────────────────────

export interface BoostedEnsemble {
    baseScore: number;
    trees: TreeNode[];
}

/**
 * Fit a squared-loss gradient-boosted ensemble. Starts from the target mean;
 * each round fits one tree to the residual gradients of the rows drawn for
 * that round. Fully determined by the inputs and `params.seed`.
 */
export function fitBoostedTrees(rows: readonly FeatureRow[], targets: readonly number[], params: BoostingParams): BoostedEnsemble {
    if (rows.length !== targets.length) {
        throw new Error(`Feature rows (${rows.length}) and targets (${targets.length}) differ in length`);
    }
    if (rows.length === 0) {
        throw new InsufficientTrainingDataError('No rows with a usable rating to train on', 0);
    }

    const n = rows.length;
    const baseScore = targets.reduce((sum, y) => sum + y, 0) / n;
    const predictions = new Float64Array(n).fill(baseScore);
    const gradients = new Float64Array(n);
    const columns = binColumns(rows, params.maxBins);
    const random = mulberry32(params.seed);
    const trees: TreeNode[] = [];
    const allRows = Array.from({ length: n }, (_, i) => i);

    for (let iteration = 0; iteration < params.maxIterations; iteration++) {
        for (let i = 0; i < n; i++) {
            gradients[i] = (predictions[i] ?? 0) - (targets[i] ?? 0);
        }

        let sample = allRows;
        if (params.subsample < 1) {
            sample = allRows.filter(() => random() < params.subsample);
            if (sample.length === 0) sample = allRows;
        }

        const tree = growTree(sample, 0, { columns, gradients, params });
        trees.push(tree);
        rows.forEach((row, i) => {
            predictions[i] = (predictions[i] ?? 0) + predictTree(tree, row);
        });
    }

    return { baseScore, trees };
}

// ─── Serialization ────────────────────────────────────────

const featureNameSchema = z.enum(['zone', 'logReviews', 'category', 'isChain', 'clusterDensity']);

export const treeNodeSchema: z.ZodType<TreeNode> = z.lazy(() =>
    z.union([
        z.object({ kind: z.literal('leaf'), value: z.number() }),
        z.object({
            kind: z.literal('numeric'),
            feature: featureNameSchema,
            threshold: z.number(),
            left: treeNodeSchema,
            right: treeNodeSchema,
        }),
        z.object({
            kind: z.literal('categorical'),
            feature: featureNameSchema,
            leftLevels: z.array(z.string()),
            rightLevels: z.array(z.string()),
            unseenLeft: z.boolean(),
            left: treeNodeSchema,
            right: treeNodeSchema,
        }),
    ])
);
