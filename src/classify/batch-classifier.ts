import type { CanonicalEntity, CategoryResolution, LlmProvider } from '../types/index.js';
import { CUISINE_LABELS } from '../types/index.js';
import { normalizeName } from '../dedup/deduplicator.js';
import { categoryLevel } from '../features/feature-builder.js';
import { ClassificationBatchError, PipelineAbortedError, errorMessage, throwIfAborted } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { IntervalGate, type RateGate } from '../utils/rate-limit.js';
import type { ClassificationStore } from '../storage/classification-store.js';
import { normalizeLabel, parseClassificationResponse } from './response-parser.js';

/** Upper bound on names per classification request. */
export const MAX_BATCH_SIZE = 20;

export interface ClassifyOptions {
    batchSize: number;
    /** Minimum delay between the start of consecutive calls */
    minDelayMs: number;
    model?: string;
    signal?: AbortSignal;
    /** Gate shared with other callers of the same quota; defaults to a fresh `IntervalGate` */
    gate?: RateGate;
    /** Answers from earlier runs are reused and each finished batch is recorded here */
    store?: ClassificationStore;
}

export interface ClassificationReport {
    /** Batches sent this run */
    batches: number;
    failedBatches: number;
    resolved: number;
    unresolved: number;
    /** Returned names that were not in the request */
    strayNames: number;
    /** Entities answered from the store without a call */
    reused: number;
}

/**
 * Outcome for one entity of one batch.
 */
export interface ClassificationResult {
    key: string;
    resolution: CategoryResolution;
}

export interface ClassifyOutcome {
    entities: CanonicalEntity[];
    report: ClassificationReport;
    /** Category level → entity count over the whole corpus */
    distribution: Record<string, number>;
}

const SYSTEM_PROMPT = 'You classify Singapore restaurants by cuisine. Reply with JSON only.';

/**
 * Request text for one batch: the names and the closed label set, nothing else.
 */
export function buildClassificationPrompt(names: readonly string[]): string {
    return [
        `Classify each restaurant into exactly ONE of these categories: ${CUISINE_LABELS.join(', ')}.`,
        '',
        'Rules:',
        '- "Western" includes American, British, European and fusion restaurants.',
        '- "Hawker" is for food courts, hawker centres and eating houses.',
        '- "Cafe" is for coffee shops, bakeries and dessert places.',
        '- Use "Other" when the cuisine cannot be determined.',
        '- Copy each name exactly as given.',
        '',
        'Respond as {"classifications": [{"name": "<name>", "category": "<category>"}]}.',
        '',
        'Restaurant names:',
        JSON.stringify(names),
    ].join('\n');
}

/**
 * Split into consecutive batches of at most `size` items.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
    const batches: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        batches.push(items.slice(i, i + size));
    }
    return batches;
}

/**
 * Match one parsed reply back to the batch by normalized name.
 * Pairs naming anything outside the batch are counted and ignored; the first
 * pair for a name wins.
 */
export function matchBatchResults(
    batch: readonly CanonicalEntity[],
    reply: ReadonlyArray<{ name: string; category: string }>
): { results: ClassificationResult[]; strayNames: number } {
    const requested = new Set(batch.map((e) => e.key));
    const answers = new Map<string, CategoryResolution>();
    let strayNames = 0;

    for (const pair of reply) {
        const key = normalizeName(pair.name);
        if (!requested.has(key)) {
            strayNames++;
            continue;
        }
        if (answers.has(key)) continue;
        const label = normalizeLabel(pair.category);
        answers.set(
            key,
            label ? { status: 'resolved', label, source: 'classifier' } : { status: 'unresolved', reason: 'classifier-invalid' }
        );
    }

    const results = batch.map((entity): ClassificationResult => ({
        key: entity.key,
        resolution: answers.get(entity.key) ?? { status: 'unresolved', reason: 'classifier-omitted' },
    }));
    return { results, strayNames };
}

export function categoryDistribution(entities: readonly CanonicalEntity[]): Record<string, number> {
    const distribution: Record<string, number> = {};
    for (const entity of entities) {
        const level = categoryLevel(entity);
        distribution[level] = (distribution[level] ?? 0) + 1;
    }
    return distribution;
}

/**
 * Classify every unresolved entity through the external provider.
 *
 * Calls are strictly serialized behind the gate. A failed or unparsable batch
 * leaves its entities `classifier-failed` and the run carries on; only
 * cancellation stops the loop. With a store, keys it already holds are not
 * sent, and every answered batch is committed before the next call, so an
 * interruption loses at most the batch in flight. Input entities are not
 * mutated.
 */
export async function classifyUnresolved(
    entities: readonly CanonicalEntity[],
    provider: LlmProvider,
    options: ClassifyOptions
): Promise<ClassifyOutcome> {
    const logger = getLogger();
    const batchSize = Math.max(1, Math.min(MAX_BATCH_SIZE, options.batchSize));
    const gate = options.gate ?? new IntervalGate(options.minDelayMs);
    const unresolved = entities.filter((e) => e.category.status === 'unresolved');
    const merged = options.store?.lookup(unresolved.map((e) => e.key)) ?? new Map<string, CategoryResolution>();
    const reused = merged.size;
    const pending = unresolved.filter((e) => !merged.has(e.key));
    const batches = chunk(pending, batchSize);

    const report: ClassificationReport = {
        batches: batches.length,
        failedBatches: 0,
        resolved: 0,
        unresolved: 0,
        strayNames: 0,
        reused,
    };
    if (reused > 0) {
        logger.info({ reused, pending: pending.length }, 'Reusing stored classifications');
    }

    for (const [batchIndex, batch] of batches.entries()) {
        throwIfAborted(options.signal);
        await gate.acquire(options.signal);

        try {
            const reply = await requestBatch(provider, batch, batchIndex, options);
            const { results, strayNames } = matchBatchResults(batch, reply);
            report.strayNames += strayNames;
            options.store?.commitBatch(results);
            for (const result of results) merged.set(result.key, result.resolution);

            logger.debug({ batch: batchIndex + 1, of: batches.length, strayNames }, 'Classified batch');
        } catch (error) {
            if (error instanceof PipelineAbortedError) throw error;
            report.failedBatches++;
            logger.warn(
                { batch: batchIndex + 1, size: batch.length, error: errorMessage(error) },
                'Classification batch failed, entities stay unresolved'
            );
            for (const entity of batch) merged.set(entity.key, { status: 'unresolved', reason: 'classifier-failed' });
        }
    }

    const out = entities.map((entity): CanonicalEntity => {
        const resolution = merged.get(entity.key);
        if (!resolution || entity.category.status === 'resolved') return entity;
        if (resolution.status === 'resolved') report.resolved++;
        else report.unresolved++;
        return { ...entity, category: resolution };
    });

    const distribution = categoryDistribution(out);
    logger.info({ ...report, distribution }, 'Batch classification complete');
    return { entities: out, report, distribution };
}

async function requestBatch(
    provider: LlmProvider,
    batch: readonly CanonicalEntity[],
    batchIndex: number,
    options: ClassifyOptions
): Promise<Array<{ name: string; category: string }>> {
    const keys = batch.map((e) => e.key);
    let text: string;
    try {
        const result = await provider.complete(buildClassificationPrompt(batch.map((e) => e.name)), {
            model: options.model,
            temperature: 0,
            jsonMode: true,
            systemPrompt: SYSTEM_PROMPT,
            signal: options.signal,
        });
        text = result.text;
    } catch (error) {
        if (error instanceof PipelineAbortedError) throw error;
        throw new ClassificationBatchError(`Classifier call failed: ${errorMessage(error)}`, batchIndex, keys, error);
    }

    try {
        return parseClassificationResponse(text);
    } catch (error) {
        throw new ClassificationBatchError(`Unparsable classifier reply: ${errorMessage(error)}`, batchIndex, keys, error);
    }
}
