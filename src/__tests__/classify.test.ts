import { describe, it, expect, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import type { CanonicalEntity, LlmCompletionResult, LlmProvider } from '../types/index.js';
import { CUISINE_LABELS } from '../types/index.js';
import { markUnresolved, preResolveCategories, resolveListingCategory } from '../classify/category-resolution.js';
import { applyKeywordPass, deduceCuisine, loadKeywordTable } from '../classify/keyword-classifier.js';
import { normalizeLabel, parseClassificationResponse } from '../classify/response-parser.js';
import {
    buildClassificationPrompt,
    categoryDistribution,
    chunk,
    classifyUnresolved,
    matchBatchResults,
    type ClassifyOptions,
} from '../classify/batch-classifier.js';
import { PipelineAbortedError } from '../utils/errors.js';
import { GemRadarDatabase } from '../storage/database.js';
import { SqliteClassificationStore } from '../storage/classification-store.js';
import type { RateGate } from '../utils/rate-limit.js';
import { canonicalEntity } from './helpers.js';

/**
 * Provider double: hands the requested names to `reply` and returns its text.
 */
class FakeProvider implements LlmProvider {
    readonly name = 'fake';
    readonly requests: string[][] = [];

    constructor(private readonly reply: (names: string[], call: number) => string) {}

    async complete(prompt: string): Promise<LlmCompletionResult> {
        const names = z.array(z.string()).parse(JSON.parse(prompt.slice(prompt.lastIndexOf('\n') + 1)));
        this.requests.push(names);
        return {
            text: this.reply(names, this.requests.length - 1),
            usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
            model: 'fake-model',
            provider: 'fake',
        };
    }
}

const openGate: RateGate = { acquire: async () => {} };

const OPTIONS: ClassifyOptions = { batchSize: 20, minDelayMs: 0, gate: openGate };

function named(name: string, overrides: Partial<CanonicalEntity> = {}): CanonicalEntity {
    return canonicalEntity({ key: name.toLowerCase(), name, ...overrides });
}

function jsonReply(pairs: Array<[string, string]>): string {
    return JSON.stringify({ classifications: pairs.map(([name, category]) => ({ name, category })) });
}

describe('resolveListingCategory', () => {
    it('should resolve specific listing types', () => {
        expect(resolveListingCategory('japanese_restaurant')).toEqual({ status: 'resolved', label: 'Japanese', source: 'listing' });
        expect(resolveListingCategory('Thai Restaurants')).toEqual({ status: 'resolved', label: 'Thai', source: 'listing' });
        expect(resolveListingCategory('cafe')).toEqual({ status: 'resolved', label: 'Cafe', source: 'listing' });
    });

    it('should leave generic and unknown labels unresolved', () => {
        for (const raw of ['Restaurant', 'point_of_interest', null, 'Peruvian']) {
            expect(resolveListingCategory(raw)).toEqual({ status: 'unresolved', reason: 'placeholder' });
        }
    });

    it('should pre-resolve without touching the input', () => {
        const input = [named('Sakura', { rawCategory: 'japanese_restaurant' })];
        const out = preResolveCategories(input);
        expect(out[0]?.category).toEqual({ status: 'resolved', label: 'Japanese', source: 'listing' });
        expect(input[0]?.category).toEqual({ status: 'unresolved', reason: 'placeholder' });
    });

    it('should relabel only unresolved entities', () => {
        const out = markUnresolved(
            [named('A'), named('B', { category: { status: 'resolved', label: 'Thai', source: 'listing' } })],
            'classifier-disabled'
        );
        expect(out.map((e) => e.category)).toEqual([
            { status: 'unresolved', reason: 'classifier-disabled' },
            { status: 'resolved', label: 'Thai', source: 'listing' },
        ]);
    });
});

describe('keyword classifier', () => {
    it('should score cuisines by matched keyword length', () => {
        expect(deduceCuisine('Tokyo Sushi Bar')).toBe('Japanese');
        expect(deduceCuisine('Burger King')).toBe('Fast Food');
        expect(deduceCuisine('Coffee Shop Corner')).toBe('Hawker');
    });

    it('should break score ties by vocabulary order', () => {
        expect(deduceCuisine('Ramen Pasta')).toBe('Japanese');
    });

    it('should return null when nothing matches', () => {
        expect(deduceCuisine('Golden Plate')).toBeNull();
    });

    it('should resolve only unresolved entities', () => {
        const { entities, resolved } = applyKeywordPass([
            named('Sushi Place', { category: { status: 'resolved', label: 'Korean', source: 'listing' } }),
            named('Tom Yum House'),
            named('Golden Plate'),
        ]);

        expect(resolved).toBe(1);
        expect(entities.map((e) => e.category)).toEqual([
            { status: 'resolved', label: 'Korean', source: 'listing' },
            { status: 'resolved', label: 'Thai', source: 'keyword' },
            { status: 'unresolved', reason: 'placeholder' },
        ]);
    });

    it('should cover every vocabulary label in table order', () => {
        expect(loadKeywordTable().map((row) => row.label)).toEqual([...CUISINE_LABELS]);
    });

    it('should reject a table naming an unknown cuisine', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gemradar-kw-'));
        const file = path.join(dir, 'keywords.json');
        fs.writeFileSync(file, JSON.stringify({ keywords: { Peruvian: ['ceviche'] } }));

        expect(() => loadKeywordTable(file)).toThrow('Unknown cuisine in keyword table: Peruvian');
        fs.rmSync(dir, { recursive: true, force: true });
    });
});

describe('parseClassificationResponse', () => {
    it('should parse the classifications object', () => {
        expect(parseClassificationResponse(jsonReply([['Golden Plate', 'Thai']]))).toEqual([{ name: 'Golden Plate', category: 'Thai' }]);
    });

    it('should parse a bare array inside a code fence', () => {
        const text = '```json\n[{"name": "Blue Door", "category": "Cafe"}]\n```';
        expect(parseClassificationResponse(text)).toEqual([{ name: 'Blue Door', category: 'Cafe' }]);
    });

    it('should parse "Name | Category" lines', () => {
        const text = 'Here you go:\n1. Golden Plate | Thai\n- Blue Door | Cafe\n\n';
        expect(parseClassificationResponse(text)).toEqual([
            { name: 'Golden Plate', category: 'Thai' },
            { name: 'Blue Door', category: 'Cafe' },
        ]);
    });

    it('should reject JSON of the wrong shape', () => {
        expect(() => parseClassificationResponse('{"results": []}')).toThrow(/unexpected shape/);
    });

    it('should reject free text', () => {
        expect(() => parseClassificationResponse('I am not sure about these.')).toThrow(/neither JSON/);
    });
});

describe('normalizeLabel', () => {
    it('should map labels onto the vocabulary', () => {
        expect(normalizeLabel('korean')).toBe('Korean');
        expect(normalizeLabel('Japanese cuisine')).toBe('Japanese');
        expect(normalizeLabel('Peruvian')).toBeNull();
    });
});

describe('batch helpers', () => {
    it('should chunk into consecutive batches', () => {
        expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
        expect(chunk([], 3)).toEqual([]);
    });

    it('should put the names and the whole vocabulary in the prompt', () => {
        const prompt = buildClassificationPrompt(['Golden "Plate"', 'Blue Door']);
        expect(prompt.endsWith('["Golden \\"Plate\\"","Blue Door"]')).toBe(true);
        for (const label of CUISINE_LABELS) {
            expect(prompt).toContain(label);
        }
    });

    it('should match replies by name, not by position', () => {
        const batch = [named('Alpha'), named('Beta'), named('Gamma')];
        const { results, strayNames } = matchBatchResults(batch, [
            { name: 'Imposter', category: 'Thai' },
            { name: 'GAMMA', category: 'Korean' },
            { name: 'Alpha', category: 'Malay' },
            { name: 'Alpha', category: 'Thai' },
        ]);

        expect(strayNames).toBe(1);
        expect(results).toEqual([
            { key: 'alpha', resolution: { status: 'resolved', label: 'Malay', source: 'classifier' } },
            { key: 'beta', resolution: { status: 'unresolved', reason: 'classifier-omitted' } },
            { key: 'gamma', resolution: { status: 'resolved', label: 'Korean', source: 'classifier' } },
        ]);
    });

    it('should count category levels', () => {
        expect(
            categoryDistribution([
                named('A'),
                named('B', { category: { status: 'resolved', label: 'Thai', source: 'keyword' } }),
                named('C'),
            ])
        ).toEqual({ Unknown: 2, Thai: 1 });
    });
});

describe('classifyUnresolved', () => {
    it('should resolve entities from a well-formed reply', async () => {
        const provider = new FakeProvider((names) => jsonReply(names.map((n): [string, string] => [n, n === 'Golden Plate' ? 'Thai' : 'japanese cuisine'])));

        const { entities, report } = await classifyUnresolved([named('Golden Plate'), named('Blue Door')], provider, OPTIONS);

        expect(entities.map((e) => e.category)).toEqual([
            { status: 'resolved', label: 'Thai', source: 'classifier' },
            { status: 'resolved', label: 'Japanese', source: 'classifier' },
        ]);
        expect(report).toEqual({ batches: 1, failedBatches: 0, resolved: 2, unresolved: 0, strayNames: 0, reused: 0 });
    });

    it('should not let a stray name corrupt unrelated entities', async () => {
        const provider = new FakeProvider(() =>
            jsonReply([
                ['Somewhere Else', 'Seafood'],
                ['Gamma', 'Korean'],
                ['Alpha', 'Malay'],
            ])
        );

        const { entities, report } = await classifyUnresolved([named('Alpha'), named('Beta'), named('Gamma')], provider, OPTIONS);

        expect(entities.map((e) => e.category)).toEqual([
            { status: 'resolved', label: 'Malay', source: 'classifier' },
            { status: 'unresolved', reason: 'classifier-omitted' },
            { status: 'resolved', label: 'Korean', source: 'classifier' },
        ]);
        expect(report.strayNames).toBe(1);
        expect(report.resolved).toBe(2);
        expect(report.unresolved).toBe(1);
    });

    it('should mark labels outside the vocabulary as invalid', async () => {
        const provider = new FakeProvider(() => jsonReply([['Alpha', 'Peruvian']]));
        const { entities } = await classifyUnresolved([named('Alpha')], provider, OPTIONS);
        expect(entities[0]?.category).toEqual({ status: 'unresolved', reason: 'classifier-invalid' });
    });

    it('should finish with every entity unresolved when every batch fails', async () => {
        const provider = new FakeProvider(() => {
            throw new Error('HTTP 500');
        });
        const input = [named('A'), named('B'), named('C')];

        const { entities, report } = await classifyUnresolved(input, provider, { ...OPTIONS, batchSize: 2 });

        expect(entities.map((e) => e.category)).toEqual([
            { status: 'unresolved', reason: 'classifier-failed' },
            { status: 'unresolved', reason: 'classifier-failed' },
            { status: 'unresolved', reason: 'classifier-failed' },
        ]);
        expect(report).toEqual({ batches: 2, failedBatches: 2, resolved: 0, unresolved: 3, strayNames: 0, reused: 0 });
    });

    it('should contain an unparsable batch and carry on with the next', async () => {
        const provider = new FakeProvider((names, call) =>
            call === 0 ? 'Sorry, I cannot do that.' : jsonReply(names.map((n): [string, string] => [n, 'Cafe']))
        );

        const { entities, report } = await classifyUnresolved([named('A'), named('B')], provider, { ...OPTIONS, batchSize: 1 });

        expect(entities.map((e) => e.category)).toEqual([
            { status: 'unresolved', reason: 'classifier-failed' },
            { status: 'resolved', label: 'Cafe', source: 'classifier' },
        ]);
        expect(report.failedBatches).toBe(1);
    });

    it('should send only unresolved entities, at most 20 per batch', async () => {
        const input = [
            named('Listed', { category: { status: 'resolved', label: 'Thai', source: 'listing' } }),
            ...Array.from({ length: 45 }, (_, i) => named(`Place ${i}`)),
        ];
        const provider = new FakeProvider(() => jsonReply([]));
        const gate = { acquire: vi.fn(async () => {}) };

        const { entities, report } = await classifyUnresolved(input, provider, { batchSize: 50, minDelayMs: 0, gate });

        expect(provider.requests.map((names) => names.length)).toEqual([20, 20, 5]);
        expect(provider.requests.flat()).not.toContain('Listed');
        expect(gate.acquire).toHaveBeenCalledTimes(3);
        expect(report.batches).toBe(3);
        expect(entities[0]?.category).toEqual({ status: 'resolved', label: 'Thai', source: 'listing' });
    });

    it('should keep the minimum delay between calls', async () => {
        const provider = new FakeProvider(() => jsonReply([]));
        const start = Date.now();

        await classifyUnresolved([named('A'), named('B'), named('C')], provider, { batchSize: 1, minDelayMs: 60 });

        expect(provider.requests).toHaveLength(3);
        expect(Date.now() - start).toBeGreaterThanOrEqual(110);
    });

    it('should stop between batches when aborted', async () => {
        const controller = new AbortController();
        const provider = new FakeProvider(() => {
            controller.abort();
            return jsonReply([]);
        });

        await expect(
            classifyUnresolved([named('A'), named('B')], provider, { ...OPTIONS, batchSize: 1, signal: controller.signal })
        ).rejects.toBeInstanceOf(PipelineAbortedError);
        expect(provider.requests).toHaveLength(1);
    });

    it('should commit each answered batch before the next call', async () => {
        const db = new GemRadarDatabase(':memory:');
        const store = new SqliteClassificationStore(db);
        const controller = new AbortController();
        const provider = new FakeProvider((names, call) => {
            if (call === 1) controller.abort();
            return jsonReply(names.map((n): [string, string] => [n, 'Malay']));
        });
        const input = [named('A'), named('B'), named('C')];

        try {
            await expect(
                classifyUnresolved(input, provider, { ...OPTIONS, batchSize: 1, signal: controller.signal, store })
            ).rejects.toBeInstanceOf(PipelineAbortedError);
            expect(store.count()).toBe(2);

            const resumed = new FakeProvider((names) => jsonReply(names.map((n): [string, string] => [n, 'Thai'])));
            const { entities, report } = await classifyUnresolved(input, resumed, { ...OPTIONS, batchSize: 1, store });

            expect(resumed.requests).toEqual([['C']]);
            expect(entities.map((e) => e.category)).toEqual([
                { status: 'resolved', label: 'Malay', source: 'classifier' },
                { status: 'resolved', label: 'Malay', source: 'classifier' },
                { status: 'resolved', label: 'Thai', source: 'classifier' },
            ]);
            expect(report).toEqual({ batches: 1, failedBatches: 0, resolved: 3, unresolved: 0, strayNames: 0, reused: 2 });
        } finally {
            db.close();
        }
    });

    it('should not record a failed batch', async () => {
        const db = new GemRadarDatabase(':memory:');
        const store = new SqliteClassificationStore(db);
        const provider = new FakeProvider(() => {
            throw new Error('HTTP 500');
        });

        try {
            const { report } = await classifyUnresolved([named('A')], provider, { ...OPTIONS, store });
            expect(report.failedBatches).toBe(1);
            expect(store.count()).toBe(0);
        } finally {
            db.close();
        }
    });

    it('should not mutate its input', async () => {
        const input = [named('Alpha')];
        const provider = new FakeProvider(() => jsonReply([['Alpha', 'Thai']]));
        await classifyUnresolved(input, provider, OPTIONS);
        expect(input[0]?.category).toEqual({ status: 'unresolved', reason: 'placeholder' });
    });
});
