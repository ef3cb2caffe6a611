import { z } from 'zod';
import type { CanonicalEntity, CuisineLabel } from '../types/index.js';
import { CUISINE_LABELS, toCuisineLabel } from '../types/index.js';
import { readDataFile } from '../utils/data-files.js';
import { getLogger } from '../utils/logger.js';

/**
 * Keywords per cuisine, in vocabulary order.
 */
export type KeywordTable = ReadonlyArray<{ label: CuisineLabel; keywords: readonly string[] }>;

const keywordFileSchema = z.object({
    keywords: z.record(z.string(), z.array(z.string().min(1))),
});

let defaultTable: KeywordTable | null = null;

/**
 * Load `data/cuisine-keywords.json` (or another file of the same shape).
 * @throws Error on a cuisine name outside the vocabulary
 */
export function loadKeywordTable(path?: string): KeywordTable {
    if (!path && defaultTable) return defaultTable;

    const file = readDataFile('cuisine-keywords.json', keywordFileSchema, path);
    const byLabel = new Map<CuisineLabel, string[]>();
    for (const [name, keywords] of Object.entries(file.keywords)) {
        const label = toCuisineLabel(name);
        if (!label) throw new Error(`Unknown cuisine in keyword table: ${name}`);
        byLabel.set(label, keywords.map((k) => k.toLowerCase()));
    }

    const table = CUISINE_LABELS.map((label) => ({ label, keywords: byLabel.get(label) ?? [] }));
    if (!path) defaultTable = table;
    return table;
}

/**
 * Guess a cuisine from a restaurant name.
 *
 * Each cuisine scores the summed length of its keywords found in the name;
 * the highest score wins, ties going to the earlier vocabulary label.
 * Returns null when nothing matches.
 */
export function deduceCuisine(name: string, table: KeywordTable = loadKeywordTable()): CuisineLabel | null {
    const haystack = name.normalize('NFKC').toLowerCase();
    let best: CuisineLabel | null = null;
    let bestScore = 0;

    for (const { label, keywords } of table) {
        let score = 0;
        for (const keyword of keywords) {
            if (haystack.includes(keyword)) score += keyword.length;
        }
        if (score > bestScore) {
            best = label;
            bestScore = score;
        }
    }

    return best;
}

/**
 * Resolve unresolved entities whose names give their cuisine away.
 */
export function applyKeywordPass(
    entities: readonly CanonicalEntity[],
    table: KeywordTable = loadKeywordTable()
): { entities: CanonicalEntity[]; resolved: number } {
    let resolved = 0;
    const out = entities.map((entity): CanonicalEntity => {
        if (entity.category.status === 'resolved') return entity;
        const label = deduceCuisine(entity.name, table);
        if (!label) return entity;
        resolved++;
        return { ...entity, category: { status: 'resolved', label, source: 'keyword' } };
    });

    getLogger().info({ resolved, remaining: out.filter((e) => e.category.status === 'unresolved').length }, 'Keyword pass complete');
    return { entities: out, resolved };
}
