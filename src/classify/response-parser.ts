import { z } from 'zod';
import type { CuisineLabel } from '../types/index.js';
import { CUISINE_LABELS, toCuisineLabel } from '../types/index.js';

/**
 * One name → label pair as the classifier returned it, before matching.
 */
export interface ParsedClassification {
    name: string;
    category: string;
}

const pairSchema = z.object({
    name: z.string(),
    category: z.string(),
});

const responseSchema = z.union([
    z.object({ classifications: z.array(pairSchema) }).transform((r) => r.classifications),
    z.array(pairSchema),
]);

function tryJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

/**
 * Parse a classifier reply into name/category pairs.
 *
 * Accepts `{ "classifications": [{ "name", "category" }] }`, a bare array of
 * the same pairs (optionally inside a ``` fence), or `Name | Category` lines.
 * @throws Error when the reply contains neither form
 */
export function parseClassificationResponse(text: string): ParsedClassification[] {
    const body = text
        .trim()
        .replace(/^```(?:json)?\s*/i, '')
        .replace(/\s*```$/, '');

    const json = tryJson(body);
    if (json !== undefined) {
        const parsed = responseSchema.safeParse(json);
        if (parsed.success) return parsed.data;
        throw new Error(`Classification reply has unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const pairs: ParsedClassification[] = [];
    for (const line of body.split('\n')) {
        const separator = line.indexOf('|');
        if (separator < 0) continue;
        const name = line
            .slice(0, separator)
            .replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '')
            .trim();
        const category = line.slice(separator + 1).trim();
        if (name && category) pairs.push({ name, category });
    }

    if (pairs.length === 0) {
        throw new Error('Classification reply is neither JSON nor "Name | Category" lines');
    }
    return pairs;
}

/**
 * Map a returned label onto the vocabulary: exact (case-insensitive) first,
 * then the first vocabulary label the text contains.
 */
export function normalizeLabel(category: string): CuisineLabel | null {
    const exact = toCuisineLabel(category);
    if (exact) return exact;

    const lower = category.toLowerCase();
    for (const label of CUISINE_LABELS) {
        if (lower.includes(label.toLowerCase())) return label;
    }
    return null;
}
