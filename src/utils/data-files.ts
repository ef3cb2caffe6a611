import { readFileSync } from 'node:fs';
import type { z } from 'zod';

/**
 * Directory holding the JSON tables shipped with the package. Resolves to
 * `<package>/data` from both `src/utils` and `dist/utils`.
 */
const DATA_DIR = new URL('../../data/', import.meta.url);

/**
 * Read and validate a JSON file from the package data directory, or from an
 * explicit path when one is given.
 */
export function readDataFile<T>(name: string, schema: z.ZodType<T>, overridePath?: string): T {
    const location = overridePath ?? new URL(name, DATA_DIR);
    const raw: unknown = JSON.parse(readFileSync(location, 'utf-8'));
    return schema.parse(raw);
}
