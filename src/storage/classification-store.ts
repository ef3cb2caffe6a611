import type Database from 'better-sqlite3';
import type { CategoryResolution, UnresolvedReason } from '../types/index.js';
import { toCuisineLabel } from '../types/index.js';
import type { GemRadarDatabase } from './database.js';
import { getLogger } from '../utils/logger.js';

/**
 * One stored classifier answer for an entity key.
 */
export interface StoredClassification {
    key: string;
    resolution: CategoryResolution;
}

/**
 * Durable record of classifier answers, keyed by entity identity.
 *
 * Each finished batch is committed as a unit, so a scoring run interrupted
 * between batches keeps every answer it already paid for. Failed batches are
 * never recorded and are asked again on the next run.
 */
export interface ClassificationStore {
    /** Stored answers for the given keys; keys without one are absent. */
    lookup(keys: readonly string[]): Map<string, CategoryResolution>;

    /** Record one batch's answers in a single transaction. */
    commitBatch(results: readonly StoredClassification[]): void;

    /** Forget every stored answer. */
    clear(): number;

    count(): number;
}

interface ClassificationRow {
    key: string;
    status: 'resolved' | 'unresolved';
    label: string | null;
    reason: UnresolvedReason | null;
}

/**
 * SQLite-backed classification store sharing the pipeline database.
 */
export class SqliteClassificationStore implements ClassificationStore {
    private readonly db: Database.Database;

    constructor(database: GemRadarDatabase) {
        this.db = database.getRawDb();
    }

    lookup(keys: readonly string[]): Map<string, CategoryResolution> {
        const found = new Map<string, CategoryResolution>();
        const select = this.db.prepare('SELECT key, status, label, reason FROM classifications WHERE key = ?');

        for (const key of keys) {
            const row = select.get(key) as ClassificationRow | undefined;
            const resolution = row ? toResolution(row) : null;
            if (resolution) found.set(key, resolution);
        }
        return found;
    }

    commitBatch(results: readonly StoredClassification[]): void {
        const upsert = this.db.prepare(`
      INSERT INTO classifications (key, status, label, reason)
      VALUES (@key, @status, @label, @reason)
      ON CONFLICT(key) DO UPDATE SET
        status = excluded.status,
        label = excluded.label,
        reason = excluded.reason,
        classified_at = datetime('now')
    `);

        const write = this.db.transaction((batch: readonly StoredClassification[]) => {
            for (const { key, resolution } of batch) {
                upsert.run(
                    resolution.status === 'resolved'
                        ? { key, status: 'resolved', label: resolution.label, reason: null }
                        : { key, status: 'unresolved', label: null, reason: resolution.reason }
                );
            }
        });

        write(results);
    }

    clear(): number {
        const removed = this.db.prepare('DELETE FROM classifications').run().changes;
        getLogger().info({ removed }, 'Cleared stored classifications');
        return removed;
    }

    count(): number {
        const row = this.db.prepare('SELECT COUNT(*) as count FROM classifications').get() as { count: number };
        return row.count;
    }
}

/**
 * Rows whose label has left the vocabulary are treated as missing.
 */
function toResolution(row: ClassificationRow): CategoryResolution | null {
    if (row.status === 'unresolved') {
        return row.reason ? { status: 'unresolved', reason: row.reason } : null;
    }
    const label = row.label ? toCuisineLabel(row.label) : null;
    return label ? { status: 'resolved', label, source: 'classifier' } : null;
}
