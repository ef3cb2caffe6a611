import type Database from 'better-sqlite3';
import type { RawEntity } from '../types/index.js';
import type { GemRadarDatabase } from './database.js';
import { getLogger } from '../utils/logger.js';

/**
 * Durable record of seed index → entities collected there.
 *
 * A seed point is either complete (every entity stored, flag set) or not;
 * pages staged for an unfinished seed are never visible to `has` or `loadAll`.
 */
export interface CheckpointStore {
    has(seedIndex: number): boolean;

    /**
     * Store one page of entities for a seed. With `complete` the page and the
     * completion flag are committed together.
     * @returns false when the seed was already complete (nothing written)
     */
    append(seedIndex: number, entities: readonly RawEntity[], complete: boolean): boolean;

    /** Drop staged pages and record a failed collection attempt. */
    markFailed(seedIndex: number, error: string, attempts: number): void;

    /** Drop staged pages for one seed, or for every unfinished seed. */
    discardStaged(seedIndex?: number): number;

    /** Entities of every complete seed, in seed then collection order. */
    loadAll(): RawEntity[];

    isFailed(seedIndex: number): boolean;
    failedSeeds(): number[];
    status(): CheckpointStatus;
}

export interface CheckpointStatus {
    complete: number;
    staged: number;
    failed: number;
    entities: number;
}

type SeedStatus = 'staged' | 'complete' | 'failed';

interface RawEntityRow {
    seed_index: number;
    position: number;
    external_id: string | null;
    name: string;
    category: string | null;
    rating: number | null;
    review_count: number;
    lat: number;
    lon: number;
    collected_at: string;
    url: string | null;
}

/**
 * SQLite-backed checkpoint store. Every mutation is a single transaction, so
 * an interrupted process leaves each seed either complete or invisible.
 */
export class SqliteCheckpointStore implements CheckpointStore {
    private readonly db: Database.Database;

    constructor(database: GemRadarDatabase) {
        this.db = database.getRawDb();
    }

    has(seedIndex: number): boolean {
        return this.getStatus(seedIndex) === 'complete';
    }

    isFailed(seedIndex: number): boolean {
        return this.getStatus(seedIndex) === 'failed';
    }

    append(seedIndex: number, entities: readonly RawEntity[], complete: boolean): boolean {
        const insert = this.db.prepare(`
      INSERT INTO raw_entities (seed_index, position, external_id, name, category, rating, review_count, lat, lon, collected_at, url)
      VALUES (@seed_index, @position, @external_id, @name, @category, @rating, @review_count, @lat, @lon, @collected_at, @url)
    `);

        const write = this.db.transaction((): boolean => {
            const status = this.getStatus(seedIndex);
            if (status === 'complete') return false;

            if (status === undefined) {
                this.db.prepare(`INSERT INTO seed_points (seed_index, status) VALUES (?, 'staged')`).run(seedIndex);
            } else if (status === 'failed') {
                this.db.prepare('DELETE FROM raw_entities WHERE seed_index = ?').run(seedIndex);
                this.db.prepare(`UPDATE seed_points SET status = 'staged', updated_at = datetime('now') WHERE seed_index = ?`).run(seedIndex);
            }

            const next = this.db
                .prepare('SELECT COALESCE(MAX(position) + 1, 0) AS next FROM raw_entities WHERE seed_index = ?')
                .get(seedIndex) as { next: number };

            entities.forEach((entity, offset) => {
                insert.run({
                    seed_index: seedIndex,
                    position: next.next + offset,
                    external_id: entity.externalId,
                    name: entity.name,
                    category: entity.category,
                    rating: entity.rating,
                    review_count: entity.reviewCount,
                    lat: entity.lat,
                    lon: entity.lon,
                    collected_at: entity.collectedAt,
                    url: entity.url,
                });
            });

            if (complete) {
                this.db
                    .prepare(`UPDATE seed_points SET status = 'complete', attempts = attempts + 1, last_error = NULL, updated_at = datetime('now') WHERE seed_index = ?`)
                    .run(seedIndex);
            }
            return true;
        });

        return write();
    }

    markFailed(seedIndex: number, error: string, attempts: number): void {
        const write = this.db.transaction(() => {
            if (this.getStatus(seedIndex) === 'complete') return;
            this.db.prepare('DELETE FROM raw_entities WHERE seed_index = ?').run(seedIndex);
            this.db
                .prepare(`
        INSERT INTO seed_points (seed_index, status, attempts, last_error)
        VALUES (@seed_index, 'failed', @attempts, @error)
        ON CONFLICT(seed_index) DO UPDATE SET
          status = 'failed',
          attempts = attempts + excluded.attempts,
          last_error = excluded.last_error,
          updated_at = datetime('now')
      `)
                .run({ seed_index: seedIndex, attempts, error });
        });
        write();
    }

    discardStaged(seedIndex?: number): number {
        const write = this.db.transaction((): number => {
            const staged = seedIndex === undefined
                ? (this.db.prepare(`SELECT seed_index FROM seed_points WHERE status = 'staged'`).all() as Array<{ seed_index: number }>)
                : (this.db.prepare(`SELECT seed_index FROM seed_points WHERE status = 'staged' AND seed_index = ?`).all(seedIndex) as Array<{ seed_index: number }>);

            for (const row of staged) {
                this.db.prepare('DELETE FROM raw_entities WHERE seed_index = ?').run(row.seed_index);
                this.db.prepare('DELETE FROM seed_points WHERE seed_index = ?').run(row.seed_index);
            }
            return staged.length;
        });

        const discarded = write();
        if (discarded > 0) {
            getLogger().info({ discarded }, 'Discarded staged pages from an unfinished seed');
        }
        return discarded;
    }

    loadAll(): RawEntity[] {
        const rows = this.db
            .prepare(`
      SELECT r.* FROM raw_entities r
      JOIN seed_points s ON s.seed_index = r.seed_index
      WHERE s.status = 'complete'
      ORDER BY r.seed_index, r.position
    `)
            .all() as RawEntityRow[];

        return rows.map((row) => ({
            externalId: row.external_id,
            name: row.name,
            category: row.category,
            rating: row.rating,
            reviewCount: row.review_count,
            lat: row.lat,
            lon: row.lon,
            seedIndex: row.seed_index,
            collectedAt: row.collected_at,
            url: row.url,
        }));
    }

    failedSeeds(): number[] {
        const rows = this.db
            .prepare(`SELECT seed_index FROM seed_points WHERE status = 'failed' ORDER BY seed_index`)
            .all() as Array<{ seed_index: number }>;
        return rows.map((row) => row.seed_index);
    }

    status(): CheckpointStatus {
        const counts: CheckpointStatus = { complete: 0, staged: 0, failed: 0, entities: 0 };
        const rows = this.db.prepare('SELECT status, COUNT(*) as count FROM seed_points GROUP BY status').all() as Array<{ status: SeedStatus; count: number }>;
        for (const row of rows) {
            counts[row.status] = row.count;
        }
        const entities = this.db
            .prepare(`SELECT COUNT(*) as count FROM raw_entities r JOIN seed_points s ON s.seed_index = r.seed_index WHERE s.status = 'complete'`)
            .get() as { count: number };
        counts.entities = entities.count;
        return counts;
    }

    private getStatus(seedIndex: number): SeedStatus | undefined {
        const row = this.db.prepare('SELECT status FROM seed_points WHERE seed_index = ?').get(seedIndex) as { status: SeedStatus } | undefined;
        return row?.status;
    }
}
