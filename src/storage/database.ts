import Database from 'better-sqlite3';
import type { Caveat, RunRecord, ScoredEntity, Tier } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: scoring session metadata
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  gemradar_version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}',
  model_json TEXT
);

-- Seed points: one row per seed the collector has touched
CREATE TABLE IF NOT EXISTS seed_points (
  seed_index INTEGER PRIMARY KEY,
  status TEXT NOT NULL CHECK (status IN ('staged', 'complete', 'failed')),
  attempts INTEGER NOT NULL DEFAULT 0,
  last_error TEXT,
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Raw entities: immutable sightings, ordered within their seed
CREATE TABLE IF NOT EXISTS raw_entities (
  raw_id INTEGER PRIMARY KEY,
  seed_index INTEGER NOT NULL REFERENCES seed_points(seed_index),
  position INTEGER NOT NULL,
  external_id TEXT,
  name TEXT NOT NULL,
  category TEXT,
  rating REAL,
  review_count INTEGER NOT NULL DEFAULT 0,
  lat REAL NOT NULL,
  lon REAL NOT NULL,
  collected_at TEXT NOT NULL,
  url TEXT,
  UNIQUE (seed_index, position)
);

-- Scored entities: terminal artifact, replaced wholesale on every scoring run
CREATE TABLE IF NOT EXISTS scored_entities (
  key TEXT PRIMARY KEY,
  rank INTEGER NOT NULL,
  name TEXT NOT NULL,
  rating REAL NOT NULL,
  predicted_rating REAL NOT NULL,
  residual REAL NOT NULL,
  tier TEXT NOT NULL,
  zone TEXT NOT NULL,
  category TEXT NOT NULL,
  review_count INTEGER NOT NULL,
  is_chain INTEGER NOT NULL,
  cluster_density INTEGER NOT NULL,
  explanation TEXT NOT NULL,
  lat REAL NOT NULL,
  lon REAL NOT NULL,
  caveats_json TEXT NOT NULL DEFAULT '[]'
);

CREATE INDEX IF NOT EXISTS idx_raw_entities_seed ON raw_entities(seed_index, position);
CREATE INDEX IF NOT EXISTS idx_seed_points_status ON seed_points(status);
CREATE INDEX IF NOT EXISTS idx_scored_entities_rank ON scored_entities(rank);
`;

/**
 * SQLite schema migration v2: classifier answers kept across scoring runs.
 */
const MIGRATION_V2 = `
CREATE TABLE IF NOT EXISTS classifications (
  key TEXT PRIMARY KEY,
  status TEXT NOT NULL CHECK (status IN ('resolved', 'unresolved')),
  label TEXT,
  reason TEXT,
  classified_at TEXT NOT NULL DEFAULT (datetime('now'))
);
`;

interface ScoredEntityRow {
    key: string;
    rank: number;
    name: string;
    rating: number;
    predicted_rating: number;
    residual: number;
    tier: Tier;
    zone: string;
    category: string;
    review_count: number;
    is_chain: number;
    cluster_density: number;
    explanation: string;
    lat: number;
    lon: number;
    caveats_json: string;
}

/**
 * Aggregate counts for `inspect`.
 */
export interface DatabaseStats {
    seeds: { complete: number; staged: number; failed: number };
    rawEntities: number;
    classifications: number;
    scoredEntities: number;
    runs: number;
    tiers: Record<string, number>;
}

/**
 * GemRadar database wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and the scored table.
 * Checkpoint rows are owned by `CheckpointStore`, classifier answers by
 * `ClassificationStore`.
 */
export class GemRadarDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        // Run migrations
        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true }) as number;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }

        if (currentVersion < 2) {
            this.db.exec(MIGRATION_V2);
            this.db.pragma('user_version = 2');
            getLogger().info('Database migrated to v2');
        }
    }

    // ─── Scored entities ──────────────────────────────────────

    /**
     * Replace the whole scored table in one transaction.
     * Rows keep the order they are given in (their rank).
     */
    replaceScoredEntities(rows: readonly ScoredEntity[]): void {
        const stmt = this.db.prepare(`
      INSERT INTO scored_entities (key, rank, name, rating, predicted_rating, residual, tier, zone, category, review_count, is_chain, cluster_density, explanation, lat, lon, caveats_json)
      VALUES (@key, @rank, @name, @rating, @predicted_rating, @residual, @tier, @zone, @category, @review_count, @is_chain, @cluster_density, @explanation, @lat, @lon, @caveats_json)
    `);

        const replaceAll = this.db.transaction((entities: readonly ScoredEntity[]) => {
            this.db.prepare('DELETE FROM scored_entities').run();
            entities.forEach((entity, rank) => {
                stmt.run({
                    key: entity.key,
                    rank,
                    name: entity.name,
                    rating: entity.rating,
                    predicted_rating: entity.predicted_rating,
                    residual: entity.residual,
                    tier: entity.tier,
                    zone: entity.zone,
                    category: entity.category,
                    review_count: entity.review_count,
                    is_chain: entity.is_chain ? 1 : 0,
                    cluster_density: entity.cluster_density,
                    explanation: entity.explanation,
                    lat: entity.coordinates.lat,
                    lon: entity.coordinates.lon,
                    caveats_json: JSON.stringify(entity.caveats),
                });
            });
        });

        replaceAll(rows);
    }

    /**
     * Scored rows in rank order.
     */
    getScoredEntities(): ScoredEntity[] {
        const rows = this.db.prepare('SELECT * FROM scored_entities ORDER BY rank').all() as ScoredEntityRow[];
        return rows.map((row) => ({
            key: row.key,
            name: row.name,
            rating: row.rating,
            predicted_rating: row.predicted_rating,
            residual: row.residual,
            tier: row.tier,
            zone: row.zone,
            category: row.category,
            review_count: row.review_count,
            is_chain: row.is_chain === 1,
            cluster_density: row.cluster_density,
            explanation: row.explanation,
            coordinates: { lat: row.lat, lon: row.lon },
            caveats: JSON.parse(row.caveats_json) as Caveat[],
        }));
    }

    getScoredCount(): number {
        const row = this.db.prepare('SELECT COUNT(*) as count FROM scored_entities').get() as { count: number };
        return row.count;
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (created_at, gemradar_version, config_json, stats_json, model_json)
      VALUES (@created_at, @gemradar_version, @config_json, @stats_json, @model_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    getLatestRun(): RunRecord | undefined {
        return this.db.prepare('SELECT * FROM runs ORDER BY run_id DESC LIMIT 1').get() as RunRecord | undefined;
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): DatabaseStats {
        const seeds = { complete: 0, staged: 0, failed: 0 };
        const seedRows = this.db.prepare('SELECT status, COUNT(*) as count FROM seed_points GROUP BY status').all() as Array<{ status: keyof typeof seeds; count: number }>;
        for (const row of seedRows) {
            seeds[row.status] = row.count;
        }

        const rawEntities = (this.db.prepare('SELECT COUNT(*) as count FROM raw_entities').get() as { count: number }).count;
        const runs = (this.db.prepare('SELECT COUNT(*) as count FROM runs').get() as { count: number }).count;
        const classifications = (this.db.prepare('SELECT COUNT(*) as count FROM classifications').get() as { count: number }).count;

        const tierRows = this.db.prepare('SELECT tier, COUNT(*) as count FROM scored_entities GROUP BY tier').all() as Array<{ tier: string; count: number }>;
        const tiers: Record<string, number> = {};
        for (const row of tierRows) {
            tiers[row.tier] = row.count;
        }

        return { seeds, rawEntities, classifications, scoredEntities: this.getScoredCount(), runs, tiers };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Execute a function within a transaction.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}
