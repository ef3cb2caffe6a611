import { writeFileSync } from 'node:fs';
import { GemRadarDatabase } from '../storage/database.js';
import type { ScoredEntity } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

export type ExportFormat = 'json' | 'csv' | 'geojson';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'csv', 'geojson'];

// ─── Main Export Function ────────────────────────────────

/**
 * Export the scored table from a GemRadar database in rank order.
 * @returns Number of rows written
 */
export function exportScores(dbPath: string, outputPath: string, format: ExportFormat): number {
    const db = new GemRadarDatabase(dbPath);

    try {
        const rows = db.getScoredEntities();
        writeFileSync(outputPath, renderScores(rows, format), 'utf-8');
        getLogger().info({ format, outputPath, rows: rows.length }, 'Scores exported');
        return rows.length;
    } finally {
        db.close();
    }
}

/**
 * Render rows in the given format without touching the filesystem.
 */
export function renderScores(rows: readonly ScoredEntity[], format: ExportFormat): string {
    switch (format) {
        case 'json':
            return exportJson(rows);
        case 'csv':
            return exportCSV(rows);
        case 'geojson':
            return exportGeoJSON(rows);
        default:
            throw new Error(`Unsupported export format: ${String(format)}`);
    }
}

// ─── Format Implementations ─────────────────────────────

function exportJson(rows: readonly ScoredEntity[]): string {
    return JSON.stringify(rows, null, 2);
}

const CSV_COLUMNS = [
    'key',
    'name',
    'rating',
    'predicted_rating',
    'residual',
    'tier',
    'zone',
    'category',
    'review_count',
    'is_chain',
    'cluster_density',
    'lat',
    'lon',
    'caveats',
    'explanation',
] as const;

function quote(value: string): string {
    return `"${value.replace(/"/g, '""')}"`;
}

function exportCSV(rows: readonly ScoredEntity[]): string {
    let csv = CSV_COLUMNS.join(',') + '\n';
    for (const row of rows) {
        csv += [
            quote(row.key),
            quote(row.name),
            row.rating,
            row.predicted_rating,
            row.residual,
            row.tier,
            quote(row.zone),
            quote(row.category),
            row.review_count,
            row.is_chain ? 1 : 0,
            row.cluster_density,
            row.coordinates.lat,
            row.coordinates.lon,
            quote(row.caveats.join(';')),
            quote(row.explanation),
        ].join(',') + '\n';
    }
    return csv;
}

function exportGeoJSON(rows: readonly ScoredEntity[]): string {
    return JSON.stringify(
        {
            type: 'FeatureCollection',
            features: rows.map(({ coordinates, ...properties }, rank) => ({
                type: 'Feature',
                geometry: { type: 'Point', coordinates: [coordinates.lon, coordinates.lat] },
                properties: { rank: rank + 1, ...properties },
            })),
        },
        null,
        2
    );
}
