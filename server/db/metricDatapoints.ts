/**
 * Metric Datapoints Database Functions
 *
 * Append-only log of emitted metric datapoints.
 * Used by the SQLite metrics sink and its retention job.
 *
 * @module server/db/metricDatapoints
 */

import { getDb } from '../database/db';

// ============================================================================
// TYPES
// ============================================================================

export interface MetricDatapointRow {
    id: number;
    namespace: string;
    metric_name: string;
    value: number;
    unit: string;
    dimensions_json: string;
    timestamp: number;
}

export interface MetricDatapointInsert {
    namespace: string;
    name: string;
    value: number;
    unit: string;
    dimensions: Readonly<Record<string, string>>;
    /** Epoch milliseconds */
    timestamp: number;
}

// ============================================================================
// INSERT
// ============================================================================

/**
 * Insert a batch of datapoints in one transaction.
 */
export function insertMany(points: readonly MetricDatapointInsert[]): void {
    if (points.length === 0) return;

    const db = getDb();
    const stmt = db.prepare(`
        INSERT INTO metric_datapoints (namespace, metric_name, value, unit, dimensions_json, timestamp)
        VALUES (?, ?, ?, ?, ?, ?)
    `);

    const insertAll = db.transaction((batch: readonly MetricDatapointInsert[]) => {
        for (const p of batch) {
            stmt.run(p.namespace, p.name, p.value, p.unit, JSON.stringify(p.dimensions), p.timestamp);
        }
    });

    insertAll(points);
}

// ============================================================================
// QUERY
// ============================================================================

/**
 * Most recent datapoints for a namespace, newest first.
 */
export function getRecent(namespace: string, limit: number): MetricDatapointRow[] {
    const db = getDb();
    return db.prepare(`
        SELECT id, namespace, metric_name, value, unit, dimensions_json, timestamp
        FROM metric_datapoints
        WHERE namespace = ?
        ORDER BY timestamp DESC, id DESC
        LIMIT ?
    `).all(namespace, limit) as MetricDatapointRow[];
}

// ============================================================================
// RETENTION
// ============================================================================

/**
 * Delete datapoints older than a cutoff.
 * @returns number of deleted rows
 */
export function deleteOlderThan(cutoffMs: number): number {
    const db = getDb();
    const result = db.prepare('DELETE FROM metric_datapoints WHERE timestamp < ?').run(cutoffMs);
    return result.changes;
}
