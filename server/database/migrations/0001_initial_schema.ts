import type { Migration } from './types';

export const migration: Migration = {
    version: 1,
    name: 'initial_schema',
    up(db) {
        db.exec(`
            CREATE TABLE IF NOT EXISTS app_configs (
                app_name TEXT PRIMARY KEY,
                item_json TEXT NOT NULL,
                created_at INTEGER NOT NULL DEFAULT (strftime('%s', 'now')),
                updated_at INTEGER
            );

            CREATE TABLE IF NOT EXISTS secrets (
                name TEXT PRIMARY KEY,
                value_encrypted TEXT NOT NULL,
                created_at INTEGER NOT NULL DEFAULT (strftime('%s', 'now')),
                updated_at INTEGER
            );

            CREATE TABLE IF NOT EXISTS metric_datapoints (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                namespace TEXT NOT NULL,
                metric_name TEXT NOT NULL,
                value REAL NOT NULL,
                unit TEXT NOT NULL,
                dimensions_json TEXT NOT NULL,
                timestamp INTEGER NOT NULL
            );
            CREATE INDEX IF NOT EXISTS idx_metric_datapoints_lookup
                ON metric_datapoints(namespace, metric_name, timestamp);

            CREATE TABLE IF NOT EXISTS execution_faults (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                execution_id TEXT NOT NULL,
                app_name TEXT NOT NULL,
                state TEXT NOT NULL,
                code TEXT NOT NULL,
                message TEXT NOT NULL,
                occurred_at INTEGER NOT NULL
            );
            CREATE INDEX IF NOT EXISTS idx_execution_faults_app
                ON execution_faults(app_name, occurred_at);
        `);
    },
};
