/**
 * App Configs Database Layer
 *
 * Storage for per-application config items (the external item shape, kept
 * as JSON). Parsing into AppConfig happens in services/configStore so a
 * malformed item is reported as ConfigInvalid at execution time.
 *
 * @module server/db/appConfigs
 */

import { getDb } from '../database/db';
import logger from '../utils/logger';

// ============================================================================
// Type Definitions
// ============================================================================

interface AppConfigRow {
    app_name: string;
    item_json: string;
    created_at: number;
    updated_at: number | null;
}

/**
 * Stored config item with its raw (unparsed) JSON.
 */
export interface StoredConfigItem {
    appName: string;
    itemJson: string;
    createdAt: string;
    updatedAt: string | null;
}

function rowToItem(row: AppConfigRow): StoredConfigItem {
    return {
        appName: row.app_name,
        itemJson: row.item_json,
        createdAt: new Date(row.created_at * 1000).toISOString(),
        updatedAt: row.updated_at ? new Date(row.updated_at * 1000).toISOString() : null,
    };
}

// ============================================================================
// CRUD Operations
// ============================================================================

/**
 * Get the stored item for an app, or null if none exists.
 */
export function getConfigItem(appName: string): StoredConfigItem | null {
    const db = getDb();
    const row = db.prepare(`
        SELECT app_name, item_json, created_at, updated_at
        FROM app_configs
        WHERE app_name = ?
    `).get(appName) as AppConfigRow | undefined;

    return row ? rowToItem(row) : null;
}

/**
 * Get all stored items, ordered by app name.
 */
export function listConfigItems(): StoredConfigItem[] {
    const db = getDb();
    const rows = db.prepare(`
        SELECT app_name, item_json, created_at, updated_at
        FROM app_configs
        ORDER BY app_name
    `).all() as AppConfigRow[];

    return rows.map(rowToItem);
}

/**
 * Insert or replace the item for an app.
 */
export function putConfigItem(appName: string, item: Record<string, unknown>): StoredConfigItem {
    const db = getDb();
    const itemJson = JSON.stringify({ ...item, appName });

    db.prepare(`
        INSERT INTO app_configs (app_name, item_json)
        VALUES (?, ?)
        ON CONFLICT(app_name) DO UPDATE SET
            item_json = excluded.item_json,
            updated_at = strftime('%s', 'now')
    `).run(appName, itemJson);

    logger.info(`[AppConfigs] Saved: app=${appName}`);

    const saved = getConfigItem(appName);
    if (!saved) {
        throw new Error(`Config item for ${appName} was not persisted`);
    }
    return saved;
}

/**
 * Delete the item for an app.
 * @returns true if a row was removed
 */
export function deleteConfigItem(appName: string): boolean {
    const db = getDb();
    const result = db.prepare('DELETE FROM app_configs WHERE app_name = ?').run(appName);

    if (result.changes > 0) {
        logger.info(`[AppConfigs] Deleted: app=${appName}`);
        return true;
    }
    return false;
}
