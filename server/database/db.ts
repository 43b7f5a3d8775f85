/**
 * SQLite Database Connection Module
 *
 * Provides a singleton connection to the service database.
 * Uses better-sqlite3 for synchronous SQLite operations; every read goes
 * through the one connection, so a config update is visible to the very
 * next execution.
 *
 * The connection is opened lazily on first getDb() so that importing a
 * table module never touches the filesystem.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import logger from '../utils/logger';
import { getSettings } from '../utils/settings';

// Database instance type
type DatabaseInstance = ReturnType<typeof Database>;

let _db: DatabaseInstance | null = null;

function openDatabase(dbPath: string): DatabaseInstance {
    const dbDir = path.dirname(dbPath);
    if (!fs.existsSync(dbDir)) {
        fs.mkdirSync(dbDir, { recursive: true });
    }

    const db = new Database(dbPath);

    // WAL allows the admin API to read while a poll writes metrics
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');

    logger.info(`[DB] Connected to SQLite database: ${dbPath}`);
    return db;
}

/**
 * Get the current database instance, opening it on first use.
 */
function getDb(): DatabaseInstance {
    if (!_db) {
        _db = openDatabase(getSettings().dbPath);
    }
    return _db;
}

/**
 * Close database connection.
 * Should only be called on graceful shutdown.
 */
function closeDatabase(): void {
    if (_db) {
        _db.close();
        _db = null;
        logger.info('[DB] Database connection closed');
    }
}

export type { DatabaseInstance };

export {
    getDb,
    closeDatabase
};
