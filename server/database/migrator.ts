/**
 * Database Migration System
 *
 * Handles automatic schema migrations on startup.
 * Uses PRAGMA user_version for version tracking.
 *
 * Features:
 * - Forward-only migrations
 * - Downgrade detection (database newer than this build)
 * - Transaction-wrapped migrations, one transaction per version
 */

import logger from '../utils/logger';
import { extractErrorMessage } from '../integrations/errors';
import { getDb, type DatabaseInstance } from './db';
import { migrations as registeredMigrations, type Migration } from './migrations';

// Migration status result
export interface MigrationStatus {
    needsMigration: boolean;
    isDowngrade: boolean;
    currentVersion: number;
    expectedVersion: number;
}

// Migration run result
export interface MigrationResult {
    success: boolean;
    migratedFrom?: number;
    migratedTo?: number;
    error?: string;
}

/**
 * Get current schema version from database
 */
export function getCurrentVersion(db: DatabaseInstance): number {
    const result = db.pragma('user_version', { simple: true });
    return typeof result === 'number' ? result : 0;
}

/**
 * Set schema version in database
 */
export function setVersion(db: DatabaseInstance, version: number): void {
    db.pragma(`user_version = ${Math.trunc(version)}`);
}

/**
 * Get expected schema version (highest migration available)
 */
export function getExpectedVersion(migrations: readonly Migration[] = registeredMigrations): number {
    return migrations.reduce((max, m) => Math.max(max, m.version), 0);
}

/**
 * Compare the database version with the migrations shipped in this build.
 */
export function checkMigrationStatus(
    db: DatabaseInstance = getDb(),
    migrations: readonly Migration[] = registeredMigrations
): MigrationStatus {
    const currentVersion = getCurrentVersion(db);
    const expectedVersion = getExpectedVersion(migrations);

    return {
        needsMigration: currentVersion < expectedVersion,
        isDowngrade: currentVersion > expectedVersion,
        currentVersion,
        expectedVersion,
    };
}

/**
 * Run all pending migrations.
 * Each migration and its version bump commit together; a failure leaves the
 * database at the last successful version.
 */
export function runMigrations(
    db: DatabaseInstance = getDb(),
    migrations: readonly Migration[] = registeredMigrations
): MigrationResult {
    const status = checkMigrationStatus(db, migrations);

    if (status.isDowngrade) {
        const message = `Database schema v${status.currentVersion} is newer than this build (v${status.expectedVersion}). Upgrade the service or restore a backup.`;
        logger.error(`[Migrator] ${message}`);
        return { success: false, error: message };
    }

    if (!status.needsMigration) {
        logger.debug(`[Migrator] Database at version ${status.currentVersion}, no migration needed`);
        return { success: true, migratedFrom: status.currentVersion, migratedTo: status.currentVersion };
    }

    const pending = [...migrations]
        .filter(m => m.version > status.currentVersion)
        .sort((a, b) => a.version - b.version);

    logger.info(`[Migrator] Running ${pending.length} migrations (v${status.currentVersion} → v${status.expectedVersion})`);

    let lastSuccessfulVersion = status.currentVersion;
    try {
        for (const migration of pending) {
            logger.debug(`[Migrator] Running migration ${migration.version}: ${migration.name}`);
            const apply = db.transaction(() => {
                migration.up(db);
                setVersion(db, migration.version);
            });
            apply();
            lastSuccessfulVersion = migration.version;
        }
    } catch (error) {
        const message = extractErrorMessage(error);
        logger.error(`[Migrator] Migration failed at v${lastSuccessfulVersion + 1}: error="${message}"`);
        return { success: false, migratedFrom: status.currentVersion, migratedTo: lastSuccessfulVersion, error: message };
    }

    logger.info(`[Migrator] All migrations complete (v${status.currentVersion} → v${lastSuccessfulVersion})`);
    return { success: true, migratedFrom: status.currentVersion, migratedTo: lastSuccessfulVersion };
}
