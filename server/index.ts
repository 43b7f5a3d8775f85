/**
 * SaaS Health Poller - Server Entry Point
 *
 * Migrates the database, starts the poll scheduler and serves the admin API.
 */

// Load environment variables from .env file (development only)
import 'dotenv/config';

import { createServer } from 'http';
import { createApp } from './app';
import { closeDatabase, getDb } from './database/db';
import { runMigrations } from './database/migrator';
import { extractErrorMessage } from './integrations/errors';
import { plugins } from './integrations/registry';
import { shutdownAllJobs } from './services/jobScheduler';
import { createRuntime } from './services/runtime';
import { validateEncryptionSetup } from './utils/encryption';
import logger from './utils/logger';
import { getSettings } from './utils/settings';

const NODE_ENV = process.env.NODE_ENV || 'development';

function main(): void {
    const settings = getSettings();
    logger.startup('SaaS Health Poller', { env: NODE_ENV, port: settings.port, db: settings.dbPath });

    // Fail early if secrets cannot be encrypted
    if (!validateEncryptionSetup()) {
        throw new Error('SECRET_ENCRYPTION_KEY must be set to 64 hex characters (generate one with: openssl rand -hex 32)');
    }

    const result = runMigrations(getDb());
    if (!result.success) {
        throw new Error(`Migration failed: ${result.error}`);
    }
    logger.info(`[Startup] Database ready (v${result.migratedTo})`);

    const runtime = createRuntime(settings);
    const synced = runtime.scheduler.start();
    logger.info(`[Startup] Poll scheduler started: apps=${synced.added.length} normalizers=${plugins.map(p => p.id).join(',')}`);

    if (!settings.adminToken) {
        logger.warn('[Startup] ADMIN_TOKEN is not set, the admin API will reject every request');
    }

    const httpServer = createServer(createApp({ ...runtime, adminToken: settings.adminToken }));
    httpServer.listen(settings.port, () => {
        logger.info(`[Server] Listening on port ${settings.port}`);
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
        logger.info(`${signal} received, shutting down gracefully`);
        runtime.scheduler.stop();
        shutdownAllJobs();
        httpServer.close(() => {
            closeDatabase();
            process.exit(0);
        });
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
    main();
} catch (error) {
    logger.error(`[Startup] Failed to start server: error="${extractErrorMessage(error)}"`);
    process.exit(1);
}
