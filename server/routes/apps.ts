/**
 * App Config Routes
 *
 * CRUD for per-application config items, plus manual runs.
 * Every write resyncs the poll scheduler.
 */

import { Router, type Request, type Response } from 'express';
import * as appConfigsDb from '../db/appConfigs';
import { MonitorError, extractErrorMessage } from '../integrations/errors';
import { runRateLimit } from '../middleware/rateLimit';
import type { SqliteConfigStore } from '../services/configStore';
import { toPollerPayload } from '../services/poller';
import type { PollScheduler } from '../services/pollScheduler';
import type { AppConfig } from '../services/types';
import { summarizeOutcome } from '../services/workflow/states';
import logger from '../utils/logger';

export interface AppsRouterDeps {
    configStore: SqliteConfigStore;
    scheduler: PollScheduler;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(config: AppConfig) {
    return {
        appName: config.appName,
        preprocessTarget: config.preprocessTarget,
        metricNamespace: config.metricNamespace ?? null,
        schedule: config.schedule,
        enabled: config.enabled,
        poller: toPollerPayload(config),
    };
}

export function createAppsRouter({ configStore, scheduler }: AppsRouterDeps): Router {
    const router = Router();

    /**
     * GET /api/apps
     * All stored apps; unparseable items are listed with their error.
     */
    router.get('/', (_req: Request, res: Response): void => {
        try {
            const scheduled = new Set(scheduler.scheduledApps());
            const apps = configStore.list().map(({ appName, config, error }) => ({
                appName,
                valid: config !== null,
                scheduled: scheduled.has(appName),
                ...(config ? describe(config) : {}),
                error,
            }));
            res.json({ success: true, apps });
        } catch (error) {
            logger.error(`[AppsAPI] Failed to list apps: error="${extractErrorMessage(error)}"`);
            res.status(500).json({ success: false, error: { code: 'LIST_FAILED', message: 'Failed to list apps' } });
        }
    });

    /**
     * GET /api/apps/:appName
     * The stored item as written, plus its parsed form.
     */
    router.get('/:appName', (req: Request, res: Response): void => {
        const { appName } = req.params;
        try {
            const stored = appConfigsDb.getConfigItem(appName);
            if (!stored) {
                res.status(404).json({ success: false, error: { code: 'NOT_FOUND', message: `No config for app "${appName}"` } });
                return;
            }
            const listed = configStore.list().find(item => item.appName === appName);
            const item: unknown = JSON.parse(stored.itemJson);
            res.json({
                success: true,
                item,
                config: listed?.config ? describe(listed.config) : null,
                error: listed?.error ?? null,
                createdAt: stored.createdAt,
                updatedAt: stored.updatedAt,
            });
        } catch (error) {
            logger.error(`[AppsAPI] Failed to get app: app=${appName} error="${extractErrorMessage(error)}"`);
            res.status(500).json({ success: false, error: { code: 'READ_FAILED', message: 'Failed to read app config' } });
        }
    });

    /**
     * PUT /api/apps/:appName
     * Create or replace a config item. The path name wins over the body's.
     */
    router.put('/:appName', (req: Request, res: Response): void => {
        const { appName } = req.params;
        const body: unknown = req.body;

        if (!isPlainObject(body)) {
            res.status(400).json({ success: false, error: { code: 'INVALID_BODY', message: 'Body must be a JSON object' } });
            return;
        }
        if (body.appName !== undefined && body.appName !== appName) {
            res.status(400).json({ success: false, error: { code: 'NAME_MISMATCH', message: `Body appName does not match "${appName}"` } });
            return;
        }

        try {
            const config = configStore.put({ ...body, appName });
            scheduler.sync();
            res.json({ success: true, config: describe(config) });
        } catch (error) {
            if (error instanceof MonitorError && error.code === 'ConfigInvalid') {
                res.status(400).json({ success: false, error: { code: error.code, message: error.message } });
                return;
            }
            logger.error(`[AppsAPI] Failed to store app: app=${appName} error="${extractErrorMessage(error)}"`);
            res.status(500).json({ success: false, error: { code: 'WRITE_FAILED', message: 'Failed to store app config' } });
        }
    });

    /**
     * DELETE /api/apps/:appName
     */
    router.delete('/:appName', (req: Request, res: Response): void => {
        const { appName } = req.params;
        try {
            if (!configStore.delete(appName)) {
                res.status(404).json({ success: false, error: { code: 'NOT_FOUND', message: `No config for app "${appName}"` } });
                return;
            }
            scheduler.sync();
            res.json({ success: true });
        } catch (error) {
            logger.error(`[AppsAPI] Failed to delete app: app=${appName} error="${extractErrorMessage(error)}"`);
            res.status(500).json({ success: false, error: { code: 'DELETE_FAILED', message: 'Failed to delete app config' } });
        }
    });

    /**
     * POST /api/apps/:appName/run
     * Run one execution now and return its outcome.
     */
    router.post('/:appName/run', runRateLimit, async (req: Request, res: Response): Promise<void> => {
        const { appName } = req.params;
        try {
            const outcome = await scheduler.runApp(appName);
            res.json({ success: true, outcome: summarizeOutcome(outcome) });
        } catch (error) {
            logger.error(`[AppsAPI] Manual run failed: app=${appName} error="${extractErrorMessage(error)}"`);
            res.status(500).json({ success: false, error: { code: 'RUN_FAILED', message: 'Execution failed to run' } });
        }
    });

    return router;
}
