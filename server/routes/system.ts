/**
 * System Routes
 *
 * Job statuses and the execution-fault log.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { extractErrorMessage } from '../integrations/errors';
import type { SqliteExecutionFailureSink } from '../services/executionFaults';
import { getJobStatuses } from '../services/jobScheduler';
import logger from '../utils/logger';

const FaultsQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(500).default(50),
    appName: z.string().min(1).optional(),
});

export interface SystemRouterDeps {
    failureSink: Pick<SqliteExecutionFailureSink, 'listRecent'>;
}

export function createSystemRouter({ failureSink }: SystemRouterDeps): Router {
    const router = Router();

    /**
     * GET /api/jobs
     */
    router.get('/jobs', (_req: Request, res: Response): void => {
        try {
            res.json({ success: true, jobs: getJobStatuses() });
        } catch (error) {
            logger.error(`[SystemAPI] Failed to get jobs: error="${extractErrorMessage(error)}"`);
            res.status(500).json({ success: false, error: { code: 'JOBS_FAILED', message: 'Failed to get job statuses' } });
        }
    });

    /**
     * GET /api/faults?limit=n&appName=x
     * Most recent execution faults, newest first.
     */
    router.get('/faults', (req: Request, res: Response): void => {
        const query = FaultsQuerySchema.safeParse(req.query);
        if (!query.success) {
            res.status(400).json({ success: false, error: { code: 'INVALID_QUERY', message: 'limit must be an integer between 1 and 500' } });
            return;
        }

        try {
            const faults = failureSink.listRecent(query.data.limit, query.data.appName);
            res.json({ success: true, faults });
        } catch (error) {
            logger.error(`[SystemAPI] Failed to read faults: error="${extractErrorMessage(error)}"`);
            res.status(500).json({ success: false, error: { code: 'FAULTS_FAILED', message: 'Failed to read execution faults' } });
        }
    });

    return router;
}
