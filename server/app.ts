/**
 * Admin API application
 *
 * Built separately from the listener so tests can drive it with supertest.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { createRequireAdmin } from './middleware/auth';
import { standardRateLimit } from './middleware/rateLimit';
import { createAppsRouter } from './routes/apps';
import { createSecretsRouter } from './routes/secrets';
import { createSystemRouter } from './routes/system';
import type { Runtime } from './services/runtime';
import logger from './utils/logger';

export type AppDeps = Pick<Runtime, 'configStore' | 'scheduler' | 'failureSink'> & {
    adminToken: string | null;
};

interface ServerError extends Error {
    status?: number;
    type?: string;
}

export function createApp(deps: AppDeps): express.Express {
    const app = express();

    app.disable('x-powered-by');
    app.use(express.json({ limit: '1mb' }));

    // Health check endpoint
    app.get('/api/health', (_req: Request, res: Response) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    const requireAdmin = createRequireAdmin(deps.adminToken);
    app.use('/api', standardRateLimit, requireAdmin);

    // Routes
    app.use('/api/apps', createAppsRouter(deps));
    app.use('/api/secrets', createSecretsRouter());
    app.use('/api', createSystemRouter(deps));

    // 404 handler
    app.use((req: Request, res: Response) => {
        logger.warn(`[Router] 404 Not Found: path=${req.path} method=${req.method}`);
        res.status(404).json({
            success: false,
            error: {
                code: 'NOT_FOUND',
                message: 'Endpoint not found',
            },
        });
    });

    // Error handling middleware (malformed JSON bodies land here)
    app.use((err: ServerError, req: Request, res: Response, _next: NextFunction) => {
        const status = err.status ?? 500;
        if (status >= 500) {
            logger.error(`[Server] Error: path=${req.path} error="${err.message}"`);
        }
        res.status(status).json({
            success: false,
            error: {
                code: err.type === 'entity.parse.failed' ? 'INVALID_JSON' : 'INTERNAL_ERROR',
                message: status >= 500 ? 'An error occurred' : err.message,
            },
        });
    });

    return app;
}
