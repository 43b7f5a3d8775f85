import crypto from 'crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import logger from '../utils/logger';

/**
 * Admin Auth Middleware
 *
 * Every /api/* route except health requires `Authorization: Bearer <ADMIN_TOKEN>`.
 * Without ADMIN_TOKEN configured the admin API is disabled (503).
 */

function tokensMatch(given: string, expected: string): boolean {
    const a = crypto.createHash('sha256').update(given).digest();
    const b = crypto.createHash('sha256').update(expected).digest();
    return crypto.timingSafeEqual(a, b);
}

export function createRequireAdmin(adminToken: string | null): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        if (!adminToken) {
            res.status(503).json({
                success: false,
                error: { code: 'ADMIN_DISABLED', message: 'Admin API is disabled: ADMIN_TOKEN is not set' },
            });
            return;
        }

        const header = req.headers.authorization ?? '';
        const match = /^Bearer\s+(.+)$/i.exec(header);
        if (!match || !tokensMatch(match[1].trim(), adminToken)) {
            logger.warn(`[Auth] Rejected admin request: method=${req.method} path=${req.path} ip=${req.ip ?? 'unknown'}`);
            res.status(401).json({
                success: false,
                error: { code: 'UNAUTHORIZED', message: 'Missing or invalid admin token' },
            });
            return;
        }

        next();
    };
}
