/**
 * Secret Routes
 *
 * Write-only management of named secrets. Values go in, only names come out.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import * as secretsDb from '../db/secrets';
import { extractErrorMessage } from '../integrations/errors';
import logger from '../utils/logger';

const SecretBodySchema = z.object({
    value: z.string().min(1),
});

const SECRET_NAME = /^[A-Za-z0-9/_+=.@-]{1,256}$/;

export function createSecretsRouter(): Router {
    const router = Router();

    /**
     * GET /api/secrets
     */
    router.get('/', (_req: Request, res: Response): void => {
        try {
            res.json({ success: true, secrets: secretsDb.listSecrets() });
        } catch (error) {
            logger.error(`[SecretsAPI] Failed to list secrets: error="${extractErrorMessage(error)}"`);
            res.status(500).json({ success: false, error: { code: 'LIST_FAILED', message: 'Failed to list secrets' } });
        }
    });

    /**
     * PUT /api/secrets/:name
     * Body: { value: string }. A JSON secret is sent as its serialized string.
     */
    router.put('/:name', (req: Request, res: Response): void => {
        const { name } = req.params;
        if (!SECRET_NAME.test(name)) {
            res.status(400).json({ success: false, error: { code: 'INVALID_NAME', message: 'Invalid secret name' } });
            return;
        }

        const parsed = SecretBodySchema.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ success: false, error: { code: 'INVALID_BODY', message: 'Body must be { "value": "<non-empty string>" }' } });
            return;
        }

        try {
            secretsDb.putSecret(name, parsed.data.value);
            res.json({ success: true, name });
        } catch (error) {
            logger.error(`[SecretsAPI] Failed to store secret: name=${name} error="${extractErrorMessage(error)}"`);
            res.status(500).json({ success: false, error: { code: 'WRITE_FAILED', message: 'Failed to store secret' } });
        }
    });

    /**
     * DELETE /api/secrets/:name
     */
    router.delete('/:name', (req: Request, res: Response): void => {
        const { name } = req.params;
        try {
            if (!secretsDb.deleteSecret(name)) {
                res.status(404).json({ success: false, error: { code: 'NOT_FOUND', message: `No secret named "${name}"` } });
                return;
            }
            res.json({ success: true });
        } catch (error) {
            logger.error(`[SecretsAPI] Failed to delete secret: name=${name} error="${extractErrorMessage(error)}"`);
            res.status(500).json({ success: false, error: { code: 'DELETE_FAILED', message: 'Failed to delete secret' } });
        }
    });

    return router;
}
