/**
 * Integration Utilities
 *
 * Shared helpers for vendor normalizers.
 *
 * @module server/integrations/utils
 */

import type { z } from 'zod';
import { MonitorError, extractErrorMessage } from './errors';

/**
 * Parse a JSON body and validate it against a vendor schema.
 *
 * @throws MonitorError PreprocessParseError naming the vendor and the first
 *         few schema issues
 */
export function parseVendorBody<T extends z.ZodTypeAny>(vendor: string, body: string, schema: T): z.output<T> {
    let json: unknown;
    try {
        json = JSON.parse(body);
    } catch (error) {
        throw new MonitorError('PreprocessParseError',
            `${vendor} response is not valid JSON: ${extractErrorMessage(error)}`,
            { vendor });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .slice(0, 3)
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new MonitorError('PreprocessParseError',
            `${vendor} response does not match the expected schema: ${issues}`,
            { vendor });
    }
    return parsed.data;
}

/**
 * Normalize a vendor status label for lookup: drop whitespace, lower-case.
 */
export function normalizeStatusKey(raw: string | null | undefined): string {
    return (raw ?? '').replace(/\s+/g, '').toLowerCase();
}
