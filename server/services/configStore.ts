/**
 * Config Store Client
 *
 * Read-only accessor for per-application poll configuration.
 *
 * Items are stored in the external shape (secretName, jsonKey, authHeader,
 * retry:{...}) and parsed into AppConfig on every read. There is no cache:
 * an operator's update is visible to the very next execution.
 *
 * @module server/services/configStore
 */

import cron from 'node-cron';
import { z } from 'zod';
import * as appConfigsDb from '../db/appConfigs';
import { MonitorError, extractErrorMessage } from '../integrations/errors';
import logger from '../utils/logger';
import type { AppConfig, ConfigStoreClient } from './types';

// ============================================================================
// DEFAULTS
// ============================================================================

export interface ConfigDefaults {
    authHeaderName: string;
    authPrefix: string;
}

export const DEFAULT_RETRY_ON = [429, 500, 502, 503, 504] as const;
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BACKOFF_SECONDS = 1.5;
export const DEFAULT_TIMEOUT_SECONDS = 10;
export const DEFAULT_SCHEDULE = '*/5 * * * *';

// ============================================================================
// ITEM SCHEMA
// ============================================================================

const stringValue = z.union([z.string(), z.number(), z.boolean()]).transform(v => String(v));

const booleanValue = z.union([
    z.boolean(),
    z.enum(['true', 'false']).transform(v => v === 'true'),
]);

const RetrySchema = z.object({
    maxAttempts: z.coerce.number().int().min(1).default(DEFAULT_MAX_ATTEMPTS),
    backoff: z.coerce.number().min(0).default(DEFAULT_BACKOFF_SECONDS),
    retryOn: z.array(z.coerce.number().int().min(100).max(599)).default([...DEFAULT_RETRY_ON]),
    strategy: z.enum(['linear', 'exponential']).default('linear'),
});

/**
 * The stored config item, as operators write it.
 */
export const ConfigItemSchema = z.object({
    appName: z.string().min(1),
    method: z.string()
        .transform(m => m.toUpperCase())
        .pipe(z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD']))
        .default('GET'),
    url: z.string().url().refine(u => /^https?:\/\//i.test(u), 'url must be http(s)'),
    headers: z.record(stringValue).default({}),
    query: z.record(stringValue).default({}),
    body: z.string().optional(),
    timeout: z.coerce.number().positive().default(DEFAULT_TIMEOUT_SECONDS),
    secretName: z.string().min(1).optional(),
    jsonKey: z.string().min(1).optional(),
    authHeader: z.string().min(1).optional(),
    authPrefix: z.string().optional(),
    retry: RetrySchema.default({}),
    preprocessTarget: z.string().min(1),
    metricNamespace: z.string().min(1).optional(),
    schedule: z.string().refine(s => cron.validate(s), 'schedule must be a valid cron expression').default(DEFAULT_SCHEDULE),
    enabled: booleanValue.default(true),
});

export type ConfigItem = z.input<typeof ConfigItemSchema>;

// ============================================================================
// PARSING
// ============================================================================

/**
 * Parse a stored item into AppConfig.
 * @throws MonitorError ConfigInvalid listing every problem
 */
export function parseConfigItem(item: unknown, defaults: ConfigDefaults): AppConfig {
    const parsed = ConfigItemSchema.safeParse(item);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new MonitorError('ConfigInvalid', `Config item is invalid: ${issues}`);
    }
    const v = parsed.data;

    return {
        appName: v.appName,
        method: v.method,
        url: v.url,
        headers: v.headers,
        query: v.query,
        ...(v.body !== undefined ? { body: v.body } : {}),
        timeout: v.timeout,
        ...(v.secretName ? { secretRef: { secretName: v.secretName, ...(v.jsonKey ? { jsonKey: v.jsonKey } : {}) } } : {}),
        authHeaderName: v.authHeader ?? defaults.authHeaderName,
        authPrefix: v.authPrefix ?? defaults.authPrefix,
        retryPolicy: {
            maxAttempts: v.retry.maxAttempts,
            backoff: v.retry.backoff,
            retryOn: v.retry.retryOn,
            strategy: v.retry.strategy,
        },
        preprocessTarget: v.preprocessTarget,
        ...(v.metricNamespace ? { metricNamespace: v.metricNamespace } : {}),
        schedule: v.schedule,
        enabled: v.enabled,
    };
}

function parseItemJson(appName: string, itemJson: string, defaults: ConfigDefaults): AppConfig {
    let item: unknown;
    try {
        item = JSON.parse(itemJson);
    } catch (error) {
        throw new MonitorError('ConfigInvalid', `Config item for ${appName} is not valid JSON: ${extractErrorMessage(error)}`);
    }
    return parseConfigItem(item, defaults);
}

// ============================================================================
// SQLITE CLIENT
// ============================================================================

export interface ListedAppConfig {
    appName: string;
    config: AppConfig | null;
    error: string | null;
}

export class SqliteConfigStore implements ConfigStoreClient {
    constructor(private readonly defaults: ConfigDefaults) { }

    async resolve(appName: string): Promise<AppConfig> {
        let stored: appConfigsDb.StoredConfigItem | null;
        try {
            stored = appConfigsDb.getConfigItem(appName);
        } catch (error) {
            throw new MonitorError('StoreUnavailable', `Config store read failed: ${extractErrorMessage(error)}`, { appName });
        }

        if (!stored) {
            throw new MonitorError('ConfigNotFound', `No config item for app "${appName}"`, { appName });
        }

        return parseItemJson(appName, stored.itemJson, this.defaults);
    }

    /**
     * Validate and store a config item, keyed by its appName.
     * @throws MonitorError ConfigInvalid
     */
    put(item: Record<string, unknown>): AppConfig {
        const config = parseConfigItem(item, this.defaults);
        appConfigsDb.putConfigItem(config.appName, item);
        logger.info(`[ConfigStore] Config stored: app=${config.appName} target=${config.preprocessTarget}`);
        return config;
    }

    delete(appName: string): boolean {
        const deleted = appConfigsDb.deleteConfigItem(appName);
        if (deleted) {
            logger.info(`[ConfigStore] Config deleted: app=${appName}`);
        }
        return deleted;
    }

    /**
     * Every stored app with its parsed config, or the parse error.
     * Used by the scheduler and the admin API.
     */
    list(): ListedAppConfig[] {
        return appConfigsDb.listConfigItems().map(stored => {
            try {
                return { appName: stored.appName, config: parseItemJson(stored.appName, stored.itemJson, this.defaults), error: null };
            } catch (error) {
                logger.warn(`[ConfigStore] Unparseable config: app=${stored.appName} error="${extractErrorMessage(error)}"`);
                return { appName: stored.appName, config: null, error: extractErrorMessage(error) };
            }
        });
    }
}
