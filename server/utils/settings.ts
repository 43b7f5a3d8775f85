/**
 * Runtime Settings
 *
 * Environment-driven configuration knobs, validated once with zod.
 * Invalid values fail fast at startup instead of surfacing mid-execution.
 *
 * Per-preprocessor metric namespaces are read from any variable named
 * METRIC_NAMESPACE_<TARGET> (e.g. METRIC_NAMESPACE_MICROSOFT365) and keyed
 * by the lower-cased target id.
 *
 * @module server/utils/settings
 */

import path from 'path';
import { z } from 'zod';

// Case-insensitive; anything but true/1/yes (including an empty value) is false
const booleanFlag = z
    .string()
    .optional()
    .transform(v => ['true', '1', 'yes'].includes((v ?? '').trim().toLowerCase()));

const SettingsSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3001),
    DATA_DIR: z.string().min(1).optional(),
    SAAS_POLLER_DB_PATH: z.string().min(1).optional(),
    RETURN_DEBUG: booleanFlag,
    MAX_BODY_CHARS: z.coerce.number().int().positive().default(240_000),
    API_KEY_HEADER: z.string().min(1).default('Authorization'),
    API_KEY_PREFIX: z.string().default('Bearer '),
    API_KEY: z.string().min(1).optional(),
    FAILURE_METRIC_NAMESPACE: z.string().min(1).default('Observability/Poller'),
    EXECUTION_TIMEOUT_SECONDS: z.coerce.number().positive().default(120),
    METRIC_RETENTION_DAYS: z.coerce.number().int().positive().default(14),
    ADMIN_TOKEN: z.string().min(1).optional(),
});

export interface Settings {
    port: number;
    dataDir: string;
    dbPath: string;
    returnDebug: boolean;
    maxBodyChars: number;
    defaultAuthHeader: string;
    defaultAuthPrefix: string;
    /** Local-development credential used when an app has no secret configured */
    envApiKey: string | null;
    failureMetricNamespace: string;
    /** Namespace overrides keyed by lower-case preprocess target */
    metricNamespaces: Record<string, string>;
    executionTimeoutMs: number;
    metricRetentionDays: number;
    adminToken: string | null;
}

const NAMESPACE_PREFIX = 'METRIC_NAMESPACE_';

/**
 * Parse settings from an environment map.
 * @throws Error listing every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const parsed = SettingsSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid environment configuration: ${issues}`);
    }
    const values = parsed.data;

    const metricNamespaces: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (key.startsWith(NAMESPACE_PREFIX) && value) {
            metricNamespaces[key.slice(NAMESPACE_PREFIX.length).toLowerCase()] = value;
        }
    }

    const dataDir = values.DATA_DIR ?? path.join(__dirname, '..', '..', 'data');

    return {
        port: values.PORT,
        dataDir,
        dbPath: values.SAAS_POLLER_DB_PATH ?? path.join(dataDir, 'saas-poller.db'),
        returnDebug: values.RETURN_DEBUG,
        maxBodyChars: values.MAX_BODY_CHARS,
        defaultAuthHeader: values.API_KEY_HEADER,
        defaultAuthPrefix: values.API_KEY_PREFIX,
        envApiKey: values.API_KEY ?? null,
        failureMetricNamespace: values.FAILURE_METRIC_NAMESPACE,
        metricNamespaces,
        executionTimeoutMs: values.EXECUTION_TIMEOUT_SECONDS * 1000,
        metricRetentionDays: values.METRIC_RETENTION_DAYS,
        adminToken: values.ADMIN_TOKEN ?? null,
    };
}

let cachedSettings: Settings | null = null;

/**
 * Settings for the running process (parsed on first use).
 */
export function getSettings(): Settings {
    if (!cachedSettings) {
        cachedSettings = loadSettings();
    }
    return cachedSettings;
}
