/**
 * Polling Workflow - Shared Types
 *
 * Data model for the polling workflow and the narrow interfaces of its
 * collaborators (config store, secret store, metrics sink, failure sink).
 * Every collaborator has a SQLite implementation under services/ and an
 * in-memory fake in the tests.
 *
 * @module server/services/types
 */

import type { PollErrorKind, MonitorErrorCode } from '../integrations/errors';

// ============================================================================
// CONFIGURATION
// ============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD';

export type BackoffStrategy = 'linear' | 'exponential';

export interface RetryPolicy {
    /** Total attempts including the first (≥ 1) */
    maxAttempts: number;
    /** Backoff factor in seconds (≥ 0) */
    backoff: number;
    /** HTTP statuses that trigger a retry */
    retryOn: readonly number[];
    /** linear: backoff * attempt; exponential: backoff ^ attempt */
    strategy: BackoffStrategy;
}

export interface SecretRef {
    secretName: string;
    /** Field to extract when the secret is a JSON object */
    jsonKey?: string;
}

/**
 * Per-application poll configuration, read fresh for every execution.
 */
export interface AppConfig {
    appName: string;
    method: HttpMethod;
    url: string;
    headers: Readonly<Record<string, string>>;
    query: Readonly<Record<string, string>>;
    body?: string;
    /** Per-attempt timeout in seconds */
    timeout: number;
    secretRef?: SecretRef;
    authHeaderName: string;
    authPrefix: string;
    retryPolicy: RetryPolicy;
    preprocessTarget: string;
    metricNamespace?: string;
    /** Cron expression for the trigger source */
    schedule: string;
    enabled: boolean;
}

/** Resolved secret value. Never logged, echoed or persisted. */
export type Credential = string;

// ============================================================================
// POLL RESULT
// ============================================================================

/**
 * One HTTP attempt, recorded only when debug output is enabled.
 * Carries no header values and no credential.
 */
export interface AttemptRecord {
    attempt: number;
    /** ISO timestamp of the attempt start */
    timestamp: string;
    durationMillis: number;
    status?: number;
    error?: string;
}

export interface PollResult {
    ok: boolean;
    statusCode?: number;
    body: string;
    bodyTruncated: boolean;
    contentType?: string;
    elapsedMillis: number;
    attemptCount: number;
    /** Present only in debug mode */
    attempts?: AttemptRecord[];
    errorKind?: PollErrorKind;
    /** Sanitized description of the failure */
    error?: string;
    /** Where the credential came from: "secret:<name>", "env:API_KEY" or null */
    authUsed: string | null;
}

// ============================================================================
// METRICS
// ============================================================================

export type MetricUnit = 'Count' | 'Percent' | 'None';

export interface Metric {
    namespace: string;
    name: string;
    value: number;
    unit: MetricUnit;
    dimensions: Readonly<Record<string, string>>;
    timestamp: Date;
}

// ============================================================================
// EXECUTION FAULTS
// ============================================================================

/**
 * An execution-level failure: the monitor itself broke, as opposed to the
 * monitored SaaS failing a poll.
 */
export interface ExecutionFault {
    executionId: string;
    appName: string;
    /** Workflow state that faulted */
    state: string;
    code: MonitorErrorCode;
    message: string;
    occurredAt: Date;
}

// ============================================================================
// COLLABORATOR INTERFACES
// ============================================================================

export interface ConfigStoreClient {
    /**
     * @throws MonitorError ConfigNotFound | ConfigInvalid | StoreUnavailable
     */
    resolve(appName: string): Promise<AppConfig>;
}

/**
 * Raw secret storage. Returns the stored string, or null for an unknown name.
 */
export interface SecretStore {
    getSecretString(name: string): Promise<string | null>;
}

export interface MetricsSink {
    emit(metrics: readonly Metric[]): Promise<void>;
}

export interface ExecutionFailureSink {
    raise(fault: ExecutionFault): Promise<void>;
}
