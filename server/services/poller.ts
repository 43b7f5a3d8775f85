/**
 * Poller
 *
 * Executes one HTTP poll against a vendor status endpoint with retry and
 * backoff, authenticating with a freshly resolved credential.
 *
 * Contract:
 * - Never throws to the caller except for secret-store infrastructure
 *   failures (StoreUnavailable). Every other failure is a PollResult with
 *   ok=false and an errorKind.
 * - One shared attempt counter for retryable statuses, timeouts and
 *   connection errors. Attempts are strictly sequential.
 * - Each attempt is bounded by the config timeout (hard cutoff, the request
 *   is aborted). An aborted execution signal cancels the in-flight request
 *   and any backoff sleep.
 * - The credential and rendered auth header never reach logs or attempt
 *   records.
 *
 * @module server/services/poller
 */

import axios, { type AxiosRequestConfig } from 'axios';
import {
    classifyTransportError,
    extractErrorMessage,
    isRetryableTransportError,
    isSecretError,
    type PollErrorKind,
} from '../integrations/errors';
import logger from '../utils/logger';
import { redactHeaders, scrubSecrets } from '../utils/redact';
import type { SecretResolver } from './secretResolver';
import type { AppConfig, AttemptRecord, Credential, PollResult, RetryPolicy } from './types';

// ============================================================================
// TYPES
// ============================================================================

export interface ResolvedAuth {
    credential: Credential;
    /** "secret:<name>" or "env:API_KEY" */
    source: string;
}

export interface PollerOptions {
    secretResolver: SecretResolver;
    /** Body truncation limit in code points */
    maxBodyChars: number;
    /** Record per-attempt details in the result */
    returnDebug: boolean;
    /** Credential used when an app has no secretRef (local development) */
    envApiKey?: string | null;
    /** Resolves true after `ms`, or false early if `signal` aborts */
    sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
}

export interface PreparedRequest {
    method: AppConfig['method'];
    url: string;
    headers: Record<string, string>;
    data?: string;
    timeoutMs: number;
}

type AttemptOutcome =
    | { type: 'response'; status: number; body: string; contentType?: string }
    | { type: 'error'; kind: PollErrorKind; message: string };

// ============================================================================
// REQUEST BUILDING
// ============================================================================

/**
 * Append percent-encoded query parameters, extending an existing query string.
 */
export function buildRequestUrl(url: string, query: Readonly<Record<string, string>>): string {
    const qs = Object.entries(query)
        .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`)
        .join('&');
    if (!qs) return url;

    if (!url.includes('?')) {
        return `${url}?${qs}`;
    }
    const separator = url.endsWith('?') || url.endsWith('&') ? '' : '&';
    return `${url}${separator}${qs}`;
}

/**
 * Merge config headers with the auth header. A config header with the same
 * name (case-insensitive) is dropped so it can never replace the credential.
 */
export function mergeHeaders(
    configHeaders: Readonly<Record<string, string>>,
    authHeaderName: string,
    authValue: string | null
): { headers: Record<string, string>; dropped: string[] } {
    const headers: Record<string, string> = {};
    const dropped: string[] = [];
    const authLower = authHeaderName.toLowerCase();

    for (const [key, value] of Object.entries(configHeaders)) {
        if (authValue !== null && key.toLowerCase() === authLower) {
            dropped.push(key);
            continue;
        }
        headers[key] = value;
    }
    if (authValue !== null) {
        headers[authHeaderName] = authValue;
    }
    return { headers, dropped };
}

/**
 * Seconds-to-wait before the next attempt, after `attempt` failed.
 * linear: backoff * attempt, exponential: backoff ^ attempt.
 */
export function computeBackoffMs(policy: Pick<RetryPolicy, 'backoff' | 'strategy'>, attempt: number): number {
    const seconds = policy.strategy === 'exponential'
        ? Math.pow(policy.backoff, attempt)
        : policy.backoff * attempt;
    return Math.max(0, Math.round(seconds * 1000));
}

/**
 * Sleep that ends early when the signal aborts.
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return Promise.resolve(false);
    return new Promise(resolve => {
        const onAbort = () => {
            clearTimeout(timer);
            resolve(false);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve(true);
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Cut `text` to at most `maxChars` code points. A surrogate pair is never split.
 */
export function truncateBody(text: string, maxChars: number): { body: string; truncated: boolean } {
    if (text.length <= maxChars) return { body: text, truncated: false };
    const points = Array.from(text);
    if (points.length <= maxChars) return { body: text, truncated: false };
    return { body: points.slice(0, maxChars).join(''), truncated: true };
}

function toBodyText(data: unknown): string {
    if (typeof data === 'string') return data;
    if (data === null || data === undefined) return '';
    if (Buffer.isBuffer(data)) return data.toString('utf8');
    return JSON.stringify(data);
}

function headerValue(headers: unknown, name: string): string | undefined {
    if (typeof headers !== 'object' || headers === null) return undefined;
    for (const [key, value] of Object.entries(headers)) {
        if (key.toLowerCase() === name && value !== undefined && value !== null) {
            return String(value);
        }
    }
    return undefined;
}

// ============================================================================
// POLLER
// ============================================================================

export class Poller {
    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<boolean>;

    constructor(private readonly options: PollerOptions) {
        this.sleep = options.sleep ?? abortableSleep;
    }

    /**
     * Resolve the credential for `config` and execute the poll.
     * Secret problems become ok=false results; store outages propagate.
     */
    async poll(config: AppConfig, signal?: AbortSignal): Promise<PollResult> {
        let auth: ResolvedAuth | null;
        try {
            auth = await this.resolveAuth(config);
        } catch (error) {
            if (isSecretError(error)) {
                logger.warn(`[Poller] Credential unavailable: app=${config.appName} kind=${error.code} error="${error.message}"`);
                return {
                    ok: false,
                    body: '',
                    bodyTruncated: false,
                    elapsedMillis: 0,
                    attemptCount: 0,
                    ...(this.options.returnDebug ? { attempts: [] } : {}),
                    errorKind: error.code,
                    error: error.message,
                    authUsed: config.secretRef ? `secret:${config.secretRef.secretName}` : null,
                };
            }
            throw error;
        }
        return this.execute(config, auth, signal);
    }

    /**
     * Run the attempt loop with an already resolved credential.
     */
    async execute(config: AppConfig, auth: ResolvedAuth | null, signal?: AbortSignal): Promise<PollResult> {
        const request = this.prepareRequest(config, auth);
        const authValue = auth ? `${config.authPrefix}${auth.credential}` : null;
        const secrets = auth ? [authValue, auth.credential] : [];
        const retryOn = new Set(config.retryPolicy.retryOn);
        const { maxAttempts } = config.retryPolicy;
        const attempts: AttemptRecord[] = [];
        const startedAt = Date.now();

        logger.info(`[Poller] Prepared request: app=${config.appName} method=${request.method} url=${request.url}`, {
            headers: redactHeaders(request.headers, [config.authHeaderName]),
            timeout: config.timeout,
            authUsed: auth?.source ?? null,
            maxAttempts,
        });

        const finish = (fields: Omit<PollResult, 'elapsedMillis' | 'attemptCount' | 'attempts' | 'authUsed' | 'body' | 'bodyTruncated'> & { body?: string }, attemptCount: number): PollResult => {
            const { body, truncated } = truncateBody(fields.body ?? '', this.options.maxBodyChars);
            const result: PollResult = {
                ...fields,
                body,
                bodyTruncated: truncated,
                elapsedMillis: Date.now() - startedAt,
                attemptCount,
                authUsed: auth?.source ?? null,
            };
            if (this.options.returnDebug) {
                result.attempts = attempts;
            }
            return result;
        };

        for (let attempt = 1; ; attempt++) {
            if (signal?.aborted) {
                return finish({ ok: false, errorKind: 'Cancelled', error: 'Execution cancelled' }, attempt - 1);
            }

            const attemptStart = Date.now();
            const outcome = await this.attemptOnce(request, secrets, signal);
            const durationMillis = Date.now() - attemptStart;

            attempts.push({
                attempt,
                timestamp: new Date(attemptStart).toISOString(),
                durationMillis,
                ...(outcome.type === 'response' ? { status: outcome.status } : { error: outcome.message }),
            });

            if (outcome.type === 'response') {
                const { status } = outcome;
                const ok = status >= 200 && status < 300;
                logger.info(`[Poller] HTTP response received: app=${config.appName} attempt=${attempt} status=${status} duration=${durationMillis}ms`);

                if (!ok && retryOn.has(status) && attempt < maxAttempts) {
                    if (!(await this.backoff(config, attempt, signal))) {
                        return finish({ ok: false, statusCode: status, errorKind: 'Cancelled', error: 'Execution cancelled' }, attempt);
                    }
                    continue;
                }

                if (ok) {
                    return finish({ ok, statusCode: status, body: outcome.body, contentType: outcome.contentType }, attempt);
                }
                const errorKind: PollErrorKind = retryOn.has(status) ? 'TransientHttpError' : 'PermanentHttpError';
                logger.warn(`[Poller] Poll failed: app=${config.appName} status=${status} kind=${errorKind} attempts=${attempt}`);
                return finish({
                    ok: false,
                    statusCode: status,
                    body: outcome.body,
                    contentType: outcome.contentType,
                    errorKind,
                    error: `HTTP ${status} after ${attempt} attempt${attempt === 1 ? '' : 's'}`,
                }, attempt);
            }

            if (outcome.kind === 'Cancelled') {
                logger.info(`[Poller] Request cancelled: app=${config.appName} attempt=${attempt}`);
                return finish({ ok: false, errorKind: 'Cancelled', error: outcome.message }, attempt);
            }

            logger.error(`[Poller] HTTP request failed: app=${config.appName} attempt=${attempt} kind=${outcome.kind} error="${outcome.message}"`);

            if (isRetryableTransportError(outcome.kind) && attempt < maxAttempts) {
                if (!(await this.backoff(config, attempt, signal))) {
                    return finish({ ok: false, errorKind: 'Cancelled', error: 'Execution cancelled' }, attempt);
                }
                continue;
            }

            return finish({
                ok: false,
                errorKind: outcome.kind,
                error: `Poller failed after ${attempt} attempt${attempt === 1 ? '' : 's'}: ${outcome.message}`,
            }, attempt);
        }
    }

    private async resolveAuth(config: AppConfig): Promise<ResolvedAuth | null> {
        if (config.secretRef) {
            logger.info(`[Poller] Resolving credential: app=${config.appName} secret=${config.secretRef.secretName} jsonKey=${Boolean(config.secretRef.jsonKey)}`);
            const credential = await this.options.secretResolver.resolve(config.secretRef);
            return { credential, source: `secret:${config.secretRef.secretName}` };
        }
        if (this.options.envApiKey) {
            return { credential: this.options.envApiKey, source: 'env:API_KEY' };
        }
        return null;
    }

    private prepareRequest(config: AppConfig, auth: ResolvedAuth | null): PreparedRequest {
        const authValue = auth ? `${config.authPrefix}${auth.credential}` : null;
        const { headers, dropped } = mergeHeaders(config.headers, config.authHeaderName, authValue);
        for (const name of dropped) {
            logger.warn(`[Poller] Config header ignored, it would replace the auth header: app=${config.appName} header=${name}`);
        }

        return {
            method: config.method,
            url: buildRequestUrl(config.url, config.query),
            headers,
            ...(config.body !== undefined ? { data: config.body } : {}),
            timeoutMs: Math.round(config.timeout * 1000),
        };
    }

    /**
     * One request, cut off after `timeoutMs` even while the body is still
     * arriving. axios' own `timeout` only covers an idle socket.
     */
    private async attemptOnce(
        request: PreparedRequest,
        secrets: readonly (string | null)[],
        signal?: AbortSignal
    ): Promise<AttemptOutcome> {
        const controller = new AbortController();
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, request.timeoutMs);
        const onAbort = () => controller.abort();
        if (signal?.aborted) {
            controller.abort();
        } else {
            signal?.addEventListener('abort', onAbort, { once: true });
        }

        const axiosConfig: AxiosRequestConfig = {
            method: request.method,
            url: request.url,
            headers: request.headers,
            data: request.data,
            timeout: request.timeoutMs,
            signal: controller.signal,
            responseType: 'text',
            // Keep the raw body; normalizers parse it themselves
            transformResponse: [(data: unknown) => data],
            // Every status resolves; retry decisions happen here, not in axios
            validateStatus: () => true,
        };

        try {
            const response = await axios.request(axiosConfig);
            return {
                type: 'response',
                status: response.status,
                body: toBodyText(response.data),
                contentType: headerValue(response.headers, 'content-type'),
            };
        } catch (error) {
            if (timedOut) {
                return { type: 'error', kind: 'Timeout', message: `timeout of ${request.timeoutMs}ms exceeded` };
            }
            if (signal?.aborted) {
                return { type: 'error', kind: 'Cancelled', message: 'Execution cancelled' };
            }
            return {
                type: 'error',
                kind: classifyTransportError(error),
                message: scrubSecrets(extractErrorMessage(error), secrets),
            };
        } finally {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
        }
    }

    private async backoff(config: AppConfig, attempt: number, signal?: AbortSignal): Promise<boolean> {
        const delayMs = computeBackoffMs(config.retryPolicy, attempt);
        logger.debug(`[Poller] Backing off: app=${config.appName} attempt=${attempt} delay=${delayMs}ms`);
        return this.sleep(delayMs, signal);
    }
}

// ============================================================================
// WIRE PAYLOADS
// ============================================================================

/**
 * Poller invocation payload, as exposed in logs and the admin API.
 */
export function toPollerPayload(config: AppConfig) {
    return {
        request: {
            method: config.method,
            url: config.url,
            headers: redactHeaders({ ...config.headers }, [config.authHeaderName]),
            query: { ...config.query },
            timeout: config.timeout,
        },
        auth: {
            secretName: config.secretRef?.secretName ?? null,
            jsonKey: config.secretRef?.jsonKey ?? null,
            headerName: config.authHeaderName,
            prefix: config.authPrefix,
        },
        retry: {
            maxAttempts: config.retryPolicy.maxAttempts,
            backoff: config.retryPolicy.backoff,
            retryOn: [...config.retryPolicy.retryOn],
        },
    };
}

/**
 * Poller result payload: {ok, status, body, elapsedMillis, attempts?, error?}.
 */
export function toPollerResultPayload(result: PollResult) {
    return {
        ok: result.ok,
        status: result.statusCode ?? null,
        body: result.body,
        elapsedMillis: result.elapsedMillis,
        ...(result.attempts ? { attempts: result.attempts } : {}),
        ...(result.error ? { error: result.error } : {}),
    };
}
