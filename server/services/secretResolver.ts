/**
 * Secret Resolver
 *
 * Fetches a named credential and optionally extracts one field from a
 * JSON-object secret. Resolution happens on every poll with no cache, so a
 * rotated credential takes effect on the next scheduled execution.
 *
 * Store read failures are infrastructure errors: they are retried a few
 * times and then propagate as StoreUnavailable. Missing or malformed
 * secrets are MonitorErrors with secret codes, which the poller turns into
 * a failed poll.
 *
 * @module server/services/secretResolver
 */

import * as secretsDb from '../db/secrets';
import { MonitorError, extractErrorMessage } from '../integrations/errors';
import logger from '../utils/logger';
import type { Credential, SecretRef, SecretStore } from './types';

// ============================================================================
// STORE
// ============================================================================

/**
 * Secret store backed by the encrypted `secrets` table.
 */
export class SqliteSecretStore implements SecretStore {
    async getSecretString(name: string): Promise<string | null> {
        return secretsDb.getSecretValue(name);
    }
}

// ============================================================================
// RESOLVER
// ============================================================================

export interface SecretResolverOptions {
    /** Store read attempts before giving up (default 3) */
    fetchAttempts?: number;
    /** Backoff base in seconds; waits base^attempt between reads (default 1.5) */
    fetchBackoff?: number;
    sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Extract `jsonKey` from a stored secret.
 * @throws MonitorError SecretFormatError | SecretFieldMissing
 */
export function extractSecretField(secretName: string, raw: string, jsonKey: string): Credential {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new MonitorError('SecretFormatError',
            `Secret "${secretName}" is not valid JSON but field "${jsonKey}" was requested`,
            { secretName, jsonKey });
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new MonitorError('SecretFormatError',
            `Secret "${secretName}" is not a JSON object but field "${jsonKey}" was requested`,
            { secretName, jsonKey });
    }

    if (!Object.prototype.hasOwnProperty.call(parsed, jsonKey)) {
        throw new MonitorError('SecretFieldMissing',
            `Secret "${secretName}" has no field "${jsonKey}"`,
            { secretName, jsonKey });
    }

    const value: unknown = Object.getOwnPropertyDescriptor(parsed, jsonKey)?.value;
    if (typeof value !== 'string') {
        throw new MonitorError('SecretFormatError',
            `Field "${jsonKey}" of secret "${secretName}" is not a string`,
            { secretName, jsonKey });
    }
    return value;
}

export class SecretResolver {
    private readonly fetchAttempts: number;
    private readonly fetchBackoff: number;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(
        private readonly store: SecretStore,
        options: SecretResolverOptions = {}
    ) {
        this.fetchAttempts = Math.max(1, options.fetchAttempts ?? 3);
        this.fetchBackoff = options.fetchBackoff ?? 1.5;
        this.sleep = options.sleep ?? defaultSleep;
    }

    /**
     * Resolve a secret reference into a credential.
     * @throws MonitorError SecretNotFound | SecretFieldMissing | SecretFormatError | StoreUnavailable
     */
    async resolve(ref: SecretRef): Promise<Credential> {
        const raw = await this.fetch(ref.secretName);

        if (raw === null) {
            throw new MonitorError('SecretNotFound', `Secret "${ref.secretName}" does not exist`, { secretName: ref.secretName });
        }

        if (!ref.jsonKey) {
            return raw;
        }
        return extractSecretField(ref.secretName, raw, ref.jsonKey);
    }

    private async fetch(secretName: string): Promise<string | null> {
        let lastError: unknown = null;

        for (let attempt = 1; attempt <= this.fetchAttempts; attempt++) {
            try {
                logger.debug(`[SecretResolver] Fetching secret: name=${secretName} attempt=${attempt}`);
                return await this.store.getSecretString(secretName);
            } catch (error) {
                lastError = error;
                logger.error(`[SecretResolver] Secret fetch failed: name=${secretName} attempt=${attempt} error="${extractErrorMessage(error)}"`);
                if (attempt < this.fetchAttempts) {
                    await this.sleep(Math.pow(this.fetchBackoff, attempt) * 1000);
                }
            }
        }

        throw new MonitorError('StoreUnavailable',
            `Secret store read failed for "${secretName}" after ${this.fetchAttempts} attempts: ${extractErrorMessage(lastError)}`,
            { secretName });
    }
}
