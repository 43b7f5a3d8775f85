/**
 * Utility Tests - settings, redaction, encryption
 */

import { describe, it, expect, afterEach, vi } from 'vitest';

vi.mock('../utils/logger', () => ({
    default: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { decrypt, encrypt, validateEncryptionSetup } from '../utils/encryption';
import { REDACTED_SENTINEL, redactHeaders, scrubSecrets } from '../utils/redact';
import { loadSettings } from '../utils/settings';

afterEach(() => {
    vi.unstubAllEnvs();
});

describe('loadSettings', () => {
    it('applies defaults', () => {
        const settings = loadSettings({ DATA_DIR: '/tmp/poller' });

        expect(settings).toEqual({
            port: 3001,
            dataDir: '/tmp/poller',
            dbPath: '/tmp/poller/saas-poller.db',
            returnDebug: false,
            maxBodyChars: 240_000,
            defaultAuthHeader: 'Authorization',
            defaultAuthPrefix: 'Bearer ',
            envApiKey: null,
            failureMetricNamespace: 'Observability/Poller',
            metricNamespaces: {},
            executionTimeoutMs: 120_000,
            metricRetentionDays: 14,
            adminToken: null,
        });
    });

    it('reads overrides and per-target namespaces', () => {
        const settings = loadSettings({
            PORT: '8080',
            SAAS_POLLER_DB_PATH: '/var/lib/poller.db',
            RETURN_DEBUG: 'yes',
            MAX_BODY_CHARS: '1000',
            API_KEY_PREFIX: '',
            API_KEY: 'test-secret',
            EXECUTION_TIMEOUT_SECONDS: '30',
            METRIC_NAMESPACE_MICROSOFT365: 'Custom/M365',
            ADMIN_TOKEN: 'test-admin',
        });

        expect(settings.port).toBe(8080);
        expect(settings.dbPath).toBe('/var/lib/poller.db');
        expect(settings.returnDebug).toBe(true);
        expect(settings.maxBodyChars).toBe(1000);
        expect(settings.defaultAuthPrefix).toBe('');
        expect(settings.envApiKey).toBe('test-secret');
        expect(settings.executionTimeoutMs).toBe(30_000);
        expect(settings.metricNamespaces).toEqual({ microsoft365: 'Custom/M365' });
        expect(settings.adminToken).toBe('test-admin');
    });

    it('rejects invalid values', () => {
        expect(() => loadSettings({ PORT: 'abc', MAX_BODY_CHARS: '-5' }))
            .toThrow(/^Invalid environment configuration: PORT: .*; MAX_BODY_CHARS: /);
    });

    it('reads the debug flag case-insensitively and treats other values as off', () => {
        expect(loadSettings({ RETURN_DEBUG: 'TRUE' }).returnDebug).toBe(true);
        expect(loadSettings({ RETURN_DEBUG: ' Yes ' }).returnDebug).toBe(true);
        expect(loadSettings({ RETURN_DEBUG: '' }).returnDebug).toBe(false);
        expect(loadSettings({ RETURN_DEBUG: 'maybe' }).returnDebug).toBe(false);
    });
});

describe('redactHeaders', () => {
    it('redacts auth headers and extra names, case-insensitively', () => {
        expect(redactHeaders(
            { Authorization: 'Bearer test-secret', 'X-Token': 'tok', Accept: 'application/json' },
            ['x-token']
        )).toEqual({ Authorization: REDACTED_SENTINEL, 'X-Token': REDACTED_SENTINEL, Accept: 'application/json' });
    });
});

describe('scrubSecrets', () => {
    it('scrubs the longest secret first', () => {
        expect(scrubSecrets('header "Bearer abc123" and abc123 again', ['abc123', 'Bearer abc123', null, '']))
            .toBe('header "***" and *** again');
    });
});

describe('encryption', () => {
    it('round-trips with a valid key and produces a different ciphertext each time', () => {
        vi.stubEnv('NODE_ENV', 'production');
        vi.stubEnv('SECRET_ENCRYPTION_KEY', 'c'.repeat(64));

        const first = encrypt('test-secret');
        const second = encrypt('test-secret');

        expect(first).not.toBe(second);
        expect(decrypt(first)).toBe('test-secret');
    });

    it('stores plaintext in development', () => {
        vi.stubEnv('NODE_ENV', 'development');

        expect(encrypt('test-secret')).toBe('test-secret');
        expect(validateEncryptionSetup()).toBe(true);
    });

    it('validates the key outside development', () => {
        vi.stubEnv('NODE_ENV', 'production');
        vi.stubEnv('SECRET_ENCRYPTION_KEY', 'not-hex');
        expect(validateEncryptionSetup()).toBe(false);
        expect(() => encrypt('x')).toThrow('SECRET_ENCRYPTION_KEY must be 64 hex characters (got 7)');

        vi.stubEnv('SECRET_ENCRYPTION_KEY', 'd'.repeat(64));
        expect(validateEncryptionSetup()).toBe(true);
    });
});
