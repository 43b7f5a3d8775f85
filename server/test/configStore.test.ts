/**
 * Config Store Tests
 *
 * Parsing of stored config items and the SQLite-backed client, using an
 * in-memory database migrated to the current schema.
 */

import { describe, it, expect, beforeAll, beforeEach, vi } from 'vitest';
import Database from 'better-sqlite3';

const testDb = new Database(':memory:');

vi.mock('../database/db', () => ({
    getDb: () => testDb,
}));

vi.mock('../utils/logger', () => ({
    default: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { runMigrations } from '../database/migrator';
import { putConfigItem } from '../db/appConfigs';
import { MonitorError } from '../integrations/errors';
import { SqliteConfigStore, parseConfigItem } from '../services/configStore';

function errorCode(fn: () => unknown): string | null {
    try {
        fn();
    } catch (error) {
        return error instanceof MonitorError ? error.code : 'not-a-monitor-error';
    }
    return null;
}

const defaults = { authHeaderName: 'Authorization', authPrefix: 'Bearer ' };

const baseItem = {
    appName: 'm365',
    url: 'https://graph.example.com/v1.0/admin/serviceAnnouncement/healthOverviews',
    preprocessTarget: 'microsoft365',
};

describe('parseConfigItem', () => {
    it('applies defaults to a minimal item', () => {
        const config = parseConfigItem(baseItem, defaults);

        expect(config).toEqual({
            appName: 'm365',
            method: 'GET',
            url: baseItem.url,
            headers: {},
            query: {},
            timeout: 10,
            authHeaderName: 'Authorization',
            authPrefix: 'Bearer ',
            retryPolicy: { maxAttempts: 3, backoff: 1.5, retryOn: [429, 500, 502, 503, 504], strategy: 'linear' },
            preprocessTarget: 'microsoft365',
            schedule: '*/5 * * * *',
            enabled: true,
        });
    });

    it('maps external field names and coerces numeric strings', () => {
        const config = parseConfigItem({
            ...baseItem,
            method: 'post',
            timeout: '7.5',
            secretName: 'm365/graph',
            jsonKey: 'api_key',
            authHeader: 'X-Api-Key',
            authPrefix: '',
            headers: { Accept: 'application/json', 'X-Retries': 2 },
            query: { top: 50 },
            retry: { maxAttempts: '5', backoff: '2', retryOn: ['503', 429], strategy: 'exponential' },
            metricNamespace: 'Custom/M365',
            enabled: 'false',
        }, defaults);

        expect(config.method).toBe('POST');
        expect(config.timeout).toBe(7.5);
        expect(config.secretRef).toEqual({ secretName: 'm365/graph', jsonKey: 'api_key' });
        expect(config.authHeaderName).toBe('X-Api-Key');
        expect(config.authPrefix).toBe('');
        expect(config.headers).toEqual({ Accept: 'application/json', 'X-Retries': '2' });
        expect(config.query).toEqual({ top: '50' });
        expect(config.retryPolicy).toEqual({ maxAttempts: 5, backoff: 2, retryOn: [503, 429], strategy: 'exponential' });
        expect(config.metricNamespace).toBe('Custom/M365');
        expect(config.enabled).toBe(false);
    });

    it('rejects maxAttempts below 1', () => {
        expect(errorCode(() => parseConfigItem({ ...baseItem, retry: { maxAttempts: 0 } }, defaults))).toBe('ConfigInvalid');
    });

    it('rejects a non-numeric timeout', () => {
        expect(errorCode(() => parseConfigItem({ ...baseItem, timeout: 'soon' }, defaults))).toBe('ConfigInvalid');
    });

    it('rejects a missing preprocessTarget', () => {
        expect(errorCode(() => parseConfigItem({ appName: 'x', url: 'https://a.example.com' }, defaults))).toBe('ConfigInvalid');
    });

    it('rejects an invalid schedule', () => {
        expect(errorCode(() => parseConfigItem({ ...baseItem, schedule: 'every five minutes' }, defaults))).toBe('ConfigInvalid');
    });

    it('rejects a non-http url', () => {
        expect(errorCode(() => parseConfigItem({ ...baseItem, url: 'ftp://files.example.com' }, defaults))).toBe('ConfigInvalid');
    });
});

describe('SqliteConfigStore', () => {
    const store = new SqliteConfigStore(defaults);

    beforeAll(() => {
        runMigrations(testDb);
    });

    beforeEach(() => {
        testDb.exec('DELETE FROM app_configs');
    });

    it('resolves a stored item', async () => {
        putConfigItem('m365', baseItem);

        const config = await store.resolve('m365');

        expect(config.appName).toBe('m365');
        expect(config.preprocessTarget).toBe('microsoft365');
    });

    it('fails with ConfigNotFound for an unknown app', async () => {
        await expect(store.resolve('ghost')).rejects.toMatchObject({ code: 'ConfigNotFound' });
    });

    it('fails with ConfigInvalid for an unparseable item', async () => {
        testDb.prepare('INSERT INTO app_configs (app_name, item_json) VALUES (?, ?)').run('broken', '{not json');

        await expect(store.resolve('broken')).rejects.toMatchObject({ code: 'ConfigInvalid' });
    });

    it('sees an update on the very next read', async () => {
        putConfigItem('m365', baseItem);
        await store.resolve('m365');

        putConfigItem('m365', { ...baseItem, timeout: 3 });

        await expect(store.resolve('m365')).resolves.toMatchObject({ timeout: 3 });
    });

    it('put validates before storing', () => {
        expect(errorCode(() => store.put({ appName: 'bad', url: 'https://a.example.com' }))).toBe('ConfigInvalid');

        expect(store.list()).toEqual([]);
    });

    it('lists valid and invalid items', () => {
        store.put(baseItem);
        putConfigItem('zz-broken', { appName: 'zz-broken' });

        const listed = store.list();

        expect(listed.map(item => item.appName)).toEqual(['m365', 'zz-broken']);
        expect(listed[0].config?.preprocessTarget).toBe('microsoft365');
        expect(listed[1].config).toBeNull();
        expect(listed[1].error).toContain('Config item is invalid');
    });

    it('deletes items', () => {
        store.put(baseItem);

        expect(store.delete('m365')).toBe(true);
        expect(store.delete('m365')).toBe(false);
    });
});
