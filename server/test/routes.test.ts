/**
 * Admin API Tests
 *
 * Drives the express app through supertest against an in-memory database.
 * Cron is mocked and the orchestrator is a stub, so nothing polls.
 */

import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import request from 'supertest';

// ============================================================================
// Mocks
// ============================================================================

const testDb = new Database(':memory:');

vi.mock('../database/db', () => ({
    getDb: () => testDb,
}));

vi.mock('node-cron', () => ({
    default: {
        validate: (expression: string) => expression.trim().split(/\s+/).length === 5,
        schedule: () => ({ stop: () => { } }),
    },
}));

vi.mock('../utils/logger', () => ({
    default: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { createApp } from '../app';
import { runMigrations } from '../database/migrator';
import { SqliteConfigStore } from '../services/configStore';
import { SqliteExecutionFailureSink } from '../services/executionFaults';
import { shutdownAllJobs } from '../services/jobScheduler';
import { PollScheduler } from '../services/pollScheduler';
import type { ExecutionOutcome } from '../services/workflow/states';

// ============================================================================
// App Setup
// ============================================================================

const ADMIN_TOKEN = 'test-admin';
const auth = { Authorization: `Bearer ${ADMIN_TOKEN}` };

const m365Item = {
    url: 'https://graph.example.com/v1.0/admin/serviceAnnouncement/healthOverviews',
    preprocessTarget: 'microsoft365',
    headers: { Authorization: 'Bearer test-secret', Accept: 'application/json' },
};

function createTestApp(adminToken: string | null = ADMIN_TOKEN) {
    const configStore = new SqliteConfigStore({ authHeaderName: 'Authorization', authPrefix: 'Bearer ' });
    const failureSink = new SqliteExecutionFailureSink();
    const scheduler = new PollScheduler({
        orchestrator: {
            execute: async ({ appName }): Promise<ExecutionOutcome> => ({
                kind: 'cancelled',
                executionId: 'exec-1',
                appName,
                context: { executionId: 'exec-1', appName },
                state: 'Poll',
            }),
        },
        listApps: () => configStore.list(),
        executionTimeoutMs: 1000,
        metricRetentionDays: 14,
    });
    return { app: createApp({ configStore, failureSink, scheduler, adminToken }), failureSink, scheduler };
}

beforeAll(() => {
    runMigrations(testDb);
});

beforeEach(() => {
    testDb.exec('DELETE FROM app_configs; DELETE FROM secrets; DELETE FROM execution_faults;');
    vi.stubEnv('NODE_ENV', 'production');
    vi.stubEnv('SECRET_ENCRYPTION_KEY', 'e'.repeat(64));
});

afterEach(() => {
    shutdownAllJobs();
    vi.unstubAllEnvs();
});

// ============================================================================
// Auth
// ============================================================================

describe('admin auth', () => {
    it('serves health without a token', async () => {
        const res = await request(createTestApp().app).get('/api/health');

        expect(res.status).toBe(200);
        expect(res.body.status).toBe('ok');
    });

    it('rejects a missing or wrong token', async () => {
        const { app } = createTestApp();

        const missing = await request(app).get('/api/apps');
        const wrong = await request(app).get('/api/apps').set('Authorization', 'Bearer nope');

        expect(missing.status).toBe(401);
        expect(wrong.status).toBe(401);
        expect(wrong.body).toEqual({ success: false, error: { code: 'UNAUTHORIZED', message: 'Missing or invalid admin token' } });
    });

    it('disables the admin API when no token is configured', async () => {
        const res = await request(createTestApp(null).app).get('/api/apps').set('Authorization', 'Bearer anything');

        expect(res.status).toBe(503);
        expect(res.body.error.code).toBe('ADMIN_DISABLED');
    });

    it('answers unknown endpoints with a JSON 404', async () => {
        const res = await request(createTestApp().app).get('/api/nothing-here').set(auth);

        expect(res.status).toBe(404);
        expect(res.body.error.code).toBe('NOT_FOUND');
    });
});

// ============================================================================
// Apps
// ============================================================================

describe('/api/apps', () => {
    it('stores a config item, schedules it and redacts auth headers', async () => {
        const { app, scheduler } = createTestApp();

        const put = await request(app).put('/api/apps/m365').set(auth).send(m365Item);

        expect(put.status).toBe(200);
        expect(put.body.config.appName).toBe('m365');
        expect(put.body.config.poller.request.headers).toEqual({ Authorization: '***', Accept: 'application/json' });
        expect(scheduler.scheduledApps()).toEqual(['m365']);

        const list = await request(app).get('/api/apps').set(auth);
        expect(list.body.apps).toHaveLength(1);
        expect(list.body.apps[0]).toMatchObject({ appName: 'm365', valid: true, scheduled: true, preprocessTarget: 'microsoft365', error: null });
    });

    it('returns the stored item and its parsed form', async () => {
        const { app } = createTestApp();
        await request(app).put('/api/apps/m365').set(auth).send(m365Item);

        const res = await request(app).get('/api/apps/m365').set(auth);

        expect(res.status).toBe(200);
        expect(res.body.item).toEqual({ ...m365Item, appName: 'm365' });
        expect(res.body.config.schedule).toBe('*/5 * * * *');
        expect(res.body.error).toBeNull();
    });

    it('404s an unknown app', async () => {
        const res = await request(createTestApp().app).get('/api/apps/ghost').set(auth);

        expect(res.status).toBe(404);
    });

    it('rejects an invalid item with ConfigInvalid', async () => {
        const res = await request(createTestApp().app).put('/api/apps/bad').set(auth).send({ url: 'https://a.example.com' });

        expect(res.status).toBe(400);
        expect(res.body.error.code).toBe('ConfigInvalid');
    });

    it('rejects a body naming a different app', async () => {
        const res = await request(createTestApp().app).put('/api/apps/m365').set(auth).send({ ...m365Item, appName: 'other' });

        expect(res.status).toBe(400);
        expect(res.body.error.code).toBe('NAME_MISMATCH');
    });

    it('rejects a non-object body', async () => {
        const res = await request(createTestApp().app).put('/api/apps/m365').set(auth).send([m365Item]);

        expect(res.status).toBe(400);
        expect(res.body.error.code).toBe('INVALID_BODY');
    });

    it('rejects malformed JSON', async () => {
        const res = await request(createTestApp().app)
            .put('/api/apps/m365')
            .set(auth)
            .set('Content-Type', 'application/json')
            .send('{"url": ');

        expect(res.status).toBe(400);
        expect(res.body.error.code).toBe('INVALID_JSON');
    });

    it('deletes an app and unschedules it', async () => {
        const { app, scheduler } = createTestApp();
        await request(app).put('/api/apps/m365').set(auth).send(m365Item);

        const first = await request(app).delete('/api/apps/m365').set(auth);
        const second = await request(app).delete('/api/apps/m365').set(auth);

        expect(first.status).toBe(200);
        expect(second.status).toBe(404);
        expect(scheduler.scheduledApps()).toEqual([]);
    });

    it('runs an execution on demand', async () => {
        const res = await request(createTestApp().app).post('/api/apps/m365/run').set(auth);

        expect(res.status).toBe(200);
        expect(res.body.outcome).toEqual({ kind: 'cancelled', executionId: 'exec-1', appName: 'm365', state: 'Poll' });
    });
});

// ============================================================================
// Secrets
// ============================================================================

describe('/api/secrets', () => {
    it('stores a secret and only ever lists its name', async () => {
        const { app } = createTestApp();

        const put = await request(app).put('/api/secrets/m365%2Fgraph').set(auth).send({ value: '{"api_key":"test-secret"}' });
        const list = await request(app).get('/api/secrets').set(auth);

        expect(put.body).toEqual({ success: true, name: 'm365/graph' });
        expect(list.body.secrets.map((s: { name: string }) => s.name)).toEqual(['m365/graph']);
        expect(JSON.stringify(list.body)).not.toContain('test-secret');
    });

    it('validates the body and the name', async () => {
        const { app } = createTestApp();

        const empty = await request(app).put('/api/secrets/token').set(auth).send({ value: '' });
        const badName = await request(app).put('/api/secrets/bad%20name').set(auth).send({ value: 'x' });

        expect(empty.body.error.code).toBe('INVALID_BODY');
        expect(badName.body.error.code).toBe('INVALID_NAME');
    });

    it('deletes secrets', async () => {
        const { app } = createTestApp();
        await request(app).put('/api/secrets/token').set(auth).send({ value: 'x' });

        expect((await request(app).delete('/api/secrets/token').set(auth)).status).toBe(200);
        expect((await request(app).delete('/api/secrets/token').set(auth)).status).toBe(404);
    });
});

// ============================================================================
// System
// ============================================================================

describe('system routes', () => {
    it('lists recent execution faults', async () => {
        const { app, failureSink } = createTestApp();
        await failureSink.raise({
            executionId: 'exec-9',
            appName: 'm365',
            state: 'ConfigLookup',
            code: 'ConfigNotFound',
            message: 'No config item for app "m365"',
            occurredAt: new Date('2026-02-01T00:00:00.000Z'),
        });

        const res = await request(app).get('/api/faults?limit=5&appName=m365').set(auth);

        expect(res.status).toBe(200);
        expect(res.body.faults).toHaveLength(1);
        expect(res.body.faults[0]).toMatchObject({ executionId: 'exec-9', code: 'ConfigNotFound' });
    });

    it('validates the fault limit', async () => {
        const res = await request(createTestApp().app).get('/api/faults?limit=0').set(auth);

        expect(res.status).toBe(400);
        expect(res.body.error.code).toBe('INVALID_QUERY');
    });

    it('lists scheduled jobs', async () => {
        const { app } = createTestApp();
        await request(app).put('/api/apps/m365').set(auth).send(m365Item);

        const res = await request(app).get('/api/jobs').set(auth);

        expect(res.body.jobs.map((j: { id: string }) => j.id)).toEqual(['poll:m365']);
    });
});
