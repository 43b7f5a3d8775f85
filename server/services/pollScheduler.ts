/**
 * Poll Scheduler
 *
 * Trigger source for the orchestrator. Keeps one `poll:<appName>` job per
 * enabled app on the job scheduler, plus the daily metric retention job.
 * Each run gets its own AbortController, aborted at the execution deadline.
 *
 * @module server/services/pollScheduler
 */

import logger from '../utils/logger';
import type { ListedAppConfig } from './configStore';
import { registerJob, unregisterJob } from './jobScheduler';
import { pruneMetricDatapoints } from './metricsSink';
import type { Orchestrator } from './workflow/orchestrator';
import type { ExecutionOutcome } from './workflow/states';

export const POLL_JOB_PREFIX = 'poll:';
export const RETENTION_JOB_ID = 'metric-retention';
const RETENTION_SCHEDULE = '15 3 * * *';

export interface PollSchedulerDeps {
    orchestrator: Pick<Orchestrator, 'execute'>;
    listApps: () => ListedAppConfig[];
    executionTimeoutMs: number;
    metricRetentionDays: number;
}

export interface SyncResult {
    added: string[];
    updated: string[];
    removed: string[];
}

export function pollJobId(appName: string): string {
    return `${POLL_JOB_PREFIX}${appName}`;
}

export class PollScheduler {
    /** appName → schedule currently registered */
    private readonly scheduled = new Map<string, string>();

    constructor(private readonly deps: PollSchedulerDeps) { }

    start(): SyncResult {
        registerJob({
            id: RETENTION_JOB_ID,
            name: 'Metric retention',
            cronExpression: RETENTION_SCHEDULE,
            description: `Delete metric datapoints older than ${this.deps.metricRetentionDays} days`,
            execute: () => {
                pruneMetricDatapoints(this.deps.metricRetentionDays);
            },
        });
        return this.sync();
    }

    /**
     * Reconcile registered poll jobs with the stored configs.
     * Called at startup and after every config write.
     */
    sync(): SyncResult {
        const desired = new Map<string, string>();
        for (const { appName, config } of this.deps.listApps()) {
            if (config && config.enabled) {
                desired.set(appName, config.schedule);
            }
        }

        const result: SyncResult = { added: [], updated: [], removed: [] };

        for (const appName of [...this.scheduled.keys()]) {
            if (!desired.has(appName)) {
                unregisterJob(pollJobId(appName));
                this.scheduled.delete(appName);
                result.removed.push(appName);
            }
        }

        for (const [appName, schedule] of desired) {
            const current = this.scheduled.get(appName);
            if (current === schedule) continue;

            const registered = registerJob({
                id: pollJobId(appName),
                name: `Poll ${appName}`,
                cronExpression: schedule,
                description: `Poll ${appName} on "${schedule}"`,
                execute: async () => {
                    await this.runApp(appName);
                },
            });
            if (!registered) {
                this.scheduled.delete(appName);
                continue;
            }
            this.scheduled.set(appName, schedule);
            (current === undefined ? result.added : result.updated).push(appName);
        }

        if (result.added.length || result.updated.length || result.removed.length) {
            logger.info(`[PollScheduler] Synced: added=${result.added.length} updated=${result.updated.length} removed=${result.removed.length} total=${this.scheduled.size}`);
        }
        return result;
    }

    /**
     * Run one execution for `appName`, aborted at the execution deadline.
     */
    async runApp(appName: string): Promise<ExecutionOutcome> {
        const controller = new AbortController();
        const timer = setTimeout(() => {
            logger.warn(`[PollScheduler] Execution deadline reached: app=${appName} timeout=${this.deps.executionTimeoutMs}ms`);
            controller.abort();
        }, this.deps.executionTimeoutMs);

        try {
            return await this.deps.orchestrator.execute({ appName }, controller.signal);
        } finally {
            clearTimeout(timer);
        }
    }

    scheduledApps(): string[] {
        return [...this.scheduled.keys()];
    }

    stop(): void {
        for (const appName of this.scheduled.keys()) {
            unregisterJob(pollJobId(appName));
        }
        this.scheduled.clear();
        unregisterJob(RETENTION_JOB_ID);
    }
}
