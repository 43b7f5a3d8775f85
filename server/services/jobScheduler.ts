/**
 * Job Scheduler Service
 *
 * Central registry for all cron-based background jobs.
 * Uses node-cron for wall-clock reliable scheduling.
 *
 * Runs of the same job may overlap: every tick starts its own run and the
 * registry only counts how many are in flight. Poll executions rely on this
 * (a slow poll must not swallow the next scheduled tick).
 */

import cron, { type ScheduledTask } from 'node-cron';
import { extractErrorMessage } from '../integrations/errors';
import logger from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface JobConfig {
    /** Unique job identifier */
    id: string;
    /** Human-readable name */
    name: string;
    /** Cron expression (e.g. '*\/5 * * * *') */
    cronExpression: string;
    /** Human-readable schedule description */
    description: string;
    /** The function to execute */
    execute: () => Promise<void> | void;
}

export interface JobStatus {
    id: string;
    name: string;
    cronExpression: string;
    description: string;
    status: 'idle' | 'running';
    inFlight: number;
    runCount: number;
    failureCount: number;
    lastRun: string | null;
    lastError: string | null;
}

interface RegisteredJob {
    config: JobConfig;
    task: ScheduledTask;
    inFlight: number;
    runCount: number;
    failureCount: number;
    lastRun: Date | null;
    lastError: string | null;
}

// ============================================================================
// State
// ============================================================================

const jobs = new Map<string, RegisteredJob>();

async function runJob(job: RegisteredJob, trigger: 'cron' | 'manual'): Promise<boolean> {
    const { id } = job.config;
    job.inFlight++;
    logger.debug(`[JobScheduler] Executing job: ${id} trigger=${trigger} inFlight=${job.inFlight}`);

    try {
        await job.config.execute();
        job.lastRun = new Date();
        job.runCount++;
        job.lastError = null;
        logger.debug(`[JobScheduler] Completed job: ${id}`);
        return true;
    } catch (error) {
        job.lastRun = new Date();
        job.runCount++;
        job.failureCount++;
        job.lastError = extractErrorMessage(error);
        logger.error(`[JobScheduler] Job failed: ${id}, error="${job.lastError}"`);
        return false;
    } finally {
        job.inFlight--;
    }
}

function toStatus(job: RegisteredJob): JobStatus {
    return {
        id: job.config.id,
        name: job.config.name,
        cronExpression: job.config.cronExpression,
        description: job.config.description,
        status: job.inFlight > 0 ? 'running' : 'idle',
        inFlight: job.inFlight,
        runCount: job.runCount,
        failureCount: job.failureCount,
        lastRun: job.lastRun?.toISOString() || null,
        lastError: job.lastError,
    };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Register a job with the scheduler.
 * If a job with the same ID exists, it will be replaced.
 * @returns false if the cron expression is invalid
 */
export function registerJob(config: JobConfig): boolean {
    if (jobs.has(config.id)) {
        unregisterJob(config.id);
    }

    if (!cron.validate(config.cronExpression)) {
        logger.error(`[JobScheduler] Invalid cron expression for job ${config.id}: "${config.cronExpression}"`);
        return false;
    }

    const task = cron.schedule(config.cronExpression, async () => {
        const job = jobs.get(config.id);
        if (!job) return;
        await runJob(job, 'cron');
    });

    jobs.set(config.id, {
        config,
        task,
        inFlight: 0,
        runCount: 0,
        failureCount: 0,
        lastRun: null,
        lastError: null,
    });
    logger.info(`[JobScheduler] Registered job: ${config.id} (${config.description})`);
    return true;
}

/**
 * Unregister and stop a job. Runs already in flight finish on their own.
 */
export function unregisterJob(id: string): boolean {
    const job = jobs.get(id);
    if (!job) return false;

    job.task.stop();
    jobs.delete(id);
    logger.info(`[JobScheduler] Unregistered job: ${id}`);
    return true;
}

/**
 * Manually trigger a job to run now, alongside any scheduled run.
 * @returns false for an unknown job or a failed run
 */
export async function triggerJob(id: string): Promise<boolean> {
    const job = jobs.get(id);
    if (!job) {
        logger.warn(`[JobScheduler] Cannot trigger unknown job: ${id}`);
        return false;
    }

    logger.info(`[JobScheduler] Manually triggering job: ${id}`);
    return runJob(job, 'manual');
}

export function hasJob(id: string): boolean {
    return jobs.has(id);
}

export function getJobIds(): string[] {
    return [...jobs.keys()];
}

/**
 * Get status of all registered jobs.
 */
export function getJobStatuses(): JobStatus[] {
    return [...jobs.values()].map(toStatus);
}

/**
 * Get status of a single job.
 */
export function getJobStatus(id: string): JobStatus | null {
    const job = jobs.get(id);
    return job ? toStatus(job) : null;
}

/**
 * Stop all registered jobs. Called on server shutdown.
 */
export function shutdownAllJobs(): void {
    logger.info(`[JobScheduler] Shutting down ${jobs.size} jobs...`);
    for (const id of [...jobs.keys()]) {
        unregisterJob(id);
    }
}
