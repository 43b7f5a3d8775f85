/**
 * Failure Reporter
 *
 * Emits exactly one PollFailed=1 datapoint when a poll does not succeed.
 */

import logger from '../utils/logger';
import { publishMetrics } from './metricsSink';
import type { Metric, MetricsSink, PollResult } from './types';

export const POLL_FAILED_METRIC = 'PollFailed';

export interface FailureReporterDeps {
    metricsSink: MetricsSink;
    namespace: string;
    now?: () => Date;
}

export class FailureReporter {
    constructor(private readonly deps: FailureReporterDeps) { }

    async report(appName: string, poll: PollResult): Promise<Metric> {
        const metric: Metric = {
            namespace: this.deps.namespace,
            name: POLL_FAILED_METRIC,
            value: 1,
            unit: 'Count',
            dimensions: { AppName: appName },
            timestamp: this.deps.now ? this.deps.now() : new Date(),
        };

        logger.warn(`[FailureReporter] Poll failed: app=${appName} kind=${poll.errorKind ?? 'unknown'} status=${poll.statusCode ?? 'none'} attempts=${poll.attemptCount}`);
        await publishMetrics(this.deps.metricsSink, [metric], appName);
        return metric;
    }
}
