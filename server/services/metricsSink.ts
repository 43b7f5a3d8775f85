/**
 * Metrics Sink
 *
 * Write-only destination for emitted metrics. The SQLite sink appends to
 * `metric_datapoints`; publishMetrics() gives callers fire-and-forget
 * semantics (a sink failure is logged, never turned into an execution
 * outcome).
 *
 * @module server/services/metricsSink
 */

import * as metricDatapointsDb from '../db/metricDatapoints';
import { extractErrorMessage } from '../integrations/errors';
import logger from '../utils/logger';
import type { Metric, MetricsSink } from './types';

export class SqliteMetricsSink implements MetricsSink {
    async emit(metrics: readonly Metric[]): Promise<void> {
        metricDatapointsDb.insertMany(metrics.map(m => ({
            namespace: m.namespace,
            name: m.name,
            value: m.value,
            unit: m.unit,
            dimensions: m.dimensions,
            timestamp: m.timestamp.getTime(),
        })));
        logger.debug(`[MetricsSink] Emitted ${metrics.length} datapoints`);
    }
}

/**
 * Emit metrics, logging (not raising) a sink failure.
 * @returns true if the sink accepted the batch
 */
export async function publishMetrics(sink: MetricsSink, metrics: readonly Metric[], appName: string): Promise<boolean> {
    try {
        await sink.emit(metrics);
        return true;
    } catch (error) {
        logger.error(`[MetricsSink] Emit failed: app=${appName} count=${metrics.length} error="${extractErrorMessage(error)}"`);
        return false;
    }
}

/**
 * Delete datapoints older than the retention window.
 * Registered as a daily job by the poll scheduler.
 */
export function pruneMetricDatapoints(retentionDays: number, now: number = Date.now()): number {
    const cutoff = now - retentionDays * 24 * 60 * 60 * 1000;
    const deleted = metricDatapointsDb.deleteOlderThan(cutoff);
    if (deleted > 0) {
        logger.info(`[MetricsSink] Pruned ${deleted} datapoints older than ${retentionDays} days`);
    }
    return deleted;
}
