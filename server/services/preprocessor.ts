/**
 * Preprocessor
 *
 * Turns a successful poll into a HealthSnapshot and the six KPI metrics.
 * The vendor normalizer is chosen by `config.preprocessTarget`.
 *
 * Metric namespace precedence:
 *   config.metricNamespace → METRIC_NAMESPACE_<TARGET> → plugin default
 *
 * Parse errors and unknown targets throw (execution faults). A metrics
 * sink failure is logged and does not change the outcome.
 *
 * @module server/services/preprocessor
 */

import { MonitorError } from '../integrations/errors';
import type { HealthSnapshot, PreprocessorPlugin } from '../integrations/types';
import logger from '../utils/logger';
import { computeKpis, countCategories, kpiMetrics, overallCategory, type Kpis } from './kpi';
import { publishMetrics } from './metricsSink';
import type { AppConfig, Metric, MetricsSink, PollResult } from './types';

export interface PreprocessorDeps {
    metricsSink: MetricsSink;
    getPlugin: (id: string) => PreprocessorPlugin | undefined;
    /** Namespace overrides keyed by lower-case target id */
    metricNamespaces?: Readonly<Record<string, string>>;
    now?: () => Date;
}

/** Preprocessor invocation payload */
export interface PreprocessRequest {
    appName: string;
    poll: PollResult;
    config: AppConfig;
}

export interface PreprocessResult {
    snapshot: HealthSnapshot;
    kpis: Kpis;
    metrics: Metric[];
    namespace: string;
    /** False when the sink rejected the batch */
    emitted: boolean;
}

export class Preprocessor {
    private readonly now: () => Date;

    constructor(private readonly deps: PreprocessorDeps) {
        this.now = deps.now ?? (() => new Date());
    }

    resolveNamespace(config: AppConfig, plugin: PreprocessorPlugin): string {
        return config.metricNamespace
            ?? this.deps.metricNamespaces?.[config.preprocessTarget.toLowerCase()]
            ?? plugin.defaultNamespace;
    }

    /**
     * @throws MonitorError PreprocessTargetUnknown | PreprocessParseError
     */
    async run({ appName, poll, config }: PreprocessRequest): Promise<PreprocessResult> {
        const plugin = this.deps.getPlugin(config.preprocessTarget);
        if (!plugin) {
            throw new MonitorError('PreprocessTargetUnknown',
                `No normalizer registered for preprocessTarget "${config.preprocessTarget}"`,
                { appName, preprocessTarget: config.preprocessTarget });
        }

        const services = plugin.normalizer.normalize(poll.body);
        const counts = countCategories(services);
        const kpis = computeKpis(counts, appName);
        const observedAt = this.now();
        const namespace = this.resolveNamespace(config, plugin);

        const snapshot: HealthSnapshot = {
            appName,
            observedAt: observedAt.toISOString(),
            source: {
                provider: plugin.provider,
                dataset: plugin.dataset,
                httpStatus: poll.statusCode ?? null,
            },
            overall: {
                statusCategory: overallCategory(counts),
                availabilityPercent: kpis.overallAvailabilityPercent,
                impactedServicesCount: counts.total - counts.ok,
                outageCount: kpis.outageCount,
                degradedCount: kpis.degradedCount,
                recoveringCount: kpis.recoveringCount,
                investigatingCount: kpis.investigatingCount,
                criticalScore: kpis.criticalScore,
            },
            services,
            totalServices: counts.total,
        };

        logger.info(`[Preprocessor] Snapshot: app=${appName} target=${plugin.id} status=${snapshot.overall.statusCategory} services=${counts.total} availability=${kpis.overallAvailabilityPercent}`, {
            overall: snapshot.overall,
        });

        const metrics = kpiMetrics(kpis, appName, namespace, observedAt);
        const emitted = await publishMetrics(this.deps.metricsSink, metrics, appName);

        return { snapshot, kpis, metrics, namespace, emitted };
    }
}
