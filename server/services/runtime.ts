/**
 * Runtime
 *
 * Wires the SQLite-backed collaborators into one orchestrator. Shared by
 * the server entry point and the CLI.
 *
 * @module server/services/runtime
 */

import { getPlugin } from '../integrations/registry';
import { getSettings, type Settings } from '../utils/settings';
import { SqliteConfigStore } from './configStore';
import { SqliteExecutionFailureSink } from './executionFaults';
import { FailureReporter } from './failureReporter';
import { SqliteMetricsSink } from './metricsSink';
import { Poller } from './poller';
import { PollScheduler } from './pollScheduler';
import { Preprocessor } from './preprocessor';
import { SecretResolver, SqliteSecretStore } from './secretResolver';
import { Orchestrator } from './workflow/orchestrator';

export interface Runtime {
    settings: Settings;
    configStore: SqliteConfigStore;
    failureSink: SqliteExecutionFailureSink;
    orchestrator: Orchestrator;
    scheduler: PollScheduler;
}

export function createRuntime(settings: Settings = getSettings()): Runtime {
    const configStore = new SqliteConfigStore({
        authHeaderName: settings.defaultAuthHeader,
        authPrefix: settings.defaultAuthPrefix,
    });
    const metricsSink = new SqliteMetricsSink();
    const failureSink = new SqliteExecutionFailureSink();

    const poller = new Poller({
        secretResolver: new SecretResolver(new SqliteSecretStore()),
        maxBodyChars: settings.maxBodyChars,
        returnDebug: settings.returnDebug,
        envApiKey: settings.envApiKey,
    });

    const orchestrator = new Orchestrator({
        configStore,
        poller,
        preprocessor: new Preprocessor({
            metricsSink,
            getPlugin,
            metricNamespaces: settings.metricNamespaces,
        }),
        failureReporter: new FailureReporter({
            metricsSink,
            namespace: settings.failureMetricNamespace,
        }),
        failureSink,
    });

    const scheduler = new PollScheduler({
        orchestrator,
        listApps: () => configStore.list(),
        executionTimeoutMs: settings.executionTimeoutMs,
        metricRetentionDays: settings.metricRetentionDays,
    });

    return { settings, configStore, failureSink, orchestrator, scheduler };
}
