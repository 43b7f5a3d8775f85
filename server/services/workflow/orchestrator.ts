/**
 * Orchestrator
 *
 * Runs one execution per trigger event through the workflow states and
 * returns exactly one outcome:
 *
 * - preprocessed: poll ok, KPIs computed and emitted
 * - pollFailed:   poll not ok, PollFailed emitted
 * - faulted:      the monitor itself broke (config, store, parse); raised on
 *                 the execution-failure sink, no business metric
 * - cancelled:    the signal fired; no metric of either kind
 *
 * Never throws to the trigger source.
 *
 * @module server/services/workflow/orchestrator
 */

import { v4 as uuidv4 } from 'uuid';
import { extractErrorMessage, MonitorError, toMonitorError } from '../../integrations/errors';
import logger from '../../utils/logger';
import type { FailureReporter } from '../failureReporter';
import type { Poller } from '../poller';
import type { Preprocessor } from '../preprocessor';
import type { ConfigStoreClient, ExecutionFailureSink, ExecutionFault } from '../types';
import { createContext, extendContext } from './context';
import { assertNever, summarizeOutcome, type ActiveState, type ExecutionOutcome, type WorkflowState } from './states';

export interface TriggerPayload {
    appName: string;
}

export interface OrchestratorDeps {
    configStore: ConfigStoreClient;
    poller: Pick<Poller, 'poll'>;
    preprocessor: Pick<Preprocessor, 'run'>;
    failureReporter: Pick<FailureReporter, 'report'>;
    failureSink: ExecutionFailureSink;
    newExecutionId?: () => string;
    now?: () => Date;
}

export class Orchestrator {
    private readonly newExecutionId: () => string;
    private readonly now: () => Date;

    constructor(private readonly deps: OrchestratorDeps) {
        this.newExecutionId = deps.newExecutionId ?? (() => uuidv4());
        this.now = deps.now ?? (() => new Date());
    }

    async execute(trigger: TriggerPayload, signal?: AbortSignal): Promise<ExecutionOutcome> {
        const executionId = this.newExecutionId();
        let state: WorkflowState = { type: 'Init', context: createContext(executionId, trigger.appName) };

        logger.info(`[Orchestrator] Execution started: app=${trigger.appName} execution=${executionId}`);

        while (state.type !== 'Done') {
            state = await this.step(state, signal);
        }

        logger.info(`[Orchestrator] Execution finished: app=${trigger.appName} execution=${executionId} outcome=${state.outcome.kind}`, {
            outcome: summarizeOutcome(state.outcome),
        });
        return state.outcome;
    }

    private async step(state: ActiveState, signal?: AbortSignal): Promise<WorkflowState> {
        if (signal?.aborted) {
            return this.cancel(state);
        }
        try {
            return await this.transition(state, signal);
        } catch (error) {
            return this.fault(state, error);
        }
    }

    private async transition(state: ActiveState, signal?: AbortSignal): Promise<WorkflowState> {
        switch (state.type) {
            case 'Init': {
                const { appName } = state.context;
                if (typeof appName !== 'string' || appName.trim() === '') {
                    throw new MonitorError('ConfigNotFound', 'Trigger payload has no appName');
                }
                return { type: 'ConfigLookup', context: state.context };
            }

            case 'ConfigLookup': {
                const config = await this.deps.configStore.resolve(state.context.appName);
                logger.debug(`[Orchestrator] Config resolved: app=${config.appName} target=${config.preprocessTarget} method=${config.method}`);
                return { type: 'Poll', context: extendContext(state.context, { config }) };
            }

            case 'Poll': {
                const poll = await this.deps.poller.poll(state.context.config, signal);
                return { type: 'Decision', context: extendContext(state.context, { poll }) };
            }

            case 'Decision': {
                const { poll } = state.context;
                if (poll.errorKind === 'Cancelled' || signal?.aborted) {
                    return this.cancel(state);
                }
                return poll.ok
                    ? { type: 'Preprocess', context: state.context }
                    : { type: 'ReportFailure', context: state.context };
            }

            case 'Preprocess': {
                const { snapshot, metrics } = await this.deps.preprocessor.run({
                    appName: state.context.appName,
                    poll: state.context.poll,
                    config: state.context.config,
                });
                return {
                    type: 'Done',
                    outcome: {
                        kind: 'preprocessed',
                        executionId: state.context.executionId,
                        appName: state.context.appName,
                        context: state.context,
                        snapshot,
                        metrics,
                    },
                };
            }

            case 'ReportFailure': {
                const metric = await this.deps.failureReporter.report(state.context.appName, state.context.poll);
                return {
                    type: 'Done',
                    outcome: {
                        kind: 'pollFailed',
                        executionId: state.context.executionId,
                        appName: state.context.appName,
                        context: state.context,
                        metric,
                    },
                };
            }

            default:
                return assertNever(state);
        }
    }

    private cancel(state: ActiveState): WorkflowState {
        logger.warn(`[Orchestrator] Execution cancelled: app=${state.context.appName} execution=${state.context.executionId} state=${state.type}`);
        return {
            type: 'Done',
            outcome: {
                kind: 'cancelled',
                executionId: state.context.executionId,
                appName: state.context.appName,
                context: state.context,
                state: state.type,
            },
        };
    }

    private async fault(state: ActiveState, error: unknown): Promise<WorkflowState> {
        const monitorError = toMonitorError(error);
        const fault: ExecutionFault = {
            executionId: state.context.executionId,
            appName: state.context.appName,
            state: state.type,
            code: monitorError.code,
            message: monitorError.message,
            occurredAt: this.now(),
        };

        try {
            await this.deps.failureSink.raise(fault);
        } catch (sinkError) {
            logger.error(`[Orchestrator] Failure sink rejected fault: app=${fault.appName} execution=${fault.executionId} code=${fault.code} error="${extractErrorMessage(sinkError)}"`);
        }

        return {
            type: 'Done',
            outcome: {
                kind: 'faulted',
                executionId: fault.executionId,
                appName: fault.appName,
                context: state.context,
                fault,
            },
        };
    }
}
