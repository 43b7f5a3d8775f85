/**
 * Workflow States and Outcomes
 *
 * Init → ConfigLookup → Poll → Decision → {Preprocess | ReportFailure} → Done
 *
 * @module server/services/workflow/states
 */

import type { HealthSnapshot } from '../../integrations/types';
import type { ExecutionFault, Metric } from '../types';
import type { AnyContext, BaseContext, ConfiguredContext, PolledContext } from './context';

export type WorkflowState =
    | { type: 'Init'; context: Readonly<BaseContext> }
    | { type: 'ConfigLookup'; context: Readonly<BaseContext> }
    | { type: 'Poll'; context: Readonly<ConfiguredContext> }
    | { type: 'Decision'; context: Readonly<PolledContext> }
    | { type: 'Preprocess'; context: Readonly<PolledContext> }
    | { type: 'ReportFailure'; context: Readonly<PolledContext> }
    | { type: 'Done'; outcome: ExecutionOutcome };

export type ActiveState = Exclude<WorkflowState, { type: 'Done' }>;

export type StateName = WorkflowState['type'];

interface OutcomeBase {
    executionId: string;
    appName: string;
}

export type ExecutionOutcome =
    | (OutcomeBase & {
        kind: 'preprocessed';
        context: Readonly<PolledContext>;
        snapshot: HealthSnapshot;
        metrics: Metric[];
    })
    | (OutcomeBase & {
        kind: 'pollFailed';
        context: Readonly<PolledContext>;
        metric: Metric;
    })
    | (OutcomeBase & {
        kind: 'faulted';
        context: AnyContext;
        fault: ExecutionFault;
    })
    | (OutcomeBase & {
        kind: 'cancelled';
        context: AnyContext;
        /** State that was about to run, or was running, when the signal fired */
        state: StateName;
    });

export type OutcomeKind = ExecutionOutcome['kind'];

export function assertNever(value: never): never {
    throw new Error(`Unhandled workflow state: ${JSON.stringify(value)}`);
}

/**
 * Compact summary for logs and the admin API.
 */
export function summarizeOutcome(outcome: ExecutionOutcome) {
    switch (outcome.kind) {
        case 'preprocessed':
            return {
                kind: outcome.kind,
                executionId: outcome.executionId,
                appName: outcome.appName,
                status: outcome.context.poll.statusCode ?? null,
                overall: outcome.snapshot.overall,
            };
        case 'pollFailed':
            return {
                kind: outcome.kind,
                executionId: outcome.executionId,
                appName: outcome.appName,
                status: outcome.context.poll.statusCode ?? null,
                errorKind: outcome.context.poll.errorKind ?? null,
                error: outcome.context.poll.error ?? null,
            };
        case 'faulted':
            return {
                kind: outcome.kind,
                executionId: outcome.executionId,
                appName: outcome.appName,
                state: outcome.fault.state,
                code: outcome.fault.code,
                error: outcome.fault.message,
            };
        case 'cancelled':
            return {
                kind: outcome.kind,
                executionId: outcome.executionId,
                appName: outcome.appName,
                state: outcome.state,
            };
        default:
            return assertNever(outcome);
    }
}
