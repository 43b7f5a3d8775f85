/**
 * Execution Failure Sink
 *
 * The execution-failure signal: faults of the monitor itself are written
 * to `execution_faults` and logged at error level. Operators alert on this
 * separately from the PollFailed business metric.
 *
 * @module server/services/executionFaults
 */

import * as executionFaultsDb from '../db/executionFaults';
import logger from '../utils/logger';
import type { ExecutionFailureSink, ExecutionFault } from './types';

export class SqliteExecutionFailureSink implements ExecutionFailureSink {
    async raise(fault: ExecutionFault): Promise<void> {
        logger.error(`[ExecutionFault] ${fault.code}: app=${fault.appName} execution=${fault.executionId} state=${fault.state} error="${fault.message}"`);
        executionFaultsDb.insertFault({
            executionId: fault.executionId,
            appName: fault.appName,
            state: fault.state,
            code: fault.code,
            message: fault.message,
            occurredAt: fault.occurredAt.getTime(),
        });
    }

    listRecent(limit: number, appName?: string): executionFaultsDb.ExecutionFaultRecord[] {
        return executionFaultsDb.getRecentFaults(limit, appName);
    }
}
