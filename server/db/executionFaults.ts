/**
 * Execution Faults Database Functions
 *
 * Record of execution-level failures (config missing, vendor payload
 * unreadable, store unavailable). Kept apart from metric datapoints so
 * "the monitor is broken" never looks like "the SaaS is down".
 *
 * @module server/db/executionFaults
 */

import { getDb } from '../database/db';

interface ExecutionFaultRow {
    id: number;
    execution_id: string;
    app_name: string;
    state: string;
    code: string;
    message: string;
    occurred_at: number;
}

export interface ExecutionFaultRecord {
    id: number;
    executionId: string;
    appName: string;
    state: string;
    code: string;
    message: string;
    occurredAt: string;
}

export interface ExecutionFaultInsert {
    executionId: string;
    appName: string;
    state: string;
    code: string;
    message: string;
    /** Epoch milliseconds */
    occurredAt: number;
}

export function insertFault(fault: ExecutionFaultInsert): void {
    const db = getDb();
    db.prepare(`
        INSERT INTO execution_faults (execution_id, app_name, state, code, message, occurred_at)
        VALUES (?, ?, ?, ?, ?, ?)
    `).run(fault.executionId, fault.appName, fault.state, fault.code, fault.message, fault.occurredAt);
}

/**
 * Most recent faults, newest first. Optionally filtered by app.
 */
export function getRecentFaults(limit: number, appName?: string): ExecutionFaultRecord[] {
    const db = getDb();
    const rows = (appName
        ? db.prepare(`
            SELECT * FROM execution_faults
            WHERE app_name = ?
            ORDER BY occurred_at DESC, id DESC
            LIMIT ?
        `).all(appName, limit)
        : db.prepare(`
            SELECT * FROM execution_faults
            ORDER BY occurred_at DESC, id DESC
            LIMIT ?
        `).all(limit)) as ExecutionFaultRow[];

    return rows.map(row => ({
        id: row.id,
        executionId: row.execution_id,
        appName: row.app_name,
        state: row.state,
        code: row.code,
        message: row.message,
        occurredAt: new Date(row.occurred_at).toISOString(),
    }));
}
