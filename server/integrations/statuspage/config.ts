import type { StatusCategory } from '../types';

// ============================================================================
// ATLASSIAN STATUSPAGE PLUGIN METADATA
// ============================================================================

export const id = 'statuspage';
export const name = 'Atlassian Statuspage';
export const description = 'Component statuses from a public Statuspage summary.json or components.json';
export const provider = 'atlassian-statuspage';
export const dataset = 'components';
export const defaultNamespace = 'Observability/Statuspage';

export const STATUS_MAP: Readonly<Record<string, StatusCategory>> = {
    operational: 'OK',
    degraded_performance: 'DEGRADED',
    partial_outage: 'DEGRADED',
    major_outage: 'OUTAGE',
    under_maintenance: 'RECOVERING',
};

/** Incident statuses that no longer count as open */
export const CLOSED_INCIDENT_STATUSES: ReadonlySet<string> = new Set(['resolved', 'postmortem', 'completed']);
