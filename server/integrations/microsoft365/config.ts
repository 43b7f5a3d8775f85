import type { StatusCategory } from '../types';

// ============================================================================
// MICROSOFT 365 SERVICE HEALTH PLUGIN METADATA
// ============================================================================

export const id = 'microsoft365';
export const name = 'Microsoft 365 Service Health';
export const description = 'Service health overviews and issues from the Microsoft Graph service announcement API';
export const provider = 'microsoft-graph';
export const dataset = 'serviceAnnouncement';
export const defaultNamespace = 'Observability/Microsoft365';

/**
 * Graph serviceHealthStatus values (spaces removed, lower-cased).
 * Anything not listed normalizes to INVESTIGATING: health cannot be confirmed.
 */
export const STATUS_MAP: Readonly<Record<string, StatusCategory>> = {
    serviceoperational: 'OK',
    servicerestored: 'OK',
    resolved: 'OK',
    resolvedexternal: 'OK',
    falsepositive: 'OK',
    postincidentreviewpublished: 'OK',
    investigating: 'INVESTIGATING',
    confirmed: 'INVESTIGATING',
    reported: 'INVESTIGATING',
    investigationsuspended: 'INVESTIGATING',
    restoringservice: 'RECOVERING',
    extendedrecovery: 'RECOVERING',
    verifyingservice: 'RECOVERING',
    mitigated: 'RECOVERING',
    mitigatedexternal: 'RECOVERING',
    servicedegradation: 'DEGRADED',
    serviceinterruption: 'OUTAGE',
};

/**
 * Severity score per status key. Unlisted statuses score 1.
 */
export const STATUS_SEVERITY: Readonly<Record<string, number>> = {
    serviceoperational: 0,
    servicerestored: 0,
    resolved: 0,
    resolvedexternal: 0,
    falsepositive: 0,
    postincidentreviewpublished: 0,
    investigating: 2,
    confirmed: 2,
    reported: 1,
    investigationsuspended: 1,
    restoringservice: 1,
    extendedrecovery: 1,
    verifyingservice: 1,
    mitigated: 1,
    mitigatedexternal: 1,
    servicedegradation: 2,
    serviceinterruption: 3,
};

/** Issue `severity` field scores. Missing or unlisted values score 1. */
export const ISSUE_SEVERITY_SCORE: Readonly<Record<string, number>> = {
    informational: 0,
    low: 1,
    medium: 2,
    high: 3,
    critical: 3,
};

export const DEFAULT_SEVERITY = 1;

/** Issue statuses that mean the issue is closed */
export const CLOSED_ISSUE_STATUSES: ReadonlySet<string> = new Set(['servicerestored', 'resolved', 'closed']);
