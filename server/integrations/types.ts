/**
 * Preprocessor Plugin System - Canonical Types
 *
 * Every vendor integration implements the same capability: turn a raw
 * status-endpoint body into a list of normalized service statuses. KPI
 * math stays vendor-agnostic in services/kpi; parsing stays here.
 */

// ============================================================================
// NORMALIZED STATUS
// ============================================================================

export type StatusCategory = 'OK' | 'DEGRADED' | 'OUTAGE' | 'RECOVERING' | 'INVESTIGATING';

export const STATUS_CATEGORIES: readonly StatusCategory[] = [
    'OK',
    'DEGRADED',
    'OUTAGE',
    'RECOVERING',
    'INVESTIGATING',
];

export interface ServiceStatus {
    name: string;
    category: StatusCategory;
    /** Vendor status string as received */
    rawStatus: string | null;
    /** Open incidents/issues attached to this service */
    openIssues: number;
    /** 0 (healthy) to 3 (critical): the worse of status and open-issue severity */
    severity?: number;
    /** Highest severity score among open issues, 0 when none */
    highestIncidentSeverity?: number;
}

// ============================================================================
// NORMALIZER
// ============================================================================

export interface Normalizer {
    /**
     * @throws MonitorError PreprocessParseError when the body does not match
     *         the vendor schema
     */
    normalize(body: string): ServiceStatus[];
}

// ============================================================================
// PLUGIN
// ============================================================================

export interface PreprocessorPlugin {
    /** Matches AppConfig.preprocessTarget */
    id: string;
    name: string;
    description: string;
    /** Source labels recorded on the health snapshot */
    provider: string;
    dataset: string;
    /** Metric namespace unless overridden by env or app config */
    defaultNamespace: string;
    normalizer: Normalizer;
}

// ============================================================================
// SNAPSHOT
// ============================================================================

/**
 * Normalized record of one successful poll.
 */
export interface HealthSnapshot {
    appName: string;
    observedAt: string;
    source: {
        provider: string;
        dataset: string;
        httpStatus: number | null;
    };
    overall: {
        statusCategory: StatusCategory;
        availabilityPercent: number;
        impactedServicesCount: number;
        outageCount: number;
        degradedCount: number;
        recoveringCount: number;
        investigatingCount: number;
        criticalScore: number;
    };
    services: ServiceStatus[];
    totalServices: number;
}
