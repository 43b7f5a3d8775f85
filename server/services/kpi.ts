/**
 * KPI Engine
 *
 * Vendor-agnostic math over normalized service statuses.
 *
 * - OverallAvailabilityPercent = 100 * (total - outage) / total
 *   (100 when there are no services)
 * - CriticalScore = 4*outage + 2*degraded + 1*investigating + 0.5*recovering
 *
 * @module server/services/kpi
 */

import type { ServiceStatus, StatusCategory } from '../integrations/types';
import logger from '../utils/logger';
import type { Metric } from './types';

/** Severity weights for CriticalScore. Fixed, not configurable. */
export const CRITICAL_SCORE_WEIGHTS = {
    outage: 4,
    degraded: 2,
    investigating: 1,
    recovering: 0.5,
} as const;

export interface CategoryCounts {
    total: number;
    ok: number;
    outage: number;
    degraded: number;
    recovering: number;
    investigating: number;
}

export interface Kpis {
    overallAvailabilityPercent: number;
    outageCount: number;
    degradedCount: number;
    recoveringCount: number;
    investigatingCount: number;
    criticalScore: number;
}

export function countCategories(services: readonly ServiceStatus[]): CategoryCounts {
    const counts: CategoryCounts = { total: services.length, ok: 0, outage: 0, degraded: 0, recovering: 0, investigating: 0 };
    for (const service of services) {
        switch (service.category) {
            case 'OK': counts.ok++; break;
            case 'OUTAGE': counts.outage++; break;
            case 'DEGRADED': counts.degraded++; break;
            case 'RECOVERING': counts.recovering++; break;
            case 'INVESTIGATING': counts.investigating++; break;
        }
    }
    return counts;
}

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

export function computeKpis(counts: CategoryCounts, appName?: string): Kpis {
    let availability: number;
    if (counts.total === 0) {
        logger.warn(`[KPI] No services in response, reporting full availability: app=${appName ?? 'unknown'}`);
        availability = 100;
    } else {
        availability = round2(100 * (counts.total - counts.outage) / counts.total);
    }

    const w = CRITICAL_SCORE_WEIGHTS;
    return {
        overallAvailabilityPercent: availability,
        outageCount: counts.outage,
        degradedCount: counts.degraded,
        recoveringCount: counts.recovering,
        investigatingCount: counts.investigating,
        criticalScore: w.outage * counts.outage
            + w.degraded * counts.degraded
            + w.investigating * counts.investigating
            + w.recovering * counts.recovering,
    };
}

/**
 * Worst category present, in operational severity order.
 */
export function overallCategory(counts: CategoryCounts): StatusCategory {
    if (counts.outage > 0) return 'OUTAGE';
    if (counts.degraded > 0) return 'DEGRADED';
    if (counts.investigating > 0) return 'INVESTIGATING';
    if (counts.recovering > 0) return 'RECOVERING';
    return 'OK';
}

/**
 * The six KPI metrics, dimensioned by application name.
 */
export function kpiMetrics(kpis: Kpis, appName: string, namespace: string, timestamp: Date): Metric[] {
    const dimensions = { AppName: appName };
    const metric = (name: string, value: number, unit: Metric['unit']): Metric => ({
        namespace,
        name,
        value,
        unit,
        dimensions,
        timestamp,
    });

    return [
        metric('OverallAvailabilityPercent', kpis.overallAvailabilityPercent, 'Percent'),
        metric('ServicesOutageCount', kpis.outageCount, 'Count'),
        metric('ServicesDegradedCount', kpis.degradedCount, 'Count'),
        metric('ServicesRecoveringCount', kpis.recoveringCount, 'Count'),
        metric('ServicesInvestigatingCount', kpis.investigatingCount, 'Count'),
        metric('CriticalScore', kpis.criticalScore, 'None'),
    ];
}
