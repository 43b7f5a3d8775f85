/**
 * KPI Engine Tests
 */

import { describe, it, expect, vi } from 'vitest';

vi.mock('../utils/logger', () => ({
    default: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import type { ServiceStatus, StatusCategory } from '../integrations/types';
import { computeKpis, countCategories, kpiMetrics, overallCategory } from '../services/kpi';

function services(...categories: StatusCategory[]): ServiceStatus[] {
    return categories.map((category, i) => ({ name: `svc-${i}`, category, rawStatus: null, openIssues: 0 }));
}

describe('countCategories', () => {
    it('counts each category', () => {
        const counts = countCategories(services('OK', 'OK', 'OUTAGE', 'DEGRADED', 'DEGRADED', 'RECOVERING', 'INVESTIGATING'));

        expect(counts).toEqual({ total: 7, ok: 2, outage: 1, degraded: 2, recovering: 1, investigating: 1 });
    });
});

describe('computeKpis', () => {
    it('computes availability and critical score', () => {
        const kpis = computeKpis(countCategories(services('OK', 'OK', 'OK', 'OK', 'OUTAGE', 'DEGRADED', 'RECOVERING', 'INVESTIGATING')));

        expect(kpis).toEqual({
            overallAvailabilityPercent: 87.5,
            outageCount: 1,
            degradedCount: 1,
            recoveringCount: 1,
            investigatingCount: 1,
            criticalScore: 7.5,
        });
    });

    it('rounds availability to two decimals', () => {
        const kpis = computeKpis(countCategories(services('OK', 'OK', 'OUTAGE')));

        expect(kpis.overallAvailabilityPercent).toBe(66.67);
        expect(kpis.criticalScore).toBe(4);
    });

    it('only outages reduce availability', () => {
        const kpis = computeKpis(countCategories(services('DEGRADED', 'INVESTIGATING')));

        expect(kpis.overallAvailabilityPercent).toBe(100);
        expect(kpis.criticalScore).toBe(3);
    });

    it('reports 100% for an empty service list', () => {
        const kpis = computeKpis(countCategories([]), 'empty-app');

        expect(kpis.overallAvailabilityPercent).toBe(100);
        expect(kpis.criticalScore).toBe(0);
    });
});

describe('overallCategory', () => {
    it('picks the worst category present', () => {
        expect(overallCategory(countCategories(services('OK', 'RECOVERING', 'INVESTIGATING')))).toBe('INVESTIGATING');
        expect(overallCategory(countCategories(services('DEGRADED', 'OUTAGE')))).toBe('OUTAGE');
        expect(overallCategory(countCategories(services('OK')))).toBe('OK');
        expect(overallCategory(countCategories([]))).toBe('OK');
    });
});

describe('kpiMetrics', () => {
    it('emits the six KPI metrics with the AppName dimension', () => {
        const timestamp = new Date('2026-01-01T00:00:00Z');
        const kpis = computeKpis(countCategories(services('OK', 'OUTAGE')));

        const metrics = kpiMetrics(kpis, 'm365', 'Observability/Test', timestamp);

        expect(metrics.map(m => [m.name, m.value, m.unit])).toEqual([
            ['OverallAvailabilityPercent', 50, 'Percent'],
            ['ServicesOutageCount', 1, 'Count'],
            ['ServicesDegradedCount', 0, 'Count'],
            ['ServicesRecoveringCount', 0, 'Count'],
            ['ServicesInvestigatingCount', 0, 'Count'],
            ['CriticalScore', 4, 'None'],
        ]);
        for (const metric of metrics) {
            expect(metric.namespace).toBe('Observability/Test');
            expect(metric.dimensions).toEqual({ AppName: 'm365' });
            expect(metric.timestamp).toBe(timestamp);
        }
    });
});
