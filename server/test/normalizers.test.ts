/**
 * Vendor Normalizer Tests
 */

import { describe, it, expect } from 'vitest';
import { MonitorError } from '../integrations/errors';
import { Microsoft365Normalizer } from '../integrations/microsoft365/normalizer';
import { getPlugin, plugins } from '../integrations/registry';
import { StatuspageNormalizer } from '../integrations/statuspage/normalizer';

function parseFailure(fn: () => unknown): MonitorError | null {
    try {
        fn();
    } catch (error) {
        if (error instanceof MonitorError) return error;
        throw error;
    }
    return null;
}

describe('Microsoft365Normalizer', () => {
    const normalizer = new Microsoft365Normalizer();

    it('normalizes a healthOverviews value list', () => {
        const body = JSON.stringify({
            value: [
                { id: 'Exchange', service: 'Exchange Online', status: 'serviceOperational' },
                { service: 'Microsoft Teams', status: 'serviceDegradation' },
                { service: 'SharePoint Online', status: 'serviceInterruption' },
                { service: 'Planner', status: 'extendedRecovery' },
                { service: 'Forms', status: 'somethingNew' },
            ],
        });

        const services = normalizer.normalize(body);

        expect(services.map(s => [s.name, s.category])).toEqual([
            ['Exchange Online', 'OK'],
            ['Microsoft Teams', 'DEGRADED'],
            ['SharePoint Online', 'OUTAGE'],
            ['Planner', 'RECOVERING'],
            ['Forms', 'INVESTIGATING'],
        ]);
        expect(services[4].rawStatus).toBe('somethingNew');
    });

    it('counts open issues per service in the combined shape', () => {
        const body = JSON.stringify({
            healthOverviews: [{ service: 'Exchange Online', status: 'serviceOperational' }],
            issues: [
                { service: 'Exchange Online', status: 'investigating' },
                { service: 'Exchange Online', status: 'serviceRestored' },
                { affectedWorkload: 'Exchange Online', status: 'confirmed' },
            ],
        });

        expect(normalizer.normalize(body)).toEqual([
            {
                name: 'Exchange Online',
                category: 'OK',
                rawStatus: 'serviceOperational',
                openIssues: 2,
                severity: 1,
                highestIncidentSeverity: 1,
            },
        ]);
    });

    it('scores severity from the status and the worst open issue', () => {
        const body = JSON.stringify({
            healthOverviews: [
                { service: 'Exchange Online', status: 'serviceOperational' },
                { service: 'Microsoft Teams', status: 'serviceDegradation' },
                { service: 'Planner', status: 'extendedRecovery' },
            ],
            issues: [
                { service: 'Exchange Online', status: 'investigating', severity: 'Informational' },
                { service: 'Exchange Online', status: 'investigating', severity: 'HIGH' },
                { service: 'Exchange Online', status: 'resolved', severity: 'critical' },
                { service: 'Microsoft Teams', status: 'confirmed', severity: 'low' },
            ],
        });

        const services = normalizer.normalize(body);

        expect(services.map(s => [s.name, s.openIssues, s.severity, s.highestIncidentSeverity])).toEqual([
            ['Exchange Online', 2, 3, 3],
            ['Microsoft Teams', 1, 2, 1],
            ['Planner', 0, 1, 0],
        ]);
    });

    it('treats a missing status as INVESTIGATING and falls back to the id for the name', () => {
        const services = normalizer.normalize(JSON.stringify({ value: [{ id: 'only-id' }] }));

        expect(services).toEqual([{
            name: 'only-id',
            category: 'INVESTIGATING',
            rawStatus: null,
            openIssues: 0,
            severity: 1,
            highestIncidentSeverity: 0,
        }]);
    });

    it('fails with PreprocessParseError for invalid JSON', () => {
        const error = parseFailure(() => normalizer.normalize('<html>'));

        expect(error?.code).toBe('PreprocessParseError');
        expect(error?.message).toMatch(/^Microsoft 365 Service Health response is not valid JSON: /);
    });

    it('fails with PreprocessParseError for an unrecognized body', () => {
        const error = parseFailure(() => normalizer.normalize('{}'));

        expect(error?.code).toBe('PreprocessParseError');
        expect(error?.message).toMatch(/^Microsoft 365 Service Health response does not match the expected schema: /);
    });
});

describe('StatuspageNormalizer', () => {
    const normalizer = new StatuspageNormalizer();

    it('maps component statuses, skips groups and attaches incidents', () => {
        const body = JSON.stringify({
            components: [
                { id: 'a', name: 'API', status: 'operational' },
                { id: 'g', name: 'Platform', status: 'operational', group: true },
                { id: 'b', name: 'Web', status: 'partial_outage' },
                { id: 'c', name: 'Database', status: 'major_outage' },
                { id: 'd', name: 'Jobs', status: 'under_maintenance' },
                { id: 'e', name: 'Search', status: 'something_else' },
            ],
            incidents: [
                { status: 'investigating', components: [{ id: 'a' }] },
                { status: 'monitoring', components: [{ id: 'b' }] },
                { status: 'resolved', components: [{ id: 'c' }] },
            ],
        });

        expect(normalizer.normalize(body)).toEqual([
            { name: 'API', category: 'INVESTIGATING', rawStatus: 'operational', openIssues: 1 },
            { name: 'Web', category: 'DEGRADED', rawStatus: 'partial_outage', openIssues: 1 },
            { name: 'Database', category: 'OUTAGE', rawStatus: 'major_outage', openIssues: 0 },
            { name: 'Jobs', category: 'RECOVERING', rawStatus: 'under_maintenance', openIssues: 0 },
            { name: 'Search', category: 'INVESTIGATING', rawStatus: 'something_else', openIssues: 0 },
        ]);
    });

    it('accepts components.json without incidents', () => {
        const body = JSON.stringify({ components: [{ id: 'a', name: 'API', status: 'degraded_performance' }] });

        expect(normalizer.normalize(body)).toEqual([
            { name: 'API', category: 'DEGRADED', rawStatus: 'degraded_performance', openIssues: 0 },
        ]);
    });

    it('fails with PreprocessParseError when components are missing', () => {
        const error = parseFailure(() => normalizer.normalize('{"page":{}}'));

        expect(error?.code).toBe('PreprocessParseError');
        expect(error?.message).toContain('components');
    });
});

describe('plugin registry', () => {
    it('looks plugins up by preprocessTarget', () => {
        expect(plugins.map(p => p.id)).toEqual(['microsoft365', 'statuspage']);
        expect(getPlugin('statuspage')?.defaultNamespace).toBe('Observability/Statuspage');
        expect(getPlugin('unknown')).toBeUndefined();
    });
});
