/**
 * Statuspage Normalizer
 *
 * Works on /api/v2/components.json and /api/v2/summary.json. Group
 * components are containers and are skipped. When the body carries
 * incidents (summary.json), unresolved incidents are attached to their
 * components; an operational component with an incident still under
 * investigation is reported as INVESTIGATING.
 */

import { z } from 'zod';
import type { Normalizer, ServiceStatus, StatusCategory } from '../types';
import { normalizeStatusKey, parseVendorBody } from '../utils';
import { CLOSED_INCIDENT_STATUSES, STATUS_MAP, name as vendorName } from './config';

const ComponentSchema = z.object({
    id: z.string(),
    name: z.string(),
    status: z.string(),
    group: z.boolean().optional(),
}).passthrough();

const IncidentSchema = z.object({
    status: z.string(),
    components: z.array(z.object({ id: z.string() }).passthrough()).optional(),
}).passthrough();

const ComponentsBodySchema = z.object({
    components: z.array(ComponentSchema),
    incidents: z.array(IncidentSchema).optional(),
});

const INVESTIGATION_STATUSES: ReadonlySet<string> = new Set(['investigating', 'identified']);

export function categorize(rawStatus: string): StatusCategory {
    return STATUS_MAP[normalizeStatusKey(rawStatus)] ?? 'INVESTIGATING';
}

export class StatuspageNormalizer implements Normalizer {
    normalize(body: string): ServiceStatus[] {
        const parsed = parseVendorBody(vendorName, body, ComponentsBodySchema);

        const openIncidents = new Map<string, number>();
        const investigated = new Set<string>();
        for (const incident of parsed.incidents ?? []) {
            const status = normalizeStatusKey(incident.status);
            if (CLOSED_INCIDENT_STATUSES.has(status)) continue;
            for (const component of incident.components ?? []) {
                openIncidents.set(component.id, (openIncidents.get(component.id) ?? 0) + 1);
                if (INVESTIGATION_STATUSES.has(status)) {
                    investigated.add(component.id);
                }
            }
        }

        return parsed.components
            .filter(component => component.group !== true)
            .map(component => {
                const base = categorize(component.status);
                return {
                    name: component.name,
                    category: base === 'OK' && investigated.has(component.id) ? 'INVESTIGATING' : base,
                    rawStatus: component.status,
                    openIssues: openIncidents.get(component.id) ?? 0,
                };
            });
    }
}
