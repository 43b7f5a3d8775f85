/**
 * Microsoft 365 Normalizer
 *
 * Accepts both payload shapes the Graph API hands back:
 * - `{ value: [...] }` from /admin/serviceAnnouncement/healthOverviews
 * - `{ healthOverviews: [...], issues: [...] }` when overviews and issues
 *   are fetched together
 *
 * Open issues are matched to overviews by service name.
 */

import { z } from 'zod';
import type { Normalizer, ServiceStatus, StatusCategory } from '../types';
import { normalizeStatusKey, parseVendorBody } from '../utils';
import {
    CLOSED_ISSUE_STATUSES,
    DEFAULT_SEVERITY,
    ISSUE_SEVERITY_SCORE,
    STATUS_MAP,
    STATUS_SEVERITY,
    name as vendorName,
} from './config';

// ============================================================================
// SCHEMA
// ============================================================================

const HealthOverviewSchema = z.object({
    id: z.string().optional(),
    service: z.string().optional(),
    status: z.string().nullable().optional(),
}).passthrough();

const IssueSchema = z.object({
    service: z.string().nullable().optional(),
    affectedWorkload: z.string().nullable().optional(),
    status: z.string().nullable().optional(),
    severity: z.string().nullable().optional(),
}).passthrough();

const CombinedSchema = z.object({
    healthOverviews: z.array(HealthOverviewSchema).nullable().optional(),
    issues: z.array(IssueSchema).nullable().optional(),
}).refine(
    body => body.healthOverviews !== undefined || body.issues !== undefined,
    'expected healthOverviews or issues'
);

const ValueSchema = z.object({
    value: z.array(HealthOverviewSchema),
});

const ServiceAnnouncementSchema = z.union([CombinedSchema, ValueSchema]);

type HealthOverview = z.infer<typeof HealthOverviewSchema>;
type Issue = z.infer<typeof IssueSchema>;

// ============================================================================
// NORMALIZER
// ============================================================================

export function categorize(rawStatus: string | null | undefined): StatusCategory {
    return STATUS_MAP[normalizeStatusKey(rawStatus)] ?? 'INVESTIGATING';
}

export function statusSeverity(rawStatus: string | null | undefined): number {
    return STATUS_SEVERITY[normalizeStatusKey(rawStatus)] ?? DEFAULT_SEVERITY;
}

function issueSeverity(issue: Issue): number {
    return ISSUE_SEVERITY_SCORE[(issue.severity ?? '').toLowerCase()] ?? DEFAULT_SEVERITY;
}

function isIssueOpen(issue: Issue): boolean {
    return !CLOSED_ISSUE_STATUSES.has(normalizeStatusKey(issue.status));
}

export class Microsoft365Normalizer implements Normalizer {
    normalize(body: string): ServiceStatus[] {
        const parsed = parseVendorBody(vendorName, body, ServiceAnnouncementSchema);

        let overviews: HealthOverview[];
        let issues: Issue[];
        if ('value' in parsed) {
            overviews = parsed.value;
            issues = [];
        } else {
            overviews = parsed.healthOverviews ?? [];
            issues = parsed.issues ?? [];
        }

        const openIssuesByService = new Map<string, Issue[]>();
        for (const issue of issues) {
            const service = issue.service ?? issue.affectedWorkload;
            if (service && isIssueOpen(issue)) {
                const list = openIssuesByService.get(service) ?? [];
                list.push(issue);
                openIssuesByService.set(service, list);
            }
        }

        return overviews.map(overview => {
            const serviceName = overview.service ?? overview.id ?? 'unknown';
            const rawStatus = overview.status ?? null;
            const openIssues = openIssuesByService.get(serviceName) ?? [];
            const highestIncidentSeverity = Math.max(0, ...openIssues.map(issueSeverity));
            return {
                name: serviceName,
                category: categorize(rawStatus),
                rawStatus,
                openIssues: openIssues.length,
                severity: Math.max(statusSeverity(rawStatus), highestIncidentSeverity),
                highestIncidentSeverity,
            };
        });
    }
}
