import { bugKey } from './bug';
import { SEVERITIES } from './types';
import type { Bug, CrawlReport, PageSummary, Severity } from './types';

export interface ReportInput {
    startUrl: string;
    pages: readonly PageSummary[];
    bugs: readonly Bug[];
    errors: readonly string[];
    cancelled: boolean;
    startedAt: string;
    finishedAt: string;
    /** Order bugs by URL then category instead of discovery order. */
    sort?: boolean;
}

const SEVERITY_RANK: Record<Severity, number> = { low: 0, medium: 1, high: 2 };

export function deduplicateBugs(bugs: readonly Bug[]): Bug[] {
    const seen = new Map<string, Bug>();
    for (const bug of bugs) {
        const key = bugKey(bug);
        if (!seen.has(key)) {
            seen.set(key, bug);
        }
    }
    return Array.from(seen.values());
}

/**
 * Deterministic order for crawls whose pages finish out of order.
 * Stable, so detector order survives within a URL and category.
 */
export function sortBugs(bugs: readonly Bug[]): Bug[] {
    return [...bugs].sort((a, b) => {
        if (a.url !== b.url) return a.url < b.url ? -1 : 1;
        if (a.category !== b.category) return a.category < b.category ? -1 : 1;
        return 0;
    });
}

export function countBySeverity(bugs: readonly Bug[]): Record<Severity, number> {
    const counts: Record<Severity, number> = { low: 0, medium: 0, high: 0 };
    for (const bug of bugs) {
        counts[bug.severity] += 1;
    }
    return counts;
}

export function countByCategory(bugs: readonly Bug[]): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const bug of bugs) {
        counts[bug.category] = (counts[bug.category] ?? 0) + 1;
    }
    return counts;
}

export function hasSeverityAtLeast(report: CrawlReport, severity: Severity): boolean {
    return SEVERITIES.some(s => SEVERITY_RANK[s] >= SEVERITY_RANK[severity] && report.perSeverityCounts[s] > 0);
}

export function buildReport(input: ReportInput): CrawlReport {
    const unique = deduplicateBugs(input.bugs);
    const bugs = input.sort ? sortBugs(unique) : unique;

    return Object.freeze({
        startUrl: input.startUrl,
        pagesVisited: input.pages.length,
        pages: Object.freeze(input.pages.map(page => Object.freeze({ ...page }))),
        bugs: Object.freeze(bugs),
        perSeverityCounts: Object.freeze(countBySeverity(bugs)),
        perCategoryCounts: Object.freeze(countByCategory(bugs)),
        errors: Object.freeze([...input.errors]),
        cancelled: input.cancelled,
        startedAt: input.startedAt,
        finishedAt: input.finishedAt
    });
}
