import * as fs from 'fs';
import * as path from 'path';
import { SEVERITIES } from './types';
import type { Bug, CrawlReport, Severity } from './types';

export type ReportFormat = 'json' | 'html' | 'both';

export const REPORT_FORMATS: readonly ReportFormat[] = ['json', 'html', 'both'];

const TOOL_NAME = 'Site Bug Crawler';

const SEVERITY_ICONS: Record<Severity, string> = {
    high: '🔴',
    medium: '🟡',
    low: '🔵'
};

const SEVERITY_COLORS: Record<Severity, string> = {
    high: '#ea580c',
    medium: '#ca8a04',
    low: '#2563eb'
};

const HIGHEST_FIRST: readonly Severity[] = [...SEVERITIES].reverse();

export interface JsonReport {
    tool: string;
    startUrl: string;
    pagesVisited: number;
    startedAt: string;
    finishedAt: string;
    cancelled: boolean;
    summary: {
        totalBugs: number;
        bySeverity: Record<Severity, number>;
        byCategory: Record<string, number>;
    };
    pages: CrawlReport['pages'];
    bugs: CrawlReport['bugs'];
    errors: CrawlReport['errors'];
}

export function toJsonReport(report: CrawlReport): JsonReport {
    return {
        tool: TOOL_NAME,
        startUrl: report.startUrl,
        pagesVisited: report.pagesVisited,
        startedAt: report.startedAt,
        finishedAt: report.finishedAt,
        cancelled: report.cancelled,
        summary: {
            totalBugs: report.bugs.length,
            bySeverity: { ...report.perSeverityCounts },
            byCategory: { ...report.perCategoryCounts }
        },
        pages: report.pages,
        bugs: report.bugs,
        errors: report.errors
    };
}

/**
 * Pretty-print findings to the terminal.
 */
export function printReport(report: CrawlReport, log: (line: string) => void = console.log): void {
    log('');
    log('═'.repeat(60));
    log(`  CRAWL REPORT: ${report.startUrl}`);
    log(`  Pages visited: ${report.pagesVisited}`);
    log(`  Bugs found:    ${report.bugs.length}`);
    if (report.cancelled) {
        log('  (crawl was cancelled before the frontier was exhausted)');
    }
    log('═'.repeat(60));

    for (const severity of HIGHEST_FIRST) {
        const bugs = report.bugs.filter(bug => bug.severity === severity);
        if (bugs.length === 0) continue;

        log('');
        log(`${SEVERITY_ICONS[severity]} ${severity.toUpperCase()} (${bugs.length})`);
        for (const bug of bugs) {
            log(`  [${bug.category}] ${bug.title}`);
            log(`    URL: ${bug.url}`);
            log(`    ${bug.description.slice(0, 120)}`);
        }
    }

    if (report.errors.length > 0) {
        log('');
        log(`⚠️  CRAWLER ERRORS (${report.errors.length})`);
        for (const error of report.errors) {
            log(`  ${error.slice(0, 120)}`);
        }
    }

    log('');
}

export function escapeHtml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

function renderBugRow(bug: Bug): string {
    const color = SEVERITY_COLORS[bug.severity];
    return `
        <tr data-severity="${bug.severity}" data-category="${escapeHtml(bug.category)}">
            <td><span class="badge" style="background:${color}">${bug.severity.toUpperCase()}</span></td>
            <td>${escapeHtml(bug.category)}</td>
            <td>${escapeHtml(bug.title)}</td>
            <td class="desc">${escapeHtml(bug.description)}</td>
            <td class="url"><a href="${escapeHtml(bug.url)}" target="_blank" rel="noopener">${escapeHtml(bug.url)}</a></td>
        </tr>`;
}

/**
 * Self-contained HTML report with severity/category filtering.
 */
export function renderHtmlReport(report: CrawlReport): string {
    const severityBadges = HIGHEST_FIRST
        .filter(severity => report.perSeverityCounts[severity] > 0)
        .map(severity =>
            `<span class="badge" style="background:${SEVERITY_COLORS[severity]}">${severity.toUpperCase()}: ${report.perSeverityCounts[severity]}</span>`
        )
        .join(' ');

    const categories = Object.entries(report.perCategoryCounts).sort((a, b) => b[1] - a[1]);
    const categoryBadges = categories
        .map(([category, count]) => `<span class="badge badge-cat">${escapeHtml(category)}: ${count}</span>`)
        .join(' ');
    const categoryOptions = categories
        .map(([category]) => category)
        .sort()
        .map(category => `<option value="${escapeHtml(category)}">${escapeHtml(category)}</option>`)
        .join('');

    const severityOptions = HIGHEST_FIRST
        .map(severity => `<option value="${severity}">${severity[0]?.toUpperCase()}${severity.slice(1)}</option>`)
        .join('');

    const startUrl = escapeHtml(report.startUrl);

    return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${TOOL_NAME} Report: ${startUrl}</title>
<style>
    * { margin: 0; padding: 0; box-sizing: border-box; }
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
           background: #0f172a; color: #e2e8f0; padding: 2rem; }
    h1 { font-size: 1.8rem; margin-bottom: 0.25rem; }
    .subtitle { color: #94a3b8; margin-bottom: 1.5rem; }
    .stats { display: flex; gap: 2rem; margin-bottom: 1.5rem; flex-wrap: wrap; }
    .stat { background: #1e293b; border-radius: 8px; padding: 1rem 1.5rem; }
    .stat-value { font-size: 1.5rem; font-weight: 700; }
    .stat-label { color: #94a3b8; font-size: 0.85rem; }
    .badges { margin-bottom: 1rem; }
    .badge { display: inline-block; padding: 0.2rem 0.6rem; border-radius: 4px;
             font-size: 0.75rem; font-weight: 600; color: white; margin: 2px; }
    .badge-cat { background: #334155; color: #e2e8f0; }
    .filters { margin-bottom: 1rem; display: flex; gap: 0.5rem; flex-wrap: wrap; }
    .filters select { background: #1e293b; color: #e2e8f0; border: 1px solid #334155;
                      padding: 0.4rem 0.8rem; border-radius: 6px; }
    table { width: 100%; border-collapse: collapse; }
    th { text-align: left; padding: 0.6rem 0.8rem; background: #1e293b; border-bottom: 2px solid #334155;
         font-size: 0.8rem; text-transform: uppercase; color: #94a3b8; }
    td { padding: 0.6rem 0.8rem; border-bottom: 1px solid #1e293b; font-size: 0.85rem; vertical-align: top; }
    tr:hover { background: #1e293b; }
    .desc { max-width: 350px; word-break: break-word; }
    .url { max-width: 250px; word-break: break-all; }
    a { color: #60a5fa; text-decoration: none; }
    a:hover { text-decoration: underline; }
</style>
</head>
<body>
    <h1>${TOOL_NAME} Report</h1>
    <p class="subtitle">${startUrl}</p>

    <div class="stats">
        <div class="stat">
            <div class="stat-value">${report.pagesVisited}</div>
            <div class="stat-label">Pages Visited</div>
        </div>
        <div class="stat">
            <div class="stat-value">${report.bugs.length}</div>
            <div class="stat-label">Bugs Found</div>
        </div>
        <div class="stat">
            <div class="stat-value">${report.perSeverityCounts.high}</div>
            <div class="stat-label">High Severity</div>
        </div>
    </div>

    <div class="badges">${severityBadges}</div>
    <div class="badges">${categoryBadges}</div>

    <div class="filters">
        <select id="filterSeverity" onchange="applyFilters()">
            <option value="">All Severities</option>
            ${severityOptions}
        </select>
        <select id="filterCategory" onchange="applyFilters()">
            <option value="">All Categories</option>
            ${categoryOptions}
        </select>
    </div>

    <table>
        <thead>
            <tr>
                <th>Severity</th>
                <th>Category</th>
                <th>Title</th>
                <th>Description</th>
                <th>URL</th>
            </tr>
        </thead>
        <tbody id="bugTable">${report.bugs.map(renderBugRow).join('')}
        </tbody>
    </table>

    <script>
        function applyFilters() {
            const sev = document.getElementById('filterSeverity').value;
            const cat = document.getElementById('filterCategory').value;
            document.querySelectorAll('#bugTable tr').forEach(row => {
                const matchSev = !sev || row.dataset.severity === sev;
                const matchCat = !cat || row.dataset.category === cat;
                row.style.display = (matchSev && matchCat) ? '' : 'none';
            });
        }
    </script>
</body>
</html>
`;
}

export function htmlPathFor(outputPath: string): string {
    return outputPath.endsWith('.json') ? outputPath.replace(/\.json$/, '.html') : `${outputPath}.html`;
}

export function jsonPathFor(outputPath: string): string {
    return outputPath.endsWith('.json') ? outputPath : `${outputPath}.json`;
}

/**
 * Write the report in the requested format(s). Returns the absolute paths written.
 */
export function writeReports(report: CrawlReport, outputPath: string, format: ReportFormat): string[] {
    const written: string[] = [];

    if (format === 'json' || format === 'both') {
        const jsonPath = path.resolve(jsonPathFor(outputPath));
        fs.mkdirSync(path.dirname(jsonPath), { recursive: true });
        fs.writeFileSync(jsonPath, JSON.stringify(toJsonReport(report), null, 2));
        written.push(jsonPath);
    }

    if (format === 'html' || format === 'both') {
        const htmlPath = path.resolve(htmlPathFor(outputPath));
        fs.mkdirSync(path.dirname(htmlPath), { recursive: true });
        fs.writeFileSync(htmlPath, renderHtmlReport(report));
        written.push(htmlPath);
    }

    return written;
}
