import { errorMessage, isFatal, NavigationError } from './errors';
import { extractLinks } from './links';
import { runDetectors } from './pipeline';
import type { BrowserBackend, BugDetector, CrawlScope, DiscoveredLink, PageHandle, PageVisitResult } from './types';

export interface PageVisitorOptions {
    detectors: readonly BugDetector[];
    navigationTimeoutMs: number;
    settleTimeoutMs: number;
    detectorTimeoutMs: number;
}

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

export class PageVisitor {
    constructor(
        private readonly backend: BrowserBackend,
        private readonly options: PageVisitorOptions
    ) {}

    /**
     * Load one URL, run the detectors and collect its links. The page is
     * closed before this resolves, whatever happens in between.
     */
    async visit(url: string, scope: CrawlScope): Promise<PageVisitResult> {
        const startTime = Date.now();
        let page: PageHandle;

        try {
            page = await this.backend.open(url, this.options.navigationTimeoutMs);
        } catch (error) {
            if (error instanceof NavigationError) {
                console.error(`[Visitor] Navigation failed for ${url}: ${error.message}`);
                return this.failure(url, startTime, error.message, error.status);
            }
            throw error;
        }

        try {
            const settled = await page.waitForIdle(this.options.settleTimeoutMs);
            if (!settled) {
                console.log(`[Visitor] Network still active on ${url}, proceeding with scan`);
            }
            const loadTimeMs = Date.now() - startTime;

            const rejection = rejectResponse(page);
            if (rejection) {
                console.error(`[Visitor] ${url}: ${rejection.message}`);
                return this.failure(url, startTime, rejection.message, rejection.status);
            }

            const { bugs, failures } = await runDetectors(this.options.detectors, page, url, {
                timeoutMs: this.options.detectorTimeoutMs
            });

            const finalUrl = page.url() || url;
            const links = await this.collectLinks(page, finalUrl, url, scope);

            return {
                url,
                finalUrl,
                ok: true,
                status: page.response?.status ?? null,
                loadTimeMs,
                consoleErrors: [...page.consoleEvents()],
                failedRequests: [...page.failedRequests()],
                links,
                bugs,
                detectorFailures: failures
            };
        } finally {
            await page.close().catch((error: unknown) => {
                console.error(`[Visitor] Failed to close page for ${url}: ${errorMessage(error)}`);
            });
        }
    }

    private async collectLinks(page: PageHandle, baseUrl: string, url: string, scope: CrawlScope): Promise<DiscoveredLink[]> {
        try {
            return await extractLinks(page, baseUrl, scope);
        } catch (error) {
            if (isFatal(error)) throw error;
            console.error(`[Links] Could not extract links from ${url}: ${errorMessage(error)}`);
            return [];
        }
    }

    private failure(url: string, startTime: number, error: string, status?: number): PageVisitResult {
        return {
            url,
            finalUrl: url,
            ok: false,
            status: status ?? null,
            error,
            loadTimeMs: Date.now() - startTime,
            consoleErrors: [],
            failedRequests: [],
            links: [],
            bugs: [],
            detectorFailures: []
        };
    }
}

/**
 * A loaded document can still be unusable: an error status or a
 * non-HTML body gives detectors nothing meaningful to inspect.
 */
function rejectResponse(page: PageHandle): NavigationError | null {
    const response = page.response;
    if (!response) return null;

    if (response.status >= 400) {
        return new NavigationError(page.url(), `Page returned status ${response.status}`, {
            status: response.status
        });
    }

    const contentType = response.contentType?.split(';')[0]?.trim().toLowerCase();
    if (contentType && !HTML_CONTENT_TYPES.includes(contentType)) {
        return new NavigationError(page.url(), `Page is not an HTML document (${contentType})`);
    }

    return null;
}
