import { unreachablePageBug } from './bug';
import { DEFAULT_DETECTORS } from './checks';
import { parseCrawlOptions } from './config';
import type { CrawlOptions, CrawlOptionsInput } from './config';
import { launchEngine } from './engine';
import { errorMessage, InvalidUrlError } from './errors';
import { buildReport } from './report';
import { getRelativePath, normalizeUrl, originOf, resolveUrl, sleep } from './url-utils';
import { PageVisitor } from './visitor';
import type {
    BrowserBackend,
    Bug,
    BugDetector,
    CrawlProgress,
    CrawlReport,
    CrawlScope,
    PageSummary,
    PageVisitResult,
    ProgressCallback
} from './types';

export interface CrawlerSettings extends CrawlOptionsInput {
    /** Ordered detector list; defaults to DEFAULT_DETECTORS. */
    detectors?: readonly BugDetector[];
    /** Caller-owned backend. When omitted a Playwright browser is launched per run. */
    backend?: BrowserBackend;
    onProgress?: ProgressCallback;
    signal?: AbortSignal;
}

interface FrontierEntry {
    /** Address to load, as the linking page wrote it. */
    url: string;
    /** Canonical form used for deduplication. */
    key: string;
    depth: number;
}

export class Crawler {
    private readonly options: CrawlOptions;
    private readonly detectors: readonly BugDetector[];
    private readonly backend?: BrowserBackend;
    private readonly onProgress?: ProgressCallback;
    private readonly externalSignal?: AbortSignal;
    private abortController = new AbortController();

    constructor(settings: CrawlerSettings = {}) {
        const { detectors, backend, onProgress, signal, ...options } = settings;
        this.options = parseCrawlOptions(options);
        this.detectors = detectors ?? DEFAULT_DETECTORS;
        this.backend = backend;
        this.onProgress = onProgress;
        this.externalSignal = signal;
    }

    /**
     * Cancel an in-progress crawl. Takes effect before the next page visit.
     */
    cancel(): void {
        this.abortController.abort();
    }

    /**
     * Breadth-first crawl from `startUrl`, visiting at most `maxPages` pages.
     */
    async run(startUrl: string, maxPages: number): Promise<CrawlReport> {
        this.abortController = new AbortController();
        const startedAt = new Date().toISOString();

        const normalizedStart = normalizeUrl(startUrl);
        const startTarget = resolveUrl(startUrl);
        if (!normalizedStart || !startTarget) {
            throw new InvalidUrlError(startUrl);
        }
        const seed: FrontierEntry = { url: startTarget, key: normalizedStart, depth: 0 };

        const limit = Number.isNaN(maxPages) ? 0 : Math.floor(maxPages);
        if (limit <= 0) {
            return buildReport({
                startUrl: normalizedStart,
                pages: [],
                bugs: [],
                errors: [],
                cancelled: false,
                startedAt,
                finishedAt: new Date().toISOString()
            });
        }

        const scope: CrawlScope = {
            origin: this.options.scopeOrigin ?? originOf(normalizedStart) ?? normalizedStart,
            allowedPathPatterns: this.options.allowedPathPatterns,
            excludedPathPatterns: this.options.excludedPathPatterns
        };

        const ownsBackend = this.backend === undefined;
        const backend = this.backend ?? await launchEngine({
            headless: this.options.headless,
            viewport: this.options.viewport
        });

        try {
            return await this.traverse(backend, seed, limit, scope, startedAt);
        } finally {
            if (ownsBackend) {
                await backend.close().catch((error: unknown) => {
                    console.error(`[Crawler] Failed to close browser: ${errorMessage(error)}`);
                });
            }
        }
    }

    private async traverse(
        backend: BrowserBackend,
        seed: FrontierEntry,
        maxPages: number,
        scope: CrawlScope,
        startedAt: string
    ): Promise<CrawlReport> {
        const visitor = new PageVisitor(backend, {
            detectors: this.detectors,
            navigationTimeoutMs: this.options.navigationTimeoutMs,
            settleTimeoutMs: this.options.settleTimeoutMs,
            detectorTimeoutMs: this.options.detectorTimeoutMs
        });

        const frontier: FrontierEntry[] = [seed];
        const queued = new Set<string>([seed.key]);
        // Canonical keys of every page loaded, including where redirects landed
        const visited = new Set<string>();
        let dispatched = 0;
        const pages: PageSummary[] = [];
        const bugs: Bug[] = [];
        const errors: string[] = [];
        let cancelled = false;

        console.log(`[Crawler] Starting crawl of ${seed.url} (max ${maxPages} pages)`);

        while (frontier.length > 0 && dispatched < maxPages) {
            if (this.isAborted()) {
                console.log('[Crawler] Crawl cancelled');
                cancelled = true;
                break;
            }

            // Dequeue a batch; membership is checked again here, not only on enqueue
            const batch: FrontierEntry[] = [];
            while (batch.length < this.options.concurrency && frontier.length > 0 && dispatched < maxPages) {
                const entry = frontier.shift();
                if (!entry) break;
                queued.delete(entry.key);
                if (visited.has(entry.key)) continue;
                visited.add(entry.key);
                dispatched += 1;
                batch.push(entry);
            }

            if (batch.length === 0) break;

            this.reportProgress({
                currentPage: batch.map(entry => getRelativePath(entry.url)).join(', '),
                pagesVisited: pages.length,
                totalPagesQueued: frontier.length + dispatched,
                currentDepth: batch[0]?.depth ?? 0,
                status: 'crawling'
            });

            const results = await Promise.all(batch.map(entry => visitor.visit(entry.url, scope)));

            results.forEach((result, index) => {
                const entry = batch[index];
                if (!entry) return;

                const pageBugs = this.collectPage(result, errors);
                bugs.push(...pageBugs);
                pages.push(summarize(result, pageBugs.length));

                const landedOn = normalizeUrl(result.finalUrl);
                if (landedOn) visited.add(landedOn);

                if (!result.ok) return;
                if (this.options.maxDepth !== undefined && entry.depth >= this.options.maxDepth) return;

                for (const link of result.links) {
                    if (visited.has(link.key) || queued.has(link.key)) continue;
                    queued.add(link.key);
                    frontier.push({ url: link.target, key: link.key, depth: entry.depth + 1 });
                }
            });

            if (this.options.requestDelayMs > 0 && frontier.length > 0) {
                await sleep(this.options.requestDelayMs);
            }
        }

        this.reportProgress({
            currentPage: '',
            pagesVisited: pages.length,
            totalPagesQueued: pages.length,
            currentDepth: 0,
            status: cancelled ? 'cancelled' : 'complete'
        });

        console.log(`[Crawler] Done. Visited ${pages.length} pages, found ${bugs.length} bugs.`);

        return buildReport({
            startUrl: seed.key,
            pages,
            bugs,
            errors,
            cancelled,
            startedAt,
            finishedAt: new Date().toISOString(),
            sort: this.options.concurrency > 1
        });
    }

    private collectPage(result: PageVisitResult, errors: string[]): Bug[] {
        for (const failure of result.detectorFailures) {
            errors.push(`Detector ${failure.detector} failed on ${failure.url}: ${failure.message}`);
        }

        if (result.ok) {
            return [...result.bugs];
        }

        errors.push(`Failed to load ${result.url}: ${result.error ?? 'unknown error'}`);
        return [unreachablePageBug(result.url, result.error ?? 'Navigation failed', result.status ?? undefined)];
    }

    private isAborted(): boolean {
        return this.abortController.signal.aborted || this.externalSignal?.aborted === true;
    }

    /**
     * Report progress to callback if provided
     */
    private reportProgress(progress: CrawlProgress): void {
        if (this.onProgress) {
            try {
                this.onProgress(progress);
            } catch (error) {
                console.error('[Crawler] Progress callback error:', error);
            }
        }
    }
}

function summarize(result: PageVisitResult, bugCount: number): PageSummary {
    return {
        url: result.url,
        ok: result.ok,
        status: result.status,
        loadTimeMs: result.loadTimeMs,
        bugCount,
        ...(result.error !== undefined ? { error: result.error } : {})
    };
}

/**
 * One-shot helper: crawl with the default detectors and settings.
 */
export function crawl(startUrl: string, maxPages: number, settings: CrawlerSettings = {}): Promise<CrawlReport> {
    return new Crawler(settings).run(startUrl, maxPages);
}
