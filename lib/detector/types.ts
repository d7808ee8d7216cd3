export type Severity = 'low' | 'medium' | 'high';

// Ascending order; reporters iterate it reversed.
export const SEVERITIES: readonly Severity[] = ['low', 'medium', 'high'];

export type KnownCategory =
    | 'console'
    | 'broken-link'
    | 'overflow'
    | 'accessibility'
    | 'seo'
    | 'dead-click'
    | 'mobile';

// Any string is accepted so custom detectors can add their own categories.
export type BugCategory = KnownCategory | (string & {});

export type Evidence = Readonly<Record<string, unknown>>;

export interface Bug {
    readonly url: string;
    readonly category: BugCategory;
    readonly severity: Severity;
    readonly title: string;
    readonly description: string;
    readonly selector?: string;
    readonly evidence?: Evidence;
}

export interface Viewport {
    width: number;
    height: number;
    label?: string;
    isMobile?: boolean;
}

export interface NavigationResponse {
    status: number;
    contentType: string | null;
}

export interface ConsoleEvent {
    type: 'console.error' | 'pageerror';
    text: string;
}

export interface FailedRequest {
    url: string;
    resourceType: string;
    status?: number;
    errorText?: string;
}

/**
 * A live browser page. Only valid for the duration of a single visit;
 * detectors must not keep a reference to it after `detect` returns.
 */
export interface PageHandle {
    /** Main document response, or null for URLs without one (file:, about:). */
    readonly response: NavigationResponse | null;
    url(): string;
    evaluate(script: string): Promise<unknown>;
    /** Resolves false when the network did not settle in time. */
    waitForIdle(timeoutMs: number): Promise<boolean>;
    consoleEvents(): readonly ConsoleEvent[];
    failedRequests(): readonly FailedRequest[];
    /** Sends a HEAD request from the page's context and returns the HTTP status. */
    probe(target: string, timeoutMs: number): Promise<number>;
    viewport(): Viewport | null;
    setViewport(viewport: Viewport): Promise<void>;
    close(): Promise<void>;
}

export interface BrowserBackend {
    /**
     * Navigate a fresh page to `url`. Rejects with NavigationError when the page
     * cannot be loaded and with BrowserUnavailableError when the browser is gone.
     */
    open(url: string, timeoutMs: number): Promise<PageHandle>;
    close(): Promise<void>;
}

export interface BugDetector {
    readonly name: string;
    detect(page: PageHandle, url: string): Promise<readonly Bug[]>;
}

export interface DetectorFailure {
    detector: string;
    url: string;
    message: string;
}

export interface CrawlScope {
    origin: string;
    allowedPathPatterns?: RegExp[];
    excludedPathPatterns?: RegExp[];
}

export interface DiscoveredLink {
    /** Canonical form; identifies the page in the visited and queued sets. */
    key: string;
    /** Absolute address as the page wrote it, fragment removed. This is what gets loaded. */
    target: string;
}

export interface PageVisitResult {
    url: string;
    /** Where the browser ended up after redirects. */
    finalUrl: string;
    ok: boolean;
    status: number | null;
    error?: string;
    loadTimeMs: number;
    consoleErrors: readonly ConsoleEvent[];
    failedRequests: readonly FailedRequest[];
    links: readonly DiscoveredLink[];
    bugs: readonly Bug[];
    detectorFailures: readonly DetectorFailure[];
}

export interface PageSummary {
    readonly url: string;
    readonly ok: boolean;
    readonly status: number | null;
    readonly loadTimeMs: number;
    readonly bugCount: number;
    readonly error?: string;
}

export interface CrawlReport {
    readonly startUrl: string;
    readonly pagesVisited: number;
    readonly pages: readonly PageSummary[];
    readonly bugs: readonly Bug[];
    readonly perSeverityCounts: Readonly<Record<Severity, number>>;
    readonly perCategoryCounts: Readonly<Record<string, number>>;
    readonly errors: readonly string[];
    readonly cancelled: boolean;
    readonly startedAt: string;
    readonly finishedAt: string;
}

// Progress callback for streaming updates
export interface CrawlProgress {
    currentPage: string;
    pagesVisited: number;
    totalPagesQueued: number;
    currentDepth: number;
    status: 'crawling' | 'complete' | 'cancelled';
}

export type ProgressCallback = (progress: CrawlProgress) => void;
