export { Crawler, crawl } from './crawler';
export type { CrawlerSettings } from './crawler';
export { PageVisitor } from './visitor';
export type { PageVisitorOptions } from './visitor';
export { runDetectors } from './pipeline';
export type { PipelineOptions, PipelineResult } from './pipeline';
export { extractLinks } from './links';
export { buildReport, countByCategory, countBySeverity, deduplicateBugs, hasSeverityAtLeast, sortBugs } from './report';
export { createBug, toBugs, bugKey, unreachablePageBug } from './bug';
export type { BugFields } from './bug';
export { launchEngine, PlaywrightEngine } from './engine';
export type { EngineOptions } from './engine';
export {
    ConfigError,
    CrawlOptionsSchema,
    DEFAULT_CRAWL_OPTIONS,
    DESKTOP_VIEWPORT,
    MAX_TIMER_MS,
    MOBILE_VIEWPORT,
    parseCrawlOptions
} from './config';
export type { CrawlOptions, CrawlOptionsInput } from './config';
export {
    BrowserUnavailableError,
    CrawlerError,
    DetectorTimeoutError,
    InvalidUrlError,
    NavigationError,
    isFatal
} from './errors';
export { isSameOrigin, normalizeUrl, resolveUrl, shouldCrawl } from './url-utils';
export { printReport, renderHtmlReport, toJsonReport, writeReports } from './reporter';
export type { JsonReport, ReportFormat } from './reporter';
export * from './checks';
export { SEVERITIES } from './types';
export type {
    BrowserBackend,
    Bug,
    BugCategory,
    BugDetector,
    ConsoleEvent,
    CrawlProgress,
    CrawlReport,
    CrawlScope,
    DetectorFailure,
    DiscoveredLink,
    Evidence,
    FailedRequest,
    KnownCategory,
    NavigationResponse,
    PageHandle,
    PageSummary,
    PageVisitResult,
    ProgressCallback,
    Severity,
    Viewport
} from './types';
