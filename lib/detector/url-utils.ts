/**
 * URL Utilities for Crawler
 * Handles URL normalization and crawl-scope decisions
 */

import type { CrawlScope } from './types';

// Skip common non-page resources
const SKIP_EXTENSIONS = [
    '.jpg', '.jpeg', '.png', '.gif', '.webp', '.svg', '.ico',
    '.pdf', '.zip', '.tar', '.gz',
    '.css', '.js', '.json', '.xml',
    '.mp3', '.mp4', '.wav', '.avi', '.mov',
    '.woff', '.woff2', '.ttf', '.eot',
    '.map'
];

const SKIP_PATHS = ['/api/', '/_next/', '/static/', '/assets/', '/cdn-cgi/'];

/**
 * Normalize a URL to a canonical form for deduplication
 * - Removes trailing slashes (except for root)
 * - Removes fragments (#...)
 * - Sorts query parameters
 * - Lowercases hostname
 * - Removes default ports
 */
export function normalizeUrl(url: string, base?: string): string | null {
    try {
        const parsed = base ? new URL(url, base) : new URL(url);

        parsed.hostname = parsed.hostname.toLowerCase();

        if ((parsed.protocol === 'http:' && parsed.port === '80') ||
            (parsed.protocol === 'https:' && parsed.port === '443')) {
            parsed.port = '';
        }

        parsed.hash = '';

        if (parsed.search) {
            const params = new URLSearchParams(parsed.search);
            const sortedParams = new URLSearchParams([...params.entries()].sort(([a], [b]) => a.localeCompare(b)));
            parsed.search = sortedParams.toString();
        }

        let normalized = parsed.href;

        if (parsed.pathname !== '/' && parsed.pathname.endsWith('/')) {
            normalized = normalized.replace(/\/(\?|$)/, '$1');
        }

        return normalized;
    } catch {
        return null;
    }
}

/**
 * Resolve a reference to an absolute URL without canonicalizing it:
 * query order and encoding stay exactly as written.
 */
export function resolveUrl(url: string, base?: string): string | null {
    try {
        const parsed = base ? new URL(url, base) : new URL(url);
        parsed.hash = '';
        return parsed.href;
    } catch {
        return null;
    }
}

/**
 * Check if a URL is from the same origin
 */
export function isSameOrigin(url: string, baseOrigin: string): boolean {
    try {
        const parsedUrl = new URL(url, baseOrigin);
        const parsedBase = new URL(baseOrigin);
        return parsedUrl.origin === parsedBase.origin;
    } catch {
        return false;
    }
}

export function originOf(url: string): string | null {
    try {
        const origin = new URL(url).origin;
        return origin === 'null' ? null : origin;
    } catch {
        return null;
    }
}

/**
 * Determine if a discovered URL is in scope for traversal.
 * The seed URL is never passed through here.
 */
export function shouldCrawl(url: string, scope: CrawlScope): boolean {
    if (!isSameOrigin(url, scope.origin)) {
        return false;
    }

    try {
        const parsed = new URL(url, scope.origin);
        if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
            return false;
        }

        const pathname = parsed.pathname.toLowerCase();

        if (SKIP_EXTENSIONS.some(ext => pathname.endsWith(ext))) {
            return false;
        }

        if (SKIP_PATHS.some(path => pathname.includes(path))) {
            return false;
        }

        if (scope.excludedPathPatterns?.some(pattern => pattern.test(pathname))) {
            return false;
        }

        // If specified, URL must match at least one
        if (scope.allowedPathPatterns && scope.allowedPathPatterns.length > 0) {
            if (!scope.allowedPathPatterns.some(pattern => pattern.test(pathname))) {
                return false;
            }
        }

        return true;
    } catch {
        return false;
    }
}

/**
 * Get a relative path from a full URL for display
 */
export function getRelativePath(url: string): string {
    try {
        const parsed = new URL(url);
        return parsed.pathname + parsed.search;
    } catch {
        return url;
    }
}

/**
 * Sleep utility for rate limiting
 */
export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
