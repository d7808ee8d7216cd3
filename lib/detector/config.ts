import { z } from 'zod';
import { CrawlerError } from './errors';

export const ViewportSchema = z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    label: z.string().optional(),
    isMobile: z.boolean().optional()
});

export const DESKTOP_VIEWPORT = { width: 1280, height: 800, label: 'Desktop' } as const;
export const MOBILE_VIEWPORT = { width: 390, height: 844, label: 'Mobile', isMobile: true } as const;

// Largest delay setTimeout honours; anything above fires after 1ms
export const MAX_TIMER_MS = 2_147_483_647;

export const CrawlOptionsSchema = z.object({
    /** Unlimited when omitted; the crawl is then bounded by maxPages alone. */
    maxDepth: z.number().int().nonnegative().optional(),
    concurrency: z.number().int().min(1).max(8).default(1),
    navigationTimeoutMs: z.number().int().positive().max(MAX_TIMER_MS).default(20000),
    settleTimeoutMs: z.number().int().nonnegative().max(MAX_TIMER_MS).default(10000),
    detectorTimeoutMs: z.number().int().positive().max(MAX_TIMER_MS).default(30000),
    requestDelayMs: z.number().int().nonnegative().max(MAX_TIMER_MS).default(0),
    headless: z.boolean().default(true),
    viewport: ViewportSchema.default(DESKTOP_VIEWPORT),
    scopeOrigin: z.string().url().optional(),
    allowedPathPatterns: z.array(z.instanceof(RegExp)).optional(),
    excludedPathPatterns: z.array(z.instanceof(RegExp)).optional()
});

export type CrawlOptions = z.output<typeof CrawlOptionsSchema>;
export type CrawlOptionsInput = z.input<typeof CrawlOptionsSchema>;

export const DEFAULT_CRAWL_OPTIONS: CrawlOptions = CrawlOptionsSchema.parse({});

export class ConfigError extends CrawlerError {
    constructor(readonly issues: string[]) {
        super(`Invalid crawl options: ${issues.join('; ')}`);
    }
}

export function parseCrawlOptions(input: unknown): CrawlOptions {
    const result = CrawlOptionsSchema.safeParse(input ?? {});
    if (!result.success) {
        throw new ConfigError(
            result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return result.data;
}
