import { chromium, errors } from 'playwright';
import type { Browser, BrowserContext, Page, Response } from 'playwright';
import { DESKTOP_VIEWPORT } from './config';
import { BrowserUnavailableError, errorMessage, NavigationError } from './errors';
import type {
    BrowserBackend,
    ConsoleEvent,
    FailedRequest,
    NavigationResponse,
    PageHandle,
    Viewport
} from './types';

const DESKTOP_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
const MOBILE_USER_AGENT =
    'Mozilla/5.0 (iPhone; CPU iPhone OS 16_0 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/16.0 Mobile/15E148 Safari/604.1';

// Console noise that says nothing about the page's own scripts
const IGNORED_CONSOLE_PATTERNS = ['Failed to load resource', 'net::ERR_', '[violation]'];

export interface EngineOptions {
    headless?: boolean;
    viewport?: Viewport;
    userAgent?: string;
}

export async function launchEngine(options: EngineOptions = {}): Promise<PlaywrightEngine> {
    try {
        const browser = await chromium.launch({ headless: options.headless ?? true });
        return new PlaywrightEngine(browser, options);
    } catch (error) {
        throw new BrowserUnavailableError(`Could not launch chromium: ${errorMessage(error)}`, { cause: error });
    }
}

export class PlaywrightEngine implements BrowserBackend {
    private readonly viewport: Viewport;

    constructor(
        private readonly browser: Browser,
        private readonly options: EngineOptions = {}
    ) {
        this.viewport = options.viewport ?? DESKTOP_VIEWPORT;
    }

    async open(url: string, timeoutMs: number): Promise<PageHandle> {
        const context = await this.newContext();
        const page = await context.newPage().catch(async (error: unknown) => {
            await closeContext(context);
            throw this.unavailable('Could not open a new page', error);
        });

        // Listeners go on before navigation so the page sees only its own signals
        const consoleEvents: ConsoleEvent[] = [];
        const failedRequests: FailedRequest[] = [];

        page.on('console', msg => {
            if (msg.type() !== 'error') return;
            const text = msg.text();
            if (!IGNORED_CONSOLE_PATTERNS.some(pattern => text.includes(pattern))) {
                consoleEvents.push({ type: 'console.error', text });
            }
        });
        page.on('pageerror', exception => {
            consoleEvents.push({ type: 'pageerror', text: exception.message });
        });
        page.on('requestfailed', request => {
            failedRequests.push({
                url: request.url(),
                resourceType: request.resourceType(),
                errorText: request.failure()?.errorText ?? 'unknown'
            });
        });
        page.on('response', response => {
            if (response.status() >= 400) {
                failedRequests.push({
                    url: response.url(),
                    resourceType: response.request().resourceType(),
                    status: response.status()
                });
            }
        });

        let response: Response | null;
        try {
            response = await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
        } catch (error) {
            await closeContext(context);
            if (!this.browser.isConnected()) {
                throw this.unavailable(`Browser disconnected while loading ${url}`, error);
            }
            const reason = error instanceof errors.TimeoutError
                ? `Navigation timed out after ${timeoutMs}ms`
                : errorMessage(error).split('\n')[0] ?? 'Navigation failed';
            throw new NavigationError(url, reason, { cause: error });
        }

        const navigation: NavigationResponse | null = response
            ? { status: response.status(), contentType: response.headers()['content-type'] ?? null }
            : null;

        return new PlaywrightPageHandle(context, page, navigation, consoleEvents, failedRequests);
    }

    async close(): Promise<void> {
        if (this.browser.isConnected()) {
            await this.browser.close();
        }
    }

    private async newContext(): Promise<BrowserContext> {
        if (!this.browser.isConnected()) {
            throw new BrowserUnavailableError('Browser is no longer connected');
        }
        const isMobile = this.viewport.isMobile ?? false;
        try {
            return await this.browser.newContext({
                viewport: { width: this.viewport.width, height: this.viewport.height },
                deviceScaleFactor: isMobile ? 3 : 1,
                isMobile,
                hasTouch: isMobile,
                userAgent: this.options.userAgent ?? (isMobile ? MOBILE_USER_AGENT : DESKTOP_USER_AGENT)
            });
        } catch (error) {
            throw this.unavailable('Could not create a browser context', error);
        }
    }

    private unavailable(message: string, cause: unknown): BrowserUnavailableError {
        return new BrowserUnavailableError(`${message}: ${errorMessage(cause)}`, { cause });
    }
}

class PlaywrightPageHandle implements PageHandle {
    constructor(
        private readonly context: BrowserContext,
        private readonly page: Page,
        readonly response: NavigationResponse | null,
        private readonly consoleLog: ConsoleEvent[],
        private readonly failures: FailedRequest[]
    ) {}

    url(): string {
        return this.page.url();
    }

    evaluate(script: string): Promise<unknown> {
        // Source text only: a transpiled function may reference helpers the page lacks
        return this.page.evaluate(script);
    }

    async waitForIdle(timeoutMs: number): Promise<boolean> {
        if (timeoutMs <= 0) return true;
        try {
            await this.page.waitForLoadState('networkidle', { timeout: timeoutMs });
            return true;
        } catch (error) {
            if (error instanceof errors.TimeoutError) return false;
            if (!this.context.browser()?.isConnected()) {
                throw new BrowserUnavailableError(`Browser disconnected: ${errorMessage(error)}`, { cause: error });
            }
            console.error(`[Engine] Waiting for network idle failed: ${errorMessage(error)}`);
            return false;
        }
    }

    consoleEvents(): readonly ConsoleEvent[] {
        return this.consoleLog;
    }

    failedRequests(): readonly FailedRequest[] {
        return this.failures;
    }

    async probe(target: string, timeoutMs: number): Promise<number> {
        const response = await this.page.request.head(target, { timeout: timeoutMs, maxRedirects: 5 });
        return response.status();
    }

    viewport(): Viewport | null {
        return this.page.viewportSize();
    }

    async setViewport(viewport: Viewport): Promise<void> {
        await this.page.setViewportSize({ width: viewport.width, height: viewport.height });
    }

    async close(): Promise<void> {
        await this.context.close();
    }
}

async function closeContext(context: BrowserContext): Promise<void> {
    try {
        await context.close();
    } catch (error) {
        console.error(`[Engine] Failed to close browser context: ${errorMessage(error)}`);
    }
}
