export class CrawlerError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The page could not be loaded: timeout, DNS/TLS failure, an HTTP error
 * status or a non-HTML document. Recorded as a finding, never fatal.
 */
export class NavigationError extends CrawlerError {
    readonly url: string;
    readonly status?: number;

    constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.url = url;
        this.status = options?.status;
    }
}

/** The browser itself failed to launch, crashed or disconnected. */
export class BrowserUnavailableError extends CrawlerError {}

export class DetectorTimeoutError extends CrawlerError {
    constructor(readonly detector: string, readonly timeoutMs: number) {
        super(`Detector "${detector}" did not finish within ${timeoutMs}ms`);
    }
}

export class InvalidUrlError extends CrawlerError {
    constructor(readonly input: string) {
        super(`Invalid start URL: ${input}`);
    }
}

export function isFatal(error: unknown): boolean {
    return error instanceof BrowserUnavailableError;
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    try {
        return JSON.stringify(error) ?? String(error);
    } catch {
        return String(error);
    }
}

/**
 * Race `promise` against a timer. The timer is always cleared so it never
 * keeps the process alive.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(onTimeout()), ms);
    });
    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
