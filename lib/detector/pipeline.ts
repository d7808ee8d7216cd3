import { toBugs } from './bug';
import { DetectorTimeoutError, errorMessage, isFatal, withTimeout } from './errors';
import type { Bug, BugDetector, DetectorFailure, PageHandle } from './types';

export interface PipelineOptions {
    timeoutMs: number;
}

export interface PipelineResult {
    bugs: Bug[];
    failures: DetectorFailure[];
}

/**
 * Run every detector against the page, one after another in registration
 * order. A failing detector contributes nothing and is recorded; the rest
 * still run. Only a lost browser escapes.
 */
export async function runDetectors(
    detectors: readonly BugDetector[],
    page: PageHandle,
    url: string,
    options: PipelineOptions
): Promise<PipelineResult> {
    const bugs: Bug[] = [];
    const failures: DetectorFailure[] = [];

    for (const detector of detectors) {
        try {
            const found: unknown = await withTimeout(
                Promise.resolve().then(() => detector.detect(page, url)),
                options.timeoutMs,
                () => new DetectorTimeoutError(detector.name, options.timeoutMs)
            );

            bugs.push(...toBugs(found));
        } catch (error) {
            if (isFatal(error)) throw error;

            const message = errorMessage(error);
            console.error(`[Pipeline] Detector ${detector.name} failed on ${url}: ${message}`);
            failures.push({ detector: detector.name, url, message });
        }
    }

    return { bugs, failures };
}
