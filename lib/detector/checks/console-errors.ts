import { createBug, truncate } from '../bug';
import type { Bug, BugDetector } from '../types';

const MAX_DESCRIPTION = 500;

/**
 * Turns the console errors, uncaught exceptions and failed subresource
 * requests captured during navigation into findings.
 */
export const consoleErrorDetector: BugDetector = {
    name: 'console-errors',

    async detect(page, url): Promise<Bug[]> {
        const bugs: Bug[] = [];

        for (const event of page.consoleEvents()) {
            const isException = event.type === 'pageerror';
            bugs.push(createBug({
                url,
                category: 'console',
                severity: isException ? 'high' : 'medium',
                title: isException ? 'Uncaught JavaScript exception' : 'Console error',
                description: truncate(event.text, MAX_DESCRIPTION),
                evidence: { type: event.type }
            }));
        }

        for (const request of page.failedRequests()) {
            // The main document's own status is handled by the visitor
            if (request.resourceType === 'document') continue;

            const reason = request.status !== undefined ? `HTTP ${request.status}` : request.errorText ?? 'request failed';
            bugs.push(createBug({
                url,
                category: 'console',
                severity: 'medium',
                title: `Failed to load ${request.resourceType}`,
                description: truncate(`${request.url} (${reason})`, MAX_DESCRIPTION),
                evidence: {
                    target: request.url,
                    resourceType: request.resourceType,
                    ...(request.status !== undefined ? { status: request.status } : { error: reason })
                }
            }));
        }

        return bugs;
    }
};
