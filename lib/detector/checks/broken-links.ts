import { z } from 'zod';
import { createBug } from '../bug';
import { errorMessage } from '../errors';
import { inPageScript } from '../semantic-resolver';
import type { Bug, BugDetector } from '../types';

export interface BrokenLinkOptions {
    maxLinksPerPage?: number;
    probeTimeoutMs?: number;
}

const SKIPPED_SCHEMES = ['javascript:', 'mailto:', 'tel:', 'data:'];

export const ANCHOR_SCRIPT = inPageScript(`
    return Array.from(document.querySelectorAll('a[href]')).map(a => ({
        href: a.href,
        raw: a.getAttribute('href') || '',
        text: visibleText(a, 80)
    }));
`);

const AnchorListSchema = z.array(z.object({
    href: z.string(),
    raw: z.string(),
    text: z.string()
}));

/**
 * Probes each link target on the page with a HEAD request. Cross-origin
 * targets are checked too; traversal scope does not apply here.
 */
export function createBrokenLinkDetector(options: BrokenLinkOptions = {}): BugDetector {
    const maxLinks = options.maxLinksPerPage ?? 50;
    const timeoutMs = options.probeTimeoutMs ?? 8000;

    return {
        name: 'broken-links',

        async detect(page, url): Promise<Bug[]> {
            const anchors = AnchorListSchema.parse(await page.evaluate(ANCHOR_SCRIPT));
            const bugs: Bug[] = [];
            const probed = new Set<string>();

            for (const link of anchors.slice(0, maxLinks)) {
                const href = link.href;
                if (!href || link.raw.startsWith('#')) continue;
                if (SKIPPED_SCHEMES.some(scheme => href.toLowerCase().startsWith(scheme))) continue;
                if (probed.has(href)) continue;
                probed.add(href);

                let status: number;
                try {
                    status = await page.probe(href, timeoutMs);
                } catch (error) {
                    // Timeouts on external sites are too noisy to report
                    console.log(`[BrokenLinks] Could not test ${href}: ${errorMessage(error)}`);
                    continue;
                }

                if (status >= 400) {
                    bugs.push(createBug({
                        url,
                        category: 'broken-link',
                        severity: status >= 500 ? 'high' : 'medium',
                        title: `Broken link (${status})`,
                        description: `Link "${link.text}" → ${href} returned ${status}`,
                        selector: `a[href="${link.raw}"]`,
                        evidence: { status, target: href }
                    }));
                }
            }

            return bugs;
        }
    };
}

export const brokenLinkDetector = createBrokenLinkDetector();
