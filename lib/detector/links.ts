import { z } from 'zod';
import { inPageScript } from './semantic-resolver';
import { normalizeUrl, resolveUrl, shouldCrawl } from './url-utils';
import type { CrawlScope, DiscoveredLink, PageHandle } from './types';

export const LINK_EXTRACTION_SCRIPT = inPageScript(`
    const links = [];

    // Raw attribute values; resolved against the page URL on the Node side
    document.querySelectorAll('a[href], area[href]').forEach(a => {
        const href = a.getAttribute('href');
        if (href) links.push(href);
    });

    // Also check for links in buttons with onclick
    document.querySelectorAll('[onclick]').forEach(el => {
        const onclick = el.getAttribute('onclick') || '';
        const match = onclick.match(/location\\.href\\s*=\\s*['"]([^'"]+)['"]/);
        if (match) links.push(match[1]);
    });

    return links;
`);

const RawLinksSchema = z.array(z.string());

/**
 * Collect every in-scope link on the page, deduplicated by canonical form,
 * in document order.
 */
export async function extractLinks(page: PageHandle, baseUrl: string, scope: CrawlScope): Promise<DiscoveredLink[]> {
    const raw = RawLinksSchema.parse(await page.evaluate(LINK_EXTRACTION_SCRIPT));

    const seen = new Set<string>();
    const links: DiscoveredLink[] = [];
    for (const href of raw) {
        const trimmed = href.trim();
        const key = normalizeUrl(trimmed, baseUrl);
        if (!key || seen.has(key) || !shouldCrawl(key, scope)) continue;
        seen.add(key);
        links.push({ key, target: resolveUrl(trimmed, baseUrl) ?? key });
    }

    return links;
}
