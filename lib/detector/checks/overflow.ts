import { z } from 'zod';
import { createBug } from '../bug';
import { inPageScript } from '../semantic-resolver';
import type { Bug, BugDetector } from '../types';

export const OVERFLOW_SCRIPT = inPageScript(`
    const results = [];
    for (const el of document.querySelectorAll('body *')) {
        // Tolerance of 2px for sub-pixel rendering
        if (el.clientWidth > 0 && el.scrollWidth > el.clientWidth + 2) {
            results.push({
                selector: describeElement(el),
                scrollWidth: el.scrollWidth,
                clientWidth: el.clientWidth
            });
        }
        if (results.length >= 20) break;
    }
    return results;
`);

const OverflowSchema = z.array(z.object({
    selector: z.string(),
    scrollWidth: z.number(),
    clientWidth: z.number()
}));

export const overflowDetector: BugDetector = {
    name: 'overflow',

    async detect(page, url): Promise<Bug[]> {
        const overflows = OverflowSchema.parse(await page.evaluate(OVERFLOW_SCRIPT));

        return overflows.map(item => createBug({
            url,
            category: 'overflow',
            severity: 'medium',
            title: 'Horizontal overflow detected',
            description: `Element \`${item.selector}\` overflows: scrollWidth=${item.scrollWidth}px vs clientWidth=${item.clientWidth}px`,
            selector: item.selector,
            evidence: { scrollWidth: item.scrollWidth, clientWidth: item.clientWidth }
        }));
    }
};
