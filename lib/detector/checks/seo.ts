import { z } from 'zod';
import { createBug } from '../bug';
import type { Bug, BugDetector } from '../types';

export const SEO_SCRIPT = `(function() {
    const meta = (name) => {
        const el = document.querySelector('meta[name="' + name + '"]');
        return el ? (el.getAttribute('content') || '').trim() : '';
    };
    return {
        title: (document.title || '').trim(),
        metaDescription: meta('description'),
        viewport: meta('viewport'),
        h1Count: document.querySelectorAll('h1').length,
        favicon: !!document.querySelector('link[rel~="icon"], link[rel="shortcut icon"], link[rel="apple-touch-icon"]')
    };
})()`;

const SeoInfoSchema = z.object({
    title: z.string(),
    metaDescription: z.string(),
    viewport: z.string(),
    h1Count: z.number().int().nonnegative(),
    favicon: z.boolean()
});

export type SeoInfo = z.infer<typeof SeoInfoSchema>;

export function seoBugs(info: SeoInfo, url: string): Bug[] {
    const bugs: Bug[] = [];

    if (!info.title) {
        bugs.push(createBug({
            url,
            category: 'seo',
            severity: 'medium',
            title: 'Missing page <title>',
            description: 'The page has no <title> tag.'
        }));
    }

    if (!info.viewport) {
        bugs.push(createBug({
            url,
            category: 'seo',
            severity: 'medium',
            title: 'Missing viewport meta tag',
            description: "No <meta name='viewport'> found; this page is likely broken on mobile devices."
        }));
    }

    if (!info.metaDescription) {
        bugs.push(createBug({
            url,
            category: 'seo',
            severity: 'low',
            title: 'Missing meta description',
            description: "No <meta name='description'> tag found."
        }));
    }

    if (!info.favicon) {
        bugs.push(createBug({
            url,
            category: 'seo',
            severity: 'low',
            title: 'Missing favicon',
            description: "No <link rel='icon'> found."
        }));
    }

    if (info.h1Count === 0) {
        bugs.push(createBug({
            url,
            category: 'seo',
            severity: 'low',
            title: 'No <h1> heading found',
            description: 'Page has no <h1> element.'
        }));
    } else if (info.h1Count > 1) {
        bugs.push(createBug({
            url,
            category: 'seo',
            severity: 'low',
            title: `Multiple <h1> tags (${info.h1Count})`,
            description: 'Best practice is a single <h1> per page.',
            evidence: { h1Count: info.h1Count }
        }));
    }

    return bugs;
}

export const seoDetector: BugDetector = {
    name: 'seo',

    async detect(page, url): Promise<Bug[]> {
        const info = SeoInfoSchema.parse(await page.evaluate(SEO_SCRIPT));
        return seoBugs(info, url);
    }
};
