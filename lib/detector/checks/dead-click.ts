import { z } from 'zod';
import { createBug } from '../bug';
import { inPageScript } from '../semantic-resolver';
import type { Bug, BugDetector } from '../types';

export const DEAD_CLICK_SCRIPT = inPageScript(`
    const results = [];
    const candidates = document.querySelectorAll(
        '[class*="btn"], [class*="button"], [class*="cta"], [class*="click"]'
    );
    for (const el of candidates) {
        const tag = el.tagName.toLowerCase();
        // Real controls are interactive by definition
        if (['button', 'a', 'input', 'select', 'textarea', 'label', 'summary'].includes(tag)) continue;
        if (el.closest('a[href], button')) continue;
        if (!isVisible(el)) continue;

        const style = window.getComputedStyle(el);
        if (style.cursor === 'pointer' || el.getAttribute('role') === 'button' || el.hasAttribute('tabindex')) continue;
        if (el.onclick || el.hasAttribute('onclick')) continue;

        results.push({
            selector: describeElement(el),
            tag,
            text: visibleText(el, 60),
            html: el.outerHTML.slice(0, 150)
        });
        if (results.length >= 10) break;
    }
    return results;
`);

const SuspectSchema = z.array(z.object({
    selector: z.string(),
    tag: z.string(),
    text: z.string(),
    html: z.string()
}));

/**
 * Flags elements styled like buttons that give no sign of being clickable.
 */
export const deadClickDetector: BugDetector = {
    name: 'dead-click',

    async detect(page, url): Promise<Bug[]> {
        const suspects = SuspectSchema.parse(await page.evaluate(DEAD_CLICK_SCRIPT));

        return suspects.map(suspect => createBug({
            url,
            category: 'dead-click',
            severity: 'low',
            title: 'Possibly non-interactive button-like element',
            description: `\`${suspect.tag}\` with text "${suspect.text}" has a button-like class name but may not be clickable.`,
            selector: suspect.selector,
            evidence: { html: suspect.html }
        }));
    }
};
