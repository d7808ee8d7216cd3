import { z } from 'zod';
import { createBug } from '../bug';
import { MOBILE_VIEWPORT } from '../config';
import { errorMessage } from '../errors';
import { inPageScript } from '../semantic-resolver';
import type { Bug, BugDetector, Viewport } from '../types';

const MIN_TAP_TARGET = 44;
const MIN_FONT_SIZE = 12;

export const MOBILE_SCRIPT = inPageScript(`
    const problems = [];
    const vw = window.innerWidth;

    // Elements wider than the viewport
    for (const el of document.querySelectorAll('body *')) {
        const rect = el.getBoundingClientRect();
        if (rect.width > vw + 5) {
            problems.push({
                type: 'wider_than_viewport',
                selector: describeElement(el),
                elementWidth: Math.round(rect.width),
                viewportWidth: vw
            });
            if (problems.length >= 15) break;
        }
    }

    // Fixed-width elements that don't adapt
    document.querySelectorAll('[style*="width"]').forEach(el => {
        const style = el.getAttribute('style') || '';
        const match = style.match(/(?:^|;)\\s*width:\\s*(\\d+)px/);
        if (match && parseInt(match[1], 10) > vw) {
            problems.push({
                type: 'fixed_width_overflow',
                selector: describeElement(el),
                detail: style.slice(0, 100)
            });
        }
    });

    // Tiny tap targets
    document.querySelectorAll('a, button, input, select, textarea').forEach(el => {
        const rect = el.getBoundingClientRect();
        if (
            rect.width > 0 && rect.height > 0 &&
            (rect.width < ${MIN_TAP_TARGET} || rect.height < ${MIN_TAP_TARGET}) &&
            rect.width < 200 // skip full-width elements
        ) {
            problems.push({
                type: 'small_tap_target',
                selector: describeElement(el),
                detail: visibleText(el, 40) || el.getAttribute('aria-label') || '',
                width: Math.round(rect.width),
                height: Math.round(rect.height)
            });
        }
    });

    // One is enough to flag
    for (const el of document.querySelectorAll('p, span, li, td, th, label')) {
        const fontSize = parseFloat(window.getComputedStyle(el).fontSize);
        const text = visibleText(el, 60);
        if (fontSize > 0 && fontSize < ${MIN_FONT_SIZE} && text.length > 5) {
            problems.push({ type: 'small_text', selector: describeElement(el), detail: text, fontSize });
            break;
        }
    }

    return problems.slice(0, 25);
`);

const ProblemSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('wider_than_viewport'),
        selector: z.string(),
        elementWidth: z.number(),
        viewportWidth: z.number()
    }),
    z.object({ type: z.literal('fixed_width_overflow'), selector: z.string(), detail: z.string() }),
    z.object({
        type: z.literal('small_tap_target'),
        selector: z.string(),
        detail: z.string(),
        width: z.number(),
        height: z.number()
    }),
    z.object({ type: z.literal('small_text'), selector: z.string(), detail: z.string(), fontSize: z.number() })
]);

export type MobileProblem = z.infer<typeof ProblemSchema>;

const ProblemListSchema = z.array(ProblemSchema);

export function mobileProblemToBug(problem: MobileProblem, url: string): Bug {
    switch (problem.type) {
        case 'wider_than_viewport':
            return createBug({
                url,
                category: 'mobile',
                severity: 'medium',
                title: 'Element wider than viewport',
                description: `Element \`${problem.selector}\` is ${problem.elementWidth}px wide but viewport is ${problem.viewportWidth}px.`,
                selector: problem.selector,
                evidence: { elementWidth: problem.elementWidth, viewportWidth: problem.viewportWidth }
            });
        case 'fixed_width_overflow':
            return createBug({
                url,
                category: 'mobile',
                severity: 'medium',
                title: 'Fixed-width element overflows viewport',
                description: `Inline style sets a fixed pixel width: ${problem.detail}`,
                selector: problem.selector
            });
        case 'small_tap_target':
            return createBug({
                url,
                category: 'mobile',
                severity: 'low',
                title: 'Tap target too small',
                description: `\`${problem.selector}\` "${problem.detail}" is only ${problem.width}×${problem.height}px (minimum recommended: ${MIN_TAP_TARGET}×${MIN_TAP_TARGET}px).`,
                selector: problem.selector,
                evidence: { width: problem.width, height: problem.height }
            });
        case 'small_text':
            return createBug({
                url,
                category: 'mobile',
                severity: 'low',
                title: 'Text may be too small on mobile',
                description: `Text "${problem.detail}" is ${problem.fontSize}px (minimum recommended: ${MIN_FONT_SIZE}px).`,
                selector: problem.selector,
                evidence: { fontSize: problem.fontSize }
            });
    }
}

/**
 * Re-lays the page out at a phone viewport, inspects it, then puts the
 * original viewport back for whichever detector runs next.
 */
export function createMobileDetector(viewport: Viewport = MOBILE_VIEWPORT): BugDetector {
    return {
        name: 'mobile',

        async detect(page, url): Promise<Bug[]> {
            const original = page.viewport();
            await page.setViewport(viewport);

            try {
                const problems = ProblemListSchema.parse(await page.evaluate(MOBILE_SCRIPT));
                return problems.map(problem => mobileProblemToBug(problem, url));
            } finally {
                if (original) {
                    await page.setViewport(original).catch((error: unknown) => {
                        console.error(`[Mobile] Could not restore viewport on ${url}: ${errorMessage(error)}`);
                    });
                }
            }
        }
    };
}

export const mobileDetector = createMobileDetector();
