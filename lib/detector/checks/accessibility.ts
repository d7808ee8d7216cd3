import axe from 'axe-core';
import { z } from 'zod';
import { createBug } from '../bug';
import { inPageAsyncScript } from '../semantic-resolver';
import type { Bug, BugDetector, Severity } from '../types';

const MAX_NODES_PER_RULE = 5;

// WCAG criterion mapping for common violations
const WCAG_MAPPING: Record<string, string> = {
    'image-alt': '1.1.1 Non-text Content (Level A)',
    'label': '1.3.1 Info and Relationships (Level A)',
    'color-contrast': '1.4.3 Contrast (Minimum) (Level AA)',
    'link-name': '2.4.4 Link Purpose (Level A)',
    'button-name': '4.1.2 Name, Role, Value (Level A)',
    'html-has-lang': '3.1.1 Language of Page (Level A)',
    'document-title': '2.4.2 Page Titled (Level A)',
    'select-name': '4.1.2 Name, Role, Value (Level A)'
};

export const AXE_RUN_SCRIPT = inPageAsyncScript(`
    if (typeof window.axe === 'undefined') {
        throw new Error('axe-core is not loaded in the page');
    }
    const results = await window.axe.run(document, {
        runOnly: { type: 'tag', values: ['wcag2a', 'wcag2aa'] },
        resultTypes: ['violations']
    });
    return results.violations.map(v => ({
        id: v.id,
        impact: v.impact || null,
        help: v.help,
        helpUrl: v.helpUrl,
        tags: v.tags,
        nodes: v.nodes.map(node => ({
            target: node.target.map(t => Array.isArray(t) ? t.join(' >>> ') : String(t)).join(' '),
            html: (node.html || '').slice(0, 150)
        }))
    }));
`);

const ViolationSchema = z.object({
    id: z.string(),
    impact: z.string().nullable(),
    help: z.string(),
    helpUrl: z.string(),
    tags: z.array(z.string()),
    nodes: z.array(z.object({ target: z.string(), html: z.string() }))
});

const ViolationListSchema = z.array(ViolationSchema);

export type AxeViolation = z.infer<typeof ViolationSchema>;

export function impactToSeverity(impact: string | null): Severity {
    if (impact === 'critical') return 'high';
    if (impact === 'serious') return 'medium';
    return 'low';
}

export function violationToBugs(violation: AxeViolation, url: string): Bug[] {
    const severity = impactToSeverity(violation.impact);
    const evidence = {
        rule: violation.id,
        impact: violation.impact,
        helpUrl: violation.helpUrl,
        wcag: WCAG_MAPPING[violation.id] ?? violation.tags.filter(tag => tag.startsWith('wcag')).join(', ')
    };

    const bugs = violation.nodes.slice(0, MAX_NODES_PER_RULE).map(node => createBug({
        url,
        category: 'accessibility',
        severity,
        title: violation.help,
        description: node.html || node.target,
        selector: node.target,
        evidence
    }));

    const remaining = violation.nodes.length - MAX_NODES_PER_RULE;
    if (remaining > 0) {
        bugs.push(createBug({
            url,
            category: 'accessibility',
            severity,
            title: violation.help,
            description: `... and ${remaining} more elements violate this rule`,
            evidence: { ...evidence, additionalNodes: remaining }
        }));
    }

    return bugs;
}

/**
 * Runs axe-core in the page. The library source is injected on every
 * visit because each visit gets a fresh page.
 */
export const accessibilityDetector: BugDetector = {
    name: 'accessibility',

    async detect(page, url): Promise<Bug[]> {
        await page.evaluate(axe.source);
        const violations = ViolationListSchema.parse(await page.evaluate(AXE_RUN_SCRIPT));

        const bugs = violations.flatMap(violation => violationToBugs(violation, url));
        console.log(`[A11y] Found ${bugs.length} accessibility issues on ${url}`);
        return bugs;
    }
};
