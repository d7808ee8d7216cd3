import { z } from 'zod';
import type { Bug, BugCategory, Severity } from './types';

export interface BugFields {
    url: string;
    category: BugCategory;
    severity: Severity;
    title: string;
    description: string;
    selector?: string;
    evidence?: Record<string, unknown>;
}

export function createBug(fields: BugFields): Bug {
    const bug: Bug = {
        url: fields.url,
        category: fields.category,
        severity: fields.severity,
        title: fields.title,
        description: fields.description,
        ...(fields.selector !== undefined ? { selector: fields.selector } : {}),
        ...(fields.evidence !== undefined ? { evidence: Object.freeze({ ...fields.evidence }) } : {})
    };
    return Object.freeze(bug);
}

export const BugSchema = z.object({
    url: z.string(),
    category: z.string().min(1),
    severity: z.enum(['low', 'medium', 'high']),
    title: z.string(),
    description: z.string(),
    selector: z.string().optional(),
    evidence: z.record(z.unknown()).optional()
});

export const BugListSchema = z.array(BugSchema);

/**
 * Validate whatever a detector handed back and turn it into frozen bugs.
 */
export function toBugs(value: unknown): Bug[] {
    return BugListSchema.parse(value).map(createBug);
}

/** Identity used to collapse duplicate findings on the same page. */
export function bugKey(bug: Bug): string {
    return [bug.url, bug.category, bug.title, bug.description, bug.selector ?? ''].join('|');
}

/**
 * Finding recorded in place of detector output when a page cannot be loaded.
 */
export function unreachablePageBug(url: string, message: string, status?: number): Bug {
    return createBug({
        url,
        category: 'broken-link',
        severity: 'high',
        title: status !== undefined ? `Page returned HTTP ${status}` : 'Page failed to load',
        description: message,
        evidence: status !== undefined ? { status } : { error: message }
    });
}

export function truncate(text: string, max: number): string {
    return text.length > max ? `${text.slice(0, max)}...` : text;
}
