import { beforeEach, describe, expect, it, vi } from 'vitest';
import { FakePageHandle } from '../../../test/fake-browser';
import { MOBILE_VIEWPORT } from '../config';
import { createMobileDetector, MOBILE_SCRIPT, mobileProblemToBug } from './mobile';

describe('mobileProblemToBug', () => {
    it('describes an element wider than the viewport', () => {
        const bug = mobileProblemToBug(
            { type: 'wider_than_viewport', selector: 'table.prices', elementWidth: 720, viewportWidth: 390 },
            'https://a.test/'
        );

        expect(bug).toMatchObject({
            severity: 'medium',
            title: 'Element wider than viewport',
            description: 'Element `table.prices` is 720px wide but viewport is 390px.',
            evidence: { elementWidth: 720, viewportWidth: 390 }
        });
    });

    it('describes a small tap target', () => {
        const bug = mobileProblemToBug(
            { type: 'small_tap_target', selector: 'a.close', detail: 'x', width: 20, height: 18 },
            'https://a.test/'
        );

        expect(bug.severity).toBe('low');
        expect(bug.description).toBe('`a.close` "x" is only 20×18px (minimum recommended: 44×44px).');
    });

    it('describes small text and fixed widths', () => {
        expect(mobileProblemToBug(
            { type: 'small_text', selector: 'p.legal', detail: 'Terms apply', fontSize: 10 },
            'https://a.test/'
        ).description).toBe('Text "Terms apply" is 10px (minimum recommended: 12px).');

        expect(mobileProblemToBug(
            { type: 'fixed_width_overflow', selector: 'div#wrap', detail: 'width: 960px' },
            'https://a.test/'
        ).description).toBe('Inline style sets a fixed pixel width: width: 960px');
    });
});

describe('createMobileDetector', () => {
    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    it('inspects the page at a phone viewport and restores the original', async () => {
        const page = new FakePageHandle('https://a.test/', {
            evaluate: script => {
                if (script !== MOBILE_SCRIPT) throw new Error('unexpected script');
                return [{ type: 'small_text', selector: 'p', detail: 'Fine print', fontSize: 9 }];
            }
        });

        const bugs = await createMobileDetector().detect(page, 'https://a.test/');

        expect(bugs.map(bug => bug.title)).toEqual(['Text may be too small on mobile']);
        expect(page.viewports).toEqual([MOBILE_VIEWPORT, { width: 1280, height: 800 }]);
        expect(page.viewport()).toEqual({ width: 1280, height: 800 });
    });

    it('restores the viewport when the inspection fails', async () => {
        const page = new FakePageHandle('https://a.test/', {
            evaluate: () => {
                throw new Error('Execution context was destroyed');
            }
        });

        await expect(createMobileDetector().detect(page, 'https://a.test/')).rejects.toThrow('Execution context was destroyed');
        expect(page.viewport()).toEqual({ width: 1280, height: 800 });
    });
});
