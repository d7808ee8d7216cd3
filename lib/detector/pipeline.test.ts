import { beforeEach, describe, expect, it, vi } from 'vitest';
import { FakePageHandle } from '../../test/fake-browser';
import { createBug } from './bug';
import { BrowserUnavailableError } from './errors';
import { runDetectors } from './pipeline';
import type { BugDetector } from './types';

const PAGE_URL = 'https://a.test/';

function finding(title: string): BugDetector {
    return {
        name: title,
        async detect(_page, url) {
            return [createBug({ url, category: 'seo', severity: 'low', title, description: 'found' })];
        }
    };
}

describe('runDetectors', () => {
    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    it('collects findings in detector order', async () => {
        const page = new FakePageHandle(PAGE_URL, {});

        const result = await runDetectors([finding('first'), finding('second')], page, PAGE_URL, { timeoutMs: 1000 });

        expect(result.bugs.map(bug => bug.title)).toEqual(['first', 'second']);
        expect(result.failures).toEqual([]);
    });

    it('records a throwing detector and runs the rest', async () => {
        const page = new FakePageHandle(PAGE_URL, {});
        const throwing: BugDetector = {
            name: 'throwing',
            async detect() {
                throw new Error('boom');
            }
        };

        const result = await runDetectors([throwing, finding('after')], page, PAGE_URL, { timeoutMs: 1000 });

        expect(result.bugs.map(bug => bug.title)).toEqual(['after']);
        expect(result.failures).toEqual([{ detector: 'throwing', url: PAGE_URL, message: 'boom' }]);
    });

    it('catches a detector that throws synchronously', async () => {
        const page = new FakePageHandle(PAGE_URL, {});
        const eager: BugDetector = {
            name: 'eager',
            detect() {
                throw new TypeError('not ready');
            }
        };

        const result = await runDetectors([eager], page, PAGE_URL, { timeoutMs: 1000 });

        expect(result.failures).toEqual([{ detector: 'eager', url: PAGE_URL, message: 'not ready' }]);
    });

    it('gives up on a detector that never finishes', async () => {
        const page = new FakePageHandle(PAGE_URL, {});
        const hanging: BugDetector = {
            name: 'hanging',
            detect: () => new Promise(() => undefined)
        };

        const result = await runDetectors([hanging, finding('after')], page, PAGE_URL, { timeoutMs: 20 });

        expect(result.failures).toEqual([
            { detector: 'hanging', url: PAGE_URL, message: 'Detector "hanging" did not finish within 20ms' }
        ]);
        expect(result.bugs).toHaveLength(1);
    });

    it('rejects malformed detector output', async () => {
        const page = new FakePageHandle(PAGE_URL, {});
        const sloppy: BugDetector = {
            name: 'sloppy',
            // Untyped plugin output reaches the pipeline at run time
            detect: async () => JSON.parse('[{"url":"https://a.test/","severity":"urgent"}]')
        };

        const result = await runDetectors([sloppy], page, PAGE_URL, { timeoutMs: 1000 });

        expect(result.bugs).toEqual([]);
        expect(result.failures).toHaveLength(1);
        expect(result.failures[0]?.detector).toBe('sloppy');
    });

    it('lets a lost browser escape', async () => {
        const page = new FakePageHandle(PAGE_URL, {});
        const crashed: BugDetector = {
            name: 'crashed',
            async detect() {
                throw new BrowserUnavailableError('Target closed');
            }
        };

        await expect(runDetectors([crashed, finding('after')], page, PAGE_URL, { timeoutMs: 1000 }))
            .rejects.toBeInstanceOf(BrowserUnavailableError);
    });
});
