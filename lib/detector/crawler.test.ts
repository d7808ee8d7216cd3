import { beforeEach, describe, expect, it, vi } from 'vitest';
import { FakeBrowser, linkPage } from '../../test/fake-browser';
import { createBug } from './bug';
import { ConfigError } from './config';
import { Crawler } from './crawler';
import { BrowserUnavailableError, InvalidUrlError } from './errors';
import type { BugDetector } from './types';

// One low-severity finding per page, so bug counts mirror visited pages
const markerDetector: BugDetector = {
    name: 'marker',
    async detect(_page, url) {
        return [createBug({ url, category: 'seo', severity: 'low', title: 'marker', description: url })];
    }
};

const brokenDetector: BugDetector = {
    name: 'broken',
    async detect() {
        throw new Error('querySelector is not a function');
    }
};

function crawler(browser: FakeBrowser, settings: ConstructorParameters<typeof Crawler>[0] = {}): Crawler {
    return new Crawler({ backend: browser, detectors: [markerDetector], ...settings });
}

describe('Crawler', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    it('stays on the seed origin and never visits cross-origin links', async () => {
        const browser = new FakeBrowser({
            'https://a.test/': linkPage('/about', 'https://other.test/'),
            'https://a.test/about': linkPage('/'),
            'https://other.test/': linkPage()
        });

        const report = await crawler(browser).run('https://a.test/', 5);

        expect(report.pagesVisited).toBe(2);
        expect(browser.opened).toEqual(['https://a.test/', 'https://a.test/about']);
        expect(report.pages.map(page => page.url)).toEqual(['https://a.test/', 'https://a.test/about']);
    });

    it('records a single broken-link bug when the seed returns HTTP 500', async () => {
        const browser = new FakeBrowser({
            'https://a.test/': { status: 500, links: ['/about'] },
            'https://a.test/about': linkPage()
        });

        const report = await crawler(browser).run('https://a.test/', 5);

        expect(report.pagesVisited).toBe(1);
        expect(browser.opened).toEqual(['https://a.test/']);
        expect(report.bugs).toEqual([
            {
                url: 'https://a.test/',
                category: 'broken-link',
                severity: 'high',
                title: 'Page returned HTTP 500',
                description: 'Page returned status 500',
                evidence: { status: 500 }
            }
        ]);
        expect(report.pages[0]).toMatchObject({ ok: false, status: 500 });
    });

    it.each([0, -3])('returns an empty report without navigating when maxPages is %i', async maxPages => {
        const browser = new FakeBrowser({ 'https://a.test/': linkPage('/about') });

        const report = await crawler(browser).run('https://a.test/', maxPages);

        expect(report.pagesVisited).toBe(0);
        expect(report.bugs).toEqual([]);
        expect(browser.opened).toEqual([]);
    });

    it('visits each page once on a cyclic site', async () => {
        const browser = new FakeBrowser({
            'https://a.test/': linkPage('/b', '/b', '/#top', '/c'),
            'https://a.test/b': linkPage('/', '/c', '/b'),
            'https://a.test/c': linkPage('/', '/b')
        });

        const report = await crawler(browser).run('https://a.test/', 10);

        expect(browser.opened).toEqual(['https://a.test/', 'https://a.test/b', 'https://a.test/c']);
        expect(report.pagesVisited).toBe(3);
        expect(report.bugs.map(bug => bug.url)).toEqual(['https://a.test/', 'https://a.test/b', 'https://a.test/c']);
    });

    it('enqueues fragment variants of the same page once', async () => {
        const browser = new FakeBrowser({
            'https://a.test/': linkPage('/x#one', '/x#two', '/x'),
            'https://a.test/x': linkPage()
        });

        await crawler(browser).run('https://a.test/', 10);

        expect(browser.opened).toEqual(['https://a.test/', 'https://a.test/x']);
    });

    it('visits pages breadth-first', async () => {
        const browser = new FakeBrowser({
            'https://a.test/': linkPage('/b', '/c'),
            'https://a.test/b': linkPage('/d'),
            'https://a.test/c': linkPage('/e'),
            'https://a.test/d': linkPage(),
            'https://a.test/e': linkPage()
        });

        await crawler(browser).run('https://a.test/', 10);

        expect(browser.opened).toEqual([
            'https://a.test/',
            'https://a.test/b',
            'https://a.test/c',
            'https://a.test/d',
            'https://a.test/e'
        ]);
    });

    it('stops at the page ceiling', async () => {
        const links = Array.from({ length: 8 }, (_, i) => `/p${i}`);
        const pages = Object.fromEntries(links.map(link => [`https://a.test${link}`, linkPage()]));
        const browser = new FakeBrowser({ 'https://a.test/': linkPage(...links), ...pages });

        const report = await crawler(browser).run('https://a.test/', 3);

        expect(report.pagesVisited).toBe(3);
        expect(browser.opened).toEqual(['https://a.test/', 'https://a.test/p0', 'https://a.test/p1']);
    });

    it('keeps crawling when a detector fails', async () => {
        const browser = new FakeBrowser({
            'https://a.test/': linkPage('/b'),
            'https://a.test/b': linkPage()
        });

        const report = await crawler(browser, { detectors: [brokenDetector, markerDetector] }).run('https://a.test/', 5);

        expect(report.pagesVisited).toBe(2);
        expect(report.bugs).toHaveLength(2);
        expect(report.errors).toEqual([
            'Detector broken failed on https://a.test/: querySelector is not a function',
            'Detector broken failed on https://a.test/b: querySelector is not a function'
        ]);
    });

    it('counts a failed navigation as visited and does not follow its links', async () => {
        const browser = new FakeBrowser({
            'https://a.test/': linkPage('/slow', '/c'),
            'https://a.test/slow': { navigationError: 'timeout', links: ['/hidden'] },
            'https://a.test/c': linkPage(),
            'https://a.test/hidden': linkPage()
        });

        const report = await crawler(browser).run('https://a.test/', 10);

        expect(report.pagesVisited).toBe(3);
        expect(browser.opened).toEqual(['https://a.test/', 'https://a.test/slow', 'https://a.test/c']);
        const slowBugs = report.bugs.filter(bug => bug.url === 'https://a.test/slow');
        expect(slowBugs).toEqual([
            {
                url: 'https://a.test/slow',
                category: 'broken-link',
                severity: 'high',
                title: 'Page failed to load',
                description: 'Navigation timed out after 20000ms',
                evidence: { error: 'Navigation timed out after 20000ms' }
            }
        ]);
        expect(report.perSeverityCounts).toEqual({ low: 2, medium: 0, high: 1 });
    });

    it('aborts the crawl when the browser becomes unavailable', async () => {
        const browser = new FakeBrowser({
            'https://a.test/': linkPage('/b'),
            'https://a.test/b': { crash: true }
        });

        await expect(crawler(browser).run('https://a.test/', 5)).rejects.toBeInstanceOf(BrowserUnavailableError);
    });

    it('always visits the seed even when it is outside the crawl scope', async () => {
        const browser = new FakeBrowser({
            'https://cdn.other.test/start': linkPage('https://a.test/', '/more'),
            'https://a.test/': linkPage(),
            'https://cdn.other.test/more': linkPage()
        });

        const report = await crawler(browser, { scopeOrigin: 'https://a.test' }).run('https://cdn.other.test/start', 5);

        expect(browser.opened).toEqual(['https://cdn.other.test/start', 'https://a.test/']);
        expect(report.pagesVisited).toBe(2);
    });

    it('produces identical reports for identical crawls', async () => {
        const site = {
            'https://a.test/': linkPage('/b', '/c'),
            'https://a.test/b': linkPage('/c'),
            'https://a.test/c': { navigationError: 'net::ERR_CONNECTION_REFUSED' }
        };

        const first = await crawler(new FakeBrowser(site)).run('https://a.test/', 5);
        const second = await crawler(new FakeBrowser(site)).run('https://a.test/', 5);

        expect(second.bugs).toEqual(first.bugs);
        expect(second.pagesVisited).toBe(first.pagesVisited);
    });

    it('stops between pages once cancelled', async () => {
        const browser = new FakeBrowser({
            'https://a.test/': linkPage('/b'),
            'https://a.test/b': linkPage()
        });
        const instance: Crawler = crawler(browser, {
            onProgress: progress => {
                if (progress.status === 'crawling') instance.cancel();
            }
        });

        const report = await instance.run('https://a.test/', 5);

        expect(report.cancelled).toBe(true);
        expect(report.pagesVisited).toBe(1);
        expect(browser.opened).toEqual(['https://a.test/']);
    });

    it('honours an external abort signal', async () => {
        const browser = new FakeBrowser({ 'https://a.test/': linkPage() });
        const controller = new AbortController();
        controller.abort();

        const report = await crawler(browser, { signal: controller.signal }).run('https://a.test/', 5);

        expect(report.cancelled).toBe(true);
        expect(report.pagesVisited).toBe(0);
        expect(browser.opened).toEqual([]);
    });

    it('does not follow links past maxDepth', async () => {
        const browser = new FakeBrowser({
            'https://a.test/': linkPage('/b'),
            'https://a.test/b': linkPage('/c'),
            'https://a.test/c': linkPage()
        });

        await crawler(browser, { maxDepth: 1 }).run('https://a.test/', 10);

        expect(browser.opened).toEqual(['https://a.test/', 'https://a.test/b']);
    });

    it('follows long link chains when no depth limit is set', async () => {
        const chain = Array.from({ length: 15 }, (_, i) => (i === 0 ? 'https://a.test/' : `https://a.test/p${i}`));
        const browser = new FakeBrowser(Object.fromEntries(
            chain.map((url, i) => [url, linkPage(...(i + 1 < chain.length ? [`/p${i + 1}`] : []))])
        ));

        const report = await crawler(browser).run('https://a.test/', 20);

        expect(report.pagesVisited).toBe(15);
        expect(browser.opened).toEqual(chain);
    });

    it('loads links with their query as written and dedups by canonical form', async () => {
        const browser = new FakeBrowser({
            'https://a.test/': linkPage('/search?q=a%20b&flag', '/search?flag&q=a%20b'),
            'https://a.test/search?q=a%20b&flag': linkPage()
        });

        const report = await crawler(browser).run('https://a.test/', 10);

        expect(browser.opened).toEqual(['https://a.test/', 'https://a.test/search?q=a%20b&flag']);
        expect(report.pages.map(page => page.ok)).toEqual([true, true]);
    });

    it('does not revisit the page a redirect landed on', async () => {
        const browser = new FakeBrowser({
            'https://a.test/': { finalUrl: 'https://a.test/home', links: ['/about', '/home'] },
            'https://a.test/about': linkPage('/home'),
            'https://a.test/home': linkPage()
        });

        const report = await crawler(browser).run('https://a.test/', 10);

        expect(browser.opened).toEqual(['https://a.test/', 'https://a.test/about']);
        expect(report.pagesVisited).toBe(2);
    });

    it('does not count redirect targets against the page limit', async () => {
        const browser = new FakeBrowser({
            'https://a.test/': { finalUrl: 'https://a.test/home', links: ['/a', '/b'] },
            'https://a.test/a': linkPage(),
            'https://a.test/b': linkPage()
        });

        const report = await crawler(browser).run('https://a.test/', 3);

        expect(report.pagesVisited).toBe(3);
    });

    it('bounds parallel visits and sorts the report when concurrent', async () => {
        const browser = new FakeBrowser({
            'https://a.test/': linkPage('/z', '/m', '/b'),
            'https://a.test/z': linkPage(),
            'https://a.test/m': linkPage(),
            'https://a.test/b': linkPage()
        });

        const report = await crawler(browser, { concurrency: 2 }).run('https://a.test/', 10);

        expect(report.pagesVisited).toBe(4);
        expect(browser.maxConcurrentPages).toBe(2);
        expect(report.bugs.map(bug => bug.url)).toEqual([
            'https://a.test/',
            'https://a.test/b',
            'https://a.test/m',
            'https://a.test/z'
        ]);
    });

    it('closes every page and leaves an injected backend open', async () => {
        const browser = new FakeBrowser({
            'https://a.test/': linkPage('/b', '/gone'),
            'https://a.test/b': linkPage()
        });

        await crawler(browser, { detectors: [brokenDetector] }).run('https://a.test/', 5);

        expect(browser.opened).toHaveLength(3);
        expect(browser.openPages).toBe(0);
        expect(browser.closed).toBe(false);
    });

    it('ignores a progress callback that throws', async () => {
        const browser = new FakeBrowser({ 'https://a.test/': linkPage() });

        const report = await crawler(browser, {
            onProgress: () => {
                throw new Error('renderer crashed');
            }
        }).run('https://a.test/', 5);

        expect(report.pagesVisited).toBe(1);
    });

    it('rejects an unparseable start URL', async () => {
        const browser = new FakeBrowser({});

        await expect(crawler(browser).run('not a url', 5)).rejects.toBeInstanceOf(InvalidUrlError);
    });

    it('validates its options up front', () => {
        expect(() => new Crawler({ concurrency: 0 })).toThrow(ConfigError);
    });
});
