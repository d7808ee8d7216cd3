#!/usr/bin/env npx tsx

/**
 * Site Bug Crawler CLI
 * Crawl a website from the command line and write a findings report
 *
 * Usage:
 *   npx tsx scripts/cli.ts https://example.com
 *   npx tsx scripts/cli.ts https://example.com --max-pages 30 --output bugs.json
 *   npx tsx scripts/cli.ts https://example.com --format html --mobile --headed
 */

import { pathToFileURL } from 'url';
import { Command, InvalidArgumentError, Option } from 'commander';
import { DEFAULT_DETECTORS, detectorNames, selectDetectors } from '../lib/detector/checks';
import { MOBILE_VIEWPORT } from '../lib/detector/config';
import { Crawler } from '../lib/detector/crawler';
import type { CrawlerSettings } from '../lib/detector/crawler';
import { errorMessage } from '../lib/detector/errors';
import { hasSeverityAtLeast } from '../lib/detector/report';
import { printReport, REPORT_FORMATS, writeReports } from '../lib/detector/reporter';
import type { ReportFormat } from '../lib/detector/reporter';
import type { CrawlProgress, CrawlReport } from '../lib/detector/types';

export interface CLIOptions {
    maxPages: number;
    maxDepth?: number;
    output: string;
    format: ReportFormat;
    headed: boolean;
    mobile: boolean;
    timeout?: number;
    concurrency?: number;
    detectors?: string[];
    verbose: boolean;
}

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
}

function parseList(value: string): string[] {
    return value.split(',').map(item => item.trim()).filter(Boolean);
}

function isReportFormat(value: string): value is ReportFormat {
    return REPORT_FORMATS.some(format => format === value);
}

function parseFormat(value: string): ReportFormat {
    const format = value.toLowerCase();
    if (!isReportFormat(format)) {
        throw new InvalidArgumentError(`Expected one of: ${REPORT_FORMATS.join(', ')}.`);
    }
    return format;
}

export function buildProgram(run: (url: string, options: CLIOptions) => Promise<void>): Command {
    const program = new Command();

    program
        .name('site-bug-crawler')
        .description('Crawl a website in a real browser and report the bugs it finds')
        .version('0.1.0')
        .argument('<url>', 'Starting URL to crawl')
        .option('--max-pages <number>', 'Max pages to visit', parseInteger, 20)
        .option('--max-depth <number>', 'Max link depth from the start page', parseInteger)
        .option('-o, --output <file>', 'Output report path', 'report.json')
        .addOption(
            new Option('--format <format>', `Report format (${REPORT_FORMATS.join(', ')})`)
                .argParser(parseFormat)
                .default('both')
        )
        .option('--headed', 'Run the browser in headed mode', false)
        .option('--mobile', `Crawl with a ${MOBILE_VIEWPORT.width}x${MOBILE_VIEWPORT.height} mobile viewport`, false)
        .option('--timeout <ms>', 'Navigation timeout per page', parseInteger)
        .option('--concurrency <number>', 'Pages visited in parallel', parseInteger)
        .option('--detectors <names>', `Comma-separated detectors (${detectorNames().join(', ')})`, parseList)
        .option('-v, --verbose', 'Print a line per visited page', false)
        .action(async (url: string, options: CLIOptions) => {
            await run(url, options);
        });

    return program;
}

export function toCrawlerSettings(options: CLIOptions): CrawlerSettings {
    return {
        headless: !options.headed,
        ...(options.mobile ? { viewport: { ...MOBILE_VIEWPORT } } : {}),
        ...(options.maxDepth !== undefined ? { maxDepth: options.maxDepth } : {}),
        ...(options.timeout !== undefined ? { navigationTimeoutMs: options.timeout } : {}),
        ...(options.concurrency !== undefined ? { concurrency: options.concurrency } : {}),
        detectors: options.detectors ? selectDetectors(options.detectors) : DEFAULT_DETECTORS
    };
}

/**
 * CI-friendly exit code: 2 for high severity findings, 1 for medium, 0 otherwise.
 */
export function exitCodeFor(report: CrawlReport): number {
    if (hasSeverityAtLeast(report, 'high')) return 2;
    if (hasSeverityAtLeast(report, 'medium')) return 1;
    return 0;
}

async function runCrawl(url: string, options: CLIOptions): Promise<void> {
    console.log(`
╔══════════════════════════════════════════════════════════════╗
║                     SITE BUG CRAWLER                         ║
╚══════════════════════════════════════════════════════════════╝`);
    console.log(`\n🕷️  Crawling: ${url}`);
    console.log(`   Max Pages: ${options.maxPages}`);
    console.log(`   Viewport: ${options.mobile ? 'Mobile' : 'Desktop'}\n`);

    const onProgress = (progress: CrawlProgress) => {
        if (options.verbose && progress.status === 'crawling') {
            console.log(`   [${progress.status}] ${progress.pagesVisited}/${progress.totalPagesQueued} - ${progress.currentPage}`);
        }
    };

    const crawler = new Crawler({ ...toCrawlerSettings(options), onProgress });

    // First Ctrl+C stops after the current page; the report is still written
    const onSigint = () => {
        console.log('\n   Stopping after the current page...');
        crawler.cancel();
    };
    process.once('SIGINT', onSigint);

    try {
        const report = await crawler.run(url, options.maxPages);
        printReport(report);

        for (const written of writeReports(report, options.output, options.format)) {
            console.log(`  📁 Report saved: ${written}`);
        }

        process.exitCode = exitCodeFor(report);
    } finally {
        process.removeListener('SIGINT', onSigint);
    }
}

async function main(): Promise<void> {
    const program = buildProgram(runCrawl);
    try {
        await program.parseAsync(process.argv);
    } catch (error) {
        console.error(`\n❌ Error: ${errorMessage(error)}`);
        process.exitCode = 1;
    }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
    void main();
}
