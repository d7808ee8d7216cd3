import { accessibilityDetector } from './accessibility';
import { brokenLinkDetector } from './broken-links';
import { consoleErrorDetector } from './console-errors';
import { deadClickDetector } from './dead-click';
import { mobileDetector } from './mobile';
import { overflowDetector } from './overflow';
import { seoDetector } from './seo';
import { ConfigError } from '../config';
import type { BugDetector } from '../types';

/**
 * Default detector set, in the order they run on each page. Pass a
 * different list to the Crawler to change or extend it.
 */
export const DEFAULT_DETECTORS: readonly BugDetector[] = Object.freeze([
    consoleErrorDetector,
    brokenLinkDetector,
    overflowDetector,
    accessibilityDetector,
    seoDetector,
    deadClickDetector,
    mobileDetector
]);

export function detectorNames(detectors: readonly BugDetector[] = DEFAULT_DETECTORS): string[] {
    return detectors.map(detector => detector.name);
}

/**
 * Pick detectors by name, keeping the order the names were given in.
 */
export function selectDetectors(names: readonly string[], from: readonly BugDetector[] = DEFAULT_DETECTORS): BugDetector[] {
    return names.map(name => {
        const detector = from.find(candidate => candidate.name === name);
        if (!detector) {
            throw new ConfigError([`Unknown detector "${name}". Available: ${detectorNames(from).join(', ')}`]);
        }
        return detector;
    });
}

export { accessibilityDetector } from './accessibility';
export { brokenLinkDetector, createBrokenLinkDetector } from './broken-links';
export { consoleErrorDetector } from './console-errors';
export { deadClickDetector } from './dead-click';
export { createMobileDetector, mobileDetector } from './mobile';
export { overflowDetector } from './overflow';
export { seoDetector } from './seo';
