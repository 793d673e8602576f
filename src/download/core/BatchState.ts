/**
 * BatchState - Session-scoped memory shared across the URLs of a batch
 */

import { logger } from '../../utils/logger';
import { CookieSource, ExportFormat } from './types';

export function describeCookieSource(source: CookieSource | null): string {
    if (!source) return 'none';
    return source.kind === 'file' ? `file:${source.path}` : `browser:${source.browser}`;
}

export function sameCookieSource(a: CookieSource | null, b: CookieSource | null): boolean {
    return describeCookieSource(a) === describeCookieSource(b);
}

/**
 * Single-writer cell for the locked cookie mode.
 * `trySet` is a compare-and-set: the first successful writer wins and
 * later writers see its value.
 */
export class CookieModeLock {
    private value: CookieSource | null = null;

    get current(): CookieSource | null {
        return this.value;
    }

    trySet(source: CookieSource): boolean {
        if (this.value !== null) {
            return false;
        }
        this.value = source;
        return true;
    }

    clear(): void {
        this.value = null;
    }
}

export class BatchState {
    outputDirectory: string | null = null;
    private formats: ExportFormat[] | null = null;
    readonly cookieLock = new CookieModeLock();

    get lockedCookieMode(): CookieSource | null {
        return this.cookieLock.current;
    }

    get requestedFormats(): readonly ExportFormat[] | null {
        return this.formats;
    }

    set requestedFormats(formats: readonly ExportFormat[] | null) {
        if (formats === null) {
            this.formats = null;
            return;
        }
        const deduped: ExportFormat[] = [];
        for (const format of formats) {
            if (!deduped.includes(format)) deduped.push(format);
        }
        this.formats = deduped;
    }

    /**
     * Explicit user reset: forget folder, formats and the locked cookie mode
     */
    reset(): void {
        this.outputDirectory = null;
        this.formats = null;
        this.cookieLock.clear();
        logger.info('Batch state reset');
    }
}
