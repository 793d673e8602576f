import fs from 'fs';
import { logger } from './logger';
import { CookieSource } from '../download/core/types';
import { CookieConfig } from '../types';

/**
 * CookiesManager - Works out which cookie sources yt-dlp may try, in order.
 *
 * An exported Netscape cookie file next to the program wins outright;
 * otherwise each configured browser's cookie store is a candidate.
 */
export class CookiesManager {
    private readonly config: CookieConfig;
    private sources: CookieSource[] | null = null;

    constructor(config: CookieConfig) {
        this.config = config;
    }

    /**
     * Ordered cookie sources, resolved once and cached
     */
    getSources(): CookieSource[] {
        if (this.sources) {
            return this.sources;
        }

        if (this.hasCookieFile()) {
            this.sources = [{ kind: 'file', path: this.config.cookiesFile }];
            logger.info('✅ Using exported cookie file', { path: this.config.cookiesFile });
        } else {
            this.sources = this.config.browsers.map((browser) => ({
                kind: 'browser' as const,
                browser,
            }));
            if (this.sources.length > 0) {
                logger.info('✅ Browser cookie sources configured', {
                    browsers: this.config.browsers,
                });
            } else {
                logger.info('⚠️ No cookie sources configured');
            }
        }

        return this.sources;
    }

    /**
     * Forget the cached list; the session calls this on reset
     */
    refresh(): void {
        this.sources = null;
    }

    hasCookieFile(): boolean {
        try {
            return fs.statSync(this.config.cookiesFile).isFile();
        } catch {
            return false;
        }
    }
}
