/**
 * CookieNegotiator - Decides, per (URL, format), whether cookies are needed
 * and which source works, locking the first working source for the batch.
 *
 * Order: no cookies → locked mode (if any) → full source sweep.
 * Terminal error classes stop the search for the current URL/format.
 */

import { logger } from '../../utils/logger';
import { classifyError, isTerminal } from './ErrorClassifier';
import { BatchState, describeCookieSource, sameCookieSource } from './BatchState';
import {
    AttemptConfig,
    AttemptRecord,
    AttemptResult,
    CookieSource,
    DownloadEngine,
    NegotiationOutcome,
} from './types';

export interface CookieSourceProvider {
    getSources(): CookieSource[];
}

export interface NegotiationObserver {
    onAttemptFailed?(record: AttemptRecord): void;
    onLocked?(source: CookieSource): void;
}

export type AttemptConfigFactory = (cookies: CookieSource | null) => AttemptConfig;

/**
 * A reported success only counts when at least one artifact was verified
 */
export function isVerifiedSuccess(result: AttemptResult): boolean {
    return result.success && result.producedArtifactPaths.length > 0;
}

export class CookieNegotiator {
    private readonly engine: DownloadEngine;
    private readonly sources: CookieSourceProvider;

    constructor(engine: DownloadEngine, sources: CookieSourceProvider) {
        this.engine = engine;
        this.sources = sources;
    }

    async negotiate(
        buildConfig: AttemptConfigFactory,
        state: BatchState,
        observer: NegotiationObserver = {},
    ): Promise<NegotiationOutcome> {
        const attempts: AttemptRecord[] = [];

        const run = async (cookies: CookieSource | null): Promise<AttemptRecord> => {
            const result = await this.safeAttempt(buildConfig(cookies));
            const record: AttemptRecord = result.success
                ? { cookies, result }
                : { cookies, result, errorClass: classifyError(result.diagnosticMessage) };

            attempts.push(record);
            if (!result.success) {
                logger.debug('Attempt failed', {
                    cookies: describeCookieSource(cookies),
                    errorClass: record.errorClass,
                    error: result.diagnosticMessage,
                });
                observer.onAttemptFailed?.(record);
            }
            return record;
        };

        const finish = (record: AttemptRecord, lockedNow = false): NegotiationOutcome => ({
            success: record.result.success,
            result: record.result,
            attempts,
            errorClass: record.errorClass,
            usedCookies: record.cookies,
            lockedNow,
        });

        const anonymous = await run(null);
        if (!anonymous.errorClass || isTerminal(anonymous.errorClass)) {
            return finish(anonymous);
        }

        let last = anonymous;
        const locked = state.lockedCookieMode;

        if (locked) {
            const lockedAttempt = await run(locked);
            if (!lockedAttempt.errorClass || isTerminal(lockedAttempt.errorClass)) {
                return finish(lockedAttempt);
            }
            last = lockedAttempt;
        }

        for (const source of this.sources.getSources()) {
            if (locked && sameCookieSource(source, locked)) continue;

            const record = await run(source);
            if (!record.errorClass) {
                const lockedNow = state.cookieLock.trySet(source);
                if (lockedNow) {
                    logger.info('🔒 Cookie mode locked for this batch', {
                        cookies: describeCookieSource(source),
                    });
                    observer.onLocked?.(source);
                }
                return finish(record, lockedNow);
            }

            last = record;
            if (isTerminal(record.errorClass)) {
                break;
            }
        }

        return finish(last);
    }

    /**
     * Narrow boundary around the engine: normalizes unverified successes and
     * turns an unexpected rejection into a failed result
     */
    private async safeAttempt(config: AttemptConfig): Promise<AttemptResult> {
        try {
            const result = await this.engine.attempt(config);
            if (result.success && !isVerifiedSuccess(result)) {
                return {
                    success: false,
                    diagnosticMessage:
                        result.diagnosticMessage ?? 'Engine reported success but no artifact was verified',
                    producedArtifactPaths: [],
                };
            }
            return result;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.warn(`[${this.engine.name}] attempt rejected`, { error: message });
            return { success: false, diagnosticMessage: message, producedArtifactPaths: [] };
        }
    }
}
