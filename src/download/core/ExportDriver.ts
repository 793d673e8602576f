/**
 * ExportDriver - Runs the cookie negotiation once per requested export
 * format for a single URL. A failed format never blocks the next one.
 */

import { logger } from '../../utils/logger';
import { buildAttemptConfig } from '../formats/AttemptConfigBuilder';
import { resolveExportFormat } from '../formats/FormatCatalog';
import { BatchState } from './BatchState';
import { CookieNegotiator, NegotiationObserver } from './CookieNegotiator';
import { AttemptDefaults, ExportFormat, FormatOutcome, UrlExportReport } from './types';

export interface ExportObserver extends NegotiationObserver {
    onFormatStarted?(format: ExportFormat): void;
    onFormatFinished?(outcome: FormatOutcome): void;
}

export class ExportDriver {
    private readonly negotiator: CookieNegotiator;

    constructor(negotiator: CookieNegotiator) {
        this.negotiator = negotiator;
    }

    async exportUrl(
        url: string,
        formats: readonly string[],
        defaults: AttemptDefaults,
        state: BatchState,
        observer: ExportObserver = {},
    ): Promise<UrlExportReport> {
        const outcomes: FormatOutcome[] = [];

        for (const requested of formats) {
            const format = resolveExportFormat(requested);
            observer.onFormatStarted?.(format);

            const negotiation = await this.negotiator.negotiate(
                (cookies) => buildAttemptConfig(defaults, url, format, cookies),
                state,
                observer,
            );

            const outcome: FormatOutcome = {
                format,
                success: negotiation.success,
                artifactPaths: negotiation.result.producedArtifactPaths,
                diagnosticMessage: negotiation.result.diagnosticMessage,
                errorClass: negotiation.errorClass,
                attemptCount: negotiation.attempts.length,
            };
            outcomes.push(outcome);

            if (!outcome.success) {
                logger.warn('Export failed', {
                    url,
                    format,
                    attempts: outcome.attemptCount,
                    errorClass: outcome.errorClass,
                    error: outcome.diagnosticMessage,
                });
            }

            observer.onFormatFinished?.(outcome);
        }

        return {
            url,
            formats: outcomes,
            success: outcomes.length > 0 && outcomes.every((outcome) => outcome.success),
        };
    }
}
