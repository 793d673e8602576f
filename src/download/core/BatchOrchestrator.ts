/**
 * BatchOrchestrator - Main coordinator for a batch pass
 * Validates each URL, drives every requested format through cookie
 * negotiation and aggregates one outcome per URL, strictly in input order.
 */

import { EventEmitter } from 'events';
import { logError, logOperation } from '../../utils/logger';
import { URLValidator } from '../../utils/UrlValidator';
import { DEFAULT_EXPORT_FORMAT } from '../formats/FormatCatalog';
import { BatchAggregator } from './BatchAggregator';
import { BatchState, describeCookieSource } from './BatchState';
import { CookieNegotiator, CookieSourceProvider } from './CookieNegotiator';
import { ExportDriver } from './ExportDriver';
import {
    AttemptDefaults,
    BatchEvent,
    BatchEventHandler,
    BatchSummary,
    DownloadEngine,
    UrlExportReport,
} from './types';

export interface BatchOrchestratorDeps {
    engine: DownloadEngine;
    cookieSources: CookieSourceProvider;
    validator: URLValidator;
}

export class BatchOrchestrator extends EventEmitter {
    private readonly validator: URLValidator;
    private readonly driver: ExportDriver;
    private eventHandlers: BatchEventHandler[] = [];

    constructor(deps: BatchOrchestratorDeps) {
        super();
        this.validator = deps.validator;
        this.driver = new ExportDriver(new CookieNegotiator(deps.engine, deps.cookieSources));
    }

    /**
     * Add event handler
     */
    onBatchEvent(handler: BatchEventHandler): void {
        this.eventHandlers.push(handler);
    }

    /**
     * Emit batch event
     */
    private emitEvent(type: BatchEvent['type'], url?: string, data?: Record<string, unknown>): void {
        const event: BatchEvent = {
            type,
            timestamp: new Date(),
            url,
            data,
        };

        this.emit(type, event);
        this.eventHandlers.forEach(handler => handler(event));
    }

    /**
     * Run one batch pass. Per-URL failures never abort the pass.
     */
    async runBatch(
        urls: readonly string[],
        state: BatchState,
        defaults: AttemptDefaults,
    ): Promise<BatchSummary> {
        const aggregator = new BatchAggregator();
        const formats = state.requestedFormats ?? [DEFAULT_EXPORT_FORMAT];

        logOperation('batch_started', {
            urls: urls.length,
            formats,
            outputDirectory: defaults.outputDirectory,
        });
        this.emitEvent('batch:started', undefined, { total: urls.length, formats });

        for (const [index, url] of urls.entries()) {
            this.emitEvent('url:started', url, { index: index + 1, total: urls.length });

            const validation = await this.validator.validate(url);
            if (!validation.valid) {
                const reason = validation.reason ?? 'Invalid URL';
                aggregator.recordInvalid(url, reason);
                this.emitEvent('url:invalid', url, { reason });
                continue;
            }

            let report: UrlExportReport;
            try {
                report = await this.exportUrl(url, formats, defaults, state);
            } catch (error) {
                logError(error instanceof Error ? error : new Error(String(error)), {
                    operation: 'export_url',
                    url,
                });
                const reason = error instanceof Error ? error.message : String(error);
                aggregator.recordFailed(url, reason);
                this.emitEvent('url:finished', url, { success: false, reason });
                continue;
            }

            if (report.success) {
                aggregator.recordOk(url);
                this.emitEvent('url:finished', url, { success: true });
            } else {
                const reason = failureReason(report);
                aggregator.recordFailed(url, reason);
                this.emitEvent('url:finished', url, { success: false, reason });
            }
        }

        const summary = aggregator.summarize();
        logOperation('batch_finished', {
            total: summary.total,
            ok: summary.okCount,
            failed: summary.failedCount,
            invalid: summary.invalidCount,
            cookieMode: describeCookieSource(state.lockedCookieMode),
        });
        this.emitEvent('batch:finished', undefined, {
            total: summary.total,
            ok: summary.okCount,
            failed: summary.failedCount,
            invalid: summary.invalidCount,
        });

        return summary;
    }

    private exportUrl(
        url: string,
        formats: readonly string[],
        defaults: AttemptDefaults,
        state: BatchState,
    ): Promise<UrlExportReport> {
        return this.driver.exportUrl(url, formats, defaults, state, {
            onFormatStarted: (format) => this.emitEvent('format:started', url, { format }),
            onAttemptFailed: (record) =>
                this.emitEvent('attempt:failed', url, {
                    cookies: describeCookieSource(record.cookies),
                    errorClass: record.errorClass,
                    error: record.result.diagnosticMessage,
                }),
            onLocked: (source) =>
                this.emitEvent('cookie:locked', url, { cookies: describeCookieSource(source) }),
            onFormatFinished: (outcome) =>
                this.emitEvent(outcome.success ? 'format:completed' : 'format:failed', url, {
                    format: outcome.format,
                    artifacts: outcome.artifactPaths,
                    attempts: outcome.attemptCount,
                    errorClass: outcome.errorClass,
                    error: outcome.diagnosticMessage,
                }),
        });
    }
}

/**
 * One line per failed format, each with its best diagnostic
 */
export function failureReason(report: UrlExportReport): string {
    return report.formats
        .filter((outcome) => !outcome.success)
        .map((outcome) => `${outcome.format}: ${outcome.diagnosticMessage ?? 'unknown error'}`)
        .join('; ');
}
