/**
 * BatchAggregator - Collects one outcome per URL for a batch pass
 */

import { BatchSummary, UrlOutcome, UrlStatus } from './types';

export class BatchAggregator {
    private readonly outcomes: UrlOutcome[] = [];

    recordOk(url: string): void {
        this.record({ url, status: UrlStatus.OK });
    }

    recordFailed(url: string, reason: string): void {
        this.record({ url, status: UrlStatus.FAILED, reason });
    }

    recordInvalid(url: string, reason: string): void {
        this.record({ url, status: UrlStatus.INVALID, reason });
    }

    private record(outcome: UrlOutcome): void {
        this.outcomes.push(Object.freeze({ ...outcome }));
    }

    summarize(): BatchSummary {
        const byStatus = (status: UrlStatus): UrlOutcome[] =>
            this.outcomes.filter((outcome) => outcome.status === status);

        const ok = byStatus(UrlStatus.OK);
        const failed = byStatus(UrlStatus.FAILED);
        const invalid = byStatus(UrlStatus.INVALID);

        return Object.freeze({
            total: this.outcomes.length,
            okCount: ok.length,
            failedCount: failed.length,
            invalidCount: invalid.length,
            ok,
            failed,
            invalid,
        });
    }
}

/**
 * Plain-text summary: counts, failed URLs ready to paste back, invalid URLs with reasons
 */
export function formatSummary(summary: BatchSummary): string {
    const lines = [
        `ok=${summary.okCount} failed=${summary.failedCount} invalid=${summary.invalidCount} (total ${summary.total})`,
    ];

    if (summary.failed.length > 0) {
        lines.push('', 'Failed URLs:');
        lines.push(...summary.failed.map((outcome) => outcome.url));
    }

    if (summary.invalid.length > 0) {
        lines.push('', 'Invalid URLs:');
        lines.push(...summary.invalid.map((outcome) => `${outcome.url} (${outcome.reason ?? 'invalid'})`));
    }

    return lines.join('\n');
}
