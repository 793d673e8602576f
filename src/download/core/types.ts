/**
 * Core Types for the Batch Download System
 * Shared by the negotiator, export driver, aggregator and engine boundary
 */

// ============================================================================
// Enums
// ============================================================================

export enum ErrorClass {
    PERMANENT_UNAVAILABLE = 'permanent_unavailable',
    NETWORK_FAILURE = 'network_failure',
    UNKNOWN = 'unknown',
}

export enum UrlStatus {
    OK = 'ok',
    FAILED = 'failed',
    INVALID = 'invalid',
}

// ============================================================================
// Formats & Cookie Sources
// ============================================================================

export type VideoContainer = 'mp4' | 'mkv' | 'mov';
export type ExportFormat = VideoContainer | 'mp3';

export type CookieSource =
    | { readonly kind: 'file'; readonly path: string }
    | { readonly kind: 'browser'; readonly browser: string };

// ============================================================================
// Attempt Types
// ============================================================================

export interface AudioExtraction {
    readonly codec: 'mp3';
    readonly quality: string;
}

/**
 * Options shared by every attempt of a batch pass
 */
export interface AttemptDefaults {
    readonly outputDirectory: string;
    readonly filenameTemplate: string;
    readonly retries: number;
    readonly fragmentRetries: number;
    readonly concurrentFragments: number;
    readonly userAgent: string;
    readonly restrictFilenames: boolean;
    readonly trimFileName: number;
    readonly extractorArgs: readonly string[];
    readonly remoteComponents: readonly string[];
    readonly jsRuntime?: string;
}

/**
 * One (URL, format, cookie mode) combination handed to the engine.
 * Built fresh per attempt, frozen after construction.
 */
export interface AttemptConfig extends AttemptDefaults {
    readonly url: string;
    readonly exportFormat: ExportFormat;
    readonly formatSelector: string;
    readonly outputTemplate: string;
    readonly mergeOutputFormat?: VideoContainer;
    readonly audioExtraction?: AudioExtraction;
    readonly cookies: CookieSource | null;
}

export interface AttemptResult {
    success: boolean;
    diagnosticMessage?: string;
    producedArtifactPaths: string[];
}

export interface DownloadEngine {
    readonly name: string;

    /**
     * Run one attempt. Must resolve for every outcome, never reject.
     */
    attempt(config: AttemptConfig): Promise<AttemptResult>;
}

// ============================================================================
// Negotiation & Export Results
// ============================================================================

export interface AttemptRecord {
    cookies: CookieSource | null;
    result: AttemptResult;
    errorClass?: ErrorClass;
}

export interface NegotiationOutcome {
    success: boolean;
    result: AttemptResult;
    attempts: AttemptRecord[];
    errorClass?: ErrorClass;
    usedCookies: CookieSource | null;
    lockedNow: boolean;
}

export interface FormatOutcome {
    format: ExportFormat;
    success: boolean;
    artifactPaths: string[];
    diagnosticMessage?: string;
    errorClass?: ErrorClass;
    attemptCount: number;
}

export interface UrlExportReport {
    url: string;
    formats: FormatOutcome[];
    success: boolean;
}

// ============================================================================
// Outcomes & Summary
// ============================================================================

export interface UrlOutcome {
    readonly url: string;
    readonly status: UrlStatus;
    readonly reason?: string;
}

export interface BatchSummary {
    readonly total: number;
    readonly okCount: number;
    readonly failedCount: number;
    readonly invalidCount: number;
    readonly ok: readonly UrlOutcome[];
    readonly failed: readonly UrlOutcome[];
    readonly invalid: readonly UrlOutcome[];
}

// ============================================================================
// Event Types
// ============================================================================

export type BatchEventType =
    | 'batch:started'
    | 'url:started'
    | 'url:invalid'
    | 'format:started'
    | 'attempt:failed'
    | 'cookie:locked'
    | 'format:completed'
    | 'format:failed'
    | 'url:finished'
    | 'batch:finished';

export interface BatchEvent {
    type: BatchEventType;
    timestamp: Date;
    url?: string;
    data?: Record<string, unknown>;
}

export type BatchEventHandler = (event: BatchEvent) => void;
