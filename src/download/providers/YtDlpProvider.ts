/**
 * YtDlpProvider - Engine boundary around the yt-dlp executable.
 * One call = one attempt; every outcome (spawn error, non-zero exit,
 * missing output) is reduced to an AttemptResult, nothing is thrown.
 */

import { spawn } from 'child_process';
import { z } from 'zod';
import { FileManager } from '../../utils/FileManager';
import { logger } from '../../utils/logger';
import { describeCookieSource } from '../core/BatchState';
import { AttemptConfig, AttemptResult, DownloadEngine } from '../core/types';

// URL validation schema
const UrlSchema = z
    .string()
    .url()
    .refine((url) => /^https?:\/\//i.test(url), { message: 'URL must use http or https' });

export interface YtDlpProviderOptions {
    executable?: string;
    timeoutMs?: number;
}

interface ProcessOutput {
    code: number | null;
    stdout: string;
    stderr: string;
    spawnError?: Error;
    timedOut: boolean;
}

/**
 * Translate an attempt configuration into yt-dlp command line arguments
 */
export function buildYtDlpArgs(config: AttemptConfig): string[] {
    const args: string[] = ['-f', config.formatSelector];

    if (config.mergeOutputFormat) {
        args.push('--merge-output-format', config.mergeOutputFormat);
    }

    if (config.audioExtraction) {
        args.push(
            '-x',
            '--audio-format', config.audioExtraction.codec,
            '--audio-quality', config.audioExtraction.quality,
        );
    }

    args.push(
        '-o', config.outputTemplate,
        '--retries', String(config.retries),
        '--fragment-retries', String(config.fragmentRetries),
        '--concurrent-fragments', String(config.concurrentFragments),
        '--continue',
        '--part',
        '--add-headers', `User-Agent:${config.userAgent}`,
        '--trim-filenames', String(config.trimFileName),
    );

    if (config.restrictFilenames) {
        args.push('--restrict-filenames');
    }

    for (const extractorArg of config.extractorArgs) {
        args.push('--extractor-args', extractorArg);
    }

    for (const component of config.remoteComponents) {
        args.push('--remote-components', component);
    }

    if (config.jsRuntime) {
        args.push('--js-runtimes', `node:${config.jsRuntime}`);
    }

    args.push('--ignore-errors', '--no-simulate', '--print', 'after_move:filepath');

    if (config.cookies?.kind === 'file') {
        args.push('--cookies', config.cookies.path);
    } else if (config.cookies?.kind === 'browser') {
        args.push('--cookies-from-browser', config.cookies.browser);
    }

    args.push(config.url);
    return args;
}

/**
 * Pick the most useful message out of yt-dlp's stderr: its own `ERROR:` line
 * first, then the last non-empty line
 */
export function extractDiagnostic(stderr: string, exitCode: number | null): string {
    const lines = stderr
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);

    const errorLines = lines.filter((line) => line.startsWith('ERROR:'));
    if (errorLines.length > 0) {
        return errorLines[errorLines.length - 1].replace(/^ERROR:\s*/, '');
    }

    if (lines.length > 0) {
        return lines[lines.length - 1];
    }

    return `yt-dlp exited with code ${exitCode}`;
}

export function parsePrintedPaths(stdout: string): string[] {
    const paths: string[] = [];
    for (const line of stdout.split(/\r?\n/)) {
        const candidate = line.trim();
        if (candidate && !paths.includes(candidate)) {
            paths.push(candidate);
        }
    }
    return paths;
}

export class YtDlpProvider implements DownloadEngine {
    readonly name = 'yt-dlp';

    private readonly fileManager: FileManager;
    private readonly executable: string;
    private readonly timeoutMs?: number;

    constructor(fileManager: FileManager, options: YtDlpProviderOptions = {}) {
        this.fileManager = fileManager;
        this.executable = options.executable || 'yt-dlp';
        this.timeoutMs = options.timeoutMs;
    }

    async attempt(config: AttemptConfig): Promise<AttemptResult> {
        const validUrl = UrlSchema.safeParse(config.url);
        if (!validUrl.success) {
            return {
                success: false,
                diagnosticMessage: `URL is invalid: ${config.url}`,
                producedArtifactPaths: [],
            };
        }

        logger.info(`[${this.name}] Attempt`, {
            url: config.url,
            format: config.exportFormat,
            cookies: describeCookieSource(config.cookies),
        });

        const output = await this.executeYtDlp(buildYtDlpArgs(config));

        if (output.spawnError) {
            return {
                success: false,
                diagnosticMessage: `Failed to start ${this.executable}: ${output.spawnError.message}`,
                producedArtifactPaths: [],
            };
        }

        if (output.timedOut) {
            return {
                success: false,
                diagnosticMessage: `Engine attempt timed out after ${this.timeoutMs}ms`,
                producedArtifactPaths: [],
            };
        }

        const producedArtifactPaths = await this.fileManager.existingFiles(
            parsePrintedPaths(output.stdout),
        );

        if (output.code !== 0) {
            return {
                success: false,
                diagnosticMessage: extractDiagnostic(output.stderr, output.code),
                producedArtifactPaths,
            };
        }

        if (producedArtifactPaths.length === 0) {
            return {
                success: false,
                diagnosticMessage: 'yt-dlp reported success but no output file was found',
                producedArtifactPaths,
            };
        }

        return { success: true, producedArtifactPaths };
    }

    /**
     * Execute yt-dlp; always resolves
     */
    private executeYtDlp(args: string[]): Promise<ProcessOutput> {
        return new Promise((resolve) => {
            let stdout = '';
            let stderr = '';
            let settled = false;
            let timedOut = false;
            let timer: NodeJS.Timeout | undefined;

            const finish = (result: ProcessOutput): void => {
                if (settled) return;
                settled = true;
                if (timer) clearTimeout(timer);
                resolve(result);
            };

            const proc = spawn(this.executable, args, {
                stdio: ['ignore', 'pipe', 'pipe'],
            });

            // Decode across chunk boundaries so multibyte paths survive
            proc.stdout.setEncoding('utf8');
            proc.stderr.setEncoding('utf8');

            proc.stdout.on('data', (text: string) => {
                stdout += text;
            });

            proc.stderr.on('data', (text: string) => {
                stderr += text;
                logger.debug(`[${this.name}] ${text.trim()}`);
            });

            proc.on('error', (error) => {
                finish({ code: null, stdout, stderr, spawnError: error, timedOut });
            });

            proc.on('close', (code) => {
                finish({ code, stdout, stderr, timedOut });
            });

            if (this.timeoutMs) {
                timer = setTimeout(() => {
                    timedOut = true;
                    proc.kill('SIGKILL');
                }, this.timeoutMs);
            }
        });
    }
}
