/**
 * AttemptConfigBuilder - Builds immutable per-attempt engine configuration.
 * Every attempt gets a fresh object derived from the shared defaults.
 */

import path from 'path';
import {
    AttemptConfig,
    AttemptDefaults,
    CookieSource,
    ExportFormat,
} from '../core/types';
import { isVideoContainer, resolveExportFormat } from './FormatCatalog';

export const FILENAME_TEMPLATE = '%(title)s [%(id)s].%(ext)s';
const EXT_PLACEHOLDER = '%(ext)s';

const BEST_VIDEO_AND_AUDIO = 'bv*+ba/b';
const BEST_AUDIO = 'bestaudio/best';

export interface DefaultsInput {
    outputDirectory: string;
    poToken?: string;
    jsRuntime?: string;
}

export function buildYoutubeExtractorArgs(poToken?: string): string[] {
    const parts = ['player_client=tv,mweb,tv_embedded'];
    if (poToken && poToken.trim()) {
        parts.push(`po_token=${poToken.trim()}`);
    }
    return [`youtube:${parts.join(';')}`];
}

/**
 * Options shared by every export of a batch pass
 */
export function buildAttemptDefaults(input: DefaultsInput): AttemptDefaults {
    return Object.freeze({
        outputDirectory: input.outputDirectory,
        filenameTemplate: FILENAME_TEMPLATE,
        retries: 10,
        fragmentRetries: 10,
        concurrentFragments: 4,
        userAgent: 'Mozilla/5.0',
        restrictFilenames: true,
        trimFileName: 200,
        extractorArgs: Object.freeze(buildYoutubeExtractorArgs(input.poToken)),
        remoteComponents: Object.freeze(['ejs:github']),
        jsRuntime: input.jsRuntime,
    });
}

/**
 * Build the configuration for one (URL, format, cookie mode) attempt.
 * Unknown format tokens fall back to mp4.
 */
export function buildAttemptConfig(
    defaults: AttemptDefaults,
    url: string,
    requested: ExportFormat | string,
    cookies: CookieSource | null,
): AttemptConfig {
    const exportFormat = resolveExportFormat(requested);
    const template = path.join(defaults.outputDirectory, defaults.filenameTemplate);

    if (isVideoContainer(exportFormat)) {
        return Object.freeze({
            ...defaults,
            url,
            exportFormat,
            formatSelector: BEST_VIDEO_AND_AUDIO,
            mergeOutputFormat: exportFormat,
            outputTemplate: template.replace(EXT_PLACEHOLDER, exportFormat),
            cookies,
        });
    }

    // Audio extraction names the final .mp3 itself; forcing the extension here gives name.mp3.mp3
    return Object.freeze({
        ...defaults,
        url,
        exportFormat,
        formatSelector: BEST_AUDIO,
        outputTemplate: template,
        audioExtraction: Object.freeze({ codec: 'mp3' as const, quality: '0' }),
        cookies,
    });
}
