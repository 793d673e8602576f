/**
 * FormatCatalog - Export format menu and selection parsing
 */

import { ExportFormat, VideoContainer } from '../core/types';

export interface FormatMenuEntry {
    key: number;
    format: ExportFormat;
    description: string;
}

export const DEFAULT_EXPORT_FORMAT: ExportFormat = 'mp4';

export const FORMAT_MENU: readonly FormatMenuEntry[] = [
    { key: 1, format: 'mp4', description: 'Video MP4' },
    { key: 2, format: 'mkv', description: 'Video MKV' },
    { key: 3, format: 'mov', description: 'Video MOV' },
    { key: 4, format: 'mp3', description: 'Audio MP3 (audio-only)' },
];

const VIDEO_CONTAINERS: readonly string[] = ['mp4', 'mkv', 'mov'];

export function isVideoContainer(format: string): format is VideoContainer {
    return VIDEO_CONTAINERS.includes(format);
}

/**
 * Map any format token to a known export format; unknown tokens become mp4
 */
export function resolveExportFormat(token: string): ExportFormat {
    const normalized = token.trim().toLowerCase();
    if (isVideoContainer(normalized) || normalized === 'mp3') {
        return normalized;
    }
    return DEFAULT_EXPORT_FORMAT;
}

/**
 * Parse a menu selection such as "1 4" or "1,4".
 * Non-numeric and unknown entries are ignored, duplicates dropped,
 * empty or fully invalid input gives the default.
 */
export function parseFormatSelection(input: string): ExportFormat[] {
    const picked: ExportFormat[] = [];

    for (const token of input.replace(/,/g, ' ').split(/\s+/)) {
        if (!/^\d+$/.test(token)) continue;

        const entry = FORMAT_MENU.find((item) => item.key === parseInt(token, 10));
        if (entry && !picked.includes(entry.format)) {
            picked.push(entry.format);
        }
    }

    return picked.length > 0 ? picked : [DEFAULT_EXPORT_FORMAT];
}

export function renderFormatMenu(): string {
    return FORMAT_MENU.map((entry) => {
        const tag = entry.format === DEFAULT_EXPORT_FORMAT ? ' (default)' : '';
        return `  ${entry.key}) ${entry.description}${tag}`;
    }).join('\n');
}
