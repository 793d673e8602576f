import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { AppConfig } from '../types';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const DEFAULT_BROWSERS = ['firefox', 'chrome', 'chromium', 'brave', 'edge'];

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const EnvSchema = z.object({
  DOWNLOAD_BASE_DIR: optionalString,
  LINKS_FILE: optionalString,
  COOKIES_FILE: optionalString,
  COOKIE_BROWSERS: optionalString,
  YTDLP_PATH: optionalString,
  YTDLP_PO_TOKEN: optionalString,
  PROBE_TIMEOUT_MS: optionalString.pipe(
    z.coerce.number().int().min(1000).max(9999).default(3000),
  ),
  ENGINE_TIMEOUT_MS: optionalString.pipe(
    z.coerce.number().int().positive().optional(),
  ),
  LOG_LEVEL: optionalString,
  SENTRY_DSN: optionalString,
});

/**
 * Walk up from `startDir` until a directory holding package.json is found.
 * Works the same from src/ under ts-jest and from dist/ after a build.
 */
export function findProjectRoot(startDir: string = __dirname): string {
  let current = path.resolve(startDir);

  while (true) {
    if (fs.existsSync(path.join(current, 'package.json'))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return process.cwd();
    }
    current = parent;
  }
}

function parseBrowsers(raw: string | undefined): string[] {
  if (!raw) {
    return [...DEFAULT_BROWSERS];
  }

  const browsers: string[] = [];
  for (const item of raw.split(',')) {
    const browser = item.trim().toLowerCase();
    if (browser && !browsers.includes(browser)) {
      browsers.push(browser);
    }
  }
  return browsers;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  projectRoot: string = findProjectRoot(),
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${details}`);
  }

  const vars = parsed.data;
  const resolveFromRoot = (value: string | undefined, fallback: string): string =>
    value ? path.resolve(projectRoot, value) : path.join(projectRoot, fallback);

  return {
    downloadBaseDir: vars.DOWNLOAD_BASE_DIR
      ? path.resolve(vars.DOWNLOAD_BASE_DIR)
      : path.join(os.homedir(), 'Downloads'),
    linksFile: resolveFromRoot(vars.LINKS_FILE, 'links.txt'),
    probeTimeoutMs: vars.PROBE_TIMEOUT_MS,
    engine: {
      executable: vars.YTDLP_PATH ?? 'yt-dlp',
      poToken: vars.YTDLP_PO_TOKEN,
      timeoutMs: vars.ENGINE_TIMEOUT_MS,
    },
    cookies: {
      cookiesFile: resolveFromRoot(vars.COOKIES_FILE, 'cookies.txt'),
      browsers: parseBrowsers(vars.COOKIE_BROWSERS),
    },
    logLevel: vars.LOG_LEVEL ?? 'warn',
    sentryDsn: vars.SENTRY_DSN,
  };
}
