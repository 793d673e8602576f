#!/usr/bin/env node
import 'dotenv/config';
import * as Sentry from '@sentry/node';
import chalk from 'chalk';
import { Command } from 'commander';
import { InteractiveSession } from './cli/InteractiveSession';
import { Prompter } from './cli/Prompter';
import { BatchOrchestrator, BatchState, parseFormatSelection, YtDlpProvider } from './download';
import { AppConfig, AppContext } from './types';
import { ConfigError, loadConfig } from './utils/config';
import { CookiesManager } from './utils/CookiesManager';
import { FileManager, OutputDirectoryError } from './utils/FileManager';
import { logError, logger, setConsoleLevel } from './utils/logger';
import { URLValidator } from './utils/UrlValidator';

const VERSION = '1.0.0';

interface CliOptions {
  file?: string;
  out?: string;
  formats?: string;
  once?: boolean;
}

function initializeSentry(config: AppConfig): void {
  Sentry.init({
    dsn: config.sentryDsn || '',
    enabled: Boolean(config.sentryDsn),
    tracesSampleRate: 1.0,
  });
}

function initializeComponents(config: AppConfig): AppContext {
  const fileManager = new FileManager(config.downloadBaseDir);
  const cookiesManager = new CookiesManager(config.cookies);
  const validator = new URLValidator({ timeoutMs: config.probeTimeoutMs });
  const engine = new YtDlpProvider(fileManager, {
    executable: config.engine.executable,
    timeoutMs: config.engine.timeoutMs,
  });

  const orchestrator = new BatchOrchestrator({
    engine,
    cookieSources: cookiesManager,
    validator,
  });

  logger.info('Components initialized', {
    baseDir: config.downloadBaseDir,
    linksFile: config.linksFile,
    engine: config.engine.executable,
  });

  return {
    config,
    cookiesManager,
    fileManager,
    orchestrator,
    state: new BatchState(),
  };
}

/**
 * Apply --out and --formats to the sticky state before the first pass
 */
async function applyPresets(ctx: AppContext, options: CliOptions): Promise<void> {
  if (options.out !== undefined) {
    try {
      ctx.state.outputDirectory = await ctx.fileManager.resolveOutputDirectory(options.out);
    } catch (error) {
      if (!(error instanceof OutputDirectoryError)) {
        throw error;
      }
      console.error(chalk.red(`--out: ${error.message}`));
    }
  }

  if (options.formats !== undefined) {
    ctx.state.requestedFormats = parseFormatSelection(options.formats);
  }
}

async function main(argv: string[]): Promise<void> {
  const program = new Command()
    .name('linkharvest')
    .description('Batch media downloader: paste links, pick formats, get files')
    .version(VERSION)
    .option('-f, --file <path>', 'process a batch file before prompting')
    .option('-o, --out <subfolder>', 'output subfolder inside the download base directory')
    .option('--formats <tokens>', 'format menu numbers, e.g. "1,4"')
    .option('--once', 'exit after the first batch pass')
    .parse(argv);

  const options = program.opts<CliOptions>();

  const config = loadConfig();
  setConsoleLevel(config.logLevel);
  initializeSentry(config);

  const ctx = initializeComponents(config);
  await applyPresets(ctx, options);

  const prompter = new Prompter();
  const session = new InteractiveSession(ctx, prompter);

  try {
    const passes = await session.run({
      initialFile: options.file,
      once: options.once,
      jsRuntime: process.execPath,
    });
    logger.info('Session finished', { passes });
  } finally {
    prompter.close();
  }

  await Sentry.flush(2000);
}

main(process.argv).catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(chalk.red(error.message));
    process.exitCode = 2;
    return;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  logError(err, { operation: 'main' });
  console.error(chalk.red(`Fatal: ${err.message}`));
  process.exitCode = 1;
});
