import chalk from 'chalk';
import { buildAttemptDefaults } from '../download/formats/AttemptConfigBuilder';
import { parseFormatSelection, renderFormatMenu } from '../download/formats/FormatCatalog';
import { AppContext } from '../types';
import { OutputDirectoryError } from '../utils/FileManager';
import { InputValidator } from '../utils/InputValidator';
import { logger } from '../utils/logger';
import { extractUrls } from '../utils/UrlExtractor';
import { formatEvent, renderSummary } from './output';
import { Prompter } from './Prompter';

export interface SessionOptions {
  /** Batch file to process before the first prompt */
  initialFile?: string;
  /** Stop after the first batch pass */
  once?: boolean;
  /** Node executable handed to yt-dlp as its JavaScript runtime */
  jsRuntime?: string;
}

type Print = (line: string) => void;

/**
 * InteractiveSession - The top-level prompt loop.
 * Sticky output folder and formats persist across passes until reset.
 */
export class InteractiveSession {
  private readonly ctx: AppContext;
  private readonly prompter: Prompter;
  private readonly print: Print;

  constructor(ctx: AppContext, prompter: Prompter, print: Print = (line) => console.log(line)) {
    this.ctx = ctx;
    this.prompter = prompter;
    this.print = print;

    this.ctx.orchestrator.onBatchEvent((event) => {
      const line = formatEvent(event);
      if (line !== null) {
        this.print(line);
      }
    });
  }

  /**
   * Run until the operator exits. Returns the number of batch passes completed.
   */
  async run(options: SessionOptions = {}): Promise<number> {
    let passes = 0;

    if (options.initialFile) {
      const text = await this.readBatchFile(options.initialFile);
      if (text !== null && (await this.runPass(text, options))) {
        passes++;
      }
      if (options.once) {
        return passes;
      }
    }

    for (;;) {
      const line = await this.prompter.ask(
        chalk.bold('\nPaste links (f = batch file, r = reset, Enter = quit): '),
      );
      const command = InputValidator.parseCommand(line ?? '');

      if (command.kind === 'exit') {
        return passes;
      }

      if (command.kind === 'reset') {
        this.ctx.state.reset();
        this.ctx.cookiesManager.refresh();
        this.print(chalk.yellow('Reset: output folder, formats and cookie mode cleared.'));
        continue;
      }

      let text: string | null;
      if (command.kind === 'file') {
        text = await this.readBatchFile(this.ctx.config.linksFile);
      } else {
        const more = await this.prompter.readBlock();
        text = [command.text, ...more].join('\n');
      }

      if (text === null) {
        continue;
      }

      if (await this.runPass(text, options)) {
        passes++;
        if (options.once) {
          return passes;
        }
      }
    }
  }

  /**
   * One batch pass over the URLs found in `text`. False when nothing ran.
   */
  private async runPass(text: string, options: SessionOptions): Promise<boolean> {
    const urls = extractUrls(text);
    if (urls.length === 0) {
      this.print(chalk.yellow('No links found.'));
      return false;
    }
    this.print(chalk.gray(`Found ${urls.length} link(s).`));

    const outputDirectory = await this.ensureOutputDirectory();
    if (outputDirectory === null) {
      return false;
    }

    if (this.ctx.state.requestedFormats === null) {
      this.print(`\nExport formats:\n${renderFormatMenu()}`);
      const answer = await this.prompter.ask('Choose one or more (e.g. 1 4): ');
      this.ctx.state.requestedFormats = parseFormatSelection(answer ?? '');
    }

    const defaults = buildAttemptDefaults({
      outputDirectory,
      poToken: this.ctx.config.engine.poToken,
      jsRuntime: options.jsRuntime,
    });

    const summary = await this.ctx.orchestrator.runBatch(urls, this.ctx.state, defaults);
    this.print(renderSummary(summary));
    return true;
  }

  /**
   * Sticky output directory; re-prompts until a valid subfolder is given.
   * Null when input ends while asking.
   */
  private async ensureOutputDirectory(): Promise<string | null> {
    const { state, fileManager } = this.ctx;

    while (state.outputDirectory === null) {
      const answer = await this.prompter.ask(
        `Output subfolder inside ${fileManager.baseDirectory} (Enter = base): `,
      );
      if (answer === null) {
        return null;
      }

      try {
        state.outputDirectory = await fileManager.resolveOutputDirectory(answer);
      } catch (error) {
        if (!(error instanceof OutputDirectoryError)) {
          throw error;
        }
        this.print(chalk.red(error.message));
      }
    }

    return state.outputDirectory;
  }

  private async readBatchFile(filePath: string): Promise<string | null> {
    try {
      return await this.ctx.fileManager.readTextFile(filePath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('Cannot read batch file', { path: filePath, error: message });
      this.print(chalk.red(`Cannot read ${filePath}: ${message}`));
      return null;
    }
  }
}
