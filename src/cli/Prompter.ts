import readline from 'readline';

/**
 * Prompter - Line-oriented terminal input.
 *
 * Lines are queued as they arrive, so a multi-line paste is read in full
 * even when it lands before the next question is asked. `null` means the
 * input ended.
 */
export class Prompter {
  private readonly rl: readline.Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly queued: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
  ) {
    this.output = output;
    this.rl = readline.createInterface({ input, terminal: false });

    this.rl.on('line', (line) => {
      if (this.waiting) {
        const resolve = this.waiting;
        this.waiting = null;
        resolve(line);
      } else {
        this.queued.push(line);
      }
    });

    this.rl.on('close', () => {
      this.closed = true;
      if (this.waiting) {
        const resolve = this.waiting;
        this.waiting = null;
        resolve(null);
      }
    });
  }

  /**
   * Print a question and wait for one line
   */
  ask(question: string): Promise<string | null> {
    this.output.write(question);
    return this.nextLine();
  }

  /**
   * Next line without printing anything
   */
  nextLine(): Promise<string | null> {
    const line = this.queued.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  /**
   * Lines up to (not including) the first empty line or the end of input
   */
  async readBlock(): Promise<string[]> {
    const lines: string[] = [];
    for (;;) {
      const line = await this.nextLine();
      if (line === null || line.trim() === '') {
        return lines;
      }
      lines.push(line);
    }
  }

  close(): void {
    this.rl.close();
  }
}
