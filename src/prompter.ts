import { createInterface, Interface } from 'node:readline';
import { Readable } from 'node:stream';

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

/**
 * One readline interface serves every question, so lines that arrive together are queued
 * for the questions that follow. Once input has ended every answer is empty.
 *
 * The interface is not a terminal: Ctrl+C stays a process SIGINT and never reaches readline.
 */
export class ReadlinePrompter implements Prompter {
  private rl: Interface | undefined;
  private readonly bufferedLines: string[] = [];
  private waiting: ((answer: string) => void) | undefined;
  private ended = false;

  constructor(
    private readonly input: Readable = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async ask(question: string): Promise<string> {
    if (this.waiting) {
      throw new Error('Another question is still waiting for input');
    }

    this.output.write(question);

    const buffered = this.bufferedLines.shift();
    if (buffered !== undefined) {
      return buffered;
    }

    if (this.ended || this.input.readableEnded) {
      return '';
    }

    const rl = this.open();
    return new Promise<string>((resolve) => {
      this.waiting = resolve;
      rl.resume();
    });
  }

  close(): void {
    if (this.rl && !this.ended) {
      this.rl.close();
    }
  }

  private open(): Interface {
    if (this.rl) {
      return this.rl;
    }

    const rl = createInterface({ input: this.input, terminal: false });
    rl.on('line', (line) => this.deliver(line));
    rl.on('close', () => {
      this.ended = true;
      this.answer('');
    });

    this.rl = rl;
    return rl;
  }

  private deliver(line: string): void {
    if (!this.waiting) {
      this.bufferedLines.push(line);
      return;
    }

    this.rl?.pause();
    this.answer(line);
  }

  private answer(line: string): void {
    const waiting = this.waiting;
    this.waiting = undefined;
    waiting?.(line);
  }
}
