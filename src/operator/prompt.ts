/**
 * Interactive operator prompts.
 *
 * Decision code only sees the `OperatorPrompt` capability, so it runs headless
 * under tests with a scripted implementation.
 */

import * as readline from 'readline';
import type { Readable, Writable } from 'stream';

export interface OperatorPrompt {
  /** Ask a yes/no question; only "yes" or "y" count as consent */
  confirm(question: string): Promise<boolean>;
  /** Show a message and block until the operator presses Enter */
  acknowledge(message: string): Promise<void>;
  /** Release the input stream once the run is over */
  close(): void;
}

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'yes' || normalized === 'y';
}

export interface TerminalPromptOptions {
  input?: Readable;
  output?: Writable;
}

/**
 * Reads answers line by line from one readline interface that lives for the
 * whole run, so answers piped in ahead of their questions are not lost.
 */
export class TerminalPrompt implements OperatorPrompt {
  private readonly input: Readable;
  private readonly output: Writable;
  private rl: readline.Interface | null = null;
  private readonly pendingLines: string[] = [];
  private readonly waiting: Array<(line: string) => void> = [];
  private closed = false;

  constructor(options: TerminalPromptOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  private open(): void {
    if (this.rl || this.closed) {
      return;
    }

    this.rl = readline.createInterface({ input: this.input, terminal: false });
    this.rl.on('line', (line) => {
      const next = this.waiting.shift();
      if (next) {
        next(line);
      } else {
        this.pendingLines.push(line);
      }
    });
    // Closed stdin answers every open question with an empty line
    this.rl.once('close', () => {
      this.closed = true;
      this.rl = null;
      for (const resolve of this.waiting.splice(0)) {
        resolve('');
      }
    });
  }

  private ask(query: string): Promise<string> {
    this.output.write(query);
    this.open();

    const buffered = this.pendingLines.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (this.closed) {
      return Promise.resolve('');
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  async confirm(question: string): Promise<boolean> {
    const answer = await this.ask(`${question} (yes/no)\n`);
    this.output.write('\n');
    return isAffirmative(answer);
  }

  async acknowledge(message: string): Promise<void> {
    this.output.write(`${message}\n`);
    await this.ask('Press Enter to continue...');
  }

  close(): void {
    this.rl?.close();
  }
}
