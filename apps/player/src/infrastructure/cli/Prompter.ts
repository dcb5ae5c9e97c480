/**
 * Line prompts on the controlling terminal
 */

import * as readline from 'readline';

export interface IPrompter {
  ask(question: string): Promise<string>;
  close(): void;
}

/**
 * Raised for a pending or later question once input has closed (EOF or Ctrl-C)
 */
export class PromptClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'PromptClosedError';
  }
}

export class ReadlinePrompter implements IPrompter {
  private rl: readline.Interface | null = null;
  private closed = false;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.input = input;
    this.output = output;
  }

  ask(question: string): Promise<string> {
    if (this.closed) {
      return Promise.reject(new PromptClosedError());
    }

    const rl = this.getInterface();

    return new Promise<string>((resolve, reject) => {
      const onClose = () => reject(new PromptClosedError());
      rl.once('close', onClose);

      rl.question(question, answer => {
        rl.off('close', onClose);
        resolve(answer);
      });
    });
  }

  /**
   * Release the terminal. Must happen before the player takes it over.
   */
  close(): void {
    this.closed = true;
    if (this.rl) {
      const rl = this.rl;
      this.rl = null;
      rl.close();
    }
  }

  private getInterface(): readline.Interface {
    if (!this.rl) {
      const rl = readline.createInterface({ input: this.input, output: this.output });
      // Ctrl-C at a prompt ends input instead of pausing the stream
      rl.on('SIGINT', () => this.close());
      rl.on('close', () => {
        this.closed = true;
        this.rl = null;
      });
      this.rl = rl;
    }
    return this.rl;
  }
}
