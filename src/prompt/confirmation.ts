/**
 * Confirmation prompt
 *
 * Operations ask through this interface so they can run without a console.
 */

import * as readline from 'readline';
import type { Readable, Writable } from 'stream';

export interface ConfirmationPrompt {
  /** Show the question and resolve with the answer, trimmed */
  ask(question: string): Promise<string>;
}

/**
 * Only "y" (any case) confirms.
 */
export function isConfirmed(answer: string): boolean {
  return answer.trim().toLowerCase() === 'y';
}

export interface ReadlinePromptOptions {
  input?: Readable;
  output?: Writable;
}

/**
 * Prompt backed by a readline interface on stdin/stdout.
 */
export class ReadlinePrompt implements ConfirmationPrompt {
  private input: Readable;
  private output: Writable;

  constructor(options: ReadlinePromptOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  ask(question: string): Promise<string> {
    const rl = readline.createInterface({ input: this.input, output: this.output });
    return new Promise<string>((resolve) => {
      // stdin ending without a line counts as an empty answer
      rl.once('close', () => resolve(''));
      rl.question(question + ' ', (answer) => {
        resolve(answer.trim());
        rl.close();
      });
    });
  }
}
