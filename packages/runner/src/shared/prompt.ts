/**
 * Terminal prompt for operator confirmations
 */

import { createInterface } from 'node:readline/promises';

import type { OperatorPrompt } from '@shiftclock/core';

export interface TerminalPromptOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Asks one question per call on stdin/stdout. The interface is closed after
 * every answer so an idle runner holds no handle on stdin.
 */
export class TerminalPrompt implements OperatorPrompt {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;

  constructor(options?: TerminalPromptOptions) {
    this.input = options?.input ?? process.stdin;
    this.output = options?.output ?? process.stdout;
  }

  async ask(question: string, signal?: AbortSignal): Promise<string> {
    const rl = createInterface({ input: this.input, output: this.output, terminal: false });
    try {
      return await rl.question(question, signal ? { signal } : {});
    } finally {
      rl.close();
    }
  }
}
