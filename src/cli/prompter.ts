/**
 * @fileoverview Line-oriented console input
 *
 * The menu only needs "show a prompt, get one line back". `null` means the
 * input has ended.
 */

import { createInterface } from 'node:readline';

export interface Prompter {
  ask(prompt: string): Promise<string | null>;
  close(): void;
}

export type Writer = (text: string) => void;

export function createLinePrompter(input: NodeJS.ReadableStream, write: Writer): Prompter {
  const rl = createInterface({ input, terminal: false, crlfDelay: Infinity });
  const lines = rl[Symbol.asyncIterator]();
  let ended = false;

  return {
    async ask(prompt: string): Promise<string | null> {
      if (ended) return null;
      write(prompt);
      const next = await lines.next();
      if (next.done) {
        ended = true;
        return null;
      }
      return next.value;
    },

    close(): void {
      ended = true;
      rl.close();
    },
  };
}
